export interface ExecutionOptions {
    signal?: AbortSignal;
    timeoutMs?: number;
}

/**
 * Single signal covering both caller cancellation and the time budget.
 */
export function executionSignal(options: ExecutionOptions): AbortSignal | undefined {
    const signals: AbortSignal[] = [];
    if (options.signal) signals.push(options.signal);
    if (options.timeoutMs !== undefined && options.timeoutMs > 0) {
        signals.push(AbortSignal.timeout(options.timeoutMs));
    }
    if (signals.length === 0) return undefined;
    return signals.length === 1 ? signals[0] : AbortSignal.any(signals);
}

/**
 * Settles with `work`, or rejects with the signal's reason as soon as it fires.
 * The engine call itself is not interrupted; callers check the signal between chunks.
 */
export function raceSignal<T>(work: Promise<T>, signal?: AbortSignal): Promise<T> {
    if (!signal) return work;
    if (signal.aborted) {
        // Keep the abandoned work from surfacing as an unhandled rejection
        work.catch(() => undefined);
        return Promise.reject(signal.reason);
    }

    return new Promise<T>((resolve, reject) => {
        const onAbort = () => reject(signal.reason);
        signal.addEventListener('abort', onAbort, { once: true });
        work.then(
            value => {
                signal.removeEventListener('abort', onAbort);
                resolve(value);
            },
            err => {
                signal.removeEventListener('abort', onAbort);
                reject(err);
            }
        );
    });
}

export function throwIfAborted(signal?: AbortSignal): void {
    signal?.throwIfAborted();
}

export function clampLimit(
    requested: number | undefined,
    bounds: { default_limit: number; min_limit?: number; max_limit: number }
): number {
    if (requested === undefined || !Number.isFinite(requested)) return bounds.default_limit;
    const min = bounds.min_limit ?? 1;
    return Math.min(bounds.max_limit, Math.max(min, Math.trunc(requested)));
}
