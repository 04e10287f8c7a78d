import { describe, it, expect } from 'vitest';
import { clampLimit, executionSignal, raceSignal } from '../../src/lib/execution';

describe('clampLimit', () => {
    const bounds = { default_limit: 200, min_limit: 10, max_limit: 1000 };

    it('should use the default when no limit is given', () => {
        expect(clampLimit(undefined, bounds)).toBe(200);
        expect(clampLimit(Number.NaN, bounds)).toBe(200);
    });

    it('should keep the limit within bounds', () => {
        expect(clampLimit(3, bounds)).toBe(10);
        expect(clampLimit(5000, bounds)).toBe(1000);
        expect(clampLimit(50.7, bounds)).toBe(50);
    });

    it('should default the lower bound to one', () => {
        expect(clampLimit(0, { default_limit: 10, max_limit: 100 })).toBe(1);
    });
});

describe('executionSignal', () => {
    it('should return nothing when there is nothing to watch', () => {
        expect(executionSignal({})).toBeUndefined();
        expect(executionSignal({ timeoutMs: 0 })).toBeUndefined();
    });

    it('should pass a lone caller signal through', () => {
        const controller = new AbortController();
        expect(executionSignal({ signal: controller.signal })).toBe(controller.signal);
    });

    it('should fire when the caller aborts', () => {
        const controller = new AbortController();
        const signal = executionSignal({ signal: controller.signal, timeoutMs: 60_000 });
        controller.abort();
        expect(signal?.aborted).toBe(true);
    });
});

describe('raceSignal', () => {
    it('should resolve with the work when no signal fires', async () => {
        await expect(raceSignal(Promise.resolve(5), new AbortController().signal)).resolves.toBe(5);
        await expect(raceSignal(Promise.resolve(6))).resolves.toBe(6);
    });

    it('should reject at once when already aborted', async () => {
        const controller = new AbortController();
        controller.abort(new Error('stop'));
        await expect(raceSignal(Promise.resolve(1), controller.signal)).rejects.toThrow('stop');
    });

    it('should reject when the signal fires before the work settles', async () => {
        const controller = new AbortController();
        const pending = new Promise<number>(resolve => setTimeout(() => resolve(1), 50));
        const raced = raceSignal(pending, controller.signal);

        controller.abort(new Error('cancelled'));

        await expect(raced).rejects.toThrow('cancelled');
    });

    it('should reject with the timeout reason', async () => {
        const pending = new Promise<number>(resolve => setTimeout(() => resolve(1), 200));
        const raced = raceSignal(pending, executionSignal({ timeoutMs: 10 }));

        await expect(raced).rejects.toHaveProperty('name', 'TimeoutError');
    });
});
