import type { RawColumn } from '../../lib/metadata';
import type { DatasetHandle, Row, ScalarValue } from '../../types';

/** Name under which a session exposes its dataset to SQL. */
export const DATASET_RELATION = 'dataset';

/**
 * One unit of work against one dataset. Owns an engine connection until
 * `close()`; nothing opened by a session outlives it.
 */
export interface EngineSession {
    describe(): Promise<RawColumn[]>;
    query(sql: string, params?: readonly ScalarValue[]): Promise<Row[]>;
    /** Yields result rows chunk by chunk, without materializing the full result. */
    stream(sql: string, params?: readonly ScalarValue[]): AsyncIterable<Row[]>;
    close(): void;
}

export interface QueryEngine {
    openSession(handle: DatasetHandle): Promise<EngineSession>;
}

export async function withSession<T>(
    engine: QueryEngine,
    handle: DatasetHandle,
    fn: (session: EngineSession) => Promise<T>
): Promise<T> {
    const session = await engine.openSession(handle);
    try {
        return await fn(session);
    } finally {
        session.close();
    }
}
