import { DuckDBInstance, type DuckDBConnection, type DuckDBValue } from '@duckdb/node-api';
import type { RawColumn } from '../../lib/metadata';
import { quoteLiteral } from '../../semantic/filter_compiler';
import type { DatasetHandle, Row, ScalarValue } from '../../types';
import { DATASET_RELATION, type EngineSession, type QueryEngine } from './engine';

export interface DuckDbEngineOptions {
    threads?: number;
    memoryLimit?: string;
}

// DuckDB values that are not JS primitives (dates, decimals, lists...) render through toString()
export function toJsValue(value: DuckDBValue): unknown {
    if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
        return value;
    }
    if (typeof value === 'bigint') {
        return Number.isSafeInteger(Number(value)) ? Number(value) : value.toString();
    }
    return String(value);
}

const toRow = (names: readonly string[], values: readonly DuckDBValue[]): Row => {
    const row: Row = {};
    names.forEach((name, i) => {
        row[name] = toJsValue(values[i]);
    });
    return row;
};

class DuckDbSession implements EngineSession {
    private closed = false;

    constructor(private readonly connection: DuckDBConnection) { }

    async describe(): Promise<RawColumn[]> {
        const reader = await this.connection.runAndReadAll(`DESCRIBE ${DATASET_RELATION}`);
        return reader.getRowObjects().map(r => ({
            name: String(r['column_name']),
            type: String(r['column_type']),
            nullable: r['null'] === null ? null : String(r['null']),
        }));
    }

    async query(sql: string, params: readonly ScalarValue[] = []): Promise<Row[]> {
        const reader = await this.connection.runAndReadAll(sql, [...params]);
        const names = reader.columnNames();
        return reader.getRows().map(values => toRow(names, values));
    }

    async *stream(sql: string, params: readonly ScalarValue[] = []): AsyncGenerator<Row[], void, unknown> {
        const result = await this.connection.stream(sql, [...params]);
        const names = result.columnNames();

        while (!this.closed) {
            const chunk = await result.fetchChunk();
            if (!chunk || chunk.rowCount === 0) break;
            yield chunk.getRows().map(values => toRow(names, values));
        }
    }

    close(): void {
        if (this.closed) return;
        this.closed = true;
        this.connection.closeSync();
    }
}

/**
 * In-process DuckDB. One in-memory instance is shared; each session gets its
 * own connection and a connection-local temp view over the dataset file, so
 * concurrent requests never see each other's state.
 */
export class DuckDbEngine implements QueryEngine {
    private db: DuckDBInstance | null = null;
    private initPromise: Promise<DuckDBInstance> | null = null;

    constructor(private readonly options: DuckDbEngineOptions = {}) { }

    async getInstance(): Promise<DuckDBInstance> {
        if (this.db) return this.db;

        if (!this.initPromise) {
            this.initPromise = this.initialize();
        }

        return this.initPromise;
    }

    private async initialize(): Promise<DuckDBInstance> {
        try {
            const settings: Record<string, string> = {};
            if (this.options.threads) settings.threads = String(this.options.threads);
            if (this.options.memoryLimit) settings.memory_limit = this.options.memoryLimit;

            const db = await DuckDBInstance.create(':memory:', settings);
            console.log('[DuckDbEngine] Instance ready', settings);
            this.db = db;
            return db;
        } catch (error) {
            this.initPromise = null;
            throw error;
        }
    }

    async openSession(handle: DatasetHandle): Promise<EngineSession> {
        const db = await this.getInstance();
        const connection = await db.connect();
        try {
            // The path comes from the dataset store, never from the request
            await connection.run(
                `CREATE TEMP VIEW ${DATASET_RELATION} AS SELECT * FROM read_csv_auto(${quoteLiteral(handle.path)}, ignore_errors = true)`
            );
        } catch (error) {
            connection.closeSync();
            throw error;
        }
        return new DuckDbSession(connection);
    }

    close(): void {
        this.db?.closeSync();
        this.db = null;
        this.initPromise = null;
    }
}
