import { withSession, DATASET_RELATION, type EngineSession, type QueryEngine } from '../services/duckdb/engine';
import { quoteIdentifier, toWhereSql } from '../semantic/filter_compiler';
import type { SystemConfig } from '../semantic/loader';
import type { ColumnDescriptor, CompiledPredicate, DatasetHandle, Row } from '../types';
import { isTabularGuardError, sanitizeEngineError, UnknownColumnError } from './errors';
import { clampLimit, executionSignal, raceSignal, throwIfAborted, type ExecutionOptions } from './execution';
import { toColumnDescriptor } from './metadata';

export interface PreviewCountResult {
    matchedRows: number;
    elapsedMs: number;
}

export interface PreviewRowsResult {
    columns: ColumnDescriptor[];
    rows: Row[];
    totalRows: number;
}

export type RunnerConfig = Pick<SystemConfig, 'engine' | 'preview' | 'distinct'>;

const toCount = (rows: Row[], field: string): number => {
    const value = rows[0]?.[field];
    const n = typeof value === 'number' ? value : Number(value ?? 0);
    return Number.isFinite(n) ? n : 0;
};

/**
 * Runs compiled predicates and dataset lookups against the engine. Each call
 * opens its own session and closes it before returning.
 */
export class QueryRunner {
    constructor(
        private readonly engine: QueryEngine,
        private readonly config: RunnerConfig
    ) { }

    async previewCount(
        handle: DatasetHandle,
        predicate: CompiledPredicate,
        options: ExecutionOptions = {}
    ): Promise<PreviewCountResult> {
        const sql = `SELECT COUNT(*) AS matched_rows FROM ${DATASET_RELATION} ${toWhereSql(predicate)}`.trimEnd();
        const start = performance.now();

        const rows = await this.withDataset(handle, options, 'previewCount', async (session, signal) => {
            throwIfAborted(signal);
            return session.query(sql, predicate.parameters);
        });

        const matchedRows = toCount(rows, 'matched_rows');
        const elapsedMs = Math.round(performance.now() - start);
        console.log(`[QueryRunner] ${handle.id}: ${matchedRows} matching rows in ${elapsedMs}ms (${predicate.parameters.length} params)`);

        return { matchedRows, elapsedMs };
    }

    /**
     * Distinct non-null values of one column, for filter pickers.
     */
    async distinctValues(
        handle: DatasetHandle,
        column: string,
        limit?: number,
        options: ExecutionOptions = {}
    ): Promise<unknown[]> {
        const effectiveLimit = clampLimit(limit, this.config.distinct);

        return this.withDataset(handle, options, 'distinctValues', async (session, signal) => {
            const columns = (await session.describe()).map(c => c.name);
            if (!columns.includes(column)) {
                throw new UnknownColumnError(column);
            }
            throwIfAborted(signal);

            const col = quoteIdentifier(column);
            const rows = await session.query(
                `SELECT DISTINCT ${col} AS value FROM ${DATASET_RELATION} WHERE ${col} IS NOT NULL ORDER BY 1 LIMIT ?`,
                [effectiveLimit]
            );
            return rows.map(r => r['value']);
        });
    }

    async previewRows(
        handle: DatasetHandle,
        limit?: number,
        options: ExecutionOptions = {}
    ): Promise<PreviewRowsResult> {
        const effectiveLimit = clampLimit(limit, this.config.preview);

        return this.withDataset(handle, options, 'previewRows', async (session, signal) => {
            const columns = (await session.describe()).map(toColumnDescriptor);
            throwIfAborted(signal);
            const rows = await session.query(`SELECT * FROM ${DATASET_RELATION} LIMIT ?`, [effectiveLimit]);
            throwIfAborted(signal);
            const total = await session.query(`SELECT COUNT(*) AS total_rows FROM ${DATASET_RELATION}`);

            return { columns, rows, totalRows: toCount(total, 'total_rows') };
        });
    }

    /**
     * Opens a session on the dataset, runs `work` under the caller's signal and
     * the configured timeout, and closes the session. Engine failures come out
     * sanitized; errors raised by `work` itself pass through.
     */
    async withDataset<T>(
        handle: DatasetHandle,
        options: ExecutionOptions,
        operation: string,
        work: (session: EngineSession, signal?: AbortSignal) => Promise<T>
    ): Promise<T> {
        const signal = executionSignal({
            signal: options.signal,
            timeoutMs: options.timeoutMs ?? this.config.engine.timeout_ms,
        });

        try {
            throwIfAborted(signal);
            return await raceSignal(withSession(this.engine, handle, session => work(session, signal)), signal);
        } catch (err) {
            if (isTabularGuardError(err)) throw err;
            console.error(`[QueryRunner] ${operation} failed on ${handle.id}`, err);
            throw sanitizeEngineError(err);
        }
    }
}
