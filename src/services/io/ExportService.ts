import { createReadStream, type ReadStream } from 'node:fs';
import { csvHeader, encodeText, rowsToCsv } from '../../lib/csvUtils';
import { isTabularGuardError, sanitizeEngineError } from '../../lib/errors';
import { executionSignal, raceSignal, throwIfAborted, type ExecutionOptions } from '../../lib/execution';
import { rowsToXlsx } from '../../lib/xlsxUtils';
import { toWhereSql } from '../../semantic/filter_compiler';
import type { CompiledPredicate, DatasetHandle, ExportFormat, Row } from '../../types';
import { DATASET_RELATION, withSession, type EngineSession, type QueryEngine } from '../duckdb/engine';
import type { DatasetStorage, FileWriter } from './FileSystemService';

export const CONTENT_TYPES: Record<ExportFormat, string> = {
    csv: 'text/csv; charset=utf-8',
    xlsx: 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
};

// Encoded CSV is merged into writes of about this size
const WRITE_BUFFER_SIZE = 4 * 1024 * 1024;

export interface ExportResult {
    filePath: string;
    fileName: string;
    contentType: string;
    rowCount: number;
    stream: ReadStream;
}

export const exportFileName = (datasetId: string, format: ExportFormat): string =>
    `${datasetId}_filtered.${format}`;

function mergeChunks(chunks: Uint8Array[], size: number): Uint8Array {
    const merged = new Uint8Array(size);
    let offset = 0;
    for (const chunk of chunks) {
        merged.set(chunk, offset);
        offset += chunk.byteLength;
    }
    return merged;
}

export class ExportService {
    constructor(
        private readonly engine: QueryEngine,
        private readonly storage: DatasetStorage,
        private readonly defaultTimeoutMs?: number
    ) { }

    async export(
        handle: DatasetHandle,
        predicate: CompiledPredicate,
        format: ExportFormat,
        options: ExecutionOptions = {}
    ): Promise<ExportResult> {
        const signal = executionSignal({
            signal: options.signal,
            timeoutMs: options.timeoutMs ?? this.defaultTimeoutMs,
        });
        if (signal?.aborted) {
            throw sanitizeEngineError(signal.reason);
        }

        const sql = `SELECT * FROM ${DATASET_RELATION} ${toWhereSql(predicate)}`.trimEnd();
        const fileName = exportFileName(handle.id, format);
        const writer = await this.storage.createExportWriter(fileName);
        const start = performance.now();

        let rowCount: number;
        try {
            const work = withSession(this.engine, handle, async session => {
                const columns = (await session.describe()).map(c => c.name);
                return format === 'csv'
                    ? this.writeCsv(session, sql, predicate, columns, writer, signal)
                    : this.writeXlsx(session, sql, predicate, columns, writer, signal);
            });
            rowCount = await raceSignal(work, signal);
            await writer.close();
        } catch (err) {
            await writer.abort();
            if (isTabularGuardError(err)) throw err;
            console.error(`[ExportService] ${format} export of ${handle.id} failed`, err);
            throw sanitizeEngineError(err);
        }

        const elapsed = ((performance.now() - start) / 1000).toFixed(2);
        console.log(`[ExportService] Wrote ${fileName}: ${rowCount} rows in ${elapsed}s`);

        return {
            filePath: writer.path,
            fileName,
            contentType: CONTENT_TYPES[format],
            rowCount,
            stream: createReadStream(writer.path),
        };
    }

    private async writeCsv(
        session: EngineSession,
        sql: string,
        predicate: CompiledPredicate,
        columns: string[],
        writer: FileWriter,
        signal?: AbortSignal
    ): Promise<number> {
        let buffered: Uint8Array[] = [encodeText(csvHeader(columns))];
        let bufferSize = buffered[0].byteLength;
        let rowCount = 0;

        for await (const rows of session.stream(sql, predicate.parameters)) {
            throwIfAborted(signal);

            const bytes = encodeText(rowsToCsv(rows, columns));
            buffered.push(bytes);
            bufferSize += bytes.byteLength;
            rowCount += rows.length;

            if (bufferSize >= WRITE_BUFFER_SIZE) {
                await writer.write(mergeChunks(buffered, bufferSize));
                buffered = [];
                bufferSize = 0;
            }
        }

        if (bufferSize > 0) {
            await writer.write(mergeChunks(buffered, bufferSize));
        }
        return rowCount;
    }

    private async writeXlsx(
        session: EngineSession,
        sql: string,
        predicate: CompiledPredicate,
        columns: string[],
        writer: FileWriter,
        signal?: AbortSignal
    ): Promise<number> {
        const rows: Row[] = [];
        for await (const chunk of session.stream(sql, predicate.parameters)) {
            throwIfAborted(signal);
            rows.push(...chunk);
        }

        throwIfAborted(signal);
        await writer.write(rowsToXlsx(rows, columns));
        return rows.length;
    }
}
