import { describe, it, expect, vi, beforeAll, afterAll, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DuckDbEngine, toJsValue } from '../../../src/services/duckdb/connection';
import { withSession } from '../../../src/services/duckdb/engine';
import { QueryRunner } from '../../../src/lib/query-runner';
import { toColumnDescriptor } from '../../../src/lib/metadata';
import { compileFilters } from '../../../src/semantic/filter_compiler';
import { AnalysisRegistry } from '../../../src/semantic/registry';
import { SystemConfigSchema } from '../../../src/semantic/schema';
import { AnalysisService } from '../../../src/services/semantic/AnalysisService';
import { MetadataService } from '../../../src/services/semantic/MetadataService';
import type { ColumnDescriptor, DatasetHandle } from '../../../src/types';
import { MemoryStorage } from '../../helpers/fakeEngine';

const SALES_CSV = [
    'order_id,member_id,purchase_time,order_total_amount,paid_at,first_purchase_flag',
    '1,M1,2024-01-05 10:00:00,100.5,2024-01-05 10:05:00,true',
    '2,M2,2024-01-20 12:00:00,200,,false',
    '3,M1,2024-02-03 09:30:00,50,2024-02-03 09:31:00,true',
].join('\n') + '\n';

const config = SystemConfigSchema.parse({});

describe('DuckDbEngine', () => {
    let root: string;
    let handle: DatasetHandle;
    let engine: DuckDbEngine;
    let columns: ColumnDescriptor[];

    beforeAll(async () => {
        root = await mkdtemp(join(tmpdir(), 'tabular-guard-duckdb-'));
        handle = { id: 'sales', path: join(root, 'sales.csv') };
        await writeFile(handle.path, SALES_CSV);
        engine = new DuckDbEngine({ threads: 1 });
        columns = await withSession(engine, handle, async session => (await session.describe()).map(toColumnDescriptor));
    });

    afterAll(async () => {
        engine.close();
        await rm(root, { recursive: true, force: true });
    });

    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
        vi.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should expose the CSV file as a typed, nullable view', () => {
        expect(columns.map(c => [c.name, c.declaredType, c.nullable])).toEqual([
            ['order_id', 'integer', true],
            ['member_id', 'string', true],
            ['purchase_time', 'timestamp', true],
            ['order_total_amount', 'float', true],
            ['paid_at', 'timestamp', true],
            ['first_purchase_flag', 'boolean', true],
        ]);
    });

    it('should return integers as numbers', async () => {
        const rows = await withSession(engine, handle, session =>
            session.query('SELECT COUNT(*) AS n, MAX(order_id) AS top FROM dataset')
        );
        expect(rows).toEqual([{ n: 3, top: 3 }]);
        expect(toJsValue(9007199254740993n)).toBe('9007199254740993');
    });

    it('should stream rows in order', async () => {
        const rows = await withSession(engine, handle, async session => {
            const collected: unknown[] = [];
            for await (const chunk of session.stream('SELECT order_id, member_id FROM dataset ORDER BY order_id')) {
                collected.push(...chunk);
            }
            return collected;
        });

        expect(rows).toEqual([
            { order_id: 1, member_id: 'M1' },
            { order_id: 2, member_id: 'M2' },
            { order_id: 3, member_id: 'M1' },
        ]);
    });

    describe('QueryRunner', () => {
        it('should count rows through bound parameters', async () => {
            const runner = new QueryRunner(engine, config);

            const between = compileFilters([{ column: 'order_total_amount', operator: 'between', value: [100, 250] }], 'AND', columns);
            const text = compileFilters([{ column: 'member_id', operator: 'contains', value: 'M1' }], 'AND', columns);

            expect((await runner.previewCount(handle, between)).matchedRows).toBe(2);
            expect((await runner.previewCount(handle, text)).matchedRows).toBe(2);
        });

        it('should report zero matches as a normal result', async () => {
            const runner = new QueryRunner(engine, config);
            const predicate = compileFilters([{ column: 'order_total_amount', operator: 'gt', value: 1_000_000 }], 'AND', columns);

            const result = await runner.previewCount(handle, predicate);

            expect(result.matchedRows).toBe(0);
            expect(Number.isInteger(result.elapsedMs)).toBe(true);
        });

        it('should bind the distinct limit', async () => {
            const runner = new QueryRunner(engine, config);

            expect(await runner.distinctValues(handle, 'member_id', 1)).toEqual(['M1']);
            expect(await runner.distinctValues(handle, 'member_id', 5)).toEqual(['M1', 'M2']);
        });
    });

    describe('MetadataService', () => {
        it('should flag the nullable payment time', async () => {
            const registry = new AnalysisRegistry();
            await registry.init();
            const service = new MetadataService(engine, new MemoryStorage(['sales']));

            const inspection = await service.inspect(handle, registry);

            expect(inspection.blacklist.map(f => f.rule)).toEqual(['raw_amount_at_member_grain', 'nullable_payment_time']);
        });
    });

    describe('AnalysisService', () => {
        let service: AnalysisService;

        beforeAll(async () => {
            const registry = new AnalysisRegistry();
            await registry.init();
            service = new AnalysisService(new QueryRunner(engine, config), registry, config);
        });

        it('should bucket a monthly trend', async () => {
            const result = await service.run(handle, 'time_trend', { granularity: 'month' });

            expect(result.kind === 'series' && result.series).toEqual([
                { time: '2024-01', value: 300.5 },
                { time: '2024-02', value: 50 },
            ]);
        });

        it('should bucket a daily trend', async () => {
            const result = await service.run(handle, 'time_trend');

            expect(result.kind === 'series' && result.series.map(p => p.time)).toEqual(['2024-01-05', '2024-01-20', '2024-02-03']);
        });

        it('should rank members with a bound limit', async () => {
            const result = await service.run(handle, 'top_members', { limit: 1 });

            expect(result.kind === 'ranking' && result.items).toEqual([{ key: 'M2', value: 200 }]);
            expect(result.warnings.map(f => f.rule)).toEqual(['raw_amount_at_member_grain']);
        });

        it('should split orders into new and returning customers', async () => {
            const result = await service.run(handle, 'new_vs_returning');

            expect(result).toMatchObject({
                dimension: 'customer_type',
                items: [{ key: 'new', value: 2 }, { key: 'returning', value: 1 }],
            });
        });
    });
});
