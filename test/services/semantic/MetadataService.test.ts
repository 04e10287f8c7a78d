import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { MetadataService } from '../../../src/services/semantic/MetadataService';
import { AnalysisRegistry } from '../../../src/semantic/registry';
import { DatasetNotFoundError, SchemaUnavailableError } from '../../../src/lib/errors';
import { FakeEngine, MemoryStorage, rawColumns } from '../../helpers/fakeEngine';

describe('MetadataService', () => {
    beforeEach(() => {
        vi.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should describe a dataset by id', async () => {
        const engine = new FakeEngine({
            columns: [
                { name: 'order_id', type: 'BIGINT', nullable: 'YES' },
                { name: 'paid_at', type: 'TIMESTAMP', nullable: 'NO' },
            ],
        });
        const service = new MetadataService(engine, new MemoryStorage(['sales']));

        expect(await service.describeDataset('sales')).toEqual([
            { name: 'order_id', declaredType: 'integer', rawType: 'BIGINT', nullable: true },
            { name: 'paid_at', declaredType: 'timestamp', rawType: 'TIMESTAMP', nullable: false },
        ]);
        expect(engine.handles).toEqual([{ id: 'sales', path: '/datasets/sales.csv' }]);
        expect(engine.closed).toBe(1);
    });

    it('should report unknown ids as not found', async () => {
        const engine = new FakeEngine();
        const service = new MetadataService(engine, new MemoryStorage(['sales']));

        await expect(service.describeDataset('nope')).rejects.toBeInstanceOf(DatasetNotFoundError);
        expect(engine.opened).toBe(0);
    });

    it('should report a file that vanished as not found', async () => {
        const engine = new FakeEngine({ openError: new Error('IO Error: No files found that match the pattern "/datasets/sales.csv"') });
        const service = new MetadataService(engine, new MemoryStorage(['sales']));

        await expect(service.describeDataset('sales')).rejects.toBeInstanceOf(DatasetNotFoundError);
    });

    it('should report an unparseable file as schema unavailable', async () => {
        const cause = new Error('Invalid Input Error: Error when sniffing file');
        const engine = new FakeEngine({ openError: cause });
        const service = new MetadataService(engine, new MemoryStorage(['sales']));

        const error = await service.describeDataset('sales').catch((e: unknown) => e);

        expect(error).toBeInstanceOf(SchemaUnavailableError);
        expect(error).toMatchObject({ datasetId: 'sales', cause });
    });

    it('should treat an empty column list as schema unavailable', async () => {
        const service = new MetadataService(new FakeEngine({ columns: [] }), new MemoryStorage(['sales']));
        await expect(service.describeDataset('sales')).rejects.toBeInstanceOf(SchemaUnavailableError);
    });

    it('should derive grains, findings and available analyses', async () => {
        const engine = new FakeEngine({
            columns: rawColumns('order_id', 'product_id', 'product_name', 'item_subtotal', 'order_total_amount', 'purchase_time'),
        });
        const service = new MetadataService(engine, new MemoryStorage(['sales']));
        const registry = new AnalysisRegistry();
        await registry.init();

        const inspection = await service.inspect({ id: 'sales', path: '/datasets/sales.csv' }, registry);

        expect(inspection.datasetId).toBe('sales');
        expect(inspection.columns.map(c => c.name)).toEqual([
            'order_id', 'product_id', 'product_name', 'item_subtotal', 'order_total_amount', 'purchase_time',
        ]);
        expect(inspection.grains).toEqual(['order', 'item']);
        expect(inspection.blacklist.map(f => f.rule)).toEqual(['order_amount_at_item_grain', 'item_subtotal_at_order_grain']);
        expect(inspection.availableAnalyses.map(a => a.key)).toEqual(['time_trend', 'top_products', 'aov']);
    });
});
