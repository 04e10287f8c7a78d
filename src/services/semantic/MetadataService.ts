import { DatasetNotFoundError, SchemaUnavailableError, TabularGuardError } from '../../lib/errors';
import { toColumnDescriptor } from '../../lib/metadata';
import { deriveBlacklist } from '../../semantic/blacklist';
import { detectGrains } from '../../semantic/grain_detector';
import type { AnalysisRegistry } from '../../semantic/registry';
import type { AnalysisDefinition, BlacklistFinding, Grain } from '../../semantic/types';
import type { ColumnDescriptor, DatasetHandle } from '../../types';
import { withSession, type QueryEngine } from '../duckdb/engine';
import type { DatasetStorage } from '../io/FileSystemService';

export interface DatasetInspection {
    datasetId: string;
    columns: ColumnDescriptor[];
    grains: Grain[];
    blacklist: BlacklistFinding[];
    availableAnalyses: AnalysisDefinition[];
}

const isMissingFile = (err: unknown): boolean =>
    err instanceof Error && /No files found|does not exist|ENOENT/i.test(err.message);

export class MetadataService {
    constructor(
        private readonly engine: QueryEngine,
        private readonly storage: DatasetStorage
    ) { }

    /**
     * Ordered column list of a dataset as the engine sees it.
     */
    async describe(handle: DatasetHandle): Promise<ColumnDescriptor[]> {
        let columns: ColumnDescriptor[];
        try {
            const raw = await withSession(this.engine, handle, session => session.describe());
            columns = raw.map(toColumnDescriptor);
        } catch (err) {
            if (err instanceof TabularGuardError) throw err;
            if (isMissingFile(err)) throw new DatasetNotFoundError(handle.id);
            console.error(`[MetadataService] Describe failed for ${handle.id}`, err);
            throw new SchemaUnavailableError(handle.id, err);
        }

        if (columns.length === 0) {
            throw new SchemaUnavailableError(handle.id);
        }
        return columns;
    }

    async describeDataset(datasetId: string): Promise<ColumnDescriptor[]> {
        const handle = await this.storage.resolve(datasetId);
        return this.describe(handle);
    }

    /**
     * Schema plus everything derived from it. Recomputed on every call.
     */
    async inspect(handle: DatasetHandle, registry: AnalysisRegistry): Promise<DatasetInspection> {
        const columns = await this.describe(handle);
        const grains = detectGrains(columns);

        return {
            datasetId: handle.id,
            columns,
            grains: [...grains],
            blacklist: deriveBlacklist(grains, columns),
            availableAnalyses: registry.listAvailable(columns),
        };
    }
}
