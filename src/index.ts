import { InvalidRequestError } from './lib/errors';
import type { ExecutionOptions } from './lib/execution';
import { QueryRunner, type PreviewCountResult, type PreviewRowsResult } from './lib/query-runner';
import { compileFilters } from './semantic/filter_compiler';
import { MetadataLoader, type SystemConfig } from './semantic/loader';
import { AnalysisRegistry } from './semantic/registry';
import { ExportRequestSchema, FilterRequestSchema } from './semantic/schema';
import type { AnalysisDefinition, AnalysisResult, ChartKind } from './semantic/types';
import { DuckDbEngine } from './services/duckdb/connection';
import type { QueryEngine } from './services/duckdb/engine';
import { ExportService, type ExportResult } from './services/io/ExportService';
import { FileSystemService, type DatasetStorage } from './services/io/FileSystemService';
import { AnalysisService, type AnalysisPlan } from './services/semantic/AnalysisService';
import { MetadataService, type DatasetInspection } from './services/semantic/MetadataService';
import type { ColumnDescriptor, CompiledPredicate, ExportFormat, FilterLogic, FilterRule } from './types';
import type { z } from 'zod';

export * from './types';
export * from './lib/errors';
export type { ExecutionOptions } from './lib/execution';
export type { PreviewCountResult, PreviewRowsResult } from './lib/query-runner';
export type { SystemConfig } from './semantic/loader';
export type {
    AnalysisDefinition,
    AnalysisResult,
    BlacklistFinding,
    Grain,
    GuardDecision,
    RankedItem,
    SeriesPoint,
    TimeGranularity,
} from './semantic/types';
export type { QueryEngine, EngineSession } from './services/duckdb/engine';
export type { DatasetStorage, FileWriter } from './services/io/FileSystemService';
export type { ExportResult } from './services/io/ExportService';
export type { AnalysisPlan } from './services/semantic/AnalysisService';
export type { DatasetInspection } from './services/semantic/MetadataService';
export { compileFilters, toWhereSql } from './semantic/filter_compiler';
export { detectGrains } from './semantic/grain_detector';
export { deriveBlacklist, BLACKLIST_RULES } from './semantic/blacklist';
export { SafetyPlanner } from './lib/safety-planner';
export { DuckDbEngine } from './services/duckdb/connection';
export { FileSystemService } from './services/io/FileSystemService';
export { MetadataLoader } from './semantic/loader';
export { AnalysisRegistry } from './semantic/registry';

export interface FilterRequest {
    logic: FilterLogic;
    filters: FilterRule[];
}

export interface ExportRequest extends FilterRequest {
    format: ExportFormat;
}

export interface Capability {
    key: string;
    label: string;
    description?: string;
    chart: ChartKind;
}

const formatIssues = (error: z.ZodError): string[] =>
    error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);

/**
 * Validates an incoming filter payload. Symbolic operators are normalized;
 * unknown operator strings are left for the compiler to reject.
 */
export function parseFilterRequest(payload: unknown): FilterRequest {
    const parsed = FilterRequestSchema.safeParse(payload ?? {});
    if (!parsed.success) {
        throw new InvalidRequestError('Invalid filter request', formatIssues(parsed.error));
    }
    return parsed.data;
}

export function parseExportRequest(payload: unknown): ExportRequest {
    const parsed = ExportRequestSchema.safeParse(payload ?? {});
    if (!parsed.success) {
        throw new InvalidRequestError('Invalid export request', formatIssues(parsed.error));
    }
    return parsed.data;
}

export interface TabularGuardOptions {
    config?: SystemConfig;
    /** Read when `config` is not given; see `MetadataLoader.loadConfig`. */
    configPath?: string;
    engine?: QueryEngine;
    storage?: DatasetStorage;
    registry?: AnalysisRegistry;
    loader?: MetadataLoader;
}

export class TabularGuard {
    private readonly runner: QueryRunner;
    private readonly metadata: MetadataService;
    private readonly exporter: ExportService;
    private readonly analyses: AnalysisService;

    constructor(
        readonly config: SystemConfig,
        private readonly engine: QueryEngine,
        private readonly storage: DatasetStorage,
        private readonly registry: AnalysisRegistry
    ) {
        this.runner = new QueryRunner(engine, config);
        this.metadata = new MetadataService(engine, storage);
        this.exporter = new ExportService(engine, storage, config.engine.timeout_ms);
        this.analyses = new AnalysisService(this.runner, registry, config);
    }

    describeDataset(datasetId: string): Promise<ColumnDescriptor[]> {
        return this.metadata.describeDataset(datasetId);
    }

    async inspectDataset(datasetId: string): Promise<DatasetInspection> {
        const handle = await this.storage.resolve(datasetId);
        return this.metadata.inspect(handle, this.registry);
    }

    /**
     * Validates and compiles a filter payload against the dataset's current schema.
     */
    async compileRequest(datasetId: string, payload: unknown): Promise<CompiledPredicate> {
        const request = parseFilterRequest(payload);
        const columns = await this.describeDataset(datasetId);
        return compileFilters(request.filters, request.logic, columns);
    }

    async runPreview(datasetId: string, payload: unknown, options?: ExecutionOptions): Promise<PreviewCountResult> {
        const request = parseFilterRequest(payload);
        const handle = await this.storage.resolve(datasetId);
        const columns = await this.metadata.describe(handle);
        const predicate = compileFilters(request.filters, request.logic, columns);
        return this.runner.previewCount(handle, predicate, options);
    }

    async runExport(datasetId: string, payload: unknown, options?: ExecutionOptions): Promise<ExportResult> {
        const request = parseExportRequest(payload);
        const handle = await this.storage.resolve(datasetId);
        const columns = await this.metadata.describe(handle);
        const predicate = compileFilters(request.filters, request.logic, columns);
        return this.exporter.export(handle, predicate, request.format, options);
    }

    async distinctValues(datasetId: string, column: string, limit?: number, options?: ExecutionOptions): Promise<unknown[]> {
        const handle = await this.storage.resolve(datasetId);
        return this.runner.distinctValues(handle, column, limit, options);
    }

    async previewRows(datasetId: string, limit?: number, options?: ExecutionOptions): Promise<PreviewRowsResult> {
        const handle = await this.storage.resolve(datasetId);
        return this.runner.previewRows(handle, limit, options);
    }

    async planAnalysis(datasetId: string, analysisKey: string, options?: ExecutionOptions): Promise<AnalysisPlan> {
        const handle = await this.storage.resolve(datasetId);
        return this.analyses.plan(handle, analysisKey, options);
    }

    async runAnalysis(
        datasetId: string,
        analysisKey: string,
        params?: unknown,
        options?: ExecutionOptions
    ): Promise<AnalysisResult> {
        const handle = await this.storage.resolve(datasetId);
        return this.analyses.run(handle, analysisKey, params, options);
    }

    listCapabilities(): Capability[] {
        return this.registry.listAnalyses().map(({ key, label, description, chart }: AnalysisDefinition) => ({
            key,
            label,
            ...(description !== undefined ? { description } : {}),
            chart,
        }));
    }

    close(): void {
        if (this.engine instanceof DuckDbEngine) {
            this.engine.close();
        }
    }
}

export async function createTabularGuard(options: TabularGuardOptions = {}): Promise<TabularGuard> {
    const loader = options.loader ?? new MetadataLoader();
    const config = options.config ?? await loader.loadConfig(options.configPath);

    const registry = options.registry ?? new AnalysisRegistry(loader);
    await registry.init({ catalogPath: config.analysis.catalog });

    const engine = options.engine ?? new DuckDbEngine({
        threads: config.engine.threads,
        memoryLimit: config.engine.memory_limit,
    });
    const storage = options.storage ?? new FileSystemService({
        inputDir: config.storage.input_dir,
        outputDir: config.storage.output_dir,
    });

    console.log('[TabularGuard] Ready', { analyses: registry.listAnalyses().length });
    return new TabularGuard(config, engine, storage, registry);
}
