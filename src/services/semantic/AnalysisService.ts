import { AnalysisBlockedError, InvalidRequestError, UnknownColumnError } from '../../lib/errors';
import { clampLimit, throwIfAborted, type ExecutionOptions } from '../../lib/execution';
import { columnNameSet, toColumnDescriptor } from '../../lib/metadata';
import type { QueryRunner } from '../../lib/query-runner';
import { SafetyPlanner } from '../../lib/safety-planner';
import { deriveBlacklist } from '../../semantic/blacklist';
import { detectGrains } from '../../semantic/grain_detector';
import type { SystemConfig } from '../../semantic/loader';
import type { AnalysisRegistry } from '../../semantic/registry';
import { AnalysisParamsSchema } from '../../semantic/schema';
import { AnalysisSqlBuilder } from '../../semantic/sql_builder_duckdb';
import type {
    AnalysisDefinition,
    AnalysisResult,
    GuardDecision,
    RankedItem,
    SeriesPoint,
    TimeGranularity,
} from '../../semantic/types';
import type { ColumnDescriptor, DatasetHandle, Row } from '../../types';

const DEFAULT_GRANULARITY: TimeGranularity = 'day';

export interface AnalysisPlan {
    analysis: AnalysisDefinition;
    missingColumns: string[];
    decision: GuardDecision;
}

const toNumberOrNull = (value: unknown): number | null => {
    if (value === null || value === undefined) return null;
    const n = typeof value === 'number' ? value : Number(value);
    return Number.isFinite(n) ? n : null;
};

const toKey = (value: unknown): RankedItem['key'] => {
    if (value === null || value === undefined) return null;
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
    return String(value);
};

export class AnalysisService {
    constructor(
        private readonly runner: QueryRunner,
        private readonly registry: AnalysisRegistry,
        private readonly config: Pick<SystemConfig, 'analysis'>,
        private readonly builder: AnalysisSqlBuilder = new AnalysisSqlBuilder()
    ) { }

    /**
     * Guard decision for one analysis against a known schema. No engine call.
     */
    planFor(analysisKey: string, columns: readonly ColumnDescriptor[]): AnalysisPlan {
        const analysis = this.requireAnalysis(analysisKey);
        const names = columnNameSet(columns);
        const grains = detectGrains(columns);
        const findings = deriveBlacklist(grains, columns);

        return {
            analysis,
            missingColumns: analysis.required_columns.filter(c => !names.has(c)),
            decision: SafetyPlanner.planAnalysis(analysis, grains, findings),
        };
    }

    async plan(handle: DatasetHandle, analysisKey: string, options: ExecutionOptions = {}): Promise<AnalysisPlan> {
        this.requireAnalysis(analysisKey);
        const columns = await this.runner.withDataset(handle, options, 'planAnalysis', async session =>
            (await session.describe()).map(toColumnDescriptor)
        );
        return this.planFor(analysisKey, columns);
    }

    async run(
        handle: DatasetHandle,
        analysisKey: string,
        rawParams: unknown = {},
        options: ExecutionOptions = {}
    ): Promise<AnalysisResult> {
        const analysis = this.requireAnalysis(analysisKey);

        const parsed = AnalysisParamsSchema.safeParse(rawParams ?? {});
        if (!parsed.success) {
            throw new InvalidRequestError(
                `Invalid parameters for ${analysis.key}`,
                parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`)
            );
        }

        const granularity = parsed.data.granularity ?? DEFAULT_GRANULARITY;
        if (parsed.data.granularity && !(analysis.granularities ?? []).includes(parsed.data.granularity)) {
            throw new InvalidRequestError(`${analysis.key} does not support granularity ${parsed.data.granularity}`);
        }
        const limit = clampLimit(parsed.data.limit, this.config.analysis);

        const query = this.builder.build(analysis, { granularity, limit });
        if (!query) {
            throw new InvalidRequestError(`No query is defined for analysis ${analysis.key}`);
        }

        return this.runner.withDataset(handle, options, `runAnalysis:${analysis.key}`, async (session, signal) => {
            const columns = (await session.describe()).map(toColumnDescriptor);
            const plan = this.planFor(analysis.key, columns);

            const [missing] = plan.missingColumns;
            if (missing !== undefined) {
                throw new UnknownColumnError(missing);
            }
            if (!plan.decision.allowed) {
                throw new AnalysisBlockedError(analysis.key, plan.decision.blocking);
            }

            throwIfAborted(signal);
            const rows = await session.query(query.sql, query.params);
            console.log(`[AnalysisService] ${analysis.key} on ${handle.id}: ${rows.length} rows`);

            if (query.shape === 'series') {
                return {
                    kind: 'series',
                    analysis: analysis.key,
                    metric: analysis.metric,
                    granularity,
                    series: rows.map(toSeriesPoint),
                    warnings: plan.decision.warnings,
                };
            }

            return {
                kind: 'ranking',
                analysis: analysis.key,
                metric: analysis.metric,
                dimension: query.dimension ?? analysis.metric,
                ...(query.limited ? { limit } : {}),
                items: query.categories ? fillCategories(rows, query.categories) : rows.map(toRankedItem),
                warnings: plan.decision.warnings,
            };
        });
    }

    private requireAnalysis(key: string): AnalysisDefinition {
        const analysis = this.registry.getAnalysis(key);
        if (!analysis) {
            throw new InvalidRequestError(`Unknown analysis: ${key}`);
        }
        return analysis;
    }
}

const toSeriesPoint = (row: Row): SeriesPoint => ({
    time: String(row['time']),
    value: toNumberOrNull(row['value']),
});

const toRankedItem = (row: Row): RankedItem => ({
    key: toKey(row['key']),
    value: toNumberOrNull(row['value']),
});

const fillCategories = (rows: readonly Row[], categories: readonly string[]): RankedItem[] => {
    const values = new Map(rows.map(row => [String(row['key']), toNumberOrNull(row['value'])]));
    return categories.map(key => ({ key, value: values.get(key) ?? 0 }));
};
