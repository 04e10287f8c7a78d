import type { ColumnDescriptor } from '../types';

export const GRAINS = ['order', 'item', 'member'] as const;
export type Grain = typeof GRAINS[number];

export type Severity = 'block' | 'warning';

export interface BlacklistFinding {
    rule: string;
    grain: Grain | 'all';
    metric: string | string[];
    reason: string;
    severity: Severity;
}

export interface SchemaContext {
    grains: ReadonlySet<Grain>;
    columns: readonly ColumnDescriptor[];
    columnNames: ReadonlySet<string>;
}

export interface BlacklistRule {
    id: string;
    when: (ctx: SchemaContext) => boolean;
    finding: (ctx: SchemaContext) => Omit<BlacklistFinding, 'rule'>;
}

// --- Analysis catalog ---
export type TimeGranularity = 'day' | 'month';
export type ChartKind = 'line' | 'bar' | 'pie';

export interface AnalysisDefinition {
    key: string;
    label: string;
    description?: string;
    chart: ChartKind;
    metric: string;
    report_grain: Grain;
    required_columns: string[];
    granularities?: TimeGranularity[];
}

export interface AnalysisCatalog {
    version?: number;
    analyses: AnalysisDefinition[];
}

export interface GuardDecision {
    allowed: boolean;
    blocking: BlacklistFinding[];
    warnings: BlacklistFinding[];
}

export interface AnalysisParams {
    granularity?: TimeGranularity;
    limit?: number;
}

export interface SeriesPoint {
    time: string;
    value: number | null;
}

export interface RankedItem {
    key: string | number | boolean | null;
    value: number | null;
}

export type AnalysisResult =
    | { kind: 'series'; analysis: string; metric: string; granularity: TimeGranularity; series: SeriesPoint[]; warnings: BlacklistFinding[] }
    | { kind: 'ranking'; analysis: string; metric: string; dimension: string; limit?: number; items: RankedItem[]; warnings: BlacklistFinding[] };
