import { z } from 'zod';
import { GRAINS } from './types';

export const GrainSchema = z.enum(GRAINS);
export const TimeGranularitySchema = z.enum(['day', 'month']);

// --- Filter requests ---

// Symbolic operators sent by filter UIs
const OPERATOR_ALIASES: Record<string, string> = {
    '=': 'eq',
    '==': 'eq',
    '!=': 'ne',
    '<>': 'ne',
    '>': 'gt',
    '>=': 'ge',
    '<': 'lt',
    '<=': 'le',
};

export const normalizeOperator = (op: string): string => {
    const trimmed = op.trim();
    return OPERATOR_ALIASES[trimmed] ?? trimmed.toLowerCase();
};

const ScalarSchema = z.union([z.string(), z.number(), z.boolean()]);

export const FilterRuleSchema = z.object({
    column: z.string().min(1),
    operator: z.string().min(1).optional(),
    op: z.string().min(1).optional(),
    // Shape is checked by the compiler against the operator
    value: z.union([ScalarSchema, z.array(ScalarSchema)]),
}).refine(r => r.operator !== undefined || r.op !== undefined, {
    message: 'operator is required',
    path: ['operator'],
}).transform(r => ({
    column: r.column,
    operator: normalizeOperator(r.operator ?? r.op ?? ''),
    value: r.value,
}));

export const FilterLogicSchema = z.preprocess(
    v => (typeof v === 'string' ? v.trim().toUpperCase() : v),
    z.enum(['AND', 'OR'])
).default('AND');

export const FilterRequestSchema = z.object({
    logic: FilterLogicSchema,
    filters: z.array(FilterRuleSchema).default([]),
});

export const ExportRequestSchema = FilterRequestSchema.extend({
    format: z.enum(['csv', 'xlsx']),
});

export const DatasetIdSchema = z.string().regex(/^[A-Za-z0-9_-]{1,128}$/);

// --- Analysis catalog ---

const AnalysisDefinitionSchema = z.object({
    key: z.string().min(1),
    label: z.string(),
    description: z.string().optional(),
    chart: z.enum(['line', 'bar', 'pie']),
    metric: z.string().min(1),
    report_grain: GrainSchema,
    required_columns: z.array(z.string()).min(1),
    granularities: z.array(TimeGranularitySchema).optional(),
});

export const AnalysisCatalogSchema = z.object({
    version: z.number().optional(),
    analyses: z.array(AnalysisDefinitionSchema),
});

export const AnalysisParamsSchema = z.object({
    granularity: TimeGranularitySchema.optional(),
    limit: z.number().int().min(1).optional(),
});

// --- System config ---

export const SystemConfigSchema = z.object({
    version: z.number().optional(),
    storage: z.object({
        input_dir: z.string().default('data/input'),
        output_dir: z.string().default('data/output'),
    }).default({}),
    engine: z.object({
        threads: z.number().int().positive().optional(),
        memory_limit: z.string().optional(),
        timeout_ms: z.number().int().positive().default(30_000),
    }).default({}),
    preview: z.object({
        default_limit: z.number().int().positive().default(200),
        min_limit: z.number().int().positive().default(10),
        max_limit: z.number().int().positive().default(1000),
    }).default({}),
    distinct: z.object({
        default_limit: z.number().int().positive().default(200),
        max_limit: z.number().int().positive().default(1000),
    }).default({}),
    analysis: z.object({
        catalog: z.string().optional(),
        default_limit: z.number().int().positive().default(10),
        max_limit: z.number().int().positive().default(100),
    }).default({}),
});
