import { DATASET_RELATION } from '../services/duckdb/engine';
import type { ScalarValue } from '../types';
import { quoteIdentifier, quoteLiteral } from './filter_compiler';
import type { AnalysisDefinition, TimeGranularity } from './types';

export const PURCHASE_TIME_COLUMN = 'purchase_time';
export const PRODUCT_NAME_COLUMN = 'product_name';
export const MEMBER_ID_COLUMN = 'member_id';
export const ORDER_ID_COLUMN = 'order_id';
export const FIRST_PURCHASE_COLUMN = 'first_purchase_flag';
export const CUSTOMER_TYPE_DIMENSION = 'customer_type';
export const CUSTOMER_TYPES = ['new', 'returning'] as const;

export type AnalysisShape = 'series' | 'ranking';

export interface AnalysisQuery {
    shape: AnalysisShape;
    sql: string;
    params: ScalarValue[];
    /** Column the ranking groups by; absent for series. */
    dimension?: string;
    limited: boolean;
    /** Fixed ranking keys, in output order; missing ones are reported as 0. */
    categories?: readonly string[];
}

export interface AnalysisQueryParams {
    granularity: TimeGranularity;
    limit: number;
}

type ShapeBuilder = (analysis: AnalysisDefinition, params: AnalysisQueryParams) => AnalysisQuery;

const BUCKET_FORMATS: Readonly<Record<TimeGranularity, string>> = {
    day: '%Y-%m-%d',
    month: '%Y-%m',
};

// Text timestamps that do not parse are dropped by timeFilter
const timeBucket = (column: string, granularity: TimeGranularity): string =>
    `strftime(date_trunc(?, TRY_CAST(${quoteIdentifier(column)} AS TIMESTAMP)), ${quoteLiteral(BUCKET_FORMATS[granularity])})`;

const timeFilter = (column: string): string =>
    `TRY_CAST(${quoteIdentifier(column)} AS TIMESTAMP) IS NOT NULL`;

// DECIMAL sums come back as strings otherwise
const sumOf = (column: string): string => `CAST(SUM(${quoteIdentifier(column)}) AS DOUBLE)`;

const series = (valueExpr: string, params: AnalysisQueryParams): AnalysisQuery => ({
    shape: 'series',
    sql: [
        `SELECT ${timeBucket(PURCHASE_TIME_COLUMN, params.granularity)} AS time, ${valueExpr} AS value`,
        `FROM ${DATASET_RELATION}`,
        `WHERE ${timeFilter(PURCHASE_TIME_COLUMN)}`,
        'GROUP BY 1',
        'ORDER BY 1',
    ].join('\n'),
    params: [params.granularity],
    limited: false,
});

const topBy = (dimension: string, metric: string, params: AnalysisQueryParams): AnalysisQuery => ({
    shape: 'ranking',
    sql: [
        `SELECT ${quoteIdentifier(dimension)} AS key, ${sumOf(metric)} AS value`,
        `FROM ${DATASET_RELATION}`,
        `WHERE ${quoteIdentifier(dimension)} IS NOT NULL`,
        'GROUP BY 1',
        'ORDER BY 2 DESC NULLS LAST, 1',
        'LIMIT ?',
    ].join('\n'),
    params: [params.limit],
    dimension,
    limited: true,
});

const SHAPES = new Map<string, ShapeBuilder>(Object.entries({
    time_trend: (analysis, params) => series(sumOf(analysis.metric), params),
    aov: (analysis, params) => series(
        `${sumOf(analysis.metric)} / NULLIF(COUNT(DISTINCT ${quoteIdentifier(ORDER_ID_COLUMN)}), 0)`,
        params
    ),
    top_products: (analysis, params) => topBy(PRODUCT_NAME_COLUMN, analysis.metric, params),
    top_members: (analysis, params) => topBy(MEMBER_ID_COLUMN, analysis.metric, params),
    new_vs_returning: () => ({
        shape: 'ranking',
        sql: [
            `SELECT CASE WHEN TRY_CAST(${quoteIdentifier(FIRST_PURCHASE_COLUMN)} AS BOOLEAN) THEN 'new' ELSE 'returning' END AS key, COUNT(DISTINCT ${quoteIdentifier(ORDER_ID_COLUMN)}) AS value`,
            `FROM ${DATASET_RELATION}`,
            'GROUP BY 1',
        ].join('\n'),
        params: [],
        dimension: CUSTOMER_TYPE_DIMENSION,
        limited: false,
        categories: CUSTOMER_TYPES,
    }),
} satisfies Record<string, ShapeBuilder>));

/**
 * Aggregate SQL for the catalogued analyses. Only column names from the
 * catalog and fixed constants reach the template; granularity and limit are
 * bound as parameters.
 */
export class AnalysisSqlBuilder {
    hasShape(key: string): boolean {
        return SHAPES.has(key);
    }

    build(analysis: AnalysisDefinition, params: AnalysisQueryParams): AnalysisQuery | undefined {
        const builder = SHAPES.get(analysis.key);
        return builder ? builder(analysis, params) : undefined;
    }
}
