export type TypeTag = 'integer' | 'float' | 'boolean' | 'string' | 'timestamp' | 'unknown';

export interface ColumnDescriptor {
    readonly name: string;
    readonly declaredType: TypeTag;
    readonly rawType: string; // engine type string, e.g. 'DECIMAL(10,2)'
    readonly nullable: boolean;
}

export const OPERATORS = ['eq', 'ne', 'gt', 'ge', 'lt', 'le', 'contains', 'between', 'in'] as const;
export type OperatorTag = typeof OPERATORS[number];

export type ScalarValue = string | number | boolean;
export type FilterValue = ScalarValue | readonly ScalarValue[];

export interface FilterRule {
    column: string;
    // Kept as string: unknown operators are a compile error, not a type error
    operator: OperatorTag | (string & {});
    value: unknown;
}

export type FilterLogic = 'AND' | 'OR';

export interface CompiledPredicate {
    readonly clauses: readonly string[];
    readonly clauseTemplate: string;
    readonly parameters: readonly ScalarValue[];
}

export type ExportFormat = 'csv' | 'xlsx';

export interface DatasetHandle {
    readonly id: string;
    readonly path: string;
}

export type Row = Record<string, unknown>;
