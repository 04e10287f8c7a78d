import {
    MalformedOperandError,
    UnknownColumnError,
    UnsupportedOperatorError,
} from '../lib/errors';
import { columnNameSet } from '../lib/metadata';
import {
    OPERATORS,
    type ColumnDescriptor,
    type CompiledPredicate,
    type FilterLogic,
    type FilterRule,
    type OperatorTag,
    type ScalarValue,
} from '../types';

const ALWAYS_TRUE = 'TRUE';

const COMPARISON_SQL: Record<'eq' | 'ne' | 'gt' | 'ge' | 'lt' | 'le', string> = {
    eq: '=',
    ne: '<>',
    gt: '>',
    ge: '>=',
    lt: '<',
    le: '<=',
};

/** DuckDB identifier quoting: wrap in double quotes, double any embedded quote. */
export const quoteIdentifier = (name: string): string => `"${name.replace(/"/g, '""')}"`;

/**
 * String literal quoting for engine-owned text (file paths), never for user values.
 */
export const quoteLiteral = (value: string): string => `'${value.replace(/'/g, "''")}'`;

export const isOperatorTag = (op: string): op is OperatorTag =>
    (OPERATORS as readonly string[]).includes(op);

const isScalar = (value: unknown): value is ScalarValue => {
    if (typeof value === 'string' || typeof value === 'boolean') return true;
    return typeof value === 'number' && Number.isFinite(value);
};

const describeValue = (value: unknown): string => {
    if (value === null) return 'null';
    if (Array.isArray(value)) return `a list of ${value.length}`;
    if (typeof value === 'number') return String(value);
    return typeof value;
};

interface CompiledClause {
    sql: string;
    params: ScalarValue[];
}

function compileRule(rule: FilterRule, operator: OperatorTag): CompiledClause {
    const col = quoteIdentifier(rule.column);
    const { value } = rule;

    switch (operator) {
        case 'eq':
        case 'ne':
        case 'gt':
        case 'ge':
        case 'lt':
        case 'le':
        case 'contains': {
            if (!isScalar(value)) {
                throw new MalformedOperandError(rule.column, operator, `expected a single value, got ${describeValue(value)}`);
            }
            if (operator === 'contains') {
                return { sql: `contains(CAST(${col} AS VARCHAR), CAST(? AS VARCHAR))`, params: [value] };
            }
            return { sql: `${col} ${COMPARISON_SQL[operator]} ?`, params: [value] };
        }
        case 'between': {
            if (!Array.isArray(value) || value.length !== 2 || !value.every(isScalar)) {
                throw new MalformedOperandError(rule.column, operator, `expected [start, end], got ${describeValue(value)}`);
            }
            return { sql: `${col} BETWEEN ? AND ?`, params: [value[0], value[1]] };
        }
        case 'in': {
            if (!Array.isArray(value) || value.length === 0 || !value.every(isScalar)) {
                throw new MalformedOperandError(rule.column, operator, `expected a non-empty list, got ${describeValue(value)}`);
            }
            const placeholders = value.map(() => '?').join(', ');
            return { sql: `${col} IN (${placeholders})`, params: [...value] };
        }
    }
}

/**
 * Compiles filter rules into a parameterized predicate.
 *
 * Rules are validated in order (operator, then column, then operand shape) and
 * the first failure aborts compilation, so nothing malformed reaches the engine.
 * User values only ever appear in `parameters`.
 */
export function compileFilters(
    rules: readonly FilterRule[],
    logic: FilterLogic,
    knownColumns: readonly ColumnDescriptor[]
): CompiledPredicate {
    const known = columnNameSet(knownColumns);
    const clauses: string[] = [];
    const parameters: ScalarValue[] = [];

    for (const rule of rules) {
        const operator = typeof rule.operator === 'string' ? rule.operator : String(rule.operator);
        if (!isOperatorTag(operator)) {
            throw new UnsupportedOperatorError(operator);
        }
        if (!known.has(rule.column)) {
            throw new UnknownColumnError(rule.column);
        }

        const compiled = compileRule(rule, operator);
        clauses.push(compiled.sql);
        parameters.push(...compiled.params);
    }

    return Object.freeze({
        clauses: Object.freeze(clauses),
        clauseTemplate: joinClauses(clauses, logic),
        parameters: Object.freeze(parameters),
    });
}

function joinClauses(clauses: string[], logic: FilterLogic): string {
    if (clauses.length === 0) return ALWAYS_TRUE;
    if (clauses.length === 1) return clauses[0];
    const joiner = logic === 'OR' ? ' OR ' : ' AND ';
    return clauses.map(c => `(${c})`).join(joiner);
}

export const isAlwaysTrue = (predicate: CompiledPredicate): boolean => predicate.clauses.length === 0;

export const toWhereSql = (predicate: CompiledPredicate): string =>
    isAlwaysTrue(predicate) ? '' : `WHERE ${predicate.clauseTemplate}`;
