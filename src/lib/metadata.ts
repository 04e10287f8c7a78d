import type { ColumnDescriptor, TypeTag } from '../types';

/** A column as reported by the engine's describe capability, before normalization. */
export interface RawColumn {
    name: string;
    type: string;
    nullable?: boolean | string | null;
}

const INTEGER_TYPE = /^U?(TINY|SMALL|BIG|HUGE)?INT(EGER)?$|^INT[1248]$/;

// Infer the type tag from the engine's declared type string
export function toTypeTag(rawType: string): TypeTag {
    const t = rawType.trim().toUpperCase();
    if (!t) return 'unknown';

    if (t.startsWith('TIMESTAMP') || t === 'DATE' || t.startsWith('TIME') || t === 'DATETIME') return 'timestamp';
    if (t.startsWith('DECIMAL') || t.startsWith('NUMERIC') || t === 'DOUBLE' || t === 'FLOAT' || t === 'REAL') return 'float';
    if (INTEGER_TYPE.test(t)) return 'integer';
    if (t === 'BOOLEAN' || t === 'BOOL') return 'boolean';
    if (t === 'VARCHAR' || t === 'TEXT' || t === 'STRING' || t.startsWith('CHAR') || t === 'UUID') return 'string';

    return 'unknown';
}

const toNullable = (value: RawColumn['nullable']): boolean => {
    if (typeof value === 'boolean') return value;
    if (typeof value === 'string') return value.trim().toUpperCase() !== 'NO';
    // Engine did not say: assume the column may hold nulls
    return true;
};

export function toColumnDescriptor(raw: RawColumn): ColumnDescriptor {
    return Object.freeze({
        name: raw.name,
        declaredType: toTypeTag(raw.type),
        rawType: raw.type,
        nullable: toNullable(raw.nullable),
    });
}

export const columnNameSet = (columns: readonly ColumnDescriptor[]): Set<string> =>
    new Set(columns.map(c => c.name));
