import type { Row } from '../types';

export const CSV_SEPARATOR = ',';

// Helper to escape CSV fields
export function escapeCsvField(value: unknown, separator: string = CSV_SEPARATOR): string {
    if (value === null || value === undefined) {
        return '';
    }

    const stringValue = String(value);
    if (stringValue.includes(separator) || stringValue.includes('"') || stringValue.includes('\n') || stringValue.includes('\r')) {
        return `"${stringValue.replace(/"/g, '""')}"`;
    }
    return stringValue;
}

const encoder = new TextEncoder();

export function encodeText(text: string): Uint8Array {
    return encoder.encode(text);
}

export const csvHeader = (columns: readonly string[]): string =>
    columns.map(c => escapeCsvField(c)).join(CSV_SEPARATOR) + '\n';

// Convert a chunk of rows to CSV lines, columns in the given order
export function rowsToCsv(rows: readonly Row[], columns: readonly string[], includeHeader: boolean = false): string {
    let output = includeHeader ? csvHeader(columns) : '';

    for (const row of rows) {
        output += columns.map(c => escapeCsvField(row[c])).join(CSV_SEPARATOR) + '\n';
    }
    return output;
}
