import * as XLSX from 'xlsx';
import type { Row } from '../types';

export const XLSX_SHEET_NAME = 'data';

/**
 * Encodes rows as a single-sheet workbook with a header row.
 *
 * XLSX is not a streaming format: the whole result must be held in memory
 * before encoding, so memory grows with the exported row count.
 */
export function rowsToXlsx(rows: readonly Row[], columns: readonly string[]): Uint8Array {
    const aoa: unknown[][] = [[...columns]];
    for (const row of rows) {
        aoa.push(columns.map(c => row[c] ?? null));
    }

    const sheet = XLSX.utils.aoa_to_sheet(aoa);
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(workbook, sheet, XLSX_SHEET_NAME);

    const buffer: Buffer = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
    return buffer;
}
