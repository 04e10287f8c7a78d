import type { ColumnDescriptor } from '../types';
import { GRAINS, type Grain } from './types';

// Exact column names only; partial matches such as `order_number` are not markers.
export const GRAIN_MARKERS: Readonly<Record<Grain, readonly string[]>> = {
    order: ['order_id'],
    item: ['product_id'],
    member: ['member_id'],
};

/**
 * Heuristic grain detection from column presence. Rules are independent, so an
 * order-item fact table is both `order` and `item`.
 */
export function detectGrains(columns: readonly ColumnDescriptor[]): Set<Grain> {
    const names = new Set(columns.map(c => c.name));
    const grains = new Set<Grain>();

    for (const grain of GRAINS) {
        if (GRAIN_MARKERS[grain].some(marker => names.has(marker))) {
            grains.add(grain);
        }
    }

    return grains;
}
