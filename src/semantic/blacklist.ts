import { columnNameSet } from '../lib/metadata';
import type { ColumnDescriptor } from '../types';
import type { BlacklistFinding, BlacklistRule, Grain, SchemaContext } from './types';

export const ORDER_AMOUNT_COLUMN = 'order_total_amount';
export const ITEM_SUBTOTAL_COLUMN = 'item_subtotal';
export const PAYMENT_TIME_COLUMN = 'paid_at';
export const RAW_AMOUNT_COLUMNS = [ORDER_AMOUNT_COLUMN, ITEM_SUBTOTAL_COLUMN] as const;

/**
 * Ordered rule table. Findings are emitted in this order.
 */
export const BLACKLIST_RULES: readonly BlacklistRule[] = [
    {
        id: 'order_amount_at_item_grain',
        when: ({ grains, columnNames }) => grains.has('item') && columnNames.has(ORDER_AMOUNT_COLUMN),
        finding: () => ({
            grain: 'item',
            metric: ORDER_AMOUNT_COLUMN,
            reason: 'Order-level amounts are double-counted when summed at item grain',
            severity: 'block',
        }),
    },
    {
        id: 'item_subtotal_at_order_grain',
        when: ({ grains, columnNames }) => grains.has('order') && columnNames.has(ITEM_SUBTOTAL_COLUMN),
        finding: () => ({
            grain: 'order',
            metric: ITEM_SUBTOTAL_COLUMN,
            reason: 'Item-level subtotals lose their meaning at order grain',
            severity: 'block',
        }),
    },
    {
        id: 'raw_amount_at_member_grain',
        when: ({ grains, columnNames }) =>
            grains.has('member') && RAW_AMOUNT_COLUMNS.some(c => columnNames.has(c)),
        finding: ({ columnNames }) => ({
            grain: 'member',
            metric: RAW_AMOUNT_COLUMNS.filter(c => columnNames.has(c)),
            reason: 'Member-level analysis needs the raw amounts aggregated first',
            severity: 'warning',
        }),
    },
    {
        id: 'nullable_payment_time',
        when: ({ columns }) => columns.some(c => c.name === PAYMENT_TIME_COLUMN && c.nullable),
        finding: () => ({
            grain: 'all',
            metric: PAYMENT_TIME_COLUMN,
            reason: 'Payment time can be missing; pair it with an order status filter',
            severity: 'warning',
        }),
    },
];

export function deriveBlacklist(
    grains: ReadonlySet<Grain>,
    columns: readonly ColumnDescriptor[],
    rules: readonly BlacklistRule[] = BLACKLIST_RULES
): BlacklistFinding[] {
    const ctx: SchemaContext = { grains, columns, columnNames: columnNameSet(columns) };

    return rules
        .filter(rule => rule.when(ctx))
        .map(rule => ({ rule: rule.id, ...rule.finding(ctx) }));
}

export const findingMetrics = (finding: BlacklistFinding): string[] =>
    Array.isArray(finding.metric) ? finding.metric : [finding.metric];
