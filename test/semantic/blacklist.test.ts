import { describe, it, expect } from 'vitest';
import { BLACKLIST_RULES, deriveBlacklist, findingMetrics } from '../../src/semantic/blacklist';
import { detectGrains } from '../../src/semantic/grain_detector';
import { toColumnDescriptor } from '../../src/lib/metadata';
import type { RawColumn } from '../../src/lib/metadata';
import type { BlacklistRule, Grain } from '../../src/semantic/types';

const cols = (...names: Array<string | RawColumn>) =>
    names.map(n => toColumnDescriptor(typeof n === 'string' ? { name: n, type: 'VARCHAR' } : n));

const derive = (...names: Array<string | RawColumn>) => {
    const columns = cols(...names);
    return deriveBlacklist(detectGrains(columns), columns);
};

describe('deriveBlacklist', () => {
    it('should block item subtotals on an order-level table', () => {
        const findings = derive('order_id', 'item_subtotal', 'order_total_amount');

        expect(findings).toEqual([
            {
                rule: 'item_subtotal_at_order_grain',
                grain: 'order',
                metric: 'item_subtotal',
                reason: 'Item-level subtotals lose their meaning at order grain',
                severity: 'block',
            },
        ]);
    });

    it('should block order amounts on an order-item table', () => {
        const findings = derive('order_id', 'product_id', 'item_subtotal', 'order_total_amount');

        expect(findings.map(f => f.rule)).toEqual(['order_amount_at_item_grain', 'item_subtotal_at_order_grain']);
        expect(findings[0]).toMatchObject({ grain: 'item', metric: 'order_total_amount', severity: 'block' });
    });

    it('should warn about raw amounts at member grain, listing the ones present', () => {
        expect(derive('member_id', 'order_total_amount', 'item_subtotal')).toEqual([
            {
                rule: 'raw_amount_at_member_grain',
                grain: 'member',
                metric: ['order_total_amount', 'item_subtotal'],
                reason: 'Member-level analysis needs the raw amounts aggregated first',
                severity: 'warning',
            },
        ]);
        expect(derive('member_id', 'item_subtotal')[0].metric).toEqual(['item_subtotal']);
    });

    it('should warn about a nullable payment time at every grain', () => {
        const findings = derive({ name: 'paid_at', type: 'TIMESTAMP', nullable: 'YES' });
        expect(findings).toEqual([
            {
                rule: 'nullable_payment_time',
                grain: 'all',
                metric: 'paid_at',
                reason: 'Payment time can be missing; pair it with an order status filter',
                severity: 'warning',
            },
        ]);
    });

    it('should treat a payment time of unknown nullability as nullable', () => {
        expect(derive({ name: 'paid_at', type: 'TIMESTAMP' }).map(f => f.rule)).toEqual(['nullable_payment_time']);
    });

    it('should not warn when the payment time is declared non-null', () => {
        expect(derive({ name: 'paid_at', type: 'TIMESTAMP', nullable: 'NO' })).toEqual([]);
    });

    it('should emit findings in rule table order', () => {
        const findings = derive('paid_at', 'member_id', 'product_id', 'order_id', 'item_subtotal', 'order_total_amount');
        expect(findings.map(f => f.rule)).toEqual(BLACKLIST_RULES.map(r => r.id));
    });

    it('should return nothing without grains or amounts', () => {
        expect(derive()).toEqual([]);
        expect(derive('order_total_amount', 'item_subtotal')).toEqual([]);
    });

    it('should give the same result on repeated calls', () => {
        const columns = cols('order_id', 'product_id', 'order_total_amount');
        const grains = detectGrains(columns);
        expect(deriveBlacklist(grains, columns)).toEqual(deriveBlacklist(grains, columns));
    });

    it('should accept a custom rule table', () => {
        const rules: BlacklistRule[] = [{
            id: 'always',
            when: () => true,
            finding: () => ({ grain: 'all', metric: 'x', reason: 'test', severity: 'warning' }),
        }];
        expect(deriveBlacklist(new Set<Grain>(), [], rules)).toEqual([
            { rule: 'always', grain: 'all', metric: 'x', reason: 'test', severity: 'warning' },
        ]);
    });
});

describe('findingMetrics', () => {
    it('should normalize single and listed metrics', () => {
        const [single] = derive('order_id', 'item_subtotal');
        expect(findingMetrics(single)).toEqual(['item_subtotal']);

        const [listed] = derive('member_id', 'order_total_amount', 'item_subtotal');
        expect(findingMetrics(listed)).toEqual(['order_total_amount', 'item_subtotal']);
    });
});
