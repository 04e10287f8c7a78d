import { findingMetrics } from '../semantic/blacklist';
import type { AnalysisDefinition, BlacklistFinding, Grain, GuardDecision } from '../semantic/types';

// Finest grain first: when a dataset carries several markers, rows are at the finest one
const ROW_GRAIN_PRECEDENCE: readonly Grain[] = ['item', 'order', 'member'];

export interface MetricRequest {
    metric: string;
    grains: ReadonlyArray<Grain | 'all'>;
}

export class SafetyPlanner {
    /**
     * The grain one row of the dataset represents, or undefined when no marker
     * was detected.
     */
    static resolveRowGrain(grains: ReadonlySet<Grain>): Grain | undefined {
        return ROW_GRAIN_PRECEDENCE.find(g => grains.has(g));
    }

    /**
     * Decides whether a metric may be computed at the requested grains.
     * A finding applies when its grain is one of the requested grains (or `all`)
     * and it names the metric. Any applicable `block` finding rejects the request.
     */
    static evaluate(findings: readonly BlacklistFinding[], request: MetricRequest): GuardDecision {
        const applicable = findings.filter(f =>
            (f.grain === 'all' || request.grains.includes(f.grain)) &&
            findingMetrics(f).includes(request.metric)
        );

        const blocking = applicable.filter(f => f.severity === 'block');
        const warnings = applicable.filter(f => f.severity === 'warning');

        return { allowed: blocking.length === 0, blocking, warnings };
    }

    /**
     * Evaluates a catalogued analysis: its metric is summed over dataset rows
     * (row grain) and reported at the analysis' own grain, so both are checked.
     */
    static planAnalysis(
        analysis: AnalysisDefinition,
        detectedGrains: ReadonlySet<Grain>,
        findings: readonly BlacklistFinding[]
    ): GuardDecision {
        const grains = new Set<Grain | 'all'>(['all', analysis.report_grain]);
        const rowGrain = SafetyPlanner.resolveRowGrain(detectedGrains);
        if (rowGrain) grains.add(rowGrain);

        const decision = SafetyPlanner.evaluate(findings, { metric: analysis.metric, grains: [...grains] });

        if (!decision.allowed) {
            console.warn(`[SafetyPlanner] Rejected ${analysis.key}:`, decision.blocking.map(f => f.rule));
        }

        return decision;
    }
}
