// =============================================================================
// lib/analytics.ts — aggregation over a record set.
//
// Single-pass sums and counts, no I/O, no mutation. The engine calls these
// against its current snapshot; tests call them directly.
//
// Both group-by maps only contain keys that occur in the data, in the order
// they were first seen. Note that JavaScript objects list integer-like keys
// ("2024") before all others, so a role literally named with digits would be
// reordered once the Map is turned into a plain object.
// =============================================================================

import type { AnalyticsSummary, EmployeeRecord } from '../types';

/** Arithmetic mean of all scores; 0 for an empty set. */
export function averageSentiment(records: readonly EmployeeRecord[]): number {
    if (records.length === 0) return 0;
    let total = 0;
    for (const r of records) total += r.sentiment_score;
    return total / records.length;
}

/** Record count per distinct quadrant value. */
export function quadrantDistribution(records: readonly EmployeeRecord[]): Map<string, number> {
    const counts = new Map<string, number>();
    for (const r of records) {
        counts.set(r.quadrant, (counts.get(r.quadrant) ?? 0) + 1);
    }
    return counts;
}

/** Mean score per role. A role key exists only with count ≥ 1. */
export function sentimentByRole(records: readonly EmployeeRecord[]): Map<string, number> {
    const totals = new Map<string, { sum: number; count: number }>();
    for (const r of records) {
        const t = totals.get(r.role);
        if (t) {
            t.sum += r.sentiment_score;
            t.count += 1;
        } else {
            totals.set(r.role, { sum: r.sentiment_score, count: 1 });
        }
    }

    const means = new Map<string, number>();
    for (const [role, { sum, count }] of totals) {
        means.set(role, sum / count);
    }
    return means;
}

export function buildSummary(records: readonly EmployeeRecord[]): AnalyticsSummary {
    return {
        total_employees:       records.length,
        average_sentiment:     averageSentiment(records),
        quadrant_distribution: Object.fromEntries(quadrantDistribution(records)),
        sentiment_by_role:     Object.fromEntries(sentimentByRole(records)),
    };
}
