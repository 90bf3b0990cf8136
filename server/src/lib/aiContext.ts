// =============================================================================
// lib/aiContext.ts — prompt assembly for the AI analysis path.
//
// The context block is built from a freshly computed summary by the HTTP layer;
// the engine only wraps it with the question. Keeping both here means the exact
// text Gemini sees can be asserted in tests.
// =============================================================================

import type { AnalyticsSummary } from '../types';

export function formatOneDecimal(value: number): string {
    return value.toFixed(1);
}

/**
 * Fixed-format text block:
 *
 *   Total Employees: 3
 *   Average Sentiment: 46.7%
 *   Quadrant Distribution: Champion: 1, At Risk: 2
 *   Sentiment by Role: Engineer: 80.0%, Sales: 30.0%
 */
export function buildAnalysisContext(summary: AnalyticsSummary): string {
    const quadrantInfo = Object.entries(summary.quadrant_distribution)
        .map(([label, count]) => `${label}: ${count}`)
        .join(', ');

    const roleInfo = Object.entries(summary.sentiment_by_role)
        .map(([role, mean]) => `${role}: ${formatOneDecimal(mean)}%`)
        .join(', ');

    return [
        `Total Employees: ${summary.total_employees}`,
        `Average Sentiment: ${formatOneDecimal(summary.average_sentiment)}%`,
        `Quadrant Distribution: ${quadrantInfo}`,
        `Sentiment by Role: ${roleInfo}`,
    ].join('\n');
}

export function buildAnalysisPrompt(query: string, context: string): string {
    return `Context:\n${context}\n\nQuestion: ${query}\n\nProvide a detailed analysis.`;
}
