// =============================================================================
// lib/format.ts — display helpers shared by the dashboard pages and charts.
//
// Pure functions only, so they are unit-tested without a DOM.
// =============================================================================

import { QUADRANTS } from '../api/analytics';

// ─── Numbers ──────────────────────────────────────────────────────────────────

/** 46.666 → "46.7%" */
export function formatPercent(value: number, digits = 1): string {
    return `${value.toFixed(digits)}%`;
}

export const HEALTHY_SENTIMENT_ABOVE = 60;

export function sentimentHint(average: number): 'Healthy' | 'Needs attention' {
    return average > HEALTHY_SENTIMENT_ABOVE ? 'Healthy' : 'Needs attention';
}

// ─── Colours ──────────────────────────────────────────────────────────────────

const QUADRANT_COLORS = new Map<string, string>([
    ['Champion',             '#28a745'],
    ['Concerned but active', '#ffc107'],
    ['Potentially Isolated', '#fd7e14'],
    ['At Risk',              '#dc3545'],
]);

// Sourced quadrant labels can fall outside the four categories.
const OTHER_QUADRANT_COLOR = '#64748b';

export function quadrantColor(label: string): string {
    return QUADRANT_COLORS.get(label) ?? OTHER_QUADRANT_COLOR;
}

/** Bar colour for a role mean: green above 70, amber above 50, red otherwise. */
export function roleBarColor(score: number): string {
    if (score > 70) return '#28a745';
    if (score > 50) return '#ffc107';
    return '#dc3545';
}

// ─── Chart data ───────────────────────────────────────────────────────────────

export interface QuadrantDatum {
    name: string;
    value: number;
    color: string;
}

/** Known categories in threshold order first, then any other labels as received. */
export function quadrantChartData(distribution: Record<string, number>): QuadrantDatum[] {
    const known: string[] = QUADRANTS.filter((q) => q in distribution);
    const other = Object.keys(distribution).filter((q) => !known.includes(q));
    return [...known, ...other].map((name) => ({
        name,
        value: distribution[name] ?? 0,
        color: quadrantColor(name),
    }));
}

export interface RoleDatum {
    role: string;
    score: number;
    label: string;
    color: string;
}

/** Roles sorted by mean score, highest first; ties keep server order. */
export function roleChartData(byRole: Record<string, number>): RoleDatum[] {
    return Object.entries(byRole)
        .map(([role, score]) => ({ role, score, label: formatPercent(score), color: roleBarColor(score) }))
        .sort((a, b) => b.score - a.score);
}

export function countFor(distribution: Record<string, number>, label: string): number {
    return distribution[label] ?? 0;
}
