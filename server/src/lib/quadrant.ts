// =============================================================================
// lib/quadrant.ts — score → engagement category.
//
// Pure and total: defined for every number, including negatives and values
// above 100. Thresholds are inclusive lower bounds, checked highest first.
//
//   Champion ≥ 70 | Concerned but active ≥ 50 | Potentially Isolated ≥ 30 | At Risk
//
// NaN fails every comparison and lands in At Risk. Normalisation replaces NaN
// scores with the default before they ever reach this function.
// =============================================================================

import type { Quadrant } from '../types';

export const CHAMPION_MIN  = 70;
export const CONCERNED_MIN = 50;
export const ISOLATED_MIN  = 30;

export function classify(score: number): Quadrant {
    if (score >= CHAMPION_MIN)  return 'Champion';
    if (score >= CONCERNED_MIN) return 'Concerned but active';
    if (score >= ISOLATED_MIN)  return 'Potentially Isolated';
    return 'At Risk';
}
