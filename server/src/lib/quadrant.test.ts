// =============================================================================
// Unit tests — engagement classification (lib/quadrant.ts)
//
// Thresholds are inclusive lower bounds checked highest first:
//   ≥ 70 Champion | ≥ 50 Concerned but active | ≥ 30 Potentially Isolated | At Risk
// =============================================================================

import { describe, it, expect } from 'vitest';
import { classify } from './quadrant';
import { QUADRANTS } from '../types';

describe('classify', () => {
    it('returns Champion for score >= 70', () => {
        expect(classify(70)).toBe('Champion');
        expect(classify(85.5)).toBe('Champion');
        expect(classify(100)).toBe('Champion');
    });

    it('returns Concerned but active for score in [50, 70)', () => {
        expect(classify(50)).toBe('Concerned but active');
        expect(classify(62)).toBe('Concerned but active');
        expect(classify(69.999)).toBe('Concerned but active');
    });

    it('returns Potentially Isolated for score in [30, 50)', () => {
        expect(classify(30)).toBe('Potentially Isolated');
        expect(classify(49.9)).toBe('Potentially Isolated');
    });

    it('returns At Risk for score < 30', () => {
        expect(classify(29.999)).toBe('At Risk');
        expect(classify(0)).toBe('At Risk');
    });

    it('boundaries are lower-bound inclusive', () => {
        expect(classify(30)).toBe('Potentially Isolated');
        expect(classify(50)).toBe('Concerned but active');
        expect(classify(70)).toBe('Champion');
    });

    it('accepts out-of-range scores without clamping', () => {
        expect(classify(250)).toBe('Champion');
        expect(classify(-12)).toBe('At Risk');
        expect(classify(Number.NEGATIVE_INFINITY)).toBe('At Risk');
        expect(classify(Number.POSITIVE_INFINITY)).toBe('Champion');
    });

    it('maps NaN to At Risk', () => {
        expect(classify(Number.NaN)).toBe('At Risk');
    });

    it('always returns one of the four labels', () => {
        for (let s = -20; s <= 120; s += 0.5) {
            expect(QUADRANTS).toContain(classify(s));
        }
    });
});
