// =============================================================================
// Unit tests — row normalisation (lib/normalize.ts)
//
// One test per fallback in the table, plus the coercions the TEXT-only
// import table makes necessary (numeric strings, blanks).
// =============================================================================

import { describe, it, expect } from 'vitest';
import {
    normalizeRow,
    toFiniteNumber,
    toInteger,
    toText,
    DEFAULT_SENTIMENT_SCORE,
} from './normalize';
import type { EmployeeRecord } from '../types';

function record(row: unknown, ordinal = 0): EmployeeRecord {
    const result = normalizeRow(row, ordinal);
    if (!result.ok) throw new Error(result.error);
    return result.record;
}

describe('normalizeRow — complete rows', () => {
    it('maps every column onto the record', () => {
        expect(record({
            employee_id: 17,
            employee_name: 'Dana Reyes',
            employee_role: 'Designer',
            positive_percentage: 82.5,
            full_analysis: 'Enjoys the team.',
            quadrant: 'Champion',
        })).toEqual({
            id: 17,
            employee_id: 17,
            employee_name: 'Dana Reyes',
            content: 'Enjoys the team.',
            role: 'Designer',
            sentiment_score: 82.5,
            quadrant: 'Champion',
        });
    });

    it('parses numeric strings from TEXT columns', () => {
        const r = record({ employee_id: '42', positive_percentage: ' 64.25 ' });
        expect(r.id).toBe(42);
        expect(r.employee_id).toBe(42);
        expect(r.sentiment_score).toBe(64.25);
        expect(r.quadrant).toBe('Concerned but active');
    });
});

describe('normalizeRow — fallbacks', () => {
    it('rejects hex, binary and octal literals as scores and ids', () => {
        const r = record({ positive_percentage: '0x50', employee_id: '0x1A' }, 7);
        expect(r.sentiment_score).toBe(DEFAULT_SENTIMENT_SCORE);
        expect(r.quadrant).toBe('Concerned but active');
        expect(r.employee_id).toBe(7);
    });

    it('falls back to the ordinal for ids beyond the safe integer range', () => {
        const a = record({ employee_id: '9007199254740993' }, 3);
        const b = record({ employee_id: '9007199254740992' }, 4);
        expect(a.employee_id).toBe(3);
        expect(b.employee_id).toBe(4);
        expect(a.id).not.toBe(b.id);
    });

    it('missing score and quadrant → 50.0 and Concerned but active', () => {
        const r = record({ employee_id: 1 });
        expect(r.sentiment_score).toBe(50.0);
        expect(r.quadrant).toBe('Concerned but active');
    });

    it('treats null, blank, junk, NaN and infinite scores as missing', () => {
        for (const value of [null, '', '   ', 'n/a', '0x50', '0b1', '0o7', Number.NaN, Number.POSITIVE_INFINITY, 'Infinity']) {
            expect(record({ positive_percentage: value }).sentiment_score).toBe(DEFAULT_SENTIMENT_SCORE);
        }
    });

    it('keeps out-of-range scores unchanged', () => {
        expect(record({ positive_percentage: 140 }).sentiment_score).toBe(140);
        expect(record({ positive_percentage: -5 }).quadrant).toBe('At Risk');
    });

    it('classifies from the score when quadrant is absent or blank', () => {
        expect(record({ positive_percentage: 75 }).quadrant).toBe('Champion');
        expect(record({ positive_percentage: 35, quadrant: '' }).quadrant).toBe('Potentially Isolated');
        expect(record({ positive_percentage: 10, quadrant: null }).quadrant).toBe('At Risk');
    });

    it('trusts a sourced quadrant even when it disagrees with the score', () => {
        expect(record({ positive_percentage: 95, quadrant: 'At Risk' }).quadrant).toBe('At Risk');
        expect(record({ positive_percentage: 95, quadrant: 'Wildcard' }).quadrant).toBe('Wildcard');
    });

    it('falls back to the row ordinal for missing or non-integer ids', () => {
        expect(record({}, 7).id).toBe(7);
        expect(record({ employee_id: null }, 3).employee_id).toBe(3);
        expect(record({ employee_id: 'E001' }, 4).employee_id).toBe(4);
        expect(record({ employee_id: '12.5' }, 5).employee_id).toBe(5);
    });

    it('generates a placeholder name from the ordinal', () => {
        expect(record({}, 9).employee_name).toBe('Employee 9');
        expect(record({ employee_name: '  ' }, 2).employee_name).toBe('Employee 2');
    });

    it('uses comment when full_analysis is absent, then an empty string', () => {
        expect(record({ comment: 'Short note' }).content).toBe('Short note');
        expect(record({ full_analysis: null, comment: 'Fallback note' }).content).toBe('Fallback note');
        expect(record({ full_analysis: 'Primary', comment: 'Ignored' }).content).toBe('Primary');
        expect(record({}).content).toBe('');
    });

    it('defaults role to Unknown', () => {
        expect(record({}).role).toBe('Unknown');
        expect(record({ employee_role: '' }).role).toBe('Unknown');
    });
});

describe('normalizeRow — rejected rows', () => {
    it('returns an error for rows that are not objects', () => {
        expect(normalizeRow(null, 0)).toEqual({ ok: false, ordinal: 0, error: 'row 0 is not an object' });
        expect(normalizeRow([1, 2], 1)).toEqual({ ok: false, ordinal: 1, error: 'row 1 is not an object' });
        expect(normalizeRow('text', 2).ok).toBe(false);
    });
});

describe('field coercion helpers', () => {
    it('toText', () => {
        expect(toText('abc')).toBe('abc');
        expect(toText(12)).toBe('12');
        expect(toText(BigInt(9))).toBe('9');
        expect(toText('')).toBeNull();
        expect(toText(undefined)).toBeNull();
        expect(toText({})).toBeNull();
    });

    it('toFiniteNumber', () => {
        expect(toFiniteNumber('3.5')).toBe(3.5);
        expect(toFiniteNumber(BigInt(8))).toBe(8);
        expect(toFiniteNumber('abc')).toBeNull();
        expect(toFiniteNumber('-1.5e2')).toBe(-150);
        expect(toFiniteNumber('.5')).toBe(0.5);
        expect(toFiniteNumber('0x50')).toBeNull();
        expect(toFiniteNumber(true)).toBeNull();
    });

    it('toInteger', () => {
        expect(toInteger('12')).toBe(12);
        expect(toInteger(12.0)).toBe(12);
        expect(toInteger(12.5)).toBeNull();
        expect(toInteger('0x1A')).toBeNull();
        expect(toInteger('9007199254740991')).toBe(Number.MAX_SAFE_INTEGER);
        expect(toInteger('9007199254740992')).toBeNull();
        expect(toInteger(BigInt('9007199254740993'))).toBeNull();
    });
});
