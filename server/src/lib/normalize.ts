// =============================================================================
// lib/normalize.ts — untyped store row → EmployeeRecord.
//
// The backing table is loosely typed (the CSV importer creates every column
// as TEXT), so every field is coerced here and nowhere else.
//
// Fallback table:
//   id / employee_id  ← employee_id          else row ordinal
//   employee_name     ← employee_name        else "Employee <ordinal>"
//   content           ← full_analysis        else comment, else ""
//   role              ← employee_role        else "Unknown"
//   sentiment_score   ← positive_percentage  else 50 (also for NaN / ±Infinity / junk)
//   quadrant          ← quadrant             else classify(sentiment_score)
//
// "Absent" means missing, null, or a blank string. A sourced quadrant is kept
// verbatim; scores are never clamped.
//
// The only row that cannot be normalised is one that is not an object at all;
// that comes back as { ok: false } and the caller decides what to do with it.
// =============================================================================

import { classify } from './quadrant';
import type { EmployeeRecord } from '../types';

export const DEFAULT_SENTIMENT_SCORE = 50.0;
export const DEFAULT_ROLE = 'Unknown';

export type NormalizeResult =
    | { ok: true; record: EmployeeRecord }
    | { ok: false; ordinal: number; error: string };

type Row = Record<string, unknown>;

function isRow(value: unknown): value is Row {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ─── Field coercion ───────────────────────────────────────────────────────────

/** Non-blank text, or null. Numbers and bigints (pg int8) are stringified. */
export function toText(value: unknown): string | null {
    if (typeof value === 'string') {
        return value.trim() === '' ? null : value;
    }
    if (typeof value === 'number' || typeof value === 'bigint' || typeof value === 'boolean') {
        return String(value);
    }
    return null;
}

// Plain decimal text only: "0x50", "0b1" and "Infinity" are not scores.
const DECIMAL_NUMBER = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

/** A finite number, or null. Accepts decimal numeric strings ("72.5"). */
export function toFiniteNumber(value: unknown): number | null {
    let n: number;
    if (typeof value === 'number') {
        n = value;
    } else if (typeof value === 'bigint') {
        n = Number(value);
    } else if (typeof value === 'string' && DECIMAL_NUMBER.test(value.trim())) {
        n = Number(value.trim());
    } else {
        return null;
    }
    return Number.isFinite(n) ? n : null;
}

/**
 * A safe integer, or null. "12" and 12.0 are accepted; "12.5", "E001" and
 * anything beyond 2^53 - 1 (which would round onto a neighbouring id) are not.
 */
export function toInteger(value: unknown): number | null {
    const n = toFiniteNumber(value);
    return n !== null && Number.isSafeInteger(n) ? n : null;
}

// ─── Row normalisation ────────────────────────────────────────────────────────

export function normalizeRow(row: unknown, ordinal: number): NormalizeResult {
    if (!isRow(row)) {
        return { ok: false, ordinal, error: `row ${ordinal} is not an object` };
    }

    const employeeId = toInteger(row.employee_id) ?? ordinal;
    const score      = toFiniteNumber(row.positive_percentage) ?? DEFAULT_SENTIMENT_SCORE;

    return {
        ok: true,
        record: {
            id:              employeeId,
            employee_id:     employeeId,
            employee_name:   toText(row.employee_name) ?? `Employee ${ordinal}`,
            content:         toText(row.full_analysis) ?? toText(row.comment) ?? '',
            role:            toText(row.employee_role) ?? DEFAULT_ROLE,
            sentiment_score: score,
            quadrant:        toText(row.quadrant) ?? classify(score),
        },
    };
}
