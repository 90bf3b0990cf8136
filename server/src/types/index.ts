// =============================================================================
// Shared TypeScript types — used across the engine, controllers and routes.
//
// EmployeeRecord and AnalyticsSummary are wire contracts: the dashboard and
// any other consumer read these exact snake_case keys, so they are declared
// here once and serialised as-is.
// =============================================================================

// ─── Standard API Response ───────────────────────────────────────────────────
// Every route answers with one of these two envelopes (utils/response.ts).
export interface ApiSuccess<T = unknown> {
    success: true;
    data: T;
}

export interface ApiError {
    success: false;
    error: string;       // machine-readable error code e.g. "NO_DATA"
    message: string;     // human-readable explanation
    statusCode: number;
}

// ─── Quadrant ────────────────────────────────────────────────────────────────
// The four engagement categories, in threshold order (highest first).
export const QUADRANTS = [
    'Champion',
    'Concerned but active',
    'Potentially Isolated',
    'At Risk',
] as const;

export type Quadrant = typeof QUADRANTS[number];

// ─── Employee record ─────────────────────────────────────────────────────────
// One feedback row per employee observation, after normalisation.
// `quadrant` is typed as string, not Quadrant: a value sourced from storage is
// trusted as-is and may fall outside the four labels.
export interface EmployeeRecord {
    id: number;
    employee_id: number;
    employee_name: string;
    content: string;
    role: string;
    sentiment_score: number;
    quadrant: string;
}

// ─── Summary view ────────────────────────────────────────────────────────────
// Derived on every request; key order of both maps is first-seen order.
export interface AnalyticsSummary {
    total_employees: number;
    average_sentiment: number;
    quadrant_distribution: Record<string, number>;
    sentiment_by_role: Record<string, number>;
}

// ─── Load outcome ────────────────────────────────────────────────────────────
export type LoadFailureReason = 'unreachable' | 'timeout';

export type LoadResult =
    | { status: 'loaded'; count: number; skipped: number }
    | { status: 'empty' }
    | { status: 'failed'; reason: LoadFailureReason; detail: string };

export type LoadSnapshot = LoadResult & { at: string };

// ─── AI outcome ──────────────────────────────────────────────────────────────
export type AiErrorKind =
    | 'NotConfigured'
    | 'ServiceUnavailable'
    | 'NoCandidates'
    | 'EmptyCandidate'
    | 'ContentFiltered'
    | 'Timeout';

export type AiResult =
    | { ok: true; answer: string; finishReason: string }
    | { ok: false; kind: AiErrorKind; detail: string };
