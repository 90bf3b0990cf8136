// api/analytics.ts — typed wrappers for the analytics routes.
//
// Types mirror server/src/types/index.ts; keys stay snake_case on the wire.

import { getData, postData } from './client';

// ─── Types ────────────────────────────────────────────────────────────────────

export const QUADRANTS = [
    'Champion',
    'Concerned but active',
    'Potentially Isolated',
    'At Risk',
] as const;

export type Quadrant = typeof QUADRANTS[number];

export interface EmployeeRecord {
    id: number;
    employee_id: number;
    employee_name: string;
    content: string;
    role: string;
    sentiment_score: number;
    quadrant: string;
}

export interface AnalyticsSummary {
    total_employees: number;
    average_sentiment: number;
    quadrant_distribution: Record<string, number>;
    sentiment_by_role: Record<string, number>;
}

export type LoadSnapshot =
    | { status: 'loaded'; count: number; skipped: number; at: string }
    | { status: 'empty'; at: string }
    | { status: 'failed'; reason: 'unreachable' | 'timeout'; detail: string; at: string };

export interface ApiStatus {
    status: 'online';
    data_loaded: boolean;
    total_employees: number;
    ai_configured: boolean;
    last_load: LoadSnapshot | null;
}

export interface ReloadResult {
    status: 'success';
    message: string;
    total_employees: number;
    skipped: number;
}

export type AnalysisOutcome = 'ok' | 'NoCandidates' | 'EmptyCandidate' | 'ContentFiltered';

export interface AnalysisResult {
    analysis: string;
    outcome: AnalysisOutcome;
    cached: boolean;
}

// ─── Calls ────────────────────────────────────────────────────────────────────

export function fetchStatus(): Promise<ApiStatus> {
    return getData<ApiStatus>('/status');
}

export function fetchSummary(): Promise<AnalyticsSummary> {
    return getData<AnalyticsSummary>('/summary');
}

/** Without a quadrant: every record. With one: exact, case-sensitive match. */
export function fetchEmployees(quadrant?: string): Promise<EmployeeRecord[]> {
    return getData<EmployeeRecord[]>('/employees', quadrant ? { quadrant } : undefined);
}

export function reloadData(): Promise<ReloadResult> {
    return postData<ReloadResult>('/reload-data');
}

export function analyze(query: string): Promise<AnalysisResult> {
    return postData<AnalysisResult>('/analyze', { query });
}
