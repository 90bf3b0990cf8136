// =============================================================================
// services/analytics.engine.ts — in-memory employee record set + analytics.
//
// One instance per process, built in index.ts and handed to createApp(). It
// owns the current record set and nothing else; the backing store stays the
// source of truth.
//
//   load()                 store → normalise → publish            (async)
//   listEmployees(q?)      current records, optional exact quadrant filter
//   averageSentiment()     ┐
//   quadrantDistribution() ├ pure reads of the current snapshot
//   sentimentByRole()      │
//   getAnalyticsSummary()  ┘ recomputed on every call, never cached
//   analyzeWithAI(q, ctx)  question + context → Gemini → AiResult
//
// Consistency:
//   - load() builds the next set off to the side and publishes it with one
//     reference assignment; every read works on whichever frozen array was
//     current when it started, so a reader never sees a half-built set.
//   - Concurrent load() calls share one in-flight promise; it is cleared
//     once it settles, so the next call starts a fresh load.
//   - Nothing here throws: store failures and AI failures come back as
//     tagged results.
// =============================================================================

import * as analytics from '../lib/analytics';
import { normalizeRow } from '../lib/normalize';
import { logger } from '../lib/logger';
import { withTimeout, TimeoutError } from '../lib/timeout';
import { errorMessage } from '../utils/errorMessage';
import { runAnalysis } from './ai.service';
import type { Logger } from '../lib/logger';
import type { FeedbackStore } from './feedback.store';
import type { TextGenerator } from '../lib/gemini';
import type {
    AiResult,
    AnalyticsSummary,
    EmployeeRecord,
    LoadResult,
    LoadSnapshot,
} from '../types';

export interface AnalyticsEngineOptions {
    store: FeedbackStore;
    generator?: TextGenerator | null;
    loadTimeoutMs?: number;
    aiTimeoutMs?: number;
    logger?: Logger;
    now?: () => Date;
}

const DEFAULT_LOAD_TIMEOUT_MS = 10_000;
const DEFAULT_AI_TIMEOUT_MS = 15_000;

const EMPTY: readonly EmployeeRecord[] = Object.freeze([]);

export function isLoadSuccess(result: LoadResult): boolean {
    return result.status === 'loaded';
}

export class AnalyticsEngine {
    private records: readonly EmployeeRecord[] = EMPTY;
    private inFlight: Promise<LoadResult> | null = null;
    private last: LoadSnapshot | null = null;

    private readonly store: FeedbackStore;
    private readonly generator: TextGenerator | null;
    private readonly loadTimeoutMs: number;
    private readonly aiTimeoutMs: number;
    private readonly log: Logger;
    private readonly now: () => Date;

    constructor(options: AnalyticsEngineOptions) {
        this.store         = options.store;
        this.generator     = options.generator ?? null;
        this.loadTimeoutMs = options.loadTimeoutMs ?? DEFAULT_LOAD_TIMEOUT_MS;
        this.aiTimeoutMs   = options.aiTimeoutMs ?? DEFAULT_AI_TIMEOUT_MS;
        this.log           = (options.logger ?? logger).child({ module: 'engine' });
        this.now           = options.now ?? (() => new Date());
    }

    // ─── Load ─────────────────────────────────────────────────────────────────

    /**
     * Replace the record set from the backing store.
     *
     * - store error / timeout → `failed`; the current set is left untouched
     * - zero rows             → `empty`; the current set is cleared
     * - rows                  → `loaded`; the current set is replaced
     *
     * Rows that are not objects are skipped with a warning and counted in
     * `skipped`; every other row is normalised with field fallbacks.
     */
    load(): Promise<LoadResult> {
        if (this.inFlight) return this.inFlight;

        this.inFlight = this.runLoad().finally(() => {
            this.inFlight = null;
        });
        return this.inFlight;
    }

    private async runLoad(): Promise<LoadResult> {
        let rows: unknown[];
        try {
            rows = await withTimeout(this.store.fetchAll(), this.loadTimeoutMs, 'Feedback query');
        } catch (err) {
            const result: LoadResult = err instanceof TimeoutError
                ? { status: 'failed', reason: 'timeout', detail: err.message }
                : { status: 'failed', reason: 'unreachable', detail: errorMessage(err) };
            this.log.error({ reason: result.reason, detail: result.detail }, 'Failed to load feedback records — keeping current set');
            return this.remember(result);
        }

        if (rows.length === 0) {
            this.records = EMPTY;
            this.log.warn('No rows in the feedback table — record set cleared');
            return this.remember({ status: 'empty' });
        }

        const next: EmployeeRecord[] = [];
        let skipped = 0;
        rows.forEach((row, ordinal) => {
            const normalized = normalizeRow(row, ordinal);
            if (normalized.ok) {
                next.push(normalized.record);
            } else {
                skipped += 1;
                this.log.warn({ ordinal: normalized.ordinal }, `Skipping row: ${normalized.error}`);
            }
        });

        this.records = Object.freeze(next);
        this.log.info({ count: next.length, skipped }, 'Loaded employee records');
        return this.remember({ status: 'loaded', count: next.length, skipped });
    }

    private remember(result: LoadResult): LoadResult {
        this.last = { ...result, at: this.now().toISOString() };
        return result;
    }

    /** Outcome of the most recent load, or null if none has run. */
    get lastLoad(): LoadSnapshot | null {
        return this.last;
    }

    // ─── Reads ────────────────────────────────────────────────────────────────

    get size(): number {
        return this.records.length;
    }

    /** Current records; with `quadrant`, exact case-sensitive matches only. */
    listEmployees(quadrant?: string): readonly EmployeeRecord[] {
        const snapshot = this.records;
        if (quadrant === undefined) return snapshot;
        return snapshot.filter((r) => r.quadrant === quadrant);
    }

    averageSentiment(): number {
        return analytics.averageSentiment(this.records);
    }

    quadrantDistribution(): Record<string, number> {
        return Object.fromEntries(analytics.quadrantDistribution(this.records));
    }

    sentimentByRole(): Record<string, number> {
        return Object.fromEntries(analytics.sentimentByRole(this.records));
    }

    getAnalyticsSummary(): AnalyticsSummary {
        return analytics.buildSummary(this.records);
    }

    // ─── AI ───────────────────────────────────────────────────────────────────

    get aiConfigured(): boolean {
        return this.generator !== null;
    }

    analyzeWithAI(query: string, context: string): Promise<AiResult> {
        return runAnalysis(this.generator, query, context, this.aiTimeoutMs);
    }
}
