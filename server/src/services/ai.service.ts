// =============================================================================
// services/ai.service.ts — question + context → Gemini → tagged result.
//
//   runAnalysis(generator, query, context, timeoutMs)
//     → { ok: true, answer } or { ok: false, kind, detail }. Never throws.
//
//   describeAiResult(result)
//     → one non-empty string for any result, for callers that only want text.
//
//   cachedAnalysis(...)
//     → runAnalysis behind a cache-aside; Redis when REDIS_URL is configured.
//
// DESIGN PRINCIPLE:
//   Gemini adds LANGUAGE to numbers the engine already computed. It never
//   sees raw records, only the summary context, and its answer is returned
//   verbatim — no parsing, no post-processing beyond trimming.
// =============================================================================

import { createHash } from 'crypto';
import { buildAnalysisPrompt } from '../lib/aiContext';
import { logger } from '../lib/logger';
import { withTimeout, TimeoutError } from '../lib/timeout';
import { getRedis, cacheKey, AI_ANSWER_NS } from '../lib/redis';
import { errorMessage } from '../utils/errorMessage';
import type { GenerationResponse, TextGenerator } from '../lib/gemini';
import type { AiErrorKind, AiResult } from '../types';

const log = logger.child({ module: 'ai' });

// Finish reasons that mean the model withheld its output.
const FILTERED_FINISH_REASONS = new Set([
    'SAFETY',
    'BLOCKLIST',
    'PROHIBITED_CONTENT',
    'SPII',
    'RECITATION',
]);

export const NOT_CONFIGURED_MESSAGE =
    'AI analysis is not available: no text-generation client is configured.';

// =============================================================================
// § 1 — Response extraction
// =============================================================================

/** First candidate's text parts joined by newlines, or a result kind. */
export function extractAnswer(response: GenerationResponse): AiResult {
    const candidates = response.candidates ?? [];

    if (candidates.length === 0) {
        const blockReason = response.promptFeedback?.blockReason;
        if (blockReason) {
            return { ok: false, kind: 'ContentFiltered', detail: `prompt blocked, block_reason=${blockReason}` };
        }
        return { ok: false, kind: 'NoCandidates', detail: 'service returned no candidates' };
    }

    const [first] = candidates;
    const finishReason = first.finishReason ?? 'unknown';
    log.debug({ finishReason }, 'Gemini finish reason');

    const text = (first.content?.parts ?? [])
        .map((p) => p.text)
        .filter((t): t is string => typeof t === 'string')
        .join('\n')
        .trim();

    if (text.length > 0) {
        return { ok: true, answer: text, finishReason };
    }

    const kind: AiErrorKind = FILTERED_FINISH_REASONS.has(finishReason) ? 'ContentFiltered' : 'EmptyCandidate';
    return { ok: false, kind, detail: `finish_reason=${finishReason}` };
}

// =============================================================================
// § 2 — runAnalysis
// =============================================================================

export async function runAnalysis(
    generator: TextGenerator | null,
    query: string,
    context: string,
    timeoutMs: number,
): Promise<AiResult> {
    if (!generator) {
        return { ok: false, kind: 'NotConfigured', detail: 'GEMINI_API_KEY is not set' };
    }

    const prompt = buildAnalysisPrompt(query, context);

    try {
        const response = await withTimeout(generator.generate(prompt), timeoutMs, 'Gemini request');
        const result = extractAnswer(response);
        if (!result.ok) {
            log.warn({ kind: result.kind, detail: result.detail }, 'AI analysis degraded');
        }
        return result;
    } catch (err) {
        if (err instanceof TimeoutError) {
            log.error({ timeoutMs }, 'AI analysis timed out');
            return { ok: false, kind: 'Timeout', detail: err.message };
        }
        log.error({ err: errorMessage(err) }, 'AI analysis failed');
        return { ok: false, kind: 'ServiceUnavailable', detail: errorMessage(err) };
    }
}

// =============================================================================
// § 3 — Rendering
// =============================================================================

export function describeAiResult(result: AiResult): string {
    if (result.ok) return result.answer;

    switch (result.kind) {
        case 'NotConfigured':
            return NOT_CONFIGURED_MESSAGE;
        case 'NoCandidates':
            return 'The AI service returned no candidates.';
        case 'EmptyCandidate':
            return `The AI service returned no usable text (${result.detail}).`;
        case 'ContentFiltered':
            return `The AI service withheld its answer (${result.detail}).`;
        case 'Timeout':
            return `AI analysis timed out: ${result.detail}`;
        case 'ServiceUnavailable':
            return `AI analysis failed: ${result.detail}`;
    }
}

// =============================================================================
// § 4 — Answer cache
// =============================================================================

export function answerCacheKey(query: string, context: string): string {
    const digest = createHash('sha256').update(query).update('\u0000').update(context).digest('hex');
    return cacheKey(AI_ANSWER_NS, digest);
}

interface CachedAnswer {
    answer: string;
    finishReason: string;
}

function isCachedAnswer(value: unknown): value is CachedAnswer {
    return typeof value === 'object' && value !== null
        && 'answer' in value && typeof value.answer === 'string'
        && 'finishReason' in value && typeof value.finishReason === 'string';
}

/** Key/value store the answer cache writes through. Redis in production. */
export interface AnswerCache {
    get(key: string): Promise<string | null>;
    set(key: string, value: string, ttlSeconds: number): Promise<void>;
}

/** The shared Redis connection as an AnswerCache, or null when Redis is off. */
export function redisAnswerCache(): AnswerCache | null {
    const redis = getRedis();
    if (!redis) return null;
    return {
        get: (key) => redis.get(key),
        set: async (key, value, ttlSeconds) => {
            await redis.set(key, value, 'EX', ttlSeconds);
        },
    };
}

export interface CachedAiResult {
    result: AiResult;
    cached: boolean;
}

/**
 * Cache-aside around `analyze`:
 *   1. cache GET — hit → return the stored answer
 *   2. miss → analyze(); only successful answers are written back
 *   3. no cache, or cache errors → analyze() every time
 */
export async function cachedAnalysis(
    query: string,
    context: string,
    ttlSeconds: number,
    analyze: () => Promise<AiResult>,
    cache: AnswerCache | null = redisAnswerCache(),
): Promise<CachedAiResult> {
    const key = answerCacheKey(query, context);

    if (cache) {
        try {
            const raw = await cache.get(key);
            if (raw) {
                const parsed: unknown = JSON.parse(raw);
                if (isCachedAnswer(parsed)) {
                    return { result: { ok: true, ...parsed }, cached: true };
                }
            }
        } catch (err) {
            log.warn({ err: errorMessage(err) }, 'Cache GET failed — calling the AI service');
        }
    }

    const result = await analyze();

    if (cache && result.ok) {
        const entry: CachedAnswer = { answer: result.answer, finishReason: result.finishReason };
        try {
            await cache.set(key, JSON.stringify(entry), ttlSeconds);
        } catch (err) {
            log.warn({ err: errorMessage(err) }, 'Cache SET failed');
        }
    }

    return { result, cached: false };
}
