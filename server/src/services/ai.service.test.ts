// =============================================================================
// Unit tests — AI result extraction, rendering and answer cache
// (services/ai.service.ts)
// =============================================================================

import { describe, it, expect, vi } from 'vitest';
import {
    answerCacheKey,
    cachedAnalysis,
    describeAiResult,
    extractAnswer,
    NOT_CONFIGURED_MESSAGE,
    runAnalysis,
} from './ai.service';
import type { AnswerCache } from './ai.service';
import { FakeGenerator, textResponse } from '../test/fakes';
import type { AiResult } from '../types';

// ─── extractAnswer ────────────────────────────────────────────────────────────

describe('extractAnswer', () => {
    it('joins the text parts of the first candidate', () => {
        expect(extractAnswer(textResponse('  First part.', 'Second part.  '))).toEqual({
            ok: true,
            answer: 'First part.\nSecond part.',
            finishReason: 'STOP',
        });
    });

    it('ignores parts without text', () => {
        const result = extractAnswer({
            candidates: [{ finishReason: 'STOP', content: { parts: [{}, { text: 'Only this.' }] } }],
        });
        expect(result).toEqual({ ok: true, answer: 'Only this.', finishReason: 'STOP' });
    });

    it('reports NoCandidates for an empty candidate list', () => {
        expect(extractAnswer({ candidates: [] })).toEqual({
            ok: false,
            kind: 'NoCandidates',
            detail: 'service returned no candidates',
        });
        expect(extractAnswer({}).ok).toBe(false);
    });

    it('reports ContentFiltered when the prompt itself was blocked', () => {
        expect(extractAnswer({ promptFeedback: { blockReason: 'SAFETY' } })).toEqual({
            ok: false,
            kind: 'ContentFiltered',
            detail: 'prompt blocked, block_reason=SAFETY',
        });
    });

    it('reports ContentFiltered for a safety stop without text', () => {
        expect(extractAnswer({ candidates: [{ finishReason: 'SAFETY', content: { parts: [] } }] })).toEqual({
            ok: false,
            kind: 'ContentFiltered',
            detail: 'finish_reason=SAFETY',
        });
    });

    it('reports EmptyCandidate for other stops without text', () => {
        expect(extractAnswer({ candidates: [{ finishReason: 'MAX_TOKENS' }] })).toEqual({
            ok: false,
            kind: 'EmptyCandidate',
            detail: 'finish_reason=MAX_TOKENS',
        });
        expect(extractAnswer({ candidates: [{ content: { parts: [{ text: '   ' }] } }] })).toEqual({
            ok: false,
            kind: 'EmptyCandidate',
            detail: 'finish_reason=unknown',
        });
    });
});

// ─── runAnalysis ──────────────────────────────────────────────────────────────

describe('runAnalysis', () => {
    it('returns NotConfigured without a generator', async () => {
        const result = await runAnalysis(null, 'q', 'ctx', 1_000);
        expect(result).toEqual({ ok: false, kind: 'NotConfigured', detail: 'GEMINI_API_KEY is not set' });
    });

    it('maps a thrown SDK error to ServiceUnavailable', async () => {
        const generator = new FakeGenerator();
        generator.failWith = new Error('[GoogleGenerativeAI Error]: 503 Service Unavailable\nstack details');
        expect(await runAnalysis(generator, 'q', 'ctx', 1_000)).toEqual({
            ok: false,
            kind: 'ServiceUnavailable',
            detail: '[GoogleGenerativeAI Error]: 503 Service Unavailable',
        });
    });

    it('maps a slow generator to Timeout', async () => {
        const generator = new FakeGenerator();
        generator.hang = true;
        expect(await runAnalysis(generator, 'q', 'ctx', 10)).toEqual({
            ok: false,
            kind: 'Timeout',
            detail: 'Gemini request timed out after 10 ms',
        });
    });
});

// ─── describeAiResult ─────────────────────────────────────────────────────────

describe('describeAiResult', () => {
    it('returns the answer verbatim on success', () => {
        expect(describeAiResult({ ok: true, answer: 'All good.', finishReason: 'STOP' })).toBe('All good.');
    });

    it('renders a non-empty diagnostic for every failure kind', () => {
        const cases: Array<[AiResult, string]> = [
            [{ ok: false, kind: 'NotConfigured', detail: 'x' }, NOT_CONFIGURED_MESSAGE],
            [{ ok: false, kind: 'NoCandidates', detail: 'x' }, 'The AI service returned no candidates.'],
            [{ ok: false, kind: 'EmptyCandidate', detail: 'finish_reason=MAX_TOKENS' },
                'The AI service returned no usable text (finish_reason=MAX_TOKENS).'],
            [{ ok: false, kind: 'ContentFiltered', detail: 'prompt blocked, block_reason=SAFETY' },
                'The AI service withheld its answer (prompt blocked, block_reason=SAFETY).'],
            [{ ok: false, kind: 'Timeout', detail: 'Gemini request timed out after 10 ms' },
                'AI analysis timed out: Gemini request timed out after 10 ms'],
            [{ ok: false, kind: 'ServiceUnavailable', detail: 'quota exceeded' },
                'AI analysis failed: quota exceeded'],
        ];
        for (const [result, text] of cases) {
            expect(describeAiResult(result)).toBe(text);
        }
    });
});

// ─── Answer cache ─────────────────────────────────────────────────────────────

class MemoryCache implements AnswerCache {
    readonly entries = new Map<string, string>();
    readonly ttls = new Map<string, number>();

    async get(key: string): Promise<string | null> {
        return this.entries.get(key) ?? null;
    }

    async set(key: string, value: string, ttlSeconds: number): Promise<void> {
        this.entries.set(key, value);
        this.ttls.set(key, ttlSeconds);
    }
}

describe('answerCacheKey', () => {
    it('is namespaced and depends on both query and context', () => {
        const key = answerCacheKey('q', 'ctx');
        expect(key).toMatch(/^feedback:ai-answer:[0-9a-f]{64}$/);
        expect(answerCacheKey('q', 'ctx')).toBe(key);
        expect(answerCacheKey('q', 'other')).not.toBe(key);
        expect(answerCacheKey('qc', 'tx')).not.toBe(answerCacheKey('q', 'ctx'));
    });
});

describe('cachedAnalysis', () => {
    const ok: AiResult = { ok: true, answer: 'Cached answer.', finishReason: 'STOP' };

    it('calls the service every time without a cache', async () => {
        const analyze = vi.fn(async () => ok);
        await cachedAnalysis('q', 'ctx', 60, analyze, null);
        const second = await cachedAnalysis('q', 'ctx', 60, analyze, null);
        expect(analyze).toHaveBeenCalledTimes(2);
        expect(second).toEqual({ result: ok, cached: false });
    });

    it('stores a successful answer and serves it on the next call', async () => {
        const cache = new MemoryCache();
        const analyze = vi.fn(async () => ok);

        const first = await cachedAnalysis('q', 'ctx', 60, analyze, cache);
        const second = await cachedAnalysis('q', 'ctx', 60, analyze, cache);

        expect(first).toEqual({ result: ok, cached: false });
        expect(second).toEqual({ result: ok, cached: true });
        expect(analyze).toHaveBeenCalledTimes(1);
        expect(cache.ttls.get(answerCacheKey('q', 'ctx'))).toBe(60);
    });

    it('never caches a failed result', async () => {
        const cache = new MemoryCache();
        const failed: AiResult = { ok: false, kind: 'Timeout', detail: 'slow' };
        await cachedAnalysis('q', 'ctx', 60, async () => failed, cache);
        expect(cache.entries.size).toBe(0);
    });

    it('falls through to the service when the cache errors', async () => {
        const cache: AnswerCache = {
            get: async () => { throw new Error('connection lost'); },
            set: async () => { throw new Error('connection lost'); },
        };
        const result = await cachedAnalysis('q', 'ctx', 60, async () => ok, cache);
        expect(result).toEqual({ result: ok, cached: false });
    });

    it('ignores a malformed cache entry', async () => {
        const cache = new MemoryCache();
        cache.entries.set(answerCacheKey('q', 'ctx'), JSON.stringify({ unexpected: true }));
        const analyze = vi.fn(async () => ok);
        const result = await cachedAnalysis('q', 'ctx', 60, analyze, cache);
        expect(result.cached).toBe(false);
        expect(analyze).toHaveBeenCalledTimes(1);
    });
});
