// =============================================================================
// controllers/ai.controller.ts — HTTP layer for POST /api/analyze
//
//   Body: { query: string }
//
// The controller:
//   1. Validates the body with Zod
//   2. Refuses when no data is loaded (the context would be meaningless)
//   3. Builds the context block from a fresh summary
//   4. Calls the engine (through the Redis answer cache when configured)
//   5. Renders the tagged result:
//        ok                                   → 200 { analysis, outcome: 'ok' }
//        NoCandidates / EmptyCandidate /
//        ContentFiltered                      → 200 { analysis: <diagnostic>, outcome: <kind> }
//        NotConfigured                        → 503 AI_NOT_CONFIGURED
//        Timeout                              → 504 AI_TIMEOUT
//        ServiceUnavailable                   → 502 AI_UNAVAILABLE
//
// Degraded answers stay 200 because the model did respond; the dashboard shows
// the diagnostic in place of an answer. Infrastructure failures are errors.
// =============================================================================

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { z } from 'zod';
import { sendSuccess } from '../utils/response';
import { AppError } from '../middleware/errorHandler';
import { buildAnalysisContext } from '../lib/aiContext';
import { cachedAnalysis, describeAiResult } from '../services/ai.service';
import { assertDataReady } from './analytics.controller';
import type { AnalyticsEngine } from '../services/analytics.engine';
import type { AiErrorKind } from '../types';

const AnalyzeBody = z.object({
    query: z.string().trim().min(1, 'query must not be empty').max(2_000),
});

const ERROR_STATUS: Partial<Record<AiErrorKind, { status: number; code: string }>> = {
    NotConfigured:      { status: 503, code: 'AI_NOT_CONFIGURED' },
    Timeout:            { status: 504, code: 'AI_TIMEOUT' },
    ServiceUnavailable: { status: 502, code: 'AI_UNAVAILABLE' },
};

export interface AiHandlerOptions {
    cacheTtlSeconds: number;
}

export function createAnalyzeHandler(engine: AnalyticsEngine, options: AiHandlerOptions): RequestHandler {
    async function analyze(req: Request, res: Response, next: NextFunction): Promise<void> {
        try {
            const { query } = AnalyzeBody.parse(req.body);
            assertDataReady(engine);

            const context = buildAnalysisContext(engine.getAnalyticsSummary());
            const { result, cached } = await cachedAnalysis(
                query,
                context,
                options.cacheTtlSeconds,
                () => engine.analyzeWithAI(query, context),
            );

            if (!result.ok) {
                const mapped = ERROR_STATUS[result.kind];
                if (mapped) {
                    throw new AppError(mapped.status, mapped.code, describeAiResult(result));
                }
            }

            sendSuccess(res, {
                analysis: describeAiResult(result),
                outcome: result.ok ? 'ok' : result.kind,
                cached,
            });
        } catch (err) {
            next(err);
        }
    }

    return (req, res, next) => void analyze(req, res, next);
}
