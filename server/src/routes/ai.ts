// =============================================================================
// AI routes — POST /api/analyze
//
// Rate-limited per IP: each request can turn into a Gemini call.
// =============================================================================

import { Router } from 'express';
import { aiRateLimiter } from '../middleware/rateLimiter';
import { createAnalyzeHandler } from '../controllers/ai.controller';
import type { AnalyticsEngine } from '../services/analytics.engine';
import type { AppConfig } from '../config';

export function createAiRouter(engine: AnalyticsEngine, config: AppConfig): Router {
    const router = Router();

    router.post('/analyze',
        aiRateLimiter({ max: config.rateLimit.aiMax, windowMs: config.rateLimit.aiWindowMs }),
        createAnalyzeHandler(engine, { cacheTtlSeconds: config.aiCacheTtlSeconds }),
    );

    return router;
}
