// =============================================================================
// Health check route
//
// GET /health — liveness only. Data readiness lives at GET /api/status.
// =============================================================================

import { Router } from 'express';
import type { Request, Response } from 'express';
import { sendSuccess } from '../utils/response';

const router = Router();

router.get('/', (_req: Request, res: Response) => {
    sendSuccess(res, {
        status: 'ok',
        environment: process.env.NODE_ENV ?? 'unknown',
        timestamp: new Date().toISOString(),
    });
});

export default router;
