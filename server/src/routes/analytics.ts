// =============================================================================
// Analytics routes — /api/status, /api/summary, /api/employees, /api/reload-data
//
// All public: the dashboard is an internal tool with no login.
// =============================================================================

import { Router } from 'express';
import { createAnalyticsHandlers } from '../controllers/analytics.controller';
import type { AnalyticsEngine } from '../services/analytics.engine';

export function createAnalyticsRouter(engine: AnalyticsEngine): Router {
    const router = Router();
    const handlers = createAnalyticsHandlers(engine);

    // ── GET /api/status ───────────────────────────────────────────────────────
    router.get('/status', handlers.status);

    // ── GET /api/summary ──────────────────────────────────────────────────────
    // Fresh aggregates on every request — never cached.
    router.get('/summary', handlers.summary);

    // ── GET /api/employees?quadrant=At%20Risk ─────────────────────────────────
    router.get('/employees', handlers.employees);

    // ── POST /api/reload-data ─────────────────────────────────────────────────
    // Replaces the whole in-memory record set from the database.
    router.post('/reload-data', handlers.reload);

    return router;
}
