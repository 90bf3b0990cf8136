// =============================================================================
// controllers/analytics.controller.ts — HTTP layer over the analytics engine.
//
//   GET  /api/status        — liveness + whether data is loaded
//   GET  /api/summary       — AnalyticsSummary
//   GET  /api/employees     — record list, optional ?quadrant= exact filter
//   POST /api/reload-data   — re-run load() against the backing store
//
// Responsibility boundary:
//   - Validate query/body with Zod
//   - Call the engine
//   - Turn "no data" into an explicit not-ready error, distinct for an empty
//     table (404 NO_DATA) and an unreachable store (503 STORE_UNAVAILABLE)
//   - Forward errors to the global errorHandler via next(err)
// =============================================================================

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { z } from 'zod';
import { sendSuccess } from '../utils/response';
import { AppError } from '../middleware/errorHandler';
import type { AnalyticsEngine } from '../services/analytics.engine';

// `?quadrant=` with no value means no filter.
const EmployeesQuery = z.object({
    quadrant: z.string().optional(),
});

/**
 * Throws the not-ready error when the engine holds no records.
 * A failed load that left an earlier set in place still counts as ready.
 */
export function assertDataReady(engine: AnalyticsEngine): void {
    if (engine.size > 0) return;

    const last = engine.lastLoad;
    if (last?.status === 'failed') {
        throw new AppError(
            503,
            'STORE_UNAVAILABLE',
            `No data loaded: the feedback store could not be read (${last.reason}). Please check the database connection.`,
        );
    }
    throw new AppError(404, 'NO_DATA', 'No data loaded. The feedback table returned no rows.');
}

export interface AnalyticsHandlers {
    status: RequestHandler;
    summary: RequestHandler;
    employees: RequestHandler;
    reload: RequestHandler;
}

export function createAnalyticsHandlers(engine: AnalyticsEngine): AnalyticsHandlers {
    // ─── GET /api/status ──────────────────────────────────────────────────────
    function status(_req: Request, res: Response): void {
        sendSuccess(res, {
            status: 'online',
            data_loaded: engine.size > 0,
            total_employees: engine.size,
            ai_configured: engine.aiConfigured,
            last_load: engine.lastLoad,
        });
    }

    // ─── GET /api/summary ─────────────────────────────────────────────────────
    function summary(_req: Request, res: Response, next: NextFunction): void {
        try {
            assertDataReady(engine);
            sendSuccess(res, engine.getAnalyticsSummary());
        } catch (err) {
            next(err);
        }
    }

    // ─── GET /api/employees?quadrant= ─────────────────────────────────────────
    function employees(req: Request, res: Response, next: NextFunction): void {
        try {
            const { quadrant } = EmployeesQuery.parse(req.query);
            assertDataReady(engine);
            sendSuccess(res, engine.listEmployees(quadrant || undefined));
        } catch (err) {
            next(err);
        }
    }

    // ─── POST /api/reload-data ────────────────────────────────────────────────
    async function reload(_req: Request, res: Response, next: NextFunction): Promise<void> {
        try {
            const result = await engine.load();

            switch (result.status) {
                case 'loaded':
                    sendSuccess(res, {
                        status: 'success',
                        message: `Successfully reloaded ${result.count} records.`,
                        total_employees: result.count,
                        skipped: result.skipped,
                    });
                    return;
                case 'empty':
                    throw new AppError(404, 'NO_DATA', 'Reload executed, but the feedback table returned no rows.');
                case 'failed':
                    if (result.reason === 'timeout') {
                        throw new AppError(504, 'STORE_TIMEOUT', `Reload failed: ${result.detail}`);
                    }
                    throw new AppError(503, 'STORE_UNAVAILABLE', `Reload failed: ${result.detail}`);
            }
        } catch (err) {
            next(err);
        }
    }

    return {
        status,
        summary,
        employees,
        reload: (req, res, next) => void reload(req, res, next),
    };
}
