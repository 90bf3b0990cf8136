// =============================================================================
// Error handler middleware — must be registered LAST in Express.
//
// Catches anything passed via next(err) and renders the standard envelope
// { success, error, message, statusCode }.
// =============================================================================

import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { sendError } from '../utils/response';
import { logger } from '../lib/logger';

const log = logger.child({ module: 'http' });

// A typed application error you can throw from anywhere in the codebase.
export class AppError extends Error {
    constructor(
        public readonly statusCode: number,
        public readonly code: string,
        message: string
    ) {
        super(message);
        this.name = 'AppError';
    }
}

// ─── Global error handler ────────────────────────────────────────────────────
export function errorHandler(
    err: unknown,
    req: Request,
    res: Response,
    // next MUST be declared even if unused — Express uses arity to identify error handlers
    _next: NextFunction
): void {
    // 1. Zod validation errors — map to field-level messages
    if (err instanceof ZodError) {
        const message = err.errors
            .map((e) => `${e.path.join('.')}: ${e.message}`)
            .join('; ');
        sendError(res, 400, 'VALIDATION_ERROR', message);
        return;
    }

    // 2. Known application errors thrown with AppError
    if (err instanceof AppError) {
        if (err.statusCode >= 500) {
            log.warn({ code: err.code, path: req.path }, err.message);
        }
        sendError(res, err.statusCode, err.code, err.message);
        return;
    }

    // 3. Malformed JSON body — body-parser tags these with type + status
    if (isBodyParseError(err)) {
        sendError(res, 400, 'INVALID_JSON', 'Request body is not valid JSON.');
        return;
    }

    // 4. Unexpected errors — log in full, never leak internals to caller
    log.error({ err, method: req.method, path: req.path }, 'Unhandled error');
    sendError(
        res,
        500,
        'INTERNAL_SERVER_ERROR',
        'An unexpected error occurred. Please try again.'
    );
}

function isBodyParseError(err: unknown): boolean {
    return err instanceof SyntaxError
        && 'type' in err && err.type === 'entity.parse.failed';
}

// ─── 404 handler — catches any route not matched by the router ───────────────
export function notFoundHandler(req: Request, res: Response): void {
    sendError(res, 404, 'NOT_FOUND', `Route ${req.method} ${req.path} not found`);
}
