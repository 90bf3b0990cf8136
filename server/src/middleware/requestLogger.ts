// Logs one line per completed request: method, path, status, duration.

import type { Request, Response, NextFunction } from 'express';
import { logger } from '../lib/logger';

const log = logger.child({ module: 'http' });

export function requestLogger(req: Request, res: Response, next: NextFunction): void {
    const started = process.hrtime.bigint();

    res.on('finish', () => {
        const durationMs = Number(process.hrtime.bigint() - started) / 1e6;
        log.info({
            method: req.method,
            path: req.originalUrl,
            status: res.statusCode,
            durationMs: Math.round(durationMs * 10) / 10,
        }, 'request completed');
    });

    next();
}
