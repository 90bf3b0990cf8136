// =============================================================================
// Application factory — creates and configures the Express app.
//
// Separated from index.ts (the entry point) so tests can build the app around
// an engine with a fake store and never start the real listener.
// =============================================================================

import express from 'express';
import type { Express } from 'express';
import cors from 'cors';
import { registerRoutes } from './routes';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { requestLogger } from './middleware/requestLogger';
import type { AnalyticsEngine } from './services/analytics.engine';
import type { AppConfig } from './config';

export interface AppDependencies {
    engine: AnalyticsEngine;
    config: AppConfig;
}

export function createApp({ engine, config }: AppDependencies): Express {
    const app = express();

    // ── Proxy trust ───────────────────────────────────────────────────────────
    // Set before anything reads req.ip (the analyze rate limiter keys by it).
    // One hop: the single load balancer in front of the API.
    app.set('trust proxy', 1);

    // ── CORS ──────────────────────────────────────────────────────────────────
    const allowedOrigins = config.allowedOrigins;

    // ── Startup Guard ────────────────────────────────────────────────────────
    // Production must not accept localhost origins.
    if (config.nodeEnv === 'production') {
        const hasLocalhost = allowedOrigins.some(o =>
            o.includes('localhost') || o.includes('127.0.0.1')
        );
        if (hasLocalhost) {
            throw new Error(
                '[startup] ALLOWED_ORIGINS contains localhost in production. ' +
                'Update your environment variables to use a real domain.'
            );
        }
    }

    app.use(
        cors({
            origin: (origin, callback) => {
                // Allow requests with no origin (e.g. curl, server-to-server)
                if (!origin || allowedOrigins.includes(origin)) {
                    callback(null, true);
                } else {
                    callback(new Error(`CORS: origin '${origin}' not in ALLOWED_ORIGINS`));
                }
            },
            methods: ['GET', 'POST', 'OPTIONS'],
            allowedHeaders: ['Content-Type'],
        })
    );

    // ── Body parsing ──────────────────────────────────────────────────────────
    app.use(express.json({ limit: '100kb' }));

    app.use(requestLogger);

    // ── Routes ────────────────────────────────────────────────────────────────
    registerRoutes(app, engine, config);

    // ── 404 — must come after all routes ─────────────────────────────────────
    app.use(notFoundHandler);

    // ── Global error handler — must be LAST and have 4 params ────────────────
    app.use(errorHandler);

    return app;
}
