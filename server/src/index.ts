// =============================================================================
// Entry point — loads env, builds the engine, boots the HTTP server.
//
// Boot sequence:
//   1. dotenv/config     — populate process.env (MUST be first import)
//   2. loadConfig()      — validate env; fail fast on missing PORT / DATABASE_URL
//   3. initRedis()       — optional answer cache + rate-limit store
//   4. engine            — pg store + Gemini generator, constructed once here
//   5. warm-up + load()  — non-fatal: the API still starts without data
//   6. createApp()       — Express app around the engine
//   7. app.listen()      — bind HTTP port
//   8. SIGTERM/SIGINT    — graceful shutdown (HTTP → store pool → Redis)
// =============================================================================

import 'dotenv/config'; // side-effect import — populates process.env from .env

import { createApp } from './app';
import { loadConfig, ConfigError } from './config';
import { logger } from './lib/logger';
import { initRedis, disconnectRedis } from './lib/redis';
import { createGeminiGenerator } from './lib/gemini';
import { PgFeedbackStore } from './services/feedback.store';
import { AnalyticsEngine } from './services/analytics.engine';
import { errorMessage } from './utils/errorMessage';

const log = logger.child({ module: 'server' });

async function main(): Promise<void> {
    const config = loadConfig();

    initRedis(config.redisUrl);

    const store = new PgFeedbackStore({
        connectionString:   config.databaseUrl,
        table:              config.feedbackTable,
        statementTimeoutMs: config.dbQueryTimeoutMs,
    });

    const engine = new AnalyticsEngine({
        store,
        generator:     createGeminiGenerator(config.gemini),
        loadTimeoutMs: config.dbQueryTimeoutMs,
        aiTimeoutMs:   config.gemini.timeoutMs,
    });

    // ── Warm the connection, then take the first snapshot ─────────────────────
    try {
        await store.ping();
        log.info('DB connection established');
    } catch (dbErr) {
        log.warn({ err: errorMessage(dbErr) }, 'DB warm-up failed (load will report the failure)');
    }

    const initial = await engine.load();
    if (initial.status !== 'loaded') {
        log.warn({ result: initial }, 'Started with no data — POST /api/reload-data once the table is populated');
    }

    const app = createApp({ engine, config });

    const server = app.listen(config.port, () => {
        log.info(`Running on http://localhost:${config.port}`);
        log.info(`Environment: ${config.nodeEnv}`);
        log.info(`Health check: http://localhost:${config.port}/health`);
    });

    // ── Graceful shutdown ─────────────────────────────────────────────────────
    //   1. Stop accepting new HTTP connections (server.close)
    //   2. Close the pg pool
    //   3. Close the Redis connection
    function shutdown(signal: string): void {
        log.info(`${signal} received — shutting down gracefully...`);
        server.close(() => {
            Promise.all([store.close(), disconnectRedis()])
                .then(() => {
                    log.info('All connections closed. Bye.');
                    process.exit(0);
                })
                .catch((err: unknown) => {
                    log.error({ err: errorMessage(err) }, 'Error during shutdown');
                    process.exit(1);
                });
        });
    }

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((err: unknown) => {
    if (err instanceof ConfigError) {
        log.fatal(err.message);
    } else {
        log.fatal({ err }, 'Fatal startup error');
    }
    process.exit(1);
});
