// =============================================================================
// lib/logger.ts — pino logger shared by the whole server.
//
// Development → pino-pretty (colourised, one line per event).
// Production  → newline-delimited JSON on stdout.
// Test        → silent unless LOG_LEVEL is set explicitly.
//
// Modules take a child logger so every line carries its origin:
//   const log = logger.child({ module: 'engine' });
// =============================================================================

import pino from 'pino';
import type { Logger } from 'pino';

const nodeEnv = process.env.NODE_ENV ?? 'development';

function resolveLevel(): string {
    if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
    return nodeEnv === 'test' ? 'silent' : 'info';
}

export const logger: Logger = pino({
    level: resolveLevel(),
    transport: nodeEnv === 'development' ? {
        target: 'pino-pretty',
        options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
        },
    } : undefined,
    base: {
        env: nodeEnv,
    },
});

export type { Logger };

export default logger;
