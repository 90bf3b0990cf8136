// =============================================================================
// config/index.ts — typed environment configuration.
//
// process.env is populated by `dotenv/config` in index.ts; this module only
// validates it. Nothing here reads the environment at import time, so tests
// can build a config from a plain object:
//
//   const config = loadConfig({ PORT: '3000', DATABASE_URL: 'postgres://…' });
//
// A missing PORT or DATABASE_URL is a startup failure, not a silent default:
// binding to an arbitrary port or pointing at the wrong database both surface
// much later as confusing runtime errors.
// =============================================================================

import { z } from 'zod';

// Plain SQL identifier — the table name is interpolated into a query.
const SQL_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

const envSchema = z.object({
    // System
    NODE_ENV:  z.enum(['development', 'production', 'test']).default('development'),
    PORT:      z.coerce.number().int().min(1).max(65_535),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

    // Backing store
    DATABASE_URL:        z.string().min(1),
    FEEDBACK_TABLE:      z.string().regex(SQL_IDENTIFIER, 'must be a plain SQL identifier').default('sentiment_reports'),
    DB_QUERY_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),

    // Gemini — the whole AI path is disabled when the key is absent
    GEMINI_API_KEY:           z.string().min(1).optional(),
    GEMINI_MODEL:             z.string().min(1).default('gemini-2.0-flash'),
    GEMINI_TEMPERATURE:       z.coerce.number().min(0).max(2).default(0.7),
    GEMINI_MAX_OUTPUT_TOKENS: z.coerce.number().int().positive().default(512),
    GEMINI_TIMEOUT_MS:        z.coerce.number().int().positive().default(15_000),

    // Redis (optional) — answer cache + shared rate-limit store
    REDIS_URL:            z.string().min(1).optional(),
    AI_CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(600),

    // HTTP
    ALLOWED_ORIGINS:         z.string().default('http://localhost:5173'),
    RATE_LIMIT_AI_MAX:       z.coerce.number().int().positive().default(20),
    RATE_LIMIT_AI_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
});

export type NodeEnv = z.infer<typeof envSchema>['NODE_ENV'];
export type LogLevel = z.infer<typeof envSchema>['LOG_LEVEL'];

export interface GeminiConfig {
    apiKey: string | null;
    model: string;
    temperature: number;
    maxOutputTokens: number;
    timeoutMs: number;
}

export interface AppConfig {
    nodeEnv: NodeEnv;
    port: number;
    logLevel: LogLevel;
    databaseUrl: string;
    feedbackTable: string;
    dbQueryTimeoutMs: number;
    gemini: GeminiConfig;
    redisUrl: string | null;
    aiCacheTtlSeconds: number;
    allowedOrigins: string[];
    rateLimit: {
        aiMax: number;
        aiWindowMs: number;
    };
}

export class ConfigError extends Error {
    readonly issues: string[];
    constructor(issues: string[]) {
        super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
        this.name = 'ConfigError';
        this.issues = issues;
    }
}

/**
 * Validate an environment map and return the typed application config.
 * Throws ConfigError listing every offending variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    // Treat empty strings like unset variables — `.env` files often carry
    // `GEMINI_API_KEY=` placeholders.
    const cleaned = Object.fromEntries(
        Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ''),
    );

    const parsed = envSchema.safeParse(cleaned);
    if (!parsed.success) {
        throw new ConfigError(
            parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`),
        );
    }

    const e = parsed.data;
    return Object.freeze({
        nodeEnv:          e.NODE_ENV,
        port:             e.PORT,
        logLevel:         e.LOG_LEVEL,
        databaseUrl:      e.DATABASE_URL,
        feedbackTable:    e.FEEDBACK_TABLE,
        dbQueryTimeoutMs: e.DB_QUERY_TIMEOUT_MS,
        gemini: {
            apiKey:          e.GEMINI_API_KEY ?? null,
            model:           e.GEMINI_MODEL,
            temperature:     e.GEMINI_TEMPERATURE,
            maxOutputTokens: e.GEMINI_MAX_OUTPUT_TOKENS,
            timeoutMs:       e.GEMINI_TIMEOUT_MS,
        },
        redisUrl:          e.REDIS_URL ?? null,
        aiCacheTtlSeconds: e.AI_CACHE_TTL_SECONDS,
        allowedOrigins: e.ALLOWED_ORIGINS
            .split(',')
            .map((o) => o.trim())
            .filter((o) => o.length > 0),
        rateLimit: {
            aiMax:      e.RATE_LIMIT_AI_MAX,
            aiWindowMs: e.RATE_LIMIT_AI_WINDOW_MS,
        },
    });
}
