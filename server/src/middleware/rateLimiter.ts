// =============================================================================
// middleware/rateLimiter.ts — Express rate-limiter factory.
//
// Used on POST /api/analyze: every request there may cost a Gemini call, so
// a single client must not be able to burn through the quota.
//
// Store strategy
// ──────────────
//   Redis available  → rate-limit-redis (RedisStore)
//     Keys:  rl:ai:<IP>
//     Advantage: limits survive server restarts; works across multiple instances.
//
//   Redis unavailable → express-rate-limit built-in MemoryStore
//     Keys:  in-process Map; reset on restart.
//
// The store is chosen when the limiter is created (inside createApp), which
// runs after initRedis() in index.ts.
//
// Response shape on 429 matches the standard error envelope so the dashboard
// handles it like any other API error.
// =============================================================================

import rateLimit, { MemoryStore } from 'express-rate-limit';
import type { Options, Store } from 'express-rate-limit';
import { RedisStore } from 'rate-limit-redis';
import type Redis from 'ioredis';
import { getRedis } from '../lib/redis';
import { logger } from '../lib/logger';

const log = logger.child({ module: 'rateLimiter' });

type ReplyScalar = boolean | number | string;
type RedisReply = ReplyScalar | ReplyScalar[];

function isReplyScalar(value: unknown): value is ReplyScalar {
    return typeof value === 'boolean' || typeof value === 'number' || typeof value === 'string';
}

// ioredis resolves raw commands to `unknown`; rate-limit-redis expects scalars
// or flat arrays of scalars (its Lua script returns [hits, ttl]).
function toRedisReply(value: unknown): RedisReply {
    if (isReplyScalar(value)) return value;
    if (Array.isArray(value) && value.every(isReplyScalar)) return value;
    throw new Error(`Unexpected Redis reply: ${JSON.stringify(value)}`);
}

// ─── Store factory ────────────────────────────────────────────────────────────

function redisStore(redis: Redis, prefix: string): Store {
    return new RedisStore({
        prefix,
        sendCommand: async (...args: string[]): Promise<RedisReply> => {
            const [command, ...rest] = args;
            return toRedisReply(await redis.call(command, ...rest));
        },
    });
}

function buildStore(prefix: string): Store {
    const redis = getRedis();
    if (redis) {
        log.info({ prefix }, 'Using Redis-backed store');
        return redisStore(redis, prefix);
    }
    log.info('Redis not available — using in-memory store');
    return new MemoryStore();
}

// ─── Rate limiter factory ─────────────────────────────────────────────────────

export interface RateLimitSettings {
    max: number;
    windowMs: number;
}

/**
 * Returns an Express middleware that enforces `max` requests per IP per
 * `windowMs` milliseconds. On breach:
 *   HTTP 429  { success: false, error: 'RATE_LIMIT_EXCEEDED', message, statusCode: 429 }
 */
export function aiRateLimiter({ max, windowMs }: RateLimitSettings) {
    const options: Partial<Options> = {
        windowMs,
        limit: max,
        standardHeaders: true,   // emit RateLimit-* headers
        legacyHeaders: false,    // suppress X-RateLimit-*

        store: buildStore('rl:ai:'),

        // Key by IP — correct behind one proxy hop because app.ts sets
        // `trust proxy`.
        keyGenerator: (req) => req.ip ?? req.socket.remoteAddress ?? 'unknown',

        handler: (_req, res, _next, opts) => {
            const retryAfterSecs = Math.ceil(opts.windowMs / 1000);
            res.status(429).json({
                success: false,
                error: 'RATE_LIMIT_EXCEEDED',
                message: `Too many analysis requests. You may retry after ${retryAfterSecs} seconds.`,
                statusCode: 429,
            });
        },
    };

    return rateLimit(options);
}
