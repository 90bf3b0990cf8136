// =============================================================================
// lib/redis.ts — ioredis singleton for the server.
//
// Design decisions
// ────────────────
// 1. OPTIONAL — Redis is NOT required to run the API.
//    Without REDIS_URL, getRedis() returns null and every call site
//    short-circuits: AI answers are not cached and the rate limiter keeps
//    its counters in process memory.
//
// 2. Single shared connection — one ioredis instance per process.
//
// 3. Lazy connect — ioredis connects on first command, not on construction,
//    so tests that never configure Redis never open a socket.
//
// 4. Error resilience — an 'error' listener keeps connection errors from
//    crashing the process; ioredis reconnects with the backoff below.
//
// 5. Graceful shutdown — disconnectRedis() is called from index.ts.
// =============================================================================

import Redis from 'ioredis';
import { logger } from './logger';
import { errorMessage } from '../utils/errorMessage';

const log = logger.child({ module: 'redis' });

// ─── Singleton ────────────────────────────────────────────────────────────────

let _redis: Redis | null = null;

/** The shared ioredis instance, or null when Redis is disabled. */
export function getRedis(): Redis | null {
    return _redis;
}

// ─── Initialise ───────────────────────────────────────────────────────────────

/**
 * Called once from index.ts with config.redisUrl.
 * Safe to call multiple times — a second call is a no-op.
 */
export function initRedis(url: string | null): void {
    if (_redis) return;
    if (!url) {
        log.info('REDIS_URL not set — answer cache disabled, in-memory rate limiting (non-fatal)');
        return;
    }

    _redis = new Redis(url, {
        lazyConnect: true,
        connectTimeout: 5_000,
        commandTimeout: 3_000,
        maxRetriesPerRequest: 1,     // fail fast per command — don't queue indefinitely
        enableReadyCheck: true,

        // 200 ms, 400, 600, … capped at 5 s
        retryStrategy(times: number) {
            const delay = Math.min(times * 200, 5_000);
            log.info({ attempt: times, delay }, 'Reconnecting');
            return delay;
        },
    });

    _redis.on('ready', () => log.info('Ready'));
    _redis.on('error', (err: Error) => {
        log.error({ err: err.message }, 'Connection error');
    });
    _redis.on('close', () => log.info('Connection closed'));
}

// ─── Graceful shutdown ────────────────────────────────────────────────────────

export async function disconnectRedis(): Promise<void> {
    if (!_redis) return;
    const client = _redis;
    _redis = null;
    try {
        await client.quit();
    } catch (err) {
        log.warn({ err: errorMessage(err) }, 'QUIT failed — forcing disconnect');
        client.disconnect();
    }
    log.info('Disconnected');
}

// ─── Key helpers ──────────────────────────────────────────────────────────────

/**
 * Build a namespaced cache key.
 * Format:  feedback:<namespace>:<discriminator>
 */
export function cacheKey(namespace: string, discriminator: string): string {
    return `feedback:${namespace}:${discriminator}`;
}

export const AI_ANSWER_NS = 'ai-answer';
