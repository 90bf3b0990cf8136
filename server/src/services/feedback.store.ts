// =============================================================================
// services/feedback.store.ts — backing store for employee feedback rows.
//
// The engine only sees the FeedbackStore interface: one flat read of every
// row, returned untyped. Normalisation happens in lib/normalize.ts, so a
// store never needs to know which columns exist.
//
// PgFeedbackStore reads from PostgreSQL through a pg Pool. Tests substitute an
// in-process fake implementing the same interface.
//
// Cold-start note
// ───────────────
// Serverless Postgres hosts suspend idle computes; the first query after a
// wake can fail with a connection error. ping() retries once after a short
// pause and is called at boot so the pool is warm before the first load.
// =============================================================================

import pg from 'pg';
import type { Pool as PgPool } from 'pg';
import { logger } from '../lib/logger';
import { errorMessage } from '../utils/errorMessage';

const { Pool } = pg;

const log = logger.child({ module: 'store' });

const PING_RETRY_DELAY_MS = 4_000;

export interface FeedbackStore {
    /** Every row of the feedback table, in the store's current order. */
    fetchAll(): Promise<unknown[]>;
    close(): Promise<void>;
}

export interface PgFeedbackStoreOptions {
    connectionString: string;
    table: string;
    /** Server-side statement timeout; the engine applies its own as well. */
    statementTimeoutMs?: number;
}

// Only plain identifiers reach this point (config validates the name), so
// doubling quotes is all the escaping needed.
export function quoteIdentifier(name: string): string {
    return `"${name.replace(/"/g, '""')}"`;
}

export class PgFeedbackStore implements FeedbackStore {
    private readonly pool: PgPool;
    private readonly selectSql: string;

    constructor(options: PgFeedbackStoreOptions) {
        this.pool = new Pool({
            connectionString: options.connectionString,
            max: 5,
            idleTimeoutMillis: 30_000,
            connectionTimeoutMillis: 5_000,
            statement_timeout: options.statementTimeoutMs,
        });
        this.selectSql = `SELECT * FROM ${quoteIdentifier(options.table)}`;

        this.pool.on('error', (err: Error) => {
            log.error({ err: err.message }, 'Unexpected idle client error');
        });
    }

    async fetchAll(): Promise<unknown[]> {
        const result = await this.pool.query(this.selectSql);
        return result.rows;
    }

    /**
     * SELECT 1, retried once after 4 s on a connection-style failure.
     * Throws if the second attempt fails too.
     */
    async ping(): Promise<void> {
        try {
            await this.pool.query('SELECT 1');
        } catch (firstErr) {
            const msg = errorMessage(firstErr);
            if (!/connect|ECONNRESET|ECONNREFUSED|terminat/i.test(msg)) throw firstErr;
            log.warn({ err: msg }, `Cold-start ping failed, retrying in ${PING_RETRY_DELAY_MS / 1000} s…`);
            await new Promise((r) => setTimeout(r, PING_RETRY_DELAY_MS));
            await this.pool.query('SELECT 1');
        }
    }

    async close(): Promise<void> {
        await this.pool.end();
    }
}
