/**
 * CSV import — loads a feedback export into the table the API reads.
 * Run from the server/ directory:
 *   npx tsx scripts/import-csv.ts data/feedback.csv [table]
 *
 * DESTRUCTIVE: the target table is dropped and recreated. The whole import
 * runs in one transaction, so a failure leaves the previous table in place.
 */

import 'dotenv/config';
import { readFile } from 'fs/promises';
import pg from 'pg';
import { z } from 'zod';
import {
    decodeCsv,
    parseCsv,
    buildDropTableSql,
    buildCreateTableSql,
    buildInsertSql,
} from '../src/lib/csvImport';
import { logger } from '../src/lib/logger';
import { errorMessage } from '../src/utils/errorMessage';

const log = logger.child({ module: 'import-csv' });

const Args = z.tuple([
    z.string().min(1, 'usage: import-csv <file.csv> [table]'),
    z.string().min(1).default('sentiment_reports'),
]);

const Env = z.object({
    DATABASE_URL: z.string().min(1),
});

async function main(): Promise<void> {
    const [file, table] = Args.parse([process.argv[2], process.argv[3]]);
    const { DATABASE_URL } = Env.parse(process.env);

    const { encoding, text } = decodeCsv(await readFile(file));
    log.info({ file, encoding }, 'Detected file encoding');

    const { columns, rows } = parseCsv(text);
    log.info({ columns: columns.length, rows: rows.length }, 'Parsed CSV');

    const client = new pg.Client({ connectionString: DATABASE_URL });
    await client.connect();

    try {
        await client.query('BEGIN');
        await client.query(buildDropTableSql(table));
        await client.query(buildCreateTableSql(table, columns));

        const insertSql = buildInsertSql(table, columns);
        for (const row of rows) {
            await client.query(insertSql, row);
        }

        await client.query('COMMIT');
        log.info({ table, rows: rows.length }, 'Import complete');
    } catch (err) {
        await client.query('ROLLBACK');
        throw err;
    } finally {
        await client.end();
        log.info('Connection closed');
    }
}

main().catch((err: unknown) => {
    log.error({ err: errorMessage(err) }, 'Import failed');
    process.exit(1);
});
