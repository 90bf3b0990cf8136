// =============================================================================
// lib/csvImport.ts — helpers for scripts/import-csv.ts.
//
// Turns a feedback export (any encoding, header row first) into a TEXT-only
// table. Kept free of I/O so the SQL it produces can be unit-tested.
//
// Every column is created as TEXT: exports mix "72.5", "72.5%" and blanks in
// the same column, and the engine's normaliser already coerces per field.
// Blank cells are stored as NULL so they hit the normaliser's fallbacks.
// =============================================================================

import { detect } from 'chardet';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { quoteIdentifier } from '../services/feedback.store';

const SQL_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;
const ENCODING_SAMPLE_BYTES = 50_000;

const CsvRows = z.array(z.array(z.string())).min(1, 'CSV file is empty');

export interface ParsedCsv {
    columns: string[];
    rows: Array<Array<string | null>>;
}

export class CsvImportError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'CsvImportError';
    }
}

// ─── Decoding ─────────────────────────────────────────────────────────────────

/** Detect the encoding from the first 50 kB and decode the whole buffer. */
export function decodeCsv(buffer: Buffer): { encoding: string; text: string } {
    const detected = detect(buffer.subarray(0, ENCODING_SAMPLE_BYTES)) ?? 'UTF-8';
    try {
        return { encoding: detected, text: new TextDecoder(detected).decode(buffer) };
    } catch {
        // Label the runtime's decoder does not know (e.g. ISO-2022 variants).
        return { encoding: 'UTF-8', text: new TextDecoder('utf-8').decode(buffer) };
    }
}

// ─── Parsing ──────────────────────────────────────────────────────────────────

export function parseCsv(text: string): ParsedCsv {
    const raw: unknown = parse(text, {
        bom: true,
        skip_empty_lines: true,
        relax_column_count: false,
    });

    const [header, ...body] = CsvRows.parse(raw);
    const columns = header.map((c) => c.trim());

    if (columns.some((c) => c === '')) {
        throw new CsvImportError('CSV header contains an empty column name');
    }
    const seen = new Set<string>();
    for (const c of columns) {
        if (seen.has(c)) throw new CsvImportError(`Duplicate column "${c}" in CSV header`);
        seen.add(c);
    }

    return {
        columns,
        rows: body.map((cells) => cells.map((cell) => (cell.trim() === '' ? null : cell))),
    };
}

// ─── SQL ──────────────────────────────────────────────────────────────────────

export function assertTableName(table: string): string {
    if (!SQL_IDENTIFIER.test(table)) {
        throw new CsvImportError(`"${table}" is not a plain SQL identifier`);
    }
    return table;
}

export function buildDropTableSql(table: string): string {
    return `DROP TABLE IF EXISTS ${quoteIdentifier(assertTableName(table))}`;
}

export function buildCreateTableSql(table: string, columns: readonly string[]): string {
    const defs = columns.map((c) => `${quoteIdentifier(c)} TEXT`).join(', ');
    return `CREATE TABLE ${quoteIdentifier(assertTableName(table))} (${defs})`;
}

export function buildInsertSql(table: string, columns: readonly string[]): string {
    const names = columns.map(quoteIdentifier).join(', ');
    const placeholders = columns.map((_, i) => `$${i + 1}`).join(', ');
    return `INSERT INTO ${quoteIdentifier(assertTableName(table))} (${names}) VALUES (${placeholders})`;
}
