import * as fs from 'fs';
import { parse } from 'csv-parse/sync';

export type CodeTable = Map<number, string>;

export function loadCodeTable(filePath: string): CodeTable {
    const raw = fs.readFileSync(filePath, 'utf8');
    return parseCodeTable(raw);
}

/**
 * Parses `code,name` rows. Codes may be decimal or 0x-prefixed hex;
 * rows with an unparseable code or an empty name are skipped.
 */
export function parseCodeTable(raw: string): CodeTable {
    const records: unknown[] = parse(raw, {
        columns: true,
        skip_empty_lines: true,
        trim: true,
        comment: '#',
    });

    const table: CodeTable = new Map();
    for (const record of records) {
        if (typeof record !== 'object' || record === null) continue;
        if (!('code' in record) || !('name' in record)) continue;
        const { code: rawCode, name } = record;
        if (typeof rawCode !== 'string' || rawCode === '' || typeof name !== 'string' || !name) continue;
        const code = Number(rawCode);
        if (!Number.isInteger(code) || code < 0) continue;
        table.set(code, name);
    }
    return table;
}
