import fs from 'fs';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { Delimiter } from '../../types';
import { logger } from '../observability';

const RowsSchema = z.array(z.array(z.string()));

/**
 * Reads the whole file and splits it into rows of raw (untrimmed) cells.
 * Rows keep their own length; blank lines are dropped. A record csv-parse cannot
 * finish (an unclosed quote swallows the rest of the file) is skipped and the rows
 * before it are kept. An unreadable path yields no rows.
 */
export function readRows(filePath: string, delimiter: Delimiter): string[][] {
    let records: unknown;
    try {
        const content = fs.readFileSync(filePath, 'utf8');
        records = parse(content, {
            delimiter,
            bom: true,
            relax_column_count: true,
            relax_quotes: true,
            skip_empty_lines: true,
            skip_records_with_error: true,
            on_skip: (err) => {
                logger.debug(`Skipped malformed record in ${filePath}`, { error_message: err?.message });
                return undefined;
            },
        });
    } catch (e) {
        const message = e instanceof Error ? e.message : String(e);
        logger.warn(`Could not read rows from ${filePath}`, { error_message: message });
        return [];
    }

    const parsed = RowsSchema.safeParse(records);
    return parsed.success ? parsed.data : [];
}
