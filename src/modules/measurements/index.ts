import fs from 'fs';
import { z } from 'zod';
import { LoadOptions, Measurement, MeasurementIndexes, RejectionReason } from '../../types';
import { logger } from '../observability';
import { Normalizer } from '../normalizer';
import { detectDelimiter } from '../sniffer';
import { readRows } from '../tokenizer';

const MIN_CELLS = 4;

// Reason reported for the first failing cell, by cell position.
const CELL_REASONS: RejectionReason[] = [
    RejectionReason.INVALID_REGION_ID,
    RejectionReason.MISSING_NAME,
    RejectionReason.MISSING_DATE,
    RejectionReason.INVALID_VALUE,
];

const MeasurementRowSchema = z.tuple([
    z.string().refine(cell => Normalizer.toInt(cell) !== null).transform(cell => Number.parseInt(cell.trim(), 10)),
    z.string().trim().min(1),
    z.string().trim().min(1),
    z.string().refine(cell => Normalizer.toFloat(cell) !== null).transform(cell => Number(cell.trim())),
]).rest(z.string());

function rejectionReason(error: z.ZodError): RejectionReason {
    const position = error.issues[0]?.path[0];
    if (typeof position === 'number' && position < CELL_REASONS.length) {
        return CELL_REASONS[position];
    }
    return RejectionReason.TOO_FEW_CELLS;
}

function append<K>(index: Map<K, Measurement[]>, key: K, measurement: Measurement) {
    const bucket = index.get(key);
    if (bucket) {
        bucket.push(measurement);
    } else {
        index.set(key, [measurement]);
    }
}

/**
 * Loads the measurement table (`region_id, region_name, date, value`) into two
 * indexes sharing the same frozen records, in file order.
 *
 * Row 0 is a header only when its first cell is not an integer. Rows that fail
 * any cell are dropped without affecting the rest; a missing file gives empty maps.
 */
export function loadMeasurements(filePath: string, options: LoadOptions = {}): MeasurementIndexes {
    const byRegionId = new Map<number, Measurement[]>();
    const byDate = new Map<string, Measurement[]>();

    if (!fs.existsSync(filePath)) {
        logger.warn(`Could not find ${filePath}`);
        return { byRegionId, byDate };
    }

    const rows = readRows(filePath, detectDelimiter(filePath));
    if (rows.length === 0) return { byRegionId, byDate };

    const start = Normalizer.toInt(rows[0][0] ?? '') === null ? 1 : 0;

    for (let i = start; i < rows.length; i++) {
        const row = rows[i];
        if (row.length < MIN_CELLS) {
            options.onRowRejected?.({ source: 'measurements', record: i + 1, reason: RejectionReason.TOO_FEW_CELLS });
            continue;
        }

        const parsed = MeasurementRowSchema.safeParse(row);
        if (!parsed.success) {
            options.onRowRejected?.({ source: 'measurements', record: i + 1, reason: rejectionReason(parsed.error) });
            continue;
        }

        const [region_id, region_name, date, value] = parsed.data;
        const measurement: Measurement = Object.freeze({ date, region_id, region_name, value });
        append(byRegionId, region_id, measurement);
        append(byDate, date, measurement);
    }

    logger.debug(`Loaded measurements from ${filePath}`, {
        region_ids: byRegionId.size,
        dates: byDate.size,
    });
    return { byRegionId, byDate };
}
