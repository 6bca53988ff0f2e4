import fs from 'fs';
import { GeographyIndexes, LoadOptions, RejectionReason } from '../../types';
import { logger } from '../observability';
import { Normalizer } from '../normalizer';
import { detectDelimiter } from '../sniffer';
import { readRows } from '../tokenizer';

/** Header-bearing table: columns located by name. */
export type HeaderLayout = {
    kind: 'header';
    areaColumn: number;
    regionColumn: number;
    postalStartColumn: number;
};

/** Headerless table: `Borough,UHF42,101,10463,10471,...` */
export type PositionalLayout = {
    kind: 'positional';
};

export type GeographyLayout = HeaderLayout | PositionalLayout;

type GeographyRow = {
    area: string;
    regionIds: number[];
    postalCodes: string[];
};

// Markers like "UHF42" in data rows must not match, hence "uhf_id" and not "uhf".
const HEADER_KEYWORDS = ['borough', 'boro', 'zip', 'uhf_id', 'uhf id'];

const POSITIONAL_AREA_COLUMN = 0;
const POSITIONAL_REGION_COLUMN = 2;
const POSITIONAL_POSTAL_START = 3;

function findColumn(header: string[], keys: string[], fallback: number): number {
    const index = header.findIndex(cell => keys.some(key => cell.includes(key)));
    return index === -1 ? fallback : index;
}

export function detectLayout(firstRow: string[]): GeographyLayout {
    const header = firstRow.map(cell => cell.toLowerCase());
    const hasHeader = header.some(cell => HEADER_KEYWORDS.some(keyword => cell.includes(keyword)));
    if (!hasHeader) return { kind: 'positional' };

    return {
        kind: 'header',
        areaColumn: findColumn(header, ['borough', 'boro'], 0),
        regionColumn: findColumn(header, ['uhf', 'code', 'id'], 1),
        postalStartColumn: findColumn(header, ['zip'], 2),
    };
}

/**
 * Expands a region-code cell. Digit strings longer than three characters whose
 * length is a multiple of three are concatenated ids ("105106107" -> [105, 106, 107]);
 * anything else is read as a single integer. Unreadable cells give [].
 */
export function expandRegionCode(cell: string): number[] {
    const s = cell.trim();
    if (!s) return [];
    if (/^\d+$/.test(s) && s.length > 3 && s.length % 3 === 0) {
        const ids: number[] = [];
        for (let i = 0; i < s.length; i += 3) {
            ids.push(Number.parseInt(s.slice(i, i + 3), 10));
        }
        return ids;
    }
    const id = Normalizer.toInt(s);
    return id === null ? [] : [id];
}

/**
 * Keeps the first five characters of every cell that starts with five digits,
 * so "104631234" becomes "10463". Duplicates collapse, first one wins.
 */
export function extractPostalCodes(cells: string[]): string[] {
    const seen = new Set<string>();
    for (const cell of cells) {
        if (/^\d{5}/.test(cell)) seen.add(cell.slice(0, 5));
    }
    return [...seen];
}

function parseHeaderRow(row: string[], layout: HeaderLayout): GeographyRow | null {
    const widest = Math.max(layout.areaColumn, layout.regionColumn, layout.postalStartColumn);
    if (row.length <= widest) return null;
    return {
        area: Normalizer.normalizeArea(row[layout.areaColumn]),
        regionIds: expandRegionCode(row[layout.regionColumn]),
        postalCodes: extractPostalCodes(row.slice(layout.postalStartColumn)),
    };
}

function parsePositionalRow(row: string[]): GeographyRow | null {
    if (row.length <= POSITIONAL_REGION_COLUMN) return null;
    return {
        area: Normalizer.normalizeArea(row[POSITIONAL_AREA_COLUMN]),
        regionIds: expandRegionCode(row[POSITIONAL_REGION_COLUMN]),
        postalCodes: extractPostalCodes(row.slice(POSITIONAL_POSTAL_START)),
    };
}

function mergeIds<K>(index: Map<K, number[]>, key: K, ids: number[]) {
    let bucket = index.get(key);
    if (!bucket) {
        bucket = [];
        index.set(key, bucket);
    }
    for (const id of ids) {
        if (!bucket.includes(id)) bucket.push(id);
    }
}

/**
 * Loads the UHF mapping table into postal-code and borough indexes of region ids.
 * The layout is decided once from the first non-blank row.
 */
export function loadGeography(filePath: string, options: LoadOptions = {}): GeographyIndexes {
    const postalToRegionIds = new Map<string, number[]>();
    const areaToRegionIds = new Map<string, number[]>();

    if (!fs.existsSync(filePath)) {
        logger.warn(`Could not find ${filePath}`);
        return { postalToRegionIds, areaToRegionIds };
    }

    const rows = readRows(filePath, detectDelimiter(filePath))
        .map(row => row.map(cell => cell.trim()))
        .filter(row => row.some(cell => cell !== ''));
    if (rows.length === 0) return { postalToRegionIds, areaToRegionIds };

    const layout = detectLayout(rows[0]);
    const start = layout.kind === 'header' ? 1 : 0;
    logger.debug(`Detected ${layout.kind} layout in ${filePath}`);

    for (let i = start; i < rows.length; i++) {
        const parsed = layout.kind === 'header'
            ? parseHeaderRow(rows[i], layout)
            : parsePositionalRow(rows[i]);

        if (!parsed) {
            options.onRowRejected?.({ source: 'geography', record: i + 1, reason: RejectionReason.TOO_FEW_CELLS });
            continue;
        }
        if (parsed.regionIds.length === 0) {
            options.onRowRejected?.({ source: 'geography', record: i + 1, reason: RejectionReason.NO_REGION_CODE });
            continue;
        }

        if (parsed.area) mergeIds(areaToRegionIds, parsed.area, parsed.regionIds);
        for (const code of parsed.postalCodes) {
            mergeIds(postalToRegionIds, code, parsed.regionIds);
        }
    }

    logger.debug(`Loaded geography from ${filePath}`, {
        postal_codes: postalToRegionIds.size,
        areas: areaToRegionIds.size,
    });
    return { postalToRegionIds, areaToRegionIds };
}
