import fs from 'fs';
import { Delimiter } from '../../types';

export const DEFAULT_DELIMITER: Delimiter = ',';
const DELIMITER_SAMPLE_BYTES = 4096;
// Preference order when two candidates score the same.
const CANDIDATES: Delimiter[] = [',', '\t', ';', '|'];

type Score = { delimiter: Delimiter; presence: number; agreement: number };

function toLines(sample: string, truncated: boolean): string[] {
    const unquoted = sample.replace(/^\uFEFF/, '').replace(/"[^"]*"/g, '');
    const lines = unquoted.split(/\r\n|\n|\r/);
    if (truncated && lines.length > 1) lines.pop();
    return lines.filter(line => line.trim() !== '');
}

function score(delimiter: Delimiter, lines: string[]): Score {
    const frequencies = new Map<number, number>();
    let presence = 0;
    for (const line of lines) {
        const count = line.split(delimiter).length - 1;
        if (count === 0) continue;
        presence++;
        frequencies.set(count, (frequencies.get(count) ?? 0) + 1);
    }
    const agreement = Math.max(0, ...frequencies.values());
    return { delimiter, presence, agreement };
}

/**
 * Picks the delimiter that shows up on the most lines of the sample, then the one
 * whose per-line count is most regular. Must appear on at least half the lines.
 */
export function sniffSample(sample: string, truncated = false): Delimiter {
    const lines = toLines(sample, truncated);
    if (lines.length === 0) return DEFAULT_DELIMITER;

    let best: Score | null = null;
    for (const candidate of CANDIDATES) {
        const current = score(candidate, lines);
        if (current.presence === 0 || current.presence * 2 < lines.length) continue;
        if (!best
            || current.presence > best.presence
            || (current.presence === best.presence && current.agreement > best.agreement)) {
            best = current;
        }
    }
    return best ? best.delimiter : DEFAULT_DELIMITER;
}

export function detectDelimiter(filePath: string): Delimiter {
    let fd: number | null = null;
    try {
        fd = fs.openSync(filePath, 'r');
        const buffer = Buffer.alloc(DELIMITER_SAMPLE_BYTES);
        const bytesRead = fs.readSync(fd, buffer, 0, buffer.length, 0);
        if (bytesRead <= 0) return DEFAULT_DELIMITER;

        const sample = buffer.toString('utf8', 0, bytesRead);
        return sniffSample(sample, bytesRead === DELIMITER_SAMPLE_BYTES);
    } catch {
        return DEFAULT_DELIMITER;
    } finally {
        if (fd !== null) {
            try { fs.closeSync(fd); } catch { /* already closed */ }
        }
    }
}
