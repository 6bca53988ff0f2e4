import { describe, expect, it } from 'vitest';
import { detectDelimiter, sniffSample } from '../src/modules/sniffer';
import { fixture, writeTempFile } from './helpers';

describe('sniffSample', () => {
    it('detects each supported delimiter', () => {
        expect(sniffSample('a,b,c\n1,2,3\n')).toBe(',');
        expect(sniffSample('a;b;c\n1;2;3\n')).toBe(';');
        expect(sniffSample('a\tb\n1\t2\n')).toBe('\t');
        expect(sniffSample('a|b\n1|2\n')).toBe('|');
    });

    it('prefers the delimiter present on more lines', () => {
        expect(sniffSample('a;b;c\n1;2,5;3\n')).toBe(';');
    });

    it('ignores separators inside quoted cells', () => {
        expect(sniffSample('name;note\n"x, y";1\n"p, q";2\n')).toBe(';');
    });

    it('falls back to comma on ties and single-column samples', () => {
        expect(sniffSample('a,b;c\n1,2;3\n')).toBe(',');
        expect(sniffSample('abc\ndef\n')).toBe(',');
        expect(sniffSample('')).toBe(',');
    });

    it('drops the cut-off last line of a truncated sample', () => {
        expect(sniffSample('x|y\nxy,z', true)).toBe('|');
        expect(sniffSample('x|y\nxy,z', false)).toBe(',');
    });

    it('ignores a byte-order mark', () => {
        expect(sniffSample('\uFEFFa|b\n1|2\n')).toBe('|');
    });
});

describe('detectDelimiter', () => {
    it('reads the delimiter from files', () => {
        expect(detectDelimiter(fixture('air_quality.csv'))).toBe(',');
        expect(detectDelimiter(fixture('uhf_header.csv'))).toBe(';');
    });

    it('only samples the start of large files', () => {
        const filePath = writeTempFile('big.csv', 'a;b\n'.repeat(3000));
        expect(detectDelimiter(filePath)).toBe(';');
    });

    it('returns comma for missing or empty files', () => {
        expect(detectDelimiter(fixture('does-not-exist.csv'))).toBe(',');
        expect(detectDelimiter(writeTempFile('empty.csv', ''))).toBe(',');
    });
});
