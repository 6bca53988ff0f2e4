import { describe, expect, it } from 'vitest';
import { Normalizer } from '../src/modules/normalizer';

describe('Normalizer', () => {
    describe('toInt', () => {
        it('parses whole integer cells', () => {
            expect(Normalizer.toInt(' 205 ')).toBe(205);
            expect(Normalizer.toInt('-7')).toBe(-7);
            expect(Normalizer.toInt(42)).toBe(42);
        });

        it('rejects anything else', () => {
            expect(Normalizer.toInt('UHF Geo ID')).toBeNull();
            expect(Normalizer.toInt('12.5')).toBeNull();
            expect(Normalizer.toInt('')).toBeNull();
            expect(Normalizer.toInt('99999999999999999999')).toBeNull();
        });
    });

    describe('toFloat', () => {
        it('parses decimal and exponent forms', () => {
            expect(Normalizer.toFloat('11.45')).toBe(11.45);
            expect(Normalizer.toFloat(' .5 ')).toBe(0.5);
            expect(Normalizer.toFloat('1e3')).toBe(1000);
            expect(Normalizer.toFloat('12')).toBe(12);
        });

        it('rejects text and non-finite values', () => {
            expect(Normalizer.toFloat('not-a-number')).toBeNull();
            expect(Normalizer.toFloat('')).toBeNull();
            expect(Normalizer.toFloat('Infinity')).toBeNull();
        });
    });

    describe('normalizeArea', () => {
        it('collapses case and surrounding whitespace', () => {
            expect(Normalizer.normalizeArea('manhattan')).toBe('Manhattan');
            expect(Normalizer.normalizeArea(' Manhattan ')).toBe('Manhattan');
            expect(Normalizer.normalizeArea('MANHATTAN')).toBe('Manhattan');
        });

        it('capitalizes every word', () => {
            expect(Normalizer.normalizeArea('staten island')).toBe('Staten Island');
            expect(Normalizer.normalizeArea('STATEN-ISLAND')).toBe('Staten-Island');
        });
    });
});
