import { describe, expect, it } from 'vitest';
import { loadGeography } from '../src/modules/geography';
import { loadMeasurements } from '../src/modules/measurements';
import { searchByArea, searchByDate, searchByPostal, searchByRegionId } from '../src/modules/query';
import { Measurement } from '../src/types';
import { writeTempFile } from './helpers';

const m = (date: string, region_id: number, region_name: string, value: number): Measurement =>
    Object.freeze({ date, region_id, region_name, value });

const a = m('2019/06/01', 101, 'Kingsbridge', 7.1);
const b = m('2019/06/01', 102, 'Northeast Bronx', 8.3);
const c = m('2019/07/01', 101, 'Kingsbridge', 6.4);

const byRegionId = new Map<number, Measurement[]>([[101, [a, c]], [102, [b]]]);
const byDate = new Map<string, Measurement[]>([['2019/06/01', [a, b]], ['2019/07/01', [c]]]);
const postalToRegionIds = new Map<string, number[]>([['10463', [102, 101]], ['10471', [101, 999]]]);
const areaToRegionIds = new Map<string, number[]>([['Bronx', [101, 102]]]);

describe('searchByPostal', () => {
    it('concatenates measurements in region-id order', () => {
        expect(searchByPostal('10463', postalToRegionIds, byRegionId)).toEqual([b, a, c]);
    });

    it('accepts numeric input and skips ids without measurements', () => {
        expect(searchByPostal(10471, postalToRegionIds, byRegionId)).toEqual([a, c]);
    });

    it('returns nothing for an unknown code', () => {
        expect(searchByPostal('99999', postalToRegionIds, byRegionId)).toEqual([]);
    });
});

describe('searchByRegionId', () => {
    it('parses the id text', () => {
        expect(searchByRegionId(' 101 ', byRegionId)).toEqual([a, c]);
    });

    it('returns nothing for unparseable or unknown ids', () => {
        expect(searchByRegionId('abc', byRegionId)).toEqual([]);
        expect(searchByRegionId('555', byRegionId)).toEqual([]);
    });

    it('returns a copy of the index bucket', () => {
        const result = searchByRegionId('101', byRegionId);
        result.pop();
        expect(byRegionId.get(101)).toEqual([a, c]);
    });
});

describe('searchByArea', () => {
    it('normalizes the borough name', () => {
        expect(searchByArea('  bronx ', areaToRegionIds, byRegionId)).toEqual([a, c, b]);
        expect(searchByArea('BRONX', areaToRegionIds, byRegionId)).toEqual([a, c, b]);
    });

    it('returns nothing for an unknown borough', () => {
        expect(searchByArea('Queens', areaToRegionIds, byRegionId)).toEqual([]);
    });
});

describe('searchByDate', () => {
    it('matches the trimmed text exactly', () => {
        expect(searchByDate(' 2019/06/01 ', byDate)).toEqual([a, b]);
        expect(searchByDate('2019/6/1', byDate)).toEqual([]);
    });
});

describe('loaded data', () => {
    it('answers postal and borough searches across both files', () => {
        const measurements = loadMeasurements(writeTempFile('aq.csv', '205,Sunset Park,2009/06/01,11.45\n'));
        const geography = loadGeography(writeTempFile('uhf.csv', 'Brooklyn,UHF42,205,11232\n'));
        const expected = [{ date: '2009/06/01', region_id: 205, region_name: 'Sunset Park', value: 11.45 }];

        expect(searchByPostal('11232', geography.postalToRegionIds, measurements.byRegionId)).toEqual(expected);
        expect(searchByArea('brooklyn', geography.areaToRegionIds, measurements.byRegionId)).toEqual(expected);
    });
});
