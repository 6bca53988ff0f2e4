import { Measurement } from '../../types';
import { Normalizer } from '../normalizer';

export type RegionIdIndex = ReadonlyMap<number, readonly Measurement[]>;
export type RegionIdLookup<K> = ReadonlyMap<K, readonly number[]>;

function collect(regionIds: readonly number[] | undefined, byRegionId: RegionIdIndex): Measurement[] {
    const out: Measurement[] = [];
    for (const id of regionIds ?? []) {
        out.push(...(byRegionId.get(id) ?? []));
    }
    return out;
}

/** Measurements of every region the postal code maps to, region by region. */
export function searchByPostal(
    code: string | number,
    postalToRegionIds: RegionIdLookup<string>,
    byRegionId: RegionIdIndex
): Measurement[] {
    return collect(postalToRegionIds.get(String(code).trim()), byRegionId);
}

export function searchByRegionId(idText: string | number, byRegionId: RegionIdIndex): Measurement[] {
    const id = Normalizer.toInt(idText);
    if (id === null) return [];
    return [...(byRegionId.get(id) ?? [])];
}

export function searchByArea(
    name: string,
    areaToRegionIds: RegionIdLookup<string>,
    byRegionId: RegionIdIndex
): Measurement[] {
    return collect(areaToRegionIds.get(Normalizer.normalizeArea(name)), byRegionId);
}

/** Exact match on the trimmed text; "2019/6/1" does not find "2019/06/01". */
export function searchByDate(dateText: string, byDate: ReadonlyMap<string, readonly Measurement[]>): Measurement[] {
    return [...(byDate.get(dateText.trim()) ?? [])];
}
