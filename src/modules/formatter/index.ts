import { Indexes, Measurement } from '../../types';

/**
 * Fixed-point text rounded half to even on the exact binary value, so 8.125
 * gives "8.12" and 2.675 (stored as 2.67499...) gives "2.67". Never switches
 * to exponent notation.
 */
export function formatFixed(value: number, digits = 2): string {
    if (!Number.isFinite(value)) return String(value);
    const sign = value < 0 || Object.is(value, -0) ? '-' : '';
    const magnitude = Math.abs(value);

    // Every double at or above 1e21 is an integer.
    if (magnitude >= 1e21) {
        return `${sign}${BigInt(magnitude).toString()}${digits > 0 ? '.' + '0'.repeat(digits) : ''}`;
    }

    const [whole, fraction] = magnitude.toFixed(100).split('.');
    const kept = whole + fraction.slice(0, digits);
    const rest = fraction.slice(digits);

    let roundUp = rest[0] > '5' || (rest[0] === '5' && /[1-9]/.test(rest.slice(1)));
    if (rest[0] === '5' && !roundUp) {
        roundUp = Number(kept[kept.length - 1]) % 2 === 1;
    }

    const scaled = (BigInt(kept) + (roundUp ? 1n : 0n)).toString().padStart(digits + 1, '0');
    if (digits === 0) return sign + scaled;
    return `${sign}${scaled.slice(0, -digits)}.${scaled.slice(-digits)}`;
}

export function formatMeasurement(m: Measurement): string {
    return `${m.date} UHF ${m.region_id} ${m.region_name} ${formatFixed(m.value)} mcg/m^3`;
}

export function formatResults(results: readonly Measurement[]): string[] {
    if (results.length === 0) return ['No matching records.'];
    return [...results.map(formatMeasurement), '', `Returned ${results.length} measurements.`];
}

export function formatSummary(indexes: Indexes): string {
    let records = 0;
    for (const bucket of indexes.byRegionId.values()) records += bucket.length;
    return [
        `Records: ${records}`,
        `UHF ids: ${indexes.byRegionId.size}`,
        `Dates: ${indexes.byDate.size}`,
        `Zip codes: ${indexes.postalToRegionIds.size}`,
        `Boroughs: ${indexes.areaToRegionIds.size}`,
    ].join(' | ');
}
