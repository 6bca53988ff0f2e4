const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export class Normalizer {

    /** Whole-cell integer parse; `null` when the trimmed cell is not an integer literal. */
    static toInt(cell: string | number): number | null {
        const s = String(cell).trim();
        if (!INTEGER_PATTERN.test(s)) return null;
        const value = Number.parseInt(s, 10);
        return Number.isSafeInteger(value) ? value : null;
    }

    static toFloat(cell: string | number): number | null {
        const s = String(cell).trim();
        if (!FLOAT_PATTERN.test(s)) return null;
        const value = Number(s);
        return Number.isFinite(value) ? value : null;
    }

    /**
     * Borough key: trimmed and title-cased, so " queens", "QUEENS" and "Queens"
     * collide. Every letter that follows a non-letter starts a new word.
     */
    static normalizeArea(name: string): string {
        return name
            .trim()
            .toLowerCase()
            .replace(/(^|[^\p{L}])(\p{L})/gu, (_match, before: string, letter: string) => before + letter.toUpperCase());
    }
}
