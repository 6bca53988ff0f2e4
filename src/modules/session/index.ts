import { Indexes, LoadOptions, Measurement, SearchKind } from '../../types';
import { formatSummary } from '../formatter';
import { loadGeography } from '../geography';
import { loadMeasurements } from '../measurements';
import { searchByArea, searchByDate, searchByPostal, searchByRegionId } from '../query';

export interface DataPaths {
    measurementsPath: string;
    geographyPath: string;
}

const SEARCH_CHOICES: Record<string, SearchKind> = {
    '1': 'zip',
    'zip': 'zip',
    '2': 'uhf',
    'uhf': 'uhf',
    '3': 'borough',
    'borough': 'borough',
    '4': 'date',
    'date': 'date',
};

const QUIT_COMMANDS = new Set(['q', 'quit', 'exit']);

export function parseSearchKind(choice: string): SearchKind | undefined {
    const key = choice.trim().toLowerCase();
    return Object.prototype.hasOwnProperty.call(SEARCH_CHOICES, key) ? SEARCH_CHOICES[key] : undefined;
}

export function isQuitCommand(choice: string): boolean {
    return QUIT_COMMANDS.has(choice.trim().toLowerCase());
}

/**
 * The four indexes, built once from both files and only read afterwards.
 */
export class Session {
    private constructor(private readonly indexes: Indexes) { }

    static load(paths: DataPaths, options: LoadOptions = {}): Session {
        const { byRegionId, byDate } = loadMeasurements(paths.measurementsPath, options);
        const { postalToRegionIds, areaToRegionIds } = loadGeography(paths.geographyPath, options);
        return new Session({ byRegionId, byDate, postalToRegionIds, areaToRegionIds });
    }

    get summary(): string {
        return formatSummary(this.indexes);
    }

    search(kind: SearchKind, term: string): Measurement[] {
        switch (kind) {
            case 'zip':
                return searchByPostal(term, this.indexes.postalToRegionIds, this.indexes.byRegionId);
            case 'uhf':
                return searchByRegionId(term, this.indexes.byRegionId);
            case 'borough':
                return searchByArea(term, this.indexes.areaToRegionIds, this.indexes.byRegionId);
            case 'date':
                return searchByDate(term, this.indexes.byDate);
        }
    }
}
