export type Measurement = Readonly<{
    date: string;
    region_id: number;
    region_name: string;
    value: number;
}>;

export type Delimiter = ',' | ';' | '\t' | '|';

export type MeasurementIndexes = {
    byRegionId: Map<number, Measurement[]>;
    byDate: Map<string, Measurement[]>;
};

export type GeographyIndexes = {
    postalToRegionIds: Map<string, number[]>;
    areaToRegionIds: Map<string, number[]>;
};

export type Indexes = MeasurementIndexes & GeographyIndexes;

export type SearchKind = 'zip' | 'uhf' | 'borough' | 'date';

export type DataSource = 'measurements' | 'geography';

export enum RejectionReason {
    TOO_FEW_CELLS = 'TOO_FEW_CELLS',
    INVALID_REGION_ID = 'INVALID_REGION_ID',
    MISSING_NAME = 'MISSING_NAME',
    MISSING_DATE = 'MISSING_DATE',
    INVALID_VALUE = 'INVALID_VALUE',
    NO_REGION_CODE = 'NO_REGION_CODE',
}

export type RowRejection = {
    source: DataSource;
    record: number; // 1-based position among tokenized rows
    reason: RejectionReason;
};

export interface LoadOptions {
    /** Opt-in channel for rows the loader drops. Loading behaves the same without it. */
    onRowRejected?: (rejection: RowRejection) => void;
}
