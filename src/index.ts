export * from './types';
export { detectDelimiter, sniffSample, DEFAULT_DELIMITER } from './modules/sniffer';
export { readRows } from './modules/tokenizer';
export { Normalizer } from './modules/normalizer';
export { loadMeasurements } from './modules/measurements';
export { loadGeography, detectLayout, expandRegionCode, extractPostalCodes } from './modules/geography';
export type { GeographyLayout, HeaderLayout, PositionalLayout } from './modules/geography';
export { searchByPostal, searchByRegionId, searchByArea, searchByDate } from './modules/query';
export { formatFixed, formatMeasurement, formatResults, formatSummary } from './modules/formatter';
export { Session, parseSearchKind, isQuitCommand } from './modules/session';
export type { DataPaths } from './modules/session';
export { runShell } from './modules/shell';
export { loadConfig, overridesFromCli } from './config';
export type { CliOptions, Config, ConfigOverrides, LoadConfigOptions } from './config';
export { logger, Logger, RejectionTally } from './modules/observability';
export { AppError, ConfigurationError, UsageError } from './utils/errors';
