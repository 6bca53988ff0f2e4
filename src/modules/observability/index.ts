import winston from 'winston';
import 'winston-daily-rotate-file';
import { DataSource, RejectionReason, RowRejection } from '../../types';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface LoggerOptions {
    level?: LogLevel;
    directory?: string;
}

const ALL_LEVELS: LogLevel[] = ['error', 'warn', 'info', 'debug'];

function buildTransports(options: LoggerOptions): winston.transport[] {
    // Query results go to stdout, so every log level goes to stderr.
    const transports: winston.transport[] = [
        new winston.transports.Console({
            format: winston.format.simple(),
            stderrLevels: ALL_LEVELS,
        }),
    ];

    if (options.directory) {
        transports.push(new winston.transports.DailyRotateFile({
            dirname: options.directory,
            filename: 'aq-lookup-%DATE%.log',
            datePattern: 'YYYY-MM-DD',
            zippedArchive: true,
            maxSize: '20m',
            maxFiles: '14d',
        }));
    }
    return transports;
}

export class Logger {
    private logger: winston.Logger;

    constructor(options: LoggerOptions = {}) {
        this.logger = winston.createLogger({
            level: options.level ?? 'info',
            format: winston.format.combine(
                winston.format.timestamp(),
                winston.format.json()
            ),
            transports: buildTransports(options),
        });
    }

    configure(options: LoggerOptions) {
        this.logger.configure({
            level: options.level ?? this.logger.level,
            format: winston.format.combine(
                winston.format.timestamp(),
                winston.format.json()
            ),
            transports: buildTransports(options),
        });
    }

    get level(): string {
        return this.logger.level;
    }

    log(level: LogLevel, message: string, meta?: Record<string, unknown>) {
        this.logger.log(level, message, meta);
    }

    debug(message: string, meta?: Record<string, unknown>) {
        this.log('debug', message, meta);
    }

    info(message: string, meta?: Record<string, unknown>) {
        this.log('info', message, meta);
    }

    warn(message: string, meta?: Record<string, unknown>) {
        this.log('warn', message, meta);
    }

    error(message: string, meta?: Record<string, unknown>) {
        this.log('error', message, meta);
    }
}

export const logger = new Logger({
    level: process.env.NODE_ENV === 'test' ? 'error' : 'info',
});

export type RejectionSummary = {
    total: number;
    by_reason: Partial<Record<RejectionReason, number>>;
};

/**
 * Tallies rows dropped during loading. Pass `tally.record` as `onRowRejected`.
 */
export class RejectionTally {
    private stats: Record<DataSource, RejectionSummary> = {
        measurements: { total: 0, by_reason: {} },
        geography: { total: 0, by_reason: {} },
    };

    record = (rejection: RowRejection): void => {
        const entry = this.stats[rejection.source];
        entry.total++;
        entry.by_reason[rejection.reason] = (entry.by_reason[rejection.reason] ?? 0) + 1;
    };

    getSummary(source: DataSource): RejectionSummary {
        const entry = this.stats[source];
        return { total: entry.total, by_reason: { ...entry.by_reason } };
    }

    report(log: Logger = logger) {
        for (const source of ['measurements', 'geography'] as const) {
            const summary = this.getSummary(source);
            log.info(`Rejected ${summary.total} ${source} row(s)`, { source, ...summary });
        }
    }
}
