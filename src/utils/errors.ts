/**
 * Error classes for the outer surface (config loading, CLI usage).
 * The loaders and queries never throw these.
 */

export class AppError extends Error {
    constructor(message: string, public code: string, public context?: Record<string, unknown>) {
        super(message);
        this.name = this.constructor.name;
        Error.captureStackTrace(this, this.constructor);
    }
}

export class ConfigurationError extends AppError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'CONFIG_ERROR', { fatal: true, ...context });
    }
}

export class UsageError extends AppError {
    constructor(message: string) {
        super(message, 'USAGE_ERROR', { fatal: true });
    }
}
