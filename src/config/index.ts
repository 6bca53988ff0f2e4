import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigurationError } from '../utils/errors';

const ConfigSchema = z.object({
    data: z.object({
        measurements: z.string().trim().min(1),
        geography: z.string().trim().min(1),
    }),
    logging: z.object({
        level: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
        directory: z.string().trim().min(1).nullish(),
    }).default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

export interface ConfigOverrides {
    measurements?: string;
    geography?: string;
    logLevel?: string;
    logDirectory?: string;
}

/** Global CLI flags, as commander hands them over. */
export interface CliOptions {
    measurements?: string;
    geography?: string;
    config?: string;
    logLevel?: string;
    logDir?: string;
    reportRejections?: boolean;
}

export function overridesFromCli(options: CliOptions): ConfigOverrides {
    return {
        measurements: options.measurements,
        geography: options.geography,
        logLevel: options.logLevel,
        logDirectory: options.logDir,
    };
}

export interface LoadConfigOptions {
    configPath?: string;
    overrides?: ConfigOverrides;
    env?: NodeJS.ProcessEnv;
    cwd?: string;
}

// Resolves to src/config from both src/config and dist/config.
export const DEFAULT_CONFIG_PATH = path.join(__dirname, '../../src/config/default.yaml');

type Section = Record<string, unknown>;

function isSection(value: unknown): value is Section {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function defined(values: Record<string, string | undefined>): Record<string, string> {
    const out: Record<string, string> = {};
    for (const [key, value] of Object.entries(values)) {
        if (value !== undefined && value !== '') out[key] = value;
    }
    return out;
}

function readConfigFile(configPath: string): Section {
    let contents: string;
    try {
        contents = fs.readFileSync(configPath, 'utf8');
    } catch {
        throw new ConfigurationError(`Config file not readable: ${configPath}`, { configPath });
    }

    let parsed: unknown;
    try {
        parsed = yaml.load(contents);
    } catch (e) {
        const reason = e instanceof Error ? e.message : String(e);
        throw new ConfigurationError(`Config file is not valid YAML: ${configPath}`, { configPath, reason });
    }

    if (parsed === undefined || parsed === null) return {};
    if (!isSection(parsed)) {
        throw new ConfigurationError(`Config file must hold a mapping: ${configPath}`, { configPath });
    }
    return parsed;
}

/**
 * Layers YAML defaults, then environment variables, then explicit overrides,
 * and validates the result. Data paths come back absolute.
 */
export const loadConfig = (options: LoadConfigOptions = {}): Config => {
    const configPath = options.configPath ?? DEFAULT_CONFIG_PATH;
    const env = options.env ?? process.env;
    const overrides = options.overrides ?? {};
    const cwd = options.cwd ?? process.cwd();

    const file = readConfigFile(configPath);
    const data = isSection(file.data) ? file.data : {};
    const logging = isSection(file.logging) ? file.logging : {};

    const merged = {
        data: {
            ...data,
            ...defined({ measurements: env.AQ_MEASUREMENTS_FILE, geography: env.AQ_GEOGRAPHY_FILE }),
            ...defined({ measurements: overrides.measurements, geography: overrides.geography }),
        },
        logging: {
            ...logging,
            ...defined({ level: env.LOG_LEVEL, directory: env.LOG_DIR }),
            ...defined({ level: overrides.logLevel, directory: overrides.logDirectory }),
        },
    };

    const result = ConfigSchema.safeParse(merged);
    if (!result.success) {
        const problems = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
        throw new ConfigurationError(`Invalid configuration: ${problems.join('; ')}`, { configPath, problems });
    }

    const config = result.data;
    return {
        ...config,
        data: {
            measurements: path.resolve(cwd, config.data.measurements),
            geography: path.resolve(cwd, config.data.geography),
        },
    };
};
