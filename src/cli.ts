#!/usr/bin/env node
import { Command } from 'commander';
import dotenv from 'dotenv';
import { CliOptions, loadConfig, overridesFromCli } from './config';
import { formatResults } from './modules/formatter';
import { logger, RejectionTally } from './modules/observability';
import { parseSearchKind, Session } from './modules/session';
import { runShell } from './modules/shell';
import { AppError, UsageError } from './utils/errors';

dotenv.config();

const program = new Command();

program
    .name('aq-lookup')
    .description('Look up air-quality measurements by zip code, UHF id, borough or date')
    .version('1.0.0')
    .option('-m, --measurements <path>', 'Measurement CSV (UHF id, name, date, value)')
    .option('-g, --geography <path>', 'UHF mapping CSV (borough, UHF code, zip codes)')
    .option('-c, --config <path>', 'Path to custom config YAML')
    .option('--log-level <level>', 'error | warn | info | debug')
    .option('--log-dir <path>', 'Also write rotating log files to this directory')
    .option('--report-rejections', 'Log how many rows each file dropped, by reason');

function openSession(): Session {
    const options = program.opts<CliOptions>();
    const config = loadConfig({
        configPath: options.config,
        overrides: overridesFromCli(options),
    });
    logger.configure({ level: config.logging.level, directory: config.logging.directory ?? undefined });

    const tally = options.reportRejections ? new RejectionTally() : null;
    const session = Session.load(
        { measurementsPath: config.data.measurements, geographyPath: config.data.geography },
        { onRowRejected: tally?.record }
    );
    tally?.report();
    return session;
}

function fail(e: unknown) {
    if (e instanceof AppError) {
        logger.error(e.message, { code: e.code, ...e.context });
    } else {
        logger.error('Fatal Error', { error_message: e instanceof Error ? e.message : String(e) });
    }
    process.exitCode = 1;
}

program
    .command('shell', { isDefault: true })
    .description('Interactive search menu')
    .action(async () => {
        try {
            console.log('Loading data...');
            const session = openSession();
            console.log('Loaded.');
            console.log(session.summary);
            await runShell(session);
        } catch (e) {
            fail(e);
        }
    });

program
    .command('search')
    .description('Run one search and print the matching records')
    .argument('<kind>', 'zip | uhf | borough | date (or 1-4)')
    .argument('<term>', 'Value to look up')
    .action((kindText: string, term: string) => {
        try {
            const kind = parseSearchKind(kindText);
            if (!kind) throw new UsageError(`Unknown search type "${kindText}". Use zip, uhf, borough or date.`);
            const session = openSession();
            for (const line of formatResults(session.search(kind, term))) console.log(line);
        } catch (e) {
            fail(e);
        }
    });

program
    .command('stats')
    .description('Load both files and print index sizes')
    .action(() => {
        try {
            console.log(openSession().summary);
        } catch (e) {
            fail(e);
        }
    });

program.parseAsync(process.argv).catch(fail);
