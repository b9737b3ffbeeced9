#!/usr/bin/env node
import { Command } from 'commander';
import path from 'path';
import { AppConfig, loadConfig, loggerOptions } from './config';
import { DetailEnricher } from './modules/detail';
import { ListingScraper } from './modules/lister';
import { runVerifier } from './modules/verifier';
import { BatchReport } from './types';
import { errorMessage, HarvesterError } from './utils/errors';
import { HttpClient } from './utils/http_client';
import { Logger } from './utils/logger';
import { failedOutcomes, formatSummary } from './utils/summary';

function reportBatch(report: BatchReport): void {
    for (const outcome of report.outcomes) {
        if (outcome.ok) {
            console.log(formatSummary(outcome.summary));
        } else {
            console.log(`[${report.stage}] ${outcome.input}: FAILED (${outcome.error})`);
        }
    }
    const failed = failedOutcomes(report);
    console.log(`[${report.stage}] ${report.outcomes.length - failed}/${report.outcomes.length} completed`);
    if (failed > 0) process.exitCode = 1;
}

async function runCommand(action: (config: AppConfig) => Promise<void>): Promise<void> {
    try {
        const config = loadConfig();
        Logger.configure(loggerOptions(config));
        await action(config);
    } catch (e) {
        const code = e instanceof HarvesterError ? e.code : 'UNEXPECTED';
        Logger.error(`Fatal Error [${code}]: ${errorMessage(e)}`, { error: e });
        process.exitCode = 1;
    }
}

function httpClient(config: AppConfig): HttpClient {
    return new HttpClient({ timeoutMs: config.requestTimeoutMs, userAgent: config.userAgent });
}

const program = new Command();

program
    .name('mailbox-harvester')
    .description('Scrape mailbox locations, add suite numbers and classify delivery points')
    .version('1.0.0');

program
    .command('list')
    .description('Scrape location listings for a state (slug, name or abbreviation) or "all"')
    .requiredOption('-i, --input <target>', 'State slug (e.g. new-york) or "all"/"us" for every state')
    .option('-o, --output-dir <dir>', 'Directory for <state>.csv files (default: OUTPUT_DIR)')
    .action((options: { input: string; outputDir?: string }) => runCommand(async (config) => {
        const scraper = new ListingScraper(httpClient(config), {
            siteBaseUrl: config.siteBaseUrl,
            outputDir: path.resolve(options.outputDir ?? config.outputDir),
            retry: config.retry,
            delayMs: config.requestDelayMs,
            maxPages: config.listerMaxPages,
            concurrency: config.stateConcurrency,
        });
        reportBatch(await scraper.scrape(options.input));
    }));

program
    .command('detail')
    .description('Add the Suite/Apartment column from each listing detail page')
    .option('-i, --input <path>', 'Input CSV file')
    .option('-f, --folder <dir>', 'Folder whose CSV files are all processed')
    .action((options: { input?: string; folder?: string }) => runCommand(async (config) => {
        if (Boolean(options.input) === Boolean(options.folder)) {
            program.error('detail: pass exactly one of --input or --folder', { exitCode: 1 });
        }

        const enricher = new DetailEnricher(httpClient(config), {
            siteBaseUrl: config.siteBaseUrl,
            retry: config.retry,
            delayMs: config.requestDelayMs,
        });

        if (options.input) {
            console.log(formatSummary(await enricher.enrichFile(path.resolve(options.input))));
        } else if (options.folder) {
            reportBatch(await enricher.enrichFolder(path.resolve(options.folder)));
        }
    }));

program
    .command('verify')
    .description('Add RDI and CMRA columns using the Smarty US Street API')
    .requiredOption('-i, --input <path>', 'Input CSV file (basic or _detailed)')
    .option('-c, --credentials <path>', 'Credentials file with auth_id/auth_token lines')
    .action((options: { input: string; credentials?: string }) => runCommand(async (config) => {
        const credentialsPath = options.credentials ? path.resolve(options.credentials) : undefined;
        console.log(formatSummary(await runVerifier(path.resolve(options.input), config, credentialsPath)));
    }));

program.parseAsync(process.argv).catch((e: unknown) => {
    console.error('Fatal Error:', errorMessage(e));
    process.exit(1);
});
