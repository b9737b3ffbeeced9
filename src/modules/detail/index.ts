import fs from 'fs';
import path from 'path';
import { BatchOutcome, BatchReport, EnrichedAddressRecord, FailureCategory, StageSummary } from '../../types';
import { errorMessage, InvalidInputError, isTransientError } from '../../utils/errors';
import { PageFetcher } from '../../utils/http_client';
import { Logger } from '../../utils/logger';
import { DETAILED_SUFFIX, deriveOutputPath, hasSuffix, VERIFIED_SUFFIX } from '../../utils/paths';
import { RetryPolicy, sleep, withRetry } from '../../utils/retry';
import { categorizeFailure, createSummary, formatSummary, recordFailure } from '../../utils/summary';
import { loadResumeKeys, readAddressSheet, takeResumed } from '../ingestor';
import { AddressCsvWriter, SheetLayout, SUITE_HEADER } from '../writer';
import { extractSuite, isRedirectedAway, resolveDetailUrl } from './suite_extractor';

export interface DetailOptions {
    siteBaseUrl: string;
    retry: RetryPolicy;
    delayMs: number;
}

const SKIPPED_MARKERS = [DETAILED_SUFFIX, VERIFIED_SUFFIX, '_updated'];

export class DetailEnricher {
    constructor(private fetcher: PageFetcher, private options: DetailOptions) {}

    /**
     * Every CSV in `dirPath` that is not already a stage output, in name order.
     */
    static listEligibleFiles(dirPath: string): string[] {
        return fs.readdirSync(dirPath)
            .filter((name) => name.toLowerCase().endsWith('.csv'))
            .filter((name) => !SKIPPED_MARKERS.some((marker) => path.parse(name).name.toLowerCase().includes(marker)))
            .sort()
            .map((name) => path.join(dirPath, name));
    }

    async enrichFolder(dirPath: string): Promise<BatchReport> {
        if (!fs.existsSync(dirPath) || !fs.statSync(dirPath).isDirectory()) {
            throw new InvalidInputError(`Folder not found: ${dirPath}`, { folder: dirPath });
        }

        const files = DetailEnricher.listEligibleFiles(dirPath);
        Logger.info(`[Detail] Found ${files.length} address file(s) in ${dirPath}`, { stage: 'detail' });

        const outcomes: BatchOutcome[] = [];
        for (const file of files) {
            try {
                outcomes.push({ ok: true, input: file, summary: await this.enrichFile(file) });
            } catch (error) {
                Logger.error(`[Detail] ${file} failed`, { stage: 'detail', file, error });
                outcomes.push({ ok: false, input: file, error: errorMessage(error) });
            }
        }
        return { stage: 'detail', outcomes };
    }

    /**
     * Writes `<name>_detailed.csv` beside the input: one output row per input row.
     */
    async enrichFile(inputPath: string): Promise<StageSummary> {
        const started = Date.now();
        if (!fs.existsSync(inputPath)) {
            throw new InvalidInputError(`Input file not found: ${inputPath}`, { file: inputPath });
        }
        if (hasSuffix(inputPath, DETAILED_SUFFIX) || hasSuffix(inputPath, VERIFIED_SUFFIX)) {
            throw new InvalidInputError(`${inputPath} is already a stage output`, { file: inputPath });
        }

        const outputPath = deriveOutputPath(inputPath, DETAILED_SUFFIX);
        const summary = createSummary('detail', inputPath, outputPath);
        const sheet = readAddressSheet(inputPath);
        summary.total = sheet.rows.length;

        const done = loadResumeKeys(outputPath);
        if (done.size > 0) {
            Logger.info(`[Detail] Resuming from ${outputPath} (${done.size} id(s) done)`, { stage: 'detail' });
        }
        Logger.info(`[Detail] Processing ${inputPath} -> ${outputPath}`, { stage: 'detail' });

        // An existing suite column is filled in place, otherwise one is added after the street
        const base = SheetLayout.fromHeaders(sheet.headers);
        const layout = sheet.columns.suite !== undefined
            ? base.fill(sheet.columns.suite, 'suite')
            : base.insertAfter(sheet.columns.street, [{ header: SUITE_HEADER, key: 'suite' }]);

        const writer = new AddressCsvWriter(outputPath, layout.headers);
        writer.ensureHeader();

        for (const [idx, { record, cells }] of sheet.rows.entries()) {
            if (takeResumed(done, record.sourceId)) {
                summary.resumed++;
                continue;
            }

            let suite = record.suite;
            const url = suite ? undefined : resolveDetailUrl(record.detailUrl, this.options.siteBaseUrl);
            if (url) {
                suite = await this.lookupSuite(url, record, summary);
            }

            writer.append([layout.row(cells, { suite })]);
            summary.processed++;
            Logger.info(`[Detail] [${idx + 1}/${sheet.rows.length}] ${record.street}, ${record.city} -> ${suite ?? 'no unit'}`, { stage: 'detail' });

            if (url) await sleep(this.options.delayMs);
        }

        summary.durationMs = Date.now() - started;
        Logger.info(formatSummary(summary), { stage: 'detail' });
        return summary;
    }

    private async lookupSuite(url: string, record: EnrichedAddressRecord, summary: StageSummary): Promise<string | undefined> {
        try {
            const page = await withRetry(() => this.fetcher.fetch(url), {
                attempts: this.options.retry.attempts,
                delayMs: this.options.retry.delayMs,
                backoff: 'exponential',
                retryCondition: isTransientError,
                onRetry: (error, attempt, waitMs) => Logger.warn(
                    `[Detail] ${url} failed (attempt ${attempt}/${this.options.retry.attempts}), retrying in ${waitMs}ms`,
                    { stage: 'detail', url, error }
                ),
            });

            if (isRedirectedAway(page.finalUrl, this.options.siteBaseUrl)) {
                Logger.warn(`[Detail] ${url} redirected to ${page.finalUrl}`, { stage: 'detail', source_id: record.sourceId });
                recordFailure(summary, FailureCategory.PARSE_MISS);
                return undefined;
            }

            const suite = extractSuite(page.data);
            if (!suite) {
                recordFailure(summary, FailureCategory.PARSE_MISS);
            }
            return suite;
        } catch (error) {
            recordFailure(summary, categorizeFailure(error));
            Logger.warn(`[Detail] Could not fetch ${url}, keeping row without unit`, { stage: 'detail', source_id: record.sourceId, error });
            return undefined;
        }
    }
}
