import path from 'path';
import pLimit from 'p-limit';
import { AddressRecord, BatchOutcome, BatchReport, FailureCategory, StageSummary } from '../../types';
import { errorMessage, HttpStatusError, isTransientError } from '../../utils/errors';
import { PageFetcher } from '../../utils/http_client';
import { Logger } from '../../utils/logger';
import { RetryPolicy, sleep, withRetry } from '../../utils/retry';
import { createSummary, formatSummary, recordFailure } from '../../utils/summary';
import { loadResumeKeys } from '../ingestor';
import { resolveTargets } from '../states';
import { AddressCsvWriter, BASIC_HEADERS, basicRow } from '../writer';
import { ListingPage, parseListingPage } from './parser';

export interface ListerOptions {
    siteBaseUrl: string;
    outputDir: string;
    retry: RetryPolicy;
    delayMs: number;
    maxPages: number;
    concurrency: number;
}

const EMPTY_PAGE: ListingPage = { listings: [], misses: 0 };

export class ListingScraper {
    constructor(private fetcher: PageFetcher, private options: ListerOptions) {}

    pageUrl(slug: string, page: number): string {
        const base = `${this.options.siteBaseUrl}/l/usa/${slug}`;
        return page > 1 ? `${base}?page=${page}` : base;
    }

    outputPath(slug: string): string {
        return path.join(this.options.outputDir, `${slug}.csv`);
    }

    /**
     * Scrapes a state slug, a state name/abbreviation, or every state for "all".
     * Throws InvalidTargetError before any request when the target is unknown.
     * A state that exhausts its retries is reported but does not stop its siblings.
     */
    async scrape(target: string): Promise<BatchReport> {
        const slugs = resolveTargets(target);
        const limit = pLimit(Math.max(1, this.options.concurrency));

        Logger.info(`Scraping ${slugs.length} state target(s) for "${target}"`, { stage: 'list' });

        const outcomes = await Promise.all(slugs.map((slug) => limit(async (): Promise<BatchOutcome> => {
            try {
                const summary = await this.scrapeState(slug);
                return { ok: true, input: slug, summary };
            } catch (error) {
                Logger.error(`[Lister] ${slug} aborted`, { stage: 'list', error });
                return { ok: false, input: slug, error: errorMessage(error) };
            }
        })));

        return { stage: 'list', outcomes };
    }

    /**
     * Walks the listing pages of one state until a page has no listings that
     * were not already seen in this run (confirmed by one refetch).
     */
    async scrapeState(slug: string): Promise<StageSummary> {
        const started = Date.now();
        const outputPath = this.outputPath(slug);
        const summary = createSummary('list', slug, outputPath);

        const known = loadResumeKeys(outputPath);
        if (known.size > 0) {
            Logger.info(`[Lister] Resuming ${slug}: ${known.size} listing(s) already in ${outputPath}`, { stage: 'list' });
        }

        const writer = new AddressCsvWriter(outputPath, BASIC_HEADERS);
        const seenThisRun = new Set<string>();
        let pages = 0;

        for (let page = 1; page <= this.options.maxPages; page++) {
            let result = await this.fetchPage(slug, page);
            let fresh = result.listings.filter((l) => !seenThisRun.has(l.sourceId));

            if (fresh.length === 0) {
                // Empty once may be a hiccup, empty twice is the end
                Logger.debug(`[Lister] ${slug} page ${page} empty, confirming`, { stage: 'list' });
                await sleep(this.options.delayMs);
                result = await this.fetchPage(slug, page);
                fresh = result.listings.filter((l) => !seenThisRun.has(l.sourceId));
                if (fresh.length === 0) break;
            }

            pages++;
            for (let i = 0; i < result.misses; i++) recordFailure(summary, FailureCategory.PARSE_MISS);

            const toWrite: AddressRecord[] = [];
            for (const listing of fresh) {
                seenThisRun.add(listing.sourceId);
                if (known.has(listing.sourceId)) {
                    summary.resumed++;
                } else {
                    toWrite.push(listing);
                }
            }
            writer.append(toWrite.map(basicRow));
            summary.processed += toWrite.length;

            Logger.info(`[Lister] ${slug} page ${page}: ${toWrite.length} new, ${fresh.length - toWrite.length} already saved, ${result.misses} unparsable`, { stage: 'list' });

            if (page === this.options.maxPages) {
                Logger.warn(`[Lister] ${slug} stopped at the page limit (${this.options.maxPages})`, { stage: 'list' });
                break;
            }
            await sleep(this.options.delayMs);
        }

        if (pages === 0) {
            Logger.warn(`[Lister] No locations found for ${slug}`, { stage: 'list' });
        }

        summary.pages = pages;
        summary.total = summary.processed + summary.resumed;
        summary.durationMs = Date.now() - started;
        Logger.info(formatSummary(summary), { stage: 'list' });
        return summary;
    }

    private async fetchPage(slug: string, page: number): Promise<ListingPage> {
        const url = this.pageUrl(slug, page);
        try {
            const response = await withRetry(() => this.fetcher.fetch(url), {
                attempts: this.options.retry.attempts,
                delayMs: this.options.retry.delayMs,
                backoff: 'exponential',
                retryCondition: isTransientError,
                onRetry: (error, attempt, waitMs) => Logger.warn(
                    `[Lister] ${url} failed (attempt ${attempt}/${this.options.retry.attempts}), retrying in ${waitMs}ms`,
                    { stage: 'list', url, error }
                ),
            });
            return parseListingPage(response.data, response.finalUrl);
        } catch (error) {
            if (error instanceof HttpStatusError && error.status === 404) {
                return EMPTY_PAGE;
            }
            throw error;
        }
    }
}
