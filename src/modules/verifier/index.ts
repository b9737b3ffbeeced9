import fs from 'fs';
import path from 'path';
import { AppConfig } from '../../config';
import { EnrichedAddressRecord, FailureCategory, StageSummary, VerifiedAddressRecord } from '../../types';
import { CredentialsRejectedError, InvalidInputError, isTransientError } from '../../utils/errors';
import { Logger } from '../../utils/logger';
import { deriveOutputPath, hasSuffix, VERIFIED_SUFFIX } from '../../utils/paths';
import { RetryPolicy, sleep, withRetry } from '../../utils/retry';
import { categorizeFailure, createSummary, formatSummary, recordFailure } from '../../utils/summary';
import { loadResumeKeys, readAddressSheet, takeResumed } from '../ingestor';
import { AddressCsvWriter, CMRA_HEADER, RDI_HEADER, SheetLayout } from '../writer';
import { loadCredentials, resolveCredentialsPath } from './credentials';
import { AddressValidationClient, SmartyClient, UNKNOWN_RESULT, VerificationQuery, VerificationResult } from './smarty_client';

export interface VerifierOptions {
    retry: RetryPolicy;
    delayMs: number;
}

/**
 * Unit-level when the row carries a suite, street-level otherwise.
 */
export function buildQuery(record: EnrichedAddressRecord): VerificationQuery {
    const query: VerificationQuery = {
        street: record.street,
        city: record.city,
        state: record.state,
        zipcode: record.zip,
    };
    if (record.suite) {
        query.secondary = record.suite;
    }
    return query;
}

export function formatQueryAddress(query: VerificationQuery): string {
    const street = query.secondary ? `${query.street} ${query.secondary}` : query.street;
    return `${street}, ${query.city}, ${query.state} ${query.zipcode}`.trim();
}

export class AddressVerifier {
    constructor(private client: AddressValidationClient, private options: VerifierOptions) {}

    /**
     * Writes `<name>_verified.csv` beside the input with RDI and CMRA added.
     * Every input row yields one output row; only rejected credentials abort the file.
     */
    async verifyFile(inputPath: string): Promise<StageSummary> {
        const started = Date.now();
        assertVerifiableInput(inputPath);

        const outputPath = deriveOutputPath(inputPath, VERIFIED_SUFFIX);
        const summary = createSummary('verify', inputPath, outputPath);
        const sheet = readAddressSheet(inputPath);
        summary.total = sheet.rows.length;

        const done = loadResumeKeys(outputPath);
        Logger.info(`[Verify] Processing ${inputPath} -> ${outputPath}`, { stage: 'verify' });
        Logger.info(`[Verify] Schema: ${sheet.hasSuiteColumn ? 'detailed (unit-level where a suite is present)' : 'basic (street only)'}`, { stage: 'verify' });
        if (done.size > 0) {
            Logger.info(`[Verify] Resuming, ${done.size} id(s) already verified`, { stage: 'verify' });
        }

        // Stale RDI/CMRA columns are replaced by fresh ones right after the zip
        const layout = SheetLayout.fromHeaders(sheet.headers)
            .without([sheet.columns.rdi, sheet.columns.cmra])
            .insertAfter(sheet.columns.zip, [{ header: RDI_HEADER, key: 'rdi' }, { header: CMRA_HEADER, key: 'cmra' }]);

        const writer = new AddressCsvWriter(outputPath, layout.headers);
        writer.ensureHeader();

        for (const [idx, { record, cells }] of sheet.rows.entries()) {
            if (takeResumed(done, record.sourceId)) {
                summary.resumed++;
                continue;
            }

            const query = buildQuery(record);
            const result = await this.classify(query, summary);

            const verified: VerifiedAddressRecord = { ...record, rdi: result.rdi, cmra: result.cmra };
            writer.append([layout.row(cells, { rdi: verified.rdi, cmra: verified.cmra })]);
            summary.processed++;
            Logger.info(`[Verify] [${idx + 1}/${sheet.rows.length}] ${formatQueryAddress(query)} -> RDI: ${result.rdi}, CMRA: ${result.cmra}`, { stage: 'verify' });

            await sleep(this.options.delayMs);
        }

        summary.durationMs = Date.now() - started;
        Logger.info(formatSummary(summary), { stage: 'verify' });
        return summary;
    }

    private async classify(query: VerificationQuery, summary: StageSummary): Promise<VerificationResult> {
        if (!query.street || !query.city || !query.state) {
            recordFailure(summary, FailureCategory.PARSE_MISS);
            return UNKNOWN_RESULT;
        }

        try {
            const result = await withRetry(() => this.client.verify(query), {
                attempts: this.options.retry.attempts,
                delayMs: this.options.retry.delayMs,
                backoff: 'exponential',
                retryCondition: isTransientError,
                onRetry: (error, attempt, waitMs) => Logger.warn(
                    `[Verify] API call failed (attempt ${attempt}/${this.options.retry.attempts}), retrying in ${waitMs}ms`,
                    { stage: 'verify', error }
                ),
            });
            if (!result.matched) {
                recordFailure(summary, FailureCategory.PARSE_MISS);
            }
            return result;
        } catch (error) {
            if (error instanceof CredentialsRejectedError) throw error;
            recordFailure(summary, categorizeFailure(error));
            Logger.warn(`[Verify] Giving up on ${formatQueryAddress(query)}`, { stage: 'verify', error });
            return UNKNOWN_RESULT;
        }
    }
}

function assertVerifiableInput(inputPath: string): void {
    if (!fs.existsSync(inputPath)) {
        throw new InvalidInputError(`Input file ${inputPath} does not exist`, { file: inputPath });
    }
    if (hasSuffix(inputPath, VERIFIED_SUFFIX)) {
        throw new InvalidInputError(`${inputPath} is already verified`, { file: inputPath });
    }
}

/**
 * Full Verifier entry point: input check, then credentials, then the API.
 * Nothing is sent when either check fails.
 */
export async function runVerifier(inputPath: string, config: AppConfig, credentialsPath?: string): Promise<StageSummary> {
    assertVerifiableInput(inputPath);

    const resolved = credentialsPath ?? resolveCredentialsPath(config.credentialsFile, [process.cwd(), path.resolve(__dirname, '../../..')]);
    const credentials = loadCredentials(resolved, config.credentialsFile);

    const client = new SmartyClient(credentials, { apiUrl: config.smartyApiUrl, timeoutMs: config.requestTimeoutMs });
    const verifier = new AddressVerifier(client, { retry: config.retry, delayMs: config.verifyDelayMs });
    return verifier.verifyFile(inputPath);
}
