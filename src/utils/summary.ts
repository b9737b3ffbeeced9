import { BatchReport, FailureCategory, StageName, StageSummary } from '../types';
import { HttpStatusError, isTransientError } from './errors';

export function createSummary(stage: StageName, input: string, output: string): StageSummary {
    return {
        stage,
        input,
        output,
        total: 0,
        processed: 0,
        resumed: 0,
        failures: {
            [FailureCategory.NETWORK]: 0,
            [FailureCategory.HTTP]: 0,
            [FailureCategory.PARSE_MISS]: 0,
        },
        durationMs: 0,
    };
}

export function recordFailure(summary: StageSummary, category: FailureCategory): void {
    summary.failures[category]++;
}

export function categorizeFailure(error: unknown): FailureCategory {
    if (isTransientError(error)) return FailureCategory.NETWORK;
    if (error instanceof HttpStatusError) return FailureCategory.HTTP;
    return FailureCategory.NETWORK;
}

export function formatSummary(summary: StageSummary): string {
    const f = summary.failures;
    const pages = summary.pages !== undefined ? `, pages ${summary.pages}` : '';
    return `[${summary.stage}] ${summary.input} -> ${summary.output}: ` +
        `processed ${summary.processed}, resumed ${summary.resumed}${pages}, ` +
        `failed network ${f.network} / http ${f.http} / parse_miss ${f.parse_miss} ` +
        `(${summary.durationMs}ms)`;
}

export function failedOutcomes(report: BatchReport): number {
    return report.outcomes.filter((o) => !o.ok).length;
}
