/**
 * Error taxonomy shared by every stage.
 * Row-level problems are counted, target/file-level ones abort that target only.
 */

import axios from 'axios';

export class HarvesterError extends Error {
    constructor(message: string, public code: string, public context?: Record<string, unknown>) {
        super(message);
        this.name = this.constructor.name;
        Error.captureStackTrace(this, this.constructor);
    }
}

export class InvalidInputError extends HarvesterError {
    constructor(message: string, context?: Record<string, unknown>, code: string = 'INVALID_INPUT') {
        super(message, code, context);
    }
}

export class InvalidTargetError extends InvalidInputError {
    constructor(public target: string) {
        super(`Unknown state target "${target}". Use a state slug (e.g. new-york), a state abbreviation, or "all".`, { target }, 'INVALID_TARGET');
    }
}

export class MissingCredentialsError extends HarvesterError {
    constructor(message: string, public source?: string) {
        super(message, 'MISSING_CREDENTIALS', { source });
    }
}

export class ConfigurationError extends HarvesterError {
    constructor(message: string) {
        super(message, 'CONFIG_ERROR', { fatal: true });
    }
}

export class TransientNetworkError extends HarvesterError {
    constructor(message: string, public url: string, public status?: number) {
        super(message, 'TRANSIENT_NETWORK', { url, status });
    }
}

export class HttpStatusError extends HarvesterError {
    constructor(message: string, public url: string, public status: number, code: string = 'HTTP_STATUS') {
        super(message, code, { url, status });
    }
}

export class CredentialsRejectedError extends HttpStatusError {
    constructor(url: string, status: number) {
        super(`Validation API rejected the credentials (HTTP ${status})`, url, status, 'CREDENTIALS_REJECTED');
    }
}

const TRANSIENT_STATUSES = new Set([408, 425, 429]);

export function isTransientStatus(status: number): boolean {
    return TRANSIENT_STATUSES.has(status) || status >= 500;
}

/**
 * Normalizes whatever axios threw into the taxonomy above.
 */
export function toHttpError(error: unknown, url: string): HarvesterError {
    if (error instanceof HarvesterError) return error;

    if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        if (status === undefined) {
            return new TransientNetworkError(`Request to ${url} failed: ${error.code ?? error.message}`, url);
        }
        if (isTransientStatus(status)) {
            return new TransientNetworkError(`Request to ${url} returned HTTP ${status}`, url, status);
        }
        return new HttpStatusError(`Request to ${url} returned HTTP ${status}`, url, status);
    }

    const message = error instanceof Error ? error.message : String(error);
    return new TransientNetworkError(`Request to ${url} failed: ${message}`, url);
}

export function isTransientError(error: unknown): boolean {
    return error instanceof TransientNetworkError;
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
