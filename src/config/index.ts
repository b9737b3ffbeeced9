/**
 * Environment configuration, validated with zod.
 * The parsed AppConfig is passed explicitly into every stage; nothing reads it globally.
 */

import { z } from 'zod';
import * as dotenv from 'dotenv';
import { ConfigurationError } from '../utils/errors';
import { LoggerOptions } from '../utils/logger';
import { RetryPolicy } from '../utils/retry';

dotenv.config();

const DEFAULT_USER_AGENT =
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0.0.0 Safari/537.36';

const ConfigSchema = z.object({
    // 🌐 Endpoints
    SITE_BASE_URL: z.string().url().default('https://www.anytimemailbox.com'),
    SMARTY_API_URL: z.string().url().default('https://us-street.api.smarty.com/street-address'),

    // 📁 Files
    OUTPUT_DIR: z.string().min(1).default('Public'),
    CREDENTIALS_FILE: z.string().min(1).default('smarty_api_key.txt'),

    // ⚙️ Network behaviour
    USER_AGENT: z.string().min(1).default(DEFAULT_USER_AGENT),
    REQUEST_TIMEOUT_MS: z.coerce.number().int().min(1000).max(120000).default(10000),
    REQUEST_DELAY_MS: z.coerce.number().int().min(0).max(60000).default(500),
    VERIFY_DELAY_MS: z.coerce.number().int().min(0).max(60000).default(50),
    RETRY_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
    RETRY_DELAY_MS: z.coerce.number().int().min(0).max(60000).default(1000),

    // 📄 Lister
    LISTER_MAX_PAGES: z.coerce.number().int().min(1).max(10000).default(200),
    STATE_CONCURRENCY: z.coerce.number().int().min(1).max(10).default(1),

    // 📝 Logging
    LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
    LOG_DIR: z.string().min(1).default('logs'),
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type EnvConfig = z.infer<typeof ConfigSchema>;

export interface AppConfig {
    siteBaseUrl: string;
    smartyApiUrl: string;
    outputDir: string;
    credentialsFile: string;
    userAgent: string;
    requestTimeoutMs: number;
    requestDelayMs: number;
    verifyDelayMs: number;
    retry: RetryPolicy;
    listerMaxPages: number;
    stateConcurrency: number;
    logLevel: EnvConfig['LOG_LEVEL'];
    logDir: string;
    nodeEnv: EnvConfig['NODE_ENV'];
}

/**
 * Parses the given environment. Throws ConfigurationError listing every bad key.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const result = ConfigSchema.safeParse(env);

    if (!result.success) {
        const details = result.error.issues
            .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new ConfigurationError(`Invalid configuration: ${details}`);
    }

    const c = result.data;
    return {
        siteBaseUrl: c.SITE_BASE_URL.replace(/\/+$/, ''),
        smartyApiUrl: c.SMARTY_API_URL,
        outputDir: c.OUTPUT_DIR,
        credentialsFile: c.CREDENTIALS_FILE,
        userAgent: c.USER_AGENT,
        requestTimeoutMs: c.REQUEST_TIMEOUT_MS,
        requestDelayMs: c.REQUEST_DELAY_MS,
        verifyDelayMs: c.VERIFY_DELAY_MS,
        retry: { attempts: c.RETRY_ATTEMPTS, delayMs: c.RETRY_DELAY_MS },
        listerMaxPages: c.LISTER_MAX_PAGES,
        stateConcurrency: c.STATE_CONCURRENCY,
        logLevel: c.LOG_LEVEL,
        logDir: c.LOG_DIR,
        nodeEnv: c.NODE_ENV,
    };
}

/** Logging settings; tests run silent and without a log file. */
export function loggerOptions(config: AppConfig): LoggerOptions {
    const silent = config.nodeEnv === 'test';
    return {
        level: config.logLevel,
        dir: silent ? undefined : config.logDir,
        silent,
    };
}
