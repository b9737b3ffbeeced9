/**
 * Structured logger.
 * Human readable lines on the console, JSON lines in a daily rotated file.
 */

import path from 'path';
import winston from 'winston';
import 'winston-daily-rotate-file';

export interface LogContext {
    stage?: string;
    file?: string;
    url?: string;
    source_id?: string;
    error?: unknown;
    [key: string]: unknown;
}

export interface LoggerOptions {
    level: string;
    dir?: string; // No rotating file when absent
    silent?: boolean;
}

const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined;

function createWinstonLogger(options: LoggerOptions): winston.Logger {
    const consoleTransport = new winston.transports.Console({
        format: winston.format.combine(
            winston.format.colorize(),
            winston.format.printf(({ timestamp, level, message, ...meta }) => {
                const brief = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
                return `[${timestamp}] [${level}] ${message}${brief}`;
            })
        ),
    });

    const transports = options.dir === undefined
        ? [consoleTransport]
        : [
            consoleTransport,
            new winston.transports.DailyRotateFile({
                filename: path.join(options.dir, 'mailbox-harvester-%DATE%.log'),
                datePattern: 'YYYY-MM-DD',
                zippedArchive: true,
                maxSize: '20m',
                maxFiles: '14d',
                format: winston.format.json(),
            }),
        ];

    return winston.createLogger({
        level: options.level,
        silent: options.silent ?? false,
        format: winston.format.timestamp(),
        transports,
    });
}

export class Logger {
    // Bootstrap from the environment until the CLI hands over the loaded config
    private static instance = createWinstonLogger({
        level: process.env.LOG_LEVEL || 'info',
        dir: isTest ? undefined : process.env.LOG_DIR || 'logs',
        silent: isTest,
    });

    static configure(options: LoggerOptions): void {
        this.instance.close();
        this.instance = createWinstonLogger(options);
    }

    static get level(): string {
        return this.instance.level;
    }

    static get isSilent(): boolean {
        return this.instance.silent;
    }

    static info(msg: string, context?: LogContext) {
        this.log('info', msg, context);
    }

    static warn(msg: string, context?: LogContext) {
        this.log('warn', msg, context);
    }

    static error(msg: string, context?: LogContext) {
        this.log('error', msg, context);
    }

    static debug(msg: string, context?: LogContext) {
        this.log('debug', msg, context);
    }

    private static log(level: string, msg: string, context?: LogContext) {
        if (!context) {
            this.instance.log(level, msg);
            return;
        }

        const { error, ...rest } = context;
        if (error === undefined) {
            this.instance.log(level, msg, rest);
            return;
        }

        // Error objects serialize to {}, keep the useful parts
        const meta = error instanceof Error
            ? { ...rest, error_name: error.name, error_message: error.message }
            : { ...rest, error_message: String(error) };
        this.instance.log(level, msg, meta);
    }
}
