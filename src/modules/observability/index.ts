import winston from 'winston';
import 'winston-daily-rotate-file';
import { Disposition, SkipReason } from '../../types';

export enum ErrorCategory {
    NETWORK = 'NETWORK',       // Timeout, DNS, connection refused
    PARSING = 'PARSING',       // JSON / payload shape
    VALIDATION = 'VALIDATION', // Config or schema validation
    AUTH = 'AUTH',             // API key invalid, rate limited
    LOGIC = 'LOGIC',           // Programmer error
}

export type LogMeta = Record<string, unknown>;

export class Logger {
    private logger: winston.Logger;

    constructor() {
        const production = process.env.NODE_ENV === 'production';
        this.logger = winston.createLogger({
            level: process.env.LOG_LEVEL || 'info',
            silent: process.env.NODE_ENV === 'test',
            format: winston.format.combine(
                winston.format.timestamp(),
                winston.format.json()
            ),
            transports: [
                new winston.transports.Console({
                    format: production ? winston.format.json() : winston.format.simple(),
                }),
            ],
        });
    }

    setLevel(level: string): void {
        this.logger.level = level;
    }

    enableFileLogging(dir: string): void {
        this.logger.add(new winston.transports.DailyRotateFile({
            dirname: dir,
            filename: 'enricher-%DATE%.log',
            datePattern: 'YYYY-MM-DD',
            zippedArchive: true,
            maxSize: '20m',
            maxFiles: '14d',
        }));
    }

    log(level: string, message: string, meta?: LogMeta): void {
        this.logger.log(level, message, meta);
    }

    debug(message: string, meta?: LogMeta): void {
        this.log('debug', message, meta);
    }

    info(message: string, meta?: LogMeta): void {
        this.log('info', message, meta);
    }

    warn(message: string, meta?: LogMeta): void {
        this.log('warn', message, meta);
    }

    error(message: string, meta?: LogMeta): void {
        this.log('error', message, meta);
    }

    /** Logs an error with its category and stack attached. */
    logError(message: string, error: unknown, meta?: LogMeta): void {
        if (error instanceof Error) {
            this.error(message, {
                ...meta,
                error_message: error.message,
                error_category: Logger.categorizeError(error),
                error_stack: error.stack,
            });
            return;
        }
        this.error(message, { ...meta, error_message: String(error) });
    }

    static categorizeError(error: Error): ErrorCategory {
        const msg = error.message.toLowerCase();

        if (msg.includes('timeout') || msg.includes('econnrefused') || msg.includes('enotfound')
            || msg.includes('econnreset') || msg.includes('socket')) {
            return ErrorCategory.NETWORK;
        }
        if (msg.includes('401') || msg.includes('403') || msg.includes('429') || msg.includes('api key') || msg.includes('rate limit')) {
            return ErrorCategory.AUTH;
        }
        if (msg.includes('parse') || msg.includes('unexpected token') || msg.includes('json')) {
            return ErrorCategory.PARSING;
        }
        if (msg.includes('validation') || msg.includes('invalid')) {
            return ErrorCategory.VALIDATION;
        }
        return ErrorCategory.LOGIC;
    }
}

export const logger = new Logger();

export class Metrics {
    stats = {
        total: 0,
        included: 0,
        no_site: 0,
        dead_skipped: 0,
        total_latency: 0,
    };
    skippedByReason: Partial<Record<SkipReason, number>> = {};

    record(disposition: Disposition, latencyMs: number): void {
        this.stats.total++;
        this.stats.total_latency += latencyMs;

        if (disposition.kind === 'included') {
            this.stats.included++;
            return;
        }

        if (disposition.reason === SkipReason.NO_CANDIDATE_FOUND) this.stats.no_site++;
        if (disposition.reason === SkipReason.DEAD_LINK) this.stats.dead_skipped++;
        this.skippedByReason[disposition.reason] = (this.skippedByReason[disposition.reason] ?? 0) + 1;
    }

    getSummary() {
        return {
            ...this.stats,
            skipped_by_reason: { ...this.skippedByReason },
            avg_latency: this.stats.total > 0 ? Math.round(this.stats.total_latency / this.stats.total) : 0,
        };
    }
}
