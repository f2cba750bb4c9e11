import winston from 'winston';
import 'winston-daily-rotate-file';
import { ResolutionResult } from '../../types';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export class Logger {
    private logger: winston.Logger;

    constructor() {
        const isTest = process.env.NODE_ENV === 'test';
        const transports: winston.transport[] = [
            new winston.transports.Console({ format: winston.format.simple(), silent: isTest })
        ];

        if (!isTest) {
            transports.push(new winston.transports.DailyRotateFile({
                dirname: process.env.LOG_DIR || 'logs',
                filename: 'vn-address-%DATE%.log',
                datePattern: 'YYYY-MM-DD',
                zippedArchive: true,
                maxSize: '20m',
                maxFiles: '14d'
            }));
        }

        this.logger = winston.createLogger({
            level: process.env.LOG_LEVEL || 'info',
            format: winston.format.combine(
                winston.format.timestamp(),
                winston.format.json()
            ),
            transports
        });
    }

    log(level: LogLevel, message: string, meta?: Record<string, unknown>) {
        this.logger.log(level, message, meta);
    }
}

export const logger = new Logger();

export class Metrics {
    stats = {
        total: 0,
        province: 0,
        district: 0,
        ward: 0,
        province_inferred: 0,
        unresolved: 0,
        error: 0,
        total_latency: 0
    };

    record(result: ResolutionResult, latencyMs: number, provinceInferred = false) {
        this.stats.total++;
        if (result.province) this.stats.province++;
        if (result.district) this.stats.district++;
        if (result.ward) this.stats.ward++;
        if (provinceInferred) this.stats.province_inferred++;
        if (!result.province && !result.district && !result.ward) this.stats.unresolved++;
        this.stats.total_latency += latencyMs;
    }

    recordError(latencyMs: number) {
        this.stats.total++;
        this.stats.error++;
        this.stats.total_latency += latencyMs;
    }

    getSummary() {
        return {
            ...this.stats,
            avg_latency: this.stats.total > 0 ? Math.round(this.stats.total_latency / this.stats.total) : 0
        };
    }
}
