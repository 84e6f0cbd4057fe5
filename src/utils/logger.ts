import pino from 'pino';
import type { LogLevel } from '../types/index.js';

let loggerInstance: pino.Logger | null = null;

export interface LoggerOptions {
    level?: LogLevel | 'silent';
    jsonLogs?: boolean;
}

/**
 * Configure the process-wide logger. The CLI calls this once after resolving its config;
 * library callers may skip it and get the default from `getLogger()`.
 */
export function initLogger(options: LoggerOptions): pino.Logger {
    const { level = 'info', jsonLogs = false } = options;

    if (jsonLogs) {
        loggerInstance = pino({ name: 'pubsync', level });
    } else {
        loggerInstance = pino({
            name: 'pubsync',
            level,
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'HH:MM:ss',
                    ignore: 'pid,hostname,name',
                },
            },
        });
    }

    return loggerInstance;
}

/**
 * Get the logger instance.
 * Falls back to PUBSYNC_LOG_LEVEL (default info) with JSON output, so that importing
 * the pipeline as a library never spawns a pretty-print transport.
 */
export function getLogger(): pino.Logger {
    if (!loggerInstance) {
        loggerInstance = initLogger({ level: envLogLevel() ?? 'info', jsonLogs: true });
    }
    return loggerInstance;
}

function envLogLevel(): LoggerOptions['level'] | undefined {
    const raw = process.env['PUBSYNC_LOG_LEVEL'];
    switch (raw) {
        case 'error':
        case 'warn':
        case 'info':
        case 'debug':
        case 'silent':
            return raw;
        default:
            return undefined;
    }
}
