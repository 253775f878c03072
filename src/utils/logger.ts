import pino from 'pino';
import type { LogLevel } from '../types/index.js';

/**
 * Logger singleton. Configured once at startup via `initLogger()`.
 * Uses pino for structured JSON logging with human-readable default.
 * Logs always go to stderr; stdout is kept for report output.
 */
let loggerInstance: pino.Logger | null = null;

/**
 * Initialize the logger with the specified options.
 * Should be called once at CLI startup.
 */
export function initLogger(options: {
    level?: LogLevel;
    jsonLogs?: boolean;
}): pino.Logger {
    const { level = 'info', jsonLogs = false } = options;

    if (jsonLogs || level === 'silent') {
        loggerInstance = pino({ level }, pino.destination(2));
    } else {
        loggerInstance = pino({
            level,
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'HH:MM:ss',
                    ignore: 'pid,hostname',
                    destination: 2,
                },
            },
        });
    }

    return loggerInstance;
}

/**
 * Get the logger instance.
 * If not initialized, creates a default logger at PUBSPORK_LOG_LEVEL (info when unset).
 */
export function getLogger(): pino.Logger {
    if (!loggerInstance) {
        loggerInstance = initLogger({ level: envLogLevel() });
    }
    return loggerInstance;
}

function envLogLevel(): LogLevel {
    const level = process.env['PUBSPORK_LOG_LEVEL'];
    switch (level) {
        case 'error':
        case 'warn':
        case 'info':
        case 'debug':
        case 'silent':
            return level;
        default:
            return 'info';
    }
}
