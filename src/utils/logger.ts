import { pino, type Logger } from 'pino';
import type { LogLevel } from '../types/index.js';

let loggerInstance: Logger | null = null;

/**
 * Replace the shared logger. The CLI calls this once it has resolved
 * `logLevel` and `jsonLogs`; pretty output goes through the pino-pretty
 * transport, JSON output straight to stdout.
 */
export function initLogger(options: {
    level?: LogLevel;
    jsonLogs?: boolean;
}): Logger {
    const { level = 'info', jsonLogs = false } = options;

    if (jsonLogs) {
        loggerInstance = pino({ level });
    } else {
        loggerInstance = pino({
            level,
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'HH:MM:ss',
                    ignore: 'pid,hostname',
                },
            },
        });
    }

    return loggerInstance;
}

/**
 * Shared logger for library code. Until `initLogger` runs this is a plain
 * info-level JSON logger, so importing the library starts no transport worker.
 */
export function getLogger(): Logger {
    if (!loggerInstance) {
        loggerInstance = pino({ level: 'info' });
    }
    return loggerInstance;
}
