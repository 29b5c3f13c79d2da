import { consoleAppender, formatMessage } from './details/consoleAppender.js';
import { filterMessages, minimumLevel } from './details/filter.js';
import { LogLevel, type Appender, type LogMessage } from './details/types.js';

let currentAppender: Appender = consoleAppender;

export interface Logger {
    verbose(message: string): void;
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
}

/**
 * Creates a logger bound to `tag`.
 * Messages are dispatched to whatever appender is current at call time, so
 * loggers created at module load pick up a later `setAppender`.
 */
export function logger(tag?: string): Logger {
    const emit = (loglevel: LogLevel, message: string) => currentAppender({
        loglevel,
        message,
        tag
    });
    return {
        verbose(message: string) {
            emit(LogLevel.verbose, message);
        },
        info(message: string) {
            emit(LogLevel.info, message);
        },
        warn(message: string) {
            emit(LogLevel.warn, message);
        },
        error(message: string) {
            emit(LogLevel.error, message);
        }
    };
}

export function setAppender(appender: Appender) {
    currentAppender = appender;
}

export { consoleAppender, formatMessage, filterMessages, minimumLevel, LogLevel };
export type { Appender, LogMessage };
