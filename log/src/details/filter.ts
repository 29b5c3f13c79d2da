import type { Appender, LogMessage } from './types.js';

export function filterMessages(predicate: (logMessage: LogMessage) => boolean, appender: Appender): Appender {
    return function(logMessage: LogMessage) {
        if (predicate(logMessage)) {
            appender(logMessage);
        }
    };
}

export function minimumLevel(level: LogMessage['loglevel'], appender: Appender): Appender {
    return filterMessages(logMessage => logMessage.loglevel >= level, appender);
}
