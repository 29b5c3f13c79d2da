import { red, yellow } from 'kleur/colors';
import { LogLevel, type LogMessage } from './types.js';

export function formatMessage(logMessage: LogMessage) {
    let prefix = '';
    switch (logMessage.loglevel) {
    case LogLevel.warn:
        prefix = yellow('!') + ' ';
        break;
    case LogLevel.error:
        prefix = red('✕') + ' ';
        break;
    }
    const tag = logMessage.tag !== undefined ? `[${logMessage.tag}] ` : '';
    return `${prefix}${tag}${logMessage.message}`;
}

export function consoleAppender(logMessage: LogMessage) {
    switch (logMessage.loglevel) {
    case LogLevel.verbose:
        return;
    case LogLevel.info:
        console.log(formatMessage(logMessage));
        break;
    case LogLevel.warn:
        console.warn(formatMessage(logMessage));
        break;
    case LogLevel.error:
        console.error(formatMessage(logMessage));
        break;
    }
}
