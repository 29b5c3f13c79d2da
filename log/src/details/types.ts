export enum LogLevel {
    verbose, // for debugging logs, not for displaying on screen in normal cases
    info, // should be printed to user but not an error
    warn, // something is probably wrong, but we can continue
    error // operation completely failed
}

export interface LogMessage {
    loglevel: LogLevel;
    message: string;
    tag?: string;
}

export type Appender = (message: LogMessage) => void;
