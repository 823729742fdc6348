import { loadConfig, LOG_LEVELS, type LogLevel } from './config';

export interface Logger {
    error(message: string): void;
    warn(message: string): void;
    info(message: string): void;
    debug(message: string): void;
}

function rank(level: LogLevel): number {
    return LOG_LEVELS.indexOf(level);
}

/** Without an explicit level, WORDSPLIT_LOG_LEVEL is read when a message is logged. */
export function createLogger(scope: string, level?: LogLevel): Logger {
    const enabled = (wanted: LogLevel) => rank(level ?? loadConfig().logLevel) >= rank(wanted);
    const prefix = `[wordsplit:${scope}]`;

    return {
        error: (message) => {
            if (enabled('error')) console.error(`${prefix} ${message}`);
        },
        warn: (message) => {
            if (enabled('warn')) console.warn(`${prefix} ${message}`);
        },
        info: (message) => {
            if (enabled('info')) console.log(`${prefix} ${message}`);
        },
        debug: (message) => {
            if (enabled('debug')) console.debug(`${prefix} ${message}`);
        },
    };
}
