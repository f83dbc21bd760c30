/**
 * Outbreak Signals: Logger
 * Namespaced console logging filtered by a process-wide level.
 */
/* eslint-disable no-console */

export const LOG_LEVELS = ['silent', 'error', 'warn', 'info', 'debug'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const levelRank: Record<LogLevel, number> = {
    silent: -1,
    error: 0,
    warn: 1,
    info: 2,
    debug: 3
};

let globalLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
    globalLevel = level;
}

export function getLogLevel(): LogLevel {
    return globalLevel;
}

export interface Logger {
    error: (...args: unknown[]) => void;
    warn: (...args: unknown[]) => void;
    info: (...args: unknown[]) => void;
    debug: (...args: unknown[]) => void;
}

/**
 * @param ns Prefix printed as `[ns]` before every message
 * @param level Fixed level for this logger; follows setLogLevel when omitted
 */
export function createLogger(ns: string, level?: LogLevel): Logger {
    const tag = `[${ns}]`;

    function log(l: Exclude<LogLevel, 'silent'>, args: unknown[]): void {
        if (levelRank[l] > levelRank[level ?? globalLevel]) return;

        if (l === 'error') {
            console.error(tag, ...args);
        } else if (l === 'warn') {
            console.warn(tag, ...args);
        } else {
            console.log(tag, ...args);
        }
    }

    return {
        error: (...args) => log('error', args),
        warn: (...args) => log('warn', args),
        info: (...args) => log('info', args),
        debug: (...args) => log('debug', args)
    };
}
