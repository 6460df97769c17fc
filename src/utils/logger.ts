import type { LogLevel } from '../types/options.js';
import { DEFAULTS } from '../types/options.js';

const LEVELS: Record<LogLevel, number> = {
    silent: 0,
    error: 1,
    warn: 2,
    info: 3,
    debug: 4,
};

let currentLevel: LogLevel = DEFAULTS.logLevel;

export function setLogLevel(level: LogLevel): void {
    currentLevel = level;
}

export function getLogLevel(): LogLevel {
    return currentLevel;
}

export interface Logger {
    error(message: string, ...meta: unknown[]): void;
    warn(message: string, ...meta: unknown[]): void;
    info(message: string, ...meta: unknown[]): void;
    debug(message: string, ...meta: unknown[]): void;
}

/**
 * Create a scoped logger. Everything goes to stderr so stdout only ever
 * carries translated axioms.
 */
export function createLogger(scope: string): Logger {
    const emit = (level: Exclude<LogLevel, 'silent'>, message: string, meta: unknown[]) => {
        if (LEVELS[level] > LEVELS[currentLevel]) return;
        console.error(`[${level}] ${scope}: ${message}`, ...meta);
    };

    return {
        error: (message, ...meta) => emit('error', message, meta),
        warn: (message, ...meta) => emit('warn', message, meta),
        info: (message, ...meta) => emit('info', message, meta),
        debug: (message, ...meta) => emit('debug', message, meta),
    };
}
