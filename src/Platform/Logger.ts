// src/Platform/Logger.ts

export type LogLevel = 'silent' | 'warn' | 'info' | 'debug';

const RANK: Record<LogLevel, number> = { silent: 0, warn: 1, info: 2, debug: 3 };

export interface Logger {
    debug(message: string): void;
    info(message: string): void;
    warn(message: string): void;
}

/**
 * Console logger with a bracketed component prefix: "[BindingEngine] ...".
 */
export function createLogger(component: string, level: LogLevel = 'warn'): Logger {
    const enabled = (wanted: LogLevel) => RANK[level] >= RANK[wanted];
    return {
        debug: (message) => { if (enabled('debug')) console.debug(`[${component}] ${message}`); },
        info: (message) => { if (enabled('info')) console.log(`[${component}] ${message}`); },
        warn: (message) => { if (enabled('warn')) console.warn(`[${component}] ${message}`); }
    };
}
