import type { Logger } from '@/types/options.js';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

const LEVEL_RANK: Record<LogLevel, number> = { debug: 3, error: 0, info: 2, trace: 4, warn: 1 };

/**
 * Console-backed {@link Logger} that prefixes each line with an ISO timestamp
 * and the level, and drops messages more verbose than `level`.
 *
 * Extra arguments (context objects) are handed to the console unchanged.
 */
export const createConsoleLogger = (level: LogLevel = 'info', now: () => Date = () => new Date()): Logger => {
    const format = (l: LogLevel, message: string) => `${now().toISOString()} [${l.toUpperCase()}] ${message}`;

    const emit =
        (l: LogLevel, method: 'error' | 'warn' | 'info' | 'log') =>
        (message: string, ...args: unknown[]) => {
            if (LEVEL_RANK[l] <= LEVEL_RANK[level]) {
                console[method](format(l, message), ...args);
            }
        };

    return {
        debug: emit('debug', 'log'),
        error: emit('error', 'error'),
        info: emit('info', 'info'),
        trace: emit('trace', 'log'),
        warn: emit('warn', 'warn'),
    };
};
