export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

export type LogContext = Record<string, string | number | boolean | null | undefined>;

/**
 * Structured logger used across the engine.
 */
export interface Logger {
    debug(message: string, context?: LogContext): void;
    info(message: string, context?: LogContext): void;
    warn(message: string, context?: LogContext): void;
    error(message: string, context?: LogContext): void;
}

/**
 * Log entry structure written by the console logger
 */
export interface LogEntry {
    timestamp: string;
    level: Exclude<LogLevel, 'silent'>;
    message: string;
    context?: LogContext;
}

const LEVEL_RANK: Record<LogLevel, number> = {
    silent: 0,
    error: 1,
    warn: 2,
    info: 3,
    debug: 4,
};

/**
 * Console-backed logger. Each entry is one line: a label followed by the
 * JSON-stringified entry.
 *
 * @example
 * ```ts
 * const logger = createConsoleLogger('debug');
 * logger.debug('flush', { length: 120 });
 * ```
 */
export function createConsoleLogger(level: LogLevel = 'warn', label = 'pathjson'): Logger {
    const enabled = (entryLevel: Exclude<LogLevel, 'silent'>): boolean =>
        LEVEL_RANK[entryLevel] <= LEVEL_RANK[level];

    const emit = (entryLevel: Exclude<LogLevel, 'silent'>, message: string, context?: LogContext): void => {
        if (!enabled(entryLevel)) return;

        const entry: LogEntry = {
            timestamp: new Date().toISOString(),
            level: entryLevel,
            message,
        };
        if (context) {
            entry.context = context;
        }

        const line = `${label}: ${JSON.stringify(entry)}`;
        switch (entryLevel) {
            case 'error':
                console.error(line);
                break;
            case 'warn':
                console.warn(line);
                break;
            default:
                console.log(line);
        }
    };

    return {
        debug: (message, context) => emit('debug', message, context),
        info: (message, context) => emit('info', message, context),
        warn: (message, context) => emit('warn', message, context),
        error: (message, context) => emit('error', message, context),
    };
}

/**
 * Logger that drops everything.
 */
export const silentLogger: Logger = createConsoleLogger('silent');
