/**
 * Unified logging system for lexitone.
 * Provides colored, prefixed output with support for silent mode
 * and configurable log levels.
 *
 * Components never read a global verbose flag: each one receives a
 * `Logger` at construction. A logger turns calls into `LogEvent`s and
 * hands them to a sink (the console by default, a collector in tests).
 */

import chalk from 'chalk';
import { config, type LogLevelName } from '../config/index.js';

/** Available log severity levels. */
export enum LogLevel {
    INFO = 'info',
    WARN = 'warn',
    ERROR = 'error',
    DEBUG = 'debug',
    SUCCESS = 'success',
}

/** A single structured diagnostic. */
export interface LogEvent {
    level: LogLevel;
    scope: string;
    message: string;
    error?: unknown;
}

export type LogSink = (event: LogEvent) => void;

export interface LoggerOptions {
    level?: LogLevelName;
    silent?: boolean;
    sink?: LogSink;
}

export interface Logger {
    info(message: string, scope?: string): void;
    success(message: string, scope?: string): void;
    warn(message: string, scope?: string): void;
    error(message: string, scope?: string, error?: unknown): void;
    debug(message: string, scope?: string): void;
}

const SEVERITY: Record<LogLevelName, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function severityOf(level: LogLevel): number {
    switch (level) {
        case LogLevel.DEBUG: return SEVERITY.debug;
        case LogLevel.WARN: return SEVERITY.warn;
        case LogLevel.ERROR: return SEVERITY.error;
        default: return SEVERITY.info;
    }
}

/** Default sink: the coloured console format. */
export const consoleSink: LogSink = ({ level, scope, message, error }) => {
    switch (level) {
        case LogLevel.INFO:
            console.log(`  ${chalk.yellow('i')} ${chalk.dim(`[${scope}]`)} ${message}`);
            break;
        case LogLevel.SUCCESS:
            console.log(`  ${chalk.green('+')} ${chalk.green(`[${scope}]`)} ${chalk.bold(message)}`);
            break;
        case LogLevel.WARN:
            console.warn(`  ${chalk.yellow('!')} ${chalk.yellow(`[${scope}]`)} ${chalk.yellow(message)}`);
            break;
        case LogLevel.ERROR:
            console.error(`  ${chalk.red('x')} ${chalk.red(`[${scope}]`)} ${chalk.red.bold(message)}`);
            if (error) {
                console.error(chalk.red(error instanceof Error && error.stack ? error.stack : String(error)));
            }
            break;
        case LogLevel.DEBUG:
            console.log(`  ${chalk.magenta('.')} ${chalk.magenta(`[${scope}]`)} ${chalk.gray(message)}`);
            break;
    }
};

/**
 * Build a logger. Errors are emitted even when silent, matching the
 * console behaviour users rely on for failed runs.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
    const threshold = SEVERITY[options.level ?? 'info'];
    const silent = options.silent ?? false;
    const sink = options.sink ?? consoleSink;

    const emit = (level: LogLevel, scope: string, message: string, error?: unknown) => {
        if (level !== LogLevel.ERROR && (silent || severityOf(level) < threshold)) return;
        sink(error === undefined ? { level, scope, message } : { level, scope, message, error });
    };

    return {
        info: (message, scope = 'Engine') => emit(LogLevel.INFO, scope, message),
        success: (message, scope = 'Engine') => emit(LogLevel.SUCCESS, scope, message),
        warn: (message, scope = 'Engine') => emit(LogLevel.WARN, scope, message),
        error: (message, scope = 'Engine', error?: unknown) => emit(LogLevel.ERROR, scope, message, error),
        debug: (message, scope = 'Debug') => emit(LogLevel.DEBUG, scope, message),
    };
}

/** Process logger, configured from LOG_LEVEL / LOG_SILENT. */
export const logger: Logger = createLogger({
    level: config.logging.level,
    silent: config.logging.silent,
});
