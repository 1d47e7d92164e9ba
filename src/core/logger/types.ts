/**
 * Logger Types
 *
 * The logger captures observer events and streams them to the console
 * and/or a log file with configurable verbosity.
 */

/**
 * Log verbosity levels.
 *
 * - silent: No logging
 * - error: Errors only
 * - warn: Errors + warnings
 * - info: Errors + warnings + info (default)
 * - verbose: All events including debug
 */
export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'verbose';

/**
 * Numeric priority for log levels.
 * Higher numbers = more verbose.
 */
export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
    silent: 0,
    error: 1,
    warn: 2,
    info: 3,
    verbose: 4,
};

/**
 * Entry level in the log output.
 */
export type EntryLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Output format.
 *
 * - json: One JSON entry per line
 * - line: Compact `[timestamp] [LEVEL] [event] message` lines
 */
export type LogFormat = 'json' | 'line';

/**
 * A single log entry.
 *
 * @example
 * ```json
 * {
 *     "timestamp": "2024-01-15T10:30:00.000Z",
 *     "level": "info",
 *     "event": "apply:complete",
 *     "message": "Applied param: 3 succeeded, 0 failed; tags 1 succeeded, 0 failed",
 *     "context": { "account": "123456789012" }
 * }
 * ```
 */
export interface LogEntry {

    /** ISO 8601 timestamp */
    timestamp: string;

    level: EntryLevel;

    /** Observer event name */
    event: string;

    /** Human-readable summary */
    message: string;

    /** Event payload (included at verbose level) */
    data?: Record<string, unknown>;

    /** Additional context (account, region) */
    context?: Record<string, unknown>;

}

/**
 * Logger configuration.
 */
export interface LoggerConfig {

    /** Minimum level to capture */
    level: LogLevel;

    /** Log file path, or null for no file */
    file: string | null;

    /** Defaults to `line` in CI, `json` elsewhere */
    format?: LogFormat;

}

export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
    level: 'info',
    file: null,
};

export type LoggerState = 'idle' | 'running' | 'flushing' | 'stopped';
