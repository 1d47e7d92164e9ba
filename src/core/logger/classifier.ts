/**
 * Event Classifier
 *
 * Classifies observer events by log level based on naming patterns.
 *
 * Classification rules:
 * - 'error', '*:error' or '*:failed' -> error
 * - '*:conflict', '*:blocked', '*:cancelled', '*:auto-unstaged' -> warn
 * - '*:start', '*:complete', '*:item', etc. -> info
 * - Everything else -> debug
 */
import type { EntryLevel, LogLevel } from './types.js';
import { LOG_LEVEL_PRIORITY } from './types.js';

const ERROR_PATTERNS = [/^error$/, /:error$/, /:failed$/];

const WARN_PATTERNS = [/:conflict$/, /:blocked$/, /:cancelled$/, /:auto-unstaged$/];

/**
 * Lifecycle events worth logging at default verbosity.
 */
const INFO_PATTERNS = [
    /:start$/,
    /:complete$/,
    /:created$/,
    /:released$/,
    /:loaded$/,
    /:written$/,
    /:deleted$/,
    /:cleared$/,
    /:restored$/,
    /:resolved$/,
    /:started$/,
    /:item$/,
    /:entry$/,
    /:tag$/,
    /:unstaged$/,
];

const ENTRY_LEVEL_PRIORITY: Record<EntryLevel, number> = {
    error: 1,
    warn: 2,
    info: 3,
    debug: 4,
};

/**
 * Classify an event name to determine its log level.
 *
 * @example
 * ```typescript
 * classifyEvent('error')            // 'error'
 * classifyEvent('apply:failed')     // 'error'
 * classifyEvent('drain:blocked')    // 'warn'
 * classifyEvent('apply:start')      // 'info'
 * classifyEvent('remote:request')   // 'debug'
 * ```
 */
export function classifyEvent(event: string): EntryLevel {

    if (ERROR_PATTERNS.some((pattern) => pattern.test(event))) {

        return 'error';

    }

    if (WARN_PATTERNS.some((pattern) => pattern.test(event))) {

        return 'warn';

    }

    if (INFO_PATTERNS.some((pattern) => pattern.test(event))) {

        return 'info';

    }

    return 'debug';

}

/**
 * Check if an entry level passes the configured verbosity.
 */
export function isLevelEnabled(level: EntryLevel, configLevel: LogLevel): boolean {

    return ENTRY_LEVEL_PRIORITY[level] <= LOG_LEVEL_PRIORITY[configLevel];

}

/**
 * Check if an event should be logged at the given verbosity level.
 *
 * @example
 * ```typescript
 * shouldLog('error', 'warn')                // true
 * shouldLog('apply:start', 'info')          // true
 * shouldLog('remote:request', 'info')       // false
 * shouldLog('remote:request', 'verbose')    // true
 * ```
 */
export function shouldLog(event: string, configLevel: LogLevel): boolean {

    return isLevelEnabled(classifyEvent(event), configLevel);

}
