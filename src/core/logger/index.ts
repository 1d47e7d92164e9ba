/**
 * Logger Module
 *
 * Captures observer events and streams them to log outputs.
 * Uses observer.queue() for non-blocking event processing.
 *
 * Features:
 * - Automatic CI detection (compact lines on stdout)
 * - Redaction of staged values and credentials
 */

export type {
    LogLevel,
    EntryLevel,
    LogFormat,
    LogEntry,
    LoggerConfig,
    LoggerState,
} from './types.js';

export { LOG_LEVEL_PRIORITY, DEFAULT_LOGGER_CONFIG } from './types.js';

export { classifyEvent, shouldLog, isLevelEnabled } from './classifier.js';

export { generateMessage, formatEntry, serializeEntry, sanitizeData } from './formatter.js';

export {
    addMaskedFields,
    isMaskedField,
    maskValue,
    filterData,
} from './redact.js';

export { Logger, getLogger, resetLogger, type LoggerOptions } from './logger.js';
