/**
 * Logger
 *
 * Stream-based logger using observer.queue() for non-blocking
 * event processing. Writes to console and/or file streams.
 *
 * @example
 * ```typescript
 * const logger = new Logger({
 *     config: { level: 'info', file: '/home/me/.stagecraft/stagecraft.log' },
 *     context: { account: '123456789012', region: 'us-east-1' },
 * })
 *
 * await logger.start()
 *
 * // Every observer event is now classified, redacted and written
 *
 * await logger.stop()
 * ```
 */
import { createWriteStream } from 'node:fs';
import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { Writable } from 'node:stream';

import type { EventQueue } from '@logosdx/observer';

import { observer, type StagingEvents } from '../observer.js';
import { isCi } from '../environment.js';
import { classifyEvent, isLevelEnabled, shouldLog } from './classifier.js';
import { generateMessage, serializeEntry, formatEntry, sanitizeData } from './formatter.js';
import { filterData } from './redact.js';
import type { EntryLevel, LogFormat, LogLevel, LoggerConfig, LoggerState } from './types.js';
import { DEFAULT_LOGGER_CONFIG } from './types.js';

export interface LoggerOptions {

    config?: Partial<LoggerConfig>;

    /** Context to include with every entry */
    context?: Record<string, unknown>;

    /** File stream to write to. Opened from `config.file` when omitted. */
    file?: Writable;

    /** Console stream to write to (defaults to stdout in CI) */
    console?: Writable;

}

interface PatternPayload {

    event: string;
    data: unknown;

}

function isPatternPayload(payload: unknown): payload is PatternPayload {

    if (typeof payload !== 'object' || payload === null) return false;

    const event: unknown = Reflect.get(payload, 'event');

    return typeof event === 'string';

}

function toRecord(data: unknown): Record<string, unknown> {

    if (typeof data !== 'object' || data === null || Array.isArray(data)) {

        return data === undefined ? {} : { value: data };

    }

    return Object.fromEntries(Object.entries(data));

}

/**
 * Logger that captures observer events and writes to streams.
 */
export class Logger {

    #config: LoggerConfig;
    #context: Record<string, unknown>;
    #file: Writable | null = null;
    #ownsFile = false;
    #console: Writable | null = null;
    #queue: EventQueue<StagingEvents, RegExp> | null = null;
    #state: LoggerState = 'idle';

    constructor(options: LoggerOptions = {}) {

        this.#config = { ...DEFAULT_LOGGER_CONFIG, ...options.config };
        this.#context = options.context ?? {};

        if (options.console) {

            this.#console = options.console;

        }
        else if (isCi()) {

            this.#console = process.stdout;

        }

        if (options.file) {

            this.#file = options.file;

        }

    }

    get state(): LoggerState {

        return this.#state;

    }

    get level(): LogLevel {

        return this.#config.level;

    }

    get filepath(): string | null {

        return this.#config.file;

    }

    get format(): LogFormat {

        return this.#config.format ?? (isCi() ? 'line' : 'json');

    }

    get isEnabled(): boolean {

        return this.#config.level !== 'silent';

    }

    /**
     * Start capturing observer events.
     */
    async start(): Promise<void> {

        if (this.#state !== 'idle' || !this.isEnabled) {

            return;

        }

        const filepath = this.#config.file;

        if (!this.#file && filepath) {

            await mkdir(dirname(filepath), { recursive: true });

            this.#file = createWriteStream(filepath, { flags: 'a' });
            this.#ownsFile = true;

        }

        this.#queue = observer.queue(
            /./,
            (payload: unknown) => {

                if (isPatternPayload(payload)) {

                    this.#handleEvent(payload.event, toRecord(payload.data));

                }

            },
            {
                name: 'logger',
                autoStart: true,
                concurrency: 1,
                type: 'fifo',
            },
        );

        this.#state = 'running';

        observer.emit('logger:started', {
            file: filepath,
            level: this.#config.level,
        });

    }

    /**
     * Stop the queue, flushing pending entries, and close an owned file.
     */
    async stop(): Promise<void> {

        if (this.#state !== 'running') {

            return;

        }

        this.#state = 'flushing';

        if (this.#queue) {

            await this.#queue.stop();
            this.#queue = null;

        }

        const file = this.#file;

        if (file && this.#ownsFile) {

            await new Promise<void>((resolve) => {

                file.end(() => resolve());

            });

            this.#file = null;
            this.#ownsFile = false;

        }

        this.#state = 'stopped';

    }

    #handleEvent(event: string, data: Record<string, unknown>): void {

        // Skip own events to avoid loops
        if (event.startsWith('logger:')) {

            return;

        }

        if (!shouldLog(event, this.#config.level)) {

            return;

        }

        const redacted = filterData(data, this.#config.level);

        if (this.format === 'json') {

            const entry = formatEntry(event, redacted, this.#context, this.#config.level === 'verbose');

            this.#write(serializeEntry(entry));

            return;

        }

        this.#write(this.#compose(classifyEvent(event), generateMessage(event, redacted), redacted, event));

    }

    /**
     * Compact line: `[timestamp] [LEVEL] [event] message`, with the event
     * omitted for direct messages and redacted data appended at verbose.
     */
    #compose(level: EntryLevel, message: string, data: Record<string, unknown>, event?: string): string {

        const parts = [`[${new Date().toISOString()}]`, `[${level.toUpperCase().padEnd(5)}]`];

        if (event) parts.push(`[${event}]`);

        parts.push(message);

        if (this.#config.level === 'verbose' && Object.keys(data).length > 0) {

            parts.push(JSON.stringify(sanitizeData(data)));

        }

        return parts.join(' ') + '\n';

    }

    #write(line: string): void {

        this.#console?.write(line);
        this.#file?.write(line);

    }

    // ─────────────────────────────────────────────────────────────
    // Direct logging methods
    // ─────────────────────────────────────────────────────────────

    info(message: string, data?: Record<string, unknown>): void {

        this.#log('info', message, data);

    }

    warn(message: string, data?: Record<string, unknown>): void {

        this.#log('warn', message, data);

    }

    error(message: string, data?: Record<string, unknown>): void {

        this.#log('error', message, data);

    }

    debug(message: string, data?: Record<string, unknown>): void {

        this.#log('debug', message, data);

    }

    #log(level: EntryLevel, message: string, data: Record<string, unknown> = {}): void {

        if (this.#state === 'running' && isLevelEnabled(level, this.#config.level)) {

            this.#write(this.#compose(level, message, filterData(data, this.#config.level)));

        }

    }

}

// ─────────────────────────────────────────────────────────────
// Singleton
// ─────────────────────────────────────────────────────────────

let loggerInstance: Logger | null = null;

/**
 * Get the shared Logger, creating it when options are given.
 */
export function getLogger(options?: LoggerOptions): Logger | null {

    if (!loggerInstance && options) {

        loggerInstance = new Logger(options);

    }

    return loggerInstance;

}

/**
 * Stop and discard the shared Logger.
 */
export async function resetLogger(): Promise<void> {

    if (loggerInstance) {

        await loggerInstance.stop();
        loggerInstance = null;

    }

}
