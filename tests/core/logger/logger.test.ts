import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { readFile, mkdtemp, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { Writable } from 'node:stream';

import { Logger, getLogger, resetLogger } from '../../../src/core/logger/logger.js';
import { observer } from '../../../src/core/observer.js';

const LINE_PREFIX = /^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] /;

function capture(): { stream: Writable; lines: string[] } {

    const lines: string[] = [];

    const stream = new Writable({
        write(chunk: unknown, _encoding, callback) {

            lines.push(String(chunk));
            callback();

        },
    });

    return { stream, lines };

}

function parse(line: string | undefined): Record<string, unknown> {

    expect(line).toBeDefined();

    return JSON.parse(line ?? '{}');

}

describe('logger: Logger class', () => {

    let testDir: string;
    const loggers: Logger[] = [];

    function track(logger: Logger): Logger {

        loggers.push(logger);

        return logger;

    }

    beforeEach(async () => {

        testDir = await mkdtemp(join(tmpdir(), 'stagecraft-logger-'));

    });

    afterEach(async () => {

        for (const logger of loggers.splice(0)) {

            await logger.stop();

        }

        await resetLogger();
        await rm(testDir, { recursive: true, force: true });

    });

    describe('construction', () => {

        it('should create logger with default config', () => {

            const logger = new Logger();

            expect(logger.level).toBe('info');
            expect(logger.isEnabled).toBe(true);
            expect(logger.state).toBe('idle');
            expect(logger.filepath).toBeNull();

        });

        it('should respect silent level', () => {

            const logger = new Logger({ config: { level: 'silent' } });

            expect(logger.isEnabled).toBe(false);

        });

        it('should use an explicit format', () => {

            expect(new Logger({ config: { format: 'line' } }).format).toBe('line');
            expect(new Logger({ config: { format: 'json' } }).format).toBe('json');

        });

        it('should keep the configured file path', () => {

            const logger = new Logger({ config: { file: '/var/log/stagecraft.log' } });

            expect(logger.filepath).toBe('/var/log/stagecraft.log');

        });

    });

    describe('lifecycle', () => {

        it('should move from idle to running to stopped', async () => {

            const { stream } = capture();
            const logger = track(new Logger({ console: stream }));

            await logger.start();
            expect(logger.state).toBe('running');

            await logger.stop();
            expect(logger.state).toBe('stopped');

        });

        it('should not start when silent', async () => {

            const logger = track(new Logger({ config: { level: 'silent' } }));

            await logger.start();

            expect(logger.state).toBe('idle');

        });

        it('should ignore a second stop', async () => {

            const { stream } = capture();
            const logger = track(new Logger({ console: stream }));

            await logger.start();
            await logger.stop();
            await logger.stop();

            expect(logger.state).toBe('stopped');

        });

    });

    describe('event capture', () => {

        it('should write JSON entries with context', async () => {

            const { stream, lines } = capture();
            const logger = track(new Logger({
                config: { level: 'info', format: 'json' },
                context: { account: '123456789012' },
                console: stream,
            }));

            await logger.start();

            observer.emit('drain:blocked', { service: 'param' });

            await vi.waitFor(() => expect(lines).toHaveLength(1));

            const entry = parse(lines[0]);

            expect(entry['level']).toBe('warn');
            expect(entry['event']).toBe('drain:blocked');
            expect(entry['message']).toBe('Drain blocked: resident store already has changes for param');
            expect(entry['context']).toEqual({ account: '123456789012' });
            expect(entry).not.toHaveProperty('data');

        });

        it('should write compact lines', async () => {

            const { stream, lines } = capture();
            const logger = track(new Logger({ config: { format: 'line' }, console: stream }));

            await logger.start();

            observer.emit('apply:item', { service: 'param', name: '/a', status: 'created' });

            await vi.waitFor(() => expect(lines).toHaveLength(1));

            expect(lines[0]).toMatch(LINE_PREFIX);
            expect(lines[0]?.replace(LINE_PREFIX, '')).toBe('[INFO ] [apply:item] Created param /a\n');

        });

        it('should filter events below the configured level', async () => {

            const { stream, lines } = capture();
            const logger = track(new Logger({ config: { level: 'info', format: 'json' }, console: stream }));

            await logger.start();

            observer.emit('remote:request', { service: 'param', action: 'GetParameter', name: '/a' });
            observer.emit('drain:blocked', { service: 'secret' });

            await vi.waitFor(() => expect(lines).toHaveLength(1));
            await logger.stop();

            expect(lines).toHaveLength(1);
            expect(parse(lines[0])['event']).toBe('drain:blocked');

        });

        it('should redact values in verbose data', async () => {

            const { stream, lines } = capture();
            const logger = track(new Logger({ config: { level: 'verbose', format: 'json' }, console: stream }));

            await logger.start();

            observer.emit('error', {
                source: 'apply',
                error: new Error('boom'),
                context: { name: '/app/db', value: 'hunter2' },
            });

            await vi.waitFor(() => expect(lines).toHaveLength(1));

            const entry = parse(lines[0]);

            expect(entry['level']).toBe('error');
            expect(entry['message']).toBe('Error in apply: boom');
            expect(entry['data']).toMatchObject({
                source: 'apply',
                error: { name: 'Error', message: 'boom' },
                context: { name: '/app/db', value: '<Value hunt*** (7) />' },
            });

        });

        it('should not log its own events', async () => {

            const { stream, lines } = capture();
            const logger = track(new Logger({ config: { level: 'verbose', format: 'json' }, console: stream }));

            await logger.start();

            observer.emit('logger:started', { file: null, level: 'verbose' });
            observer.emit('drain:blocked', { service: 'param' });

            await vi.waitFor(() => expect(lines).toHaveLength(1));
            await logger.stop();

            expect(lines).toHaveLength(1);
            expect(parse(lines[0])['event']).toBe('drain:blocked');

        });

        it('should stop capturing after stop', async () => {

            const { stream, lines } = capture();
            const logger = track(new Logger({ config: { format: 'json' }, console: stream }));

            await logger.start();
            await logger.stop();

            observer.emit('drain:blocked', { service: 'param' });

            expect(lines).toEqual([]);

        });

        it('should append to the configured file', async () => {

            const filepath = join(testDir, 'logs', 'stagecraft.log');
            const { stream, lines } = capture();
            const logger = track(new Logger({ config: { file: filepath, format: 'json' }, console: stream }));

            await logger.start();

            observer.emit('drain:blocked', { service: 'param' });

            await vi.waitFor(() => expect(lines).toHaveLength(1));
            await logger.stop();

            expect(await readFile(filepath, 'utf8')).toBe(lines[0]);

        });

    });

    describe('direct methods', () => {

        it('should write direct messages at enabled levels', async () => {

            const { stream, lines } = capture();
            const logger = track(new Logger({ console: stream }));

            await logger.start();

            logger.warn('careful');
            logger.debug('hidden');

            expect(lines).toHaveLength(1);
            expect(lines[0]?.replace(LINE_PREFIX, '')).toBe('[WARN ] careful\n');

        });

        it('should append redacted data at verbose level', async () => {

            const { stream, lines } = capture();
            const logger = track(new Logger({ config: { level: 'verbose' }, console: stream }));

            await logger.start();

            logger.info('staged', { name: '/a', value: 'secret' });

            expect(lines[0]?.replace(LINE_PREFIX, '')).toBe(
                '[INFO ] staged {"name":"/a","value":"<Value secr** (6) />"}\n',
            );

        });

        it('should write nothing before start', () => {

            const { stream, lines } = capture();
            const logger = new Logger({ console: stream });

            logger.error('too early');

            expect(lines).toEqual([]);

        });

    });

    describe('singleton', () => {

        it('should return null until created with options', () => {

            expect(getLogger()).toBeNull();

        });

        it('should return the same instance once created', () => {

            const logger = getLogger({ config: { level: 'warn' } });

            expect(logger).not.toBeNull();
            expect(getLogger()).toBe(logger);
            expect(getLogger({ config: { level: 'verbose' } })?.level).toBe('warn');

        });

        it('should discard the instance on reset', async () => {

            getLogger({ config: { level: 'warn' } });

            await resetLogger();

            expect(getLogger()).toBeNull();

        });

    });

});
