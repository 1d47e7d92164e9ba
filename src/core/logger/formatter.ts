/**
 * Log Formatter
 *
 * Converts observer events into LogEntry objects and serializes them
 * for output. Each entry is a single JSON line.
 */
import { attemptSync } from '@logosdx/utils'

import type { LogEntry } from './types.js'
import { classifyEvent } from './classifier.js'


type Template = (data: Record<string, unknown>) => string


/**
 * Human-readable message templates for known events.
 */
const MESSAGE_TEMPLATES: Record<string, Template> = {

    // Staging
    'stage:entry': (d) => `Staged ${d['operation']} for ${d['service']} ${d['name']}`,
    'stage:tag': (d) => `Staged tags for ${d['service']} ${d['name']} (+${d['add']} -${d['remove']})`,
    'stage:restored': (d) => `Restored ${d['service']} ${d['name']} to ${d['versionLabel']}`,
    'stage:unstaged': (d) => `Unstaged ${d['kind']} for ${d['service']} ${d['name']}`,
    'stage:cleared': (d) => `Cleared ${d['count']} staged items for ${d['service']}`,

    // Resident store
    'agent:created': (d) => `Resident store created for ${d['scope']}`,
    'agent:released': (d) => `Resident store released for ${d['scope']}`,

    // File store
    'file:loaded': (d) => `Loaded ${d['entries']} entries, ${d['tags']} tags from ${d['path']}${d['encrypted'] ? ' (encrypted)' : ''}`,
    'file:written': (d) => `Wrote ${d['entries']} entries, ${d['tags']} tags to ${d['path']}${d['encrypted'] ? ' (encrypted)' : ''}`,
    'file:deleted': (d) => `Deleted ${d['path']}`,

    // Transfers
    'drain:start': (d) => `Draining ${d['service']} from file${d['merge'] ? ' (merge)' : ''}${d['force'] ? ' (force)' : ''}`,
    'drain:complete': (d) => `Drained ${d['entries']} entries, ${d['tags']} tags for ${d['service']}${d['merged'] ? ' (merged)' : ''}`,
    'drain:blocked': (d) => `Drain blocked: resident store already has changes for ${d['service']}`,
    'persist:start': (d) => `Persisting ${d['service']} to file (${d['mode']})`,
    'persist:complete': (d) => `Persisted ${d['entries']} entries, ${d['tags']} tags for ${d['service']}`,

    // Diff
    'diff:complete': (d) => `Diffed ${d['service']}: ${d['entries']} entries, ${d['tags']} tags`,
    'diff:auto-unstaged': (d) => `Auto-unstaged ${d['service']} ${d['name']}: ${d['reason']}`,

    // Apply
    'apply:start': (d) => `Applying ${d['service']}: ${d['entries']} entries, ${d['tags']} tags`,
    'apply:conflict': (d) => `Conflicts on ${d['service']}: ${listOf(d['names'])}`,
    'apply:item': (d) => `${capitalize(d['status'])} ${d['service']} ${d['name']}`,
    'apply:failed': (d) => `Failed ${d['service']} ${d['name']}: ${d['error']}`,
    'apply:cancelled': (d) => `Apply cancelled for ${d['service']}: ${d['remaining']} items left staged`,
    'apply:complete': (d) => `Applied ${d['service']}: ${d['entrySucceeded']} succeeded, ${d['entryFailed']} failed; tags ${d['tagSucceeded']} succeeded, ${d['tagFailed']} failed`,

    // Remote
    'remote:request': (d) => `${d['action']} ${d['name']}`,

    // Config
    'config:resolved': (d) => `Config resolved for ${d['accountId']}/${d['region']}${d['encrypted'] ? ' (encrypted)' : ''}`,

    // Logger lifecycle
    'logger:started': (d) => `Logger started: ${d['file'] ?? 'console'} at ${d['level']} level`,

    'error': (d) => `Error in ${d['source']}: ${errorMessage(d['error'])}`,
}


function listOf(value: unknown): string {

    return Array.isArray(value) ? value.join(', ') : String(value)
}


function capitalize(value: unknown): string {

    const text = String(value)

    return text.charAt(0).toUpperCase() + text.slice(1)
}


function errorMessage(value: unknown): string {

    return value instanceof Error ? value.message : String(value)
}


/**
 * Generate a human-readable message for an event.
 *
 * Uses templates for known events, falls back to generic format.
 *
 * @example
 * ```typescript
 * generateMessage('drain:blocked', { service: 'param' })
 * // 'Drain blocked: resident store already has changes for param'
 *
 * generateMessage('custom:thing', { a: 1 })
 * // 'custom thing: a=1'
 * ```
 */
export function generateMessage(event: string, data: Record<string, unknown>): string {

    const template = MESSAGE_TEMPLATES[event]

    if (template) {

        const [message, err] = attemptSync(() => template(data))

        if (!err) return message
    }

    // Generic format: "event name" or "event name: key=value, ..."
    const parts = Object.entries(data)
        .slice(0, 3)
        .map(([k, v]) => `${k}=${summarizeValue(v)}`)

    if (parts.length === 0) {

        return event.replace(/:/g, ' ')
    }

    return `${event.replace(/:/g, ' ')}: ${parts.join(', ')}`
}


/**
 * Summarize a value for log message display.
 * Truncates long strings and formats objects.
 */
function summarizeValue(value: unknown): string {

    if (typeof value === 'string') {

        if (value.length > 50) {

            return `"${value.slice(0, 47)}..."`
        }

        return `"${value}"`
    }

    if (Array.isArray(value)) {

        return `[${value.length} items]`
    }

    if (value instanceof Error) {

        return value.message
    }

    if (typeof value === 'object' && value !== null) {

        return `{${Object.keys(value).length} keys}`
    }

    return String(value)
}


/**
 * Format an event into a LogEntry.
 *
 * @example
 * ```typescript
 * const entry = formatEntry('drain:blocked', { service: 'param' }, { region: 'us-east-1' }, true)
 * // {
 * //     timestamp: '2024-01-15T10:30:00.000Z',
 * //     level: 'warn',
 * //     event: 'drain:blocked',
 * //     message: 'Drain blocked: resident store already has changes for param',
 * //     data: { service: 'param' },
 * //     context: { region: 'us-east-1' }
 * // }
 * ```
 */
export function formatEntry(
    event: string,
    data: Record<string, unknown>,
    context?: Record<string, unknown>,
    includeData = false
): LogEntry {

    const entry: LogEntry = {
        timestamp: new Date().toISOString(),
        level: classifyEvent(event),
        event,
        message: generateMessage(event, data),
    }

    if (includeData && Object.keys(data).length > 0) {

        entry.data = sanitizeData(data)
    }

    if (context && Object.keys(context).length > 0) {

        entry.context = context
    }

    return entry
}


/**
 * Make event data JSON-safe: errors and dates become plain values,
 * anything else that cannot be serialized becomes a string.
 */
export function sanitizeData(data: Record<string, unknown>): Record<string, unknown> {

    const result: Record<string, unknown> = {}

    for (const [key, value] of Object.entries(data)) {

        if (value instanceof Error) {

            result[key] = {
                name: value.name,
                message: value.message,
                stack: value.stack?.split('\n').slice(0, 3).join('\n'),
            }
            continue
        }

        if (value instanceof Date) {

            result[key] = value.toISOString()
            continue
        }

        const [, err] = attemptSync(() => JSON.stringify(value))

        result[key] = err ? String(value) : value
    }

    return result
}


/**
 * Serialize a LogEntry to a JSON line.
 */
export function serializeEntry(entry: LogEntry): string {

    return JSON.stringify(entry) + '\n'
}
