/**
 * Central event system.
 *
 * Core modules emit events, outer layers (logger, GUI bindings) subscribe.
 * Nothing in core writes to the console directly.
 *
 * @example
 * ```typescript
 * // In core module - emit events at key points
 * observer.emit('stage:entry', { service: 'param', name: '/app/url', operation: 'update' })
 *
 * // In a front end - subscribe to events
 * const cleanup = observer.on('apply:complete', (data) => refreshStatus(data))
 *
 * // Pattern matching for multiple events
 * observer.on(/^apply:/, ({ event, data }) => logApplyEvent(event, data))
 * ```
 */
import {
    ObserverEngine,
    type Events
} from '@logosdx/observer'

import { isDebug } from './environment.js'
import type { Operation, Service } from './staging/types.js'


/**
 * All events emitted by core modules.
 *
 * Events are namespaced by module:
 * - `stage:*` - Staging and unstaging of entries and tag entries
 * - `agent:*` - Resident store lifecycle
 * - `file:*` - File store reads and writes
 * - `drain:*` / `persist:*` - Transfers between stores
 * - `diff:*` / `apply:*` - Reconciliation against the remote
 * - `remote:*` - Remote API calls
 * - `config:*` / `logger:*` - Ambient lifecycle
 * - `error` - Catch-all errors
 */
export interface StagingEvents {

    // Staging
    'stage:entry': { service: Service; name: string; operation: Operation }
    'stage:tag': { service: Service; name: string; add: number; remove: number }
    'stage:restored': { service: Service; name: string; versionLabel: string }
    'stage:unstaged': { service: Service; name: string; kind: 'entry' | 'tag' }
    'stage:cleared': { service: Service | 'all'; count: number }

    // Resident store
    'agent:created': { scope: string }
    'agent:released': { scope: string }

    // File store
    'file:loaded': { path: string; encrypted: boolean; entries: number; tags: number }
    'file:written': { path: string; encrypted: boolean; entries: number; tags: number }
    'file:deleted': { path: string }

    // Transfers
    'drain:start': { service: Service | 'all'; keep: boolean; force: boolean; merge: boolean }
    'drain:complete': { service: Service | 'all'; entries: number; tags: number; merged: boolean }
    'drain:blocked': { service: Service | 'all' }
    'persist:start': { service: Service | 'all'; keep: boolean; mode: 'overwrite' | 'merge' }
    'persist:complete': { service: Service | 'all'; entries: number; tags: number }

    // Diff
    'diff:complete': { service: Service; entries: number; tags: number }
    'diff:auto-unstaged': { service: Service; name: string; reason: string }

    // Apply
    'apply:start': { service: Service; entries: number; tags: number }
    'apply:conflict': { service: Service; names: string[] }
    'apply:item': { service: Service; name: string; status: 'created' | 'updated' | 'deleted' | 'tagged' }
    'apply:failed': { service: Service; name: string; error: string }
    'apply:cancelled': { service: Service; remaining: number }
    'apply:complete': {
        service: Service
        entrySucceeded: number
        entryFailed: number
        tagSucceeded: number
        tagFailed: number
        conflicts: number
    }

    // Remote
    'remote:request': { service: Service; action: string; name: string }

    // Config
    'config:resolved': { accountId: string; region: string; encrypted: boolean }

    // Logger
    'logger:started': { file: string | null; level: string }

    // Errors
    'error': { source: string; error: Error; context?: Record<string, unknown> }
}

export type StagingEventNames = Events<StagingEvents>
export type StagingEventCallback<E extends StagingEventNames> = ObserverEngine.EventCallback<StagingEvents[E]>

/**
 * Global observer instance.
 *
 * Enable debug mode with `STAGECRAFT_DEBUG=1` to see all events as they occur.
 *
 * @example
 * ```typescript
 * import { observer } from './observer.js'
 *
 * const cleanup = observer.on('drain:complete', (data) => {
 *     console.log(`Drained ${data.entries} entries, ${data.tags} tags`)
 * })
 *
 * cleanup()
 * ```
 */
export const observer = new ObserverEngine<StagingEvents>({
    name: 'stagecraft',
    spy: isDebug()
        ? (action) => console.error(`[stagecraft:${action.fn}] ${String(action.event)}`)
        : undefined
});

export type { ObserverEngine }
