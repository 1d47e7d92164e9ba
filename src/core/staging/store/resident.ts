/**
 * Resident (agent) store.
 *
 * Keeps staged state in memory for the lifetime of the owning process.
 * Never persists on its own: the file store and drain/persist handle that.
 * Reads hand out copies so callers can't mutate the store behind its back.
 */
import { observer } from '../../observer.js'
import { createItemMap, sortedEntries } from '../collections.js'
import { NotStagedError } from '../errors.js'
import {
    cloneEntry,
    cloneState,
    cloneTagEntry,
    countState,
    createEmptyState,
    extractService,
    removeService,
} from '../state.js'
import type { Entry, EntryMap, IdentityScope, Service, State, TagEntry, TagEntryMap } from '../types.js'
import { scopeKey, targetServices } from '../types.js'
import type { StateTransfer, StoreReadWriter } from './types.js'


/**
 * In-memory store bound to one identity scope.
 *
 * @example
 * ```typescript
 * const store = new ResidentStore({ accountId: '123456789012', region: 'us-east-1' })
 *
 * await store.stageEntry('param', '/app/url', {
 *     operation: 'update',
 *     value: 'https://example.test',
 *     stagedAt: new Date(),
 * })
 *
 * const entry = await store.getEntry('param', '/app/url')
 * ```
 */
export class ResidentStore implements StoreReadWriter, StateTransfer {

    #state: State = createEmptyState()

    constructor(public readonly scope: IdentityScope) {}

    get key(): string {

        return scopeKey(this.scope)
    }

    // ─────────────────────────────────────────────────────────────
    // Entries
    // ─────────────────────────────────────────────────────────────

    async getEntry(service: Service, name: string, signal?: AbortSignal): Promise<Entry> {

        signal?.throwIfAborted()

        const entry = this.#state.entries[service][name]

        if (!entry || !Object.hasOwn(this.#state.entries[service], name)) {

            throw new NotStagedError(service, name)
        }

        return cloneEntry(entry)
    }

    async stageEntry(service: Service, name: string, entry: Entry, signal?: AbortSignal): Promise<void> {

        signal?.throwIfAborted()

        this.#state.entries[service][name] = cloneEntry(entry)

        observer.emit('stage:entry', { service, name, operation: entry.operation })
    }

    async unstageEntry(service: Service, name: string, signal?: AbortSignal): Promise<boolean> {

        signal?.throwIfAborted()

        if (!Object.hasOwn(this.#state.entries[service], name)) return false

        delete this.#state.entries[service][name]

        observer.emit('stage:unstaged', { service, name, kind: 'entry' })

        return true
    }

    async listEntries(service: Service, signal?: AbortSignal): Promise<EntryMap> {

        signal?.throwIfAborted()

        const result: EntryMap = createItemMap()

        for (const [name, entry] of sortedEntries(this.#state.entries[service])) {

            result[name] = cloneEntry(entry)
        }

        return result
    }

    // ─────────────────────────────────────────────────────────────
    // Tags
    // ─────────────────────────────────────────────────────────────

    async getTag(service: Service, name: string, signal?: AbortSignal): Promise<TagEntry> {

        signal?.throwIfAborted()

        const tagEntry = this.#state.tags[service][name]

        if (!tagEntry || !Object.hasOwn(this.#state.tags[service], name)) {

            throw new NotStagedError(service, name, `${service} ${name} has no staged tag changes`)
        }

        return cloneTagEntry(tagEntry)
    }

    async stageTag(service: Service, name: string, tagEntry: TagEntry, signal?: AbortSignal): Promise<void> {

        signal?.throwIfAborted()

        this.#state.tags[service][name] = cloneTagEntry(tagEntry)

        observer.emit('stage:tag', {
            service,
            name,
            add: Object.keys(tagEntry.add).length,
            remove: tagEntry.remove.size,
        })
    }

    async unstageTag(service: Service, name: string, signal?: AbortSignal): Promise<boolean> {

        signal?.throwIfAborted()

        if (!Object.hasOwn(this.#state.tags[service], name)) return false

        delete this.#state.tags[service][name]

        observer.emit('stage:unstaged', { service, name, kind: 'tag' })

        return true
    }

    async listTags(service: Service, signal?: AbortSignal): Promise<TagEntryMap> {

        signal?.throwIfAborted()

        const result: TagEntryMap = createItemMap()

        for (const [name, tagEntry] of sortedEntries(this.#state.tags[service])) {

            result[name] = cloneTagEntry(tagEntry)
        }

        return result
    }

    // ─────────────────────────────────────────────────────────────
    // Whole-state operations
    // ─────────────────────────────────────────────────────────────

    async unstageAll(service?: Service, signal?: AbortSignal): Promise<boolean> {

        signal?.throwIfAborted()

        const counts = countState(this.#state, service)
        const count = counts.entries + counts.tags

        removeService(this.#state, service)

        observer.emit('stage:cleared', { service: service ?? 'all', count })

        return count > 0
    }

    async drain(service: Service | undefined, keep: boolean, signal?: AbortSignal): Promise<State> {

        signal?.throwIfAborted()

        const drained = extractService(this.#state, service)

        if (!keep) {

            removeService(this.#state, service)
        }

        return drained
    }

    async writeState(state: State, service?: Service, signal?: AbortSignal): Promise<void> {

        signal?.throwIfAborted()

        if (!service) {

            this.#state = cloneState(state)
            return
        }

        const incoming = cloneState(state)

        for (const svc of targetServices(service)) {

            this.#state.entries[svc] = incoming.entries[svc]
            this.#state.tags[svc] = incoming.tags[svc]
        }
    }
}
