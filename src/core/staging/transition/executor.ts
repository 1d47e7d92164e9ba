/**
 * Transition executor.
 *
 * Loads an item's staged state from a store, runs the reducer, and writes
 * the outcome back. A failed transition writes nothing.
 */
import { attempt } from '@logosdx/utils'

import { NotStagedError } from '../errors.js'
import type { StoreReader, StoreWriter } from '../store/types.js'
import type { DeleteOptions, Entry, Service, TagEntry } from '../types.js'
import { isStagedTagsEmpty, reduceEntry, reduceTag } from './reducer.js'
import type {
    EntryAction,
    EntryState,
    EntryTransition,
    StagedState,
    StagedTags,
    TagAction,
    TagTransition,
} from './types.js'


export interface EntryExecuteOptions {

    baseModifiedAt?: Date
    description?: string
    deleteOptions?: DeleteOptions
}


/**
 * Staged entry for an item, or null.
 */
export async function findEntry(
    store: StoreReader,
    service: Service,
    name: string,
    signal?: AbortSignal,
): Promise<Entry | null> {

    const [entry, err] = await attempt(() => store.getEntry(service, name, signal))

    if (err) {

        if (err instanceof NotStagedError) return null

        throw err
    }

    return entry
}


export function toStagedState(entry: Entry | null): StagedState {

    if (!entry) return { kind: 'not-staged' }

    switch (entry.operation) {

    case 'create':
        return { kind: 'create', draft: entry.value ?? '' }

    case 'update':
        return { kind: 'update', draft: entry.value ?? '' }

    case 'delete':
        return { kind: 'delete' }
    }
}


/**
 * Staged tag entry for an item, or null.
 */
export async function findTag(
    store: StoreReader,
    service: Service,
    name: string,
    signal?: AbortSignal,
): Promise<TagEntry | null> {

    const [tagEntry, err] = await attempt(() => store.getTag(service, name, signal))

    if (err) {

        if (err instanceof NotStagedError) return null

        throw err
    }

    return tagEntry
}


/**
 * Staged tags for an item (empty when none) and their recorded base time.
 */
export async function loadStagedTags(
    store: StoreReader,
    service: Service,
    name: string,
    signal?: AbortSignal,
): Promise<{ tags: StagedTags; baseModifiedAt?: Date }> {

    const tagEntry = await findTag(store, service, name, signal)

    if (!tagEntry) return { tags: { add: {}, remove: new Set() } }

    return {
        tags: { add: tagEntry.add, remove: tagEntry.remove },
        baseModifiedAt: tagEntry.baseModifiedAt,
    }
}


export class TransitionExecutor {

    constructor(private readonly store: StoreReader & StoreWriter) {}

    /**
     * Reduce and persist an entry action. Throws the TransitionError when
     * the action is not allowed.
     */
    async executeEntry(
        service: Service,
        name: string,
        state: EntryState,
        action: EntryAction,
        options: EntryExecuteOptions = {},
        signal?: AbortSignal,
    ): Promise<Extract<EntryTransition, { ok: true }>> {

        const result = reduceEntry(state, action)

        if (!result.ok) throw result.error

        await this.#persistEntry(service, name, state.staged, result.state.staged, options, signal)

        if (result.discardTags) {

            await this.store.unstageTag(service, name, signal)
        }

        return result
    }

    /**
     * Reduce and persist a tag action. An empty result unstages the tag entry.
     */
    async executeTag(
        service: Service,
        name: string,
        state: EntryState,
        tags: StagedTags,
        action: TagAction,
        baseModifiedAt?: Date,
        signal?: AbortSignal,
    ): Promise<Extract<TagTransition, { ok: true }>> {

        const result = reduceTag(state, tags, action)

        if (!result.ok) throw result.error

        if (isStagedTagsEmpty(result.tags)) {

            await this.store.unstageTag(service, name, signal)

            return result
        }

        await this.store.stageTag(service, name, {
            add: result.tags.add,
            remove: result.tags.remove,
            stagedAt: new Date(),
            baseModifiedAt,
        }, signal)

        return result
    }

    async #persistEntry(
        service: Service,
        name: string,
        previous: StagedState,
        next: StagedState,
        options: EntryExecuteOptions,
        signal?: AbortSignal,
    ): Promise<void> {

        const stagedAt = new Date()

        switch (next.kind) {

        case 'not-staged':
            if (previous.kind !== 'not-staged') {

                await this.store.unstageEntry(service, name, signal)
            }
            return

        case 'create':
            await this.store.stageEntry(service, name, {
                operation: 'create',
                value: next.draft,
                description: options.description,
                stagedAt,
            }, signal)
            return

        case 'update':
            await this.store.stageEntry(service, name, {
                operation: 'update',
                value: next.draft,
                description: options.description,
                stagedAt,
                baseModifiedAt: options.baseModifiedAt,
            }, signal)
            return

        case 'delete':
            await this.store.stageEntry(service, name, {
                operation: 'delete',
                stagedAt,
                baseModifiedAt: options.baseModifiedAt,
                deleteOptions: options.deleteOptions,
            }, signal)
            return
        }
    }
}
