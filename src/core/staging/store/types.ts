/**
 * Store capability set.
 *
 * Split into narrow interfaces so each use case asks only for what it needs.
 * Every call accepts an optional AbortSignal; an aborted signal rejects
 * before anything is mutated.
 */
import type { Entry, EntryMap, Service, State, TagEntry, TagEntryMap } from '../types.js'


export interface StoreReader {

    /** Rejects with NotStagedError when no entry exists. */
    getEntry(service: Service, name: string, signal?: AbortSignal): Promise<Entry>

    /** Rejects with NotStagedError when no tag entry exists. */
    getTag(service: Service, name: string, signal?: AbortSignal): Promise<TagEntry>

    /**
     * All entries for a service. Insertion follows name order, but a
     * record lists integer-like keys first, so iterate with `sortedEntries`.
     */
    listEntries(service: Service, signal?: AbortSignal): Promise<EntryMap>

    /** All tag entries for a service. Same ordering caveat as `listEntries`. */
    listTags(service: Service, signal?: AbortSignal): Promise<TagEntryMap>
}


export interface StoreWriter {

    /** Overwrites any entry already staged for the item. */
    stageEntry(service: Service, name: string, entry: Entry, signal?: AbortSignal): Promise<void>

    /** Overwrites any tag entry already staged for the item. */
    stageTag(service: Service, name: string, tagEntry: TagEntry, signal?: AbortSignal): Promise<void>

    /** No-op when nothing is staged. Resolves true when something was removed. */
    unstageEntry(service: Service, name: string, signal?: AbortSignal): Promise<boolean>

    /** No-op when nothing is staged. Resolves true when something was removed. */
    unstageTag(service: Service, name: string, signal?: AbortSignal): Promise<boolean>

    /**
     * Clear one service's namespace (every namespace when undefined).
     * Resolves true when anything was removed.
     */
    unstageAll(service?: Service, signal?: AbortSignal): Promise<boolean>
}


export type StoreReadWriter = StoreReader & StoreWriter


/**
 * Whole-state transfer used by drain and persist.
 */
export interface StateTransfer {

    /**
     * Read the state, optionally one service only.
     * When `keep` is false the returned items are removed from the store.
     */
    drain(service: Service | undefined, keep: boolean, signal?: AbortSignal): Promise<State>

    /**
     * Replace the stored state. With a service, only that namespace is
     * replaced and the others are kept.
     */
    writeState(state: State, service?: Service, signal?: AbortSignal): Promise<void>
}
