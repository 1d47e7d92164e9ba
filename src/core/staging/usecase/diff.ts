/**
 * Diff: compare staged changes with the remote.
 *
 * Stale entries are unstaged on the way: a delete for an item that is
 * already gone, an update for an item that no longer exists, and any
 * change whose value already matches the remote.
 */
import { attempt } from '@logosdx/utils'

import { observer } from '../../observer.js'
import { sortedEntries, sortedValues } from '../collections.js'
import { ResourceNotFoundError } from '../errors.js'
import type { StoreReader, StoreWriter } from '../store/types.js'
import type { DiffStrategy, FetchResult } from '../strategy/types.js'
import { findEntry, findTag } from '../transition/executor.js'
import type { Entry, EntryMap, Operation, Service, TagEntryMap } from '../types.js'


export const DIFF_WARNINGS = {
    alreadyDeleted: 'already deleted remotely',
    noLongerExists: 'item no longer exists remotely',
    identical: 'identical to remote current',
    alreadyExists: 'already exists remotely; apply will report a conflict',
    notStaged: 'not staged',
} as const


export type DiffEntry =
    | {
        type: 'normal'
        name: string
        operation: Operation
        remoteValue: string
        remoteIdentifier: string
        stagedValue: string
        description?: string
    }
    | {
        type: 'create'
        name: string
        operation: 'create'
        stagedValue: string
        description?: string
    }
    | { type: 'autoUnstaged'; name: string; warning: string }
    | { type: 'warning'; name: string; warning: string }


export interface DiffTagEntry {

    name: string
    add: Record<string, string>
    remove: string[]
}


export interface DiffOutput {

    itemName: string
    entries: DiffEntry[]
    tagEntries: DiffTagEntry[]
}


export class DiffUseCase {

    constructor(
        private readonly strategy: DiffStrategy,
        private readonly store: StoreReader & StoreWriter,
    ) {}

    /**
     * @example
     * ```typescript
     * const { entries } = await diff.execute()
     *
     * for (const entry of entries) {
     *     if (entry.type === 'normal') show(entry.remoteValue, entry.stagedValue)
     * }
     * ```
     */
    async execute(input: { name?: string } = {}, signal?: AbortSignal): Promise<DiffOutput> {

        const service = this.strategy.service
        const output: DiffOutput = { itemName: this.strategy.itemName, entries: [], tagEntries: [] }

        let entries: EntryMap
        let tags: TagEntryMap

        if (input.name !== undefined) {

            const entry = await findEntry(this.store, service, input.name, signal)
            const tagEntry = await findTag(this.store, service, input.name, signal)

            if (!entry && !tagEntry) {

                output.entries.push({ type: 'warning', name: input.name, warning: DIFF_WARNINGS.notStaged })

                return output
            }

            entries = entry ? { [input.name]: entry } : {}
            tags = tagEntry ? { [input.name]: tagEntry } : {}
        }
        else {

            entries = await this.store.listEntries(service, signal)
            tags = await this.store.listTags(service, signal)
        }

        for (const [name, entry] of sortedEntries(entries)) {

            signal?.throwIfAborted()

            const [remote, err] = await attempt(() => this.strategy.fetchCurrent(name, signal))

            if (err) {

                output.entries.push(await this.#onFetchError(service, name, entry, err, signal))
                continue
            }

            output.entries.push(await this.#onFetched(service, name, entry, remote, signal))
        }

        for (const [name, tagEntry] of sortedEntries(tags)) {

            output.tagEntries.push({
                name,
                add: { ...tagEntry.add },
                remove: sortedValues(tagEntry.remove),
            })
        }

        observer.emit('diff:complete', {
            service,
            entries: output.entries.length,
            tags: output.tagEntries.length,
        })

        return output
    }

    async #onFetched(
        service: Service,
        name: string,
        entry: Entry,
        remote: FetchResult,
        signal?: AbortSignal,
    ): Promise<DiffEntry> {

        const stagedValue = entry.operation === 'delete' ? '' : entry.value ?? ''

        if (remote.value === stagedValue) {

            return this.#autoUnstage(service, name, DIFF_WARNINGS.identical, signal)
        }

        if (entry.operation === 'create') {

            return { type: 'warning', name, warning: DIFF_WARNINGS.alreadyExists }
        }

        return {
            type: 'normal',
            name,
            operation: entry.operation,
            remoteValue: remote.value,
            remoteIdentifier: remote.identifier,
            stagedValue,
            description: entry.description,
        }
    }

    async #onFetchError(
        service: Service,
        name: string,
        entry: Entry,
        err: Error,
        signal?: AbortSignal,
    ): Promise<DiffEntry> {

        // Only a confirmed absence says anything about the staged change
        if (!(err instanceof ResourceNotFoundError)) {

            return { type: 'warning', name, warning: err.message }
        }

        switch (entry.operation) {

        case 'delete':
            return this.#autoUnstage(service, name, DIFF_WARNINGS.alreadyDeleted, signal)

        case 'update':
            return this.#autoUnstage(service, name, DIFF_WARNINGS.noLongerExists, signal)

        case 'create':
            return {
                type: 'create',
                name,
                operation: 'create',
                stagedValue: entry.value ?? '',
                description: entry.description,
            }
        }
    }

    async #autoUnstage(service: Service, name: string, reason: string, signal?: AbortSignal): Promise<DiffEntry> {

        await this.store.unstageEntry(service, name, signal)

        observer.emit('diff:auto-unstaged', { service, name, reason })

        return { type: 'autoUnstaged', name, warning: reason }
    }
}
