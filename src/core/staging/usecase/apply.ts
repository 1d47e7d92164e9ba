/**
 * Apply: push staged changes to the remote.
 *
 * Entries go first, then tag entries, each in name order and one at a
 * time. A failed item stays staged and the pass continues. Conflicting
 * entries (and their tag changes) are held back and reported.
 *
 * Cancellation is checked between items. The item in flight is allowed to
 * finish so the store never disagrees with the remote about it.
 */
import { attempt } from '@logosdx/utils'

import { observer } from '../../observer.js'
import { createItemMap, sortedEntries, sortedValues } from '../collections.js'
import { checkConflicts } from '../conflict.js'
import { ConflictError, NotStagedError } from '../errors.js'
import type { StoreReader, StoreWriter } from '../store/types.js'
import type { ApplyStrategy } from '../strategy/types.js'
import type { Operation } from '../types.js'


export interface ApplyInput {

    /** Apply only this item */
    name?: string

    /** Skip conflict detection */
    ignoreConflicts?: boolean

    /** Reject with ConflictError, applying nothing, when any entry conflicts */
    rejectOnConflict?: boolean
}


export type ApplyStatus = 'created' | 'updated' | 'deleted' | 'failed'


export interface ApplyEntryResult {

    name: string
    status: ApplyStatus
    error?: Error
}


export interface ApplyTagResult {

    name: string
    add: Record<string, string>
    remove: string[]
    error?: Error
}


export interface ApplyOutput {

    serviceName: string
    itemName: string

    entryResults: ApplyEntryResult[]
    entrySucceeded: number
    entryFailed: number

    tagResults: ApplyTagResult[]
    tagSucceeded: number
    tagFailed: number

    /** Entries held back because the remote changed since staging */
    conflicts: string[]

    /** Stopped early by the abort signal; unprocessed items stay staged */
    cancelled: boolean
}


const STATUS_BY_OPERATION: Record<Operation, Exclude<ApplyStatus, 'failed'>> = {
    create: 'created',
    update: 'updated',
    delete: 'deleted',
}


export class ApplyUseCase {

    constructor(
        private readonly strategy: ApplyStrategy,
        private readonly store: StoreReader & StoreWriter,
    ) {}

    /**
     * Never rejects for a single item's remote failure; check the counts.
     *
     * @example
     * ```typescript
     * const output = await apply.execute()
     *
     * if (output.conflicts.length > 0) {
     *     // remote changed under these names; run diff and restage
     * }
     * ```
     */
    async execute(input: ApplyInput = {}, signal?: AbortSignal): Promise<ApplyOutput> {

        const { service, serviceName, itemName } = this.strategy

        const output: ApplyOutput = {
            serviceName,
            itemName,
            entryResults: [],
            entrySucceeded: 0,
            entryFailed: 0,
            tagResults: [],
            tagSucceeded: 0,
            tagFailed: 0,
            conflicts: [],
            cancelled: false,
        }

        let entries = await this.store.listEntries(service, signal)
        let tags = await this.store.listTags(service, signal)

        if (input.name !== undefined) {

            entries = pick(entries, input.name)
            tags = pick(tags, input.name)

            if (isEmpty(entries) && isEmpty(tags)) {

                throw new NotStagedError(service, input.name, `${itemName} ${input.name} is not staged`)
            }
        }

        if (isEmpty(entries) && isEmpty(tags)) return output

        if (!input.ignoreConflicts && !isEmpty(entries)) {

            output.conflicts = await checkConflicts(this.strategy, entries, signal)

            if (output.conflicts.length > 0) {

                if (input.rejectOnConflict) throw new ConflictError(service, output.conflicts)

                entries = omit(entries, output.conflicts)
                tags = omit(tags, output.conflicts)

                observer.emit('apply:conflict', { service, names: output.conflicts })
            }
        }

        const entryQueue = sortedEntries(entries)
        const tagQueue = sortedEntries(tags)

        observer.emit('apply:start', { service, entries: entryQueue.length, tags: tagQueue.length })

        let remaining = entryQueue.length + tagQueue.length

        for (const [name, entry] of entryQueue) {

            if (signal?.aborted) break

            const [, err] = await attempt(() => this.strategy.apply(name, entry))
            remaining--

            if (err) {

                output.entryResults.push({ name, status: 'failed', error: err })
                output.entryFailed++

                observer.emit('apply:failed', { service, name, error: err.message })
                continue
            }

            const status = STATUS_BY_OPERATION[entry.operation]

            await this.store.unstageEntry(service, name)

            output.entryResults.push({ name, status })
            output.entrySucceeded++

            observer.emit('apply:item', { service, name, status })
        }

        for (const [name, tagEntry] of tagQueue) {

            if (signal?.aborted) break

            const [, err] = await attempt(() => this.strategy.applyTags(name, tagEntry))
            remaining--

            const result: ApplyTagResult = {
                name,
                add: { ...tagEntry.add },
                remove: sortedValues(tagEntry.remove),
            }

            if (err) {

                output.tagResults.push({ ...result, error: err })
                output.tagFailed++

                observer.emit('apply:failed', { service, name, error: err.message })
                continue
            }

            await this.store.unstageTag(service, name)

            output.tagResults.push(result)
            output.tagSucceeded++

            observer.emit('apply:item', { service, name, status: 'tagged' })
        }

        if (remaining > 0) {

            output.cancelled = true

            observer.emit('apply:cancelled', { service, remaining })
        }

        observer.emit('apply:complete', {
            service,
            entrySucceeded: output.entrySucceeded,
            entryFailed: output.entryFailed,
            tagSucceeded: output.tagSucceeded,
            tagFailed: output.tagFailed,
            conflicts: output.conflicts.length,
        })

        return output
    }
}


function pick<T>(record: Record<string, T>, name: string): Record<string, T> {

    const value = record[name]

    return value !== undefined && Object.hasOwn(record, name) ? { [name]: value } : {}
}


function omit<T>(record: Record<string, T>, names: string[]): Record<string, T> {

    const result = createItemMap<T>()

    for (const [name, value] of Object.entries(record)) {

        if (!names.includes(name)) result[name] = value
    }

    return result
}


function isEmpty(record: Record<string, unknown>): boolean {

    return Object.keys(record).length === 0
}

