/**
 * Status: list what is staged for one service.
 */
import { sortedEntries, sortedValues } from '../collections.js'
import { NotStagedError } from '../errors.js'
import type { StoreReader } from '../store/types.js'
import type { ServiceStrategy } from '../strategy/types.js'
import { findEntry, findTag } from '../transition/executor.js'
import type { DeleteOptions, Entry, Operation, Service, TagEntry } from '../types.js'


export interface StatusInput {

    /** Show only this item. Rejects with NotStagedError when it has nothing staged. */
    name?: string
}


export interface StatusEntry {

    name: string
    operation: Operation
    value?: string
    description?: string
    deleteOptions?: DeleteOptions
    stagedAt: Date
    showDeleteOptions: boolean
}


export interface StatusTagEntry {

    name: string
    add: Record<string, string>
    remove: string[]
    stagedAt: Date
}


export interface StatusOutput {

    service: Service
    serviceName: string
    itemName: string
    entries: StatusEntry[]
    tagEntries: StatusTagEntry[]
}


export class StatusUseCase {

    constructor(
        private readonly strategy: ServiceStrategy,
        private readonly store: StoreReader,
    ) {}

    async execute(input: StatusInput = {}, signal?: AbortSignal): Promise<StatusOutput> {

        const { service, serviceName, itemName, hasDeleteOptions } = this.strategy

        const output: StatusOutput = {
            service,
            serviceName,
            itemName,
            entries: [],
            tagEntries: [],
        }

        if (input.name !== undefined) {

            const entry = await findEntry(this.store, service, input.name, signal)
            const tagEntry = await findTag(this.store, service, input.name, signal)

            if (!entry && !tagEntry) {

                throw new NotStagedError(service, input.name, `${itemName} ${input.name} is not staged`)
            }

            if (entry) output.entries.push(toStatusEntry(input.name, entry, hasDeleteOptions))
            if (tagEntry) output.tagEntries.push(toStatusTagEntry(input.name, tagEntry))

            return output
        }

        const entries = await this.store.listEntries(service, signal)
        const tags = await this.store.listTags(service, signal)

        for (const [name, entry] of sortedEntries(entries)) {

            output.entries.push(toStatusEntry(name, entry, hasDeleteOptions))
        }

        for (const [name, tagEntry] of sortedEntries(tags)) {

            output.tagEntries.push(toStatusTagEntry(name, tagEntry))
        }

        return output
    }
}


function toStatusEntry(name: string, entry: Entry, showDeleteOptions: boolean): StatusEntry {

    return {
        name,
        operation: entry.operation,
        value: entry.value,
        description: entry.description,
        deleteOptions: entry.deleteOptions,
        stagedAt: entry.stagedAt,
        showDeleteOptions,
    }
}


function toStatusTagEntry(name: string, tagEntry: TagEntry): StatusTagEntry {

    return {
        name,
        add: { ...tagEntry.add },
        remove: sortedValues(tagEntry.remove),
        stagedAt: tagEntry.stagedAt,
    }
}
