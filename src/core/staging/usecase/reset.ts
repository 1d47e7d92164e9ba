/**
 * Reset: discard staged changes, or restage a historical version.
 */
import { observer } from '../../observer.js'
import { InvalidInputError } from '../errors.js'
import type { StoreReader, StoreWriter } from '../store/types.js'
import type { ResetStrategy } from '../strategy/types.js'
import type { Service } from '../types.js'


export interface ResetInput {

    /** Item name, optionally with a version spec (`/app/url#3`, `db:AWSPREVIOUS`) */
    spec?: string

    /** Clear every staged change for the service */
    all?: boolean
}


export type ResetResult =
    | { type: 'unstaged'; name: string }
    | { type: 'notStaged'; name: string }
    | { type: 'restored'; name: string; versionLabel: string }
    | { type: 'unstagedAll'; count: number }
    | { type: 'nothingStaged' }


export type ResetOutput = ResetResult & {

    serviceName: string
    itemName: string
}


/**
 * Remove both the entry and the tag entry for one item. Idempotent.
 * Resolves true when anything was removed.
 */
export async function unstageItem(
    store: StoreWriter,
    service: Service,
    name: string,
    signal?: AbortSignal,
): Promise<boolean> {

    const entryRemoved = await store.unstageEntry(service, name, signal)
    const tagRemoved = await store.unstageTag(service, name, signal)

    return entryRemoved || tagRemoved
}


export class ResetUseCase {

    constructor(
        private readonly strategy: ResetStrategy,
        private readonly store: StoreReader & StoreWriter,
    ) {}

    /**
     * @example
     * ```typescript
     * await reset.execute({ spec: '/app/url' })      // { type: 'unstaged', ... }
     * await reset.execute({ spec: '/app/url#3' })    // { type: 'restored', versionLabel: '#3', ... }
     * await reset.execute({ all: true })             // { type: 'unstagedAll', count: 2, ... }
     * ```
     */
    async execute(input: ResetInput, signal?: AbortSignal): Promise<ResetOutput> {

        const result = await this.#run(input, signal)

        return {
            ...result,
            serviceName: this.strategy.serviceName,
            itemName: this.strategy.itemName,
        }
    }

    async #run(input: ResetInput, signal?: AbortSignal): Promise<ResetResult> {

        if (input.all) return this.#unstageAll(signal)

        if (!input.spec) {

            throw new InvalidInputError('A name is required unless resetting everything')
        }

        const { name, hasVersion } = this.strategy.parseSpec(input.spec)

        if (hasVersion) return this.#restore(input.spec, name, signal)

        const removed = await unstageItem(this.store, this.strategy.service, name, signal)

        return removed ? { type: 'unstaged', name } : { type: 'notStaged', name }
    }

    async #unstageAll(signal?: AbortSignal): Promise<ResetResult> {

        const service = this.strategy.service

        const entries = await this.store.listEntries(service, signal)
        const tags = await this.store.listTags(service, signal)

        const count = Object.keys(entries).length + Object.keys(tags).length

        if (count === 0) return { type: 'nothingStaged' }

        await this.store.unstageAll(service, signal)

        return { type: 'unstagedAll', count }
    }

    async #restore(spec: string, name: string, signal?: AbortSignal): Promise<ResetResult> {

        const { value, versionLabel } = await this.strategy.fetchVersion(spec, signal)

        await this.store.stageEntry(this.strategy.service, name, {
            operation: 'update',
            value,
            stagedAt: new Date(),
        }, signal)

        observer.emit('stage:restored', { service: this.strategy.service, name, versionLabel })

        return { type: 'restored', name, versionLabel }
    }
}
