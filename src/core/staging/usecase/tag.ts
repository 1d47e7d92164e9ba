/**
 * Tag changes: stage tag additions and removals, and cancel single keys.
 */
import { InvalidInputError, NotStagedError, ResourceNotFoundError } from '../errors.js'
import { isTagEntryEmpty } from '../state.js'
import type { StoreReader, StoreWriter } from '../store/types.js'
import type { EditStrategy } from '../strategy/types.js'
import {
    findEntry,
    loadStagedTags,
    toStagedState,
    TransitionExecutor,
} from '../transition/executor.js'
import type { EntryState, StagedTags, TagAction } from '../transition/types.js'
import type { Service } from '../types.js'


export interface TagInput {

    name: string
    tags: Record<string, string>
}


export interface UntagInput {

    name: string
    keys: string[]
}


export interface CancelTagInput {

    name: string
    key: string
}


export interface TagOutput {

    name: string

    /** The tag entry became empty and was removed */
    unstaged: boolean
}


interface TagContext {

    service: Service
    name: string
    state: EntryState
    tags: StagedTags
    baseModifiedAt?: Date
}


export class TagUseCase {

    constructor(
        private readonly strategy: EditStrategy,
        private readonly store: StoreReader & StoreWriter,
    ) {}

    /**
     * Stage tags to add or update. Keys staged for removal are un-removed.
     *
     * @example
     * ```typescript
     * await tags.tag({ name: '/app/url', tags: { env: 'prod', team: 'backend' } })
     * ```
     */
    async tag(input: TagInput, signal?: AbortSignal): Promise<TagOutput> {

        if (Object.keys(input.tags).length === 0) {

            throw new InvalidInputError('No tags specified')
        }

        return this.#execute(input.name, { type: 'tag', tags: input.tags }, signal)
    }

    /**
     * Stage tag keys to remove. Keys staged for addition are dropped.
     */
    async untag(input: UntagInput, signal?: AbortSignal): Promise<TagOutput> {

        if (input.keys.length === 0) {

            throw new InvalidInputError('No tag keys specified')
        }

        return this.#execute(input.name, { type: 'untag', keys: new Set(input.keys) }, signal)
    }

    /**
     * Drop one key from the staged additions. Rejects with NotStagedError
     * when the key is not staged for addition.
     */
    async cancelAddTag(input: CancelTagInput, signal?: AbortSignal): Promise<TagOutput> {

        return this.#cancel(input, 'add', signal)
    }

    /**
     * Drop one key from the staged removals. Rejects with NotStagedError
     * when the key is not staged for removal.
     */
    async cancelRemoveTag(input: CancelTagInput, signal?: AbortSignal): Promise<TagOutput> {

        return this.#cancel(input, 'remove', signal)
    }

    // ─────────────────────────────────────────────────────────────
    // Internals
    // ─────────────────────────────────────────────────────────────

    async #execute(inputName: string, action: TagAction, signal?: AbortSignal): Promise<TagOutput> {

        const context = await this.#load(inputName, signal)
        const executor = new TransitionExecutor(this.store)

        const result = await executor.executeTag(
            context.service,
            context.name,
            context.state,
            context.tags,
            action,
            context.baseModifiedAt,
            signal,
        )

        return { name: context.name, unstaged: isTagEntryEmpty(result.tags) }
    }

    async #load(inputName: string, signal?: AbortSignal): Promise<TagContext> {

        const service = this.strategy.service
        const name = this.strategy.parseName(inputName)
        const staged = await findEntry(this.store, service, name, signal)

        let current: string | null = null
        let remoteModifiedAt: Date | undefined

        if (staged?.operation !== 'create') {

            try {

                const remote = await this.strategy.fetchCurrentValue(name, signal)

                current = remote.value
                remoteModifiedAt = remote.lastModified
            }
            catch (err) {

                if (!(err instanceof ResourceNotFoundError)) throw err
            }
        }

        const { tags, baseModifiedAt } = await loadStagedTags(this.store, service, name, signal)

        return {
            service,
            name,
            state: { current, staged: toStagedState(staged) },
            tags,
            baseModifiedAt: baseModifiedAt ?? remoteModifiedAt,
        }
    }

    async #cancel(input: CancelTagInput, set: 'add' | 'remove', signal?: AbortSignal): Promise<TagOutput> {

        const service = this.strategy.service
        const name = this.strategy.parseName(input.name)

        // Rejects with NotStagedError when there is no tag entry at all
        const tagEntry = await this.store.getTag(service, name, signal)

        const staged = set === 'add'
            ? Object.hasOwn(tagEntry.add, input.key)
            : tagEntry.remove.has(input.key)

        if (!staged) {

            const label = set === 'add' ? 'addition' : 'removal'

            throw new NotStagedError(service, name, `Tag '${input.key}' is not staged for ${label} on ${name}`)
        }

        if (set === 'add') delete tagEntry.add[input.key]
        else tagEntry.remove.delete(input.key)

        if (isTagEntryEmpty(tagEntry)) {

            await this.store.unstageTag(service, name, signal)

            return { name, unstaged: true }
        }

        await this.store.stageTag(service, name, { ...tagEntry, stagedAt: new Date() }, signal)

        return { name, unstaged: false }
    }
}
