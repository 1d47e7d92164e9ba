/**
 * Add: stage a new item for creation.
 */
import type { StoreReader, StoreWriter } from '../store/types.js'
import type { DeleteStrategy } from '../strategy/types.js'
import { findEntry, toStagedState, TransitionExecutor } from '../transition/executor.js'


export interface AddInput {

    name: string
    value: string
    description?: string
}


export interface AddOutput {

    name: string
}


export interface DraftOutput {

    /** Staged create value, when one exists */
    value?: string
    isStaged: boolean
}


/**
 * @example
 * ```typescript
 * const add = new AddUseCase(strategy, store)
 *
 * await add.execute({ name: '/app/new-flag', value: 'on' })
 * await add.draft({ name: '/app/new-flag' })  // { value: 'on', isStaged: true }
 * ```
 */
export class AddUseCase {

    constructor(
        private readonly strategy: DeleteStrategy,
        private readonly store: StoreReader & StoreWriter,
    ) {}

    /**
     * Rejects with TransitionError when the item exists remotely or has an
     * update or delete staged. A staged create is overwritten.
     */
    async execute(input: AddInput, signal?: AbortSignal): Promise<AddOutput> {

        const service = this.strategy.service
        const name = this.strategy.parseName(input.name)

        const staged = await findEntry(this.store, service, name, signal)

        // A pending create means the item did not exist when it was staged
        const exists = staged?.operation === 'create'
            ? false
            : await this.strategy.fetchLastModified(name, signal) !== null

        const executor = new TransitionExecutor(this.store)

        await executor.executeEntry(
            service,
            name,
            // Only existence matters for add
            { current: exists ? '' : null, staged: toStagedState(staged) },
            { type: 'add', value: input.value },
            { description: input.description || undefined },
            signal,
        )

        return { name }
    }

    /**
     * The staged create value for an item, so an editor can resume it.
     */
    async draft(input: { name: string }, signal?: AbortSignal): Promise<DraftOutput> {

        const name = this.strategy.parseName(input.name)
        const staged = await findEntry(this.store, this.strategy.service, name, signal)

        if (staged?.operation !== 'create') return { isStaged: false }

        return { value: staged.value ?? '', isStaged: true }
    }
}
