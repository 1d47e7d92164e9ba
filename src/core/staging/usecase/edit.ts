/**
 * Edit: stage a value change for an existing item.
 */
import { TransitionError } from '../errors.js'
import type { StoreReader, StoreWriter } from '../store/types.js'
import type { EditStrategy } from '../strategy/types.js'
import { findEntry, toStagedState, TransitionExecutor } from '../transition/executor.js'


export interface EditInput {

    name: string
    value: string
    description?: string
}


export interface EditOutput {

    name: string

    /** Nothing was staged because the value equals the remote value */
    skipped: boolean

    /** A staged update was dropped because the value went back to the remote value */
    unstaged: boolean
}


export interface BaselineOutput {

    value: string

    /** The value comes from a staged change rather than the remote */
    isStagedEdit: boolean
}


export class EditUseCase {

    constructor(
        private readonly strategy: EditStrategy,
        private readonly store: StoreReader & StoreWriter,
    ) {}

    async execute(input: EditInput, signal?: AbortSignal): Promise<EditOutput> {

        const service = this.strategy.service
        const name = this.strategy.parseName(input.name)
        const staged = await findEntry(this.store, service, name, signal)

        let current: string | null = null
        let remoteModifiedAt: Date | undefined

        // A staged create has nothing remote to compare against
        if (staged?.operation !== 'create') {

            const remote = await this.strategy.fetchCurrentValue(name, signal)

            current = remote.value
            remoteModifiedAt = remote.lastModified
        }

        const state = { current, staged: toStagedState(staged) }
        const executor = new TransitionExecutor(this.store)

        const result = await executor.executeEntry(
            service,
            name,
            state,
            { type: 'edit', value: input.value },
            {
                // Keep the first observed base so later edits don't hide a remote change
                baseModifiedAt: staged?.baseModifiedAt ?? remoteModifiedAt,
                description: input.description || staged?.description,
            },
            signal,
        )

        const wasStaged = state.staged.kind !== 'not-staged'
        const isStaged = result.state.staged.kind !== 'not-staged'

        return {
            name,
            skipped: !wasStaged && !isStaged,
            unstaged: wasStaged && !isStaged,
        }
    }

    /**
     * The value an editor should start from: the staged value when one
     * exists, otherwise the remote current value.
     */
    async baseline(input: { name: string }, signal?: AbortSignal): Promise<BaselineOutput> {

        const name = this.strategy.parseName(input.name)
        const staged = await findEntry(this.store, this.strategy.service, name, signal)

        if (staged) {

            if (staged.operation === 'delete') {

                throw new TransitionError('edit-delete', 'cannot edit: staged for deletion, reset first')
            }

            return { value: staged.value ?? '', isStagedEdit: true }
        }

        const remote = await this.strategy.fetchCurrentValue(name, signal)

        return { value: remote.value, isStagedEdit: false }
    }
}
