/**
 * Delete: stage the removal of an item.
 *
 * Deleting an item that only exists as a staged create drops the create
 * (and its tags) instead of staging a delete.
 */
import { InvalidInputError } from '../errors.js'
import { RECOVERY_WINDOW_MAX, RECOVERY_WINDOW_MIN } from '../schema.js'
import type { StoreReader, StoreWriter } from '../store/types.js'
import type { DeleteStrategy } from '../strategy/types.js'
import { findEntry, toStagedState, TransitionExecutor } from '../transition/executor.js'
import type { DeleteOptions } from '../types.js'


export const DEFAULT_RECOVERY_WINDOW = 30


export interface DeleteInput {

    name: string

    /** Secrets only: delete without a recovery window */
    force?: boolean

    /** Secrets only: days before permanent deletion. Default: 30 */
    recoveryWindow?: number
}


export interface DeleteOutput {

    name: string

    /** A staged create was removed instead of staging a delete */
    unstaged: boolean
    showDeleteOptions: boolean
    deleteOptions?: DeleteOptions
}


export class DeleteUseCase {

    constructor(
        private readonly strategy: DeleteStrategy,
        private readonly store: StoreReader & StoreWriter,
    ) {}

    async execute(input: DeleteInput, signal?: AbortSignal): Promise<DeleteOutput> {

        const { service, hasDeleteOptions } = this.strategy
        const name = this.strategy.parseName(input.name)

        const deleteOptions = hasDeleteOptions ? resolveDeleteOptions(input) : undefined

        const lastModified = await this.strategy.fetchLastModified(name, signal)
        const staged = await findEntry(this.store, service, name, signal)

        const executor = new TransitionExecutor(this.store)

        const result = await executor.executeEntry(
            service,
            name,
            // Only existence matters for delete
            { current: lastModified === null ? null : '', staged: toStagedState(staged) },
            { type: 'delete' },
            {
                baseModifiedAt: lastModified ?? undefined,
                deleteOptions,
            },
            signal,
        )

        if (result.discardTags) {

            return { name, unstaged: true, showDeleteOptions: false }
        }

        return { name, unstaged: false, showDeleteOptions: hasDeleteOptions, deleteOptions }
    }
}


function resolveDeleteOptions(input: DeleteInput): DeleteOptions {

    const force = input.force ?? false
    const recoveryWindow = input.recoveryWindow ?? DEFAULT_RECOVERY_WINDOW

    if (!force && (
        !Number.isInteger(recoveryWindow)
        || recoveryWindow < RECOVERY_WINDOW_MIN
        || recoveryWindow > RECOVERY_WINDOW_MAX
    )) {

        throw new InvalidInputError(
            `Recovery window must be between ${RECOVERY_WINDOW_MIN} and ${RECOVERY_WINDOW_MAX} days`,
        )
    }

    return { force, recoveryWindow }
}
