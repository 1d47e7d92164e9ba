/**
 * Drain: move staged changes from the file store into the resident store.
 *
 * Nothing is written when the file cannot be read (including a wrong
 * passphrase), or when the resident store already holds items for the
 * target without `force`: any item blocks a plain drain, and an item staged
 * under the same name as a file item blocks a merge.
 */
import { observer } from '../../observer.js'
import { AgentHasChangesError, NothingToDrainError, TransferError } from '../errors.js'
import { countState, hasCollision, isStateEmpty, mergeState } from '../state.js'
import type { StateTransfer } from '../store/types.js'
import type { Service } from '../types.js'


export interface DrainInput {

    /** Drain one service only */
    service?: Service

    /** Leave the drained items in the file. Default: false */
    keep?: boolean

    /** Drain even when the resident store holds items for the target */
    force?: boolean

    /** Resident items win on collision; otherwise file items replace them */
    merge?: boolean
}


export interface DrainOutput {

    entries: number
    tags: number

    /** At least one file item shared its (service, name) with a resident item */
    merged: boolean

    /** Set when the drain committed but clearing the file failed */
    cleanupError?: TransferError
}


export class DrainUseCase {

    constructor(
        private readonly file: StateTransfer,
        private readonly agent: StateTransfer,
    ) {}

    /**
     * @example
     * ```typescript
     * const drain = new DrainUseCase(fileStore, residentStore)
     *
     * const output = await drain.execute({ merge: true })
     * // { entries: 3, tags: 1, merged: true }
     * ```
     */
    async execute(input: DrainInput = {}, signal?: AbortSignal): Promise<DrainOutput> {

        const { service, keep = false, force = false, merge = false } = input
        const label = service ?? 'all'

        observer.emit('drain:start', { service: label, keep, force, merge })

        const fileState = await this.file.drain(service, true, signal)

        if (isStateEmpty(fileState, service)) throw new NothingToDrainError()

        const agentState = await this.agent.drain(undefined, true, signal)
        const agentHasItems = !isStateEmpty(agentState, service)

        const blocked = !force && agentHasItems && (!merge || hasCollision(agentState, fileState))

        if (blocked) {

            observer.emit('drain:blocked', { service: label })

            throw new AgentHasChangesError(service)
        }

        const merged = mergeState(agentState, fileState, merge ? 'keep-existing' : 'overwrite')

        try {

            await this.agent.writeState(agentState, service, signal)
        }
        catch (err) {

            throw new TransferError('drain', 'write', false, { cause: err })
        }

        const output: DrainOutput = {
            ...countState(fileState, service),
            merged,
        }

        if (!keep) {

            try {

                await this.file.drain(service, false)
            }
            catch (err) {

                output.cleanupError = new TransferError('drain', 'cleanup', true, { cause: err })

                observer.emit('error', { source: 'drain', error: output.cleanupError })
            }
        }

        observer.emit('drain:complete', {
            service: label,
            entries: output.entries,
            tags: output.tags,
            merged: output.merged,
        })

        return output
    }
}
