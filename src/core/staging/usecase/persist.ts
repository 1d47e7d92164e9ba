/**
 * Persist: move staged changes from the resident store into the file store.
 */
import { observer } from '../../observer.js'
import { NothingToPersistError, TransferError } from '../errors.js'
import { countState, isStateEmpty, mergeState, removeService } from '../state.js'
import type { StateTransfer } from '../store/types.js'
import type { Service } from '../types.js'


export type PersistMode = 'overwrite' | 'merge'


export interface PersistInput {

    /** Persist one service only */
    service?: Service

    /** Leave the items in the resident store (a checkpoint). Default: false */
    keep?: boolean

    /**
     * `overwrite` replaces the file (or the target service's part of it).
     * `merge` adds to what the file holds; resident items win on collision.
     */
    mode?: PersistMode
}


export interface PersistOutput {

    entries: number
    tags: number

    /** Set when the file was written but clearing the resident store failed */
    cleanupError?: TransferError
}


export class PersistUseCase {

    constructor(
        private readonly agent: StateTransfer,
        private readonly file: StateTransfer,
    ) {}

    async execute(input: PersistInput = {}, signal?: AbortSignal): Promise<PersistOutput> {

        const { service, keep = false, mode = 'overwrite' } = input
        const label = service ?? 'all'

        observer.emit('persist:start', { service: label, keep, mode })

        const persisted = await this.agent.drain(service, true, signal)

        if (isStateEmpty(persisted, service)) throw new NothingToPersistError()

        let finalState = persisted

        if (mode === 'merge' || service) {

            // Reading first means a wrong passphrase stops before anything is written
            finalState = await this.file.drain(undefined, true, signal)

            if (mode === 'overwrite') removeService(finalState, service)

            mergeState(finalState, persisted, 'overwrite')
        }

        try {

            await this.file.writeState(finalState, undefined, signal)
        }
        catch (err) {

            throw new TransferError('persist', 'write', false, { cause: err })
        }

        const output: PersistOutput = countState(persisted, service)

        if (!keep) {

            try {

                await this.agent.drain(service, false)
            }
            catch (err) {

                output.cleanupError = new TransferError('persist', 'cleanup', true, { cause: err })

                observer.emit('error', { source: 'persist', error: output.cleanupError })
            }
        }

        observer.emit('persist:complete', { service: label, entries: output.entries, tags: output.tags })

        return output
    }
}
