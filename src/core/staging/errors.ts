/**
 * Staging errors.
 *
 * Each class carries a literal `name` so callers (and the SDK boundary) can
 * classify failures without string matching on messages.
 */
import type { Operation, Service } from './types.js'


/**
 * Lookup on an item with nothing staged.
 *
 * @example
 * ```typescript
 * const [entry, err] = await attempt(() => store.getEntry('param', '/app/url'))
 * if (err instanceof NotStagedError) {
 *     // nothing pending for /app/url
 * }
 * ```
 */
export class NotStagedError extends Error {

    override readonly name = 'NotStagedError' as const

    constructor(
        public readonly service: Service,
        public readonly itemName: string,
        detail?: string,
    ) {

        super(detail ?? `${service} ${itemName} is not staged`)
    }
}


/**
 * Unrecognized service tag at the front-end boundary.
 */
export class InvalidServiceError extends Error {

    override readonly name = 'InvalidServiceError' as const

    constructor(public readonly service: string) {

        super(`Invalid service: '${service}' (expected 'param' or 'secret')`)
    }
}


/**
 * Wrong passphrase, missing passphrase, or a corrupted encrypted container.
 */
export class DecryptionFailedError extends Error {

    override readonly name = 'DecryptionFailedError' as const

    constructor(
        public readonly reason: 'passphrase-required' | 'wrong-passphrase' | 'corrupted',
        options?: { cause?: unknown },
    ) {

        const messages = {
            'passphrase-required': 'Staging file is encrypted; a passphrase is required',
            'wrong-passphrase': 'Decryption failed: wrong passphrase or corrupted data',
            'corrupted': 'Decryption failed: invalid encrypted container',
        } as const

        super(messages[reason], options)
    }
}


/**
 * Remote state diverged from what a staged change assumed.
 */
export class ConflictError extends Error {

    override readonly name = 'ConflictError' as const

    constructor(
        public readonly service: Service,
        public readonly names: string[],
    ) {

        super(`${names.length} conflict(s) detected in ${service}: ${names.join(', ')}`)
    }
}


/**
 * A remote API call failed. Carried per item in apply results.
 */
export class RemoteOperationFailedError extends Error {

    override readonly name = 'RemoteOperationFailedError' as const

    constructor(
        public readonly operation: Operation | 'tag' | 'untag' | 'fetch',
        public readonly itemName: string,
        options?: { cause?: unknown },
    ) {

        const cause = options?.cause instanceof Error ? `: ${options.cause.message}` : ''

        super(`Failed to ${operation} ${itemName}${cause}`, options)
    }
}


/**
 * The remote item does not exist.
 */
export class ResourceNotFoundError extends Error {

    override readonly name = 'ResourceNotFoundError' as const

    constructor(
        public readonly service: Service,
        public readonly itemName: string,
        options?: { cause?: unknown },
    ) {

        super(`${service} ${itemName} not found`, options)
    }
}


/**
 * A staging action is not allowed from the item's current staged state.
 */
export class TransitionError extends Error {

    override readonly name = 'TransitionError' as const

    constructor(
        public readonly code:
            | 'add-to-existing'
            | 'add-to-update'
            | 'add-to-delete'
            | 'edit-delete'
            | 'delete-not-found'
            | 'tag-not-found'
            | 'tag-delete'
            | 'untag-not-found'
            | 'untag-delete',
        message: string,
    ) {

        super(message)
    }
}


/**
 * Invalid user input: a malformed name or version spec, an empty tag set,
 * or a recovery window out of range.
 */
export class InvalidInputError extends Error {

    override readonly name = 'InvalidInputError' as const
}


/**
 * Drain found nothing to transfer.
 */
export class NothingToDrainError extends Error {

    override readonly name = 'NothingToDrainError' as const

    constructor() {

        super('No staged changes in file to drain')
    }
}


/**
 * Persist found nothing to transfer.
 */
export class NothingToPersistError extends Error {

    override readonly name = 'NothingToPersistError' as const

    constructor() {

        super('No staged changes to persist')
    }
}


/**
 * Drain blocked because the resident store already holds staged items.
 */
export class AgentHasChangesError extends Error {

    override readonly name = 'AgentHasChangesError' as const

    constructor(public readonly service?: Service) {

        const scope = service ? ` for ${service}` : ''

        super(`Agent already has staged changes${scope}; use force to overwrite or merge to combine`)
    }
}


/**
 * A drain or persist step failed.
 *
 * `nonFatal` is set when the transfer itself was committed and only the
 * source cleanup failed.
 */
export class TransferError extends Error {

    override readonly name = 'TransferError' as const

    constructor(
        public readonly direction: 'drain' | 'persist',
        public readonly step: 'load' | 'write' | 'cleanup',
        public readonly nonFatal: boolean,
        options: { cause: unknown },
    ) {

        const cause = options.cause instanceof Error ? options.cause.message : String(options.cause)

        super(`${direction} failed at ${step}: ${cause}`, options)
    }
}


/**
 * The staging file exists but does not hold a valid state.
 */
export class StateFileError extends Error {

    override readonly name = 'StateFileError' as const

    constructor(
        public readonly path: string,
        message: string,
        options?: { cause?: unknown },
    ) {

        super(`${message} (${path})`, options)
    }
}
