/**
 * SDK error classification.
 *
 * Maps any thrown value to a ResponseError so nothing raw crosses the
 * front-end boundary.
 */
import { ConfigValidationError } from '../core/config/index.js';
import {
    AgentHasChangesError,
    ConflictError,
    DecryptionFailedError,
    InvalidInputError,
    InvalidServiceError,
    NothingToDrainError,
    NothingToPersistError,
    NotStagedError,
    RemoteOperationFailedError,
    ResourceNotFoundError,
    StateFileError,
    TransferError,
    TransitionError,
} from '../core/staging/index.js';
import type { ErrorKind, ResponseError } from './types.js';

const CANCELLED_NAMES = new Set(['AbortError', 'TimeoutError']);

/**
 * Pick the kind for an error.
 *
 * @example
 * ```typescript
 * classifyError(new NotStagedError('param', '/app/url'))  // 'NotStaged'
 * classifyError(new TypeError('boom'))                    // 'Internal'
 * ```
 */
export function classifyError(err: unknown): ErrorKind {

    if (err instanceof NotStagedError) return 'NotStaged';
    if (err instanceof InvalidServiceError) return 'InvalidService';
    if (err instanceof DecryptionFailedError) return 'DecryptionFailed';
    if (err instanceof ConflictError) return 'Conflict';
    if (err instanceof RemoteOperationFailedError) return 'RemoteOperationFailed';
    if (err instanceof ResourceNotFoundError) return 'NotFound';
    if (err instanceof AgentHasChangesError) return 'AgentHasChanges';
    if (err instanceof NothingToDrainError || err instanceof NothingToPersistError) return 'NothingToTransfer';
    if (err instanceof TransferError) return 'TransferFailed';
    if (err instanceof StateFileError) return 'CorruptState';

    if (
        err instanceof InvalidInputError
        || err instanceof TransitionError
        || err instanceof ConfigValidationError
    ) {

        return 'InvalidInput';

    }

    if (err instanceof Error && CANCELLED_NAMES.has(err.name)) return 'Cancelled';

    return 'Internal';

}

/**
 * Convert a thrown value into a plain ResponseError.
 */
export function toResponseError(err: unknown): ResponseError {

    const error: ResponseError = {
        kind: classifyError(err),
        message: err instanceof Error ? err.message : String(err),
    };

    if (err instanceof ConflictError) {

        error.names = [...err.names];

    }

    return error;

}
