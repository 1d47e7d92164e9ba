/**
 * SDK Types.
 *
 * Requests and responses at the front-end boundary. Requests carry only
 * primitive fields with the service as a string tag. Responses carry only
 * plain data (dates as ISO strings, sets as arrays) so they survive
 * serialization across a process or UI boundary.
 */
import type { ConfigInput } from '../core/config/types.js';
import type { LoggerOptions } from '../core/logger/index.js';
import type {
    ApplyStatus,
    DeleteOptions,
    DiffOutput,
    Operation,
    PersistMode,
    RemoteApis,
    ResidentStoreRegistry,
    ResetOutput,
    Service,
} from '../core/staging/index.js';

// ─────────────────────────────────────────────────────────────
// Session Options
// ─────────────────────────────────────────────────────────────

export interface CreateSessionOptions {

    /** Config overrides, highest priority */
    config?: ConfigInput;

    /** Environment to resolve from (defaults to process.env) */
    env?: NodeJS.ProcessEnv;

    /** Remote clients. Built from the config when omitted. */
    apis?: RemoteApis;

    /** Resident store registry. The process-wide one when omitted. */
    registry?: ResidentStoreRegistry;

    /** Start the shared logger with the resolved logging config */
    logger?: boolean | Omit<LoggerOptions, 'config'>;

}

// ─────────────────────────────────────────────────────────────
// Responses
// ─────────────────────────────────────────────────────────────

/**
 * Classified failure kinds.
 */
export type ErrorKind =
    | 'NotStaged'
    | 'InvalidService'
    | 'DecryptionFailed'
    | 'Conflict'
    | 'RemoteOperationFailed'
    | 'NotFound'
    | 'InvalidInput'
    | 'AgentHasChanges'
    | 'NothingToTransfer'
    | 'TransferFailed'
    | 'CorruptState'
    | 'Cancelled'
    | 'Internal';

export interface ResponseError {

    kind: ErrorKind;
    message: string;

    /** Conflicting item names, for `Conflict` */
    names?: string[];

}

/**
 * Every session method resolves to one of these; none rejects.
 *
 * @example
 * ```typescript
 * const res = await session.status({ service: 'param' })
 *
 * if (!res.ok) {
 *     showError(res.error.kind, res.error.message)
 *     return
 * }
 *
 * render(res.data.entries)
 * ```
 */
export type Response<T> =
    | { ok: true; data: T }
    | { ok: false; error: ResponseError };

// ─────────────────────────────────────────────────────────────
// Requests
// ─────────────────────────────────────────────────────────────

export interface ServiceRequest {

    /** 'param' or 'secret' */
    service: string;

}

export interface StatusRequest extends ServiceRequest {

    name?: string;

}

export interface ItemRequest extends ServiceRequest {

    name: string;

}

export interface ValueRequest extends ItemRequest {

    value: string;
    description?: string;

}

export interface DeleteRequest extends ItemRequest {

    force?: boolean;
    recoveryWindow?: number;

}

export interface TagRequest extends ItemRequest {

    tags: Record<string, string>;

}

export interface UntagRequest extends ItemRequest {

    keys: string[];

}

export interface CancelTagRequest extends ItemRequest {

    key: string;

}

export interface ResetRequest extends ServiceRequest {

    /** Item name, optionally with a version spec */
    spec?: string;
    all?: boolean;

}

export interface DiffRequest extends ServiceRequest {

    name?: string;

}

export interface ApplyRequest extends ServiceRequest {

    name?: string;
    ignoreConflicts?: boolean;
    rejectOnConflict?: boolean;

}

export interface DrainRequest {

    /** Omit for every service */
    service?: string;

    /** Overrides the session passphrase for this call */
    passphrase?: string;
    keep?: boolean;
    force?: boolean;
    merge?: boolean;

}

export interface PersistRequest {

    /** Omit for every service */
    service?: string;

    /** Overrides the session passphrase for this call */
    passphrase?: string;
    keep?: boolean;
    mode?: PersistMode;

}

// ─────────────────────────────────────────────────────────────
// Response Data
// ─────────────────────────────────────────────────────────────

export interface StatusEntryView {

    name: string;
    operation: Operation;
    value?: string;
    description?: string;
    deleteOptions?: DeleteOptions;
    stagedAt: string;
    showDeleteOptions: boolean;

}

export interface StatusTagEntryView {

    name: string;
    add: Record<string, string>;
    remove: string[];
    stagedAt: string;

}

export interface StatusView {

    service: Service;
    serviceName: string;
    itemName: string;
    entries: StatusEntryView[];
    tagEntries: StatusTagEntryView[];

}

export interface ApplyView {

    serviceName: string;
    itemName: string;
    entryResults: Array<{ name: string; status: ApplyStatus; error?: string }>;
    entrySucceeded: number;
    entryFailed: number;
    tagResults: Array<{ name: string; add: Record<string, string>; remove: string[]; error?: string }>;
    tagSucceeded: number;
    tagFailed: number;
    conflicts: string[];
    cancelled: boolean;

}

export interface TransferView {

    entries: number;
    tags: number;

    /** Drain only */
    merged?: boolean;

    /** Message of a non-fatal cleanup failure */
    cleanupError?: string;

}

export interface FileStatusView {

    path: string;
    exists: boolean;
    encrypted: boolean;

    /** Whether the session was opened with a passphrase */
    passphraseConfigured: boolean;

}

export type { DiffOutput as DiffView, ResetOutput as ResetView };
