/**
 * Strategy contracts.
 *
 * One concrete strategy per resource kind supplies the remote operations the
 * use cases need. Each use case depends only on the capability it uses, so
 * tests can hand it a narrow fake.
 */
import type { Entry, Service, TagEntry } from '../types.js'


/**
 * Identity of a resource kind.
 */
export interface ServiceStrategy {

    readonly service: Service

    /** Display name of the backing service, e.g. 'Parameter Store' */
    readonly serviceName: string

    /** Display name of one item, e.g. 'parameter' */
    readonly itemName: string

    /** Whether deletes take a recovery window / force flag */
    readonly hasDeleteOptions: boolean
}


/**
 * Parsed `name[specifier]` input.
 */
export interface ParsedSpec {

    name: string
    hasVersion: boolean
}


/**
 * Name validation for a resource kind.
 */
export interface Parser extends ServiceStrategy {

    /** Validate a bare item name. Version specifiers are rejected. */
    parseName(input: string): string

    /** Split `name` from an optional version specifier. */
    parseSpec(input: string): ParsedSpec
}


/**
 * Current remote value used when staging edits and tags.
 */
export interface EditFetchResult {

    value: string
    lastModified?: Date
}


export interface EditStrategy extends Parser {

    /** Rejects with ResourceNotFoundError when the item does not exist. */
    fetchCurrentValue(name: string, signal?: AbortSignal): Promise<EditFetchResult>
}


export interface DeleteStrategy extends Parser {

    /** Remote last-modified time, or null when the item does not exist. */
    fetchLastModified(name: string, signal?: AbortSignal): Promise<Date | null>
}


export interface ApplyStrategy extends ServiceStrategy {

    /** Push one value change. Rejects with RemoteOperationFailedError. */
    apply(name: string, entry: Entry, signal?: AbortSignal): Promise<void>

    /** Push one tag change. Rejects with RemoteOperationFailedError. */
    applyTags(name: string, tagEntry: TagEntry, signal?: AbortSignal): Promise<void>

    fetchLastModified(name: string, signal?: AbortSignal): Promise<Date | null>
}


/**
 * Remote value and its display identifier (`#3`, `#a1b2c3d4`).
 */
export interface FetchResult {

    value: string
    identifier: string
}


export interface DiffStrategy extends ServiceStrategy {

    /** Rejects with ResourceNotFoundError when the item does not exist. */
    fetchCurrent(name: string, signal?: AbortSignal): Promise<FetchResult>
}


/**
 * A historical value selected by a version spec.
 */
export interface VersionFetchResult {

    value: string
    versionLabel: string
}


export interface ResetStrategy extends Parser {

    /** Resolve a versioned spec (e.g. `/app/url#3`) to its value. */
    fetchVersion(spec: string, signal?: AbortSignal): Promise<VersionFetchResult>
}


/**
 * Everything a resource kind implements.
 */
export interface FullStrategy extends EditStrategy, DeleteStrategy, ApplyStrategy, DiffStrategy, ResetStrategy {}
