/**
 * Staging state model.
 *
 * A State is the full record of pending intent for one identity scope
 * (account + region). Items are addressed by (service, name) and may carry
 * a value Entry, a TagEntry, both, or neither.
 *
 * These are plain value types. Stores and use cases operate on them.
 */


/**
 * Remote resource kinds. Each one is a disjoint namespace of item names.
 */
export const SERVICES = ['param', 'secret'] as const

export type Service = typeof SERVICES[number]


/**
 * Pending value change kind.
 */
export type Operation = 'create' | 'update' | 'delete'


/** Current on-disk schema version. */
export const STATE_VERSION = 2


/**
 * Secret deletion parameters.
 *
 * `recoveryWindow` is only meaningful when `force` is false.
 */
export interface DeleteOptions {

    force: boolean
    recoveryWindow: number
}


/**
 * One pending value change for an item.
 *
 * `value` is present for create/update and absent for delete.
 */
export interface Entry {

    operation: Operation
    value?: string
    description?: string
    stagedAt: Date

    /** Remote last-modified time observed when the change was staged */
    baseModifiedAt?: Date

    deleteOptions?: DeleteOptions
}


/**
 * One pending tag change for an item.
 *
 * Never stored with both `add` and `remove` empty.
 */
export interface TagEntry {

    add: Record<string, string>
    remove: Set<string>
    stagedAt: Date
    baseModifiedAt?: Date
}


export type EntryMap = Record<string, Entry>
export type TagEntryMap = Record<string, TagEntry>


/**
 * The full staging record for one identity scope.
 */
export interface State {

    version: number
    entries: Record<Service, EntryMap>
    tags: Record<Service, TagEntryMap>
}


/**
 * Remote account identity a store is bound to.
 */
export interface IdentityScope {

    accountId: string
    region: string
}


/**
 * Cache key for an identity scope.
 *
 * @example
 * ```typescript
 * scopeKey({ accountId: '123456789012', region: 'us-east-1' })
 * // '123456789012/us-east-1'
 * ```
 */
export function scopeKey(scope: IdentityScope): string {

    return `${scope.accountId}/${scope.region}`
}


/**
 * Type guard for service tags coming from untyped input.
 */
export function isService(value: unknown): value is Service {

    return typeof value === 'string' && SERVICES.some((service) => service === value)
}


/**
 * Pick the services an optional filter refers to.
 *
 * `undefined` means every service.
 */
export function targetServices(service?: Service): readonly Service[] {

    return service ? [service] : SERVICES
}
