/**
 * State helpers.
 *
 * Pure functions over the state model. None of them mutate their inputs
 * unless the name says so (`removeService`, `mergeState`).
 */
import { createItemMap } from './collections.js'
import type { Entry, Service, State, TagEntry } from './types.js'
import { SERVICES, STATE_VERSION, targetServices } from './types.js'


/**
 * How `mergeState` resolves an item present on both sides.
 *
 * - `keep-existing`: the target's item wins (first writer wins)
 * - `overwrite`: the source's item replaces it
 */
export type MergePolicy = 'keep-existing' | 'overwrite'


/**
 * Per-state item counts.
 */
export interface StateCounts {

    entries: number
    tags: number
}


/**
 * Create an empty state with both service namespaces present.
 */
export function createEmptyState(): State {

    return {
        version: STATE_VERSION,
        entries: { param: createItemMap(), secret: createItemMap() },
        tags: { param: createItemMap(), secret: createItemMap() },
    }
}


export function cloneEntry(entry: Entry): Entry {

    const copy: Entry = {
        operation: entry.operation,
        stagedAt: new Date(entry.stagedAt.getTime()),
    }

    if (entry.value !== undefined) copy.value = entry.value
    if (entry.description !== undefined) copy.description = entry.description
    if (entry.baseModifiedAt) copy.baseModifiedAt = new Date(entry.baseModifiedAt.getTime())
    if (entry.deleteOptions) copy.deleteOptions = { ...entry.deleteOptions }

    return copy
}


export function cloneTagEntry(tagEntry: TagEntry): TagEntry {

    const copy: TagEntry = {
        add: { ...tagEntry.add },
        remove: new Set(tagEntry.remove),
        stagedAt: new Date(tagEntry.stagedAt.getTime()),
    }

    if (tagEntry.baseModifiedAt) copy.baseModifiedAt = new Date(tagEntry.baseModifiedAt.getTime())

    return copy
}


/**
 * Deep copy of a state. Dates and sets are copied too.
 */
export function cloneState(state: State): State {

    const copy = createEmptyState()
    copy.version = state.version

    for (const service of SERVICES) {

        for (const [name, entry] of Object.entries(state.entries[service])) {

            copy.entries[service][name] = cloneEntry(entry)
        }

        for (const [name, tagEntry] of Object.entries(state.tags[service])) {

            copy.tags[service][name] = cloneTagEntry(tagEntry)
        }
    }

    return copy
}


/**
 * True when no service holds an entry or a tag entry.
 */
export function isStateEmpty(state: State, service?: Service): boolean {

    return targetServices(service).every((svc) =>
        Object.keys(state.entries[svc]).length === 0 &&
        Object.keys(state.tags[svc]).length === 0
    )
}


/**
 * Copy out one service (or all of them when `service` is undefined).
 *
 * @example
 * ```typescript
 * const params = extractService(state, 'param')
 * // params.entries.secret and params.tags.secret are empty
 * ```
 */
export function extractService(state: State, service?: Service): State {

    const full = cloneState(state)

    if (!service) return full

    const extracted = createEmptyState()
    extracted.version = state.version
    extracted.entries[service] = full.entries[service]
    extracted.tags[service] = full.tags[service]

    return extracted
}


/**
 * Clear one service's namespace in place (all of them when undefined).
 */
export function removeService(state: State, service?: Service): void {

    for (const svc of targetServices(service)) {

        state.entries[svc] = createItemMap()
        state.tags[svc] = createItemMap()
    }
}


/**
 * True when some (service, name) in `source` is also staged in `target`.
 */
export function hasCollision(target: State, source: State): boolean {

    return SERVICES.some((service) =>
        Object.keys(source.entries[service]).some((name) => Object.hasOwn(target.entries[service], name)) ||
        Object.keys(source.tags[service]).some((name) => Object.hasOwn(target.tags[service], name))
    )
}


/**
 * Merge `source` into `target` in place.
 *
 * @returns true when at least one (service, name) existed on both sides
 */
export function mergeState(target: State, source: State, policy: MergePolicy): boolean {

    let collided = false

    for (const service of SERVICES) {

        for (const [name, entry] of Object.entries(source.entries[service])) {

            if (Object.hasOwn(target.entries[service], name)) {

                collided = true
                if (policy === 'keep-existing') continue
            }

            target.entries[service][name] = cloneEntry(entry)
        }

        for (const [name, tagEntry] of Object.entries(source.tags[service])) {

            if (Object.hasOwn(target.tags[service], name)) {

                collided = true
                if (policy === 'keep-existing') continue
            }

            target.tags[service][name] = cloneTagEntry(tagEntry)
        }
    }

    return collided
}


/**
 * Count entries and tag entries, optionally for one service.
 */
export function countState(state: State, service?: Service): StateCounts {

    let entries = 0
    let tags = 0

    for (const svc of targetServices(service)) {

        entries += Object.keys(state.entries[svc]).length
        tags += Object.keys(state.tags[svc]).length
    }

    return { entries, tags }
}


/**
 * True when a tag entry carries no pending change.
 */
export function isTagEntryEmpty(tagEntry: Pick<TagEntry, 'add' | 'remove'>): boolean {

    return Object.keys(tagEntry.add).length === 0 && tagEntry.remove.size === 0
}
