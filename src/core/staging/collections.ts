/**
 * Ordered iteration helpers.
 *
 * Store listings, diffs and apply passes iterate by sorted name so output is
 * reproducible across runs and processes.
 */


/**
 * An empty name-keyed record with no prototype, so an item named
 * `__proto__` is stored like any other.
 */
export function createItemMap<T>(): Record<string, T> {

    const map: Record<string, T> = {}

    Object.setPrototypeOf(map, null)

    return map
}


/**
 * Keys of a record in ascending code-point order.
 */
export function sortedKeys(record: Record<string, unknown>): string[] {

    return Object.keys(record).sort(compareNames)
}


/**
 * `[key, value]` pairs of a record in ascending key order.
 *
 * @example
 * ```typescript
 * sortedEntries({ b: 2, a: 1 })
 * // [['a', 1], ['b', 2]]
 * ```
 */
export function sortedEntries<T>(record: Record<string, T>): Array<[string, T]> {

    return Object.entries(record).sort(([a], [b]) => compareNames(a, b))
}


/**
 * Members of a set in ascending order.
 */
export function sortedValues(set: ReadonlySet<string>): string[] {

    return [...set].sort(compareNames)
}


function compareNames(a: string, b: string): number {

    if (a === b) return 0

    return a < b ? -1 : 1
}
