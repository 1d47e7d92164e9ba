/**
 * SDK error helpers.
 *
 * Service exceptions are matched by `name` rather than class, which also
 * holds for errors deserialized from a response without the modeled class.
 */


/**
 * True when `err` is an Error whose name is one of `names`.
 *
 * @example
 * ```typescript
 * if (hasErrorName(err, ['ResourceNotFoundException'])) {
 *     return null
 * }
 * ```
 */
export function hasErrorName(err: unknown, names: readonly string[]): boolean {

    return err instanceof Error && names.includes(err.name)
}
