/**
 * Conflict detection for apply.
 *
 * A staged create conflicts when the item now exists remotely. A staged
 * update or delete conflicts when the remote item was modified after the
 * time recorded at staging (`baseModifiedAt`). A failed lookup is not a
 * conflict: apply reports the real failure when it gets there.
 */
import { attempt } from '@logosdx/utils'

import { sortedEntries } from './collections.js'
import type { ApplyStrategy } from './strategy/types.js'
import type { EntryMap } from './types.js'


/**
 * Names of conflicting entries, in name order.
 *
 * @example
 * ```typescript
 * const conflicts = await checkConflicts(strategy, entries)
 * // ['/app/url']
 * ```
 */
export async function checkConflicts(
    strategy: Pick<ApplyStrategy, 'fetchLastModified'>,
    entries: EntryMap,
    signal?: AbortSignal,
): Promise<string[]> {

    const conflicts: string[] = []

    for (const [name, entry] of sortedEntries(entries)) {

        const checkCreate = entry.operation === 'create'
        const base = entry.operation !== 'create' ? entry.baseModifiedAt : undefined

        if (!checkCreate && !base) continue

        signal?.throwIfAborted()

        const [remoteModified, err] = await attempt(() => strategy.fetchLastModified(name, signal))

        if (err || remoteModified === null) continue

        if (checkCreate || (base && remoteModified.getTime() > base.getTime())) {

            conflicts.push(name)
        }
    }

    return conflicts
}
