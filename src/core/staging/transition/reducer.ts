/**
 * Transition reducer.
 *
 * Pure functions from (state, action) to the next staged state. The use
 * cases load the state, reduce, then hand the result to the executor.
 *
 * Entry rules:
 *
 * | staged     | add              | edit                    | delete                 |
 * |------------|------------------|-------------------------|------------------------|
 * | not-staged | create (if new)  | update, or skip if same | delete (if remote)     |
 * | create     | create           | create                  | not-staged + drop tags |
 * | update     | error            | update, or not-staged   | delete                 |
 * | delete     | error            | error                   | delete                 |
 *
 * Add always fails when the item already exists remotely.
 */
import { TransitionError } from '../errors.js'
import type {
    EntryAction,
    EntryState,
    EntryTransition,
    StagedTags,
    TagAction,
    TagTransition,
} from './types.js'


export function reduceEntry(state: EntryState, action: EntryAction): EntryTransition {

    switch (action.type) {

    case 'add':
        return reduceAdd(state, action.value)

    case 'edit':
        return reduceEdit(state, action.value)

    case 'delete':
        return reduceDelete(state)

    case 'reset':
        return ok({ ...state, staged: { kind: 'not-staged' } })
    }
}


export function reduceTag(entry: EntryState, tags: StagedTags, action: TagAction): TagTransition {

    const verb = action.type

    if (entry.staged.kind === 'delete') {

        return fail(
            verb === 'tag' ? 'tag-delete' : 'untag-delete',
            `cannot ${verb}: resource staged for deletion`,
        )
    }

    if (entry.current === null && entry.staged.kind !== 'create') {

        return fail(
            verb === 'tag' ? 'tag-not-found' : 'untag-not-found',
            `cannot ${verb}: resource not found`,
        )
    }

    const next = cloneTags(tags)

    switch (action.type) {

    case 'tag':
        for (const [key, value] of Object.entries(action.tags)) {

            next.remove.delete(key)
            next.add[key] = value
        }
        break

    case 'untag': {

        // Nothing exists remotely yet, so only staged adds can be cancelled
        const pendingCreate = entry.current === null

        for (const key of action.keys) {

            delete next.add[key]

            if (!pendingCreate) next.remove.add(key)
        }
        break
    }
    }

    return { ok: true, tags: next }
}


export function isStagedTagsEmpty(tags: StagedTags): boolean {

    return Object.keys(tags.add).length === 0 && tags.remove.size === 0
}


// ─────────────────────────────────────────────────────────────
// Entry rules
// ─────────────────────────────────────────────────────────────

function reduceAdd(state: EntryState, value: string): EntryTransition {

    if (state.current !== null) {

        return fail('add-to-existing', 'cannot add: resource already exists, use edit instead')
    }

    switch (state.staged.kind) {

    case 'not-staged':
    case 'create':
        return ok({ ...state, staged: { kind: 'create', draft: value } })

    case 'update':
        return fail('add-to-update', 'cannot add: already staged for update')

    case 'delete':
        return fail('add-to-delete', 'cannot add: already staged for deletion')
    }
}


function reduceEdit(state: EntryState, value: string): EntryTransition {

    const sameAsRemote = state.current !== null && state.current === value

    switch (state.staged.kind) {

    case 'not-staged':
        return ok(sameAsRemote ? state : { ...state, staged: { kind: 'update', draft: value } })

    case 'create':
        return ok({ ...state, staged: { kind: 'create', draft: value } })

    case 'update':
        return ok({
            ...state,
            staged: sameAsRemote ? { kind: 'not-staged' } : { kind: 'update', draft: value },
        })

    case 'delete':
        return fail('edit-delete', 'cannot edit: staged for deletion, reset first')
    }
}


function reduceDelete(state: EntryState): EntryTransition {

    if (state.staged.kind === 'create') {

        // Never created remotely: drop the intent and its tags
        return ok({ ...state, staged: { kind: 'not-staged' } }, true)
    }

    if (state.current === null) {

        return fail('delete-not-found', 'cannot delete: resource not found')
    }

    return ok({ ...state, staged: { kind: 'delete' } })
}


// ─────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────

function ok(state: EntryState, discardTags = false): EntryTransition {

    return { ok: true, state, discardTags }
}


function fail(code: TransitionError['code'], message: string): { ok: false; error: TransitionError } {

    return { ok: false, error: new TransitionError(code, message) }
}


function cloneTags(tags: StagedTags): StagedTags {

    return { add: { ...tags.add }, remove: new Set(tags.remove) }
}
