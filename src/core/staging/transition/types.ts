/**
 * Transition types.
 *
 * An item's situation is the remote current value (null when the item does
 * not exist remotely) plus what is staged for it. Actions move it from one
 * staged state to another; the reducer decides whether that is allowed.
 */
import type { TransitionError } from '../errors.js'


// ─────────────────────────────────────────────────────────────
// Staged state
// ─────────────────────────────────────────────────────────────

export type StagedState =
    | { kind: 'not-staged' }
    | { kind: 'create'; draft: string }
    | { kind: 'update'; draft: string }
    | { kind: 'delete' }


export interface EntryState {

    /** Remote current value. null means the item does not exist remotely. */
    current: string | null
    staged: StagedState
}


/**
 * Staged tag changes as a diff against the remote tag set.
 */
export interface StagedTags {

    add: Record<string, string>
    remove: Set<string>
}


// ─────────────────────────────────────────────────────────────
// Actions
// ─────────────────────────────────────────────────────────────

export type EntryAction =
    | { type: 'add'; value: string }
    | { type: 'edit'; value: string }
    | { type: 'delete' }
    | { type: 'reset' }


export type TagAction =
    | { type: 'tag'; tags: Record<string, string> }
    | { type: 'untag'; keys: ReadonlySet<string> }


// ─────────────────────────────────────────────────────────────
// Results
// ─────────────────────────────────────────────────────────────

export type EntryTransition =
    | {
        ok: true
        state: EntryState

        /** Set when the staged tags must go too (deleting a pending create) */
        discardTags: boolean
    }
    | { ok: false; error: TransitionError }


export type TagTransition =
    | { ok: true; tags: StagedTags }
    | { ok: false; error: TransitionError }
