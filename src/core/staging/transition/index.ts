/**
 * Transition module exports.
 */
export type {
    StagedState,
    EntryState,
    StagedTags,
    EntryAction,
    TagAction,
    EntryTransition,
    TagTransition,
} from './types.js'
export { reduceEntry, reduceTag, isStagedTagsEmpty } from './reducer.js'
export {
    TransitionExecutor,
    findEntry,
    findTag,
    toStagedState,
    loadStagedTags,
} from './executor.js'
export type { EntryExecuteOptions } from './executor.js'
