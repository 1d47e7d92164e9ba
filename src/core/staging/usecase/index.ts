/**
 * Use case exports.
 */
export { StatusUseCase } from './status.js'
export type { StatusInput, StatusEntry, StatusTagEntry, StatusOutput } from './status.js'
export { AddUseCase } from './add.js'
export type { AddInput, AddOutput, DraftOutput } from './add.js'
export { EditUseCase } from './edit.js'
export type { EditInput, EditOutput, BaselineOutput } from './edit.js'
export { DeleteUseCase, DEFAULT_RECOVERY_WINDOW } from './delete.js'
export type { DeleteInput, DeleteOutput } from './delete.js'
export { TagUseCase } from './tag.js'
export type { TagInput, UntagInput, CancelTagInput, TagOutput } from './tag.js'
export { ResetUseCase, unstageItem } from './reset.js'
export type { ResetInput, ResetResult, ResetOutput } from './reset.js'
export { DiffUseCase, DIFF_WARNINGS } from './diff.js'
export type { DiffEntry, DiffTagEntry, DiffOutput } from './diff.js'
export { ApplyUseCase } from './apply.js'
export type { ApplyInput, ApplyStatus, ApplyEntryResult, ApplyTagResult, ApplyOutput } from './apply.js'
export { DrainUseCase } from './drain.js'
export type { DrainInput, DrainOutput } from './drain.js'
export { PersistUseCase } from './persist.js'
export type { PersistMode, PersistInput, PersistOutput } from './persist.js'
