/**
 * Store module exports.
 */
export type { StoreReader, StoreWriter, StoreReadWriter, StateTransfer } from './types.js'
export { ResidentStore } from './resident.js'
export {
    ResidentStoreRegistry,
    getResidentRegistry,
    resetResidentRegistry,
    type ResidentStoreFactory,
} from './registry.js'
export {
    FileStore,
    resolveStatePath,
    DEFAULT_STATE_DIR,
    STATE_FILE_NAME,
    type FileStoreOptions,
} from './file.js'
export { encrypt, decrypt, isEncrypted } from './encryption/index.js'
