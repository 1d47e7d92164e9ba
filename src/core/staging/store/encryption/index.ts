/**
 * Encryption module exports.
 */
export { encrypt, decrypt, isEncrypted, MAGIC_HEADER, CONTAINER_VERSION } from './crypto.js'
export { deriveKey, generateSalt } from './key.js'
