/**
 * Passphrase-based key derivation.
 *
 * PBKDF2 with SHA-256. The salt is stored in the container header so each
 * write derives a fresh key.
 */
import { pbkdf2Sync, randomBytes } from 'crypto'


const PBKDF2_ITERATIONS = 100_000
const KEY_LENGTH = 32  // 256 bits for AES-256

export const SALT_LENGTH = 16


/**
 * Derive an encryption key from a passphrase.
 *
 * @example
 * ```typescript
 * const salt = generateSalt()
 * const key = deriveKey(salt, 'test-secret')
 * // 32-byte Buffer
 * ```
 */
export function deriveKey(salt: Buffer, passphrase: string): Buffer {

    return pbkdf2Sync(passphrase, salt, PBKDF2_ITERATIONS, KEY_LENGTH, 'sha256')
}


/**
 * Generate a random salt for key derivation.
 */
export function generateSalt(): Buffer {

    return randomBytes(SALT_LENGTH)
}
