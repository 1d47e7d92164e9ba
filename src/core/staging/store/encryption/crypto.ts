/**
 * AES-256-GCM container for the staging file.
 *
 * Provides authenticated encryption: any tampering with the ciphertext, or a
 * wrong passphrase, fails the auth tag check.
 *
 * Layout:
 *
 * ```
 * | magic (8) | version (1) | salt (16) | nonce (12) | ciphertext (n) | auth tag (16) |
 * ```
 *
 * The magic header lets a reader tell an encrypted file from a plain JSON one
 * without a passphrase.
 */
import { createCipheriv, createDecipheriv, randomBytes } from 'crypto'

import { DecryptionFailedError } from '../../errors.js'
import { SALT_LENGTH, deriveKey, generateSalt } from './key.js'


const ALGORITHM = 'aes-256-gcm'
const NONCE_LENGTH = 12
const AUTH_TAG_LENGTH = 16

export const MAGIC_HEADER = Buffer.from('STGCRAFT', 'ascii')
export const CONTAINER_VERSION = 1

const HEADER_LENGTH = MAGIC_HEADER.length + 1
const MIN_LENGTH = HEADER_LENGTH + SALT_LENGTH + NONCE_LENGTH + AUTH_TAG_LENGTH


/**
 * Check whether raw file content is an encrypted container.
 */
export function isEncrypted(data: Buffer): boolean {

    if (data.length < HEADER_LENGTH) return false

    return data.subarray(0, MAGIC_HEADER.length).equals(MAGIC_HEADER)
}


/**
 * Encrypt plaintext with a passphrase.
 *
 * @example
 * ```typescript
 * const container = encrypt('{"version":2}', 'test-secret')
 * isEncrypted(container) // true
 * ```
 */
export function encrypt(plaintext: string, passphrase: string): Buffer {

    const salt = generateSalt()
    const key = deriveKey(salt, passphrase)
    const nonce = randomBytes(NONCE_LENGTH)

    const cipher = createCipheriv(ALGORITHM, key, nonce, {
        authTagLength: AUTH_TAG_LENGTH,
    })

    const ciphertext = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()])
    const authTag = cipher.getAuthTag()

    return Buffer.concat([
        MAGIC_HEADER,
        Buffer.from([CONTAINER_VERSION]),
        salt,
        nonce,
        ciphertext,
        authTag,
    ])
}


/**
 * Decrypt a container and return the plaintext.
 *
 * Throws DecryptionFailedError on a malformed container, an unsupported
 * version, or an auth tag mismatch (wrong passphrase or tampered data).
 *
 * @example
 * ```typescript
 * const plaintext = decrypt(container, 'test-secret')
 * ```
 */
export function decrypt(data: Buffer, passphrase: string): string {

    if (!isEncrypted(data) || data.length < MIN_LENGTH) {

        throw new DecryptionFailedError('corrupted')
    }

    const version = data[MAGIC_HEADER.length]
    if (version !== CONTAINER_VERSION) {

        throw new DecryptionFailedError('corrupted')
    }

    let offset = HEADER_LENGTH
    const salt = data.subarray(offset, offset + SALT_LENGTH)
    offset += SALT_LENGTH
    const nonce = data.subarray(offset, offset + NONCE_LENGTH)
    offset += NONCE_LENGTH
    const ciphertext = data.subarray(offset, data.length - AUTH_TAG_LENGTH)
    const authTag = data.subarray(data.length - AUTH_TAG_LENGTH)

    const key = deriveKey(salt, passphrase)

    const decipher = createDecipheriv(ALGORITHM, key, nonce, {
        authTagLength: AUTH_TAG_LENGTH,
    })

    decipher.setAuthTag(authTag)

    try {

        const plaintext = Buffer.concat([decipher.update(ciphertext), decipher.final()])

        return plaintext.toString('utf8')
    }
    catch (err) {

        throw new DecryptionFailedError('wrong-passphrase', { cause: err })
    }
}
