/**
 * Staging file encryption tests.
 *
 * AES-256-GCM container with a PBKDF2-derived key. Covers the container
 * layout, wrong passphrases and tampering.
 */
import { describe, it, expect } from 'vitest'

import { DecryptionFailedError } from '../../../../src/core/staging/errors.js'
import {
    CONTAINER_VERSION,
    MAGIC_HEADER,
    decrypt,
    deriveKey,
    encrypt,
    generateSalt,
    isEncrypted,
} from '../../../../src/core/staging/store/encryption/index.js'


describe('encryption: crypto', () => {

    it('should decrypt what it encrypted', () => {

        const plaintext = JSON.stringify({ version: 2, entries: { param: {}, secret: {} } })
        const container = encrypt(plaintext, 'test-secret')

        expect(decrypt(container, 'test-secret')).toBe(plaintext)
    })

    it('should start the container with the magic header and version', () => {

        const container = encrypt('x', 'test-secret')

        expect(container.subarray(0, 8).toString('ascii')).toBe('STGCRAFT')
        expect(container[MAGIC_HEADER.length]).toBe(CONTAINER_VERSION)
        expect(isEncrypted(container)).toBe(true)
    })

    it('should produce different output for the same input', () => {

        const a = encrypt('same', 'test-secret')
        const b = encrypt('same', 'test-secret')

        expect(a.equals(b)).toBe(false)
    })

    it('should not treat plain JSON as encrypted', () => {

        expect(isEncrypted(Buffer.from('{"version":2}'))).toBe(false)
        expect(isEncrypted(Buffer.from('STG'))).toBe(false)
    })

    it('should fail with wrong-passphrase for the wrong passphrase', () => {

        const container = encrypt('payload', 'test-secret')

        let caught: unknown

        try {

            decrypt(container, 'other-secret')
        }
        catch (err) {

            caught = err
        }

        expect(caught).toBeInstanceOf(DecryptionFailedError)
        expect(caught instanceof DecryptionFailedError && caught.reason).toBe('wrong-passphrase')
    })

    it('should detect a tampered ciphertext', () => {

        const container = encrypt('payload', 'test-secret')
        const last = container.length - 20
        container[last] = (container[last] ?? 0) ^ 0xff

        expect(() => decrypt(container, 'test-secret')).toThrow('Decryption failed: wrong passphrase or corrupted data')
    })

    it('should reject a truncated container as corrupted', () => {

        const container = encrypt('payload', 'test-secret').subarray(0, 20)

        expect(() => decrypt(container, 'test-secret')).toThrow('Decryption failed: invalid encrypted container')
    })

    it('should reject an unknown container version', () => {

        const container = encrypt('payload', 'test-secret')
        container[MAGIC_HEADER.length] = 9

        expect(() => decrypt(container, 'test-secret')).toThrow(DecryptionFailedError)
    })
})


describe('encryption: key', () => {

    it('should derive the same 32-byte key from the same salt', () => {

        const salt = generateSalt()

        const a = deriveKey(salt, 'test-secret')
        const b = deriveKey(salt, 'test-secret')

        expect(a.length).toBe(32)
        expect(a.equals(b)).toBe(true)
    })

    it('should derive different keys for different salts', () => {

        const a = deriveKey(generateSalt(), 'test-secret')
        const b = deriveKey(generateSalt(), 'test-secret')

        expect(a.equals(b)).toBe(false)
    })
})
