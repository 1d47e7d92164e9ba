/**
 * File store tests.
 *
 * Each test writes into its own temp directory.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtempSync, readFileSync, rmSync, statSync, writeFileSync, mkdirSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'

import { DecryptionFailedError, StateFileError } from '../../../../src/core/staging/errors.js'
import { createEmptyState } from '../../../../src/core/staging/state.js'
import { FileStore, resolveStatePath } from '../../../../src/core/staging/store/file.js'
import type { State } from '../../../../src/core/staging/types.js'


const STAGED_AT = new Date('2024-03-01T10:00:00.000Z')


function sampleState(): State {

    const state = createEmptyState()

    state.entries.param['/app/url'] = { operation: 'update', value: 'https://example.test', stagedAt: STAGED_AT }
    state.entries.secret['db/password'] = { operation: 'create', value: 'hunter2', stagedAt: STAGED_AT }
    state.tags.secret['db/password'] = { add: { team: 'core' }, remove: new Set(), stagedAt: STAGED_AT }

    return state
}


describe('store: file', () => {

    let tempDir: string
    let path: string

    beforeEach(() => {

        tempDir = mkdtempSync(join(tmpdir(), 'stagecraft-file-'))
        path = join(tempDir, 'nested', 'stage.json')
    })

    afterEach(() => {

        rmSync(tempDir, { recursive: true, force: true })
    })

    it('should derive the path from the scope', () => {

        const resolved = resolveStatePath({ accountId: '123456789012', region: 'us-east-1' }, '/base')

        expect(resolved).toBe(join('/base', '123456789012', 'us-east-1', 'stage.json'))
    })

    it('should drain a missing file as an empty state', async () => {

        const store = new FileStore({ path })

        expect(await store.exists()).toBe(false)
        expect(await store.drain(undefined, true)).toEqual(createEmptyState())
    })

    it('should write plain JSON without a passphrase', async () => {

        const store = new FileStore({ path })

        await store.writeState(sampleState())

        const data = JSON.parse(readFileSync(path, 'utf8'))

        expect(data.entries.param['/app/url'].value).toBe('https://example.test')
        expect(await store.isEncrypted()).toBe(false)
        expect(statSync(path).mode & 0o777).toBe(0o600)
    })

    it('should restore what it wrote', async () => {

        const store = new FileStore({ path })

        await store.writeState(sampleState())

        expect(await store.drain(undefined, true)).toEqual(sampleState())
    })

    it('should write an encrypted container with a passphrase', async () => {

        const store = new FileStore({ path, passphrase: 'test-secret' })

        await store.writeState(sampleState())

        expect(readFileSync(path).subarray(0, 8).toString('ascii')).toBe('STGCRAFT')
        expect(await store.isEncrypted()).toBe(true)
        expect(await store.drain(undefined, true)).toEqual(sampleState())
    })

    it('should require a passphrase for an encrypted file', async () => {

        await new FileStore({ path, passphrase: 'test-secret' }).writeState(sampleState())

        const store = new FileStore({ path })

        await expect(store.drain(undefined, true)).rejects.toThrow(DecryptionFailedError)
        await expect(store.drain(undefined, true)).rejects.toThrow('Staging file is encrypted; a passphrase is required')
    })

    it('should reject the wrong passphrase and leave the file intact', async () => {

        await new FileStore({ path, passphrase: 'test-secret' }).writeState(sampleState())
        const before = readFileSync(path)

        const store = new FileStore({ path, passphrase: 'wrong-secret' })

        await expect(store.drain(undefined, false)).rejects.toThrow('Decryption failed: wrong passphrase or corrupted data')
        expect(readFileSync(path).equals(before)).toBe(true)
    })

    it('should drain one service and keep the rest on disk', async () => {

        const store = new FileStore({ path })
        await store.writeState(sampleState())

        const drained = await store.drain('param', false)

        expect(Object.keys(drained.entries.param)).toEqual(['/app/url'])

        const remaining = await store.drain(undefined, true)

        expect(remaining.entries.param).toEqual({})
        expect(Object.keys(remaining.entries.secret)).toEqual(['db/password'])
    })

    it('should delete the file once the last item is drained', async () => {

        const store = new FileStore({ path })
        await store.writeState(sampleState())

        await store.drain(undefined, false)

        expect(await store.exists()).toBe(false)
    })

    it('should replace only the given service on writeState', async () => {

        const store = new FileStore({ path })
        await store.writeState(sampleState())

        const incoming = createEmptyState()
        incoming.entries.param['/other'] = { operation: 'delete', stagedAt: STAGED_AT }

        await store.writeState(incoming, 'param')

        const state = await store.drain(undefined, true)

        expect(Object.keys(state.entries.param)).toEqual(['/other'])
        expect(Object.keys(state.entries.secret)).toEqual(['db/password'])
    })

    it('should remove the file when writing an empty state', async () => {

        const store = new FileStore({ path })
        await store.writeState(sampleState())

        await store.writeState(createEmptyState())

        expect(await store.exists()).toBe(false)
    })

    it('should fail with StateFileError on invalid JSON', async () => {

        mkdirSync(join(tempDir, 'nested'), { recursive: true })
        writeFileSync(path, '{ not json')

        const store = new FileStore({ path })

        await expect(store.drain(undefined, true)).rejects.toThrow(StateFileError)
        await expect(store.drain(undefined, true)).rejects.toThrow('Failed to parse staging file. File may be corrupted')
    })

    it('should fail with StateFileError on a schema mismatch', async () => {

        mkdirSync(join(tempDir, 'nested'), { recursive: true })
        writeFileSync(path, JSON.stringify({ entries: { param: { '/a': { operation: 'rename' } } } }))

        const store = new FileStore({ path })

        await expect(store.drain(undefined, true)).rejects.toThrow(`Staging file does not match the expected format (${path})`)
    })

    it('should serialize concurrent writers on the same path', async () => {

        const store = new FileStore({ path })

        const a = createEmptyState()
        a.entries.param['/a'] = { operation: 'create', value: 'a', stagedAt: STAGED_AT }

        const b = createEmptyState()
        b.entries.secret['b'] = { operation: 'create', value: 'b', stagedAt: STAGED_AT }

        await Promise.all([store.writeState(a, 'param'), store.writeState(b, 'secret')])

        const state = await store.drain(undefined, true)

        expect(Object.keys(state.entries.param)).toEqual(['/a'])
        expect(Object.keys(state.entries.secret)).toEqual(['b'])
    })

    it('should treat deleting a missing file as a no-op', async () => {

        await expect(new FileStore({ path }).delete()).resolves.toBeUndefined()
    })
})
