/**
 * File store.
 *
 * Serializes a full State to one file per identity scope, optionally inside
 * a passphrase-encrypted container. The file layer never merges: a write
 * replaces the stored namespaces wholesale.
 *
 * A missing file reads as an empty state, so draining is always safe to
 * call speculatively.
 */
import { mkdir, readFile, rename, rm, stat, writeFile } from 'fs/promises'
import { homedir } from 'os'
import { dirname, join } from 'path'
import { attempt, attemptSync } from '@logosdx/utils'

import { observer } from '../../observer.js'
import { DecryptionFailedError, StateFileError } from '../errors.js'
import { deserializeState, serializeState } from '../schema.js'
import { cloneState, countState, createEmptyState, extractService, isStateEmpty, removeService } from '../state.js'
import type { IdentityScope, Service, State } from '../types.js'
import { targetServices } from '../types.js'
import { decrypt, encrypt, isEncrypted } from './encryption/index.js'
import type { StateTransfer } from './types.js'


export const DEFAULT_STATE_DIR = '.stagecraft'
export const STATE_FILE_NAME = 'stage.json'

const FILE_MODE = 0o600
const DIR_MODE = 0o700


/**
 * Options for FileStore construction.
 *
 * Either an identity scope (path derived under `baseDir`) or an explicit
 * path, which tests use to point at a temp directory.
 */
export type FileStoreOptions =
    | { scope: IdentityScope; baseDir?: string; passphrase?: string }
    | { path: string; passphrase?: string }


/**
 * Resolve the staging file path for a scope.
 *
 * @example
 * ```typescript
 * resolveStatePath({ accountId: '123456789012', region: 'us-east-1' })
 * // '/home/me/.stagecraft/123456789012/us-east-1/stage.json'
 * ```
 */
export function resolveStatePath(scope: IdentityScope, baseDir?: string): string {

    const root = baseDir ?? join(homedir(), DEFAULT_STATE_DIR)

    return join(root, scope.accountId, scope.region, STATE_FILE_NAME)
}


// Serializes read-modify-write cycles on the same path within this process.
const pathLocks = new Map<string, Promise<unknown>>()

async function withPathLock<T>(path: string, fn: () => Promise<T>): Promise<T> {

    const previous = pathLocks.get(path) ?? Promise.resolve()
    const run = previous.then(fn, fn)
    const settled = run.then(() => undefined, () => undefined)

    pathLocks.set(path, settled)

    try {

        return await run
    }
    finally {

        if (pathLocks.get(path) === settled) {

            pathLocks.delete(path)
        }
    }
}


function isMissingFile(err: Error): boolean {

    return 'code' in err && err.code === 'ENOENT'
}


/**
 * Staging file backed by the local filesystem.
 *
 * @example
 * ```typescript
 * const store = new FileStore({
 *     scope: { accountId: '123456789012', region: 'us-east-1' },
 *     passphrase: 'test-secret',
 * })
 *
 * await store.writeState(state)
 * await store.isEncrypted() // true
 *
 * const restored = await store.drain(undefined, false)
 * ```
 */
export class FileStore implements StateTransfer {

    readonly path: string
    #passphrase: string | undefined

    constructor(options: FileStoreOptions) {

        this.path = 'path' in options
            ? options.path
            : resolveStatePath(options.scope, options.baseDir)

        this.#passphrase = options.passphrase || undefined
    }

    get hasPassphrase(): boolean {

        return this.#passphrase !== undefined
    }

    /**
     * Same file under another passphrase. An empty or omitted passphrase
     * keeps this store's.
     */
    withPassphrase(passphrase: string | undefined): FileStore {

        if (!passphrase) return this

        return new FileStore({ path: this.path, passphrase })
    }

    // ─────────────────────────────────────────────────────────────
    // Inspection
    // ─────────────────────────────────────────────────────────────

    async exists(signal?: AbortSignal): Promise<boolean> {

        signal?.throwIfAborted()

        const [, err] = await attempt(() => stat(this.path))

        if (err) {

            if (isMissingFile(err)) return false

            throw err
        }

        return true
    }

    /**
     * True when the file exists and holds an encrypted container.
     */
    async isEncrypted(signal?: AbortSignal): Promise<boolean> {

        const raw = await this.#readRaw(signal)

        return raw !== null && isEncrypted(raw)
    }

    // ─────────────────────────────────────────────────────────────
    // Transfer
    // ─────────────────────────────────────────────────────────────

    async drain(service: Service | undefined, keep: boolean, signal?: AbortSignal): Promise<State> {

        return withPathLock(this.path, async () => {

            const state = await this.#load(signal)
            const drained = extractService(state, service)

            if (!keep) {

                signal?.throwIfAborted()

                removeService(state, service)
                await this.#save(state)
            }

            return drained
        })
    }

    async writeState(state: State, service?: Service, signal?: AbortSignal): Promise<void> {

        await withPathLock(this.path, async () => {

            if (!service) {

                signal?.throwIfAborted()
                await this.#save(cloneState(state))
                return
            }

            const current = await this.#load(signal)
            const incoming = cloneState(state)

            for (const svc of targetServices(service)) {

                current.entries[svc] = incoming.entries[svc]
                current.tags[svc] = incoming.tags[svc]
            }

            signal?.throwIfAborted()
            await this.#save(current)
        })
    }

    /**
     * Remove the file. Missing files are not an error.
     */
    async delete(signal?: AbortSignal): Promise<void> {

        signal?.throwIfAborted()

        await withPathLock(this.path, () => this.#remove())
    }

    // ─────────────────────────────────────────────────────────────
    // Internals
    // ─────────────────────────────────────────────────────────────

    async #readRaw(signal?: AbortSignal): Promise<Buffer | null> {

        signal?.throwIfAborted()

        const [raw, err] = await attempt(() => readFile(this.path))

        if (err) {

            if (isMissingFile(err)) return null

            observer.emit('error', { source: 'file-store', error: err, context: { path: this.path } })
            throw new StateFileError(this.path, 'Failed to read staging file', { cause: err })
        }

        return raw
    }

    async #load(signal?: AbortSignal): Promise<State> {

        const raw = await this.#readRaw(signal)

        if (raw === null) return createEmptyState()

        const encrypted = isEncrypted(raw)
        let text: string

        if (encrypted) {

            if (!this.#passphrase) {

                throw new DecryptionFailedError('passphrase-required')
            }

            text = decrypt(raw, this.#passphrase)
        }
        else {

            text = raw.toString('utf8')
        }

        const [json, parseErr] = attemptSync((): unknown => JSON.parse(text))

        if (parseErr) {

            throw new StateFileError(this.path, 'Failed to parse staging file. File may be corrupted', { cause: parseErr })
        }

        const [state, schemaErr] = attemptSync(() => deserializeState(json))

        if (schemaErr) {

            throw new StateFileError(this.path, 'Staging file does not match the expected format', { cause: schemaErr })
        }

        const counts = countState(state)
        observer.emit('file:loaded', { path: this.path, encrypted, entries: counts.entries, tags: counts.tags })

        return state
    }

    async #save(state: State): Promise<void> {

        if (isStateEmpty(state)) {

            await this.#remove()
            return
        }

        const text = serializeState(state)
        const data = this.#passphrase ? encrypt(text, this.#passphrase) : Buffer.from(text, 'utf8')

        const dir = dirname(this.path)
        const [, mkdirErr] = await attempt(() => mkdir(dir, { recursive: true, mode: DIR_MODE }))

        if (mkdirErr) {

            throw new StateFileError(this.path, 'Failed to create staging directory', { cause: mkdirErr })
        }

        // Write beside the target and rename so readers never see a partial file
        const tmpPath = `${this.path}.${process.pid}.${Date.now()}.tmp`

        const [, writeErr] = await attempt(async () => {

            await writeFile(tmpPath, data, { mode: FILE_MODE })
            await rename(tmpPath, this.path)
        })

        if (writeErr) {

            await rm(tmpPath, { force: true })
            observer.emit('error', { source: 'file-store', error: writeErr, context: { path: this.path } })
            throw new StateFileError(this.path, 'Failed to write staging file', { cause: writeErr })
        }

        const counts = countState(state)
        observer.emit('file:written', {
            path: this.path,
            encrypted: this.#passphrase !== undefined,
            entries: counts.entries,
            tags: counts.tags,
        })
    }

    async #remove(): Promise<void> {

        const [existed] = await attempt(() => stat(this.path))

        await rm(this.path, { force: true })

        if (existed) {

            observer.emit('file:deleted', { path: this.path })
        }
    }
}
