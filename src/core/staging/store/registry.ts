/**
 * Resident store registry.
 *
 * One ResidentStore per identity scope, built lazily on first use and
 * cached for the life of the process. Construction is serialized per scope:
 * concurrent first callers wait on the same pending construction and receive
 * the same instance.
 */
import { observer } from '../../observer.js'
import type { IdentityScope } from '../types.js'
import { scopeKey } from '../types.js'
import { ResidentStore } from './resident.js'


/**
 * Builds the store for a scope. May be async (e.g. seeding from elsewhere).
 */
export type ResidentStoreFactory = (scope: IdentityScope) => ResidentStore | Promise<ResidentStore>


/**
 * Scope-keyed cache of resident stores.
 *
 * @example
 * ```typescript
 * const registry = new ResidentStoreRegistry()
 *
 * const [a, b] = await Promise.all([
 *     registry.acquire({ accountId: '123456789012', region: 'us-east-1' }),
 *     registry.acquire({ accountId: '123456789012', region: 'us-east-1' }),
 * ])
 * // a === b
 * ```
 */
export class ResidentStoreRegistry {

    #stores = new Map<string, ResidentStore>()
    #pending = new Map<string, Promise<ResidentStore>>()

    constructor(
        private readonly factory: ResidentStoreFactory = (scope) => new ResidentStore(scope),
    ) {}

    /**
     * Get the store for a scope, constructing it on first use.
     */
    async acquire(scope: IdentityScope, signal?: AbortSignal): Promise<ResidentStore> {

        signal?.throwIfAborted()

        const key = scopeKey(scope)

        const existing = this.#stores.get(key)
        if (existing) return existing

        const pending = this.#pending.get(key)
        if (pending) return pending

        const construction = this.#construct(key, scope)
        this.#pending.set(key, construction)

        return construction
    }

    /**
     * True when a store for the scope has been constructed.
     */
    has(scope: IdentityScope): boolean {

        return this.#stores.has(scopeKey(scope))
    }

    /**
     * Drop the cached store for a scope. Staged items in it are discarded.
     */
    release(scope: IdentityScope): boolean {

        const key = scopeKey(scope)
        const removed = this.#stores.delete(key)

        if (removed) {

            observer.emit('agent:released', { scope: key })
        }

        return removed
    }

    /**
     * Drop every cached store.
     */
    clear(): void {

        for (const key of [...this.#stores.keys()]) {

            this.#stores.delete(key)
            observer.emit('agent:released', { scope: key })
        }
    }

    get size(): number {

        return this.#stores.size
    }

    async #construct(key: string, scope: IdentityScope): Promise<ResidentStore> {

        try {

            const store = await this.factory(scope)
            this.#stores.set(key, store)

            observer.emit('agent:created', { scope: key })

            return store
        }
        finally {

            this.#pending.delete(key)
        }
    }
}


// ─────────────────────────────────────────────────────────────
// Singleton
// ─────────────────────────────────────────────────────────────

let instance: ResidentStoreRegistry | null = null


/**
 * Get or create the process-wide registry.
 */
export function getResidentRegistry(): ResidentStoreRegistry {

    if (!instance) {

        instance = new ResidentStoreRegistry()
    }

    return instance
}


/**
 * Reset the singleton (for testing).
 */
export function resetResidentRegistry(): void {

    instance?.clear()
    instance = null
}
