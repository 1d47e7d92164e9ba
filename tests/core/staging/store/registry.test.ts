/**
 * Resident store registry tests.
 */
import { describe, it, expect, vi, afterEach } from 'vitest'

import { observer } from '../../../../src/core/observer.js'
import {
    ResidentStoreRegistry,
    getResidentRegistry,
    resetResidentRegistry,
} from '../../../../src/core/staging/store/registry.js'
import { ResidentStore } from '../../../../src/core/staging/store/resident.js'


const SCOPE = { accountId: '123456789012', region: 'us-east-1' }
const OTHER_SCOPE = { accountId: '123456789012', region: 'eu-west-1' }


describe('store: registry', () => {

    afterEach(() => {

        resetResidentRegistry()
    })

    it('should return the same store for the same scope', async () => {

        const registry = new ResidentStoreRegistry()

        const a = await registry.acquire(SCOPE)
        const b = await registry.acquire({ ...SCOPE })

        expect(a).toBe(b)
        expect(registry.size).toBe(1)
    })

    it('should return different stores for different regions', async () => {

        const registry = new ResidentStoreRegistry()

        const a = await registry.acquire(SCOPE)
        const b = await registry.acquire(OTHER_SCOPE)

        expect(a).not.toBe(b)
        expect(b.scope).toEqual(OTHER_SCOPE)
    })

    it('should construct once for concurrent first callers', async () => {

        const factory = vi.fn(async (scope: typeof SCOPE) => {

            await new Promise((resolve) => setTimeout(resolve, 5))

            return new ResidentStore(scope)
        })

        const registry = new ResidentStoreRegistry(factory)

        const [a, b, c] = await Promise.all([
            registry.acquire(SCOPE),
            registry.acquire(SCOPE),
            registry.acquire(SCOPE),
        ])

        expect(factory).toHaveBeenCalledTimes(1)
        expect(a).toBe(b)
        expect(b).toBe(c)
    })

    it('should retry construction after a failed factory', async () => {

        const factory = vi.fn()
            .mockRejectedValueOnce(new Error('boom'))
            .mockImplementation((scope: typeof SCOPE) => new ResidentStore(scope))

        const registry = new ResidentStoreRegistry(factory)

        await expect(registry.acquire(SCOPE)).rejects.toThrow('boom')
        expect(registry.has(SCOPE)).toBe(false)

        const store = await registry.acquire(SCOPE)

        expect(store.key).toBe('123456789012/us-east-1')
        expect(factory).toHaveBeenCalledTimes(2)
    })

    it('should discard staged items on release', async () => {

        const registry = new ResidentStoreRegistry()
        const first = await registry.acquire(SCOPE)

        await first.stageEntry('param', '/a', { operation: 'create', value: 'x', stagedAt: new Date() })

        const released: unknown[] = []
        const cleanup = observer.on('agent:released', (data) => released.push(data))

        expect(registry.release(SCOPE)).toBe(true)
        expect(registry.release(SCOPE)).toBe(false)

        cleanup()

        const second = await registry.acquire(SCOPE)

        expect(second).not.toBe(first)
        expect(await second.listEntries('param')).toEqual({})
        expect(released).toEqual([{ scope: '123456789012/us-east-1' }])
    })

    it('should share a process-wide singleton until reset', () => {

        const a = getResidentRegistry()

        expect(getResidentRegistry()).toBe(a)

        resetResidentRegistry()

        expect(getResidentRegistry()).not.toBe(a)
    })
})
