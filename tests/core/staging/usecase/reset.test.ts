/**
 * Reset use case tests.
 */
import { describe, it, expect, beforeEach } from 'vitest'

import { observer } from '../../../../src/core/observer.js'
import { InvalidInputError } from '../../../../src/core/staging/errors.js'
import { ResidentStore } from '../../../../src/core/staging/store/resident.js'
import { ParameterStrategy } from '../../../../src/core/staging/strategy/parameter.js'
import { ResetUseCase, unstageItem } from '../../../../src/core/staging/usecase/reset.js'
import { FakeParameterApi } from '../../../utils/remote.js'


const SCOPE = { accountId: '123456789012', region: 'us-east-1' }
const STAGED_AT = new Date('2024-03-01T10:00:00.000Z')


describe('usecase: reset', () => {

    let api: FakeParameterApi
    let store: ResidentStore
    let reset: ResetUseCase

    beforeEach(async () => {

        api = new FakeParameterApi()
        store = new ResidentStore(SCOPE)
        reset = new ResetUseCase(new ParameterStrategy(api), store)

        await store.stageEntry('param', '/app/url', { operation: 'update', value: 'v2', stagedAt: STAGED_AT })
        await store.stageTag('param', '/app/url', { add: { env: 'prod' }, remove: new Set(), stagedAt: STAGED_AT })
        await store.stageEntry('secret', '/app/url', { operation: 'create', value: 's', stagedAt: STAGED_AT })
    })

    it('should unstage both the entry and the tag entry', async () => {

        const output = await reset.execute({ spec: '/app/url' })

        expect(output).toEqual({ type: 'unstaged', name: '/app/url', serviceName: 'Parameter Store', itemName: 'parameter' })
        expect(await store.listEntries('param')).toEqual({})
        expect(await store.listTags('param')).toEqual({})
    })

    it('should report notStaged on a second reset', async () => {

        await reset.execute({ spec: '/app/url' })

        expect((await reset.execute({ spec: '/app/url' })).type).toBe('notStaged')
    })

    it('should leave the other service untouched', async () => {

        await reset.execute({ all: true })

        expect(Object.keys(await store.listEntries('secret'))).toEqual(['/app/url'])
    })

    it('should count what a full reset removed', async () => {

        await store.stageEntry('param', '/app/other', { operation: 'delete', stagedAt: STAGED_AT })

        const output = await reset.execute({ all: true })

        expect(output).toEqual({ type: 'unstagedAll', count: 3, serviceName: 'Parameter Store', itemName: 'parameter' })
    })

    it('should report nothingStaged for an empty service', async () => {

        await reset.execute({ all: true })

        expect((await reset.execute({ all: true })).type).toBe('nothingStaged')
    })

    it('should require a name unless resetting everything', async () => {

        await expect(reset.execute({})).rejects.toThrow(InvalidInputError)
        await expect(reset.execute({})).rejects.toThrow('A name is required unless resetting everything')
    })

    it('should restage a historical version as an update', async () => {

        api.seed('/app/url', 'v1')
        api.seed('/app/url', 'v2')

        const restored: unknown[] = []
        const cleanup = observer.on('stage:restored', (data) => restored.push(data))

        const output = await reset.execute({ spec: '/app/url~1' })

        cleanup()

        expect(output).toEqual({
            type: 'restored',
            name: '/app/url',
            versionLabel: '#1',
            serviceName: 'Parameter Store',
            itemName: 'parameter',
        })

        const entry = await store.getEntry('param', '/app/url')

        expect(entry.operation).toBe('update')
        expect(entry.value).toBe('v1')
        expect(entry.baseModifiedAt).toBeUndefined()
        expect(restored).toEqual([{ service: 'param', name: '/app/url', versionLabel: '#1' }])
    })

    it('should unstage an item idempotently through unstageItem', async () => {

        expect(await unstageItem(store, 'param', '/app/url')).toBe(true)
        expect(await unstageItem(store, 'param', '/app/url')).toBe(false)
    })
})
