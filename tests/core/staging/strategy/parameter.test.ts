/**
 * Parameter strategy tests against the in-memory parameter API.
 */
import { describe, it, expect, beforeEach } from 'vitest'

import {
    InvalidInputError,
    RemoteOperationFailedError,
    ResourceNotFoundError,
} from '../../../../src/core/staging/errors.js'
import { ParameterStrategy } from '../../../../src/core/staging/strategy/parameter.js'
import { FakeParameterApi, START_TIME } from '../../../utils/remote.js'


const STAGED_AT = new Date('2024-03-01T10:00:00.000Z')


describe('strategy: parameter', () => {

    let api: FakeParameterApi
    let strategy: ParameterStrategy

    beforeEach(() => {

        api = new FakeParameterApi()
        strategy = new ParameterStrategy(api)
    })

    it('should describe the parameter service', () => {

        expect(strategy.service).toBe('param')
        expect(strategy.serviceName).toBe('Parameter Store')
        expect(strategy.hasDeleteOptions).toBe(false)
    })

    describe('parsing', () => {

        it('should reject a version spec where a bare name is expected', () => {

            expect(() => strategy.parseName('/app/url#3')).toThrow("Expected a parameter name without version specifier: '/app/url#3'")
        })

        it('should split a spec into name and version presence', () => {

            expect(strategy.parseSpec('/app/url~1')).toEqual({ name: '/app/url', hasVersion: true })
            expect(strategy.parseSpec('/app/url')).toEqual({ name: '/app/url', hasVersion: false })
        })
    })

    describe('fetch', () => {

        it('should fetch the current value with its modification time', async () => {

            api.seed('/app/url', 'v1')

            expect(await strategy.fetchCurrentValue('/app/url')).toEqual({
                value: 'v1',
                lastModified: new Date(START_TIME),
            })
        })

        it('should identify the current value by version number', async () => {

            api.seed('/app/url', 'v1')
            api.seed('/app/url', 'v2')

            expect(await strategy.fetchCurrent('/app/url')).toEqual({ value: 'v2', identifier: '#2' })
        })

        it('should reject a missing parameter with ResourceNotFoundError', async () => {

            await expect(strategy.fetchCurrentValue('/missing')).rejects.toThrow(ResourceNotFoundError)
            await expect(strategy.fetchCurrent('/missing')).rejects.toThrow('param /missing not found')
        })

        it('should resolve null last-modified for a missing parameter', async () => {

            expect(await strategy.fetchLastModified('/missing')).toBeNull()
        })
    })

    describe('fetchVersion', () => {

        beforeEach(() => {

            api.seed('/app/url', 'v1')
            api.seed('/app/url', 'v2')
            api.seed('/app/url', 'v3')
        })

        it('should fetch an absolute version', async () => {

            expect(await strategy.fetchVersion('/app/url#1')).toEqual({ value: 'v1', versionLabel: '#1' })
        })

        it('should shift back from the latest version', async () => {

            expect(await strategy.fetchVersion('/app/url~1')).toEqual({ value: 'v2', versionLabel: '#2' })
        })

        it('should shift back from an absolute version', async () => {

            expect(await strategy.fetchVersion('/app/url#3~2')).toEqual({ value: 'v1', versionLabel: '#1' })
        })

        it('should reject a shift past the oldest version', async () => {

            await expect(strategy.fetchVersion('/app/url~5')).rejects.toThrow(InvalidInputError)
            await expect(strategy.fetchVersion('/app/url~5')).rejects.toThrow('Version shift out of range for /app/url~5')
        })

        it('should reject an unknown version number', async () => {

            await expect(strategy.fetchVersion('/app/url#9')).rejects.toThrow('param /app/url#9 not found')
        })

        it('should reject a missing parameter', async () => {

            await expect(strategy.fetchVersion('/other~1')).rejects.toThrow('param /other not found')
        })
    })

    describe('apply', () => {

        it('should create a missing parameter as String', async () => {

            await strategy.apply('/app/new', { operation: 'create', value: 'fresh', stagedAt: STAGED_AT })

            expect(api.valueOf('/app/new')).toBe('fresh')
            expect(api.parameters.get('/app/new')?.kind).toBe('String')
        })

        it('should keep the existing kind on update', async () => {

            api.seed('/app/key', 'old', 'SecureString')

            await strategy.apply('/app/key', { operation: 'update', value: 'new', description: 'rotated', stagedAt: STAGED_AT })

            const stored = api.parameters.get('/app/key')

            expect(stored?.kind).toBe('SecureString')
            expect(stored?.description).toBe('rotated')
            expect(api.valueOf('/app/key')).toBe('new')
        })

        it('should not overwrite a parameter created since staging', async () => {

            api.seed('/app/new', 'theirs')

            const apply = strategy.apply('/app/new', { operation: 'create', value: 'mine', stagedAt: STAGED_AT })

            await expect(apply).rejects.toThrow('Failed to create /app/new: /app/new exists')
            expect(api.valueOf('/app/new')).toBe('theirs')
        })

        it('should not recreate a parameter deleted since an update was staged', async () => {

            const apply = strategy.apply('/app/gone', { operation: 'update', value: 'v2', stagedAt: STAGED_AT })

            await expect(apply).rejects.toThrow(RemoteOperationFailedError)
            await expect(strategy.apply('/app/gone', { operation: 'update', value: 'v2', stagedAt: STAGED_AT }))
                .rejects.toThrow('Failed to update /app/gone: param /app/gone not found')
            expect(api.parameters.has('/app/gone')).toBe(false)
            expect(api.calls).not.toContain('putParameter /app/gone')
        })

        it('should delete a parameter and accept one already gone', async () => {

            api.seed('/app/url', 'v1')

            await strategy.apply('/app/url', { operation: 'delete', stagedAt: STAGED_AT })
            await strategy.apply('/app/url', { operation: 'delete', stagedAt: STAGED_AT })

            expect(api.parameters.has('/app/url')).toBe(false)
        })

        it('should wrap remote failures in RemoteOperationFailedError', async () => {

            api.seed('/app/url', 'v1')
            api.failOn('putParameter', '/app/url')

            const apply = strategy.apply('/app/url', { operation: 'update', value: 'v2', stagedAt: STAGED_AT })

            await expect(apply).rejects.toThrow(RemoteOperationFailedError)
            await expect(strategy.apply('/app/url', { operation: 'update', value: 'v2', stagedAt: STAGED_AT }))
                .rejects.toThrow('Failed to update /app/url: putParameter failed for /app/url')
        })
    })

    describe('applyTags', () => {

        it('should add then remove tags with sorted keys', async () => {

            api.seed('/app/url', 'v1')
            await api.addTags('/app/url', { old: 'x', stale: 'y', keep: 'z' })

            await strategy.applyTags('/app/url', {
                add: { env: 'prod' },
                remove: new Set(['stale', 'old']),
                stagedAt: STAGED_AT,
            })

            expect(api.tagsOf('/app/url')).toEqual({ keep: 'z', env: 'prod' })
            expect(api.calls.slice(-2)).toEqual(['addTags /app/url', 'removeTags /app/url'])
        })

        it('should skip the remove call when nothing is removed', async () => {

            api.seed('/app/url', 'v1')

            await strategy.applyTags('/app/url', { add: { env: 'prod' }, remove: new Set(), stagedAt: STAGED_AT })

            expect(api.calls).toEqual(['addTags /app/url'])
        })

        it('should report a failed tag call as a tag failure', async () => {

            const apply = strategy.applyTags('/missing', { add: { env: 'prod' }, remove: new Set(), stagedAt: STAGED_AT })

            await expect(apply).rejects.toThrow('Failed to tag /missing: /missing not found')
        })

        it('should report a failed untag call as an untag failure', async () => {

            const apply = strategy.applyTags('/missing', { add: {}, remove: new Set(['env']), stagedAt: STAGED_AT })

            await expect(apply).rejects.toThrow('Failed to untag /missing: /missing not found')
        })
    })
})
