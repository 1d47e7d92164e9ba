/**
 * Staging file schema tests.
 */
import { describe, it, expect } from 'vitest'
import { ZodError } from 'zod'

import { deserializeState, serializeState } from '../../../src/core/staging/schema.js'
import { createEmptyState } from '../../../src/core/staging/state.js'


const STAGED_AT = '2024-03-01T10:00:00.000Z'


describe('staging: schema', () => {

    describe('serializeState', () => {

        it('should write dates as ISO strings and sets as sorted arrays', () => {

            const state = createEmptyState()
            state.tags.param['/app/url'] = {
                add: { zone: 'b', app: 'web' },
                remove: new Set(['owner', 'cost']),
                stagedAt: new Date(STAGED_AT),
            }

            const data = JSON.parse(serializeState(state))

            expect(data.tags.param['/app/url']).toEqual({
                add: { app: 'web', zone: 'b' },
                remove: ['cost', 'owner'],
                stagedAt: STAGED_AT,
            })
            expect(Object.keys(data.tags.param['/app/url'].add)).toEqual(['app', 'zone'])
        })

        it('should round-trip an item named __proto__', () => {

            const state = createEmptyState()
            state.entries.param['__proto__'] = { operation: 'create', value: 'odd', stagedAt: new Date(STAGED_AT) }

            const restored = deserializeState(JSON.parse(serializeState(state)))

            expect(Object.keys(restored.entries.param)).toEqual(['__proto__'])
            expect(restored.entries.param['__proto__']?.value).toBe('odd')
        })

        it('should serialize identical states identically', () => {

            const a = createEmptyState()
            const b = createEmptyState()

            a.entries.param['/b'] = { operation: 'create', value: '2', stagedAt: new Date(STAGED_AT) }
            a.entries.param['/a'] = { operation: 'create', value: '1', stagedAt: new Date(STAGED_AT) }
            b.entries.param['/a'] = { operation: 'create', value: '1', stagedAt: new Date(STAGED_AT) }
            b.entries.param['/b'] = { operation: 'create', value: '2', stagedAt: new Date(STAGED_AT) }

            expect(serializeState(a)).toBe(serializeState(b))
        })
    })

    describe('deserializeState', () => {

        it('should restore entries with dates and delete options', () => {

            const state = deserializeState({
                version: 2,
                entries: {
                    param: {},
                    secret: {
                        'db/password': {
                            operation: 'delete',
                            stagedAt: STAGED_AT,
                            baseModifiedAt: '2024-02-01T00:00:00.000Z',
                            deleteOptions: { force: false, recoveryWindow: 14 },
                        },
                    },
                },
                tags: { param: {}, secret: {} },
            })

            const entry = state.entries.secret['db/password']

            expect(entry?.operation).toBe('delete')
            expect(entry?.stagedAt).toEqual(new Date(STAGED_AT))
            expect(entry?.baseModifiedAt).toEqual(new Date('2024-02-01T00:00:00.000Z'))
            expect(entry?.deleteOptions).toEqual({ force: false, recoveryWindow: 14 })
            expect(entry?.value).toBeUndefined()
        })

        it('should turn tag removals back into a set', () => {

            const state = deserializeState({
                tags: { param: { '/app/url': { remove: ['owner'], stagedAt: STAGED_AT } } },
            })

            expect(state.tags.param['/app/url']?.remove).toEqual(new Set(['owner']))
            expect(state.tags.param['/app/url']?.add).toEqual({})
        })

        it('should default missing sections to an empty state', () => {

            expect(deserializeState({})).toEqual(createEmptyState())
        })

        it('should reject a delete entry that carries a value', () => {

            const data = { entries: { param: { '/a': { operation: 'delete', value: 'x', stagedAt: STAGED_AT } } } }

            expect(() => deserializeState(data)).toThrow(ZodError)
        })

        it('should reject an update entry without a value', () => {

            const data = { entries: { param: { '/a': { operation: 'update', stagedAt: STAGED_AT } } } }

            expect(() => deserializeState(data)).toThrow('update entries require a value')
        })

        it('should reject a recovery window above 30 days', () => {

            const data = {
                entries: {
                    secret: {
                        s: { operation: 'delete', stagedAt: STAGED_AT, deleteOptions: { force: false, recoveryWindow: 31 } },
                    },
                },
            }

            expect(() => deserializeState(data)).toThrow(ZodError)
        })

        it('should reject an empty tag entry', () => {

            const data = { tags: { secret: { s: { add: {}, remove: [], stagedAt: STAGED_AT } } } }

            expect(() => deserializeState(data)).toThrow('tag entries must add or remove at least one key')
        })

        it('should reject a service map that is not an object', () => {

            expect(() => deserializeState({ entries: { param: [] } })).toThrow(ZodError)
        })

        it('should reject a malformed date', () => {

            const data = { entries: { param: { '/a': { operation: 'create', value: 'x', stagedAt: 'yesterday' } } } }

            expect(() => deserializeState(data)).toThrow(ZodError)
        })
    })
})
