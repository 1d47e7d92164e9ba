/**
 * Config schema tests.
 */
import { describe, it, expect } from 'vitest'

import { ConfigValidationError, parseConfig } from '../../../src/core/config/schema.js'


const VALID = {
    accountId: '123456789012',
    region: 'us-east-1',
    stateDir: '/home/me/.stagecraft',
}


describe('config: schema', () => {

    it('should apply defaults', () => {

        expect(parseConfig(VALID)).toEqual({
            ...VALID,
            logging: { level: 'info', file: null },
            remote: { maxAttempts: 3 },
        })
    })

    it('should accept a passphrase and remote overrides', () => {

        const config = parseConfig({
            ...VALID,
            passphrase: 'test-secret',
            remote: { endpoint: 'http://localhost:4566', maxAttempts: '5' },
        })

        expect(config.passphrase).toBe('test-secret')
        expect(config.remote).toEqual({ endpoint: 'http://localhost:4566', maxAttempts: 5 })
    })

    it('should accept partitioned regions', () => {

        expect(parseConfig({ ...VALID, region: 'us-gov-west-1' }).region).toBe('us-gov-west-1')
    })

    it('should reject a malformed account id', () => {

        expect(() => parseConfig({ ...VALID, accountId: '1234' }))
            .toThrow('Invalid config accountId: Account ID must be 12 digits')
    })

    it('should reject a malformed region', () => {

        expect(() => parseConfig({ ...VALID, region: 'useast1' }))
            .toThrow('Invalid config region: Region must look like us-east-1')
    })

    it('should reject an empty passphrase', () => {

        expect(() => parseConfig({ ...VALID, passphrase: '' }))
            .toThrow('Invalid config passphrase: Passphrase must not be empty')
    })

    it('should bound maxAttempts', () => {

        expect(() => parseConfig({ ...VALID, remote: { maxAttempts: 0 } }))
            .toThrow('Invalid config remote.maxAttempts: maxAttempts must be at least 1')
        expect(() => parseConfig({ ...VALID, remote: { maxAttempts: 11 } }))
            .toThrow('Invalid config remote.maxAttempts: maxAttempts must be at most 10')
    })

    it('should reject an unknown log level', () => {

        expect(() => parseConfig({ ...VALID, logging: { level: 'loud' } })).toThrow(ConfigValidationError)
    })

    it('should expose the failing field and every issue', () => {

        const run = () => parseConfig({ region: 'us-east-1', stateDir: '' })

        expect(run).toThrow(ConfigValidationError)

        try {

            run()
        }
        catch (error) {

            expect(error).toBeInstanceOf(ConfigValidationError)

            if (error instanceof ConfigValidationError) {

                expect(error.field).toBe('accountId')
                expect(error.issues.map((issue) => issue.path.join('.'))).toEqual(['accountId', 'stateDir'])
            }
        }
    })
})
