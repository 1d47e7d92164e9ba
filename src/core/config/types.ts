/**
 * Configuration types.
 *
 * A config names the account and region whose changes are staged, where
 * the state file lives, and how to reach the remote.
 */
import type { z } from 'zod'

import type { ConfigSchema } from './schema.js'


/**
 * Resolved configuration with defaults applied.
 *
 * @example
 * ```typescript
 * const config: Config = {
 *     accountId: '123456789012',
 *     region: 'us-east-1',
 *     stateDir: '/home/me/.stagecraft',
 *     passphrase: 'test-secret',
 *     logging: { level: 'info', file: null },
 *     remote: { maxAttempts: 3 },
 * }
 * ```
 */
export type Config = z.infer<typeof ConfigSchema>


/**
 * Partial config accepted from env vars and flags before validation.
 */
export interface ConfigInput {

    accountId?: string
    region?: string
    stateDir?: string
    passphrase?: string
    logging?: {
        level?: Config['logging']['level']
        file?: string | null
    }
    remote?: {
        endpoint?: string
        maxAttempts?: number
    }
}
