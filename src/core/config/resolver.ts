/**
 * Config resolver - merges configuration from multiple sources.
 *
 * Priority order (highest to lowest):
 * 1. Flags passed by the caller
 * 2. Environment variables
 * 3. Defaults
 */
import { homedir } from 'node:os'
import { join } from 'node:path'

import { clone, merge } from '@logosdx/utils'

import { observer } from '../observer.js'
import type { Config, ConfigInput } from './types.js'
import { getEnvConfig } from './env.js'
import { parseConfig } from './schema.js'


/**
 * Default state directory: `~/.stagecraft`.
 */
export function defaultStateDir(): string {

    return join(homedir(), '.stagecraft')
}


export interface ResolveOptions {

    /** Caller overrides */
    flags?: ConfigInput

    /** Environment to read; defaults to process.env */
    env?: NodeJS.ProcessEnv
}


/**
 * Resolve the config from all sources.
 *
 * @throws ConfigValidationError when the merged result is invalid
 *
 * @example
 * ```typescript
 * const config = resolveConfig({
 *     flags: { accountId: '123456789012', region: 'us-east-1' },
 * })
 *
 * config.stateDir // '/home/me/.stagecraft'
 * ```
 */
export function resolveConfig(options: ResolveOptions = {}): Config {

    const defaults: Record<string, unknown> = { stateDir: defaultStateDir() }

    const merged = merge(
        merge(clone(defaults), getEnvConfig(options.env)),
        clone(options.flags ?? {}),
    )

    const config = parseConfig(merged)

    observer.emit('config:resolved', {
        accountId: config.accountId,
        region: config.region,
        encrypted: config.passphrase !== undefined,
    })

    return config
}
