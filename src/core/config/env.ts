/**
 * Environment variable configuration.
 *
 * Config properties can be overridden via STAGECRAFT_* environment variables.
 * Region falls back to the standard AWS_REGION / AWS_DEFAULT_REGION.
 *
 * @example
 * ```bash
 * STAGECRAFT_ACCOUNT_ID=123456789012
 * STAGECRAFT_REGION=us-east-1
 * STAGECRAFT_STATE_DIR=/var/lib/stagecraft
 * STAGECRAFT_PASSPHRASE=...
 * STAGECRAFT_LOG_LEVEL=verbose
 * STAGECRAFT_LOG_FILE=/var/log/stagecraft.log
 * STAGECRAFT_ENDPOINT=http://localhost:4566
 * STAGECRAFT_MAX_ATTEMPTS=5
 * ```
 */


type EnvTarget =
    | ['accountId' | 'region' | 'stateDir' | 'passphrase']
    | ['logging', 'level' | 'file']
    | ['remote', 'endpoint' | 'maxAttempts']


/**
 * Env var name to config path.
 */
const ENV_KEYS: Record<string, EnvTarget> = {
    STAGECRAFT_ACCOUNT_ID: ['accountId'],
    STAGECRAFT_REGION: ['region'],
    STAGECRAFT_STATE_DIR: ['stateDir'],
    STAGECRAFT_PASSPHRASE: ['passphrase'],
    STAGECRAFT_LOG_LEVEL: ['logging', 'level'],
    STAGECRAFT_LOG_FILE: ['logging', 'file'],
    STAGECRAFT_ENDPOINT: ['remote', 'endpoint'],
    STAGECRAFT_MAX_ATTEMPTS: ['remote', 'maxAttempts'],
}


/**
 * Read config values from environment variables.
 *
 * Values stay strings; the schema coerces and validates them.
 *
 * @example
 * ```typescript
 * getEnvConfig({ STAGECRAFT_REGION: 'eu-west-1', STAGECRAFT_LOG_LEVEL: 'warn' })
 * // { region: 'eu-west-1', logging: { level: 'warn' } }
 * ```
 */
export function getEnvConfig(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {

    const config: Record<string, unknown> = {}

    const region = env['AWS_REGION'] || env['AWS_DEFAULT_REGION']

    if (region) config['region'] = region

    for (const [key, target] of Object.entries(ENV_KEYS)) {

        const value = env[key]

        if (value === undefined || value === '') continue

        if (target.length === 1) {

            config[target[0]] = value
            continue
        }

        const [section, field] = target
        const existing = config[section]
        const nested: Record<string, unknown> = isRecord(existing) ? existing : {}

        nested[field] = value
        config[section] = nested
    }

    return config
}


function isRecord(value: unknown): value is Record<string, unknown> {

    return typeof value === 'object' && value !== null && !Array.isArray(value)
}

