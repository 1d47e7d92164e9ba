/**
 * Config module - resolves where and how changes are staged.
 */

export type { Config, ConfigInput } from './types.js'

export {
    ConfigSchema,
    LoggingSchema,
    LogLevelSchema,
    RemoteSchema,
    ConfigValidationError,
    parseConfig,
} from './schema.js'

export { resolveConfig, defaultStateDir, type ResolveOptions } from './resolver.js'

export { getEnvConfig } from './env.js'
