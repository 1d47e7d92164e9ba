/**
 * stagecraft
 *
 * Offline staging for cloud parameters and secrets.
 */
export * from './sdk/index.js'
export * from './core/index.js'
