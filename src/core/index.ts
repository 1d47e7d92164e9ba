/**
 * Core module exports.
 *
 * All business logic modules are exported from here.
 * Front ends should import from this barrel file.
 */

// Observer
export { observer } from './observer.js'
export type { StagingEvents, StagingEventNames, StagingEventCallback, ObserverEngine } from './observer.js'

// Environment
export { isCi, isTest, isDebug } from './environment.js'

// Config
export * from './config/index.js'

// Logger
export * from './logger/index.js'

// Remote clients
export * from './remote/index.js'

// Staging engine
export * from './staging/index.js'
