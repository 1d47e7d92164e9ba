/**
 * Staging engine.
 *
 * State model, stores, drain and persist, per-kind strategies, the
 * transition reducer, and the use cases built on them.
 *
 * @example
 * ```typescript
 * import { getResidentRegistry, createStrategy, EditUseCase } from './core/staging/index.js'
 *
 * const store = await getResidentRegistry().acquire({ accountId, region })
 * const strategy = createStrategy('param', apis)
 *
 * await new EditUseCase(strategy, store).execute({ name: '/app/url', value: 'https://example.test' })
 * ```
 */
export * from './types.js'
export * from './collections.js'
export * from './errors.js'
export * from './state.js'
export {
    StateFileSchema,
    serializeState,
    deserializeState,
    RECOVERY_WINDOW_MIN,
    RECOVERY_WINDOW_MAX,
    type StateFileInput,
} from './schema.js'
export * from './store/index.js'
export * from './strategy/index.js'
export * from './transition/index.js'
export { checkConflicts } from './conflict.js'
export * from './usecase/index.js'
