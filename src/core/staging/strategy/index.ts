/**
 * Strategy selection.
 */
import type { ParameterApi, SecretApi } from '../../remote/types.js'
import { InvalidServiceError } from '../errors.js'
import type { Service } from '../types.js'
import { isService } from '../types.js'
import { ParameterStrategy } from './parameter.js'
import { SecretStrategy } from './secret.js'
import type { FullStrategy } from './types.js'

export type {
    ServiceStrategy,
    ParsedSpec,
    Parser,
    EditFetchResult,
    EditStrategy,
    DeleteStrategy,
    ApplyStrategy,
    FetchResult,
    DiffStrategy,
    VersionFetchResult,
    ResetStrategy,
    FullStrategy,
} from './types.js'
export { ParameterStrategy } from './parameter.js'
export { SecretStrategy, shortVersionId, CURRENT_STAGE } from './secret.js'
export {
    parseVersionSpec,
    parseParameterSpec,
    parseSecretSpec,
    hasParameterVersion,
    hasSecretVersion,
} from './spec.js'
export type { SpecifierRule, VersionSpec, ParameterAbsolute, SecretAbsolute } from './spec.js'


export interface RemoteApis {

    parameter: ParameterApi
    secret: SecretApi
}


/**
 * Validate a service tag from the front-end boundary.
 *
 * @example
 * ```typescript
 * parseService('param')    // 'param'
 * parseService('config')   // throws InvalidServiceError
 * ```
 */
export function parseService(tag: string): Service {

    const normalized = tag.trim().toLowerCase()

    if (!isService(normalized)) throw new InvalidServiceError(tag)

    return normalized
}


export function createStrategy(service: Service, apis: RemoteApis): FullStrategy {

    switch (service) {

    case 'param':
        return new ParameterStrategy(apis.parameter)

    case 'secret':
        return new SecretStrategy(apis.secret)
    }
}
