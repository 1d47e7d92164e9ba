/**
 * Remote module exports.
 */
export type {
    ParameterKind,
    RemoteParameter,
    ParameterVersion,
    PutParameterInput,
    ParameterApi,
    RemoteSecret,
    SecretVersion,
    SecretSelector,
    CreateSecretInput,
    DeleteSecretInput,
    SecretApi,
    RemoteClientOptions,
} from './types.js'
export { AwsParameterApi } from './parameter.js'
export { AwsSecretApi } from './secret.js'
export { hasErrorName } from './errors.js'
