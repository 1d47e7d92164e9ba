/**
 * Remote resource API contracts.
 *
 * Uniform shapes the staging strategies consume. The AWS adapters implement
 * them over the SDK clients; tests implement them in memory.
 *
 * Lookups resolve `null` for a missing item instead of throwing. Any other
 * failure rejects with the underlying error.
 */


export type ParameterKind = 'String' | 'StringList' | 'SecureString'


export interface RemoteParameter {

    name: string
    value: string
    kind: ParameterKind
    version: number
    lastModified?: Date
}


export interface ParameterVersion {

    value: string
    version: number
    lastModified?: Date
}


export interface PutParameterInput {

    name: string
    value: string
    kind: ParameterKind
    description?: string
    overwrite: boolean
}


/**
 * Key/value parameter store.
 */
export interface ParameterApi {

    getParameter(name: string, signal?: AbortSignal): Promise<RemoteParameter | null>

    /** Every recorded version, oldest first. Null when the parameter is missing. */
    getParameterHistory(name: string, signal?: AbortSignal): Promise<ParameterVersion[] | null>

    putParameter(input: PutParameterInput, signal?: AbortSignal): Promise<{ version: number }>

    /** Resolves false when the parameter did not exist. */
    deleteParameter(name: string, signal?: AbortSignal): Promise<boolean>

    addTags(name: string, tags: Record<string, string>, signal?: AbortSignal): Promise<void>

    removeTags(name: string, keys: string[], signal?: AbortSignal): Promise<void>
}


export interface RemoteSecret {

    name: string
    value: string
    versionId: string
    stages: string[]
    createdDate?: Date
}


export interface SecretVersion {

    versionId: string
    stages: string[]
    createdDate?: Date
}


export interface SecretSelector {

    versionId?: string
    versionStage?: string
}


export interface CreateSecretInput {

    name: string
    value: string
    description?: string
    tags?: Record<string, string>
}


export interface DeleteSecretInput {

    name: string
    force: boolean

    /** Days before permanent deletion. Ignored when `force` is set. */
    recoveryWindow?: number
}


/**
 * Versioned secret store.
 */
export interface SecretApi {

    getSecretValue(name: string, selector?: SecretSelector, signal?: AbortSignal): Promise<RemoteSecret | null>

    /** Versions newest first. Null when the secret is missing. */
    listSecretVersions(name: string, signal?: AbortSignal): Promise<SecretVersion[] | null>

    createSecret(input: CreateSecretInput, signal?: AbortSignal): Promise<{ versionId: string }>

    putSecretValue(name: string, value: string, signal?: AbortSignal): Promise<{ versionId: string }>

    updateDescription(name: string, description: string, signal?: AbortSignal): Promise<void>

    /** Resolves false when the secret did not exist. */
    deleteSecret(input: DeleteSecretInput, signal?: AbortSignal): Promise<boolean>

    tagResource(name: string, tags: Record<string, string>, signal?: AbortSignal): Promise<void>

    untagResource(name: string, keys: string[], signal?: AbortSignal): Promise<void>
}


/**
 * Connection settings shared by the AWS adapters.
 */
export interface RemoteClientOptions {

    region: string
    endpoint?: string
    maxAttempts?: number
}
