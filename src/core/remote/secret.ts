/**
 * Secret store adapter over `@aws-sdk/client-secrets-manager`.
 */
import {
    CreateSecretCommand,
    DeleteSecretCommand,
    GetSecretValueCommand,
    ListSecretVersionIdsCommand,
    PutSecretValueCommand,
    SecretsManagerClient,
    TagResourceCommand,
    UntagResourceCommand,
    UpdateSecretCommand,
} from '@aws-sdk/client-secrets-manager'
import { attempt } from '@logosdx/utils'

import { observer } from '../observer.js'
import { hasErrorName } from './errors.js'
import type {
    CreateSecretInput,
    DeleteSecretInput,
    RemoteClientOptions,
    RemoteSecret,
    SecretApi,
    SecretSelector,
    SecretVersion,
} from './types.js'


const NOT_FOUND = ['ResourceNotFoundException']


function toTagList(tags: Record<string, string>): Array<{ Key: string; Value: string }> {

    return Object.entries(tags).map(([Key, Value]) => ({ Key, Value }))
}


/**
 * Secrets client.
 *
 * @example
 * ```typescript
 * const api = new AwsSecretApi({ region: 'us-east-1' })
 * const secret = await api.getSecretValue('app/db-password')
 * // { name, value, versionId, stages: ['AWSCURRENT'], createdDate }
 * ```
 */
export class AwsSecretApi implements SecretApi {

    readonly #client: SecretsManagerClient

    constructor(options: RemoteClientOptions | SecretsManagerClient) {

        this.#client = options instanceof SecretsManagerClient
            ? options
            : new SecretsManagerClient({
                region: options.region,
                endpoint: options.endpoint,
                maxAttempts: options.maxAttempts,
            })
    }

    async getSecretValue(
        name: string,
        selector: SecretSelector = {},
        signal?: AbortSignal,
    ): Promise<RemoteSecret | null> {

        observer.emit('remote:request', { service: 'secret', action: 'GetSecretValue', name })

        const [output, err] = await attempt(() => this.#client.send(
            new GetSecretValueCommand({
                SecretId: name,
                VersionId: selector.versionId,
                VersionStage: selector.versionStage,
            }),
            { abortSignal: signal },
        ))

        if (err) {

            if (hasErrorName(err, NOT_FOUND)) return null

            throw err
        }

        return {
            name: output.Name ?? name,
            value: output.SecretString ?? '',
            versionId: output.VersionId ?? '',
            stages: output.VersionStages ?? [],
            createdDate: output.CreatedDate,
        }
    }

    async listSecretVersions(name: string, signal?: AbortSignal): Promise<SecretVersion[] | null> {

        observer.emit('remote:request', { service: 'secret', action: 'ListSecretVersionIds', name })

        const versions: SecretVersion[] = []
        let nextToken: string | undefined

        do {

            const [output, err] = await attempt(() => this.#client.send(
                new ListSecretVersionIdsCommand({
                    SecretId: name,
                    IncludeDeprecated: true,
                    NextToken: nextToken,
                }),
                { abortSignal: signal },
            ))

            if (err) {

                if (hasErrorName(err, NOT_FOUND)) return null

                throw err
            }

            for (const item of output.Versions ?? []) {

                versions.push({
                    versionId: item.VersionId ?? '',
                    stages: item.VersionStages ?? [],
                    createdDate: item.CreatedDate,
                })
            }

            nextToken = output.NextToken
        }
        while (nextToken)

        return versions.sort((a, b) => (b.createdDate?.getTime() ?? 0) - (a.createdDate?.getTime() ?? 0))
    }

    async createSecret(input: CreateSecretInput, signal?: AbortSignal): Promise<{ versionId: string }> {

        observer.emit('remote:request', { service: 'secret', action: 'CreateSecret', name: input.name })

        const output = await this.#client.send(
            new CreateSecretCommand({
                Name: input.name,
                SecretString: input.value,
                Description: input.description,
                Tags: input.tags ? toTagList(input.tags) : undefined,
            }),
            { abortSignal: signal },
        )

        return { versionId: output.VersionId ?? '' }
    }

    async putSecretValue(name: string, value: string, signal?: AbortSignal): Promise<{ versionId: string }> {

        observer.emit('remote:request', { service: 'secret', action: 'PutSecretValue', name })

        const output = await this.#client.send(
            new PutSecretValueCommand({ SecretId: name, SecretString: value }),
            { abortSignal: signal },
        )

        return { versionId: output.VersionId ?? '' }
    }

    async updateDescription(name: string, description: string, signal?: AbortSignal): Promise<void> {

        observer.emit('remote:request', { service: 'secret', action: 'UpdateSecret', name })

        await this.#client.send(
            new UpdateSecretCommand({ SecretId: name, Description: description }),
            { abortSignal: signal },
        )
    }

    async deleteSecret(input: DeleteSecretInput, signal?: AbortSignal): Promise<boolean> {

        observer.emit('remote:request', { service: 'secret', action: 'DeleteSecret', name: input.name })

        const [, err] = await attempt(() => this.#client.send(
            new DeleteSecretCommand({
                SecretId: input.name,
                ForceDeleteWithoutRecovery: input.force ? true : undefined,
                RecoveryWindowInDays: !input.force && input.recoveryWindow ? input.recoveryWindow : undefined,
            }),
            { abortSignal: signal },
        ))

        if (err) {

            if (hasErrorName(err, NOT_FOUND)) return false

            throw err
        }

        return true
    }

    async tagResource(name: string, tags: Record<string, string>, signal?: AbortSignal): Promise<void> {

        observer.emit('remote:request', { service: 'secret', action: 'TagResource', name })

        await this.#client.send(
            new TagResourceCommand({ SecretId: name, Tags: toTagList(tags) }),
            { abortSignal: signal },
        )
    }

    async untagResource(name: string, keys: string[], signal?: AbortSignal): Promise<void> {

        observer.emit('remote:request', { service: 'secret', action: 'UntagResource', name })

        await this.#client.send(
            new UntagResourceCommand({ SecretId: name, TagKeys: keys }),
            { abortSignal: signal },
        )
    }
}
