/**
 * Parameter store adapter over `@aws-sdk/client-ssm`.
 */
import {
    AddTagsToResourceCommand,
    DeleteParameterCommand,
    GetParameterCommand,
    GetParameterHistoryCommand,
    PutParameterCommand,
    RemoveTagsFromResourceCommand,
    SSMClient,
} from '@aws-sdk/client-ssm'
import { attempt } from '@logosdx/utils'

import { observer } from '../observer.js'
import { hasErrorName } from './errors.js'
import type {
    ParameterApi,
    ParameterVersion,
    PutParameterInput,
    RemoteClientOptions,
    RemoteParameter,
} from './types.js'


const NOT_FOUND = ['ParameterNotFound', 'ParameterVersionNotFound']


/**
 * Parameter store client.
 *
 * @example
 * ```typescript
 * const api = new AwsParameterApi({ region: 'us-east-1' })
 * const param = await api.getParameter('/app/url')
 * // { name: '/app/url', value: '...', kind: 'String', version: 3, lastModified: Date }
 * ```
 */
export class AwsParameterApi implements ParameterApi {

    readonly #client: SSMClient

    constructor(options: RemoteClientOptions | SSMClient) {

        this.#client = options instanceof SSMClient
            ? options
            : new SSMClient({
                region: options.region,
                endpoint: options.endpoint,
                maxAttempts: options.maxAttempts,
            })
    }

    async getParameter(name: string, signal?: AbortSignal): Promise<RemoteParameter | null> {

        observer.emit('remote:request', { service: 'param', action: 'GetParameter', name })

        const [output, err] = await attempt(() => this.#client.send(
            new GetParameterCommand({ Name: name, WithDecryption: true }),
            { abortSignal: signal },
        ))

        if (err) {

            if (hasErrorName(err, NOT_FOUND)) return null

            throw err
        }

        const parameter = output.Parameter
        if (!parameter) return null

        return {
            name: parameter.Name ?? name,
            value: parameter.Value ?? '',
            kind: parameter.Type ?? 'String',
            version: parameter.Version ?? 0,
            lastModified: parameter.LastModifiedDate,
        }
    }

    async getParameterHistory(name: string, signal?: AbortSignal): Promise<ParameterVersion[] | null> {

        observer.emit('remote:request', { service: 'param', action: 'GetParameterHistory', name })

        const versions: ParameterVersion[] = []
        let nextToken: string | undefined

        do {

            const [output, err] = await attempt(() => this.#client.send(
                new GetParameterHistoryCommand({
                    Name: name,
                    WithDecryption: true,
                    MaxResults: 50,
                    NextToken: nextToken,
                }),
                { abortSignal: signal },
            ))

            if (err) {

                if (hasErrorName(err, NOT_FOUND)) return null

                throw err
            }

            for (const item of output.Parameters ?? []) {

                versions.push({
                    value: item.Value ?? '',
                    version: item.Version ?? 0,
                    lastModified: item.LastModifiedDate,
                })
            }

            nextToken = output.NextToken
        }
        while (nextToken)

        return versions.sort((a, b) => a.version - b.version)
    }

    async putParameter(input: PutParameterInput, signal?: AbortSignal): Promise<{ version: number }> {

        observer.emit('remote:request', { service: 'param', action: 'PutParameter', name: input.name })

        const output = await this.#client.send(
            new PutParameterCommand({
                Name: input.name,
                Value: input.value,
                Type: input.kind,
                Description: input.description,
                Overwrite: input.overwrite,
            }),
            { abortSignal: signal },
        )

        return { version: output.Version ?? 0 }
    }

    async deleteParameter(name: string, signal?: AbortSignal): Promise<boolean> {

        observer.emit('remote:request', { service: 'param', action: 'DeleteParameter', name })

        const [, err] = await attempt(() => this.#client.send(
            new DeleteParameterCommand({ Name: name }),
            { abortSignal: signal },
        ))

        if (err) {

            if (hasErrorName(err, NOT_FOUND)) return false

            throw err
        }

        return true
    }

    async addTags(name: string, tags: Record<string, string>, signal?: AbortSignal): Promise<void> {

        observer.emit('remote:request', { service: 'param', action: 'AddTagsToResource', name })

        await this.#client.send(
            new AddTagsToResourceCommand({
                ResourceType: 'Parameter',
                ResourceId: name,
                Tags: Object.entries(tags).map(([Key, Value]) => ({ Key, Value })),
            }),
            { abortSignal: signal },
        )
    }

    async removeTags(name: string, keys: string[], signal?: AbortSignal): Promise<void> {

        observer.emit('remote:request', { service: 'param', action: 'RemoveTagsFromResource', name })

        await this.#client.send(
            new RemoveTagsFromResourceCommand({
                ResourceType: 'Parameter',
                ResourceId: name,
                TagKeys: keys,
            }),
            { abortSignal: signal },
        )
    }
}
