/**
 * Parameter strategy.
 *
 * Parameters are versioned by integer and carry a type (String, StringList,
 * SecureString) that updates must preserve.
 */
import type { ParameterApi } from '../../remote/types.js'
import { sortedValues } from '../collections.js'
import { InvalidInputError, RemoteOperationFailedError, ResourceNotFoundError } from '../errors.js'
import type { Entry, TagEntry } from '../types.js'
import { hasParameterVersion, parseParameterSpec } from './spec.js'
import type {
    EditFetchResult,
    FetchResult,
    FullStrategy,
    ParsedSpec,
    VersionFetchResult,
} from './types.js'


/**
 * @example
 * ```typescript
 * const strategy = new ParameterStrategy(new AwsParameterApi({ region: 'us-east-1' }))
 *
 * await strategy.apply('/app/url', { operation: 'update', value: 'v2', stagedAt: new Date() })
 * ```
 */
export class ParameterStrategy implements FullStrategy {

    readonly service = 'param' as const
    readonly serviceName = 'Parameter Store'
    readonly itemName = 'parameter'
    readonly hasDeleteOptions = false

    constructor(private readonly api: ParameterApi) {}

    // ─────────────────────────────────────────────────────────────
    // Parser
    // ─────────────────────────────────────────────────────────────

    parseName(input: string): string {

        const spec = parseParameterSpec(input)

        if (hasParameterVersion(spec)) {

            throw new InvalidInputError(`Expected a parameter name without version specifier: '${input}'`)
        }

        return spec.name
    }

    parseSpec(input: string): ParsedSpec {

        const spec = parseParameterSpec(input)

        return { name: spec.name, hasVersion: hasParameterVersion(spec) }
    }

    // ─────────────────────────────────────────────────────────────
    // Fetch
    // ─────────────────────────────────────────────────────────────

    async fetchCurrentValue(name: string, signal?: AbortSignal): Promise<EditFetchResult> {

        const parameter = await this.api.getParameter(name, signal)

        if (!parameter) throw new ResourceNotFoundError(this.service, name)

        return { value: parameter.value, lastModified: parameter.lastModified }
    }

    async fetchCurrent(name: string, signal?: AbortSignal): Promise<FetchResult> {

        const parameter = await this.api.getParameter(name, signal)

        if (!parameter) throw new ResourceNotFoundError(this.service, name)

        return { value: parameter.value, identifier: `#${parameter.version}` }
    }

    async fetchLastModified(name: string, signal?: AbortSignal): Promise<Date | null> {

        const parameter = await this.api.getParameter(name, signal)

        if (!parameter) return null

        // An existing parameter without a timestamp still counts as existing
        return parameter.lastModified ?? new Date(0)
    }

    async fetchVersion(input: string, signal?: AbortSignal): Promise<VersionFetchResult> {

        const spec = parseParameterSpec(input)
        const history = await this.api.getParameterHistory(spec.name, signal)

        if (!history || history.length === 0) {

            throw new ResourceNotFoundError(this.service, spec.name)
        }

        let index = history.length - 1

        if (spec.absolute.version !== undefined) {

            const wanted = spec.absolute.version
            index = history.findIndex((item) => item.version === wanted)

            if (index < 0) {

                throw new ResourceNotFoundError(this.service, `${spec.name}#${wanted}`)
            }
        }

        index -= spec.shift

        const selected = history[index]

        if (index < 0 || !selected) {

            throw new InvalidInputError(`Version shift out of range for ${input}`)
        }

        return { value: selected.value, versionLabel: `#${selected.version}` }
    }

    // ─────────────────────────────────────────────────────────────
    // Apply
    // ─────────────────────────────────────────────────────────────

    async apply(name: string, entry: Entry, signal?: AbortSignal): Promise<void> {

        try {

            switch (entry.operation) {

            case 'create':
                // Fails when someone created the parameter since it was staged
                await this.api.putParameter({
                    name,
                    value: entry.value ?? '',
                    kind: 'String',
                    description: entry.description,
                    overwrite: false,
                }, signal)
                return

            case 'update': {

                const existing = await this.api.getParameter(name, signal)

                if (!existing) throw new ResourceNotFoundError(this.service, name)

                await this.api.putParameter({
                    name,
                    value: entry.value ?? '',
                    kind: existing.kind,
                    description: entry.description,
                    overwrite: true,
                }, signal)

                return
            }

            case 'delete':
                // Already gone counts as success
                await this.api.deleteParameter(name, signal)
                return
            }
        }
        catch (err) {

            throw new RemoteOperationFailedError(entry.operation, name, { cause: err })
        }
    }

    async applyTags(name: string, tagEntry: TagEntry, signal?: AbortSignal): Promise<void> {

        if (Object.keys(tagEntry.add).length > 0) {

            try {

                await this.api.addTags(name, tagEntry.add, signal)
            }
            catch (err) {

                throw new RemoteOperationFailedError('tag', name, { cause: err })
            }
        }

        if (tagEntry.remove.size > 0) {

            try {

                await this.api.removeTags(name, sortedValues(tagEntry.remove), signal)
            }
            catch (err) {

                throw new RemoteOperationFailedError('untag', name, { cause: err })
            }
        }
    }
}
