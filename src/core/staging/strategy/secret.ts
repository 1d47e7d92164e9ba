/**
 * Secret strategy.
 *
 * Secrets are versioned by opaque version ids and staging labels
 * (AWSCURRENT, AWSPREVIOUS). Deletes take a recovery window or a force flag.
 */
import type { SecretApi, SecretSelector, SecretVersion } from '../../remote/types.js'
import { sortedValues } from '../collections.js'
import { InvalidInputError, RemoteOperationFailedError, ResourceNotFoundError } from '../errors.js'
import type { Entry, TagEntry } from '../types.js'
import { hasSecretVersion, parseSecretSpec } from './spec.js'
import type {
    EditFetchResult,
    FetchResult,
    FullStrategy,
    ParsedSpec,
    VersionFetchResult,
} from './types.js'


export const CURRENT_STAGE = 'AWSCURRENT'


/**
 * Short display form of a version id.
 */
export function shortVersionId(versionId: string): string {

    return `#${versionId.slice(0, 8)}`
}


export class SecretStrategy implements FullStrategy {

    readonly service = 'secret' as const
    readonly serviceName = 'Secrets Manager'
    readonly itemName = 'secret'
    readonly hasDeleteOptions = true

    constructor(private readonly api: SecretApi) {}

    parseName(input: string): string {

        const spec = parseSecretSpec(input)

        if (hasSecretVersion(spec)) {

            throw new InvalidInputError(`Expected a secret name without version specifier: '${input}'`)
        }

        return spec.name
    }

    parseSpec(input: string): ParsedSpec {

        const spec = parseSecretSpec(input)

        return { name: spec.name, hasVersion: hasSecretVersion(spec) }
    }

    // ─────────────────────────────────────────────────────────────
    // Fetch
    // ─────────────────────────────────────────────────────────────

    async fetchCurrentValue(name: string, signal?: AbortSignal): Promise<EditFetchResult> {

        const secret = await this.api.getSecretValue(name, {}, signal)

        if (!secret) throw new ResourceNotFoundError(this.service, name)

        return { value: secret.value, lastModified: secret.createdDate }
    }

    async fetchCurrent(name: string, signal?: AbortSignal): Promise<FetchResult> {

        const secret = await this.api.getSecretValue(name, {}, signal)

        if (!secret) throw new ResourceNotFoundError(this.service, name)

        return { value: secret.value, identifier: shortVersionId(secret.versionId) }
    }

    async fetchLastModified(name: string, signal?: AbortSignal): Promise<Date | null> {

        const secret = await this.api.getSecretValue(name, {}, signal)

        if (!secret) return null

        return secret.createdDate ?? new Date(0)
    }

    async fetchVersion(input: string, signal?: AbortSignal): Promise<VersionFetchResult> {

        const spec = parseSecretSpec(input)
        let selector: SecretSelector = {
            versionId: spec.absolute.versionId,
            versionStage: spec.absolute.label,
        }

        if (spec.shift > 0) {

            const versions = await this.api.listSecretVersions(spec.name, signal)

            if (!versions || versions.length === 0) {

                throw new ResourceNotFoundError(this.service, spec.name)
            }

            const base = findBaseIndex(versions, spec.absolute.versionId, spec.absolute.label)

            if (base < 0) {

                throw new ResourceNotFoundError(this.service, input)
            }

            const target = versions[base + spec.shift]

            if (!target) {

                throw new InvalidInputError(`Version shift out of range for ${input}`)
            }

            selector = { versionId: target.versionId }
        }

        const secret = await this.api.getSecretValue(spec.name, selector, signal)

        if (!secret) throw new ResourceNotFoundError(this.service, input)

        return { value: secret.value, versionLabel: shortVersionId(secret.versionId) }
    }

    // ─────────────────────────────────────────────────────────────
    // Apply
    // ─────────────────────────────────────────────────────────────

    async apply(name: string, entry: Entry, signal?: AbortSignal): Promise<void> {

        try {

            switch (entry.operation) {

            case 'create':
                await this.api.createSecret({
                    name,
                    value: entry.value ?? '',
                    description: entry.description,
                }, signal)
                return

            case 'update':
                await this.api.putSecretValue(name, entry.value ?? '', signal)

                if (entry.description !== undefined) {

                    await this.api.updateDescription(name, entry.description, signal)
                }

                return

            case 'delete':
                await this.api.deleteSecret({
                    name,
                    force: entry.deleteOptions?.force ?? false,
                    recoveryWindow: entry.deleteOptions?.recoveryWindow,
                }, signal)
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

                await this.api.tagResource(name, tagEntry.add, signal)
            }
            catch (err) {

                throw new RemoteOperationFailedError('tag', name, { cause: err })
            }
        }

        if (tagEntry.remove.size > 0) {

            try {

                await this.api.untagResource(name, sortedValues(tagEntry.remove), signal)
            }
            catch (err) {

                throw new RemoteOperationFailedError('untag', name, { cause: err })
            }
        }
    }
}


/**
 * Position of the shift origin in a newest-first version list.
 */
function findBaseIndex(versions: SecretVersion[], versionId?: string, label?: string): number {

    if (versionId !== undefined) {

        return versions.findIndex((item) => item.versionId === versionId)
    }

    const stage = label ?? CURRENT_STAGE

    return versions.findIndex((item) => item.stages.includes(stage))
}
