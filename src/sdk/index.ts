/**
 * stagecraft SDK
 *
 * Programmatic access to staged parameter and secret changes.
 *
 * @example
 * ```typescript
 * import { createStagingSession } from 'stagecraft'
 *
 * const session = await createStagingSession({
 *     config: { accountId: '123456789012', region: 'us-east-1' },
 * })
 *
 * await session.add({ service: 'secret', name: 'db/password', value: 'test-secret' })
 * await session.tag({ service: 'secret', name: 'db/password', tags: { team: 'core' } })
 *
 * const diff = await session.diff({ service: 'secret' })
 * const applied = await session.apply({ service: 'secret' })
 * ```
 */
import { resolveConfig, type Config } from '../core/config/index.js';
import { getLogger } from '../core/logger/index.js';
import { AwsParameterApi, AwsSecretApi, type RemoteClientOptions } from '../core/remote/index.js';
import { FileStore, getResidentRegistry, type RemoteApis } from '../core/staging/index.js';

import { StagingSession } from './session.js';
import type { CreateSessionOptions } from './types.js';

// ─────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────

/**
 * Build the AWS-backed remote clients for a config.
 */
export function createRemoteApis(config: Config): RemoteApis {

    const options: RemoteClientOptions = {
        region: config.region,
        endpoint: config.remote.endpoint,
        maxAttempts: config.remote.maxAttempts,
    };

    return {
        parameter: new AwsParameterApi(options),
        secret: new AwsSecretApi(options),
    };

}

// ─────────────────────────────────────────────────────────────
// Factory Function
// ─────────────────────────────────────────────────────────────

/**
 * Create a staging session.
 *
 * Configuration is resolved as defaults <- env (`STAGECRAFT_*`) <- options.
 * The resident store comes from the registry, so sessions for the same
 * account and region share staged changes within the process.
 *
 * @throws ConfigValidationError when the resolved config is invalid
 */
export async function createStagingSession(
    options: CreateSessionOptions = {},
): Promise<StagingSession> {

    const config = resolveConfig({ flags: options.config, env: options.env });
    const scope = { accountId: config.accountId, region: config.region };

    if (options.logger) {

        const loggerOptions = options.logger === true ? {} : options.logger;
        const logger = getLogger({
            context: { account: scope.accountId, region: scope.region },
            ...loggerOptions,
            config: config.logging,
        });

        await logger?.start();

    }

    const registry = options.registry ?? getResidentRegistry();
    const agent = await registry.acquire(scope);

    const file = new FileStore({
        scope,
        baseDir: config.stateDir,
        passphrase: config.passphrase,
    });

    const apis = options.apis ?? createRemoteApis(config);

    return new StagingSession(config, agent, file, apis);

}

// ─────────────────────────────────────────────────────────────
// Re-exports
// ─────────────────────────────────────────────────────────────

export { StagingSession } from './session.js';
export { classifyError, toResponseError } from './errors.js';

export type {
    CreateSessionOptions,
    ErrorKind,
    ResponseError,
    Response,
    ServiceRequest,
    StatusRequest,
    ItemRequest,
    ValueRequest,
    DeleteRequest,
    TagRequest,
    UntagRequest,
    CancelTagRequest,
    ResetRequest,
    DiffRequest,
    ApplyRequest,
    DrainRequest,
    PersistRequest,
    StatusEntryView,
    StatusTagEntryView,
    StatusView,
    ApplyView,
    TransferView,
    FileStatusView,
    DiffView,
    ResetView,
} from './types.js';

