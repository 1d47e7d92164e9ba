/**
 * Staging session.
 *
 * Binds one identity scope's resident store, file store and remote clients,
 * and exposes every use case as a request/response pair.
 */
import { attempt } from '@logosdx/utils';

import type { Config } from '../core/config/index.js';
import { observer } from '../core/observer.js';
import {
    AddUseCase,
    ApplyUseCase,
    DeleteUseCase,
    DiffUseCase,
    DrainUseCase,
    EditUseCase,
    PersistUseCase,
    ResetUseCase,
    StatusUseCase,
    TagUseCase,
    createStrategy,
    parseService,
    type AddOutput,
    type ApplyOutput,
    type BaselineOutput,
    type DeleteOutput,
    type DraftOutput,
    type EditOutput,
    type FileStore,
    type FullStrategy,
    type IdentityScope,
    type RemoteApis,
    type ResidentStore,
    type Service,
    type StatusOutput,
    type TagOutput,
} from '../core/staging/index.js';
import { toResponseError } from './errors.js';
import type {
    ApplyRequest,
    ApplyView,
    CancelTagRequest,
    DeleteRequest,
    DiffRequest,
    DiffView,
    DrainRequest,
    FileStatusView,
    ItemRequest,
    PersistRequest,
    ResetRequest,
    ResetView,
    Response,
    StatusRequest,
    StatusView,
    TagRequest,
    TransferView,
    UntagRequest,
    ValueRequest,
} from './types.js';

/**
 * Session over one account and region.
 *
 * @example
 * ```typescript
 * const session = await createStagingSession({
 *     config: { accountId: '123456789012', region: 'us-east-1' },
 * })
 *
 * await session.edit({ service: 'param', name: '/app/url', value: 'https://new' })
 * const res = await session.apply({ service: 'param' })
 * ```
 */
export class StagingSession {

    #config: Config;
    #agent: ResidentStore;
    #file: FileStore;
    #apis: RemoteApis;

    constructor(config: Config, agent: ResidentStore, file: FileStore, apis: RemoteApis) {

        this.#config = config;
        this.#agent = agent;
        this.#file = file;
        this.#apis = apis;

    }

    // ─────────────────────────────────────────────────────────
    // Read-only Properties
    // ─────────────────────────────────────────────────────────

    get config(): Config {

        return this.#config;

    }

    get scope(): IdentityScope {

        return { accountId: this.#config.accountId, region: this.#config.region };

    }

    /** Path of the state file drain and persist use */
    get statePath(): string {

        return this.#file.path;

    }

    get observer(): typeof observer {

        return observer;

    }

    // ─────────────────────────────────────────────────────────
    // Staging
    // ─────────────────────────────────────────────────────────

    async status(request: StatusRequest, signal?: AbortSignal): Promise<Response<StatusView>> {

        return this.#run(async () => {

            const useCase = new StatusUseCase(this.#strategy(request.service), this.#agent);

            return toStatusView(await useCase.execute({ name: request.name }, signal));

        });

    }

    async add(request: ValueRequest, signal?: AbortSignal): Promise<Response<AddOutput>> {

        return this.#run(() => {

            const useCase = new AddUseCase(this.#strategy(request.service), this.#agent);

            return useCase.execute({
                name: request.name,
                value: request.value,
                description: request.description,
            }, signal);

        });

    }

    /** Staged value of a pending create, for pre-filling an editor */
    async addDraft(request: ItemRequest, signal?: AbortSignal): Promise<Response<DraftOutput>> {

        return this.#run(() => {

            const useCase = new AddUseCase(this.#strategy(request.service), this.#agent);

            return useCase.draft({ name: request.name }, signal);

        });

    }

    async edit(request: ValueRequest, signal?: AbortSignal): Promise<Response<EditOutput>> {

        return this.#run(() => {

            const useCase = new EditUseCase(this.#strategy(request.service), this.#agent);

            return useCase.execute({
                name: request.name,
                value: request.value,
                description: request.description,
            }, signal);

        });

    }

    /** Value an edit starts from: the staged one, else the remote one */
    async editBaseline(request: ItemRequest, signal?: AbortSignal): Promise<Response<BaselineOutput>> {

        return this.#run(() => {

            const useCase = new EditUseCase(this.#strategy(request.service), this.#agent);

            return useCase.baseline({ name: request.name }, signal);

        });

    }

    async delete(request: DeleteRequest, signal?: AbortSignal): Promise<Response<DeleteOutput>> {

        return this.#run(() => {

            const useCase = new DeleteUseCase(this.#strategy(request.service), this.#agent);

            return useCase.execute({
                name: request.name,
                force: request.force,
                recoveryWindow: request.recoveryWindow,
            }, signal);

        });

    }

    async tag(request: TagRequest, signal?: AbortSignal): Promise<Response<TagOutput>> {

        return this.#run(() => this.#tagUseCase(request.service).tag({
            name: request.name,
            tags: { ...request.tags },
        }, signal));

    }

    async untag(request: UntagRequest, signal?: AbortSignal): Promise<Response<TagOutput>> {

        return this.#run(() => this.#tagUseCase(request.service).untag({
            name: request.name,
            keys: [...request.keys],
        }, signal));

    }

    async cancelAddTag(request: CancelTagRequest, signal?: AbortSignal): Promise<Response<TagOutput>> {

        return this.#run(() => this.#tagUseCase(request.service).cancelAddTag({
            name: request.name,
            key: request.key,
        }, signal));

    }

    async cancelRemoveTag(request: CancelTagRequest, signal?: AbortSignal): Promise<Response<TagOutput>> {

        return this.#run(() => this.#tagUseCase(request.service).cancelRemoveTag({
            name: request.name,
            key: request.key,
        }, signal));

    }

    async reset(request: ResetRequest, signal?: AbortSignal): Promise<Response<ResetView>> {

        return this.#run(() => {

            const useCase = new ResetUseCase(this.#strategy(request.service), this.#agent);

            return useCase.execute({ spec: request.spec, all: request.all }, signal);

        });

    }

    // ─────────────────────────────────────────────────────────
    // Remote
    // ─────────────────────────────────────────────────────────

    async diff(request: DiffRequest, signal?: AbortSignal): Promise<Response<DiffView>> {

        return this.#run(() => {

            const useCase = new DiffUseCase(this.#strategy(request.service), this.#agent);

            return useCase.execute({ name: request.name }, signal);

        });

    }

    async apply(request: ApplyRequest, signal?: AbortSignal): Promise<Response<ApplyView>> {

        return this.#run(async () => {

            const useCase = new ApplyUseCase(this.#strategy(request.service), this.#agent);

            const output = await useCase.execute({
                name: request.name,
                ignoreConflicts: request.ignoreConflicts,
                rejectOnConflict: request.rejectOnConflict,
            }, signal);

            return toApplyView(output);

        });

    }

    // ─────────────────────────────────────────────────────────
    // Transfers
    // ─────────────────────────────────────────────────────────

    async drain(request: DrainRequest = {}, signal?: AbortSignal): Promise<Response<TransferView>> {

        return this.#run(async () => {

            const useCase = new DrainUseCase(this.#file.withPassphrase(request.passphrase), this.#agent);

            const output = await useCase.execute({
                service: optionalService(request.service),
                keep: request.keep,
                force: request.force,
                merge: request.merge,
            }, signal);

            return {
                entries: output.entries,
                tags: output.tags,
                merged: output.merged,
                ...(output.cleanupError ? { cleanupError: output.cleanupError.message } : {}),
            };

        });

    }

    async persist(request: PersistRequest = {}, signal?: AbortSignal): Promise<Response<TransferView>> {

        return this.#run(async () => {

            const useCase = new PersistUseCase(this.#agent, this.#file.withPassphrase(request.passphrase));

            const output = await useCase.execute({
                service: optionalService(request.service),
                keep: request.keep,
                mode: request.mode,
            }, signal);

            return {
                entries: output.entries,
                tags: output.tags,
                ...(output.cleanupError ? { cleanupError: output.cleanupError.message } : {}),
            };

        });

    }

    /** Whether the state file exists and is encrypted; reads no content */
    async fileStatus(signal?: AbortSignal): Promise<Response<FileStatusView>> {

        return this.#run(async () => ({
            path: this.#file.path,
            exists: await this.#file.exists(signal),
            encrypted: await this.#file.isEncrypted(signal),
            passphraseConfigured: this.#file.hasPassphrase,
        }));

    }

    // ─────────────────────────────────────────────────────────
    // Internals
    // ─────────────────────────────────────────────────────────

    #strategy(service: string): FullStrategy {

        return createStrategy(parseService(service), this.#apis);

    }

    #tagUseCase(service: string): TagUseCase {

        return new TagUseCase(this.#strategy(service), this.#agent);

    }

    async #run<T>(fn: () => Promise<T>): Promise<Response<T>> {

        const [data, err] = await attempt(fn);

        if (err) {

            return { ok: false, error: toResponseError(err) };

        }

        return { ok: true, data };

    }

}

// ─────────────────────────────────────────────────────────────
// View Conversion
// ─────────────────────────────────────────────────────────────

function optionalService(tag: string | undefined): Service | undefined {

    return tag === undefined ? undefined : parseService(tag);

}

function toStatusView(output: StatusOutput): StatusView {

    return {
        service: output.service,
        serviceName: output.serviceName,
        itemName: output.itemName,
        entries: output.entries.map((entry) => ({
            ...entry,
            stagedAt: entry.stagedAt.toISOString(),
        })),
        tagEntries: output.tagEntries.map((tagEntry) => ({
            ...tagEntry,
            stagedAt: tagEntry.stagedAt.toISOString(),
        })),
    };

}

function toApplyView(output: ApplyOutput): ApplyView {

    return {
        ...output,
        entryResults: output.entryResults.map(({ name, status, error }) => ({
            name,
            status,
            ...(error ? { error: error.message } : {}),
        })),
        tagResults: output.tagResults.map(({ name, add, remove, error }) => ({
            name,
            add,
            remove,
            ...(error ? { error: error.message } : {}),
        })),
    };

}
