/**
 * Manifest Batcher - groups uploads of one contributor with a shared context
 *
 * Batches are mutated under a per-batch lock: uploads of one batch complete
 * concurrently and each appends to the same record.
 */

import { randomUUID } from 'crypto';
import { KeyedQueue } from '@keepsake/async-utils';
import type { Batch, BatchContext, Manifest, ManifestFile } from '@keepsake/archive-interface';
import type { IKVClient } from '../kv/IKVClient.js';
import type { IBlobStore } from '../blob/IBlobStore.js';
import type { ContributorRegistry } from './ContributorRegistry.js';
import {
    BatchFinishedError,
    BatchNotFoundError,
    InvalidTokenError,
    TooManyFilesError,
    ValidationError,
    errorMessage,
} from '../errors/IntakeErrors.js';
import { isFiniteNumber, isNullableString, isRecord, isString } from '../utils/guards.js';

const BATCH_PREFIX = '/batch/';
const MANIFEST_PREFIX = '/manifest/';
const PENDING_PREFIX = '/manifest-pending/';

export interface ManifestBatcherOptions {
    /** Max files of a finished batch */
    maxFiles: number;
}

export interface FinishBatchResult {
    ack: true;
    totalProcessedCount: number;
    manifest: Manifest;
}

function isManifestFile(value: unknown): value is ManifestFile {
    return isRecord(value)
        && isString(value.originFileId)
        && isString(value.filename)
        && isFiniteNumber(value.sizeBytes)
        && (value.mimeType === undefined || isString(value.mimeType));
}

function isBatchContext(value: unknown): value is BatchContext {
    return isRecord(value)
        && (value.decade === undefined || value.decade === null || isFiniteNumber(value.decade))
        && (value.event === undefined || isNullableString(value.event))
        && (value.notes === undefined || isNullableString(value.notes));
}

export function isBatch(value: unknown): value is Batch {
    return isRecord(value)
        && isString(value.batchId)
        && isString(value.contributorToken)
        && isString(value.createdAt)
        && Array.isArray(value.files)
        && value.files.every(isManifestFile)
        && (value.finishedAt === undefined || isString(value.finishedAt));
}

export function isManifest(value: unknown): value is Manifest {
    return isRecord(value)
        && isString(value.batchId)
        && isString(value.contributorToken)
        && isString(value.contributorFolder)
        && isString(value.createdAt)
        && isString(value.finishedAt)
        && isBatchContext(value.context)
        && Array.isArray(value.files)
        && value.files.every(isManifestFile)
        && isFiniteNumber(value.totalFiles)
        && isFiniteNumber(value.totalBytes);
}

/**
 * Validate the files list of a finish request
 * @throws ValidationError
 */
export function parseManifestFiles(value: unknown): ManifestFile[] {
    if (value === undefined || value === null) {
        return [];
    }
    if (!Array.isArray(value)) {
        throw new ValidationError('files must be an array');
    }
    return value.map((file, index) => {
        if (!isRecord(file) || !isString(file.originFileId) || file.originFileId === '') {
            throw new ValidationError(`files[${index}].originFileId is required`);
        }
        const filename = isString(file.filename) && file.filename !== '' ? file.filename : file.originFileId;
        const sizeBytes = isFiniteNumber(file.sizeBytes) && file.sizeBytes >= 0 ? file.sizeBytes : 0;
        const parsed: ManifestFile = { originFileId: file.originFileId, filename, sizeBytes };
        if (isString(file.mimeType)) {
            parsed.mimeType = file.mimeType;
        }
        return parsed;
    });
}

/**
 * Validate the context of a finish request
 * @throws ValidationError
 */
export function parseBatchContext(value: unknown): BatchContext {
    if (value === undefined || value === null) {
        return {};
    }
    if (!isRecord(value)) {
        throw new ValidationError('context must be an object');
    }
    const context: BatchContext = {};
    if (value.decade !== undefined && value.decade !== null) {
        const decade = typeof value.decade === 'string' ? parseInt(value.decade, 10) : value.decade;
        if (!isFiniteNumber(decade)) {
            throw new ValidationError('context.decade must be a year such as 1980');
        }
        context.decade = decade;
    }
    if (value.event !== undefined && value.event !== null) {
        if (!isString(value.event)) {
            throw new ValidationError('context.event must be a string');
        }
        context.event = value.event;
    }
    if (value.notes !== undefined && value.notes !== null) {
        if (!isString(value.notes)) {
            throw new ValidationError('context.notes must be a string');
        }
        context.notes = value.notes;
    }
    return context;
}

export class ManifestBatcher {
    private readonly locks = new KeyedQueue();

    constructor(
        private readonly kv: IKVClient,
        private readonly blobStore: IBlobStore,
        private readonly contributors: ContributorRegistry,
        private readonly options: ManifestBatcherOptions
    ) {}

    async createBatch(contributorToken: string): Promise<Batch> {
        this.contributors.folderFor(contributorToken);
        const batch: Batch = {
            batchId: randomUUID(),
            contributorToken,
            createdAt: new Date().toISOString(),
            files: [],
        };
        await this.kv.set(BATCH_PREFIX + batch.batchId, batch);
        console.log(`[Batch] Created ${batch.batchId}`);
        return batch;
    }

    async getBatch(batchId: string): Promise<Batch | null> {
        const value = await this.kv.get(BATCH_PREFIX + batchId);
        return isBatch(value) ? value : null;
    }

    private async requireBatch(contributorToken: string, batchId: string): Promise<Batch> {
        const batch = await this.getBatch(batchId);
        if (!batch) {
            throw new BatchNotFoundError(batchId);
        }
        if (batch.contributorToken !== contributorToken) {
            throw new InvalidTokenError();
        }
        return batch;
    }

    /**
     * Batch an upload may be attached to
     * @throws BatchNotFoundError, InvalidTokenError, BatchFinishedError
     */
    async requireOpenBatch(contributorToken: string, batchId: string): Promise<Batch> {
        const batch = await this.requireBatch(contributorToken, batchId);
        if (batch.finishedAt) {
            throw new BatchFinishedError(batchId);
        }
        return batch;
    }

    /**
     * Record a completed upload. Files reaching a finished batch are logged and dropped
     * from the batch, the upload itself stays processable.
     */
    async appendFile(batchId: string, file: ManifestFile): Promise<void> {
        await this.locks.run(batchId, async () => {
            const batch = await this.getBatch(batchId);
            if (!batch) {
                console.warn(`[Batch] Completed upload ${file.originFileId} refers to unknown batch ${batchId}`);
                return;
            }
            if (batch.finishedAt) {
                console.warn(`[Batch] Completed upload ${file.originFileId} arrived after batch ${batchId} was finished`);
                return;
            }
            if (batch.files.some((existing) => existing.originFileId === file.originFileId)) {
                return;
            }
            batch.files.push(file);
            await this.kv.set(BATCH_PREFIX + batchId, batch);
        });
    }

    async finishBatch(
        contributorToken: string,
        batchId: string,
        files: ManifestFile[],
        context: BatchContext
    ): Promise<FinishBatchResult> {
        const contributorFolder = this.contributors.folderFor(contributorToken);
        if (files.length > this.options.maxFiles) {
            throw new TooManyFilesError(files.length, this.options.maxFiles);
        }

        const { manifest, created } = await this.locks.run(batchId, async () => {
            const batch = await this.requireBatch(contributorToken, batchId);
            const existing = await this.getManifest(batchId);
            if (batch.finishedAt && existing) {
                return { manifest: existing, created: false };
            }

            const merged = [...batch.files];
            const seen = new Set(merged.map((file) => file.originFileId));
            for (const file of files) {
                if (!seen.has(file.originFileId)) {
                    seen.add(file.originFileId);
                    merged.push(file);
                }
            }
            if (merged.length > this.options.maxFiles) {
                throw new TooManyFilesError(merged.length, this.options.maxFiles);
            }

            const finishedAt = new Date().toISOString();
            const built: Manifest = {
                batchId,
                contributorToken,
                contributorFolder,
                createdAt: batch.createdAt,
                finishedAt,
                context,
                files: merged,
                totalFiles: merged.length,
                totalBytes: merged.reduce((sum, file) => sum + file.sizeBytes, 0),
            };
            const written = await this.kv.setIfAbsent(MANIFEST_PREFIX + batchId, built);
            const manifest = written ? built : await this.getManifest(batchId);
            if (!manifest) {
                throw new Error(`Manifest of batch ${batchId} could not be read back`);
            }
            if (written) {
                await this.kv.set(PENDING_PREFIX + batchId, { finishedAt });
            }
            await this.kv.set(BATCH_PREFIX + batchId, { ...batch, files: merged, finishedAt: manifest.finishedAt });
            return { manifest, created: written };
        });

        if (created) {
            console.log(`[Batch] Finished ${batchId}: ${manifest.totalFiles} files, ${manifest.totalBytes} bytes`);
            await this.copyManifestToRemote(manifest);
        }
        return { ack: true, totalProcessedCount: manifest.totalFiles, manifest };
    }

    private async copyManifestToRemote(manifest: Manifest): Promise<void> {
        try {
            await this.blobStore.upload(
                Buffer.from(JSON.stringify(manifest, null, 2)),
                `batch_${manifest.batchId}.json`,
                'manifests',
                'application/json'
            );
        } catch (error) {
            console.error(`[Batch] Remote copy of manifest ${manifest.batchId} failed: ${errorMessage(error)}`);
        }
    }

    async getManifest(batchId: string): Promise<Manifest | null> {
        const value = await this.kv.get(MANIFEST_PREFIX + batchId);
        return isManifest(value) ? value : null;
    }

    /** Batch ids of manifests not yet reconciled by the worker */
    async pendingManifests(): Promise<string[]> {
        const pairs = await this.kv.getRange(PENDING_PREFIX);
        return pairs.map((pair) => pair.key.slice(PENDING_PREFIX.length));
    }

    async markReconciled(batchId: string): Promise<void> {
        await this.kv.delete(PENDING_PREFIX + batchId);
    }
}
