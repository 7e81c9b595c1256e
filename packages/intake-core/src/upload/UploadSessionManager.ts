/**
 * Upload Session Manager - resumable chunked uploads proxied to the remote store
 *
 * Offsets only ever move to what the remote store acknowledges. When a chunk
 * does not start at the committed offset, the remote store is probed and the
 * client is told where to resume.
 */

import { randomUUID } from 'crypto';
import { KeyedQueue } from '@keepsake/async-utils';
import { sanitizeFilename } from '@keepsake/archive-interface';
import type { IBlobStore, ChunkResult, ReceivedBytes } from '../blob/IBlobStore.js';
import type { ContributorRegistry } from '../batch/ContributorRegistry.js';
import type { ManifestBatcher } from '../batch/ManifestBatcher.js';
import type { UploadSession, UploadSessionStore } from './UploadSessionStore.js';
import type { ContentRange } from './ContentRange.js';
import {
    FileTooLargeError,
    InvalidRangeError,
    RemoteStoreError,
    SessionNotFoundError,
    ValidationError,
    errorMessage,
} from '../errors/IntakeErrors.js';
import { withTimeout } from '../utils/TimeoutWrapper.js';

export interface InitUploadRequest {
    contributorToken: string;
    filename: string;
    mimeType: string;
    sizeBytes: number;
    batchId?: string;
}

export interface InitUploadResult {
    sessionId: string;
    chunkSizeHint: number;
    batchId: string;
}

export type PutChunkResult =
    | { status: 'accepted'; nextOffset: number }
    | { status: 'resume'; nextOffset: number }
    | { status: 'complete'; originFileId: string };

export interface UploadSessionManagerOptions {
    maxSizeBytes: number;
    chunkSizeBytes: number;
    chunkTimeoutMs: number;
    sessionTtlMs: number;
}

export class UploadSessionManager {
    private readonly locks = new KeyedQueue();

    constructor(
        private readonly sessions: UploadSessionStore,
        private readonly blobStore: IBlobStore,
        private readonly contributors: ContributorRegistry,
        private readonly batcher: ManifestBatcher,
        private readonly options: UploadSessionManagerOptions
    ) {}

    async initUpload(request: InitUploadRequest): Promise<InitUploadResult> {
        const contributorFolder = this.contributors.folderFor(request.contributorToken);
        if (!request.filename || request.filename.trim() === '') {
            throw new ValidationError('filename is required');
        }
        if (!Number.isSafeInteger(request.sizeBytes) || request.sizeBytes <= 0) {
            throw new ValidationError('sizeBytes must be a positive integer');
        }
        if (request.sizeBytes > this.options.maxSizeBytes) {
            throw new FileTooLargeError(request.sizeBytes, this.options.maxSizeBytes);
        }

        const batchId = request.batchId
            ? (await this.batcher.requireOpenBatch(request.contributorToken, request.batchId)).batchId
            : (await this.batcher.createBatch(request.contributorToken)).batchId;

        const filename = sanitizeFilename(request.filename);
        const mimeType = request.mimeType || 'application/octet-stream';
        let remoteHandle: string;
        try {
            remoteHandle = await this.blobStore.createResumableSession({
                filename,
                mimeType,
                sizeBytes: request.sizeBytes,
                contributorFolder,
            });
        } catch (error) {
            throw new RemoteStoreError(`Could not open a remote upload session: ${errorMessage(error)}`, error);
        }

        const now = new Date().toISOString();
        const session: UploadSession = {
            sessionId: randomUUID(),
            remoteHandle,
            contributorToken: request.contributorToken,
            contributorFolder,
            batchId,
            filename,
            mimeType,
            sizeBytes: request.sizeBytes,
            offset: 0,
            createdAt: now,
            updatedAt: now,
        };
        await this.sessions.save(session);
        console.log(`[Upload] Session ${session.sessionId} opened for ${filename} (${request.sizeBytes} bytes, batch ${batchId})`);

        return { sessionId: session.sessionId, chunkSizeHint: this.options.chunkSizeBytes, batchId };
    }

    /**
     * Accept one chunk, or answer a status probe when `range.kind` is 'probe'
     */
    putChunk(sessionId: string, range: ContentRange, payload: Buffer): Promise<PutChunkResult> {
        return this.locks.run(sessionId, () => this.putChunkLocked(sessionId, range, payload));
    }

    private async putChunkLocked(sessionId: string, range: ContentRange, payload: Buffer): Promise<PutChunkResult> {
        const session = await this.sessions.get(sessionId);
        if (!session) {
            const result = await this.sessions.getResult(sessionId);
            if (result) {
                return { status: 'complete', originFileId: result.originFileId };
            }
            throw new SessionNotFoundError(sessionId);
        }

        if (range.total !== session.sizeBytes) {
            throw new InvalidRangeError(`Total ${range.total} does not match the declared size ${session.sizeBytes}`);
        }

        if (range.kind === 'probe') {
            if (payload.length > 0) {
                throw new InvalidRangeError('A status probe carries no body');
            }
            return this.probe(session);
        }

        if (range.end - range.start + 1 !== payload.length) {
            throw new InvalidRangeError(
                `Range ${range.start}-${range.end} covers ${range.end - range.start + 1} bytes, body has ${payload.length}`
            );
        }

        if (range.start !== session.offset) {
            console.warn(`[Upload] Session ${sessionId} expected offset ${session.offset}, got ${range.start}, probing`);
            return this.probe(session);
        }

        const result = await this.remoteCall(
            (signal) => this.blobStore.putChunk(session.remoteHandle, range.start, payload, session.sizeBytes, signal),
            `Chunk ${range.start}-${range.end} of session ${sessionId}`
        );
        if (result.complete) {
            return this.complete(session, result.fileId);
        }
        await this.advance(session, result.received);
        return { status: 'accepted', nextOffset: session.offset };
    }

    /**
     * Ask the remote store how much it committed and resume from there
     */
    private async probe(session: UploadSession): Promise<PutChunkResult> {
        const received: ReceivedBytes = await this.remoteCall(
            (signal) => this.blobStore.queryReceivedBytes(session.remoteHandle, session.sizeBytes, signal),
            `Status probe of session ${session.sessionId}`
        );
        if (received.fileId) {
            return this.complete(session, received.fileId);
        }
        await this.advance(session, received.received);
        return { status: 'resume', nextOffset: session.offset };
    }

    private async remoteCall<T extends ChunkResult | ReceivedBytes>(call: (signal: AbortSignal) => Promise<T>, label: string): Promise<T> {
        try {
            return await withTimeout(call, this.options.chunkTimeoutMs, label);
        } catch (error) {
            console.error(`[Upload] ${label} failed: ${errorMessage(error)}`);
            throw new RemoteStoreError(`${label} failed, retry from the current offset`, error);
        }
    }

    private async advance(session: UploadSession, received: number): Promise<void> {
        // The remote count never decreases, a smaller value is a stale answer
        const next = Math.min(Math.max(session.offset, received), session.sizeBytes);
        if (next === session.offset) {
            return;
        }
        session.offset = next;
        session.updatedAt = new Date().toISOString();
        await this.sessions.save(session);
    }

    private async complete(session: UploadSession, originFileId: string): Promise<PutChunkResult> {
        await this.sessions.saveResult({
            sessionId: session.sessionId,
            originFileId,
            completedAt: new Date().toISOString(),
        });
        await this.sessions.delete(session.sessionId);
        await this.batcher.appendFile(session.batchId, {
            originFileId,
            filename: session.filename,
            sizeBytes: session.sizeBytes,
            mimeType: session.mimeType,
        });
        console.log(`[Upload] Session ${session.sessionId} complete: ${session.filename} → ${originFileId}`);
        return { status: 'complete', originFileId };
    }

    /**
     * Delete sessions and upload results untouched for longer than the TTL
     * @returns number of deleted records
     */
    async reapExpired(now: Date = new Date()): Promise<number> {
        const cutoff = now.getTime() - this.options.sessionTtlMs;
        let reaped = 0;

        for (const session of await this.sessions.list()) {
            if (Date.parse(session.updatedAt) >= cutoff) {
                continue;
            }
            const deleted = await this.locks.run(session.sessionId, async () => {
                const current = await this.sessions.get(session.sessionId);
                if (!current || Date.parse(current.updatedAt) >= cutoff) {
                    return false;
                }
                await this.sessions.delete(session.sessionId);
                return true;
            });
            if (deleted) {
                reaped++;
            }
        }
        for (const result of await this.sessions.listResults()) {
            if (Date.parse(result.completedAt) < cutoff) {
                await this.sessions.deleteResult(result.sessionId);
                reaped++;
            }
        }

        if (reaped > 0) {
            console.log(`[Upload] Reaped ${reaped} expired session records`);
        }
        return reaped;
    }

    activeSessionCount(): Promise<number> {
        return this.sessions.count();
    }
}
