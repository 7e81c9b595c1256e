/**
 * In-process IBlobStore for tests
 *
 * Implements the resumable protocol the way Drive does: bytes are committed
 * only from the current offset, the probe reports the committed count.
 */

import { randomUUID } from 'crypto';
import { promises as fs } from 'fs';
import type { BlobArea, ChunkResult, IBlobStore, ReceivedBytes, RemoteFile, ResumableSessionMeta } from '../blob/IBlobStore.js';

export type StoredArea = BlobArea | 'inbox';

export interface StoredFile {
    id: string;
    name: string;
    mimeType: string;
    bytes: Buffer;
    area: StoredArea;
    contributorFolder: string;
    createdTime: string;
}

interface MemorySession {
    meta: ResumableSessionMeta;
    chunks: Buffer[];
    received: number;
    fileId: string | null;
}

/** Resolves after `ms`, or rejects with the abort reason */
function delay(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        const onAbort = () => {
            clearTimeout(timer);
            reject(signal?.reason);
        };
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}

export class MemoryBlobStore implements IBlobStore {
    readonly files = new Map<string, StoredFile>();
    readonly sessions = new Map<string, MemorySession>();
    readonly contributorFolders = new Set<string>();
    /** Calls to putChunk, including failed ones */
    putCalls = 0;
    private failures: Error[] = [];
    private moveFailures = new Map<BlobArea, Error>();
    private putDelayMs = 0;

    /** The next putChunk calls reject with these errors, in order */
    failNextPuts(...errors: Error[]): void {
        this.failures.push(...errors);
    }

    /** Delay every putChunk, to exercise timeouts */
    delayPuts(ms: number): void {
        this.putDelayMs = ms;
    }

    /** The next move into `area` rejects with `error` */
    failNextMove(area: BlobArea, error: Error): void {
        this.moveFailures.set(area, error);
    }

    addInboxFile(name: string, bytes: Buffer, mimeType: string, contributorFolder: string = 'Family'): StoredFile {
        const file: StoredFile = {
            id: `file-${randomUUID()}`,
            name,
            mimeType,
            bytes,
            area: 'inbox',
            contributorFolder,
            createdTime: new Date().toISOString(),
        };
        this.files.set(file.id, file);
        return file;
    }

    filesIn(area: StoredArea): StoredFile[] {
        return [...this.files.values()].filter((file) => file.area === area);
    }

    async ensureLayout(contributorFolders: string[]): Promise<void> {
        contributorFolders.forEach((folder) => this.contributorFolders.add(folder));
    }

    async upload(bytes: Buffer, name: string, area: BlobArea, mimeType: string): Promise<string> {
        const id = `file-${randomUUID()}`;
        this.files.set(id, { id, name, mimeType, bytes, area, contributorFolder: '', createdTime: new Date().toISOString() });
        return id;
    }

    private getFile(fileId: string): StoredFile {
        const file = this.files.get(fileId);
        if (!file) {
            throw new Error(`File not found: ${fileId}`);
        }
        return file;
    }

    async download(fileId: string, destPath: string): Promise<void> {
        await fs.writeFile(destPath, this.getFile(fileId).bytes);
    }

    async readBytes(fileId: string): Promise<Buffer> {
        return this.getFile(fileId).bytes;
    }

    async move(fileId: string, area: BlobArea): Promise<void> {
        const failure = this.moveFailures.get(area);
        if (failure) {
            this.moveFailures.delete(area);
            throw failure;
        }
        this.getFile(fileId).area = area;
    }

    async listInbox(): Promise<RemoteFile[]> {
        return this.filesIn('inbox').map((file) => ({
            id: file.id,
            name: file.name,
            mimeType: file.mimeType,
            sizeBytes: file.bytes.length,
            createdTime: file.createdTime,
            contributorFolder: file.contributorFolder,
        }));
    }

    async createResumableSession(meta: ResumableSessionMeta): Promise<string> {
        const handle = `memory://upload/${randomUUID()}`;
        this.sessions.set(handle, { meta, chunks: [], received: 0, fileId: null });
        return handle;
    }

    private getSession(handle: string): MemorySession {
        const session = this.sessions.get(handle);
        if (!session) {
            throw new Error(`Unknown upload session ${handle}`);
        }
        return session;
    }

    async putChunk(handle: string, start: number, payload: Buffer, total: number, signal?: AbortSignal): Promise<ChunkResult> {
        this.putCalls++;
        if (this.putDelayMs > 0) {
            await delay(this.putDelayMs, signal);
        }
        signal?.throwIfAborted();
        const failure = this.failures.shift();
        if (failure) {
            throw failure;
        }
        const session = this.getSession(handle);
        if (session.fileId) {
            return { complete: true, fileId: session.fileId };
        }
        if (total !== session.meta.sizeBytes) {
            throw new Error(`Declared total ${total} does not match ${session.meta.sizeBytes}`);
        }
        // Bytes before the committed offset are already there, bytes after a gap are refused
        if (start <= session.received && start + payload.length > session.received) {
            session.chunks.push(payload.subarray(session.received - start));
            session.received = start + payload.length;
        }
        if (session.received === total) {
            session.fileId = this.finalize(session);
            return { complete: true, fileId: session.fileId };
        }
        return { complete: false, received: session.received };
    }

    async queryReceivedBytes(handle: string, total: number, signal?: AbortSignal): Promise<ReceivedBytes> {
        signal?.throwIfAborted();
        const session = this.getSession(handle);
        if (session.fileId) {
            return { received: total, fileId: session.fileId };
        }
        return { received: session.received, fileId: null };
    }

    private finalize(session: MemorySession): string {
        const file = this.addInboxFile(
            session.meta.filename,
            Buffer.concat(session.chunks),
            session.meta.mimeType,
            session.meta.contributorFolder
        );
        return file.id;
    }
}
