/**
 * Wiring of the intake services over the in-process stand-ins
 */

import { MemoryKVClient } from './MemoryKVClient.js';
import { MemoryBlobStore } from './MemoryBlobStore.js';
import { ContributorRegistry } from '../batch/ContributorRegistry.js';
import { ManifestBatcher } from '../batch/ManifestBatcher.js';
import { UploadSessionStore } from '../upload/UploadSessionStore.js';
import { UploadSessionManager, type UploadSessionManagerOptions } from '../upload/UploadSessionManager.js';

export const MB = 1024 * 1024;
export const TEST_TOKEN = 'test-token';
export const OTHER_TOKEN = 'other-token';

export interface IntakeFixture {
    kv: MemoryKVClient;
    blobStore: MemoryBlobStore;
    contributors: ContributorRegistry;
    batcher: ManifestBatcher;
    sessions: UploadSessionStore;
    uploads: UploadSessionManager;
}

export function createIntakeFixture(
    options: Partial<UploadSessionManagerOptions> & { maxFiles?: number } = {}
): IntakeFixture {
    const kv = new MemoryKVClient();
    const blobStore = new MemoryBlobStore();
    const contributors = new ContributorRegistry(new Map([
        [TEST_TOKEN, 'Family'],
        [OTHER_TOKEN, 'Friends'],
    ]));
    const batcher = new ManifestBatcher(kv, blobStore, contributors, { maxFiles: options.maxFiles ?? 10 });
    const sessions = new UploadSessionStore(kv);
    const uploads = new UploadSessionManager(sessions, blobStore, contributors, batcher, {
        maxSizeBytes: options.maxSizeBytes ?? 20 * MB,
        chunkSizeBytes: options.chunkSizeBytes ?? 4 * MB,
        chunkTimeoutMs: options.chunkTimeoutMs ?? 2000,
        sessionTtlMs: options.sessionTtlMs ?? 24 * 60 * 60 * 1000,
    });
    return { kv, blobStore, contributors, batcher, sessions, uploads };
}
