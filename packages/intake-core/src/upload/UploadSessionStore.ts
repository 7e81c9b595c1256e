/**
 * KV persistence of upload sessions and their results
 */

import type { IKVClient } from '../kv/IKVClient.js';
import { parseStoredValue } from '../kv/IKVClient.js';
import { isFiniteNumber, isRecord, isString } from '../utils/guards.js';

export interface UploadSession {
    sessionId: string;
    /** Resumable session handle of the remote store */
    remoteHandle: string;
    contributorToken: string;
    contributorFolder: string;
    batchId: string;
    filename: string;
    mimeType: string;
    sizeBytes: number;
    /** Bytes committed by the remote store */
    offset: number;
    createdAt: string;
    updatedAt: string;
}

export interface UploadResult {
    sessionId: string;
    originFileId: string;
    completedAt: string;
}

const SESSION_PREFIX = '/upload-session/';
const RESULT_PREFIX = '/upload-result/';

export function isUploadSession(value: unknown): value is UploadSession {
    return isRecord(value)
        && isString(value.sessionId)
        && isString(value.remoteHandle)
        && isString(value.contributorToken)
        && isString(value.contributorFolder)
        && isString(value.batchId)
        && isString(value.filename)
        && isString(value.mimeType)
        && isFiniteNumber(value.sizeBytes)
        && isFiniteNumber(value.offset)
        && isString(value.createdAt)
        && isString(value.updatedAt);
}

export function isUploadResult(value: unknown): value is UploadResult {
    return isRecord(value)
        && isString(value.sessionId)
        && isString(value.originFileId)
        && isString(value.completedAt);
}

export class UploadSessionStore {
    constructor(private readonly kv: IKVClient) {}

    async get(sessionId: string): Promise<UploadSession | null> {
        const value = await this.kv.get(SESSION_PREFIX + sessionId);
        return isUploadSession(value) ? value : null;
    }

    async save(session: UploadSession): Promise<void> {
        await this.kv.set(SESSION_PREFIX + session.sessionId, session);
    }

    async delete(sessionId: string): Promise<void> {
        await this.kv.delete(SESSION_PREFIX + sessionId);
    }

    async getResult(sessionId: string): Promise<UploadResult | null> {
        const value = await this.kv.get(RESULT_PREFIX + sessionId);
        return isUploadResult(value) ? value : null;
    }

    async saveResult(result: UploadResult): Promise<void> {
        await this.kv.set(RESULT_PREFIX + result.sessionId, result);
    }

    async deleteResult(sessionId: string): Promise<void> {
        await this.kv.delete(RESULT_PREFIX + sessionId);
    }

    async list(): Promise<UploadSession[]> {
        return (await this.kv.getRange(SESSION_PREFIX))
            .map((pair) => parseStoredValue(pair.value))
            .filter(isUploadSession);
    }

    async listResults(): Promise<UploadResult[]> {
        return (await this.kv.getRange(RESULT_PREFIX))
            .map((pair) => parseStoredValue(pair.value))
            .filter(isUploadResult);
    }

    async count(): Promise<number> {
        return this.kv.countKeysWithPrefix(SESSION_PREFIX);
    }
}
