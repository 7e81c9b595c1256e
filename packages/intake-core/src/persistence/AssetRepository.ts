/**
 * Asset persistence over the KV store
 *
 * Key layout:
 * /origin/{originFileId}          → assetId, the atomic claim
 * /ignored/{originFileId}         → {reason, mimeType}
 * /attribution/{originFileId}     → FileAttribution
 * /asset/{assetId}                → Asset
 * /status/{status}/{assetId}      → {updatedAt}
 * /sha256/{sha256}                → assetId of the first asset with that digest
 * /phash/{assetId}                → {phash, createdAt}, canonical images only
 * /duplicate/{assetId}            → DuplicateLink
 * /ops/last_worker_run            → ISO timestamp
 */

import {
    isAssetStatus,
    type Asset,
    type AssetStatus,
    type DuplicateLink,
    type FileAttribution,
} from '@keepsake/archive-interface';
import type { IKVClient } from '../kv/IKVClient.js';
import { parseStoredValue } from '../kv/IKVClient.js';
import { isFiniteNumber, isNullableString, isRecord, isString } from '../utils/guards.js';

export interface PhashCandidate {
    assetId: string;
    phash: string;
    createdAt: string;
}

export interface IgnoredOrigin {
    reason: string;
    mimeType: string | null;
    at: string;
}

export type StatusCounts = Record<AssetStatus, number>;

const KEYS = {
    origin: (originFileId: string) => `/origin/${originFileId}`,
    ignored: (originFileId: string) => `/ignored/${originFileId}`,
    attribution: (originFileId: string) => `/attribution/${originFileId}`,
    asset: (assetId: string) => `/asset/${assetId}`,
    statusPrefix: (status: AssetStatus) => `/status/${status}/`,
    sha256: (sha256: string) => `/sha256/${sha256}`,
    phashPrefix: '/phash/',
    duplicate: (assetId: string) => `/duplicate/${assetId}`,
    lastWorkerRun: '/ops/last_worker_run',
};

export function isAsset(value: unknown): value is Asset {
    return isRecord(value)
        && isString(value.assetId)
        && isString(value.originFileId)
        && isNullableString(value.contributorToken)
        && isNullableString(value.batchId)
        && isRecord(value.context)
        && isString(value.originalFilename)
        && isString(value.mimeType)
        && (value.assetType === 'image' || value.assetType === 'video' || value.assetType === 'audio')
        && (value.sizeBytes === null || isFiniteNumber(value.sizeBytes))
        && isNullableString(value.sha256)
        && isNullableString(value.phash)
        && isString(value.status) && isAssetStatus(value.status)
        && isNullableString(value.duplicateOf)
        && (value.duplicateMethod === null || value.duplicateMethod === 'exact' || value.duplicateMethod === 'near')
        && (value.durationSeconds === null || isFiniteNumber(value.durationSeconds))
        && isNullableString(value.thumbnailPath)
        && isRecord(value.enrichment)
        && Array.isArray(value.errors)
        && isString(value.createdAt)
        && isString(value.updatedAt)
        && isNullableString(value.processedAt);
}

export function isDuplicateLink(value: unknown): value is DuplicateLink {
    return isRecord(value)
        && isString(value.assetId)
        && isString(value.duplicateOf)
        && (value.method === 'exact' || value.method === 'near')
        && (value.distance === undefined || isFiniteNumber(value.distance))
        && isString(value.createdAt);
}

function isFileAttribution(value: unknown): value is FileAttribution {
    return isRecord(value)
        && isString(value.batchId)
        && isString(value.contributorToken)
        && isRecord(value.context);
}

function isPhashEntry(value: unknown): value is Omit<PhashCandidate, 'assetId'> {
    return isRecord(value) && isString(value.phash) && isString(value.createdAt);
}

export class AssetRepository {
    constructor(private readonly kv: IKVClient) {}

    // ========================================================================
    // Origin files
    // ========================================================================

    /**
     * Conditional insert of /origin/{originFileId}
     * @returns false when another asset already claimed the origin
     */
    claimOrigin(originFileId: string, assetId: string): Promise<boolean> {
        return this.kv.setIfAbsent(KEYS.origin(originFileId), assetId);
    }

    async getClaim(originFileId: string): Promise<string | null> {
        const value = await this.kv.get(KEYS.origin(originFileId));
        return isString(value) ? value : null;
    }

    /**
     * Undo a claim whose asset never got past `processing`, so the next cycle
     * picks the file up again. A claim held by another asset is left alone.
     */
    async releaseClaim(originFileId: string, assetId: string): Promise<void> {
        if ((await this.getClaim(originFileId)) !== assetId) {
            return;
        }
        await this.kv.delete(KEYS.statusPrefix('processing') + assetId);
        await this.kv.delete(KEYS.asset(assetId));
        await this.kv.delete(KEYS.origin(originFileId));
    }

    async markIgnored(originFileId: string, reason: string, mimeType: string | null): Promise<void> {
        const marker: IgnoredOrigin = { reason, mimeType, at: new Date().toISOString() };
        await this.kv.set(KEYS.ignored(originFileId), marker);
    }

    async isIgnored(originFileId: string): Promise<boolean> {
        return (await this.kv.get(KEYS.ignored(originFileId))) !== null;
    }

    async saveAttribution(originFileId: string, attribution: FileAttribution): Promise<void> {
        await this.kv.set(KEYS.attribution(originFileId), attribution);
    }

    async getAttribution(originFileId: string): Promise<FileAttribution | null> {
        const value = await this.kv.get(KEYS.attribution(originFileId));
        return isFileAttribution(value) ? value : null;
    }

    // ========================================================================
    // Assets
    // ========================================================================

    async getAsset(assetId: string): Promise<Asset | null> {
        const value = await this.kv.get(KEYS.asset(assetId));
        return isAsset(value) ? value : null;
    }

    async getAssetByOrigin(originFileId: string): Promise<Asset | null> {
        const assetId = await this.getClaim(originFileId);
        return assetId ? this.getAsset(assetId) : null;
    }

    /**
     * Write the asset and move its status index entry
     */
    async upsertAsset(asset: Asset): Promise<Asset> {
        const previous = await this.getAsset(asset.assetId);
        const stored: Asset = { ...asset, updatedAt: new Date().toISOString() };
        await this.kv.set(KEYS.asset(asset.assetId), stored);
        if (previous && previous.status !== stored.status) {
            await this.kv.delete(KEYS.statusPrefix(previous.status) + asset.assetId);
        }
        await this.kv.set(KEYS.statusPrefix(stored.status) + asset.assetId, { updatedAt: stored.updatedAt });
        return stored;
    }

    async countByStatus(status: AssetStatus): Promise<number> {
        return this.kv.countKeysWithPrefix(KEYS.statusPrefix(status));
    }

    async statusCounts(): Promise<StatusCounts> {
        const count = (status: AssetStatus) => this.countByStatus(status);
        const [uploaded, processing, needsReview, possibleDuplicate, transcribeLater, error, approved, archived, rejected] =
            await Promise.all([
                count('uploaded'),
                count('processing'),
                count('needs_review'),
                count('possible_duplicate'),
                count('transcribe_later'),
                count('error'),
                count('approved'),
                count('archived'),
                count('rejected'),
            ]);
        return {
            uploaded,
            processing,
            needs_review: needsReview,
            possible_duplicate: possibleDuplicate,
            transcribe_later: transcribeLater,
            error,
            approved,
            archived,
            rejected,
        };
    }

    // ========================================================================
    // Fingerprints and duplicates
    // ========================================================================

    async findBySha256(sha256: string): Promise<string | null> {
        const value = await this.kv.get(KEYS.sha256(sha256));
        return isString(value) ? value : null;
    }

    /**
     * Index the digest (first asset wins) and, for canonical images, the phash
     */
    async registerFingerprint(asset: Asset): Promise<void> {
        if (asset.sha256) {
            await this.kv.setIfAbsent(KEYS.sha256(asset.sha256), asset.assetId);
        }
        if (asset.phash && asset.duplicateOf === null) {
            await this.kv.set(KEYS.phashPrefix + asset.assetId, { phash: asset.phash, createdAt: asset.createdAt });
        }
    }

    async listPhashCandidates(): Promise<PhashCandidate[]> {
        const pairs = await this.kv.getRange(KEYS.phashPrefix);
        const candidates: PhashCandidate[] = [];
        for (const pair of pairs) {
            const entry = parseStoredValue(pair.value);
            if (isPhashEntry(entry)) {
                candidates.push({
                    assetId: pair.key.slice(KEYS.phashPrefix.length),
                    phash: entry.phash,
                    createdAt: entry.createdAt,
                });
            }
        }
        return candidates;
    }

    /**
     * @returns false when a link already exists, links are immutable
     */
    recordDuplicate(link: DuplicateLink): Promise<boolean> {
        return this.kv.setIfAbsent(KEYS.duplicate(link.assetId), link);
    }

    async getDuplicate(assetId: string): Promise<DuplicateLink | null> {
        const value = await this.kv.get(KEYS.duplicate(assetId));
        return isDuplicateLink(value) ? value : null;
    }

    // ========================================================================
    // Ops
    // ========================================================================

    async setLastWorkerRun(at: string): Promise<void> {
        await this.kv.set(KEYS.lastWorkerRun, at);
    }

    async getLastWorkerRun(): Promise<string | null> {
        const value = await this.kv.get(KEYS.lastWorkerRun);
        return isString(value) ? value : null;
    }
}
