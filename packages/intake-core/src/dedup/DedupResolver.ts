/**
 * Dedup Resolver - exact digest match first, then perceptual near match for images
 */

import { hammingDistance, isPhash } from '@keepsake/media-hash';
import type { Asset, DuplicateMethod } from '@keepsake/archive-interface';
import type { AssetRepository, PhashCandidate } from '../persistence/AssetRepository.js';

export interface DedupResult {
    duplicateOf: string | null;
    method: DuplicateMethod | null;
    /** Hamming distance of a near match */
    distance?: number;
}

export interface DedupResolverOptions {
    /** Max Hamming distance of a near duplicate */
    threshold: number;
}

export const NO_DUPLICATE: DedupResult = { duplicateOf: null, method: null };

/**
 * Closest candidate within the threshold.
 * Ties: smallest distance, then earliest createdAt, then smallest asset id.
 */
export function nearestCandidate(
    phash: string,
    candidates: PhashCandidate[],
    threshold: number
): { candidate: PhashCandidate; distance: number } | null {
    let best: { candidate: PhashCandidate; distance: number } | null = null;
    for (const candidate of candidates) {
        if (!isPhash(candidate.phash)) {
            continue;
        }
        const distance = hammingDistance(phash, candidate.phash);
        if (distance > threshold) {
            continue;
        }
        if (best === null || compare({ candidate, distance }, best) < 0) {
            best = { candidate, distance };
        }
    }
    return best;
}

function compare(
    a: { candidate: PhashCandidate; distance: number },
    b: { candidate: PhashCandidate; distance: number }
): number {
    if (a.distance !== b.distance) {
        return a.distance - b.distance;
    }
    if (a.candidate.createdAt !== b.candidate.createdAt) {
        return a.candidate.createdAt < b.candidate.createdAt ? -1 : 1;
    }
    if (a.candidate.assetId === b.candidate.assetId) {
        return 0;
    }
    return a.candidate.assetId < b.candidate.assetId ? -1 : 1;
}

export class DedupResolver {
    constructor(
        private readonly repository: AssetRepository,
        private readonly options: DedupResolverOptions
    ) {}

    async resolve(asset: Pick<Asset, 'assetId' | 'sha256' | 'phash' | 'assetType'>): Promise<DedupResult> {
        if (asset.sha256) {
            const existing = await this.repository.findBySha256(asset.sha256);
            if (existing && existing !== asset.assetId) {
                return { duplicateOf: existing, method: 'exact' };
            }
        }

        if (asset.assetType !== 'image' || !asset.phash || !isPhash(asset.phash)) {
            return NO_DUPLICATE;
        }

        const candidates = (await this.repository.listPhashCandidates())
            .filter((candidate) => candidate.assetId !== asset.assetId);
        const match = nearestCandidate(asset.phash, candidates, this.options.threshold);
        if (!match) {
            return NO_DUPLICATE;
        }
        return { duplicateOf: match.candidate.assetId, method: 'near', distance: match.distance };
    }
}
