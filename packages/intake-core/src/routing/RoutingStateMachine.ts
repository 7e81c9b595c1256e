/**
 * Routing State Machine
 *
 * Decides the holding state of a processed asset, once, in precedence order:
 *   1. any duplicate match          → possible_duplicate
 *   2. time-based, transcription deferred → transcribe_later
 *   3. otherwise                    → needs_review
 * Failures of the pipeline go to `error` through fail().
 */

import {
    assertTransition,
    isTimeBased,
    type Asset,
    type AssetError,
    type AssetType,
    type HoldingStatus,
} from '@keepsake/archive-interface';
import type { HoldingArea } from '../blob/IBlobStore.js';
import type { DedupResult } from '../dedup/DedupResolver.js';

export interface RoutingInput {
    assetType: AssetType;
    dedup: DedupResult;
    transcriptionDeferred: boolean;
}

export interface RoutingDecision {
    status: HoldingStatus;
    area: HoldingArea;
}

/** Remote holding location of each routed status */
export const HOLDING_AREAS: Record<HoldingStatus, HoldingArea> = {
    needs_review: 'needs_review',
    possible_duplicate: 'possible_duplicate',
    transcribe_later: 'transcribe_later',
};

export function decideRoute(input: RoutingInput): RoutingDecision {
    let status: HoldingStatus = 'needs_review';
    if (input.dedup.duplicateOf !== null) {
        status = 'possible_duplicate';
    } else if (isTimeBased(input.assetType) && input.transcriptionDeferred) {
        status = 'transcribe_later';
    }
    return { status, area: HOLDING_AREAS[status] };
}

/**
 * Move a processing asset to its routed state
 * @throws Error when the asset is not in `processing`
 */
export function applyRoute(asset: Asset, decision: RoutingDecision, at: string = new Date().toISOString()): Asset {
    assertTransition(asset.status, decision.status);
    return { ...asset, status: decision.status, processedAt: at };
}

/**
 * Record an unrecoverable failure. The asset keeps its claim and is not retried.
 */
export function fail(asset: Asset, stage: string, message: string, at: string = new Date().toISOString()): Asset {
    assertTransition(asset.status, 'error');
    const error: AssetError = { stage, message, at };
    return { ...asset, status: 'error', errors: [...asset.errors, error], processedAt: at };
}
