/**
 * Asset lifecycle
 *
 * uploaded -> processing -> {needs_review, possible_duplicate, transcribe_later, error}
 *          -> {approved, archived, rejected}
 *
 * The last three are only reached through curation, outside of intake.
 */
export const ASSET_STATUSES = [
    'uploaded',
    'processing',
    'needs_review',
    'possible_duplicate',
    'transcribe_later',
    'error',
    'approved',
    'archived',
    'rejected',
] as const;

export type AssetStatus = typeof ASSET_STATUSES[number];

/** Statuses the routing stage may produce */
export type HoldingStatus = 'needs_review' | 'possible_duplicate' | 'transcribe_later';

const TRANSITIONS: Record<AssetStatus, readonly AssetStatus[]> = {
    uploaded: ['processing'],
    processing: ['needs_review', 'possible_duplicate', 'transcribe_later', 'error'],
    needs_review: ['approved', 'archived', 'rejected'],
    possible_duplicate: ['approved', 'archived', 'rejected'],
    transcribe_later: ['approved', 'archived', 'rejected'],
    error: ['approved', 'archived', 'rejected'],
    approved: [],
    archived: [],
    rejected: [],
};

export function isAssetStatus(value: string): value is AssetStatus {
    return (ASSET_STATUSES as readonly string[]).includes(value);
}

export function canTransition(from: AssetStatus, to: AssetStatus): boolean {
    return TRANSITIONS[from].includes(to);
}

export function assertTransition(from: AssetStatus, to: AssetStatus): void {
    if (!canTransition(from, to)) {
        throw new Error(`Invalid status transition ${from} -> ${to}`);
    }
}

export function isTerminalStatus(status: AssetStatus): boolean {
    return TRANSITIONS[status].length === 0;
}

// Spellings used by the curation dashboards
const STATUS_ALIASES: Record<string, AssetStatus> = {
    pending: 'needs_review',
    review: 'needs_review',
    possible_duplicates: 'possible_duplicate',
    duplicate: 'possible_duplicate',
    failed: 'error',
};

/**
 * Map a status spelling from the curation layer onto the closed enum.
 * Returns null for unknown values.
 */
export function normalizeStatus(value: string): AssetStatus | null {
    const key = value.trim().toLowerCase();
    if (isAssetStatus(key)) {
        return key;
    }
    return STATUS_ALIASES[key] ?? null;
}
