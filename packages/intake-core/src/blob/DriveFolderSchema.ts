import type { BlobArea } from './IBlobStore.js';

export const INBOX_FOLDER = 'INBOX_UPLOADS';

/**
 * Folder path of each area, relative to the archive root
 */
export const DRIVE_LAYOUT: Record<BlobArea, string[]> = {
    manifests: [INBOX_FOLDER, '_MANIFESTS'],
    processing: ['PROCESSING'],
    sidecars: ['METADATA', 'sidecars_json'],
    needs_review: ['HOLDING', 'Needs_Review'],
    possible_duplicate: ['HOLDING', 'Possible_Duplicates'],
    transcribe_later: ['HOLDING', 'Transcribe_Later'],
};

/** Inbox sub-folders starting with this are not contributor folders */
export const RESERVED_INBOX_PREFIX = '_';

export function isContributorFolder(name: string): boolean {
    return !name.startsWith(RESERVED_INBOX_PREFIX);
}
