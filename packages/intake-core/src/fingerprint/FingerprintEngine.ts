import { computeFileSha256, computePhash } from '@keepsake/media-hash';
import { assetTypeFromMime } from '@keepsake/archive-interface';
import { errorMessage } from '../errors/IntakeErrors.js';

export interface Fingerprint {
    sha256: string;
    /** 16 hex chars, null for non-images or undecodable images */
    phash: string | null;
    /** Why the phash is missing on an image */
    phashError: string | null;
}

/**
 * sha256 of every file, phash of images.
 * A digest failure propagates, a phash failure does not.
 */
export class FingerprintEngine {
    async fingerprint(localPath: string, mimeType: string): Promise<Fingerprint> {
        const sha256 = await computeFileSha256(localPath);
        if (assetTypeFromMime(mimeType) !== 'image') {
            return { sha256, phash: null, phashError: null };
        }
        try {
            return { sha256, phash: await computePhash(localPath), phashError: null };
        } catch (error) {
            console.warn(`[Worker] phash of ${localPath} failed: ${errorMessage(error)}`);
            return { sha256, phash: null, phashError: errorMessage(error) };
        }
    }
}
