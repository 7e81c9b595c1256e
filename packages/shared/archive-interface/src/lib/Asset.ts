import type {AssetStatus} from "./AssetStatus.js";
import type {AssetType} from "./AssetType.js";
import type {BatchContext} from "./Manifest.js";

export type DuplicateMethod = 'exact' | 'near';

export interface DuplicateLink {
    assetId: string;
    duplicateOf: string;
    method: DuplicateMethod;
    /** Hamming distance, near matches only */
    distance?: number;
    createdAt: string;
}

export interface FaceDetection {
    bbox: [number, number, number, number];
    confidence: number;
    embeddingRef?: string;
}

export interface GpsPosition {
    lat: number;
    lon: number;
}

export type DecadeSource = 'contributor' | 'exif';

export interface DecadeEstimate {
    /** e.g. "1980s" */
    decade: string;
    confidence: number;
    source: DecadeSource;
}

export interface AssetError {
    stage: string;
    message: string;
    at: string;
}

/**
 * Outputs of the enrichment stage kept on the asset
 */
export interface AssetEnrichment {
    faces?: FaceDetection[];
    caption?: string;
    embeddingRef?: string;
    transcriptRef?: string;
    exifDate?: string;
    gps?: GpsPosition;
    transcriptionDeferred?: boolean;
}

export interface Asset {
    assetId: string;
    originFileId: string;
    contributorToken: string | null;
    batchId: string | null;
    context: BatchContext;
    originalFilename: string;
    mimeType: string;
    assetType: AssetType;
    sizeBytes: number | null;
    sha256: string | null;
    /** 64-bit perceptual hash in hex, images only */
    phash: string | null;
    status: AssetStatus;
    duplicateOf: string | null;
    duplicateMethod: DuplicateMethod | null;
    decade: DecadeEstimate | null;
    durationSeconds: number | null;
    /** Local thumbnail (images) or first-frame poster (videos) */
    thumbnailPath: string | null;
    enrichment: AssetEnrichment;
    errors: AssetError[];
    createdAt: string;
    updatedAt: string;
    processedAt: string | null;
}
