/**
 * Enrichment type definitions
 *
 * Enrichers are opaque models (faces, caption, embedding, transcription, metadata)
 * behind a load/run/unload contract. Loading is expensive, so the orchestrator
 * keeps at most one enricher loaded at a time.
 */

import type { AssetType, FaceDetection, GpsPosition } from '@keepsake/archive-interface';

export const ENRICHER_KINDS = ['faces', 'caption', 'embedding', 'transcript', 'metadata'] as const;

export type EnricherKind = typeof ENRICHER_KINDS[number];

export function isEnricherKind(value: unknown): value is EnricherKind {
    return typeof value === 'string' && (ENRICHER_KINDS as readonly string[]).includes(value);
}

export interface MediaMetadata {
    /** Capture date as found in the file ("1987:06:15 10:00:00") */
    exifDate: string | null;
    gps: GpsPosition | null;
    width?: number;
    height?: number;
}

export type EnricherOutput =
    | { kind: 'faces'; faces: FaceDetection[] }
    | { kind: 'caption'; caption: string }
    | { kind: 'embedding'; embeddingRef: string }
    | { kind: 'transcript'; transcriptRef: string }
    | { kind: 'metadata'; metadata: MediaMetadata };

export interface LoadableEnricher {
    readonly id: string;
    readonly kind: EnricherKind;
    /** Asset types this enricher runs on */
    readonly assetTypes: readonly AssetType[];
    load(): Promise<void>;
    run(localPath: string, assetType: AssetType): Promise<EnricherOutput>;
    unload(): Promise<void>;
}

export interface EnrichmentError {
    enricherId: string;
    kind: EnricherKind;
    error: string;
}

export interface EnrichmentResult {
    faces?: FaceDetection[];
    caption?: string;
    embeddingRef?: string;
    transcriptRef?: string;
    metadata?: MediaMetadata;
    /** The duration guard skipped transcription */
    transcriptionDeferred: boolean;
    errors: EnrichmentError[];
    /** Milliseconds per enricher id */
    timings: Record<string, number>;
}
