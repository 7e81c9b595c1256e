/**
 * Contributor-supplied context shared by every file of a batch
 */
export interface BatchContext {
    decade?: number | null;
    event?: string | null;
    notes?: string | null;
}

export interface ManifestFile {
    /** Remote store id of the uploaded blob */
    originFileId: string;
    filename: string;
    sizeBytes: number;
    mimeType?: string;
}

/**
 * Batch while uploads are still coming in
 */
export interface Batch {
    batchId: string;
    contributorToken: string;
    createdAt: string;
    /** Append-only until finished */
    files: ManifestFile[];
    finishedAt?: string;
}

/**
 * Immutable record written when a batch is finished
 */
export interface Manifest {
    batchId: string;
    contributorToken: string;
    contributorFolder: string;
    createdAt: string;
    finishedAt: string;
    context: BatchContext;
    files: ManifestFile[];
    totalFiles: number;
    totalBytes: number;
}

/**
 * Attribution of one origin file, derived from its manifest
 */
export interface FileAttribution {
    batchId: string;
    contributorToken: string;
    context: BatchContext;
}
