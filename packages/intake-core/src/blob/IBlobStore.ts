/**
 * Remote blob store - where uploads land and where assets are routed
 *
 * Areas mirror the archive folder layout. Contributor inboxes are the only
 * per-contributor area, addressed by folder name.
 */

export type HoldingArea = 'needs_review' | 'possible_duplicate' | 'transcribe_later';

export type BlobArea = 'manifests' | 'processing' | 'sidecars' | HoldingArea;

export interface RemoteFile {
    id: string;
    name: string;
    mimeType: string;
    sizeBytes: number | null;
    createdTime: string | null;
    /** Inbox folder the file was uploaded into */
    contributorFolder: string;
}

export interface ResumableSessionMeta {
    filename: string;
    mimeType: string;
    sizeBytes: number;
    contributorFolder: string;
}

/**
 * Outcome of sending bytes to a resumable session
 */
export type ChunkResult =
    | { complete: true; fileId: string }
    | { complete: false; received: number };

export interface ReceivedBytes {
    /** Bytes the remote store has committed */
    received: number;
    /** Set once the upload is finalized */
    fileId: string | null;
}

export interface IBlobStore {
    /**
     * Create the folder layout and the contributor inboxes
     */
    ensureLayout(contributorFolders: string[]): Promise<void>;

    /**
     * Upload a small document in one request
     * @returns remote file id
     */
    upload(bytes: Buffer, name: string, area: BlobArea, mimeType: string): Promise<string>;

    /**
     * Download a file to a local path
     */
    download(fileId: string, destPath: string): Promise<void>;

    readBytes(fileId: string): Promise<Buffer>;

    move(fileId: string, area: BlobArea): Promise<void>;

    /**
     * Files waiting in the contributor inboxes
     */
    listInbox(): Promise<RemoteFile[]>;

    /**
     * Open a resumable upload in the contributor's inbox
     * @returns opaque session handle
     */
    createResumableSession(meta: ResumableSessionMeta): Promise<string>;

    /**
     * Send `payload` starting at byte `start` of a `total` bytes upload.
     * An aborted `signal` cancels the request before the bytes are committed.
     */
    putChunk(handle: string, start: number, payload: Buffer, total: number, signal?: AbortSignal): Promise<ChunkResult>;

    /**
     * Status probe: zero-length request asking how many bytes were committed
     */
    queryReceivedBytes(handle: string, total: number, signal?: AbortSignal): Promise<ReceivedBytes>;
}
