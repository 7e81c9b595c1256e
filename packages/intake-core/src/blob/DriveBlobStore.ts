/**
 * Drive v3 REST client implementing IBlobStore
 *
 * Resumable uploads follow the Drive protocol: a session URI is opened with
 * POST ?uploadType=resumable, bytes are PUT with Content-Range, and 308 means
 * "incomplete, committed up to the Range header".
 */

import axios, { type AxiosInstance, type AxiosResponse, type RawAxiosRequestHeaders } from 'axios';
import { GoogleAuth } from 'google-auth-library';
import { createWriteStream } from 'fs';
import { pipeline } from 'stream/promises';
import type { Readable } from 'stream';
import type { BlobArea, ChunkResult, IBlobStore, ReceivedBytes, RemoteFile, ResumableSessionMeta } from './IBlobStore.js';
import { DRIVE_LAYOUT, INBOX_FOLDER, isContributorFolder } from './DriveFolderSchema.js';

const FOLDER_MIME_TYPE = 'application/vnd.google-apps.folder';
const DRIVE_SCOPES = ['https://www.googleapis.com/auth/drive'];
const FILE_FIELDS = 'id,name,mimeType,size,createdTime';

export type AccessTokenProvider = () => Promise<string>;

export interface DriveBlobStoreOptions {
    /** Folder that holds the archive layout */
    rootFolderId: string;
    /** Default 'https://www.googleapis.com' */
    apiUrl?: string;
    /** Default: google-auth-library application default credentials */
    getAccessToken?: AccessTokenProvider;
    /** Timeout of metadata requests in ms (default 30000) */
    timeoutMs?: number;
}

interface DriveFile {
    id: string;
    name: string;
    mimeType?: string;
    size?: string;
    createdTime?: string;
    parents?: string[];
}

interface DriveFileList {
    files?: DriveFile[];
    nextPageToken?: string;
}

/**
 * Parse the Range header of a 308 answer ("bytes=0-1048575")
 * @returns number of committed bytes, 0 when the header is absent
 */
export function parseReceivedRange(header: unknown): number {
    if (typeof header !== 'string' || header === '') {
        return 0;
    }
    const match = /^bytes=0-(\d+)$/.exec(header.trim());
    if (!match) {
        throw new Error(`Unexpected Range header '${header}'`);
    }
    return parseInt(match[1], 10) + 1;
}

/**
 * multipart/related body of a single-request upload: JSON metadata then the bytes
 */
export function buildMultipartBody(boundary: string, metadata: object, bytes: Buffer, mimeType: string): Buffer {
    return Buffer.concat([
        Buffer.from(
            `--${boundary}\r\n` +
            'Content-Type: application/json; charset=UTF-8\r\n\r\n' +
            `${JSON.stringify(metadata)}\r\n` +
            `--${boundary}\r\n` +
            `Content-Type: ${mimeType}\r\n\r\n`
        ),
        bytes,
        Buffer.from(`\r\n--${boundary}--`),
    ]);
}

function escapeQuery(value: string): string {
    return value.replace(/\\/g, '\\\\').replace(/'/g, "\\'");
}

function googleAccessTokenProvider(): AccessTokenProvider {
    const auth = new GoogleAuth({ scopes: DRIVE_SCOPES });
    return async () => {
        const token = await auth.getAccessToken();
        if (!token) {
            throw new Error('Unable to obtain access token for the Drive API');
        }
        return token;
    };
}

export class DriveBlobStore implements IBlobStore {
    private readonly http: AxiosInstance;
    private readonly getAccessToken: AccessTokenProvider;
    private readonly rootFolderId: string;
    private readonly apiUrl: string;
    /** "HOLDING/Needs_Review" → folder id */
    private readonly folderIds = new Map<string, string>();

    constructor(options: DriveBlobStoreOptions) {
        this.rootFolderId = options.rootFolderId;
        this.apiUrl = (options.apiUrl || 'https://www.googleapis.com').replace(/\/$/, '');
        this.getAccessToken = options.getAccessToken || googleAccessTokenProvider();
        this.http = axios.create({ timeout: options.timeoutMs || 30000 });
    }

    private async authHeaders(extra: RawAxiosRequestHeaders = {}): Promise<RawAxiosRequestHeaders> {
        return { Authorization: `Bearer ${await this.getAccessToken()}`, ...extra };
    }

    // ========================================================================
    // Folders
    // ========================================================================

    private async findOrCreateFolder(name: string, parentId: string): Promise<string> {
        const existing = await this.listChildren(parentId, `name='${escapeQuery(name)}' and mimeType='${FOLDER_MIME_TYPE}'`);
        if (existing.length > 0) {
            return existing[0].id;
        }
        const response = await this.http.post<DriveFile>(
            `${this.apiUrl}/drive/v3/files`,
            { name, mimeType: FOLDER_MIME_TYPE, parents: [parentId] },
            { params: { fields: 'id', supportsAllDrives: true }, headers: await this.authHeaders() }
        );
        console.log(`[Drive] Created folder ${name} (${response.data.id})`);
        return response.data.id;
    }

    private async resolveFolder(path: string[]): Promise<string> {
        let parentId = this.rootFolderId;
        for (let depth = 1; depth <= path.length; depth++) {
            const key = path.slice(0, depth).join('/');
            const cached = this.folderIds.get(key);
            if (cached) {
                parentId = cached;
                continue;
            }
            parentId = await this.findOrCreateFolder(path[depth - 1], parentId);
            this.folderIds.set(key, parentId);
        }
        return parentId;
    }

    private async listChildren(parentId: string, filter?: string): Promise<DriveFile[]> {
        const files: DriveFile[] = [];
        let pageToken: string | undefined;
        const query = [`'${escapeQuery(parentId)}' in parents`, 'trashed=false'];
        if (filter) {
            query.push(filter);
        }
        do {
            const response: AxiosResponse<DriveFileList> = await this.http.get<DriveFileList>(`${this.apiUrl}/drive/v3/files`, {
                params: {
                    q: query.join(' and '),
                    fields: `nextPageToken,files(${FILE_FIELDS})`,
                    pageSize: 1000,
                    pageToken,
                    supportsAllDrives: true,
                    includeItemsFromAllDrives: true,
                },
                headers: await this.authHeaders(),
            });
            files.push(...(response.data.files || []));
            pageToken = response.data.nextPageToken;
        } while (pageToken);
        return files;
    }

    async ensureLayout(contributorFolders: string[]): Promise<void> {
        for (const path of Object.values(DRIVE_LAYOUT)) {
            await this.resolveFolder(path);
        }
        for (const folder of contributorFolders) {
            await this.resolveFolder([INBOX_FOLDER, folder]);
        }
        console.log(`[Drive] Layout ready (${contributorFolders.length} contributor inboxes)`);
    }

    // ========================================================================
    // Files
    // ========================================================================

    async upload(bytes: Buffer, name: string, area: BlobArea, mimeType: string): Promise<string> {
        const parentId = await this.resolveFolder(DRIVE_LAYOUT[area]);
        const boundary = `keepsake-${Date.now().toString(16)}`;
        const body = buildMultipartBody(boundary, { name, parents: [parentId] }, bytes, mimeType);
        const response = await this.http.post<DriveFile>(`${this.apiUrl}/upload/drive/v3/files`, body, {
            params: { uploadType: 'multipart', fields: 'id', supportsAllDrives: true },
            headers: await this.authHeaders({ 'Content-Type': `multipart/related; boundary=${boundary}` }),
        });
        return response.data.id;
    }

    async download(fileId: string, destPath: string): Promise<void> {
        const response = await this.http.get<Readable>(`${this.apiUrl}/drive/v3/files/${encodeURIComponent(fileId)}`, {
            params: { alt: 'media', supportsAllDrives: true },
            headers: await this.authHeaders(),
            responseType: 'stream',
            timeout: 0,
        });
        await pipeline(response.data, createWriteStream(destPath));
    }

    async readBytes(fileId: string): Promise<Buffer> {
        const response = await this.http.get<ArrayBuffer>(`${this.apiUrl}/drive/v3/files/${encodeURIComponent(fileId)}`, {
            params: { alt: 'media', supportsAllDrives: true },
            headers: await this.authHeaders(),
            responseType: 'arraybuffer',
        });
        return Buffer.from(response.data);
    }

    async move(fileId: string, area: BlobArea): Promise<void> {
        const targetId = await this.resolveFolder(DRIVE_LAYOUT[area]);
        const url = `${this.apiUrl}/drive/v3/files/${encodeURIComponent(fileId)}`;
        const current = await this.http.get<DriveFile>(url, {
            params: { fields: 'parents', supportsAllDrives: true },
            headers: await this.authHeaders(),
        });
        const previousParents = (current.data.parents || []).filter((id) => id !== targetId);
        await this.http.patch(url, {}, {
            params: {
                addParents: targetId,
                removeParents: previousParents.join(',') || undefined,
                supportsAllDrives: true,
            },
            headers: await this.authHeaders(),
        });
    }

    async listInbox(): Promise<RemoteFile[]> {
        const inboxId = await this.resolveFolder([INBOX_FOLDER]);
        const folders = await this.listChildren(inboxId, `mimeType='${FOLDER_MIME_TYPE}'`);
        const files: RemoteFile[] = [];
        for (const folder of folders) {
            if (!isContributorFolder(folder.name)) {
                continue;
            }
            this.folderIds.set(`${INBOX_FOLDER}/${folder.name}`, folder.id);
            const children = await this.listChildren(folder.id, `mimeType!='${FOLDER_MIME_TYPE}'`);
            for (const child of children) {
                files.push({
                    id: child.id,
                    name: child.name,
                    mimeType: child.mimeType || 'application/octet-stream',
                    sizeBytes: child.size !== undefined ? parseInt(child.size, 10) : null,
                    createdTime: child.createdTime || null,
                    contributorFolder: folder.name,
                });
            }
        }
        return files;
    }

    // ========================================================================
    // Resumable sessions
    // ========================================================================

    async createResumableSession(meta: ResumableSessionMeta): Promise<string> {
        const parentId = await this.resolveFolder([INBOX_FOLDER, meta.contributorFolder]);
        const response = await this.http.post(
            `${this.apiUrl}/upload/drive/v3/files`,
            { name: meta.filename, mimeType: meta.mimeType, parents: [parentId] },
            {
                params: { uploadType: 'resumable', supportsAllDrives: true },
                headers: await this.authHeaders({
                    'Content-Type': 'application/json; charset=UTF-8',
                    'X-Upload-Content-Type': meta.mimeType,
                    'X-Upload-Content-Length': String(meta.sizeBytes),
                }),
            }
        );
        const location: unknown = response.headers['location'];
        if (typeof location !== 'string' || location === '') {
            throw new Error('Drive did not return a resumable session URI');
        }
        return location;
    }

    private chunkResult(response: AxiosResponse<unknown>): ChunkResult {
        if (response.status === 308) {
            return { complete: false, received: parseReceivedRange(response.headers['range']) };
        }
        const data = response.data;
        if (typeof data === 'object' && data !== null && 'id' in data && typeof data.id === 'string') {
            return { complete: true, fileId: data.id };
        }
        throw new Error(`Drive finalized the upload without a file id (status ${response.status})`);
    }

    async putChunk(handle: string, start: number, payload: Buffer, total: number, signal?: AbortSignal): Promise<ChunkResult> {
        const end = start + payload.length - 1;
        const response = await this.http.put<unknown>(handle, payload, {
            signal,
            headers: await this.authHeaders({
                'Content-Length': String(payload.length),
                'Content-Range': `bytes ${start}-${end}/${total}`,
            }),
            timeout: 0,
            maxBodyLength: Infinity,
            validateStatus: (status) => status === 200 || status === 201 || status === 308,
        });
        return this.chunkResult(response);
    }

    async queryReceivedBytes(handle: string, total: number, signal?: AbortSignal): Promise<ReceivedBytes> {
        const response = await this.http.put<unknown>(handle, Buffer.alloc(0), {
            signal,
            headers: await this.authHeaders({
                'Content-Length': '0',
                'Content-Range': `bytes */${total}`,
            }),
            validateStatus: (status) => status === 200 || status === 201 || status === 308,
        });
        const result = this.chunkResult(response);
        return result.complete
            ? { received: total, fileId: result.fileId }
            : { received: result.received, fileId: null };
    }
}
