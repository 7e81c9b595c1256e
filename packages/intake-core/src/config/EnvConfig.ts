import dotenv from 'dotenv';
dotenv.config();

interface EnvConfig {
    /** Intake HTTP server port (default 8080) */
    API_PORT: number;

    /** Intake HTTP server host (default '0.0.0.0') */
    API_HOST: string;

    /** Upload body limit for a single chunk request in bytes (default: chunk size + 1MB) */
    API_BODY_LIMIT: number;

    // ========================================================================
    // KV Storage Configuration
    // ========================================================================

    /** Redis URL of the metadata store (default 'redis://localhost:6379') */
    REDIS_URL: string;

    /** Prefix added to every Redis key (default 'keepsake:') */
    REDIS_PREFIX: string;

    // ========================================================================
    // Upload Configuration
    // ========================================================================

    /**
     * Contributor tokens and their inbox folder.
     * Format: "token:FolderName,token2:Folder2"
     */
    CONTRIBUTOR_TOKENS: Map<string, string>;

    /** Largest accepted file in MB (default 5000) */
    UPLOAD_MAX_SIZE_MB: number;

    /** Chunk size hint returned to clients in MB (default 8, keep it a multiple of 256KB) */
    UPLOAD_CHUNK_SIZE_MB: number;

    /** Timeout of one chunk PUT to the remote store (default 120000) */
    UPLOAD_CHUNK_TIMEOUT_MS: number;

    /** Upload sessions untouched for longer than this are reaped (default 24) */
    UPLOAD_SESSION_TTL_HOURS: number;

    /** Period of the session reaper, 0 to disable (default 3600000) */
    UPLOAD_REAP_INTERVAL_MS: number;

    /** Max files in a finished batch (default 1000) */
    BATCH_MAX_FILES: number;

    // ========================================================================
    // Worker Configuration
    // ========================================================================

    /** Local processing cache: staged downloads, disk space probe (default './data/cache') */
    CACHE_DIR: string;

    /** Local copies of the sidecar snapshots (default './data/sidecars') */
    SIDECAR_DIR: string;

    /** Worker logs, per-file error logs go to <LOGS_DIR>/errors (default './data/logs') */
    LOGS_DIR: string;

    /** Image thumbnails, {assetId}.jpg (default './data/metadata/thumbnails') */
    THUMBNAIL_DIR: string;

    /** First-frame posters of videos, {assetId}.jpg (default './data/metadata/video_posters') */
    POSTER_DIR: string;

    /** Minimum free space on CACHE_DIR before pulling new work, in GB (default 30) */
    MIN_FREE_DISK_GB: number;

    /** Maximum number of assets in 'processing' before pulling new work (default 5000) */
    MAX_BACKLOG_ITEMS: number;

    /** Max Hamming distance (out of 64 bits) for a near duplicate (default 6) */
    PHASH_DUPLICATE_THRESHOLD: number;

    /** Longer videos/audio skip transcription and go to transcribe_later, in minutes (default 8) */
    MAX_TRANSCRIBE_MINUTES: number;

    /** Period between worker cycles, 0 to run a single cycle (default 60000) */
    WORKER_INTERVAL_MS: number;

    /** Files processed at the same time (default 1) */
    WORKER_CONCURRENCY: number;

    /** Run the worker loop in this process (default true) */
    WORKER_ENABLED: boolean;

    // ========================================================================
    // Enrichment Configuration
    // ========================================================================

    /** Path to the enricher definitions (default './enrichers.yml', optional file) */
    ENRICHERS_CONFIG: string;

    /** Built-in EXIF reader for images (default true) */
    ENABLE_EXIF: boolean;

    /** ffprobe binary used to read durations (default 'ffprobe') */
    FFPROBE_PATH: string;

    /** ffmpeg binary used to grab video posters (default 'ffmpeg') */
    FFMPEG_PATH: string;

    // ========================================================================
    // Remote Store Configuration
    // ========================================================================

    /** Folder holding the archive layout in the remote store (mandatory) */
    DRIVE_ROOT_FOLDER_ID: string;

    /** Drive API base URL (default 'https://www.googleapis.com') */
    DRIVE_API_URL: string;
}

/**
 * Parse "token:Folder,token2:Folder2".
 * Entries without a folder use the token as folder name.
 */
export function parseContributorTokens(raw: string | undefined): Map<string, string> {
    const tokens = new Map<string, string>();
    if (!raw) {
        return tokens;
    }
    for (const entry of raw.split(',')) {
        const trimmed = entry.trim();
        if (!trimmed) {
            continue;
        }
        const separator = trimmed.indexOf(':');
        const token = separator === -1 ? trimmed : trimmed.slice(0, separator).trim();
        const folder = separator === -1 ? trimmed : trimmed.slice(separator + 1).trim();
        if (!token) {
            console.error(`CONTRIBUTOR_TOKENS entry '${trimmed}' has no token`);
            continue;
        }
        tokens.set(token, folder || token);
    }
    return tokens;
}

function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
    if (value === undefined || value === '') {
        return defaultValue;
    }
    return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

const chunkSizeMb = parseInt(process.env.UPLOAD_CHUNK_SIZE_MB || "8", 10);

export const config: EnvConfig = {
    API_PORT: parseInt(process.env.API_PORT || "8080", 10),//default 8080
    API_HOST: process.env.API_HOST || '0.0.0.0',
    API_BODY_LIMIT: parseInt(process.env.API_BODY_LIMIT || String((chunkSizeMb + 1) * 1024 * 1024), 10),

    // KV Storage Configuration
    REDIS_URL: process.env.REDIS_URL || 'redis://localhost:6379',
    REDIS_PREFIX: process.env.REDIS_PREFIX ?? 'keepsake:',

    // Upload Configuration
    CONTRIBUTOR_TOKENS: parseContributorTokens(process.env.CONTRIBUTOR_TOKENS),
    UPLOAD_MAX_SIZE_MB: parseInt(process.env.UPLOAD_MAX_SIZE_MB || "5000", 10),
    UPLOAD_CHUNK_SIZE_MB: chunkSizeMb,
    UPLOAD_CHUNK_TIMEOUT_MS: parseInt(process.env.UPLOAD_CHUNK_TIMEOUT_MS || "120000", 10),
    UPLOAD_SESSION_TTL_HOURS: parseInt(process.env.UPLOAD_SESSION_TTL_HOURS || "24", 10),
    UPLOAD_REAP_INTERVAL_MS: parseInt(process.env.UPLOAD_REAP_INTERVAL_MS || "3600000", 10),
    BATCH_MAX_FILES: parseInt(process.env.BATCH_MAX_FILES || "1000", 10),

    // Worker Configuration
    CACHE_DIR: process.env.CACHE_DIR || './data/cache',
    SIDECAR_DIR: process.env.SIDECAR_DIR || './data/sidecars',
    LOGS_DIR: process.env.LOGS_DIR || './data/logs',
    THUMBNAIL_DIR: process.env.THUMBNAIL_DIR || './data/metadata/thumbnails',
    POSTER_DIR: process.env.POSTER_DIR || './data/metadata/video_posters',
    MIN_FREE_DISK_GB: parseInt(process.env.MIN_FREE_DISK_GB || "30", 10),
    MAX_BACKLOG_ITEMS: parseInt(process.env.MAX_BACKLOG_ITEMS || "5000", 10),
    PHASH_DUPLICATE_THRESHOLD: parseInt(process.env.PHASH_DUPLICATE_THRESHOLD || "6", 10),
    MAX_TRANSCRIBE_MINUTES: parseInt(process.env.MAX_TRANSCRIBE_MINUTES || "8", 10),
    WORKER_INTERVAL_MS: parseInt(process.env.WORKER_INTERVAL_MS || "60000", 10),
    WORKER_CONCURRENCY: Math.max(1, parseInt(process.env.WORKER_CONCURRENCY || "1", 10)),
    WORKER_ENABLED: parseBoolean(process.env.WORKER_ENABLED, true),

    // Enrichment Configuration
    ENRICHERS_CONFIG: process.env.ENRICHERS_CONFIG || './enrichers.yml',
    ENABLE_EXIF: parseBoolean(process.env.ENABLE_EXIF, true),
    FFPROBE_PATH: process.env.FFPROBE_PATH || 'ffprobe',
    FFMPEG_PATH: process.env.FFMPEG_PATH || 'ffmpeg',

    // Remote Store Configuration
    DRIVE_ROOT_FOLDER_ID: process.env.DRIVE_ROOT_FOLDER_ID || '',
    DRIVE_API_URL: process.env.DRIVE_API_URL || 'https://www.googleapis.com',
};

if (process.env.TEST !== 'true') {
    if (config.CONTRIBUTOR_TOKENS.size === 0) {
        console.error('Invalid configuration: CONTRIBUTOR_TOKENS is empty, every upload will be refused');
    }
    if (!config.DRIVE_ROOT_FOLDER_ID) {
        console.error('Invalid configuration: DRIVE_ROOT_FOLDER_ID is required');
    }
}
