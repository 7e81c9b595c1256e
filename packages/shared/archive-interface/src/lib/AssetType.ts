export type AssetType = 'image' | 'video' | 'audio';

export const mimeTypeMappings: Record<string, AssetType> = {
    // Image MIME types
    'image/jpeg': 'image',
    'image/png': 'image',
    'image/gif': 'image',
    'image/webp': 'image',
    'image/heic': 'image',
    'image/heif': 'image',
    'image/tiff': 'image',
    'image/bmp': 'image',
    // Video MIME types
    'video/mp4': 'video',
    'video/mpeg': 'video',
    'video/quicktime': 'video',
    'video/x-msvideo': 'video',
    'video/x-matroska': 'video',
    'video/webm': 'video',
    'video/3gpp': 'video',
    // Audio MIME types
    'audio/mpeg': 'audio',
    'audio/mp4': 'audio',
    'audio/wav': 'audio',
    'audio/x-wav': 'audio',
    'audio/flac': 'audio',
    'audio/ogg': 'audio',
    'audio/aac': 'audio',
};

/** MIME types that say nothing about the content */
export const GENERIC_MIME_TYPES = new Set(['', 'application/octet-stream', 'binary/octet-stream']);

/**
 * Asset type from a MIME type: explicit mapping first, then the top-level type.
 * Returns null for anything that is not photo, video or audio.
 */
export function assetTypeFromMime(mimeType: string | null | undefined): AssetType | null {
    if (!mimeType) {
        return null;
    }
    const mime = mimeType.split(';')[0].trim().toLowerCase();
    const mapped = mimeTypeMappings[mime];
    if (mapped) {
        return mapped;
    }
    if (mime.startsWith('image/')) return 'image';
    if (mime.startsWith('video/')) return 'video';
    if (mime.startsWith('audio/')) return 'audio';
    return null;
}

export function isTimeBased(assetType: AssetType): boolean {
    return assetType === 'video' || assetType === 'audio';
}
