const MAX_NAME_LENGTH = 120;

/**
 * Make an uploaded filename safe to use as a single path segment.
 * Keeps the extension, drops directories and control characters.
 */
export function sanitizeFilename(filename: string): string {
    const base = filename.split(/[\\/]/).pop() ?? '';
    let clean = base
        .replace(/[\u0000-\u001f\u007f]/g, '')
        .replace(/[<>:"|?*]/g, '_')
        .replace(/\s+/g, ' ')
        .trim();
    clean = clean.replace(/^\.+/, '');
    if (clean.length > MAX_NAME_LENGTH) {
        const dot = clean.lastIndexOf('.');
        const ext = dot > 0 && clean.length - dot <= 10 ? clean.slice(dot) : '';
        clean = clean.slice(0, MAX_NAME_LENGTH - ext.length) + ext;
    }
    return clean || 'unnamed';
}
