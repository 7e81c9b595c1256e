import { fileTypeFromFile } from 'file-type';
import { GENERIC_MIME_TYPES } from '@keepsake/archive-interface';

/** MIME type from the file content, null when unrecognized */
export type MimeSniffer = (localPath: string) => Promise<string | null>;

export const fileTypeSniffer: MimeSniffer = async (localPath) => {
    const result = await fileTypeFromFile(localPath);
    return result?.mime ?? null;
};

export function isGenericMimeType(mimeType: string): boolean {
    return GENERIC_MIME_TYPES.has(mimeType.split(';')[0].trim().toLowerCase());
}
