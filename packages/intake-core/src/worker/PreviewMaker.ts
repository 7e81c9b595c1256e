import { promises as fs } from 'fs';
import path from 'path';
import ffmpeg from 'fluent-ffmpeg';
import sharp from 'sharp';
import type { AssetType } from '@keepsake/archive-interface';
import { errorMessage } from '../errors/IntakeErrors.js';

/** Longest side of an image thumbnail */
export const THUMBNAIL_MAX_SIZE = 800;

/**
 * Writes `{stem}.jpg` next to the other previews.
 * @returns the local path, null for audio or when nothing could be made
 */
export type PreviewMaker = (localPath: string, assetType: AssetType, stem: string) => Promise<string | null>;

export interface PreviewMakerOptions {
    thumbnailDir: string;
    posterDir: string;
    ffmpegPath: string;
}

export async function writeThumbnail(localPath: string, target: string): Promise<void> {
    await sharp(localPath)
        .resize(THUMBNAIL_MAX_SIZE, THUMBNAIL_MAX_SIZE, { fit: 'inside', withoutEnlargement: true })
        .jpeg()
        .toFile(target);
}

export function writePoster(localPath: string, target: string, ffmpegPath: string): Promise<void> {
    return new Promise((resolve, reject) => {
        ffmpeg(localPath)
            .setFfmpegPath(ffmpegPath)
            .outputOptions(['-frames:v 1', '-q:v 2'])
            .output(target)
            .on('end', () => resolve())
            .on('error', (err: unknown) => reject(err))
            .run();
    });
}

export function createPreviewMaker(options: PreviewMakerOptions): PreviewMaker {
    return async (localPath, assetType, stem) => {
        if (assetType === 'audio') {
            return null;
        }
        const dir = assetType === 'image' ? options.thumbnailDir : options.posterDir;
        const target = path.join(dir, `${stem}.jpg`);
        try {
            await fs.mkdir(dir, { recursive: true });
            if (assetType === 'image') {
                await writeThumbnail(localPath, target);
            } else {
                await writePoster(localPath, target, options.ffmpegPath);
            }
            return target;
        } catch (error) {
            console.warn(`[Worker] No ${assetType === 'image' ? 'thumbnail' : 'poster'} for ${stem}: ${errorMessage(error)}`);
            await fs.rm(target, { force: true });
            return null;
        }
    };
}
