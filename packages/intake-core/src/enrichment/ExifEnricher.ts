import sharp from 'sharp';
import type { AssetType } from '@keepsake/archive-interface';
import type { EnricherOutput, LoadableEnricher } from './types.js';
import { readExif } from './ExifReader.js';

/**
 * Built-in metadata enricher: capture date, GPS and dimensions of images
 */
export class ExifEnricher implements LoadableEnricher {
    readonly id = 'exif';
    readonly kind = 'metadata';
    readonly assetTypes: readonly AssetType[] = ['image'];

    async load(): Promise<void> {}

    async run(localPath: string): Promise<EnricherOutput> {
        const meta = await sharp(localPath).metadata();
        const tags = meta.exif ? readExif(meta.exif) : null;
        return {
            kind: 'metadata',
            metadata: {
                exifDate: tags?.dateTimeOriginal ?? tags?.dateTime ?? null,
                gps: tags?.gps ?? null,
                width: meta.width,
                height: meta.height,
            },
        };
    }

    async unload(): Promise<void> {}
}
