import { promises as fs } from 'fs';
import path from 'path';
import { buildSidecar, type Asset, type Sidecar } from '@keepsake/archive-interface';
import type { IBlobStore } from '../blob/IBlobStore.js';

/**
 * Writes the sidecar snapshot of an asset locally and to the remote sidecar area.
 * A reprocessed asset overwrites its local snapshot.
 */
export class SidecarWriter {
    constructor(
        private readonly sidecarDir: string,
        private readonly blobStore: IBlobStore
    ) {}

    sidecarPath(assetId: string): string {
        return path.join(this.sidecarDir, `${assetId}.json`);
    }

    async write(
        asset: Asset,
        enrichmentErrors: Sidecar['enrichmentErrors'] = [],
        timings: Record<string, number> = {}
    ): Promise<Sidecar> {
        const sidecar = buildSidecar(asset, enrichmentErrors, timings);
        const json = JSON.stringify(sidecar, null, 2);

        await fs.mkdir(this.sidecarDir, { recursive: true });
        const target = this.sidecarPath(asset.assetId);
        const temp = `${target}.tmp`;
        await fs.writeFile(temp, json, 'utf8');
        await fs.rename(temp, target);

        await this.blobStore.upload(Buffer.from(json, 'utf8'), `${asset.assetId}.json`, 'sidecars', 'application/json');
        return sidecar;
    }
}
