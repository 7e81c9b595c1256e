import { expect } from 'chai';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { SIDECAR_SCHEMA_VERSION } from '@keepsake/archive-interface';
import { MemoryBlobStore } from '../testing/MemoryBlobStore.js';
import { makeAsset } from '../testing/assetFactory.js';
import { SidecarWriter } from './SidecarWriter.js';
import { ErrorLog } from './ErrorLog.js';

describe('SidecarWriter', function() {
    let dir: string;

    beforeEach(async function() {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'keepsake-sidecar-'));
    });

    afterEach(async function() {
        await fs.rm(dir, { recursive: true, force: true });
    });

    it('writes the snapshot locally and to the remote sidecar area', async function() {
        const blobStore = new MemoryBlobStore();
        const writer = new SidecarWriter(path.join(dir, 'sidecars'), blobStore);
        const asset = makeAsset({ assetId: 'asset-1', status: 'needs_review', enrichment: { caption: 'two kids' } });

        await writer.write(asset, [{ enricherId: 'faces', kind: 'faces', error: 'model crashed' }], { fingerprint: 12 });

        const local = JSON.parse(await fs.readFile(path.join(dir, 'sidecars', 'asset-1.json'), 'utf8'));
        expect(local.schemaVersion).to.equal(SIDECAR_SCHEMA_VERSION);
        expect(local.status).to.equal('needs_review');
        expect(local.enrichment).to.deep.equal({ caption: 'two kids' });
        expect(local.enrichmentErrors).to.deep.equal([{ enricherId: 'faces', kind: 'faces', error: 'model crashed' }]);
        expect(local.timings).to.deep.equal({ fingerprint: 12 });

        const remote = blobStore.filesIn('sidecars');
        expect(remote.map((file) => file.name)).to.deep.equal(['asset-1.json']);
    });

    it('overwrites the local snapshot on reprocessing', async function() {
        const writer = new SidecarWriter(dir, new MemoryBlobStore());
        const asset = makeAsset({ assetId: 'asset-2' });
        await writer.write(asset);
        await writer.write({ ...asset, status: 'error' });

        const local = JSON.parse(await fs.readFile(writer.sidecarPath('asset-2'), 'utf8'));
        expect(local.status).to.equal('error');
        expect(await fs.readdir(dir)).to.deep.equal(['asset-2.json']);
    });
});

describe('ErrorLog', function() {
    it('appends timestamped lines per origin file', async function() {
        const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'keepsake-logs-'));
        try {
            const log = new ErrorLog(dir);
            await log.append('file/1', 'download failed', new Date('2024-02-03T04:05:06.000Z'));
            await log.append('file/1', 'hash failed', new Date('2024-02-03T04:05:07.000Z'));

            const content = await fs.readFile(path.join(dir, 'errors', 'file_1.log'), 'utf8');
            expect(content).to.equal(
                '2024-02-03T04:05:06.000Z download failed\n2024-02-03T04:05:07.000Z hash failed\n'
            );
        } finally {
            await fs.rm(dir, { recursive: true, force: true });
        }
    });
});
