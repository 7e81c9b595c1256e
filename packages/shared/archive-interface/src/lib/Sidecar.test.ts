import {describe, it} from 'mocha';
import {expect} from 'chai';
import {buildSidecar, SIDECAR_SCHEMA_VERSION} from './Sidecar.js';
import type {Asset} from './Asset.js';

const asset: Asset = {
    assetId: 'asset-1',
    originFileId: 'origin-1',
    contributorToken: 'test-token',
    batchId: 'batch-1',
    context: {event: 'Reunion'},
    originalFilename: 'IMG_0001.JPG',
    mimeType: 'image/jpeg',
    assetType: 'image',
    sizeBytes: 1024,
    sha256: 'ab'.repeat(32),
    phash: '00ff00ff00ff00ff',
    status: 'needs_review',
    duplicateOf: null,
    duplicateMethod: null,
    decade: null,
    durationSeconds: null,
    thumbnailPath: '/data/thumbnails/asset-1.jpg',
    enrichment: {caption: 'two people on a beach'},
    errors: [],
    createdAt: '2024-01-01T00:00:00.000Z',
    updatedAt: '2024-01-01T00:00:01.000Z',
    processedAt: '2024-01-01T00:00:01.000Z',
};

describe('Sidecar', () => {
    it('should copy every asset field and the enrichment errors', () => {
        const sidecar = buildSidecar(asset, [{enricherId: 'faces', kind: 'faces', error: 'model crashed'}], {fingerprint: 12});
        expect(sidecar.schemaVersion).to.equal(SIDECAR_SCHEMA_VERSION);
        expect(sidecar.assetId).to.equal('asset-1');
        expect(sidecar.sha256).to.equal(asset.sha256);
        expect(sidecar.enrichment).to.deep.equal({caption: 'two people on a beach'});
        expect(sidecar.enrichmentErrors).to.deep.equal([{enricherId: 'faces', kind: 'faces', error: 'model crashed'}]);
        expect(sidecar.timings).to.deep.equal({fingerprint: 12});
        expect(sidecar.thumbnailPath).to.equal('/data/thumbnails/asset-1.jpg');
    });

    it('should not share the enrichment object with the asset', () => {
        const sidecar = buildSidecar(asset);
        sidecar.enrichment.caption = 'changed';
        expect(asset.enrichment.caption).to.equal('two people on a beach');
    });
});
