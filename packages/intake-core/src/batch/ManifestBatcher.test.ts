import { expect } from 'chai';
import { createIntakeFixture, OTHER_TOKEN, TEST_TOKEN, type IntakeFixture } from '../testing/IntakeFixture.js';
import { expectRejection } from '../testing/assertions.js';
import { parseBatchContext, parseManifestFiles } from './ManifestBatcher.js';
import {
    BatchNotFoundError,
    InvalidTokenError,
    TooManyFilesError,
    ValidationError,
} from '../errors/IntakeErrors.js';

describe('ManifestBatcher', function() {
    let fixture: IntakeFixture;

    beforeEach(function() {
        fixture = createIntakeFixture({ maxFiles: 3 });
    });

    it('creates batches only for known contributors', async function() {
        const batch = await fixture.batcher.createBatch(TEST_TOKEN);
        expect(batch.files).to.deep.equal([]);
        expect(await fixture.batcher.getBatch(batch.batchId)).to.deep.equal(batch);
        await expectRejection(fixture.batcher.createBatch('nobody'), InvalidTokenError);
    });

    it('merges uploaded and declared files into one manifest', async function() {
        const batch = await fixture.batcher.createBatch(TEST_TOKEN);
        await fixture.batcher.appendFile(batch.batchId, { originFileId: 'f1', filename: 'a.jpg', sizeBytes: 100, mimeType: 'image/jpeg' });

        const result = await fixture.batcher.finishBatch(TEST_TOKEN, batch.batchId, [
            { originFileId: 'f1', filename: 'a.jpg', sizeBytes: 100 },
            { originFileId: 'f2', filename: 'b.jpg', sizeBytes: 50 },
        ], { decade: 1980, event: 'Wedding' });

        expect(result.ack).to.equal(true);
        expect(result.totalProcessedCount).to.equal(2);
        expect(result.manifest.files.map((file) => file.originFileId)).to.deep.equal(['f1', 'f2']);
        expect(result.manifest.totalBytes).to.equal(150);
        expect(result.manifest.contributorFolder).to.equal('Family');
        expect(result.manifest.context).to.deep.equal({ decade: 1980, event: 'Wedding' });
        expect(await fixture.batcher.pendingManifests()).to.deep.equal([batch.batchId]);

        const copies = fixture.blobStore.filesIn('manifests');
        expect(copies.map((file) => file.name)).to.deep.equal([`batch_${batch.batchId}.json`]);
        expect(JSON.parse(copies[0].bytes.toString('utf8')).totalFiles).to.equal(2);
    });

    it('acknowledges a repeated finish with the existing manifest', async function() {
        const batch = await fixture.batcher.createBatch(TEST_TOKEN);
        const first = await fixture.batcher.finishBatch(TEST_TOKEN, batch.batchId, [
            { originFileId: 'f1', filename: 'a.jpg', sizeBytes: 1 },
        ], {});
        const second = await fixture.batcher.finishBatch(TEST_TOKEN, batch.batchId, [
            { originFileId: 'f1', filename: 'a.jpg', sizeBytes: 1 },
            { originFileId: 'f9', filename: 'z.jpg', sizeBytes: 1 },
        ], { event: 'ignored' });

        expect(second.totalProcessedCount).to.equal(1);
        expect(second.manifest).to.deep.equal(first.manifest);
        expect(fixture.blobStore.filesIn('manifests')).to.have.length(1);
    });

    it('drops uploads completing after the batch is finished', async function() {
        const batch = await fixture.batcher.createBatch(TEST_TOKEN);
        await fixture.batcher.finishBatch(TEST_TOKEN, batch.batchId, [], {});
        await fixture.batcher.appendFile(batch.batchId, { originFileId: 'late', filename: 'late.jpg', sizeBytes: 1 });
        expect((await fixture.batcher.getManifest(batch.batchId))?.files).to.deep.equal([]);
    });

    it('refuses oversized, unknown and foreign batches', async function() {
        const batch = await fixture.batcher.createBatch(TEST_TOKEN);
        const files = ['a', 'b', 'c', 'd'].map((id) => ({ originFileId: id, filename: `${id}.jpg`, sizeBytes: 1 }));

        const tooMany = await expectRejection(
            fixture.batcher.finishBatch(TEST_TOKEN, batch.batchId, files, {}),
            TooManyFilesError
        );
        expect(tooMany.statusCode).to.equal(413);
        await expectRejection(fixture.batcher.finishBatch(TEST_TOKEN, 'no-such-batch', [], {}), BatchNotFoundError);
        await expectRejection(fixture.batcher.finishBatch(OTHER_TOKEN, batch.batchId, [], {}), InvalidTokenError);

        expect(await fixture.batcher.getManifest(batch.batchId)).to.equal(null);
        expect(await fixture.batcher.pendingManifests()).to.deep.equal([]);
    });

    it('keeps concurrent appends of one batch', async function() {
        const batch = await fixture.batcher.createBatch(TEST_TOKEN);
        await Promise.all(['x', 'y', 'z'].map((id) =>
            fixture.batcher.appendFile(batch.batchId, { originFileId: id, filename: `${id}.jpg`, sizeBytes: 1 })
        ));
        const stored = await fixture.batcher.getBatch(batch.batchId);
        expect(stored?.files.map((file) => file.originFileId)).to.deep.equal(['x', 'y', 'z']);
    });

    it('marks a manifest reconciled', async function() {
        const batch = await fixture.batcher.createBatch(TEST_TOKEN);
        await fixture.batcher.finishBatch(TEST_TOKEN, batch.batchId, [], {});
        await fixture.batcher.markReconciled(batch.batchId);
        expect(await fixture.batcher.pendingManifests()).to.deep.equal([]);
    });
});

describe('finish request parsing', function() {
    it('normalizes declared files', function() {
        expect(parseManifestFiles([{ originFileId: 'f1' }, { originFileId: 'f2', filename: 'b.jpg', sizeBytes: 12, mimeType: 'image/jpeg' }]))
            .to.deep.equal([
                { originFileId: 'f1', filename: 'f1', sizeBytes: 0 },
                { originFileId: 'f2', filename: 'b.jpg', sizeBytes: 12, mimeType: 'image/jpeg' },
            ]);
        expect(parseManifestFiles(undefined)).to.deep.equal([]);
        expect(() => parseManifestFiles([{ filename: 'x.jpg' }])).to.throw(ValidationError, 'files[0].originFileId is required');
        expect(() => parseManifestFiles('f1')).to.throw(ValidationError);
    });

    it('reads the context', function() {
        expect(parseBatchContext({ decade: '1970', event: 'Trip', notes: null })).to.deep.equal({ decade: 1970, event: 'Trip' });
        expect(parseBatchContext(undefined)).to.deep.equal({});
        expect(() => parseBatchContext({ decade: 'seventies' })).to.throw(ValidationError);
        expect(() => parseBatchContext({ event: 5 })).to.throw(ValidationError, 'context.event must be a string');
    });
});
