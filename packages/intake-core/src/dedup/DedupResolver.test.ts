import { expect } from 'chai';
import { MemoryKVClient } from '../testing/MemoryKVClient.js';
import { makeAsset } from '../testing/assetFactory.js';
import { AssetRepository } from '../persistence/AssetRepository.js';
import { DedupResolver, nearestCandidate } from './DedupResolver.js';

const ZERO = '0000000000000000';

describe('DedupResolver', function() {
    let repository: AssetRepository;
    let resolver: DedupResolver;

    beforeEach(function() {
        repository = new AssetRepository(new MemoryKVClient());
        resolver = new DedupResolver(repository, { threshold: 6 });
    });

    it('resolves identical digests to the first persisted asset', async function() {
        const original = makeAsset({ assetId: 'asset-a', sha256: 'digest-1', phash: ZERO });
        await repository.registerFingerprint(original);
        const copyOfCopy = makeAsset({ assetId: 'asset-c', sha256: 'digest-1', duplicateOf: 'asset-a', duplicateMethod: 'exact' });
        await repository.registerFingerprint(copyOfCopy);

        const result = await resolver.resolve(makeAsset({ assetId: 'asset-b', sha256: 'digest-1', phash: 'ffffffffffffffff' }));
        expect(result).to.deep.equal({ duplicateOf: 'asset-a', method: 'exact' });
        expect(await resolver.resolve(original)).to.deep.equal({ duplicateOf: null, method: null });
    });

    it('matches near duplicates up to the threshold', async function() {
        await repository.registerFingerprint(makeAsset({ assetId: 'six-bits', sha256: 's1', phash: '000000000000003f' }));
        const near = await resolver.resolve(makeAsset({ assetId: 'new', sha256: 'n1', phash: ZERO }));
        expect(near).to.deep.equal({ duplicateOf: 'six-bits', method: 'near', distance: 6 });

        const strict = new DedupResolver(repository, { threshold: 5 });
        expect(await strict.resolve(makeAsset({ assetId: 'new', sha256: 'n1', phash: ZERO })))
            .to.deep.equal({ duplicateOf: null, method: null });
    });

    it('ignores phashes of videos and duplicates', async function() {
        await repository.registerFingerprint(makeAsset({ assetId: 'dup', sha256: 's1', phash: ZERO, duplicateOf: 'x', duplicateMethod: 'near' }));
        expect(await resolver.resolve(makeAsset({ assetId: 'new', sha256: 'n1', phash: ZERO })))
            .to.deep.equal({ duplicateOf: null, method: null });

        await repository.registerFingerprint(makeAsset({ assetId: 'canonical', sha256: 's2', phash: ZERO }));
        expect(await resolver.resolve(makeAsset({ assetId: 'clip', sha256: 'n2', phash: ZERO, assetType: 'video' })))
            .to.deep.equal({ duplicateOf: null, method: null });
    });
});

describe('nearestCandidate', function() {
    it('prefers the smallest distance, then the earliest asset, then the smallest id', function() {
        const candidates = [
            { assetId: 'far', phash: '000000000000000f', createdAt: '2020-01-01T00:00:00.000Z' },
            { assetId: 'b-late', phash: '0000000000000003', createdAt: '2022-01-01T00:00:00.000Z' },
            { assetId: 'c-early', phash: '0000000000000005', createdAt: '2021-01-01T00:00:00.000Z' },
            { assetId: 'a-early', phash: '0000000000000006', createdAt: '2021-01-01T00:00:00.000Z' },
            { assetId: 'broken', phash: 'not-a-hash', createdAt: '2000-01-01T00:00:00.000Z' },
        ];
        const match = nearestCandidate(ZERO, candidates, 6);
        expect(match?.candidate.assetId).to.equal('a-early');
        expect(match?.distance).to.equal(2);
        expect(nearestCandidate(ZERO, candidates, 1)).to.equal(null);
    });
});
