import {describe, it} from 'mocha';
import {expect} from 'chai';
import {assertTransition, canTransition, isAssetStatus, isTerminalStatus, normalizeStatus} from './AssetStatus.js';

describe('AssetStatus', () => {
    it('should allow the routing transitions out of processing', () => {
        expect(canTransition('uploaded', 'processing')).to.equal(true);
        expect(canTransition('processing', 'possible_duplicate')).to.equal(true);
        expect(canTransition('processing', 'error')).to.equal(true);
        expect(canTransition('needs_review', 'approved')).to.equal(true);
    });

    it('should refuse skipping processing or leaving a terminal state', () => {
        expect(canTransition('uploaded', 'needs_review')).to.equal(false);
        expect(canTransition('approved', 'needs_review')).to.equal(false);
        expect(() => assertTransition('rejected', 'processing')).to.throw('Invalid status transition rejected -> processing');
    });

    it('should mark only curation outcomes as terminal', () => {
        expect(isTerminalStatus('archived')).to.equal(true);
        expect(isTerminalStatus('transcribe_later')).to.equal(false);
    });

    it('should normalize curation spellings', () => {
        expect(normalizeStatus('pending')).to.equal('needs_review');
        expect(normalizeStatus('possible_duplicates')).to.equal('possible_duplicate');
        expect(normalizeStatus(' Approved ')).to.equal('approved');
        expect(normalizeStatus('whatever')).to.equal(null);
        expect(isAssetStatus('processing')).to.equal(true);
    });
});
