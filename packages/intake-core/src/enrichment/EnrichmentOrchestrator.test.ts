import { expect } from 'chai';
import type { AssetType } from '@keepsake/archive-interface';
import { EnrichmentOrchestrator } from './EnrichmentOrchestrator.js';
import type { EnricherKind, EnricherOutput, LoadableEnricher } from './types.js';

interface FakeBehaviour {
    failLoad?: boolean;
    failRun?: boolean;
    failUnload?: boolean;
    output?: EnricherOutput;
}

class FakeEnricher implements LoadableEnricher {
    constructor(
        readonly id: string,
        readonly kind: EnricherKind,
        readonly assetTypes: readonly AssetType[],
        private readonly calls: string[],
        private readonly behaviour: FakeBehaviour = {}
    ) {}

    async load(): Promise<void> {
        this.calls.push(`${this.id}:load`);
        if (this.behaviour.failLoad) {
            throw new Error('model weights missing');
        }
    }

    async run(): Promise<EnricherOutput> {
        this.calls.push(`${this.id}:run`);
        if (this.behaviour.failRun) {
            throw new Error('model crashed');
        }
        if (this.behaviour.output) {
            return this.behaviour.output;
        }
        switch (this.kind) {
            case 'caption':
                return { kind: 'caption', caption: `caption from ${this.id}` };
            case 'transcript':
                return { kind: 'transcript', transcriptRef: `${this.id}.json` };
            case 'embedding':
                return { kind: 'embedding', embeddingRef: `${this.id}.vec` };
            case 'faces':
                return { kind: 'faces', faces: [{ bbox: [0, 0, 10, 10], confidence: 0.9 }] };
            case 'metadata':
                return { kind: 'metadata', metadata: { exifDate: '1987:06:15 10:00:00', gps: null } };
        }
    }

    async unload(): Promise<void> {
        this.calls.push(`${this.id}:unload`);
        if (this.behaviour.failUnload) {
            throw new Error('unload hung');
        }
    }
}

describe('EnrichmentOrchestrator', function() {
    let calls: string[];
    let orchestrator: EnrichmentOrchestrator;

    beforeEach(function() {
        calls = [];
        orchestrator = new EnrichmentOrchestrator({ maxTranscribeSeconds: 480 });
    });

    it('brackets every run with load and unload, in registration order', async function() {
        orchestrator.register(new FakeEnricher('faces', 'faces', ['image'], calls));
        orchestrator.register(new FakeEnricher('caption', 'caption', ['image'], calls));

        const result = await orchestrator.enrich('/tmp/a.jpg', 'image', null);

        expect(calls).to.deep.equal([
            'faces:load', 'faces:run', 'faces:unload',
            'caption:load', 'caption:run', 'caption:unload',
        ]);
        expect(result.faces).to.deep.equal([{ bbox: [0, 0, 10, 10], confidence: 0.9 }]);
        expect(result.caption).to.equal('caption from caption');
        expect(result.errors).to.deep.equal([]);
        expect(Object.keys(result.timings)).to.deep.equal(['faces', 'caption']);
    });

    it('records failures and keeps going', async function() {
        orchestrator.register(new FakeEnricher('faces', 'faces', ['image'], calls, { failLoad: true }));
        orchestrator.register(new FakeEnricher('caption', 'caption', ['image'], calls, { failRun: true, failUnload: true }));
        orchestrator.register(new FakeEnricher('clip', 'embedding', ['image'], calls));

        const result = await orchestrator.enrich('/tmp/a.jpg', 'image', null);

        expect(calls).to.deep.equal([
            'faces:load', 'faces:unload',
            'caption:load', 'caption:run', 'caption:unload',
            'clip:load', 'clip:run', 'clip:unload',
        ]);
        expect(result.errors).to.deep.equal([
            { enricherId: 'faces', kind: 'faces', error: 'model weights missing' },
            { enricherId: 'caption', kind: 'caption', error: 'model crashed' },
            { enricherId: 'caption', kind: 'caption', error: 'unload: unload hung' },
        ]);
        expect(result.embeddingRef).to.equal('clip.vec');
        expect(result.caption).to.equal(undefined);
    });

    it('reports output of the wrong kind', async function() {
        orchestrator.register(new FakeEnricher('caption', 'caption', ['image'], calls, {
            output: { kind: 'embedding', embeddingRef: 'x.vec' },
        }));
        const result = await orchestrator.enrich('/tmp/a.jpg', 'image', null);
        expect(result.embeddingRef).to.equal(undefined);
        expect(result.errors).to.deep.equal([
            { enricherId: 'caption', kind: 'caption', error: 'returned embedding output, expected caption' },
        ]);
    });

    it('runs only the enrichers of the asset type', async function() {
        orchestrator.register(new FakeEnricher('faces', 'faces', ['image'], calls));
        orchestrator.register(new FakeEnricher('whisper', 'transcript', ['video', 'audio'], calls));

        const result = await orchestrator.enrich('/tmp/a.mp3', 'audio', 60);
        expect(calls).to.deep.equal(['whisper:load', 'whisper:run', 'whisper:unload']);
        expect(result.transcriptRef).to.equal('whisper.json');
        expect(result.transcriptionDeferred).to.equal(false);
    });

    it('defers transcription of long media without loading the model', async function() {
        orchestrator.register(new FakeEnricher('whisper', 'transcript', ['video'], calls));
        orchestrator.register(new FakeEnricher('scenes', 'caption', ['video'], calls));

        const result = await orchestrator.enrich('/tmp/long.mp4', 'video', 481);
        expect(result.transcriptionDeferred).to.equal(true);
        expect(calls).to.deep.equal(['scenes:load', 'scenes:run', 'scenes:unload']);
        expect(result.transcriptRef).to.equal(undefined);
    });

    it('treats an unknown or exact-ceiling duration as within the limit', function() {
        expect(orchestrator.isOverDurationCeiling('video', null)).to.equal(false);
        expect(orchestrator.isOverDurationCeiling('video', 480)).to.equal(false);
        expect(orchestrator.isOverDurationCeiling('image', 10000)).to.equal(false);
    });

    it('refuses two enrichers with the same id', function() {
        orchestrator.register(new FakeEnricher('faces', 'faces', ['image'], calls));
        expect(() => orchestrator.register(new FakeEnricher('faces', 'faces', ['image'], calls)))
            .to.throw("Enricher 'faces' is already registered");
    });
});
