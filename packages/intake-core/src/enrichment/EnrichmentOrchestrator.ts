/**
 * Enrichment Orchestrator - runs the registered enrichers one after the other
 *
 * Every run is bracketed: load() right before, unload() right after, even when
 * load() or run() throws. Only one model is resident at a time.
 */

import { isTimeBased, type AssetType } from '@keepsake/archive-interface';
import { errorMessage } from '../errors/IntakeErrors.js';
import type { EnricherOutput, EnrichmentError, EnrichmentResult, LoadableEnricher } from './types.js';

export interface EnrichmentOrchestratorOptions {
    /** Time-based media longer than this skip transcription */
    maxTranscribeSeconds: number;
}

export class EnrichmentOrchestrator {
    private readonly enrichers: LoadableEnricher[] = [];

    constructor(private readonly options: EnrichmentOrchestratorOptions) {}

    register(enricher: LoadableEnricher): void {
        if (this.enrichers.some((existing) => existing.id === enricher.id)) {
            throw new Error(`Enricher '${enricher.id}' is already registered`);
        }
        this.enrichers.push(enricher);
        console.log(`[Enrichment] Registered ${enricher.id} (${enricher.kind}: ${enricher.assetTypes.join(', ')})`);
    }

    /**
     * Over the ceiling means deferred. An unknown duration is not over the ceiling.
     */
    isOverDurationCeiling(assetType: AssetType, durationSeconds: number | null): boolean {
        return isTimeBased(assetType)
            && durationSeconds !== null
            && durationSeconds > this.options.maxTranscribeSeconds;
    }

    async enrich(localPath: string, assetType: AssetType, durationSeconds: number | null): Promise<EnrichmentResult> {
        const transcriptionDeferred = this.isOverDurationCeiling(assetType, durationSeconds);
        const result: EnrichmentResult = { transcriptionDeferred, errors: [], timings: {} };

        for (const enricher of this.enrichers) {
            if (!enricher.assetTypes.includes(assetType)) {
                continue;
            }
            if (enricher.kind === 'transcript' && transcriptionDeferred) {
                console.log(`[Enrichment] ${enricher.id} skipped: ${durationSeconds}s exceeds ${this.options.maxTranscribeSeconds}s`);
                continue;
            }

            const started = Date.now();
            const output = await this.runBracketed(enricher, localPath, assetType, result.errors);
            result.timings[enricher.id] = Date.now() - started;
            if (output) {
                this.apply(result, enricher, output);
            }
        }
        return result;
    }

    private async runBracketed(
        enricher: LoadableEnricher,
        localPath: string,
        assetType: AssetType,
        errors: EnrichmentError[]
    ): Promise<EnricherOutput | null> {
        let output: EnricherOutput | null = null;
        try {
            await enricher.load();
            output = await enricher.run(localPath, assetType);
        } catch (error) {
            console.warn(`[Enrichment] ${enricher.id} failed on ${localPath}: ${errorMessage(error)}`);
            errors.push({ enricherId: enricher.id, kind: enricher.kind, error: errorMessage(error) });
        } finally {
            try {
                await enricher.unload();
            } catch (error) {
                console.warn(`[Enrichment] ${enricher.id} unload failed: ${errorMessage(error)}`);
                errors.push({ enricherId: enricher.id, kind: enricher.kind, error: `unload: ${errorMessage(error)}` });
            }
        }
        return output;
    }

    private apply(result: EnrichmentResult, enricher: LoadableEnricher, output: EnricherOutput): void {
        if (output.kind !== enricher.kind) {
            result.errors.push({
                enricherId: enricher.id,
                kind: enricher.kind,
                error: `returned ${output.kind} output, expected ${enricher.kind}`,
            });
            return;
        }
        switch (output.kind) {
            case 'faces':
                result.faces = [...(result.faces ?? []), ...output.faces];
                break;
            case 'caption':
                result.caption = output.caption;
                break;
            case 'embedding':
                result.embeddingRef = output.embeddingRef;
                break;
            case 'transcript':
                result.transcriptRef = output.transcriptRef;
                break;
            case 'metadata':
                result.metadata = {
                    ...output.metadata,
                    exifDate: output.metadata.exifDate ?? result.metadata?.exifDate ?? null,
                    gps: output.metadata.gps ?? result.metadata?.gps ?? null,
                };
                break;
        }
    }
}
