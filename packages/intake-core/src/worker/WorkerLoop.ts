/**
 * Worker Loop - pulls new inbox files through the processing pipeline
 *
 * One cycle:
 *   reconcile manifests → list unclaimed inbox files → per file, gated by backpressure:
 *   classify → claim → processing → stage → fingerprint → probe → dedup → enrich
 *   → decade → preview → route → persist → move to holding → sidecar → cleanup
 *
 * Cycles never overlap. The origin claim makes a re-run after a crash safe; a claim
 * whose asset could not be written is released for the next cycle.
 */

import { randomUUID } from 'crypto';
import { promises as fs } from 'fs';
import path from 'path';
import PQueue from 'p-queue';
import {
    assetTypeFromMime,
    canTransition,
    estimateDecade,
    isTimeBased,
    type Asset,
    type AssetEnrichment,
    type AssetError,
    type BatchContext,
} from '@keepsake/archive-interface';
import type { IBlobStore, RemoteFile } from '../blob/IBlobStore.js';
import type { ContributorRegistry } from '../batch/ContributorRegistry.js';
import type { ManifestBatcher } from '../batch/ManifestBatcher.js';
import type { AssetRepository } from '../persistence/AssetRepository.js';
import type { SidecarWriter } from '../persistence/SidecarWriter.js';
import type { ErrorLog } from '../persistence/ErrorLog.js';
import type { FingerprintEngine } from '../fingerprint/FingerprintEngine.js';
import type { DedupResolver } from '../dedup/DedupResolver.js';
import type { EnrichmentOrchestrator } from '../enrichment/EnrichmentOrchestrator.js';
import type { EnrichmentError, EnrichmentResult } from '../enrichment/types.js';
import type { BackpressureGovernor } from '../backpressure/BackpressureGovernor.js';
import { applyRoute, decideRoute, fail } from '../routing/RoutingStateMachine.js';
import type { DurationProbe } from './MediaProbe.js';
import type { PreviewMaker } from './PreviewMaker.js';
import { isGenericMimeType, type MimeSniffer } from './MimeSniffer.js';
import { errorMessage } from '../errors/IntakeErrors.js';

export interface WorkerLoopDeps {
    blobStore: IBlobStore;
    repository: AssetRepository;
    batcher: Pick<ManifestBatcher, 'pendingManifests' | 'getManifest' | 'markReconciled'>;
    contributors: Pick<ContributorRegistry, 'tokenForFolder'>;
    fingerprints: FingerprintEngine;
    dedup: DedupResolver;
    enrichment: EnrichmentOrchestrator;
    backpressure: Pick<BackpressureGovernor, 'check'>;
    sidecars: SidecarWriter;
    errorLog: ErrorLog;
    probeDuration: DurationProbe;
    makePreview: PreviewMaker;
    sniffMimeType: MimeSniffer;
}

export interface WorkerLoopOptions {
    /** Local staging directory */
    cacheDir: string;
    /** Files processed at the same time */
    concurrency: number;
}

export interface CycleReport {
    startedAt: string;
    finishedAt: string | null;
    /** Unclaimed inbox files found */
    listed: number;
    reconciledManifests: number;
    processed: number;
    /** Claimed by another run in the meantime */
    skipped: number;
    ignored: number;
    failed: number;
    /** Set when backpressure stopped the cycle early */
    pausedReason: string | null;
}

export interface WorkerStats {
    running: boolean;
    cycles: number;
    processed: number;
    skipped: number;
    ignored: number;
    failed: number;
    currentCycle: CycleReport | null;
    lastCycle: CycleReport | null;
}

type FileOutcome = 'processed' | 'skipped' | 'ignored' | 'failed';

function toAssetEnrichment(result: EnrichmentResult): AssetEnrichment {
    const enrichment: AssetEnrichment = { transcriptionDeferred: result.transcriptionDeferred };
    if (result.faces) enrichment.faces = result.faces;
    if (result.caption !== undefined) enrichment.caption = result.caption;
    if (result.embeddingRef !== undefined) enrichment.embeddingRef = result.embeddingRef;
    if (result.transcriptRef !== undefined) enrichment.transcriptRef = result.transcriptRef;
    if (result.metadata?.exifDate) enrichment.exifDate = result.metadata.exifDate;
    if (result.metadata?.gps) enrichment.gps = result.metadata.gps;
    return enrichment;
}

function enrichmentErrorEntries(errors: EnrichmentError[], at: string): AssetError[] {
    return errors.map((error) => ({ stage: `enrich:${error.enricherId}`, message: error.error, at }));
}

export class WorkerLoop {
    private cycle: Promise<CycleReport> | null = null;
    private timer: NodeJS.Timeout | null = null;
    private stopped = true;
    private cycles = 0;
    private totals = { processed: 0, skipped: 0, ignored: 0, failed: 0 };
    private currentCycle: CycleReport | null = null;
    private lastCycle: CycleReport | null = null;

    constructor(
        private readonly deps: WorkerLoopDeps,
        private readonly options: WorkerLoopOptions
    ) {}

    /**
     * Run one cycle. A call during a running cycle joins it.
     */
    runOnce(): Promise<CycleReport> {
        if (!this.cycle) {
            this.cycle = this.runCycle().finally(() => {
                this.cycle = null;
            });
        }
        return this.cycle;
    }

    /**
     * Run a cycle now, then every `intervalMs` after the previous one ended
     */
    start(intervalMs: number): void {
        if (!this.stopped) {
            return;
        }
        this.stopped = false;
        console.log(`[Worker] Started, cycle every ${intervalMs}ms, concurrency ${this.options.concurrency}`);

        const tick = () => {
            this.runOnce()
                .catch((error) => console.error(`[Worker] Cycle failed: ${errorMessage(error)}`))
                .finally(() => {
                    if (!this.stopped) {
                        this.timer = setTimeout(tick, intervalMs);
                    }
                });
        };
        tick();
    }

    /**
     * Stop scheduling cycles and wait for the running one
     */
    async stop(): Promise<void> {
        this.stopped = true;
        if (this.timer) {
            clearTimeout(this.timer);
            this.timer = null;
        }
        if (this.cycle) {
            await this.cycle;
        }
        console.log('[Worker] Stopped');
    }

    getStats(): WorkerStats {
        return {
            running: this.cycle !== null,
            cycles: this.cycles,
            ...this.totals,
            currentCycle: this.currentCycle ? { ...this.currentCycle } : null,
            lastCycle: this.lastCycle ? { ...this.lastCycle } : null,
        };
    }

    private async runCycle(): Promise<CycleReport> {
        const report: CycleReport = {
            startedAt: new Date().toISOString(),
            finishedAt: null,
            listed: 0,
            reconciledManifests: 0,
            processed: 0,
            skipped: 0,
            ignored: 0,
            failed: 0,
            pausedReason: null,
        };
        this.currentCycle = report;

        try {
            report.reconciledManifests = await this.reconcileManifests();
            const files = await this.listUnprocessed();
            report.listed = files.length;

            await fs.mkdir(this.options.cacheDir, { recursive: true });
            const queue = new PQueue({ concurrency: this.options.concurrency, autoStart: true });
            const tasks: Promise<void>[] = [];

            for (const file of files) {
                // Only pull the next file once a slot is free, so the gate sees the current backlog
                await queue.onEmpty();
                const status = await this.deps.backpressure.check();
                if (!status.allowed) {
                    report.pausedReason = status.reason;
                    console.warn(`[Worker] Backpressure, ${files.length - tasks.length} files left for the next cycle`);
                    break;
                }
                tasks.push(queue.add(async () => {
                    const outcome = await this.processFile(file);
                    report[outcome]++;
                    this.totals[outcome]++;
                }));
            }
            await Promise.all(tasks);

            await this.deps.repository.setLastWorkerRun(new Date().toISOString());
        } finally {
            report.finishedAt = new Date().toISOString();
            this.cycles++;
            this.lastCycle = report;
            this.currentCycle = null;
        }

        console.log(
            `[Worker] Cycle done: ${report.listed} listed, ${report.processed} processed, ` +
            `${report.ignored} ignored, ${report.failed} failed, ${report.skipped} skipped`
        );
        return report;
    }

    /**
     * Write the attribution of every file of the finished, not yet reconciled manifests
     */
    private async reconcileManifests(): Promise<number> {
        let reconciled = 0;
        for (const batchId of await this.deps.batcher.pendingManifests()) {
            const manifest = await this.deps.batcher.getManifest(batchId);
            if (manifest) {
                for (const file of manifest.files) {
                    await this.deps.repository.saveAttribution(file.originFileId, {
                        batchId: manifest.batchId,
                        contributorToken: manifest.contributorToken,
                        context: manifest.context,
                    });
                }
            } else {
                console.warn(`[Worker] Pending marker of batch ${batchId} has no manifest`);
            }
            await this.deps.batcher.markReconciled(batchId);
            reconciled++;
        }
        return reconciled;
    }

    private async listUnprocessed(): Promise<RemoteFile[]> {
        const unprocessed: RemoteFile[] = [];
        for (const file of await this.deps.blobStore.listInbox()) {
            if (await this.deps.repository.getClaim(file.id)) {
                continue;
            }
            if (await this.deps.repository.isIgnored(file.id)) {
                continue;
            }
            unprocessed.push(file);
        }
        return unprocessed;
    }

    private stagingPath(file: RemoteFile): string {
        const extension = path.extname(file.name).replace(/[^A-Za-z0-9.]/g, '');
        return path.join(this.options.cacheDir, `${file.id.replace(/[^A-Za-z0-9_-]/g, '_')}${extension}`);
    }

    private async processFile(file: RemoteFile): Promise<FileOutcome> {
        const staging = this.stagingPath(file);
        try {
            return await this.runPipeline(file, staging);
        } catch (error) {
            // Failure before the asset existed (listing races, store outages)
            console.error(`[Worker] ${file.name} (${file.id}) failed before processing: ${errorMessage(error)}`);
            await this.deps.errorLog.append(file.id, `intake: ${errorMessage(error)}`);
            return 'failed';
        } finally {
            await fs.rm(staging, { force: true });
        }
    }

    private async runPipeline(file: RemoteFile, staging: string): Promise<FileOutcome> {
        const { blobStore, repository } = this.deps;

        // A generic declared type is decided from the content
        let mimeType = file.mimeType;
        let staged = false;
        if (isGenericMimeType(mimeType)) {
            await blobStore.download(file.id, staging);
            staged = true;
            mimeType = (await this.deps.sniffMimeType(staging)) ?? mimeType;
        }

        const assetType = assetTypeFromMime(mimeType);
        if (!assetType) {
            await repository.markIgnored(file.id, 'not a photo, video or audio file', mimeType);
            console.log(`[Worker] Ignored ${file.name} (${mimeType})`);
            return 'ignored';
        }

        const assetId = randomUUID();
        if (!(await repository.claimOrigin(file.id, assetId))) {
            return 'skipped';
        }

        let working: Asset;
        try {
            working = await this.createAsset(file, assetId, mimeType, assetType);
        } catch (error) {
            await repository.releaseClaim(file.id, assetId).catch((releaseError) => {
                console.error(`[Worker] Claim of ${file.id} stays held: ${errorMessage(releaseError)}`);
            });
            throw error;
        }
        const context = working.context;
        let persisted: Asset = working;
        let enrichmentErrors: EnrichmentError[] = [];
        let timings: Record<string, number> = {};
        let stage = 'move';

        try {
            await blobStore.move(file.id, 'processing');

            stage = 'download';
            if (!staged) {
                await blobStore.download(file.id, staging);
            }

            stage = 'fingerprint';
            const fingerprint = await this.deps.fingerprints.fingerprint(staging, mimeType);
            working = { ...working, sha256: fingerprint.sha256, phash: fingerprint.phash };
            if (fingerprint.phashError) {
                working.errors = [...working.errors, { stage: 'phash', message: fingerprint.phashError, at: new Date().toISOString() }];
            }

            stage = 'probe';
            if (isTimeBased(assetType)) {
                working.durationSeconds = await this.deps.probeDuration(staging);
            }

            stage = 'dedup';
            const dedup = await this.deps.dedup.resolve(working);
            working = { ...working, duplicateOf: dedup.duplicateOf, duplicateMethod: dedup.method };

            stage = 'enrich';
            const enrichment = await this.deps.enrichment.enrich(staging, assetType, working.durationSeconds);
            enrichmentErrors = enrichment.errors;
            timings = enrichment.timings;
            working = {
                ...working,
                enrichment: toAssetEnrichment(enrichment),
                decade: estimateDecade(context, enrichment.metadata?.exifDate),
                errors: [...working.errors, ...enrichmentErrorEntries(enrichment.errors, new Date().toISOString())],
            };

            stage = 'preview';
            working.thumbnailPath = await this.deps.makePreview(staging, assetType, assetId);

            stage = 'route';
            const decision = decideRoute({ assetType, dedup, transcriptionDeferred: enrichment.transcriptionDeferred });
            const routed = applyRoute(working, decision);

            stage = 'persist';
            persisted = await repository.upsertAsset(routed);
            await repository.registerFingerprint(persisted);
            if (dedup.duplicateOf !== null && dedup.method !== null) {
                const link = {
                    assetId,
                    duplicateOf: dedup.duplicateOf,
                    method: dedup.method,
                    createdAt: new Date().toISOString(),
                    ...(dedup.distance !== undefined ? { distance: dedup.distance } : {}),
                };
                await repository.recordDuplicate(link);
            }

            stage = 'holding';
            await blobStore.move(file.id, decision.area);

            stage = 'sidecar';
            await this.deps.sidecars.write(persisted, enrichmentErrors, timings);

            console.log(
                `[Worker] ${file.name} → ${persisted.status}` +
                (dedup.duplicateOf ? ` (${dedup.method} duplicate of ${dedup.duplicateOf})` : '') +
                (enrichment.errors.length > 0 ? `, ${enrichment.errors.length} enrichment errors` : '')
            );
            return 'processed';
        } catch (error) {
            await this.recordFailure(persisted, working, stage, error, enrichmentErrors, timings);
            return 'failed';
        }
    }

    /**
     * First write of the asset, in `processing`. Files that came without a manifest
     * are attributed to the owner of their inbox folder.
     */
    private async createAsset(file: RemoteFile, assetId: string, mimeType: string, assetType: Asset['assetType']): Promise<Asset> {
        const attribution = await this.deps.repository.getAttribution(file.id);
        const context: BatchContext = attribution?.context ?? {};
        const now = new Date().toISOString();
        return this.deps.repository.upsertAsset({
            assetId,
            originFileId: file.id,
            contributorToken: attribution?.contributorToken ?? this.deps.contributors.tokenForFolder(file.contributorFolder),
            batchId: attribution?.batchId ?? null,
            context,
            originalFilename: file.name,
            mimeType,
            assetType,
            sizeBytes: file.sizeBytes,
            sha256: null,
            phash: null,
            status: 'processing',
            duplicateOf: null,
            duplicateMethod: null,
            decade: null,
            durationSeconds: null,
            thumbnailPath: null,
            enrichment: {},
            errors: [],
            createdAt: now,
            updatedAt: now,
            processedAt: null,
        });
    }

    /**
     * A processing asset goes to `error`. One that was already routed keeps its
     * status and only gains the error entry. The sidecar follows the stored asset.
     */
    private async recordFailure(
        persisted: Asset,
        working: Asset,
        stage: string,
        error: unknown,
        enrichmentErrors: EnrichmentError[],
        timings: Record<string, number>
    ): Promise<void> {
        const message = errorMessage(error);
        console.error(`[Worker] ${working.originalFilename} (${working.originFileId}) failed at ${stage}: ${message}`);

        const failed = canTransition(persisted.status, 'error')
            ? fail(working, stage, message)
            : { ...persisted, errors: [...persisted.errors, { stage, message, at: new Date().toISOString() }] };
        const stored = await this.deps.repository.upsertAsset(failed);
        await this.deps.errorLog.append(working.originFileId, `${stage}: ${message}`);
        try {
            await this.deps.sidecars.write(stored, enrichmentErrors, timings);
        } catch (sidecarError) {
            console.error(`[Worker] Sidecar of ${stored.assetId} not written: ${errorMessage(sidecarError)}`);
            await this.deps.errorLog.append(working.originFileId, `sidecar: ${errorMessage(sidecarError)}`);
        }
    }
}
