import {config} from "./config/EnvConfig.js";

import {ListenerCleaner} from "@keepsake/async-utils";
import {RedisKVClient} from "./kv/RedisClient.js";
import {DriveBlobStore} from "./blob/DriveBlobStore.js";
import {ContributorRegistry} from "./batch/ContributorRegistry.js";
import {ManifestBatcher} from "./batch/ManifestBatcher.js";
import {UploadSessionStore} from "./upload/UploadSessionStore.js";
import {UploadSessionManager} from "./upload/UploadSessionManager.js";
import {AssetRepository} from "./persistence/AssetRepository.js";
import {SidecarWriter} from "./persistence/SidecarWriter.js";
import {ErrorLog} from "./persistence/ErrorLog.js";
import {FingerprintEngine} from "./fingerprint/FingerprintEngine.js";
import {DedupResolver} from "./dedup/DedupResolver.js";
import {EnrichmentOrchestrator} from "./enrichment/EnrichmentOrchestrator.js";
import {ExifEnricher} from "./enrichment/ExifEnricher.js";
import {HttpEnricher} from "./enrichment/HttpEnricher.js";
import {loadConfig} from "./enrichment/EnricherConfig.js";
import {BackpressureGovernor} from "./backpressure/BackpressureGovernor.js";
import {WorkerLoop} from "./worker/WorkerLoop.js";
import {createFfprobeDurationProbe} from "./worker/MediaProbe.js";
import {createPreviewMaker} from "./worker/PreviewMaker.js";
import {fileTypeSniffer} from "./worker/MimeSniffer.js";
import {IntakeAPIServer} from "./api/IntakeAPIServer.js";
import {errorMessage} from "./errors/IntakeErrors.js";

const MB = 1024 * 1024;
const GB = 1024 * MB;

console.log(`BUILD_VERSION: ${process.env.BUILD_VERSION || 'dev'}`);
console.log({
    ...config,
    CONTRIBUTOR_TOKENS: `${config.CONTRIBUTOR_TOKENS.size} tokens`,
});

// Global error handlers - log, keep serving
process.on('uncaughtException', (error: Error) => {
    console.error('[CRITICAL] Uncaught Exception:', error);
});

process.on('unhandledRejection', (reason: unknown) => {
    console.error('[CRITICAL] Unhandled Rejection:', reason);
});

const cleaner = new ListenerCleaner();

async function main(): Promise<void> {
    const kvClient = new RedisKVClient({ url: config.REDIS_URL, prefix: config.REDIS_PREFIX });
    await kvClient.connect();
    cleaner.add(() => kvClient.close());

    const blobStore = new DriveBlobStore({
        rootFolderId: config.DRIVE_ROOT_FOLDER_ID,
        apiUrl: config.DRIVE_API_URL,
    });
    const contributors = new ContributorRegistry(config.CONTRIBUTOR_TOKENS);
    await blobStore.ensureLayout(contributors.folders());
    console.log(`[Startup] Remote layout ready for ${contributors.folders().length} contributor folders`);

    const batcher = new ManifestBatcher(kvClient, blobStore, contributors, { maxFiles: config.BATCH_MAX_FILES });
    const uploads = new UploadSessionManager(new UploadSessionStore(kvClient), blobStore, contributors, batcher, {
        maxSizeBytes: config.UPLOAD_MAX_SIZE_MB * MB,
        chunkSizeBytes: config.UPLOAD_CHUNK_SIZE_MB * MB,
        chunkTimeoutMs: config.UPLOAD_CHUNK_TIMEOUT_MS,
        sessionTtlMs: config.UPLOAD_SESSION_TTL_HOURS * 60 * 60 * 1000,
    });
    const repository = new AssetRepository(kvClient);
    const governor = new BackpressureGovernor(repository, {
        cacheDir: config.CACHE_DIR,
        minFreeDiskBytes: config.MIN_FREE_DISK_GB * GB,
        maxBacklog: config.MAX_BACKLOG_ITEMS,
    });

    if (config.UPLOAD_REAP_INTERVAL_MS > 0) {
        const reaper = setInterval(() => {
            uploads.reapExpired()
                .then((count) => {
                    if (count > 0) {
                        console.log(`[Upload] Reaped ${count} expired sessions`);
                    }
                })
                .catch((error) => console.error(`[Upload] Session reaper failed: ${errorMessage(error)}`));
        }, config.UPLOAD_REAP_INTERVAL_MS);
        cleaner.add(() => clearInterval(reaper));
    }

    let worker: WorkerLoop | undefined;
    if (config.WORKER_ENABLED) {
        const enrichment = new EnrichmentOrchestrator({ maxTranscribeSeconds: config.MAX_TRANSCRIBE_MINUTES * 60 });
        if (config.ENABLE_EXIF) {
            enrichment.register(new ExifEnricher());
        }
        const enrichers = await loadConfig(config.ENRICHERS_CONFIG);
        for (const definition of enrichers.enrichers) {
            enrichment.register(new HttpEnricher(definition));
        }

        worker = new WorkerLoop({
            blobStore,
            repository,
            batcher,
            contributors,
            fingerprints: new FingerprintEngine(),
            dedup: new DedupResolver(repository, { threshold: config.PHASH_DUPLICATE_THRESHOLD }),
            enrichment,
            backpressure: governor,
            sidecars: new SidecarWriter(config.SIDECAR_DIR, blobStore),
            errorLog: new ErrorLog(config.LOGS_DIR),
            probeDuration: createFfprobeDurationProbe(config.FFPROBE_PATH),
            makePreview: createPreviewMaker({
                thumbnailDir: config.THUMBNAIL_DIR,
                posterDir: config.POSTER_DIR,
                ffmpegPath: config.FFMPEG_PATH,
            }),
            sniffMimeType: fileTypeSniffer,
        }, { cacheDir: config.CACHE_DIR, concurrency: config.WORKER_CONCURRENCY });
    }

    const apiServer = new IntakeAPIServer({
        uploads,
        batcher,
        kvClient,
        repository,
        backpressure: governor,
        worker,
    }, {
        port: config.API_PORT,
        host: config.API_HOST,
        enableCors: true,
        bodyLimit: config.API_BODY_LIMIT,
    });
    await apiServer.start();
    cleaner.add(() => apiServer.stop());

    if (worker) {
        const running = worker;
        cleaner.add(() => running.stop());
        if (config.WORKER_INTERVAL_MS > 0) {
            running.start(config.WORKER_INTERVAL_MS);
        } else {
            const report = await running.runOnce();
            console.log(`[Worker] Single cycle done: ${report.processed} processed, ${report.failed} failed`);
        }
    }
}

// Graceful shutdown
let shuttingDown = false;
async function shutdown(signal: string): Promise<void> {
    if (shuttingDown) {
        return;
    }
    shuttingDown = true;
    console.log(`\n[Shutdown] ${signal} received, shutting down...`);
    try {
        await cleaner.cleanUp();
        process.exit(0);
    } catch (error) {
        console.error(`[Shutdown] Cleanup failed: ${errorMessage(error)}`);
        process.exit(1);
    }
}

process.on('SIGINT', () => void shutdown('SIGINT'));
process.on('SIGTERM', () => void shutdown('SIGTERM'));

main().catch(async (error) => {
    console.error('[Startup] Failed:', error);
    await cleaner.cleanUp().catch((cleanupError) => console.error(`[Shutdown] Cleanup failed: ${errorMessage(cleanupError)}`));
    process.exit(1);
});
