/**
 * Intake HTTP API Server using Fastify
 *
 * Resumable uploads, batches, health and ops statistics.
 */

import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import fastifyCors from '@fastify/cors';
import type { IKVClient } from '../kv/IKVClient.js';
import type { UploadSessionManager } from '../upload/UploadSessionManager.js';
import type { ManifestBatcher } from '../batch/ManifestBatcher.js';
import { parseBatchContext, parseManifestFiles } from '../batch/ManifestBatcher.js';
import type { AssetRepository } from '../persistence/AssetRepository.js';
import type { BackpressureGovernor } from '../backpressure/BackpressureGovernor.js';
import type { WorkerLoop, WorkerStats } from '../worker/WorkerLoop.js';
import { committedRangeHeader, parseContentRange } from '../upload/ContentRange.js';
import { IntakeError, ValidationError, errorMessage } from '../errors/IntakeErrors.js';
import { isRecord, isString } from '../utils/guards.js';

export interface IntakeAPIServerConfig {
  /** Port to listen on (default: 8080) */
  port?: number;
  /** Host to bind to (default: '0.0.0.0') */
  host?: string;
  /** Enable CORS (default: true) */
  enableCors?: boolean;
  /** Largest request body, one chunk plus headroom (default: 9MB) */
  bodyLimit?: number;
}

export interface IntakeAPIServerDeps {
  uploads: UploadSessionManager;
  batcher: ManifestBatcher;
  kvClient: IKVClient;
  repository: AssetRepository;
  backpressure: Pick<BackpressureGovernor, 'check'>;
  /** Absent when the worker runs in another process */
  worker?: Pick<WorkerLoop, 'getStats'>;
}

const GB = 1024 ** 3;

function bodyOf(body: unknown): Record<string, unknown> {
  if (!isRecord(body)) {
    throw new ValidationError('Request body must be a JSON object');
  }
  return body;
}

function optionalString(body: Record<string, unknown>, field: string): string | undefined {
  const value = body[field];
  if (value === undefined || value === null || value === '') {
    return undefined;
  }
  if (!isString(value)) {
    throw new ValidationError(`${field} must be a string`);
  }
  return value;
}

function sizeOf(value: unknown): number {
  if (typeof value === 'number') {
    return value;
  }
  if (isString(value) && /^\d+$/.test(value.trim())) {
    return Number(value);
  }
  return NaN;
}

export class IntakeAPIServer {
  private app: FastifyInstance;
  private config: Required<IntakeAPIServerConfig>;

  constructor(private readonly deps: IntakeAPIServerDeps, config: IntakeAPIServerConfig = {}) {
    this.config = {
      port: config.port ?? 8080,
      host: config.host ?? '0.0.0.0',
      enableCors: config.enableCors ?? true,
      bodyLimit: config.bodyLimit ?? 9 * 1024 * 1024,
    };

    this.app = Fastify({
      logger: false,
      bodyLimit: this.config.bodyLimit,
    });

    this.setupMiddleware();
    this.setupRoutes();
  }

  private setupMiddleware(): void {
    if (this.config.enableCors) {
      this.app.register(fastifyCors, {
        origin: '*',
        methods: ['GET', 'POST', 'PUT', 'OPTIONS'],
        exposedHeaders: ['Range'],
      });
    }

    // Chunk bodies arrive as raw bytes under any content type
    this.app.addContentTypeParser('*', { parseAs: 'buffer' }, (_request, body, done) => {
      done(null, body);
    });

    this.app.setErrorHandler((error: FastifyError, request, reply) => {
      if (error instanceof IntakeError) {
        if (error.statusCode >= 500) {
          console.warn(`[API] ${request.method} ${request.url}: ${error.message}`);
        }
        return reply.status(error.statusCode).send({ error: error.message, code: error.code });
      }
      // Fastify's own request errors (bad JSON, body too large)
      if (error.statusCode !== undefined && error.statusCode < 500) {
        return reply.status(error.statusCode).send({ error: error.message, code: error.code });
      }
      console.error(`[API] ${request.method} ${request.url} failed:`, error);
      return reply.status(500).send({ error: errorMessage(error) });
    });
  }

  private setupRoutes(): void {
    const { uploads, batcher, kvClient, repository, backpressure, worker } = this.deps;

    this.app.get('/health', async () => {
      const redisOk = await kvClient.health();
      return {
        status: redisOk ? 'ok' : 'degraded',
        redis: redisOk,
        activeSessions: await uploads.activeSessionCount(),
        timestamp: new Date().toISOString(),
      };
    });

    this.app.post('/upload/init', async (request) => {
      const body = bodyOf(request.body);
      const result = await uploads.initUpload({
        contributorToken: optionalString(body, 'contributorToken') ?? '',
        filename: optionalString(body, 'filename') ?? '',
        mimeType: optionalString(body, 'mimeType') ?? '',
        sizeBytes: sizeOf(body.sizeBytes),
        batchId: optionalString(body, 'batchId') ?? optionalString(body, 'batchID'),
      });
      return { sessionID: result.sessionId, chunkSizeHint: result.chunkSizeHint, batchID: result.batchId };
    });

    this.app.put('/upload/chunk', async (request, reply) => {
      const sessionId = request.headers['x-upload-session-id'];
      if (!isString(sessionId) || sessionId === '') {
        throw new ValidationError('X-Upload-Session-ID header is required');
      }
      const rangeHeader = request.headers['content-range'];
      const range = parseContentRange(isString(rangeHeader) ? rangeHeader : undefined);
      const payload = Buffer.isBuffer(request.body) ? request.body : Buffer.alloc(0);

      const result = await uploads.putChunk(sessionId, range, payload);
      if (result.status === 'complete') {
        return reply.status(200).send({ originFileID: result.originFileId });
      }
      const header = committedRangeHeader(result.nextOffset);
      if (header) {
        reply.header('Range', header);
      }
      return reply.status(308).send({ nextOffset: result.nextOffset });
    });

    this.app.post('/batch/create', async (request) => {
      const body = bodyOf(request.body);
      const batch = await batcher.createBatch(optionalString(body, 'contributorToken') ?? '');
      return { batchID: batch.batchId };
    });

    this.app.post('/batch/finish', async (request) => {
      const body = bodyOf(request.body);
      const contributorToken = optionalString(body, 'contributorToken') ?? '';
      const batchId = optionalString(body, 'batchID') ?? optionalString(body, 'batchId');
      if (!batchId) {
        throw new ValidationError('batchID is required');
      }
      const result = await batcher.finishBatch(
        contributorToken,
        batchId,
        parseManifestFiles(body.files),
        parseBatchContext(body.context)
      );
      return { ack: result.ack, totalProcessedCount: result.totalProcessedCount };
    });

    this.app.get('/ops/stats', async () => {
      const [statusCounts, pressure, lastWorkerRun] = await Promise.all([
        repository.statusCounts(),
        backpressure.check(),
        repository.getLastWorkerRun(),
      ]);
      const workerStats: WorkerStats | null = worker ? worker.getStats() : null;
      return {
        statusCounts,
        backlog: pressure.backlog,
        freeDiskGb: Math.round((pressure.freeDiskBytes / GB) * 10) / 10,
        intakeAllowed: pressure.allowed,
        lastWorkerRun,
        worker: workerStats,
      };
    });
  }

  /**
   * Start the HTTP server
   */
  public async start(): Promise<void> {
    try {
      await this.app.listen({
        port: this.config.port,
        host: this.config.host,
      });
      console.log(`[API] Intake server listening on http://${this.config.host}:${this.config.port}`);
    } catch (error) {
      console.error('[API] Error starting intake server:', error);
      throw error;
    }
  }

  /**
   * Stop the HTTP server
   */
  public async stop(): Promise<void> {
    await this.app.close();
    console.log('[API] Intake server stopped');
  }

  /**
   * Get the Fastify instance (for testing)
   */
  public getApp(): FastifyInstance {
    return this.app;
  }
}
