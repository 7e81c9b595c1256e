/**
 * Enricher backed by an external model service
 *
 * POST {url}/load   {config}
 * POST {url}/run    {path, assetType} → output of the enricher's kind
 * POST {url}/unload
 */

import type { AssetType, FaceDetection } from '@keepsake/archive-interface';
import type { HttpEnricherConfig } from './EnricherConfig.js';
import { createEnricherLogger, type EnricherLogger } from './EnricherLogger.js';
import { isEnricherKind, type EnricherKind, type EnricherOutput, type LoadableEnricher } from './types.js';

const LIFECYCLE_TIMEOUT_MS = 60000;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isFace(value: unknown): value is FaceDetection {
    return isRecord(value)
        && Array.isArray(value.bbox)
        && value.bbox.length === 4
        && value.bbox.every((n: unknown) => typeof n === 'number')
        && typeof value.confidence === 'number';
}

/**
 * Validate a /run response. A response naming a different kind is kept as is,
 * the orchestrator reports the mismatch.
 */
export function parseEnricherOutput(body: unknown, expectedKind: EnricherKind): EnricherOutput {
    if (!isRecord(body)) {
        throw new Error('Enricher response must be a JSON object');
    }
    const kind = body.kind === undefined ? expectedKind : body.kind;
    if (!isEnricherKind(kind)) {
        throw new Error(`Enricher response has unknown kind '${String(kind)}'`);
    }
    switch (kind) {
        case 'faces':
            if (!Array.isArray(body.faces) || !body.faces.every(isFace)) {
                throw new Error('faces output needs a faces list of {bbox, confidence}');
            }
            return { kind, faces: body.faces };
        case 'caption':
            if (typeof body.caption !== 'string') {
                throw new Error('caption output needs a caption string');
            }
            return { kind, caption: body.caption };
        case 'embedding':
            if (typeof body.embeddingRef !== 'string') {
                throw new Error('embedding output needs an embeddingRef string');
            }
            return { kind, embeddingRef: body.embeddingRef };
        case 'transcript':
            if (typeof body.transcriptRef !== 'string') {
                throw new Error('transcript output needs a transcriptRef string');
            }
            return { kind, transcriptRef: body.transcriptRef };
        case 'metadata': {
            const metadata = isRecord(body.metadata) ? body.metadata : {};
            const gps = isRecord(metadata.gps) && typeof metadata.gps.lat === 'number' && typeof metadata.gps.lon === 'number'
                ? { lat: metadata.gps.lat, lon: metadata.gps.lon }
                : null;
            return {
                kind,
                metadata: {
                    exifDate: typeof metadata.exifDate === 'string' ? metadata.exifDate : null,
                    gps,
                },
            };
        }
    }
}

export class HttpEnricher implements LoadableEnricher {
    private readonly logger: EnricherLogger;

    constructor(private readonly definition: HttpEnricherConfig) {
        this.logger = createEnricherLogger(definition.id);
    }

    get id(): string {
        return this.definition.id;
    }

    get kind(): EnricherKind {
        return this.definition.kind;
    }

    get assetTypes(): readonly AssetType[] {
        return this.definition.assetTypes;
    }

    private async post(endpoint: string, body: unknown, timeoutMs: number): Promise<unknown> {
        const response = await fetch(`${this.definition.url}/${endpoint}`, {
            method: 'POST',
            headers: { 'Content-Type': 'application/json' },
            body: JSON.stringify(body),
            signal: AbortSignal.timeout(timeoutMs),
        });
        if (!response.ok) {
            const text = await response.text();
            throw new Error(`${endpoint} failed: ${response.status} ${text}`.trim());
        }
        const text = await response.text();
        return text === '' ? null : JSON.parse(text);
    }

    async load(): Promise<void> {
        this.logger.debug('loading');
        await this.post('load', { config: this.definition.config ?? {} }, LIFECYCLE_TIMEOUT_MS);
    }

    async run(localPath: string, assetType: AssetType): Promise<EnricherOutput> {
        const body = await this.post('run', { path: localPath, assetType }, this.definition.timeoutMs);
        return parseEnricherOutput(body, this.definition.kind);
    }

    async unload(): Promise<void> {
        await this.post('unload', {}, LIFECYCLE_TIMEOUT_MS);
        this.logger.debug('unloaded');
    }
}
