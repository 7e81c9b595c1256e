/**
 * Enricher Configuration Parser
 *
 * Parses enrichers.yml:
 *
 *   version: "1.0"
 *   enrichers:
 *     faces:
 *       kind: faces
 *       url: ${FACES_URL:-http://localhost:8101}
 *       assetTypes: [image]
 *       timeout: 2m
 *       config: { minConfidence: 0.8 }
 */

import * as fs from 'fs/promises';
import YAML from 'yaml';
import type { AssetType } from '@keepsake/archive-interface';
import { isEnricherKind, type EnricherKind } from './types.js';

/**
 * Parse error with context
 */
export class ConfigParseError extends Error {
    constructor(
        message: string,
        public readonly filePath: string,
        public readonly cause?: Error
    ) {
        super(`${message} (file: ${filePath})`);
        this.name = 'ConfigParseError';
    }
}

export interface HttpEnricherConfig {
    id: string;
    kind: EnricherKind;
    /** Base URL of the model service */
    url: string;
    assetTypes: AssetType[];
    /** Timeout of one run in ms */
    timeoutMs: number;
    /** Sent with the load request */
    config?: Record<string, unknown>;
}

export interface EnrichersConfig {
    version: string;
    enrichers: HttpEnricherConfig[];
}

const DEFAULTS = {
    version: '1.0',
    timeoutMs: 120000,
} as const;

const DEFAULT_ASSET_TYPES: Record<EnricherKind, AssetType[]> = {
    faces: ['image'],
    caption: ['image'],
    embedding: ['image'],
    transcript: ['video', 'audio'],
    metadata: ['image'],
};

/**
 * Substitute environment variables in a string
 * Supports: ${VAR}, ${VAR:-default}, ${VAR:=default}
 */
export function substituteEnvVars(value: string, env: NodeJS.ProcessEnv = process.env): string {
    const envPattern = /\$\{([A-Z_][A-Z0-9_]*)(?:(:?[-=])([^}]*))?\}/gi;

    return value.replace(envPattern, (_match: string, varName: string, operator: string | undefined, defaultValue: string | undefined) => {
        const envValue = env[varName];

        if (envValue !== undefined && envValue !== '') {
            return envValue;
        }
        if (operator === ':-' || operator === ':=') {
            return defaultValue || '';
        }
        if (operator === '-' || operator === '=') {
            // Only an unset variable takes the default
            return envValue === undefined ? defaultValue || '' : '';
        }
        return '';
    });
}

function substituteEnvVarsInObject(obj: unknown, env: NodeJS.ProcessEnv): unknown {
    if (typeof obj === 'string') {
        return substituteEnvVars(obj, env);
    }
    if (Array.isArray(obj)) {
        return obj.map((item) => substituteEnvVarsInObject(item, env));
    }
    if (obj !== null && typeof obj === 'object') {
        const result: Record<string, unknown> = {};
        for (const [key, value] of Object.entries(obj)) {
            result[key] = substituteEnvVarsInObject(value, env);
        }
        return result;
    }
    return obj;
}

/**
 * "500ms", "30s", "2m", or a number of milliseconds
 */
export function parseDuration(value: unknown): number | null {
    if (typeof value === 'number') {
        return Number.isFinite(value) && value > 0 ? value : null;
    }
    if (typeof value !== 'string') {
        return null;
    }
    const match = /^(\d+(?:\.\d+)?)\s*(ms|s|m)?$/.exec(value.trim());
    if (!match) {
        return null;
    }
    const amount = parseFloat(match[1]);
    const factor = match[2] === 's' ? 1000 : match[2] === 'm' ? 60000 : 1;
    const ms = Math.round(amount * factor);
    return ms > 0 ? ms : null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function validateAssetTypes(value: unknown, enricherId: string, kind: EnricherKind): AssetType[] {
    if (value === undefined) {
        return [...DEFAULT_ASSET_TYPES[kind]];
    }
    if (!Array.isArray(value) || value.length === 0) {
        throw new Error(`Enricher '${enricherId}': 'assetTypes' must be a non-empty list`);
    }
    return value.map((entry: unknown): AssetType => {
        if (entry === 'image' || entry === 'video' || entry === 'audio') {
            return entry;
        }
        throw new Error(`Enricher '${enricherId}': unknown asset type '${String(entry)}'`);
    });
}

/**
 * Validate a single enricher entry, null when disabled
 */
function validateEnricherConfig(enricherId: string, raw: unknown): HttpEnricherConfig | null {
    if (!isRecord(raw)) {
        throw new Error(`Enricher '${enricherId}': configuration must be an object`);
    }
    if (raw.enabled === false || raw.enabled === 'false') {
        return null;
    }
    if (!isEnricherKind(raw.kind)) {
        throw new Error(`Enricher '${enricherId}': 'kind' must be one of faces, caption, embedding, transcript, metadata`);
    }
    if (typeof raw.url !== 'string' || !/^https?:\/\//.test(raw.url)) {
        throw new Error(`Enricher '${enricherId}': 'url' must be an http(s) URL`);
    }

    let timeoutMs: number = DEFAULTS.timeoutMs;
    if (raw.timeout !== undefined) {
        const parsed = parseDuration(raw.timeout);
        if (parsed === null) {
            throw new Error(`Enricher '${enricherId}': invalid timeout '${String(raw.timeout)}' (use e.g. '30s', '2m')`);
        }
        timeoutMs = parsed;
    }

    const enricher: HttpEnricherConfig = {
        id: enricherId,
        kind: raw.kind,
        url: raw.url.replace(/\/$/, ''),
        assetTypes: validateAssetTypes(raw.assetTypes, enricherId, raw.kind),
        timeoutMs,
    };
    if (isRecord(raw.config)) {
        enricher.config = raw.config;
    }
    return enricher;
}

/**
 * Parse and validate enrichers configuration
 */
export function parseConfig(rawConfig: unknown, filePath: string): EnrichersConfig {
    if (rawConfig === null || rawConfig === undefined) {
        return { version: DEFAULTS.version, enrichers: [] };
    }
    if (!isRecord(rawConfig)) {
        throw new ConfigParseError('Configuration must be an object', filePath);
    }

    const version = typeof rawConfig.version === 'string' ? rawConfig.version : DEFAULTS.version;
    if (rawConfig.enrichers === undefined || rawConfig.enrichers === null) {
        return { version, enrichers: [] };
    }
    if (!isRecord(rawConfig.enrichers)) {
        throw new ConfigParseError("'enrichers' section must be an object", filePath);
    }

    const enrichers: HttpEnricherConfig[] = [];
    for (const [enricherId, enricherConfig] of Object.entries(rawConfig.enrichers)) {
        if (!/^[a-z][a-z0-9-]*$/.test(enricherId)) {
            throw new ConfigParseError(
                `Invalid enricher ID '${enricherId}': must be lowercase alphanumeric with hyphens, starting with a letter`,
                filePath
            );
        }
        try {
            const enricher = validateEnricherConfig(enricherId, enricherConfig);
            if (enricher) {
                enrichers.push(enricher);
            }
        } catch (error) {
            throw new ConfigParseError(error instanceof Error ? error.message : String(error), filePath);
        }
    }
    return { version, enrichers };
}

/**
 * Load and parse enrichers.yml. A missing file means no external enrichers.
 */
export async function loadConfig(configPath: string, env: NodeJS.ProcessEnv = process.env): Promise<EnrichersConfig> {
    let content: string;
    try {
        content = await fs.readFile(configPath, 'utf-8');
    } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
            console.log(`[Enrichment] No enricher configuration at ${configPath}`);
            return { version: DEFAULTS.version, enrichers: [] };
        }
        throw new ConfigParseError(
            'Failed to read configuration file',
            configPath,
            error instanceof Error ? error : undefined
        );
    }

    let rawConfig: unknown;
    try {
        rawConfig = YAML.parse(content);
    } catch (error) {
        throw new ConfigParseError(
            'Invalid YAML syntax',
            configPath,
            error instanceof Error ? error : undefined
        );
    }

    return parseConfig(substituteEnvVarsInObject(rawConfig, env), configPath);
}
