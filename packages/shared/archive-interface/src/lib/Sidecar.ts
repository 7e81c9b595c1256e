import type {Asset, AssetEnrichment, AssetError} from "./Asset.js";

export const SIDECAR_SCHEMA_VERSION = 1;

/**
 * Denormalized snapshot of an asset after one pipeline run
 */
export interface Sidecar extends Omit<Asset, 'enrichment' | 'errors'> {
    schemaVersion: number;
    enrichment: AssetEnrichment;
    enrichmentErrors: Array<{ enricherId: string; kind: string; error: string }>;
    errors: AssetError[];
    timings: Record<string, number>;
}

export function buildSidecar(
    asset: Asset,
    enrichmentErrors: Sidecar['enrichmentErrors'] = [],
    timings: Record<string, number> = {}
): Sidecar {
    const {enrichment, errors, ...fields} = asset;
    return {
        schemaVersion: SIDECAR_SCHEMA_VERSION,
        ...fields,
        enrichment: {...enrichment},
        enrichmentErrors: [...enrichmentErrors],
        errors: [...errors],
        timings: {...timings},
    };
}
