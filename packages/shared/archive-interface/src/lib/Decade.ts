import type {DecadeEstimate} from "./Asset.js";
import type {BatchContext} from "./Manifest.js";

export const EXIF_DECADE_CONFIDENCE = 0.6;

export function decadeLabel(year: number): string {
    return `${Math.floor(year / 10) * 10}s`;
}

/**
 * Year from an EXIF-style date ("1987:06:15 10:00:00") or ISO date
 */
export function yearFromDate(value: string | null | undefined): number | null {
    if (!value) {
        return null;
    }
    const match = /^(\d{4})/.exec(value.trim());
    if (!match) {
        return null;
    }
    const year = parseInt(match[1], 10);
    return year >= 1800 && year <= 2200 ? year : null;
}

/**
 * Contributor context wins over camera metadata.
 * `context.decade` may be given as 1980 or as 1987.
 */
export function estimateDecade(context: BatchContext, exifDate: string | null | undefined): DecadeEstimate | null {
    if (typeof context.decade === 'number' && Number.isFinite(context.decade)) {
        return {decade: decadeLabel(context.decade), confidence: 1, source: 'contributor'};
    }
    const year = yearFromDate(exifDate);
    if (year === null) {
        return null;
    }
    return {decade: decadeLabel(year), confidence: EXIF_DECADE_CONFIDENCE, source: 'exif'};
}
