/**
 * Type guards for JSON read back from the KV store
 */

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isString(value: unknown): value is string {
    return typeof value === 'string';
}

export function isNullableString(value: unknown): value is string | null {
    return value === null || typeof value === 'string';
}

export function isFiniteNumber(value: unknown): value is number {
    return typeof value === 'number' && Number.isFinite(value);
}

export function isStringArray(value: unknown): value is string[] {
    return Array.isArray(value) && value.every(isString);
}
