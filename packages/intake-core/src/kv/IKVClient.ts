/**
 * KV Client Interface - Abstraction layer for the metadata store
 *
 * Path-style keys, JSON values:
 * /asset/{assetId} → Asset
 * /origin/{originFileId} → assetId
 * /upload-session/{sessionId} → UploadSession
 */

export interface KeyValuePair {
    key: string;
    value: string;
}

export interface IKVClient {
    // ========================================================================
    // Basic Operations
    // ========================================================================

    /**
     * Set a key-value pair (value is JSON serialized)
     */
    set(key: string, value: unknown): Promise<void>;

    /**
     * Set only when the key does not exist yet.
     * @returns true when this call created the key
     */
    setIfAbsent(key: string, value: unknown): Promise<boolean>;

    /**
     * Get a value by key (value is JSON deserialized), null when missing
     */
    get(key: string): Promise<unknown>;

    /**
     * Delete a key
     */
    delete(key: string): Promise<void>;

    /**
     * Count keys with a given prefix
     */
    countKeysWithPrefix(prefix: string): Promise<number>;

    /**
     * Health check - verifies KV store is accessible
     */
    health(): Promise<boolean>;

    // ========================================================================
    // Range Operations
    // ========================================================================

    /**
     * Get all key-value pairs with a given prefix (raw JSON strings)
     */
    getRange(prefix: string): Promise<KeyValuePair[]>;

    // ========================================================================
    // Lifecycle
    // ========================================================================

    /**
     * Close connections and cleanup resources
     */
    close(): Promise<void>;
}

/**
 * KV Client configuration
 */
export interface KVClientConfig {
    /** Connection URL (e.g., redis://localhost:6379) */
    url: string;

    /** Operation timeout in ms (default: 30000) */
    timeout?: number;

    /** Key prefix for all operations (default: '' for none) */
    prefix?: string;
}

/**
 * Parse a stored JSON value, falling back to the raw string
 */
export function parseStoredValue(raw: string): unknown {
    try {
        return JSON.parse(raw);
    } catch {
        return raw;
    }
}
