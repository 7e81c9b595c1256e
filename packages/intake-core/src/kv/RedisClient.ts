/**
 * Redis KV Client - Implements IKVClient interface using Redis
 *
 * Plain string keys holding JSON. Prefix scans use SCAN, never KEYS.
 */

import { Redis } from 'ioredis';
import type { IKVClient, KeyValuePair, KVClientConfig } from './IKVClient.js';
import { parseStoredValue } from './IKVClient.js';

export class RedisKVClient implements IKVClient {
    private redis: Redis;
    private timeout: number;
    private prefix: string;
    private isConnected: boolean = false;

    constructor(config: KVClientConfig) {
        this.timeout = config.timeout || 30000;
        this.prefix = config.prefix || '';

        this.redis = new Redis(config.url, {
            commandTimeout: this.timeout,
            connectTimeout: this.timeout,
            lazyConnect: true,
            maxRetriesPerRequest: 3,
            enableOfflineQueue: true,
            retryStrategy: (times: number) => {
                const delay = Math.min(times * 200, 2000);
                console.log(`[Redis] Retry attempt ${times}, waiting ${delay}ms`);
                return delay;
            }
        });

        this.redis.on('connect', () => {
            this.isConnected = true;
            console.log('[Redis] Connected');
        });

        this.redis.on('error', (err: Error) => {
            console.error('[Redis] Error:', err.message);
        });

        this.redis.on('close', () => {
            this.isConnected = false;
            console.log('[Redis] Connection closed');
        });
    }

    /**
     * Connect to Redis (call before using other methods)
     */
    async connect(): Promise<void> {
        if (this.isConnected) return;
        await this.redis.connect();
    }

    /**
     * Build the full Redis key with optional prefix
     */
    private buildKey(key: string): string {
        return this.prefix ? `${this.prefix}${key}` : key;
    }

    private stripPrefix(key: string): string {
        return this.prefix && key.startsWith(this.prefix) ? key.slice(this.prefix.length) : key;
    }

    /**
     * Iterate over all keys matching a prefix, one SCAN page at a time
     */
    private async *scanKeys(prefix: string): AsyncGenerator<string[]> {
        const fullPrefix = this.buildKey(prefix);
        let cursor = '0';
        do {
            const [nextCursor, keys] = await this.redis.scan(
                cursor,
                'MATCH',
                `${fullPrefix}*`,
                'COUNT',
                1000
            );
            cursor = nextCursor;
            if (keys.length > 0) {
                yield keys;
            }
        } while (cursor !== '0');
    }

    // ========================================================================
    // Basic Operations
    // ========================================================================

    async set(key: string, value: unknown): Promise<void> {
        await this.redis.set(this.buildKey(key), JSON.stringify(value));
    }

    async setIfAbsent(key: string, value: unknown): Promise<boolean> {
        const result = await this.redis.set(this.buildKey(key), JSON.stringify(value), 'NX');
        return result === 'OK';
    }

    async get(key: string): Promise<unknown> {
        const value = await this.redis.get(this.buildKey(key));
        if (value === null) return null;
        return parseStoredValue(value);
    }

    async delete(key: string): Promise<void> {
        await this.redis.del(this.buildKey(key));
    }

    async countKeysWithPrefix(prefix: string): Promise<number> {
        let count = 0;
        for await (const keys of this.scanKeys(prefix)) {
            count += keys.length;
        }
        return count;
    }

    async health(): Promise<boolean> {
        try {
            const result = await this.redis.ping();
            return result === 'PONG';
        } catch {
            return false;
        }
    }

    // ========================================================================
    // Range Operations
    // ========================================================================

    async getRange(prefix: string): Promise<KeyValuePair[]> {
        const pairs: KeyValuePair[] = [];
        for await (const keys of this.scanKeys(prefix)) {
            const values = await this.redis.mget(...keys);
            keys.forEach((key, index) => {
                const value = values[index];
                if (value !== null && value !== undefined) {
                    pairs.push({ key: this.stripPrefix(key), value });
                }
            });
        }
        // SCAN order is arbitrary
        pairs.sort((a, b) => a.key.localeCompare(b.key));
        return pairs;
    }

    // ========================================================================
    // Lifecycle
    // ========================================================================

    async close(): Promise<void> {
        await this.redis.quit();
        this.isConnected = false;
    }

    /**
     * Check if client is connected
     */}
