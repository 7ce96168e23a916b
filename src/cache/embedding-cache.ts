import { mkdirSync, existsSync, readFileSync, writeFileSync, readdirSync, rmSync, statSync } from 'node:fs';
import { join } from 'node:path';
import { createHash } from 'node:crypto';
import { z } from 'zod';
import type { EmbeddingLookup, EmbeddingVector } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

const entrySchema = z.object({
    timestamp: z.number(),
    model: z.string(),
    vector: z.array(z.number()),
});

export interface EmbeddingCacheStats {
    enabled: boolean;
    directory: string;
    entries: number;
    bytes: number;
}

/**
 * File-system cache for phrase embeddings.
 * One JSON file per (model, phrase) pair in the cache directory.
 *
 * Cache key = SHA-256 of model + normalized phrase.
 * TTL = 30 days by default; vectors for a given model do not change.
 */
export class EmbeddingCache implements EmbeddingLookup {
    private readonly cacheDir: string;
    private readonly ttlMs: number;
    private readonly enabled: boolean;

    constructor(options: {
        cacheDir?: string;
        ttlDays?: number;
        enabled?: boolean;
    } = {}) {
        this.cacheDir = join(options.cacheDir ?? '.kwcluster-cache', 'embeddings');
        this.ttlMs = (options.ttlDays ?? 30) * 24 * 60 * 60 * 1000;
        this.enabled = options.enabled ?? true;

        if (this.enabled) {
            mkdirSync(this.cacheDir, { recursive: true });
            getLogger().debug({ cacheDir: this.cacheDir }, 'Embedding cache initialized');
        }
    }

    private makeKey(model: string, text: string): string {
        return createHash('sha256').update(`${model}\n${text.trim().toLowerCase()}`).digest('hex');
    }

    private pathFor(model: string, text: string): string {
        return join(this.cacheDir, `${this.makeKey(model, text)}.json`);
    }

    /**
     * Get a cached vector, or null if not found, expired or unreadable.
     */
    get(model: string, text: string): EmbeddingVector | null {
        if (!this.enabled) return null;

        const filePath = this.pathFor(model, text);
        if (!existsSync(filePath)) return null;

        try {
            const entry = entrySchema.safeParse(JSON.parse(readFileSync(filePath, 'utf-8')));
            if (!entry.success) {
                getLogger().debug({ filePath }, 'Discarding malformed cache entry');
                return null;
            }
            if (Date.now() - entry.data.timestamp > this.ttlMs) {
                getLogger().debug({ model }, 'Cache expired');
                return null;
            }
            return entry.data.vector;
        } catch (error) {
            getLogger().debug({ filePath, error }, 'Failed to read cache entry');
            return null;
        }
    }

    /**
     * Store a vector in the cache.
     */
    set(model: string, text: string, vector: EmbeddingVector): void {
        if (!this.enabled) return;

        try {
            const entry = { timestamp: Date.now(), model, vector };
            writeFileSync(this.pathFor(model, text), JSON.stringify(entry), 'utf-8');
        } catch (error) {
            getLogger().warn({ error }, 'Failed to write cache entry');
        }
    }

    /**
     * Remove every cached vector. Returns how many entries were deleted.
     */
    clear(): number {
        if (!existsSync(this.cacheDir)) return 0;

        const files = this.entryFiles();
        for (const file of files) {
            rmSync(join(this.cacheDir, file), { force: true });
        }
        getLogger().info({ removed: files.length, cacheDir: this.cacheDir }, 'Embedding cache cleared');
        return files.length;
    }

    /**
     * Get cache stats.
     */
    getStats(): EmbeddingCacheStats {
        const files = existsSync(this.cacheDir) ? this.entryFiles() : [];
        const bytes = files.reduce((sum, file) => sum + statSync(join(this.cacheDir, file)).size, 0);
        return {
            enabled: this.enabled,
            directory: this.cacheDir,
            entries: files.length,
            bytes,
        };
    }

    private entryFiles(): string[] {
        return readdirSync(this.cacheDir).filter((file) => file.endsWith('.json'));
    }
}
