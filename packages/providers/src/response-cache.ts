import { createHash } from "node:crypto";
import * as fs from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import {
    asError,
    createSilentLogger,
    estimateTextTokens,
    type Logger,
    type ModelClient,
    type ModelRequest,
    type ModelResponse,
} from "@patchloop/core";

export interface ResponseCacheConfig {
    maxEntries: number;
    /** 0 disables expiry */
    ttlMs: number;
    now: () => number;
    /** When set, entries are also kept here as `<key>.json` and survive the process */
    dir?: string;
    logger: Logger;
}

export interface ResponseCacheStats {
    hits: number;
    misses: number;
    evictions: number;
    entries: number;
}

const CacheEntrySchema = z.object({
    response: z.object({
        text: z.string(),
        usage: z.object({ promptTokens: z.number(), completionTokens: z.number() }).optional(),
        model: z.string().optional(),
    }),
    createdAt: z.number(),
});

type CacheEntry = z.infer<typeof CacheEntrySchema>;

const DEFAULT_CONFIG: ResponseCacheConfig = {
    maxEntries: 1_000,
    ttlMs: 3_600_000,
    now: Date.now,
    logger: createSilentLogger(),
};

/**
 * Key over everything that shapes the completion: the model and the exact
 * window the controller sent.
 */
export function responseCacheKey(model: string, request: ModelRequest): string {
    const body = JSON.stringify({
        model,
        entries: request.entries.map((entry) => [entry.role, entry.content]),
    });
    return createHash("sha256").update(body).digest("hex");
}

/**
 * LRU cache in front of another model client, in memory and optionally on
 * disk. Hits report zero usage, so cached completions cost nothing against
 * the budget. A cache file that cannot be read or written is logged and
 * treated as a miss.
 */
export class CachingModelClient implements ModelClient {
    private readonly cache = new Map<string, CacheEntry>();
    private readonly config: ResponseCacheConfig;
    private hits = 0;
    private misses = 0;
    private evictions = 0;

    constructor(
        private readonly inner: ModelClient,
        config: Partial<ResponseCacheConfig> = {}
    ) {
        this.config = { ...DEFAULT_CONFIG, ...config };
    }

    get name(): string {
        return this.inner.name;
    }

    get model(): string {
        return this.inner.model;
    }

    async complete(request: ModelRequest): Promise<ModelResponse> {
        const key = responseCacheKey(this.inner.model, request);
        const cached = this.lookup(key) ?? (await this.lookupFile(key));
        if (cached) {
            this.hits++;
            return { ...cached, usage: { promptTokens: 0, completionTokens: 0 } };
        }
        this.misses++;

        const response = await this.inner.complete(request);
        const entry = this.store(key, response);
        await this.storeFile(key, entry);
        return response;
    }

    /**
     * Drops entries older than `maxAgeMs`, or every entry when it is not
     * given, from memory and the cache directory. Returns how many went.
     */
    async clear(maxAgeMs?: number): Promise<number> {
        const cutoff = maxAgeMs === undefined ? Infinity : this.config.now() - maxAgeMs;
        let cleared = 0;
        for (const [key, entry] of this.cache) {
            if (entry.createdAt < cutoff) {
                this.cache.delete(key);
                cleared++;
            }
        }
        const dir = this.config.dir;
        if (!dir) return cleared;

        let names: string[];
        try {
            names = await fs.readdir(dir);
        } catch (error) {
            if (isMissing(error)) return cleared;
            throw error;
        }
        for (const name of names.filter((candidate) => candidate.endsWith(".json"))) {
            const filePath = join(dir, name);
            const entry = maxAgeMs === undefined ? undefined : await this.readFile(filePath);
            if (entry && entry.createdAt >= cutoff) continue;
            await fs.rm(filePath, { force: true });
            cleared++;
        }
        return cleared;
    }

    estimateTokens(text: string): number {
        return this.inner.estimateTokens?.(text) ?? estimateTextTokens(text);
    }

    stats(): ResponseCacheStats {
        return { hits: this.hits, misses: this.misses, evictions: this.evictions, entries: this.cache.size };
    }

    private expired(entry: CacheEntry): boolean {
        return this.config.ttlMs > 0 && this.config.now() - entry.createdAt > this.config.ttlMs;
    }

    private lookup(key: string): ModelResponse | undefined {
        const entry = this.cache.get(key);
        if (!entry) return undefined;
        if (this.expired(entry)) {
            this.cache.delete(key);
            return undefined;
        }
        // most recently used goes last
        this.cache.delete(key);
        this.cache.set(key, entry);
        return entry.response;
    }

    private async lookupFile(key: string): Promise<ModelResponse | undefined> {
        if (!this.config.dir) return undefined;
        const entry = await this.readFile(join(this.config.dir, `${key}.json`));
        if (!entry || this.expired(entry)) return undefined;
        this.remember(key, entry);
        return entry.response;
    }

    private async readFile(filePath: string): Promise<CacheEntry | undefined> {
        let text: string;
        try {
            text = await fs.readFile(filePath, "utf8");
        } catch (error) {
            if (!isMissing(error)) {
                this.config.logger.warn({ err: asError(error), file: filePath }, "Could not read cache entry");
            }
            return undefined;
        }
        const parsed = CacheEntrySchema.safeParse(parseJson(text));
        if (!parsed.success) {
            this.config.logger.warn({ file: filePath }, "Ignoring malformed cache entry");
            return undefined;
        }
        return parsed.data;
    }

    private async storeFile(key: string, entry: CacheEntry): Promise<void> {
        const dir = this.config.dir;
        if (!dir) return;
        try {
            await fs.mkdir(dir, { recursive: true });
            await fs.writeFile(join(dir, `${key}.json`), JSON.stringify(entry), "utf8");
        } catch (error) {
            this.config.logger.warn({ err: asError(error), dir }, "Could not write cache entry");
        }
    }

    private store(key: string, response: ModelResponse): CacheEntry {
        const entry = { response, createdAt: this.config.now() };
        this.remember(key, entry);
        return entry;
    }

    private remember(key: string, entry: CacheEntry): void {
        this.cache.delete(key);
        while (this.cache.size >= this.config.maxEntries) {
            const oldest = this.cache.keys().next();
            if (oldest.done) break;
            this.cache.delete(oldest.value);
            this.evictions++;
        }
        this.cache.set(key, entry);
    }
}

function isMissing(error: unknown): boolean {
    return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function parseJson(text: string): unknown {
    try {
        return JSON.parse(text);
    } catch {
        return undefined;
    }
}
