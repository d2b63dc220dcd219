/**
 * Quote Cache
 *
 * Persistent map from manufacturer part to the vendor quotes last fetched
 * for it. Stale quotes are evicted on load, so a part whose quotes all aged
 * out is fetched again.
 *
 * File format (JSON, version 1):
 *   { version, savedAt, entries: [{ manufacturerName, manufacturerPartName,
 *     quotes: [{ vendorName, vendorPartName, availableQuantity,
 *                priceBreaks: [[minQuantity, unitPrice]], fetchedAt }] }] }
 */

import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { Logger } from '../utils/logger';
import { QuoteCacheFormatError } from '../utils/errors';
import { actualPartId } from '../utils/partNames';
import { QUOTE_CACHE_LIMITS } from '../config/limits';
import type { ActualPartKey, VendorQuote } from '../types/parts';

const quoteSchema = z.object({
    vendorName: z.string(),
    vendorPartName: z.string(),
    availableQuantity: z.number().int().nonnegative(),
    priceBreaks: z.array(z.tuple([z.number().int().positive(), z.number().nonnegative()])),
    fetchedAt: z.number(),
});

const entrySchema = z.object({
    manufacturerName: z.string(),
    manufacturerPartName: z.string(),
    quotes: z.array(quoteSchema),
});

const cacheFileSchema = z.object({
    version: z.literal(QUOTE_CACHE_LIMITS.FORMAT_VERSION),
    savedAt: z.number(),
    entries: z.array(entrySchema),
});

export type QuoteCacheFile = z.infer<typeof cacheFileSchema>;

interface CacheEntry {
    key: ActualPartKey;
    quotes: VendorQuote[];
}

export interface QuoteCacheOptions {
    ttlSeconds?: number;
    /** Epoch seconds; injectable for tests */
    now?: () => number;
}

const epochSeconds = () => Math.floor(Date.now() / 1000);

export function serializeQuoteCache(entries: Iterable<CacheEntry>, savedAt: number): QuoteCacheFile {
    return {
        version: QUOTE_CACHE_LIMITS.FORMAT_VERSION,
        savedAt,
        entries: Array.from(entries, ({ key, quotes }) => ({
            manufacturerName: key.manufacturerName,
            manufacturerPartName: key.manufacturerPartName,
            quotes: quotes.map((quote) => ({
                vendorName: quote.vendorName,
                vendorPartName: quote.vendorPartName,
                availableQuantity: quote.availableQuantity,
                priceBreaks: quote.priceBreaks.map((priceBreak): [number, number] => [priceBreak.minQuantity, priceBreak.unitPrice]),
                fetchedAt: quote.fetchedAt,
            })),
        })),
    };
}

/**
 * Parse a persisted cache, dropping quotes fetched before `now - ttlSeconds`
 * and entries left with no quotes.
 * @throws QuoteCacheFormatError when the data does not match the schema
 */
export function deserializeQuoteCache(
    data: unknown,
    options: { now: number; ttlSeconds: number; source?: string }
): { entries: CacheEntry[]; evicted: number } {
    const parsed = cacheFileSchema.safeParse(data);
    if (!parsed.success) {
        const reason = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
        throw new QuoteCacheFormatError(options.source ?? '<memory>', reason);
    }

    const oldest = options.now - options.ttlSeconds;
    const entries: CacheEntry[] = [];
    let evicted = 0;

    for (const entry of parsed.data.entries) {
        const key = { manufacturerName: entry.manufacturerName, manufacturerPartName: entry.manufacturerPartName };
        const quotes: VendorQuote[] = [];
        for (const quote of entry.quotes) {
            if (quote.fetchedAt < oldest) {
                evicted++;
                continue;
            }
            quotes.push({
                actualPart: key,
                vendorName: quote.vendorName,
                vendorPartName: quote.vendorPartName,
                availableQuantity: quote.availableQuantity,
                priceBreaks: quote.priceBreaks.map(([minQuantity, unitPrice]) => ({ minQuantity, unitPrice })),
                fetchedAt: quote.fetchedAt,
            });
        }
        if (quotes.length > 0) {
            entries.push({ key, quotes });
        }
    }

    return { entries, evicted };
}

export class QuoteCache {
    private readonly entries = new Map<string, CacheEntry>();
    private dirty = false;

    constructor(
        private readonly filePath: string | null,
        private readonly options: Required<QuoteCacheOptions> = {
            ttlSeconds: QUOTE_CACHE_LIMITS.TTL_SECONDS,
            now: epochSeconds,
        }
    ) { }

    /**
     * Load the cache file, or start empty when it is missing or unreadable.
     * An unreadable file is logged and overwritten on the next save.
     */
    static async load(filePath: string, options: QuoteCacheOptions = {}): Promise<QuoteCache> {
        const resolved: Required<QuoteCacheOptions> = {
            ttlSeconds: options.ttlSeconds ?? QUOTE_CACHE_LIMITS.TTL_SECONDS,
            now: options.now ?? epochSeconds,
        };
        const cache = new QuoteCache(filePath, resolved);

        let text: string;
        try {
            text = await fs.readFile(filePath, 'utf8');
        } catch (error) {
            if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
                Logger.info('[QuoteCache] No cache file yet, starting empty', { filePath });
                return cache;
            }
            throw error;
        }

        try {
            const { entries, evicted } = deserializeQuoteCache(JSON.parse(text), {
                now: resolved.now(),
                ttlSeconds: resolved.ttlSeconds,
                source: filePath,
            });
            for (const entry of entries) {
                cache.entries.set(actualPartId(entry.key), entry);
            }
            Logger.info('[QuoteCache] Loaded', { filePath, parts: cache.entries.size, evictedQuotes: evicted });
        } catch (error) {
            const formatError = error instanceof QuoteCacheFormatError
                ? error
                : new QuoteCacheFormatError(filePath, error instanceof Error ? error.message : String(error));
            Logger.warn('[QuoteCache] Ignoring unreadable cache file', formatError.toJSON());
        }

        return cache;
    }

    /** In-memory cache; save() is a no-op */
    static inMemory(options: QuoteCacheOptions = {}): QuoteCache {
        return new QuoteCache(null, {
            ttlSeconds: options.ttlSeconds ?? QUOTE_CACHE_LIMITS.TTL_SECONDS,
            now: options.now ?? epochSeconds,
        });
    }

    get size(): number {
        return this.entries.size;
    }

    get(key: ActualPartKey): VendorQuote[] | undefined {
        return this.entries.get(actualPartId(key))?.quotes;
    }

    has(key: ActualPartKey): boolean {
        return this.entries.has(actualPartId(key));
    }

    put(key: ActualPartKey, quotes: VendorQuote[]): void {
        const normalizedKey = { manufacturerName: key.manufacturerName, manufacturerPartName: key.manufacturerPartName };
        this.entries.set(actualPartId(key), { key: normalizedKey, quotes: [...quotes] });
        this.dirty = true;
    }

    toJSON(): QuoteCacheFile {
        return serializeQuoteCache(this.entries.values(), this.options.now());
    }

    /** Persist the whole cache. Writes a sibling temp file and renames it into place. */
    async save(): Promise<void> {
        if (!this.filePath || !this.dirty) return;

        const tempPath = `${this.filePath}.tmp`;
        await fs.mkdir(path.dirname(this.filePath), { recursive: true });
        await fs.writeFile(tempPath, JSON.stringify(this.toJSON(), null, 2), 'utf8');
        await fs.rename(tempPath, this.filePath);
        this.dirty = false;

        Logger.debug('[QuoteCache] Saved', { filePath: this.filePath, parts: this.entries.size });
    }
}
