export interface CacheEntry<T> {
    value: T;
    createdAt: number;
    expiresAt: number;
}

export type CacheLookup<T> =
    | { found: true; value: T }
    | { found: false };

export interface CacheStats {
    totalItems: number;
    validItems: number;
    expiredItems: number;
    maxItems: number;
    enabled: boolean;
}

export interface TtlCacheOptions {
    defaultTtlMs: number;
    maxItems: number;
    enabled?: boolean;
    now?: () => number;
}

const MISS: CacheLookup<never> = { found: false };

/**
 * Expiring key-value store with a capacity bound.
 *
 * Expired entries are logically absent: reads report a miss and drop them. When an insert pushes the
 * store over `maxItems`, expired entries go first, then the oldest-created ones (creation time, not
 * last access). A disabled cache reports a miss for every read and ignores every write.
 */
export class TtlCache<T> {
    private readonly entries = new Map<string, CacheEntry<T>>();
    private readonly now: () => number;

    readonly defaultTtlMs: number;
    readonly maxItems: number;
    private enabledState: boolean;

    constructor(options: TtlCacheOptions) {
        this.defaultTtlMs = options.defaultTtlMs;
        this.maxItems = Math.max(1, Math.floor(options.maxItems));
        this.enabledState = options.enabled ?? true;
        this.now = options.now ?? (() => Date.now());
    }

    get enabled(): boolean {
        return this.enabledState;
    }

    /** Physical entry count, expired entries included. */
    get size(): number {
        return this.entries.size;
    }

    setEnabled(enabled: boolean): void {
        this.enabledState = enabled;
    }

    get(key: string): CacheLookup<T> {
        if (!this.enabledState) {
            return MISS;
        }

        const entry = this.entries.get(key);
        if (!entry) {
            console.debug(`TtlCache: miss ${key}`);
            return MISS;
        }

        if (this.isExpired(entry)) {
            console.debug(`TtlCache: expired ${key}`);
            this.entries.delete(key);
            return MISS;
        }

        return { found: true, value: entry.value };
    }

    set(key: string, value: T, ttlMs = this.defaultTtlMs): void {
        if (!this.enabledState) {
            return;
        }

        const createdAt = this.now();
        // Re-inserting keeps map order equal to creation order.
        this.entries.delete(key);
        this.entries.set(key, { value, createdAt, expiresAt: createdAt + ttlMs });

        if (this.entries.size > this.maxItems) {
            this.evict();
        }
    }

    delete(key: string): boolean {
        return this.entries.delete(key);
    }

    /** Removes every entry whose key matches and returns how many were removed. */
    deleteWhere(predicate: (key: string) => boolean): number {
        let removed = 0;
        for (const key of Array.from(this.entries.keys())) {
            if (predicate(key)) {
                this.entries.delete(key);
                removed += 1;
            }
        }

        return removed;
    }

    clear(): void {
        this.entries.clear();
    }

    getStats(): CacheStats {
        let expiredItems = 0;
        for (const entry of this.entries.values()) {
            if (this.isExpired(entry)) {
                expiredItems += 1;
            }
        }

        return {
            totalItems: this.entries.size,
            validItems: this.entries.size - expiredItems,
            expiredItems,
            maxItems: this.maxItems,
            enabled: this.enabledState,
        };
    }

    private isExpired(entry: CacheEntry<T>): boolean {
        return this.now() > entry.expiresAt;
    }

    private evict(): void {
        for (const [key, entry] of Array.from(this.entries)) {
            if (this.isExpired(entry)) {
                this.entries.delete(key);
            }
        }

        const overflow = this.entries.size - this.maxItems;
        if (overflow > 0) {
            const oldestFirst = Array.from(this.entries)
                .sort(([, left], [, right]) => left.createdAt - right.createdAt);

            for (const [key] of oldestFirst.slice(0, overflow)) {
                this.entries.delete(key);
            }
        }

        console.debug(`TtlCache: cleanup done, ${this.entries.size} items left`);
    }
}
