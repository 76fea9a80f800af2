import { LRUCache } from "lru-cache";

export interface CachedResolution {
	entityIds: readonly string[];
}

export interface CacheStats {
	size: number;
	maxSize: number;
	hits: number;
	misses: number;
}

/** Citation vocabulary is large but finite; 2^15 keys covers a full run over the court's decisions. */
export const DEFAULT_CACHE_SIZE = 32_768;

export class CitationCache {
	private readonly cache: LRUCache<string, CachedResolution>;
	private hitCount = 0;
	private missCount = 0;

	constructor(maxEntries = DEFAULT_CACHE_SIZE) {
		this.cache = new LRUCache<string, CachedResolution>({ max: maxEntries });
	}

	get(citationKey: string): CachedResolution | undefined {
		const result = this.cache.get(citationKey);
		if (result !== undefined) {
			this.hitCount++;
		} else {
			this.missCount++;
		}
		return result;
	}

	set(citationKey: string, result: CachedResolution): void {
		this.cache.set(citationKey, Object.freeze({ entityIds: Object.freeze([...result.entityIds]) }));
	}

	stats(): CacheStats {
		return {
			size: this.cache.size,
			maxSize: this.cache.max,
			hits: this.hitCount,
			misses: this.missCount,
		};
	}

	clear(): void {
		this.cache.clear();
		this.hitCount = 0;
		this.missCount = 0;
	}
}
