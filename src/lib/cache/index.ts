/**
 * Keyed value store used as the secondary source behind a gateway.
 *
 * One value per key; a write overwrites. There is no TTL and no eviction:
 * the store only has to make the most recently completed write visible to
 * later reads.
 */
export interface CacheStore<V> {
	/** Resolves to the stored value, or `undefined` when the key was never written. */
	read(key: string): Promise<V | undefined>;
	write(key: string, value: V): Promise<void>;
}

/** Cache statistics for observability. */
export interface CacheStats {
	hits: number;
	misses: number;
	writes: number;
	/** Hit rate as a fraction between 0 and 1 */
	hitRate: number;
}

/**
 * In-process CacheStore backed by a Map. Reads and writes complete in a
 * microtask, so concurrent callers observe whole values only.
 *
 * @example
 * ```typescript
 * const cache = new MemoryCacheStore<Movie[]>();
 * await cache.write("popular-movies", movies);
 * await cache.read("popular-movies"); // movies
 * ```
 */
export class MemoryCacheStore<V> implements CacheStore<V> {
	private readonly entries = new Map<string, V>();
	private hits = 0;
	private misses = 0;
	private writes = 0;

	async read(key: string): Promise<V | undefined> {
		const value = this.entries.get(key);
		if (value === undefined) {
			this.misses++;
			return undefined;
		}
		this.hits++;
		return value;
	}

	async write(key: string, value: V): Promise<void> {
		this.writes++;
		this.entries.set(key, value);
	}

	delete(key: string): boolean {
		return this.entries.delete(key);
	}

	clear(): void {
		this.entries.clear();
	}

	get size(): number {
		return this.entries.size;
	}

	getStats(): CacheStats {
		const total = this.hits + this.misses;
		return {
			hits: this.hits,
			misses: this.misses,
			writes: this.writes,
			hitRate: total > 0 ? this.hits / total : 0,
		};
	}
}
