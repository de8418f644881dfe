import { InvalidCacheSize } from "./errors.js";

/**
 * Checks a cache capacity, accepting positive integers and `Infinity` (unbounded).
 *
 * @throws {@link InvalidCacheSize} For zero, negative, fractional or `NaN` values.
 */
export function validateMaxsize(maxsize: number): number {
	if (maxsize === Number.POSITIVE_INFINITY) return maxsize;
	if (!Number.isSafeInteger(maxsize) || maxsize <= 0) {
		throw new InvalidCacheSize(maxsize);
	}
	return maxsize;
}

/**
 * Bounded map with least-recently-used eviction.
 *
 * @remarks
 *
 * Relies on `Map` keeping insertion order: a hit deletes and re-inserts the key so the first key in
 * iteration order is always the least recently used one. Values are boxed so a cached `undefined`
 * is still a hit; callers should use {@link LruCache.has} rather than testing what
 * {@link LruCache.get} returns.
 */
export class LruCache<K, V> {
	readonly #entries = new Map<K, { value: V }>();
	readonly #maxsize: number;

	constructor(maxsize: number) {
		this.#maxsize = validateMaxsize(maxsize);
	}

	get maxsize(): number {
		return this.#maxsize;
	}

	get size(): number {
		return this.#entries.size;
	}

	has(key: K): boolean {
		return this.#entries.has(key);
	}

	/**
	 * Returns the cached value and marks it most recently used.
	 */
	get(key: K): V | undefined {
		const entry = this.#entries.get(key);
		if (entry === undefined) return undefined;
		this.#entries.delete(key);
		this.#entries.set(key, entry);
		return entry.value;
	}

	/**
	 * Stores a value, evicting least recently used entries beyond capacity.
	 */
	set(key: K, value: V): void {
		this.#entries.delete(key);
		this.#entries.set(key, { value });
		while (this.#entries.size > this.#maxsize) {
			const oldest = this.#entries.keys().next();
			if (oldest.done) break;
			this.#entries.delete(oldest.value);
		}
	}

	delete(key: K): boolean {
		return this.#entries.delete(key);
	}

	clear(): void {
		this.#entries.clear();
	}

	/**
	 * Keys from least to most recently used.
	 */
	keys(): K[] {
		return [...this.#entries.keys()];
	}
}
