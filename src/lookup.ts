import { NodeAccessor } from "./accessor.js";
import { LruCache } from "./cache.js";
import {
	IndexOutOfRange,
	KeyMissing,
	LookupError,
	NotIndexable,
	type Segment,
} from "./errors.js";
import { isSegment, partsKey } from "./util.js";

/**
 * Capacity used when caching is enabled without an explicit size.
 */
export const DEFAULT_CACHE_SIZE = 128;

export type LookupKind = "mapping" | "sequence" | "scalar";

/**
 * Metadata reported by {@link LookupAccessor.stat}.
 *
 * @remarks
 *
 * `length` counts children for mappings and sequences, characters for strings, and is `null` for
 * every other scalar.
 */
export interface LookupStat {
	readonly kind: LookupKind;
	readonly length: number | null;
}

export interface CacheInfo {
	readonly enabled: boolean;
	readonly maxsize: number;
	readonly size: number;
}

export interface LookupAccessorOptions {
	/**
	 * Set to `false` to start with caching disabled.
	 */
	cache?: boolean;
	maxsize?: number;
}

/**
 * Plain object whose own string keys act as mapping keys.
 *
 * @remarks
 *
 * Class instances are treated as scalars, so a tree holding a `Date` or a custom object does not
 * expose its internals as children.
 */
export function isPlainRecord(value: unknown): value is Record<string, unknown> {
	if (typeof value !== "object" || value === null) return false;
	const proto = Object.getPrototypeOf(value);
	return proto === Object.prototype || proto === null;
}

export function kindOf(node: unknown): LookupKind {
	if (node instanceof Map || isPlainRecord(node)) return "mapping";
	if (Array.isArray(node)) return "sequence";
	return "scalar";
}

function describeScalar(node: unknown): string {
	if (node === null) return "null";
	if (typeof node === "object") return "object";
	return typeof node;
}

/**
 * Accessor over an in-memory tree of mappings (`Map` or plain objects) and sequences (arrays).
 *
 * @remarks
 *
 * The tree is fixed at construction; to point at a different tree, construct a new accessor.
 * Resolved nodes are memoised per instance in an {@link LruCache} keyed by the full segment
 * sequence, so repeated reads of the same path do not walk the tree again. The cache is never
 * invalidated by mutations of the tree: callers that mutate it must call
 * {@link LookupAccessor.clearCache} or build a new accessor. The cache is not safe for concurrent
 * use from several workers sharing the same instance.
 *
 * Mapping keys are type-sensitive: a `Map` can hold both `0` and `"0"`. Plain objects only have text
 * keys, so an integer segment never matches one of their properties.
 *
 * @example Reading through the cache
 * ```ts
 * const accessor = new LookupAccessor({ users: [{ name: "Ada" }] });
 *
 * accessor.resolve(["users", 0, "name"]); // 'Ada', walks the tree
 * accessor.resolve(["users", 0, "name"]); // 'Ada', served from the cache
 * accessor.enableCache(16); // fresh, empty cache holding at most 16 paths
 * ```
 */
export class LookupAccessor<T = unknown> extends NodeAccessor<
	unknown,
	unknown,
	LookupStat,
	unknown
> {
	declare readonly root: T;
	#cacheEnabled: boolean;
	#cache: LruCache<string, unknown>;

	constructor(root: T, options: LookupAccessorOptions = {}) {
		super(root);
		this.#cacheEnabled = options.cache ?? true;
		this.#cache = new LruCache(options.maxsize ?? DEFAULT_CACHE_SIZE);
	}

	/**
	 * Drops every cached node. Caching stays enabled or disabled as it was.
	 */
	clearCache(): void {
		this.#cache.clear();
	}

	/**
	 * Stops caching and drops every cached node.
	 */
	disableCache(): void {
		this.#cacheEnabled = false;
		this.#cache.clear();
	}

	/**
	 * Starts caching with an empty cache.
	 *
	 * @param maxsize - Positive integer capacity, or `Infinity` for an unbounded cache.
	 * @throws {@link InvalidCacheSize} When `maxsize` is not a positive integer.
	 */
	enableCache(maxsize: number = DEFAULT_CACHE_SIZE): void {
		this.#cache = new LruCache(maxsize);
		this.#cacheEnabled = true;
	}

	cacheInfo(): CacheInfo {
		return {
			enabled: this.#cacheEnabled,
			maxsize: this.#cache.maxsize,
			size: this.#cache.size,
		};
	}

	/**
	 * Keys currently cached, least recently used first.
	 */
	cachedPaths(): Segment[][] {
		return this.#cache.keys().map((key) => {
			const parsed: unknown = JSON.parse(key);
			return Array.isArray(parsed) ? parsed.filter(isSegment) : [];
		});
	}

	stat(parts: readonly Segment[]): LookupStat | null {
		let node: unknown;
		try {
			node = this.walk(parts);
		} catch (error) {
			if (error instanceof LookupError) return null;
			throw error;
		}
		const kind = kindOf(node);
		if (node instanceof Map) return { kind, length: node.size };
		if (isPlainRecord(node)) return { kind, length: Object.keys(node).length };
		if (Array.isArray(node)) return { kind, length: node.length };
		if (typeof node === "string") return { kind, length: node.length };
		return { kind, length: null };
	}

	/**
	 * Passes the node itself to `use`; nothing needs releasing.
	 */
	open<R>(parts: readonly Segment[], use: (handle: unknown) => R): R {
		return use(this.resolve(parts));
	}

	protected override walk(parts: readonly Segment[]): unknown {
		if (!this.#cacheEnabled || parts.length === 0) return super.walk(parts);
		const key = partsKey(parts);
		if (this.#cache.has(key)) return this.#cache.get(key);
		const node = super.walk(parts);
		this.#cache.set(key, node);
		return node;
	}

	protected child(
		node: unknown,
		segment: Segment,
		at: readonly Segment[],
	): unknown {
		if (node instanceof Map) {
			if (!node.has(segment)) throw new KeyMissing(segment, at);
			return node.get(segment);
		}
		if (isPlainRecord(node)) {
			if (typeof segment !== "string" || !Object.hasOwn(node, segment)) {
				throw new KeyMissing(segment, at);
			}
			return node[segment];
		}
		if (Array.isArray(node)) {
			if (typeof segment !== "number") {
				throw new NotIndexable(
					segment,
					at,
					"sequence indices must be integers",
				);
			}
			if (segment < 0 || segment >= node.length) {
				throw new IndexOutOfRange(segment, at, node.length);
			}
			return node[segment];
		}
		throw new NotIndexable(
			segment,
			at,
			`${describeScalar(node)} is not indexable`,
		);
	}

	protected childKeys(node: unknown, at: readonly Segment[]): Segment[] {
		if (node instanceof Map) return [...node.keys()].filter(isSegment);
		if (isPlainRecord(node)) return Object.keys(node);
		if (Array.isArray(node)) return node.map((_, index) => index);
		throw new NotIndexable(
			undefined,
			at,
			`${describeScalar(node)} has no children`,
		);
	}

	protected isContainer(node: unknown): boolean {
		return kindOf(node) !== "scalar";
	}

	protected readNode(node: unknown): unknown {
		return node;
	}
}
