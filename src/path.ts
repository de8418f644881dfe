import type { Accessor } from "./accessor.js";
import { KeyMissing, LookupError, type Segment } from "./errors.js";
import {
	LookupAccessor,
	type LookupAccessorOptions,
	type LookupStat,
} from "./lookup.js";
import {
	FilesystemAccessor,
	type FileStat,
	type FilesystemHandle,
} from "./os.js";
import { PurePath, SEPARATOR, type SegmentLike } from "./purepath.js";

/**
 * Path bound to an {@link Accessor} that knows how to resolve it.
 *
 * @remarks
 *
 * An `AccessorPath` is a {@link PurePath} plus a shared reference to one accessor. Joining, taking
 * the parent or computing a relative path returns a new bound path holding the same accessor, so
 * every path derived from a root reads the same backend (and, for lookups, shares its cache). The
 * path itself never holds a reference into the tree: each read goes back through the accessor with
 * the full segment sequence.
 *
 * Equality, ordering and {@link PurePath.hashKey} only consider the separator and parts, not the
 * accessor.
 *
 * @example Strict and safe access
 * ```ts
 * import { fromLookup } from "pathable-ts";
 *
 * const root = fromLookup({ parts: { part2: { name: "Part Two" } } });
 *
 * root.joinpath("parts", "part2", "name").readValue(); // 'Part Two'
 * root.joinpath("parts").get("missing"); // undefined
 * root.joinpath("parts").joinpathStrict("missing"); // throws KeyMissing
 * root.joinpath("name").prependpath("parts", "part2").readValue(); // 'Part Two'
 * ```
 */
export class AccessorPath<
	V = unknown,
	S = unknown,
	H = unknown,
	K extends Segment = Segment,
> extends PurePath {
	readonly accessor: Accessor<V, S, H, K>;

	constructor(
		accessor: Accessor<V, S, H, K>,
		...segments: Array<SegmentLike>
	) {
		super(...segments);
		this.accessor = accessor;
	}

	protected override newInstance(): this {
		const ctor = this.constructor as new (
			accessor: Accessor<V, S, H, K>,
		) => this;
		return new ctor(this.accessor);
	}

	/**
	 * Joins `segments` and checks that the result exists.
	 *
	 * @remarks
	 *
	 * Useful when chaining: the error names the first segment that does not resolve, instead of
	 * surfacing later from {@link AccessorPath.readValue}. Missing keys (including
	 * {@link FileNotFound}) are rethrown as they are; an out-of-range index or a non-container on the
	 * way is reported as a {@link KeyMissing} whose `cause` is the original error.
	 *
	 * @throws {@link KeyMissing} When the joined path does not exist.
	 */
	joinpathStrict(...segments: Array<SegmentLike>): this {
		return this.checked(this.joinpath(...segments));
	}

	/**
	 * Strict counterpart of {@link PurePath.prependpath}.
	 *
	 * @throws {@link KeyMissing} When the resulting path does not exist.
	 */
	prependpathStrict(...segments: Array<SegmentLike>): this {
		return this.checked(this.prependpath(...segments));
	}

	/**
	 * Value at this path.
	 *
	 * @throws {@link LookupError} When the path does not resolve.
	 */
	readValue(): V {
		return this.accessor.resolve(this.parts);
	}

	exists(): boolean {
		return this.accessor.exists(this.parts);
	}

	/**
	 * Value of the child `key`, or `defaultValue` when it does not resolve.
	 *
	 * @remarks
	 *
	 * Only resolution failures ({@link LookupError}) are turned into the default. A malformed key still
	 * throws `TypeError`, and I/O errors from a filesystem accessor still propagate.
	 */
	get(key: SegmentLike): V | undefined;
	get<D>(key: SegmentLike, defaultValue: D): V | D;
	get<D>(key: SegmentLike, defaultValue?: D): V | D | undefined {
		const child = this.joinpath(key);
		try {
			return child.readValue();
		} catch (error) {
			if (error instanceof LookupError) return defaultValue;
			throw error;
		}
	}

	/**
	 * Value of the child `key`, which must exist.
	 *
	 * @throws {@link KeyMissing} When the child does not exist.
	 */
	at(key: SegmentLike): V {
		return this.joinpathStrict(key).readValue();
	}

	/**
	 * Whether the child `key` exists. Never throws for a missing path.
	 */
	has(key: SegmentLike): boolean {
		return this.joinpath(key).exists();
	}

	keys(): K[] {
		return this.accessor.keys(this.parts);
	}

	items(): Array<[K, V]> {
		return this.accessor.items(this.parts);
	}

	values(): V[] {
		return this.accessor.values(this.parts);
	}

	/**
	 * Number of children.
	 *
	 * @throws {@link LookupError} When the path is missing or is not a container.
	 */
	size(): number {
		return this.accessor.length(this.parts);
	}

	isTraversable(): boolean {
		return this.accessor.isTraversable(this.parts);
	}

	stat(): S | null {
		return this.accessor.stat(this.parts);
	}

	/**
	 * Runs `use` with a handle on this path's node and releases the handle afterwards.
	 *
	 * @example
	 * ```ts
	 * const header = fromPath("/srv/app").joinpath("data.bin").open((handle) =>
	 *   handle.kind === "file" ? handle.readBytes().subarray(0, 4) : null,
	 * );
	 * ```
	 */
	open<R>(use: (handle: H) => R): R {
		return this.accessor.open(this.parts, use);
	}

	/**
	 * One bound path per child key, sharing this path's accessor.
	 *
	 * @remarks
	 *
	 * Keys are appended verbatim rather than re-parsed, so a mapping key that contains the separator
	 * still addresses that single key.
	 */
	children(): this[] {
		return this.keys().map((key) =>
			this.cloneWithParts([...this.parts, key]),
		);
	}

	[Symbol.iterator](): Iterator<this> {
		return this.children()[Symbol.iterator]();
	}

	private checked(path: this): this {
		try {
			this.accessor.validate(path.parts);
		} catch (error) {
			if (error instanceof KeyMissing) throw error;
			if (error instanceof LookupError) {
				const missing = new KeyMissing(error.segment, error.parts);
				missing.cause = error;
				throw missing;
			}
			throw error;
		}
		return path;
	}
}

/**
 * Bound path over an in-memory tree of `Map`s, plain objects and arrays.
 *
 * @remarks
 *
 * Cache controls live on the accessor: `path.accessor.clearCache()`, `disableCache()` and
 * `enableCache(maxsize)`. All paths derived from the same root share that accessor and its cache.
 */
export class LookupPath extends AccessorPath<unknown, LookupStat, unknown> {
	declare readonly accessor: LookupAccessor;

	constructor(accessor: LookupAccessor, ...segments: Array<SegmentLike>) {
		super(accessor, ...segments);
	}

	/**
	 * Wraps `tree` in a new {@link LookupAccessor} and returns its root path.
	 *
	 * @param tree - Root of the tree. Treated as fixed for the accessor's lifetime.
	 * @param separator - Separator used when parsing joined text segments.
	 * @param options - Initial cache settings.
	 */
	static fromLookup(
		tree: unknown,
		separator: string = SEPARATOR,
		options?: LookupAccessorOptions,
	): LookupPath {
		return new LookupPath(new LookupAccessor(tree, options)).withSeparator(
			separator,
		);
	}
}

/**
 * Bound path over files and directories below a base directory.
 *
 * @remarks
 *
 * Reads always hit the filesystem; {@link AccessorPath.exists} can change between two calls on the
 * same path.
 */
export class FilesystemPath extends AccessorPath<
	Buffer,
	FileStat,
	FilesystemHandle,
	string
> {
	declare readonly accessor: FilesystemAccessor;

	constructor(accessor: FilesystemAccessor, ...segments: Array<SegmentLike>) {
		super(accessor, ...segments);
	}

	/**
	 * Wraps `baseDirectory` in a new {@link FilesystemAccessor} and returns its root path.
	 */
	static fromPath(
		baseDirectory: string,
		separator: string = SEPARATOR,
	): FilesystemPath {
		return new FilesystemPath(
			new FilesystemAccessor(baseDirectory),
		).withSeparator(separator);
	}

	/**
	 * Absolute filesystem location of this path, whether or not it exists.
	 */
	toFilesystemPath(): string {
		return this.accessor.locate(this.parts);
	}
}

export function fromLookup(
	tree: unknown,
	separator: string = SEPARATOR,
	options?: LookupAccessorOptions,
): LookupPath {
	return LookupPath.fromLookup(tree, separator, options);
}

export function fromPath(
	baseDirectory: string,
	separator: string = SEPARATOR,
): FilesystemPath {
	return FilesystemPath.fromPath(baseDirectory, separator);
}
