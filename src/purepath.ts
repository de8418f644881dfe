import { EmptyPath, formatSegment, PathMismatch, type Segment } from "./errors.js";

export type { Segment } from "./errors.js";

/**
 * Default separator used when none is supplied.
 */
export const SEPARATOR = "/";

/**
 * Union of inputs accepted wherever segments are combined.
 *
 * @remarks
 *
 * Text may contain separators and is split on them; integers are kept as integer segments; another
 * {@link PurePath} contributes its already-parsed parts. `null` and `undefined` are dropped, which
 * lets callers pass optional segments without branching.
 */
export type SegmentLike = Segment | PurePath | null | undefined;

function assertSeparator(separator: string): void {
	if (typeof separator !== "string" || separator.length !== 1) {
		throw new TypeError(
			`separator must be a single character, got ${JSON.stringify(separator)}`,
		);
	}
}

function describeValue(value: unknown): string {
	if (value === null) return "null";
	if (typeof value === "object") return "object";
	return `${typeof value} ${String(value)}`;
}

/**
 * Normalizes raw segments into canonical parts.
 *
 * @remarks
 *
 * Text segments are split on `separator`; empty fragments and `.` are dropped. Integers are
 * preserved as numbers and text is never converted to an integer, so `parseParts(["0"])` and
 * `parseParts([0])` stay distinct. `..` carries no special meaning and is kept.
 *
 * @param segments - Raw segments in order.
 * @param separator - Single-character separator used for splitting.
 * @returns A fresh array of canonical segments.
 * @throws {@link TypeError} For non-integer numbers, booleans, or other unsupported values.
 *
 * @example
 * ```ts
 * parseParts(["a/b", 0, ".", null, "c"]); // ["a", "b", 0, "c"]
 * ```
 */
export function parseParts(
	segments: Iterable<SegmentLike>,
	separator: string = SEPARATOR,
): Segment[] {
	assertSeparator(separator);
	const parsed: Segment[] = [];
	for (const segment of segments) {
		if (segment === null || segment === undefined) continue;
		if (segment instanceof PurePath) {
			parsed.push(...segment.parts);
			continue;
		}
		if (typeof segment === "number") {
			if (!Number.isSafeInteger(segment)) {
				throw new TypeError(
					`integer segments must be safe integers, got ${segment}`,
				);
			}
			// -0 and 0 would otherwise be distinct map keys but render the same
			parsed.push(segment === 0 ? 0 : segment);
			continue;
		}
		if (typeof segment !== "string") {
			throw new TypeError(
				`segment must be a string, an integer or a PurePath, got ${describeValue(segment)}`,
			);
		}
		for (const fragment of segment.split(separator)) {
			if (fragment && fragment !== ".") parsed.push(fragment);
		}
	}
	return parsed;
}

/**
 * Total order over segments.
 *
 * @remarks
 *
 * Integers sort before text. Integers compare numerically and text compares by UTF-16 code unit,
 * which keeps the order independent of locale settings.
 *
 * @returns A negative number, zero, or a positive number.
 */
export function compareSegments(left: Segment, right: Segment): number {
	if (typeof left === "number") {
		if (typeof right !== "number") return -1;
		return left === right ? 0 : left < right ? -1 : 1;
	}
	if (typeof right === "number") return 1;
	return compareStrings(left, right);
}

function compareStrings(left: string, right: string): number {
	if (left === right) return 0;
	return left < right ? -1 : 1;
}

function sameParts(left: readonly Segment[], right: readonly Segment[]): boolean {
	if (left.length !== right.length) return false;
	return left.every((part, index) => part === right[index]);
}

function splitStemSuffix(name: string): [string, string] {
	if (name === "" || name === "..") return [name, ""];
	const dot = name.lastIndexOf(".");
	if (dot <= 0) return [name, ""];
	return [name.slice(0, dot), name.slice(dot)];
}

/**
 * Immutable path made of segments that never performs I/O.
 *
 * @remarks
 *
 * A `PurePath` is a value: its parts, rendered string and {@link PurePath.hashKey} are computed once
 * in the constructor and every operation that looks like a mutation returns a new instance. Because
 * it knows nothing about any backend, the same value can be compared, stored in a `Map` through
 * its `hashKey`, and reused against any accessor. {@link AccessorPath} layers resolution on top.
 *
 * Segments are type-sensitive: `new PurePath(0)` and `new PurePath("0")` render the same string but
 * are not equal and have different hash keys.
 *
 * @example Building and comparing paths
 * ```ts
 * import { PurePath } from "pathable-ts";
 *
 * const users = PurePath.parse("data/users");
 * const first = users.joinpath(0, "name");
 *
 * console.log(first.toString()); // 'data/users/0/name'
 * console.log(first.relativeTo(users).parts); // [0, 'name']
 * ```
 */
export class PurePath {
	#separator = SEPARATOR;
	#parts: readonly Segment[] = [];
	#hashKey = "";
	#rendered = "";

	constructor(...segments: Array<SegmentLike>) {
		this.#assign(parseParts(segments, SEPARATOR), SEPARATOR);
	}

	get separator(): string {
		return this.#separator;
	}

	/**
	 * Canonical segments, frozen.
	 */
	get parts(): readonly Segment[] {
		return this.#parts;
	}

	/**
	 * Stable string key over the separator and the typed parts, usable as a `Map` key.
	 */
	get hashKey(): string {
		return this.#hashKey;
	}

	/**
	 * Creates a path from a string (or other segments) using a custom separator.
	 *
	 * @example
	 * ```ts
	 * PurePath.parse("a.b.c", ".").parts; // ["a", "b", "c"]
	 * ```
	 */
	static parse(input: SegmentLike, separator: string = SEPARATOR): PurePath {
		return PurePath.fromParts([input], separator);
	}

	/**
	 * Creates a path from several segments using a custom separator.
	 */
	static fromParts(
		segments: Iterable<SegmentLike>,
		separator: string = SEPARATOR,
	): PurePath {
		return new PurePath().cloneWithParts(
			parseParts(segments, separator),
			separator,
		);
	}

	/**
	 * Comparator suitable for `Array.prototype.sort`.
	 */
	static compare(left: PurePath, right: PurePath): number {
		return left.compareTo(right);
	}

	/**
	 * Empty instance of the same concrete type. Subclasses whose constructor takes more than
	 * segments override this to pass their own state along.
	 */
	protected newInstance(): this {
		const ctor = this.constructor as new () => this;
		return new ctor();
	}

	/**
	 * Creates a new instance of the same concrete type holding already-canonical parts.
	 *
	 * @remarks
	 *
	 * Every derived path (joins, parents, relative paths) goes through this hook, so the result keeps
	 * the concrete subclass and whatever {@link PurePath.newInstance} carries over.
	 */
	protected cloneWithParts(
		parts: readonly Segment[],
		separator: string = this.separator,
	): this {
		const instance = this.newInstance();
		instance.#assign(parts, separator);
		return instance;
	}

	#assign(parts: readonly Segment[], separator: string): void {
		const frozen = Object.freeze([...parts]);
		this.#separator = separator;
		this.#parts = frozen;
		this.#hashKey = JSON.stringify([separator, frozen]);
		this.#rendered = frozen.map(String).join(separator);
	}

	/**
	 * Returns the same parts under another separator.
	 *
	 * @remarks
	 *
	 * Parts are not re-split: `PurePath.parse("a.b").withSeparator(".")` has the single part `"a.b"`
	 * and renders as `a.b`, but later joins split on `.`.
	 */
	withSeparator(separator: string): this {
		assertSeparator(separator);
		if (separator === this.separator) return this;
		return this.cloneWithParts(this.parts, separator);
	}

	/**
	 * Produces a new path by appending segments to the current instance.
	 *
	 * @remarks
	 *
	 * Text segments are split on this path's separator. The return type preserves the concrete
	 * subclass.
	 *
	 * @param segments - Segments to append in order.
	 * @returns A new path with the appended segments.
	 */
	joinpath(...segments: Array<SegmentLike>): this {
		const extra = parseParts(segments, this.separator);
		if (extra.length === 0) return this;
		return this.cloneWithParts([...this.parts, ...extra]);
	}

	/**
	 * Produces a new path with `segments` placed in front of the current parts.
	 *
	 * @example
	 * ```ts
	 * new PurePath("name").prependpath("users", 0).parts; // ["users", 0, "name"]
	 * ```
	 */
	prependpath(...segments: Array<SegmentLike>): this {
		const extra = parseParts(segments, this.separator);
		if (extra.length === 0) return this;
		return this.cloneWithParts([...extra, ...this.parts]);
	}

	/**
	 * Returns the path without its last segment.
	 *
	 * @throws {@link EmptyPath} When the path has no segments.
	 */
	get parent(): this {
		if (this.parts.length === 0) throw new EmptyPath();
		return this.cloneWithParts(this.parts.slice(0, -1));
	}

	/**
	 * Ancestors of the path, nearest first, ending with the empty path.
	 */
	get parents(): this[] {
		const result: this[] = [];
		for (let size = this.parts.length - 1; size >= 0; size -= 1) {
			result.push(this.cloneWithParts(this.parts.slice(0, size)));
		}
		return result;
	}

	/**
	 * Final segment rendered as text, or `""` for the empty path.
	 */
	get name(): string {
		const last = this.parts.at(-1);
		return last === undefined ? "" : String(last);
	}

	/**
	 * Rightmost suffix of {@link PurePath.name}, including the leading dot.
	 */
	get suffix(): string {
		return splitStemSuffix(this.name)[1];
	}

	/**
	 * All suffixes of the final segment in left-to-right order.
	 *
	 * @example
	 * ```ts
	 * new PurePath("archive.tar.gz").suffixes; // [".tar", ".gz"]
	 * ```
	 */
	get suffixes(): string[] {
		let name = this.name;
		if (name === "" || name === "..") return [];
		if (name.startsWith(".")) {
			name = name.slice(1);
			if (!name.includes(".")) return [];
		}
		return name
			.split(".")
			.slice(1)
			.map((fragment) => `.${fragment}`);
	}

	get stem(): string {
		return splitStemSuffix(this.name)[0];
	}

	/**
	 * Returns a new path with the final segment replaced.
	 *
	 * @throws {@link Error} If the path is empty, or `name` is empty or contains the separator.
	 */
	withName(name: string): this {
		if (this.parts.length === 0) {
			throw new Error(`${this.toString()} has an empty name`);
		}
		if (!name || name === "." || name.includes(this.separator)) {
			throw new Error(`Invalid name ${JSON.stringify(name)}`);
		}
		return this.cloneWithParts([...this.parts.slice(0, -1), name]);
	}

	/**
	 * Returns a new path with the suffix of the final segment changed.
	 *
	 * @remarks
	 *
	 * Pass `""` to strip the suffix.
	 *
	 * @throws {@link Error} If `suffix` is non-empty and does not start with a dot.
	 */
	withSuffix(suffix: string): this {
		if (suffix && (!suffix.startsWith(".") || suffix === ".")) {
			throw new Error(`Invalid suffix ${JSON.stringify(suffix)}`);
		}
		const name = this.name;
		if (name === "" || name === "..") {
			throw new Error(`${this.toString()} has an empty name`);
		}
		return this.withName(`${this.stem}${suffix}`);
	}

	/**
	 * Returns the segments that follow `base`.
	 *
	 * @remarks
	 *
	 * Purely positional: `base.parts` must be a prefix of `this.parts`. Paths using different
	 * separators never relate, even when their parts match. Text bases are parsed with this path's
	 * separator.
	 *
	 * @throws {@link PathMismatch} When `base` is not a prefix or the separators differ.
	 */
	relativeTo(base: SegmentLike): this {
		const target = this.coerce(base);
		if (target.separator !== this.separator) {
			throw new PathMismatch(
				`${JSON.stringify(this.toString())} uses separator ${JSON.stringify(this.separator)} but ${JSON.stringify(target.toString())} uses ${JSON.stringify(target.separator)}`,
			);
		}
		const prefix = this.parts.slice(0, target.parts.length);
		if (
			target.parts.length > this.parts.length ||
			!sameParts(prefix, target.parts)
		) {
			throw new PathMismatch(
				`${JSON.stringify(this.toString())} is not in the subpath of ${JSON.stringify(target.toString())}`,
			);
		}
		return this.cloneWithParts(this.parts.slice(target.parts.length));
	}

	/**
	 * Returns `true` when {@link PurePath.relativeTo} would succeed.
	 */
	isRelativeTo(base: SegmentLike): boolean {
		const target = this.coerce(base);
		if (target.separator !== this.separator) return false;
		if (target.parts.length > this.parts.length) return false;
		return sameParts(this.parts.slice(0, target.parts.length), target.parts);
	}

	equals(other: unknown): boolean {
		if (!(other instanceof PurePath)) return false;
		return (
			this.separator === other.separator && sameParts(this.parts, other.parts)
		);
	}

	/**
	 * Orders paths by separator, then by parts.
	 *
	 * @remarks
	 *
	 * Segment comparison uses {@link compareSegments}, so mixed integer and text parts never throw
	 * and always produce the same order.
	 *
	 * @returns `-1`, `0` or `1`.
	 */
	compareTo(other: PurePath): -1 | 0 | 1 {
		const bySeparator = compareStrings(this.separator, other.separator);
		if (bySeparator !== 0) return bySeparator < 0 ? -1 : 1;
		const shared = Math.min(this.parts.length, other.parts.length);
		for (let index = 0; index < shared; index += 1) {
			const left = this.parts[index];
			const right = other.parts[index];
			if (left === undefined || right === undefined) break;
			const order = compareSegments(left, right);
			if (order !== 0) return order < 0 ? -1 : 1;
		}
		if (this.parts.length === other.parts.length) return 0;
		return this.parts.length < other.parts.length ? -1 : 1;
	}

	/**
	 * Renders the path with `/`, whatever its separator.
	 */
	asPosix(): string {
		return this.parts.map(String).join("/");
	}

	toString(): string {
		return this.#rendered;
	}

	valueOf(): string {
		return this.toString();
	}

	toJSON(): string {
		return this.toString();
	}

	[Symbol.toPrimitive](): string {
		return this.toString();
	}

	/**
	 * Debug form, e.g. `PurePath("a/0")` with integer parts listed.
	 */
	inspect(): string {
		const parts = this.parts.map((part) => formatSegment(part)).join(", ");
		return `${this.constructor.name}(${JSON.stringify(this.#rendered)}; [${parts}])`;
	}

	private coerce(value: SegmentLike): PurePath {
		if (value instanceof PurePath) return value;
		return PurePath.fromParts([value], this.separator);
	}
}
