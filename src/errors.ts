import nodeos from "node:os";

/**
 * Single component of a path: a text token or an integer index.
 */
export type Segment = string | number;

/**
 * Render a segment the way error messages and diagnostics show it.
 *
 * @remarks
 *
 * Text is quoted so `"0"` and `0` stay distinguishable in messages.
 */
export function formatSegment(segment: Segment | undefined): string {
	if (segment === undefined) return "<root>";
	return typeof segment === "number" ? String(segment) : JSON.stringify(segment);
}

function formatParts(parts: readonly Segment[]): string {
	return `[${parts.map((part) => formatSegment(part)).join(", ")}]`;
}

/**
 * Base class for failures raised while walking a tree from its root.
 *
 * @remarks
 *
 * `segment` is the first segment that could not be applied and `parts` is the prefix that did
 * resolve before it. `segment` is `undefined` when the root itself is unusable (for example, a base
 * directory that does not exist).
 */
export class LookupError extends Error {
	readonly segment: Segment | undefined;
	readonly parts: readonly Segment[];

	constructor(
		message: string,
		segment: Segment | undefined,
		parts: readonly Segment[] = [],
	) {
		super(message);
		this.name = "LookupError";
		this.segment = segment;
		this.parts = Object.freeze([...parts]);
	}
}

/**
 * A mapping key or filesystem entry is absent.
 */
export class KeyMissing extends LookupError {
	constructor(segment: Segment | undefined, parts: readonly Segment[] = []) {
		super(
			`${formatSegment(segment)} not found under ${formatParts(parts)}`,
			segment,
			parts,
		);
		this.name = "KeyMissing";
	}
}

/**
 * A sequence index is negative or past the end.
 */
export class IndexOutOfRange extends LookupError {
	readonly length: number;

	constructor(segment: Segment, parts: readonly Segment[], length: number) {
		super(
			`index ${formatSegment(segment)} out of range for sequence of length ${length} at ${formatParts(parts)}`,
			segment,
			parts,
		);
		this.name = "IndexOutOfRange";
		this.length = length;
	}
}

/**
 * The node reached so far cannot be indexed by the next segment, or has no children to enumerate
 * (`segment` is then `undefined`).
 */
export class NotIndexable extends LookupError {
	constructor(
		segment: Segment | undefined,
		parts: readonly Segment[],
		reason = "node is not indexable",
	) {
		super(
			segment === undefined
				? `cannot enumerate children at ${formatParts(parts)}: ${reason}`
				: `cannot apply ${formatSegment(segment)} at ${formatParts(parts)}: ${reason}`,
			segment,
			parts,
		);
		this.name = "NotIndexable";
	}
}

/**
 * Raised when asking an empty path for its parent.
 */
export class EmptyPath extends Error {
	constructor(message = "empty path has no parent") {
		super(message);
		this.name = "EmptyPath";
	}
}

/**
 * Raised by `relativeTo` when the base is not a prefix or uses another separator.
 */
export class PathMismatch extends Error {
	constructor(message: string) {
		super(message);
		this.name = "PathMismatch";
	}
}

/**
 * Raised when a cache capacity is not a positive integer.
 */
export class InvalidCacheSize extends RangeError {
	readonly maxsize: number;

	constructor(maxsize: number) {
		super(`cache maxsize must be a positive integer, got ${maxsize}`);
		this.name = "InvalidCacheSize";
		this.maxsize = maxsize;
	}
}

/**
 * Small ErrnoError class that matches Node's ErrnoException shape.
 */
export class ErrnoError extends Error implements NodeJS.ErrnoException {
	errno?: number;
	code?: string;
	path?: string;

	constructor(message: string, code?: string | number, path?: string) {
		super(message);
		this.name = "ErrnoError";

		if (code !== undefined) {
			this.code = String(code);
			const n = mapCodeToErrno(code);
			if (n !== undefined) this.errno = n;
		}
		if (path !== undefined) this.path = path;
	}
}

/**
 * Raised by the filesystem accessor when a directory is read as a file.
 */
export class IsADirectory extends ErrnoError {
	constructor(path: string) {
		super(
			`EISDIR: illegal operation on a directory, read '${path}'`,
			"EISDIR",
			path,
		);
		this.name = "IsADirectory";
	}
}

/**
 * A filesystem entry is absent.
 *
 * @remarks
 *
 * Extends {@link KeyMissing} so strict joins and `get` treat missing files like missing keys, while
 * still exposing Node's errno fields.
 */
export class FileNotFound
	extends KeyMissing
	implements NodeJS.ErrnoException
{
	readonly code = "ENOENT";
	readonly errno?: number;
	readonly path: string;

	constructor(
		segment: Segment | undefined,
		parts: readonly Segment[],
		path: string,
	) {
		super(segment, parts);
		this.name = "FileNotFound";
		this.path = path;
		this.errno = mapCodeToErrno("ENOENT");
	}
}

export function mapCodeToErrno(code?: string | number): number | undefined {
	if (typeof code === "number") return code;
	if (!code) return undefined;
	// os.constants.errno holds positive values; Node reports them negated.
	const errnoMap = new Map<string, unknown>(
		Object.entries(nodeos.constants.errno),
	);
	const value = errnoMap.get(code);
	return typeof value === "number" ? -value : undefined;
}
