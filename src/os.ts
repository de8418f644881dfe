/**
 * Filesystem backend for accessor paths.
 *
 * Uses Node.js builtins only (node:fs, node:path). Nothing here is cached: every call stats the
 * entries again, so two calls on the same path may disagree when the filesystem changes in
 * between.
 */

import fs, { type Dir, type Stats } from "node:fs";
import nodepath from "node:path";
import { NodeAccessor } from "./accessor.js";
import {
	FileNotFound,
	IsADirectory,
	LookupError,
	NotIndexable,
	type Segment,
} from "./errors.js";
import { isErrnoCode } from "./util.js";

export type FileKind = "file" | "directory" | "symlink" | "other";

/**
 * Metadata reported by {@link FilesystemAccessor.stat}.
 *
 * @remarks
 *
 * Taken from `lstat`, so a symlink is reported as `"symlink"` rather than as its target.
 */
export interface FileStat {
	readonly kind: FileKind;
	readonly size: number;
	readonly mode: number;
	readonly mtimeMs: number;
}

function kindOfStats(stats: Stats): FileKind {
	if (stats.isSymbolicLink()) return "symlink";
	if (stats.isDirectory()) return "directory";
	if (stats.isFile()) return "file";
	return "other";
}

/**
 * Open regular file passed to the callback of {@link FilesystemAccessor.open}.
 *
 * @remarks
 *
 * The descriptor is closed by the accessor once the callback returns or throws; do not keep the
 * handle around after that.
 */
export class FileHandle {
	readonly kind = "file";
	readonly path: string;
	readonly fd: number;

	constructor(path: string, fd: number) {
		this.path = path;
		this.fd = fd;
	}

	/**
	 * Reads the whole file from the current position.
	 */
	readBytes(): Buffer {
		return fs.readFileSync(this.fd);
	}

	stat(): Stats {
		return fs.fstatSync(this.fd);
	}
}

/**
 * Open directory passed to the callback of {@link FilesystemAccessor.open}.
 */
export class DirectoryHandle {
	readonly kind = "directory";
	readonly path: string;
	readonly dir: Dir;

	constructor(path: string, dir: Dir) {
		this.path = path;
		this.dir = dir;
	}

	/**
	 * Remaining entry names, sorted. The underlying `fs.Dir` is consumed.
	 */
	names(): string[] {
		const names: string[] = [];
		for (let entry = this.dir.readSync(); entry; entry = this.dir.readSync()) {
			names.push(entry.name);
		}
		return names.sort();
	}
}

export type FilesystemHandle = FileHandle | DirectoryHandle;

/**
 * Accessor that resolves segments against entries below a base directory.
 *
 * @remarks
 *
 * Segments are rendered as text and joined onto {@link FilesystemAccessor.root} one at a time, so a
 * failure names the first segment that could not be applied:
 *
 * - a missing entry raises {@link FileNotFound} (a `KeyMissing`);
 * - descending through something other than a directory raises {@link NotIndexable};
 * - resolving a directory raises {@link IsADirectory}.
 *
 * Segments go through `node:path` joining, so `..` steps up a level and can leave
 * {@link FilesystemAccessor.root}; nothing confines a path to the base directory.
 *
 * Files resolve to their raw bytes; no text decoding happens here. Traversal follows symlinks,
 * whereas {@link FilesystemAccessor.stat} reports the entry itself. Other I/O errors (permissions,
 * `EMFILE`, ...) propagate unchanged from `node:fs`.
 *
 * @example Reading a file below a directory
 * ```ts
 * const accessor = new FilesystemAccessor("/srv/app");
 *
 * accessor.exists(["config", "app.json"]); // true
 * accessor.resolve(["config", "app.json"]).toString("utf8");
 * accessor.keys(["config"]); // ['app.json', 'logging.json']
 * ```
 */
export class FilesystemAccessor extends NodeAccessor<
	string,
	Buffer,
	FileStat,
	FilesystemHandle,
	string
> {
	constructor(root: string) {
		super(nodepath.resolve(root));
	}

	/**
	 * Absolute location `parts` maps to, whether or not it exists.
	 */
	locate(parts: readonly Segment[]): string {
		return nodepath.join(this.root, ...parts.map(String));
	}

	stat(parts: readonly Segment[]): FileStat | null {
		let target: string;
		try {
			target = this.walk(parts);
		} catch (error) {
			if (error instanceof LookupError) return null;
			throw error;
		}
		const stats = fs.lstatSync(target, { throwIfNoEntry: false });
		if (!stats) return null;
		return {
			kind: kindOfStats(stats),
			size: stats.size,
			mode: stats.mode,
			mtimeMs: stats.mtimeMs,
		};
	}

	/**
	 * Opens the file or directory at `parts` for the duration of `use`.
	 *
	 * @remarks
	 *
	 * Files are opened read-only and passed as a {@link FileHandle}; directories are passed as a
	 * {@link DirectoryHandle}. The descriptor or directory stream is closed in a `finally` block.
	 */
	open<R>(parts: readonly Segment[], use: (handle: FilesystemHandle) => R): R {
		const target = this.walk(parts);
		if (fs.statSync(target).isDirectory()) {
			const dir = fs.opendirSync(target);
			try {
				return use(new DirectoryHandle(target, dir));
			} finally {
				dir.closeSync();
			}
		}
		const fd = fs.openSync(target, "r");
		try {
			return use(new FileHandle(target, fd));
		} finally {
			fs.closeSync(fd);
		}
	}

	protected override walk(parts: readonly Segment[]): string {
		if (!this.statEntry(this.root)) {
			throw new FileNotFound(undefined, [], this.root);
		}
		return super.walk(parts);
	}

	protected child(
		node: string,
		segment: Segment,
		at: readonly Segment[],
	): string {
		if (!this.isContainer(node)) {
			throw new NotIndexable(segment, at, "not a directory");
		}
		const target = nodepath.join(node, String(segment));
		if (!this.statEntry(target)) throw new FileNotFound(segment, at, target);
		return target;
	}

	protected childKeys(node: string, at: readonly Segment[]): string[] {
		if (!fs.statSync(node).isDirectory()) {
			throw new NotIndexable(undefined, at, "not a directory");
		}
		return fs.readdirSync(node).sort();
	}

	protected isContainer(node: string): boolean {
		return fs.statSync(node).isDirectory();
	}

	protected readNode(node: string): Buffer {
		if (fs.statSync(node).isDirectory()) throw new IsADirectory(node);
		return fs.readFileSync(node);
	}

	/**
	 * `fs.statSync` that reports a missing entry as `undefined`. A path below a regular file
	 * (`ENOTDIR`) and a symlink loop (`ELOOP`) count as missing too.
	 */
	private statEntry(target: string): Stats | undefined {
		try {
			return fs.statSync(target, { throwIfNoEntry: false });
		} catch (error) {
			if (isErrnoCode(error, "ENOTDIR") || isErrnoCode(error, "ELOOP")) {
				return undefined;
			}
			throw error;
		}
	}
}
