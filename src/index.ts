/**
 * Immutable, composable paths into nested trees, resolved through pluggable accessors.
 *
 * @remarks
 *
 * The primary entry points are:
 *
 * - {@link PurePath} for lexical operations on segment sequences, without any backend.
 * - {@link AccessorPath} for paths bound to an {@link Accessor}, with {@link LookupPath} over in-memory
 *   `Map`/object/array trees and {@link FilesystemPath} over a base directory.
 * - {@link fromLookup} and {@link fromPath} to create root paths.
 *
 * Notes:
 *
 * 1. Joining is explicit: {@link PurePath.joinpath} never checks existence, while
 *    {@link AccessorPath.joinpathStrict} fails on the first missing segment.
 * 2. `open` takes a callback; the handle is released when the callback returns or throws.
 * 3. Resolution failures are distinct error classes ({@link KeyMissing}, {@link IndexOutOfRange},
 *    {@link NotIndexable}) sharing the {@link LookupError} base.
 */

import { NodeAccessor } from "./accessor.js";
import { LruCache } from "./cache.js";
import {
	EmptyPath,
	ErrnoError,
	FileNotFound,
	IndexOutOfRange,
	InvalidCacheSize,
	IsADirectory,
	KeyMissing,
	LookupError,
	NotIndexable,
	PathMismatch,
} from "./errors.js";
import { LookupAccessor } from "./lookup.js";
import { DirectoryHandle, FileHandle, FilesystemAccessor } from "./os.js";
import {
	AccessorPath,
	FilesystemPath,
	fromLookup,
	fromPath,
	LookupPath,
} from "./path.js";
import { PurePath } from "./purepath.js";

export type { Accessor } from "./accessor.js";
export { NodeAccessor } from "./accessor.js";
export { LruCache, validateMaxsize } from "./cache.js";
export {
	EmptyPath,
	ErrnoError,
	FileNotFound,
	IndexOutOfRange,
	InvalidCacheSize,
	IsADirectory,
	KeyMissing,
	LookupError,
	NotIndexable,
	PathMismatch,
} from "./errors.js";
export type {
	CacheInfo,
	LookupAccessorOptions,
	LookupKind,
	LookupStat,
} from "./lookup.js";
export {
	DEFAULT_CACHE_SIZE,
	isPlainRecord,
	kindOf,
	LookupAccessor,
} from "./lookup.js";
export type { FileKind, FilesystemHandle, FileStat } from "./os.js";
export { DirectoryHandle, FileHandle, FilesystemAccessor } from "./os.js";
export {
	AccessorPath,
	FilesystemPath,
	fromLookup,
	fromPath,
	LookupPath,
} from "./path.js";
export type { Segment, SegmentLike } from "./purepath.js";
export {
	compareSegments,
	PurePath,
	parseParts,
	SEPARATOR,
} from "./purepath.js";

export default {
	PurePath,
	AccessorPath,
	LookupPath,
	FilesystemPath,
	fromLookup,
	fromPath,
	NodeAccessor,
	LookupAccessor,
	FilesystemAccessor,
	FileHandle,
	DirectoryHandle,
	LruCache,
	LookupError,
	KeyMissing,
	FileNotFound,
	IndexOutOfRange,
	NotIndexable,
	EmptyPath,
	PathMismatch,
	InvalidCacheSize,
	ErrnoError,
	IsADirectory,
};
