import type { Segment } from "./errors.js";

/**
 * Narrow an unknown thrown value to a Node errno exception with the given code.
 *
 * @example Treating a missing file as absent
 * ```ts
 * try {
 *   fs.statSync(target);
 * } catch (error) {
 *   if (!isErrnoCode(error, "ENOENT")) throw error;
 * }
 * ```
 */
export function isErrnoCode(
	error: unknown,
	code: string,
): error is NodeJS.ErrnoException {
	return error instanceof Error && "code" in error && error.code === code;
}

/**
 * Returns `true` for values usable as a path segment: text or a safe integer.
 */
export function isSegment(value: unknown): value is Segment {
	return typeof value === "string" || Number.isSafeInteger(value);
}

/**
 * Stable string key for a segment sequence.
 *
 * @remarks
 *
 * `JSON.stringify` keeps the distinction between `0` and `"0"`, so the key is type-sensitive.
 */
export function partsKey(parts: readonly Segment[]): string {
	return JSON.stringify(parts);
}
