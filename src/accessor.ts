import { LookupError, type Segment } from "./errors.js";

/**
 * Capability a backend implements so {@link AccessorPath} can resolve segments against it.
 *
 * @remarks
 *
 * An accessor holds only its root (an in-memory tree, a base directory, ...). It never keeps state
 * about a particular path: every call receives the full segment sequence from the root. Bound
 * paths depend on this interface alone, so a new backend only needs to implement it.
 *
 * Type parameters:
 * - `V` is what {@link Accessor.resolve} returns.
 * - `S` is the metadata record returned by {@link Accessor.stat}.
 * - `H` is the handle passed to the callback of {@link Accessor.open}.
 * - `K` is the type of the child keys reported by {@link Accessor.keys}.
 */
export interface Accessor<V, S, H, K extends Segment = Segment> {
	/**
	 * Whether `parts` resolves. Never throws for missing or unresolvable paths.
	 */
	exists(parts: readonly Segment[]): boolean;
	/**
	 * Walks `parts` without reading the value.
	 *
	 * @throws {@link LookupError} For the first segment that cannot be applied.
	 */
	validate(parts: readonly Segment[]): void;
	/**
	 * Walks from the root and returns the value at `parts`.
	 *
	 * @throws {@link LookupError} For the first segment that cannot be applied.
	 */
	resolve(parts: readonly Segment[]): V;
	keys(parts: readonly Segment[]): K[];
	items(parts: readonly Segment[]): Array<[K, V]>;
	values(parts: readonly Segment[]): V[];
	/**
	 * Small metadata record, or `null` when `parts` does not resolve.
	 */
	stat(parts: readonly Segment[]): S | null;
	/**
	 * Acquires a handle on the node at `parts`, passes it to `use`, and releases it afterwards,
	 * whether `use` returns or throws.
	 */
	open<R>(parts: readonly Segment[], use: (handle: H) => R): R;
	contains(parts: readonly Segment[], key: Segment): boolean;
	isTraversable(parts: readonly Segment[]): boolean;
	length(parts: readonly Segment[]): number;
}

/**
 * Shared traversal for accessors that reach a value by stepping from node to node.
 *
 * @remarks
 *
 * Subclasses describe a single step ({@link NodeAccessor.child}), how to list the children of a
 * node ({@link NodeAccessor.childKeys}) and how to turn a node into a value
 * ({@link NodeAccessor.readNode}). Everything else in {@link Accessor} is derived here: `exists`
 * and `contains` catch {@link LookupError} only, so I/O failures such as `EACCES` still reach the
 * caller.
 */
export abstract class NodeAccessor<N, V, S, H, K extends Segment = Segment>
	implements Accessor<V, S, H, K>
{
	readonly root: N;

	constructor(root: N) {
		this.root = root;
	}

	/**
	 * Applies one segment to `node`. `at` is the prefix that led to `node`.
	 *
	 * @throws {@link LookupError} When `segment` cannot be applied.
	 */
	protected abstract child(node: N, segment: Segment, at: readonly Segment[]): N;

	/**
	 * Lists the child keys of `node`.
	 *
	 * @throws {@link NotIndexable} When `node` is not a container.
	 */
	protected abstract childKeys(node: N, at: readonly Segment[]): K[];

	protected abstract isContainer(node: N): boolean;

	protected abstract readNode(node: N, parts: readonly Segment[]): V;

	abstract stat(parts: readonly Segment[]): S | null;

	abstract open<R>(parts: readonly Segment[], use: (handle: H) => R): R;

	protected walk(parts: readonly Segment[]): N {
		let current = this.root;
		for (let index = 0; index < parts.length; index += 1) {
			const segment = parts[index];
			if (segment === undefined) break;
			current = this.child(current, segment, parts.slice(0, index));
		}
		return current;
	}

	validate(parts: readonly Segment[]): void {
		this.walk(parts);
	}

	exists(parts: readonly Segment[]): boolean {
		try {
			this.walk(parts);
			return true;
		} catch (error) {
			if (error instanceof LookupError) return false;
			throw error;
		}
	}

	resolve(parts: readonly Segment[]): V {
		return this.readNode(this.walk(parts), parts);
	}

	keys(parts: readonly Segment[]): K[] {
		return this.childKeys(this.walk(parts), parts);
	}

	items(parts: readonly Segment[]): Array<[K, V]> {
		return this.keys(parts).map((key): [K, V] => [
			key,
			this.resolve([...parts, key]),
		]);
	}

	values(parts: readonly Segment[]): V[] {
		return this.keys(parts).map((key) => this.resolve([...parts, key]));
	}

	contains(parts: readonly Segment[], key: Segment): boolean {
		return this.exists([...parts, key]);
	}

	isTraversable(parts: readonly Segment[]): boolean {
		let node: N;
		try {
			node = this.walk(parts);
		} catch (error) {
			if (error instanceof LookupError) return false;
			throw error;
		}
		return this.isContainer(node);
	}

	length(parts: readonly Segment[]): number {
		return this.keys(parts).length;
	}
}
