import fs from "node:fs";
import os from "node:os";
import nodepath from "node:path";

export type Sandbox = {
	root: string;
	cleanup: () => void;
	canSymlink: boolean;
};

export function makeSandbox(prefix = "pathable-ts-"): Sandbox {
	const base = fs.mkdtempSync(nodepath.join(os.tmpdir(), prefix));
	const cleanup = () => {
		fs.rmSync(base, { recursive: true, force: true });
	};

	let canSymlink = true;
	function setup() {
		// base/
		//   fileA            "hello A\n"
		//   dirB/
		//     fileB          "hello B\n"
		//   dirC/
		//     dirD/
		//       fileD        "hello D\n"
		//     novel.txt      "lorem ipsum\n"
		//   linkA -> fileA (if possible)
		//   brokenLink -> non-existing (if possible)
		fs.mkdirSync(nodepath.join(base, "dirB"), { recursive: true });
		fs.mkdirSync(nodepath.join(base, "dirC", "dirD"), { recursive: true });
		fs.writeFileSync(nodepath.join(base, "fileA"), "hello A\n", "utf8");
		fs.writeFileSync(nodepath.join(base, "dirB", "fileB"), "hello B\n", "utf8");
		fs.writeFileSync(
			nodepath.join(base, "dirC", "dirD", "fileD"),
			"hello D\n",
			"utf8",
		);
		fs.writeFileSync(
			nodepath.join(base, "dirC", "novel.txt"),
			"lorem ipsum\n",
			"utf8",
		);

		try {
			fs.symlinkSync("fileA", nodepath.join(base, "linkA"));
			fs.symlinkSync("non-existing", nodepath.join(base, "brokenLink"));
		} catch {
			canSymlink = false;
			fs.rmSync(nodepath.join(base, "linkA"), { force: true });
			fs.rmSync(nodepath.join(base, "brokenLink"), { force: true });
		}
	}

	setup();

	return {
		root: base,
		cleanup,
		get canSymlink() {
			return canSymlink;
		},
	};
}

/**
 * Builds a tree of nested `Map`s from a plain object. Every `get` on any level bumps the shared
 * counter, which shows whether a read walked the tree or was served from a cache.
 */
export function countingTree(
	source: Record<string, unknown>,
	counter: { gets: number } = { gets: 0 },
): { tree: Map<string, unknown>; counter: { gets: number } } {
	const tree = new (class extends Map<string, unknown> {
		override get(key: string): unknown {
			counter.gets += 1;
			return super.get(key);
		}
	})();
	for (const [key, value] of Object.entries(source)) {
		if (
			typeof value === "object" &&
			value !== null &&
			Object.getPrototypeOf(value) === Object.prototype
		) {
			tree.set(key, countingTree({ ...value }, counter).tree);
		} else {
			tree.set(key, value);
		}
	}
	return { tree, counter };
}
