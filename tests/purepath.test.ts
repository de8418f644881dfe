import { describe, expect, test } from "vitest";
import {
	compareSegments,
	EmptyPath,
	PathMismatch,
	PurePath,
	parseParts,
} from "../src/index.js";

describe("parseParts", () => {
	test("splits text on the separator and drops empty and dot segments", () => {
		expect(parseParts(["a/b", ".", "", "c//d/"])).toEqual(["a", "b", "c", "d"]);
	});

	test("drops null and undefined", () => {
		expect(parseParts(["a", null, undefined, "b"])).toEqual(["a", "b"]);
	});

	test("keeps integers as integers and never coerces text", () => {
		const parts = parseParts(["items", 0, "0"]);
		expect(parts).toEqual(["items", 0, "0"]);
		expect(typeof parts[1]).toBe("number");
		expect(typeof parts[2]).toBe("string");
	});

	test("keeps '..' as an ordinary segment", () => {
		expect(parseParts(["a/../b"])).toEqual(["a", "..", "b"]);
	});

	test("uses a custom separator", () => {
		expect(parseParts(["a.b", "c/d"], ".")).toEqual(["a", "b", "c/d"]);
	});

	test("normalizes negative zero", () => {
		expect(Object.is(parseParts([-0])[0], 0)).toBe(true);
	});

	test("rejects malformed segments", () => {
		expect(() => parseParts([1.5])).toThrow(TypeError);
		expect(() => parseParts([Number.NaN])).toThrow(TypeError);
	});

	test("rejects separators that are not a single character", () => {
		expect(() => parseParts(["a"], "")).toThrow(TypeError);
		expect(() => parseParts(["a"], "::")).toThrow(TypeError);
	});
});

describe("PurePath construction and rendering", () => {
	test("construct and stringify", () => {
		const p = new PurePath("a", "b/c");
		expect(p.parts).toEqual(["a", "b", "c"]);
		expect(p.toString()).toBe("a/b/c");
		expect(String(p)).toBe("a/b/c");
		expect(p.valueOf()).toBe("a/b/c");
		expect(p.toJSON()).toBe("a/b/c");
		expect(`${p}`).toBe("a/b/c");
	});

	test("renders integer segments in base 10", () => {
		expect(new PurePath("items", 10, "name").toString()).toBe("items/10/name");
	});

	test("empty path renders as an empty string", () => {
		expect(new PurePath().toString()).toBe("");
		expect(new PurePath(".", "").parts).toEqual([]);
	});

	test("parse with a custom separator", () => {
		const p = PurePath.parse("a.b.c", ".");
		expect(p.separator).toBe(".");
		expect(p.parts).toEqual(["a", "b", "c"]);
		expect(p.toString()).toBe("a.b.c");
		expect(p.asPosix()).toBe("a/b/c");
	});

	test("fromParts combines several segments", () => {
		const p = PurePath.fromParts(["x:y", 3], ":");
		expect(p.parts).toEqual(["x", "y", 3]);
		expect(p.toString()).toBe("x:y:3");
	});

	test("parts are frozen", () => {
		const p = new PurePath("a", "b");
		expect(Object.isFrozen(p.parts)).toBe(true);
	});

	test("a PurePath segment contributes its parts as-is", () => {
		const dotted = PurePath.parse("a/b.c", ".");
		const joined = new PurePath("root", dotted);
		expect(joined.parts).toEqual(["root", "a/b", "c"]);
	});

	test("round-trips text segments through render and parse", () => {
		const samples: string[][] = [
			["a"],
			["a", "b", "c"],
			["with space", "ünïcødé", "..", "x.y"],
			[],
		];
		for (const parts of samples) {
			const rendered = PurePath.fromParts(parts).toString();
			expect(PurePath.parse(rendered).parts).toEqual(parts);
		}
	});

	test("withSeparator keeps the parts", () => {
		const p = new PurePath("a", "b").withSeparator(".");
		expect(p.parts).toEqual(["a", "b"]);
		expect(p.toString()).toBe("a.b");
		expect(p.joinpath("c.d").parts).toEqual(["a", "b", "c", "d"]);
	});
});

describe("PurePath composition", () => {
	test("joinpath returns a new value and leaves the original untouched", () => {
		const base = new PurePath("a");
		const joined = base.joinpath("b/c", 1);
		expect(joined.parts).toEqual(["a", "b", "c", 1]);
		expect(base.parts).toEqual(["a"]);
		expect(joined).not.toBe(base);
	});

	test("joining a single segment then taking the parent gives the original", () => {
		const base = PurePath.parse("x/y");
		for (const segment of ["z", 0, 42, "..", "name.txt"]) {
			expect(base.joinpath(segment).parent.equals(base)).toBe(true);
		}
	});

	test("prependpath places segments in front", () => {
		const base = new PurePath("name");
		expect(base.prependpath("users/0").parts).toEqual(["users", "0", "name"]);
		expect(base.prependpath("users", 0).parts).toEqual(["users", 0, "name"]);
		expect(base.prependpath(null)).toBe(base);
		const dotted = PurePath.parse("c", ".");
		expect(dotted.prependpath("a.b").toString()).toBe("a.b.c");
	});

	test("derived paths are built through the subclass constructor", () => {
		class TaggedPath extends PurePath {
			readonly tag = "tagged";
		}
		const base = new TaggedPath("a");
		const derived = [
			base.joinpath("b"),
			base.joinpath("b").parent,
			base.prependpath("z"),
			base.withSeparator("."),
		];
		for (const path of derived) {
			expect(path).toBeInstanceOf(TaggedPath);
			expect(path.tag).toBe("tagged");
		}
		expect(derived.map(String)).toEqual(["a/b", "a", "z/a", "a"]);
	});

	test("parent of the empty path throws EmptyPath", () => {
		expect(() => new PurePath().parent).toThrow(EmptyPath);
		expect(() => new PurePath("a").parent.parent).toThrow(EmptyPath);
	});

	test("parents lists ancestors nearest first", () => {
		const parents = new PurePath("a", "b", "c").parents.map(String);
		expect(parents).toEqual(["a/b", "a", ""]);
		expect(new PurePath().parents).toEqual([]);
	});
});

describe("PurePath.relativeTo", () => {
	test("returns the suffix after the base", () => {
		const p = PurePath.parse("a/b/c");
		expect(p.relativeTo(PurePath.parse("a")).parts).toEqual(["b", "c"]);
		expect(p.relativeTo("a/b").parts).toEqual(["c"]);
		expect(p.relativeTo(p).parts).toEqual([]);
		expect(p.relativeTo(new PurePath()).parts).toEqual(["a", "b", "c"]);
	});

	test("throws PathMismatch when the base is not a prefix", () => {
		const p = PurePath.parse("a/b/c");
		expect(() => p.relativeTo(PurePath.parse("x/y"))).toThrow(PathMismatch);
		expect(() => p.relativeTo("a/b/c/d")).toThrow(PathMismatch);
		expect(() => p.relativeTo(PurePath.parse("x/y"))).toThrow(
			'"a/b/c" is not in the subpath of "x/y"',
		);
	});

	test("separators must match", () => {
		const slash = PurePath.parse("a/b");
		const dot = PurePath.parse("a.b", ".");
		expect(() => slash.relativeTo(dot)).toThrow(PathMismatch);
		expect(slash.isRelativeTo(dot)).toBe(false);
	});

	test("type-sensitive prefix", () => {
		const p = new PurePath("items", 0, "name");
		expect(p.isRelativeTo(new PurePath("items", 0))).toBe(true);
		expect(p.isRelativeTo(new PurePath("items", "0"))).toBe(false);
	});

	test("isRelativeTo never throws for unrelated paths", () => {
		const p = PurePath.parse("a/b/c");
		expect(p.isRelativeTo("a")).toBe(true);
		expect(p.isRelativeTo("x/y")).toBe(false);
		expect(p.isRelativeTo("a/b/c/d")).toBe(false);
	});
});

describe("PurePath equality, hashing and ordering", () => {
	test("integer and text segments are never equal", () => {
		const int = new PurePath(0);
		const text = new PurePath("0");
		expect(int.toString()).toBe(text.toString());
		expect(int.equals(text)).toBe(false);
		expect(int.hashKey).not.toBe(text.hashKey);
	});

	test("equal values share a hash key", () => {
		const a = PurePath.parse("a/b");
		const b = new PurePath("a", "b");
		expect(a.equals(b)).toBe(true);
		expect(a.hashKey).toBe(b.hashKey);
		const seen = new Map([[a.hashKey, a]]);
		expect(seen.get(b.hashKey)).toBe(a);
	});

	test("separator takes part in equality", () => {
		expect(
			new PurePath("a", "b").equals(new PurePath("a", "b").withSeparator(".")),
		).toBe(false);
	});

	test("compareSegments ranks integers before text", () => {
		expect(compareSegments(5, "0")).toBe(-1);
		expect(compareSegments("0", 5)).toBe(1);
		expect(compareSegments(2, 10)).toBe(-1);
		expect(compareSegments("10", "2")).toBe(-1);
		expect(compareSegments("a", "a")).toBe(0);
	});

	test("prefix sorts before longer paths", () => {
		expect(PurePath.parse("a").compareTo(PurePath.parse("a/b"))).toBe(-1);
		expect(PurePath.parse("a/b").compareTo(PurePath.parse("a"))).toBe(1);
		expect(PurePath.parse("a/b").compareTo(new PurePath("a", "b"))).toBe(0);
	});

	test("sorting mixed segments is deterministic", () => {
		const paths = [
			new PurePath("b"),
			new PurePath("a", "x"),
			new PurePath(10),
			new PurePath("a", 2),
			new PurePath(2),
			new PurePath("a"),
		];
		const sorted = [...paths].sort(PurePath.compare).map((p) => p.inspect());
		expect(sorted).toEqual([
			'PurePath("2"; [2])',
			'PurePath("10"; [10])',
			'PurePath("a"; ["a"])',
			'PurePath("a/2"; ["a", 2])',
			'PurePath("a/x"; ["a", "x"])',
			'PurePath("b"; ["b"])',
		]);
		const reversed = [...paths]
			.reverse()
			.sort(PurePath.compare)
			.map((p) => p.inspect());
		expect(reversed).toEqual(sorted);
	});

	test("ordering is total and transitive over mixed paths", () => {
		const paths = [
			new PurePath(0),
			new PurePath("0"),
			new PurePath(0, "a"),
			new PurePath("0", 1),
			new PurePath(-3),
			new PurePath("a", "b"),
			new PurePath("a", 1),
			PurePath.parse("a.b", "."),
		];
		for (const a of paths) {
			for (const b of paths) {
				const ab = a.compareTo(b);
				expect(ab).toBe(-b.compareTo(a) || 0);
				expect(ab === 0).toBe(a.equals(b));
				for (const c of paths) {
					if (ab < 0 && b.compareTo(c) < 0) {
						expect(a.compareTo(c)).toBe(-1);
					}
				}
			}
		}
	});
});

describe("PurePath name helpers", () => {
	test("name, suffix, suffixes, stem", () => {
		const p = new PurePath("dir", "file.tar.gz");
		expect(p.name).toBe("file.tar.gz");
		expect(p.suffix).toBe(".gz");
		expect(p.suffixes).toEqual([".tar", ".gz"]);
		expect(p.stem).toBe("file.tar");
	});

	test("dotfiles have no suffix", () => {
		const p = new PurePath(".bashrc");
		expect(p.suffix).toBe("");
		expect(p.suffixes).toEqual([]);
		expect(p.stem).toBe(".bashrc");
	});

	test("integer names render as text", () => {
		expect(new PurePath("items", 3).name).toBe("3");
		expect(new PurePath().name).toBe("");
	});

	test("withName and withSuffix", () => {
		const p = new PurePath("a", "b.txt");
		expect(p.withName("c.md").parts).toEqual(["a", "c.md"]);
		expect(p.withSuffix(".md").parts).toEqual(["a", "b.md"]);
		expect(p.withSuffix("").parts).toEqual(["a", "b"]);
	});

	test("withName rejects empty names, separators and empty paths", () => {
		const p = new PurePath("a", "b.txt");
		expect(() => p.withName("")).toThrow();
		expect(() => p.withName(".")).toThrow();
		expect(() => p.withName("x/y")).toThrow();
		expect(() => new PurePath().withName("x")).toThrow();
	});

	test("withSuffix rejects a suffix without a leading dot", () => {
		expect(() => new PurePath("file.txt").withSuffix("md")).toThrow();
	});
});
