// CHANGE: Deterministic and property-based specs for changed-file classification
// FORMAT THEOREM: ∀p, f ∈ {filterNativeSources, filterPythonSources}: f(f(p)) = f(p) ∧ f(p) ⊑ p
// PURITY: CORE
// INVARIANT: Order preserved, duplicates kept

import fc from "fast-check";
import { describe, expect, it } from "vitest";

import {
	collectExtensions,
	excludePaths,
	extensionOf,
	filterNativeSources,
	filterPythonSources,
	parseChangedFiles,
} from "../../../src/core/files/classify.js";

describe("filterNativeSources", () => {
	it("keeps C/C++ files in input order", () => {
		expect(filterNativeSources(["a.cpp", "b.py", "c.h", "d.txt"])).toEqual([
			"a.cpp",
			"c.h",
		]);
	});

	it("accepts every listed extension", () => {
		const files = [
			"a.cpp",
			"a.c",
			"a.cc",
			"a.h",
			"a.hpp",
			"a.hxx",
			"a.cxx",
			"a.inc",
			"a.cppm",
			"a.cl",
		];
		expect(filterNativeSources(files)).toEqual(files);
	});

	it("keeps extension-less headers under libcxx/include only", () => {
		expect(
			filterNativeSources(["libcxx/include/vector", "src/vector", "Makefile"]),
		).toEqual(["libcxx/include/vector"]);
	});

	it("matches extensions case-sensitively", () => {
		expect(filterNativeSources(["A.CPP", "b.C"])).toEqual([]);
	});

	it("keeps duplicates", () => {
		expect(filterNativeSources(["a.cc", "a.cc"])).toEqual(["a.cc", "a.cc"]);
	});
});

describe("filterPythonSources", () => {
	it("keeps only .py files", () => {
		expect(filterPythonSources(["a.cpp", "b.py", "c.h", "d.txt"])).toEqual([
			"b.py",
		]);
	});

	it("rejects look-alike extensions", () => {
		expect(filterPythonSources(["a.pyc", "b.pyi", "py", "c.py.bak"])).toEqual(
			[],
		);
	});
});

describe("classification properties", () => {
	const pathArb = fc.array(
		fc.constantFrom(
			"a.cpp",
			"b.py",
			"c.h",
			"d.txt",
			"libcxx/include/vector",
			"README",
			"x.cl",
			"y.pyc",
			".clang-format",
		),
		{ maxLength: 20 },
	);

	const isSubsequence = (
		sub: readonly string[],
		full: readonly string[],
	): boolean => {
		let i = 0;
		for (const item of full) {
			if (i < sub.length && sub[i] === item) i += 1;
		}
		return i === sub.length;
	};

	const filters: Array<[string, (paths: readonly string[]) => readonly string[]]> =
		[
			["native", filterNativeSources],
			["python", filterPythonSources],
		];

	it.each(filters)("%s filter is idempotent and order-preserving", (_, filter) => {
		fc.assert(
			fc.property(pathArb, (paths) => {
				const once = filter(paths);
				expect(filter(once)).toEqual(once);
				expect(isSubsequence(once, paths)).toBe(true);
			}),
		);
	});

	it("native and python selections are disjoint", () => {
		fc.assert(
			fc.property(pathArb, (paths) => {
				const native = new Set(filterNativeSources(paths));
				expect(filterPythonSources(paths).some((p) => native.has(p))).toBe(
					false,
				);
			}),
		);
	});
});

describe("helpers", () => {
	it("extensionOf ignores dotfiles and directory dots", () => {
		expect(extensionOf("src/a.cpp")).toBe("cpp");
		expect(extensionOf(".clang-format")).toBe("");
		expect(extensionOf("dir.d/file")).toBe("");
		expect(extensionOf("a.tar.gz")).toBe("gz");
	});

	it("parseChangedFiles splits on commas and drops empty entries", () => {
		expect(parseChangedFiles("a.cpp,,b.py,")).toEqual(["a.cpp", "b.py"]);
		expect(parseChangedFiles("")).toEqual([]);
		expect(parseChangedFiles(undefined)).toEqual([]);
	});

	it("excludePaths drops exact matches only", () => {
		expect(
			excludePaths(
				["test/unittests/lit.cfg.py", "a.py", "x/test/unittests/lit.cfg.py"],
				["test/unittests/lit.cfg.py"],
			),
		).toEqual(["a.py", "x/test/unittests/lit.cfg.py"]);
	});

	it("collectExtensions keeps first-seen order and marks extension-less files", () => {
		expect(
			collectExtensions(["a.cpp", "b.h", "c.cpp", "libcxx/include/vector"]),
		).toEqual(["cpp", "h", ""]);
	});
});
