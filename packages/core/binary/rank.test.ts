import { describe, expect, it } from "vitest"
import { classifyCandidate, rankBinaryCandidates, stripDecorations } from "./rank"

describe("stripDecorations", () => {
	it("drops versions and platform words", () => {
		expect(stripDecorations("just-1.42.1-x86_64-unknown-linux-musl")).toBe("just")
		expect(stripDecorations("cargo-nextest_v0.9.70_darwin_arm64")).toBe("cargo-nextest")
	})
})

describe("classifyCandidate", () => {
	it("matches the tool name case-insensitively", () => {
		expect(classifyCandidate("just", "bin/Just")).toBe("exact")
		expect(classifyCandidate("just", "just.exe")).toBe("exact")
	})

	it("matches decorated names after stripping", () => {
		expect(classifyCandidate("just", "just-1.42.1-x86_64-linux")).toBe("stripped")
	})

	it("falls back to prefix and other matches", () => {
		expect(classifyCandidate("just", "justfmt")).toBe("prefix")
		expect(classifyCandidate("just", "install.sh")).toBe("other")
	})
})

describe("rankBinaryCandidates", () => {
	it("prefers an exact match over earlier arbitrary executables", () => {
		const ranked = rankBinaryCandidates("just", [
			"aaa-helper",
			"just-1.42.1/completions.sh",
			"just-1.42.1/just",
		])

		expect(ranked.map((candidate) => candidate.relativePath)).toEqual([
			"just-1.42.1/just",
			"aaa-helper",
			"just-1.42.1/completions.sh",
		])
		expect(ranked[0]?.match).toBe("exact")
	})

	it("breaks ties by depth and then path order", () => {
		const ranked = rankBinaryCandidates("tool", ["b/tool", "a/tool", "nested/deep/tool"])

		expect(ranked.map((candidate) => candidate.relativePath)).toEqual([
			"a/tool",
			"b/tool",
			"nested/deep/tool",
		])
	})

	it("is independent of input order", () => {
		const paths = ["z", "tool-2.0.0-linux", "y/tool", "toolbox"]

		expect(rankBinaryCandidates("tool", paths)).toEqual(
			rankBinaryCandidates("tool", [...paths].reverse()),
		)
		expect(rankBinaryCandidates("tool", paths).map((c) => c.match)).toEqual([
			"exact",
			"stripped",
			"prefix",
			"other",
		])
	})
})
