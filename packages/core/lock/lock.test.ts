import { describe, expect, it } from "vitest"
import type { ToolName } from "../types/branded"
import {
	coerceChecksum,
	coerceExactVersion,
	coerceNonEmpty,
	coerceToolName,
} from "../types/coerce"
import { createLockfile } from "./model"
import { parseLockfile } from "./parse"
import { serializeLockfile } from "./serialize"
import type { LockedEntry } from "./types"

function entry(name: string, version: string, digit: string): [ToolName, LockedEntry] {
	const toolName = coerceToolName(name)
	const resolvedVersion = coerceExactVersion(version)
	const checksum = coerceChecksum(digit.repeat(64))
	const downloadUrl = coerceNonEmpty(`https://example.test/${name}-${version}.tar.gz`)
	const platform = coerceNonEmpty("x86_64-unknown-linux-gnu")
	if (!toolName || !resolvedVersion || !checksum || !downloadUrl || !platform) {
		throw new Error(`Invalid test entry: ${name}`)
	}
	return [toolName, { checksum, downloadUrl, platform, resolvedVersion }]
}

describe("lockfile serialization", () => {
	it("round-trips entries", () => {
		const lockfile = createLockfile([
			entry("just", "1.42.1", "a"),
			entry("ripgrep", "14.1.0", "b"),
		])

		const reparsed = parseLockfile(serializeLockfile(lockfile))

		expect(reparsed).toEqual({ ok: true, value: lockfile })
	})

	it("is independent of insertion order", () => {
		const forward = createLockfile([
			entry("just", "1.42.1", "a"),
			entry("ripgrep", "14.1.0", "b"),
		])
		const backward = createLockfile([
			entry("ripgrep", "14.1.0", "b"),
			entry("just", "1.42.1", "a"),
		])

		expect(serializeLockfile(backward)).toBe(serializeLockfile(forward))
		expect([...backward.entries.keys()]).toEqual(["just", "ripgrep"])
	})

	it("writes the header, schema version and snake_case fields", () => {
		const serialized = serializeLockfile(createLockfile([entry("just", "1.42.1", "a")]))

		expect(serialized.split("\n")[0]).toBe(
			"# This file is generated by frate. It is not intended for manual editing.",
		)
		expect(serialized).toContain("version = 1\n")
		expect(serialized).toContain('resolved_version = "1.42.1"')
		expect(serialized).toContain(`checksum = "sha256:${"a".repeat(64)}"`)
	})

	it("serializes an empty lockfile", () => {
		const reparsed = parseLockfile(serializeLockfile(createLockfile()))

		expect(reparsed.ok).toBe(true)
		if (reparsed.ok) {
			expect(reparsed.value.entries.size).toBe(0)
		}
	})
})

describe("parseLockfile", () => {
	it("rejects an unsupported schema version", () => {
		const result = parseLockfile("version = 2\n")

		expect(result.ok).toBe(false)
		if (!result.ok) {
			expect(result.error.source).toBe("frate.lock")
			expect(result.error.message).toBe("Unsupported lockfile version 2.")
		}
	})

	it("rejects entries with an invalid checksum", () => {
		const result = parseLockfile(`version = 1

[tools.just]
resolved_version = "1.42.1"
download_url = "https://example.test/just.tar.gz"
checksum = "sha256:nothex"
platform = "x86_64-unknown-linux-gnu"
`)

		expect(result.ok).toBe(false)
		if (!result.ok) {
			expect(result.error.field).toBe("tools.just.checksum")
		}
	})

	it("rejects entries with missing fields", () => {
		const result = parseLockfile(`version = 1

[tools.just]
resolved_version = "1.42.1"
`)

		expect(result.ok).toBe(false)
		if (!result.ok) {
			expect(result.error.field).toBe("lockfile")
		}
	})

	it("rejects invalid TOML", () => {
		const result = parseLockfile("version = = 1")

		expect(result.ok).toBe(false)
		if (!result.ok) {
			expect(result.error.type).toBe("manifest_parse")
		}
	})
})
