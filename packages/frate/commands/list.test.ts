import { describe, expect, it } from "vitest"
import { runAdd } from "@/commands/add"
import { formatListedTool, runList } from "@/commands/list"
import { nes, sampleTools, setupProject, sum, tool, ver, withTempDir } from "@/tests/helpers"

const LOCKED = {
	checksum: sum(`sha256:${"a".repeat(64)}`),
	downloadUrl: nes("https://downloads.test/just.tar.gz"),
	platform: nes("x86_64-unknown-linux-gnu"),
	resolvedVersion: ver("1.42.1"),
}

describe("formatListedTool", () => {
	it("shows an unlocked, uninstalled tool", () => {
		expect(formatListedTool({ name: tool("just"), requirement: "^1" }, false)).toBe(
			"just: ^1\n  unlocked\n  not installed",
		)
	})

	it("flags an installed version that differs from the lock", () => {
		expect(
			formatListedTool(
				{ installed: "1.41.0", locked: LOCKED, name: tool("just"), requirement: "^1" },
				false,
			),
		).toBe("just: ^1\n  locked at: 1.42.1\n  installed: 1.41.0 (out of date)")
	})

	it("adds lock details when verbose", () => {
		expect(
			formatListedTool(
				{ installed: "1.42.1", locked: LOCKED, name: tool("just"), requirement: "^1" },
				true,
			),
		).toBe(
			[
				"just: ^1",
				"  locked at: 1.42.1",
				"  platform: x86_64-unknown-linux-gnu",
				`  checksum: sha256:${"a".repeat(64)}`,
				"  source: https://downloads.test/just.tar.gz",
				"  installed: 1.42.1",
			].join("\n"),
		)
	})
})

describe("runList", () => {
	it("lists declared tools in manifest order with their lock state", async () => {
		await withTempDir(async (dir) => {
			const project = await setupProject(dir, await sampleTools())
			await runAdd(project.context, "rg@14")
			await runAdd(project.context, "just@1.41.0")

			const result = await runList(project.context, { verbose: false })

			expect(result.status).toBe("completed")
			if (result.status === "completed") {
				expect(
					result.value.map((row) => [row.name, row.locked?.resolvedVersion, row.installed]),
				).toEqual([
					["rg", "14.1.0", undefined],
					["just", "1.41.0", undefined],
				])
			}
		})
	})

	it("reports a manifest with no dependencies", async () => {
		await withTempDir(async (dir) => {
			const project = await setupProject(dir, [])

			expect(await runList(project.context, { verbose: false })).toEqual({
				reason: "No dependencies.",
				status: "unchanged",
			})
		})
	})
})
