import { readFile, rm } from "node:fs/promises"
import { describe, expect, it } from "vitest"
import { parseToolSpec, runAdd } from "@/commands/add"
import { exists, sampleTools, setupProject, withTempDir } from "@/tests/helpers"

describe("parseToolSpec", () => {
	it("splits a name from its version requirement", () => {
		expect(parseToolSpec(" just@^1.42 ")).toEqual({
			ok: true,
			value: { name: "just", requirement: "^1.42" },
		})
	})

	it.each(["just", "just@", "@1.0.0"])("rejects %s", (spec) => {
		const result = parseToolSpec(spec)

		expect(result).toBeErrOfType("validation")
		if (!result.ok) {
			expect(result.error.field).toBe("spec")
			expect(result.error.message).toBe(`Expected <name>@<version>, got "${spec}".`)
		}
	})

	it("rejects an invalid requirement", () => {
		const result = parseToolSpec("just@not a range")

		expect(result).toBeErrOfType("validation")
		if (!result.ok) {
			expect(result.error.message).toBe('Invalid version requirement for just: "not a range".')
		}
	})

	it("rejects an invalid tool name", () => {
		const result = parseToolSpec("../just@1.0.0")

		expect(result).toBeErrOfType("validation")
		if (!result.ok) {
			expect(result.error.field).toBe("name")
		}
	})
})

describe("runAdd", () => {
	it("records the dependency and locks it without installing", async () => {
		await withTempDir(async (dir) => {
			const project = await setupProject(dir, await sampleTools())

			const result = await runAdd(project.context, "just@^1.41")

			expect(result.status).toBe("completed")
			expect(await readFile(project.manifestPath, "utf8")).toBe(
				'[project]\nname = "demo"\nversion = "0.1.0"\n\n[dependencies]\njust = "^1.41"\n',
			)
			expect(await readFile(project.lockfilePath, "utf8")).toContain(
				'resolved_version = "1.42.1"',
			)
			expect(await exists(project.layout.toolsDir)).toBe(false)
		})
	})

	it("leaves both files alone when the requirement cannot be resolved", async () => {
		await withTempDir(async (dir) => {
			const project = await setupProject(dir, await sampleTools())
			const before = await readFile(project.manifestPath, "utf8")

			const result = await runAdd(project.context, "just@^9")

			expect(result.status).toBe("failed")
			if (result.status === "failed") {
				expect(result.error.type).toBe("no_matching_version")
			}
			expect(await readFile(project.manifestPath, "utf8")).toBe(before)
			expect(await exists(project.lockfilePath)).toBe(false)
		})
	})

	it("reports an unchanged requirement", async () => {
		await withTempDir(async (dir) => {
			const project = await setupProject(dir, await sampleTools(), { just: "^1.41" })

			expect(await runAdd(project.context, "just@^1.41")).toEqual({
				reason: "just already requires ^1.41.",
				status: "unchanged",
			})
		})
	})

	it("asks for `frate init` when there is no manifest", async () => {
		await withTempDir(async (dir) => {
			const project = await setupProject(dir, [])
			await rm(project.manifestPath)

			const result = await runAdd(project.context, "just@1")

			expect(result.status).toBe("failed")
			if (result.status === "failed") {
				expect(result.error.message).toBe(
					`Manifest not found: ${project.manifestPath}. Run \`frate init\` to create one.`,
				)
			}
		})
	})
})
