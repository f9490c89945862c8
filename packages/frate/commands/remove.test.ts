import { readFile } from "node:fs/promises"
import { describe, expect, it } from "vitest"
import { runAdd } from "@/commands/add"
import { runRemove } from "@/commands/remove"
import { sampleTools, setupProject, withTempDir } from "@/tests/helpers"

describe("runRemove", () => {
	it("drops the dependency and its lock entry", async () => {
		await withTempDir(async (dir) => {
			const project = await setupProject(dir, await sampleTools())
			await runAdd(project.context, "just@^1")
			await runAdd(project.context, "rg@14")

			const result = await runRemove(project.context, "just")

			expect(result.status).toBe("completed")
			expect(await readFile(project.manifestPath, "utf8")).toBe(
				'[project]\nname = "demo"\nversion = "0.1.0"\n\n[dependencies]\nrg = "14"\n',
			)
			const lockfile = await readFile(project.lockfilePath, "utf8")
			expect(lockfile).not.toContain("[tools.just]")
			expect(lockfile).toContain("[tools.rg]")
		})
	})

	it("reports a dependency the manifest does not declare", async () => {
		await withTempDir(async (dir) => {
			const project = await setupProject(dir, [], { just: "^1" })

			const result = await runRemove(project.context, "fd")

			expect(result.status).toBe("failed")
			if (result.status === "failed" && result.error.type === "not_found") {
				expect(result.error.target).toBe("manifest")
				expect(result.error.message).toBe("Dependency not found: fd")
			}
		})
	})
})
