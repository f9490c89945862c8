import { spawnSync } from "node:child_process"
import { chmod, mkdir, readFile, rename, writeFile } from "node:fs/promises"
import { dirname, join } from "node:path"
import { renderShim } from "@frate/core"
import { describe, expect, it } from "vitest"
import { resolveCacheLayout, versionDir } from "@/cache/layout"
import { listShimmedTools, shimIsCurrent, writeShim } from "@/shims/shim"
import { abs, fileMode, listTree, withTempDir } from "@/tests/helpers"

const TARGET = { binary: "just-1.42.1/just", tool: "just", version: "1.42.1" }

describe("writeShim", () => {
	it("writes an executable POSIX shim into the bin directory", async () => {
		await withTempDir(async (dir) => {
			const layout = resolveCacheLayout(abs(dir))

			const result = await writeShim(layout, TARGET, "posix")

			const shim = join(layout.binDir, "just")
			expect(result).toEqual({ ok: true, value: shim })
			const rendered = renderShim(TARGET, "posix")
			expect(rendered.ok && (await readFile(shim, "utf8")) === rendered.value).toBe(true)
			expect(await fileMode(shim)).toBe(0o755)
		})
	})

	it("names the Windows shim with a .cmd extension", async () => {
		await withTempDir(async (dir) => {
			const layout = resolveCacheLayout(abs(dir))

			await writeShim(layout, TARGET, "windows")

			expect(await listTree(layout.binDir)).toEqual(["just.cmd"])
		})
	})

	it("refuses a target outside the version directory and writes nothing", async () => {
		await withTempDir(async (dir) => {
			const layout = resolveCacheLayout(abs(dir))

			const result = await writeShim(layout, { ...TARGET, binary: "../../evil" }, "posix")

			expect(result).toBeErrOfType("shim_generation")
			if (!result.ok && result.error.type === "shim_generation") {
				expect(result.error.path).toBe(join(layout.binDir, "just"))
			}
			expect(await listTree(layout.binDir)).toEqual([])
		})
	})
})

describe("shimIsCurrent", () => {
	it("compares the shim on disk with what would be written", async () => {
		await withTempDir(async (dir) => {
			const layout = resolveCacheLayout(abs(dir))
			expect(await shimIsCurrent(layout, TARGET, "posix")).toEqual({ ok: true, value: false })

			await writeShim(layout, TARGET, "posix")

			expect(await shimIsCurrent(layout, TARGET, "posix")).toEqual({ ok: true, value: true })
			expect(
				await shimIsCurrent(layout, { ...TARGET, version: "1.41.0" }, "posix"),
			).toEqual({ ok: true, value: false })
		})
	})
})

describe.skipIf(process.platform === "win32")("running a POSIX shim", () => {
	const runShim = (shim: string, args: string[]) =>
		spawnSync(shim, args, { encoding: "utf8" })

	it("forwards every argument and exits with the tool's status, wherever the root moves", async () => {
		await withTempDir(async (dir) => {
			const layout = resolveCacheLayout(abs(join(dir, "home")))
			const binary = join(versionDir(layout, "just", "1.42.1"), TARGET.binary)
			await mkdir(dirname(binary), { recursive: true })
			await writeFile(binary, '#!/bin/sh\nprintf \'%s:%s\\n\' "$#" "$*"\nexit 7\n')
			await chmod(binary, 0o755)
			expect(await writeShim(layout, TARGET, "posix")).toBeOk()

			const ran = runShim(join(layout.binDir, "just"), ["one two", "three"])

			expect(ran.stdout).toBe("2:one two three\n")
			expect(ran.status).toBe(7)

			await rename(join(dir, "home"), join(dir, "moved"))
			const moved = runShim(join(dir, "moved", "bin", "just"), ["--version"])

			expect(moved.stdout).toBe("1:--version\n")
			expect(moved.status).toBe(7)
		})
	})
})

describe("listShimmedTools", () => {
	it("lists each tool once and ignores hidden files", async () => {
		await withTempDir(async (dir) => {
			const layout = resolveCacheLayout(abs(dir))
			await writeShim(layout, TARGET, "posix")
			await writeShim(layout, TARGET, "windows")
			await writeShim(layout, { ...TARGET, tool: "rg" }, "posix")
			await writeFile(join(layout.binDir, ".just.tmp"), "")

			expect(await listShimmedTools(layout)).toEqual({ ok: true, value: ["just", "rg"] })
		})
	})
})
