import { describe, expect, it } from "vitest"
import { renderShim, shimFileName, shimTargetPath } from "./render"

const target = { binary: "just-1.42.1/just", tool: "just", version: "1.42.1" }

describe("renderShim", () => {
	it("renders a POSIX shim that resolves the root at run time", () => {
		const result = renderShim(target, "posix")

		expect(result).toEqual({
			ok: true,
			value: [
				"#!/bin/sh",
				"# frate shim for just. Rewritten whenever the tool is installed.",
				'root="$(CDPATH= cd -- "$(dirname -- "$0")/.." && pwd -P)" || exit 1',
				'exec "$root/tools/just/1.42.1/just-1.42.1/just" "$@"',
				"",
			].join("\n"),
		})
	})

	it("renders a Windows shim relative to its own directory", () => {
		const result = renderShim({ ...target, binary: "just.exe" }, "windows")

		expect(result).toEqual({
			ok: true,
			value: [
				"@echo off",
				"rem frate shim for just. Rewritten whenever the tool is installed.",
				'"%~dp0..\\tools\\just\\1.42.1\\just.exe" %*',
				"exit /b %ERRORLEVEL%",
				"",
			].join("\r\n"),
		})
	})

	it("rejects targets that escape the tools directory", () => {
		const result = renderShim({ ...target, binary: "../../../bin/sh" }, "posix")

		expect(result.ok).toBe(false)
		if (!result.ok) {
			expect(result.error.type).toBe("shim_generation")
			expect(result.error.tool).toBe("just")
		}
	})

	it("rejects absolute targets and shell metacharacters", () => {
		expect(shimTargetPath({ ...target, binary: "/usr/bin/just" }).ok).toBe(false)
		expect(shimTargetPath({ ...target, binary: "C:/just.exe" }).ok).toBe(false)
		expect(shimTargetPath({ ...target, binary: "$(reboot)" }).ok).toBe(false)
	})
})

describe("shimFileName", () => {
	it("adds .cmd on Windows only", () => {
		expect(shimFileName("just", "posix")).toBe("just")
		expect(shimFileName("just", "windows")).toBe("just.cmd")
	})
})
