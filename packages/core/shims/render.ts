import { TOOLS_DIR } from "../constants"
import type { Result, ShimGenerationError } from "../types/error"

export type ShimKind = "posix" | "windows"

export interface ShimTarget {
	readonly tool: string
	readonly version: string
	/** Binary path relative to the version directory, `/`-separated */
	readonly binary: string
}

// Characters that would need escaping in either shim language.
const UNSAFE_CHARACTERS = /["$`\\%\r\n]/

export function shimFileName(tool: string, kind: ShimKind): string {
	return kind === "windows" ? `${tool}.cmd` : tool
}

/**
 * Path of the target below the cache root's `tools/` directory. Rejects
 * anything that could point outside it.
 */
export function shimTargetPath(target: ShimTarget): Result<string, ShimGenerationError> {
	const segments = [target.tool, target.version, ...target.binary.split("/")]
	for (const segment of segments) {
		if (!segment || segment === "." || segment === ".." || UNSAFE_CHARACTERS.test(segment)) {
			return {
				error: {
					message: `Refusing to create a shim for ${target.tool} pointing at "${target.binary}".`,
					tool: target.tool,
					type: "shim_generation",
				},
				ok: false,
			}
		}
	}

	if (target.binary.startsWith("/") || /^[A-Za-z]:/.test(target.binary)) {
		return {
			error: {
				message: `Shim target for ${target.tool} must be relative: "${target.binary}".`,
				tool: target.tool,
				type: "shim_generation",
			},
			ok: false,
		}
	}

	return { ok: true, value: segments.join("/") }
}

/**
 * The shim locates the cache root from its own location when it runs, so the
 * root can move without regenerating shims.
 */
export function renderShim(
	target: ShimTarget,
	kind: ShimKind,
): Result<string, ShimGenerationError> {
	const relative = shimTargetPath(target)
	if (!relative.ok) {
		return relative
	}

	return {
		ok: true,
		value:
			kind === "windows"
				? renderWindowsShim(target.tool, relative.value)
				: renderPosixShim(target.tool, relative.value),
	}
}

function renderPosixShim(tool: string, relative: string): string {
	return [
		"#!/bin/sh",
		`# frate shim for ${tool}. Rewritten whenever the tool is installed.`,
		'root="$(CDPATH= cd -- "$(dirname -- "$0")/.." && pwd -P)" || exit 1',
		`exec "$root/${TOOLS_DIR}/${relative}" "$@"`,
		"",
	].join("\n")
}

function renderWindowsShim(tool: string, relative: string): string {
	const windowsRelative = relative.split("/").join("\\")
	return [
		"@echo off",
		`rem frate shim for ${tool}. Rewritten whenever the tool is installed.`,
		`"%~dp0..\\${TOOLS_DIR}\\${windowsRelative}" %*`,
		"exit /b %ERRORLEVEL%",
		"",
	].join("\r\n")
}
