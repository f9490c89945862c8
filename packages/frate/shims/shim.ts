import {
	type AbsolutePath,
	type CacheIoError,
	type Platform,
	renderShim,
	type Result,
	type ShimGenerationError,
	type ShimKind,
	type ShimTarget,
} from "@frate/core"
import { type CacheLayout, shimPath } from "@/cache/layout"
import { writeShimFile } from "@/cache/manager"
import { listDir, readTextFileIfExists } from "@/io/fs"
import type { IoResult } from "@/io/types"

export function shimKindFor(platform: Platform): ShimKind {
	return platform.windows ? "windows" : "posix"
}

/**
 * Renders the tool's shim and writes it into the bin directory.
 */
export async function writeShim(
	layout: CacheLayout,
	target: ShimTarget,
	kind: ShimKind,
): Promise<Result<AbsolutePath, ShimGenerationError | CacheIoError>> {
	const destination = shimPath(layout, target.tool, kind)
	const rendered = renderShim(target, kind)
	if (!rendered.ok) {
		return { error: { ...rendered.error, path: destination }, ok: false }
	}

	return writeShimFile(layout, target.tool, kind, rendered.value)
}

/**
 * True when the shim exists and has exactly the content it would be
 * rewritten with.
 */
export async function shimIsCurrent(
	layout: CacheLayout,
	target: ShimTarget,
	kind: ShimKind,
): Promise<IoResult<boolean>> {
	const rendered = renderShim(target, kind)
	if (!rendered.ok) {
		return { ok: true, value: false }
	}

	const existing = await readTextFileIfExists(shimPath(layout, target.tool, kind))
	if (!existing.ok) {
		return existing
	}
	return { ok: true, value: existing.value === rendered.value }
}

/**
 * Names of the tools that have a shim in the bin directory.
 */
export async function listShimmedTools(layout: CacheLayout): Promise<IoResult<string[]>> {
	const entries = await listDir(layout.binDir)
	if (!entries.ok) {
		return entries
	}

	const tools = new Set<string>()
	for (const entry of entries.value) {
		if (entry.name.startsWith(".")) continue
		tools.add(entry.name.endsWith(".cmd") ? entry.name.slice(0, -".cmd".length) : entry.name)
	}
	return { ok: true, value: [...tools].sort() }
}
