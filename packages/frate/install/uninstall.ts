import type { CacheIoError, Result, ToolName } from "@frate/core"
import { type CacheLayout, shimPath, toolDir } from "@/cache/layout"
import { listInstalledTools, removeShim, removeToolDir } from "@/cache/manager"
import type { InstallEventHandler, RemovalReport } from "@/install/types"
import { safeLstat, safeStat } from "@/io/fs"
import type { IoResult } from "@/io/types"
import { listShimmedTools } from "@/shims/shim"

export interface UninstallOptions {
	/** Uninstall only this tool; every cached or shimmed tool otherwise */
	tool?: ToolName
	layout: CacheLayout
	onEvent?: InstallEventHandler
}

/**
 * Removes each tool's shim, then its cache entry. A shim without an entry is
 * still removed. Tools with neither are skipped, not failed.
 */
export async function uninstallTools(
	options: UninstallOptions,
): Promise<Result<RemovalReport, CacheIoError>> {
	const { layout } = options
	const tools = await selectTools(layout, options.tool)
	if (!tools.ok) {
		return tools
	}

	const report: RemovalReport = { failed: [], removed: [], skipped: [] }
	for (const tool of tools.value) {
		const present = await presence(layout, tool)
		if (!present.ok) {
			report.failed.push({ error: present.error, tool })
			continue
		}
		if (!present.value.shim && !present.value.entry) {
			report.skipped.push(tool)
			continue
		}

		const shim = await removeShim(layout, tool)
		if (!shim.ok) {
			report.failed.push({ error: shim.error, tool })
			continue
		}

		const removed = await removeToolDir(layout, tool)
		if (!removed.ok) {
			report.failed.push({ error: removed.error, tool })
			continue
		}

		report.removed.push(tool)
		options.onEvent?.({ tool, type: "removed" })
	}

	return { ok: true, value: report }
}

async function selectTools(
	layout: CacheLayout,
	tool: ToolName | undefined,
): Promise<IoResult<string[]>> {
	if (tool !== undefined) {
		return { ok: true, value: [tool] }
	}

	const installed = await listInstalledTools(layout)
	if (!installed.ok) {
		return installed
	}
	const shimmed = await listShimmedTools(layout)
	if (!shimmed.ok) {
		return shimmed
	}
	return { ok: true, value: [...new Set<string>([...installed.value, ...shimmed.value])].sort() }
}

async function presence(
	layout: CacheLayout,
	tool: string,
): Promise<IoResult<{ shim: boolean; entry: boolean }>> {
	const entry = await safeStat(toolDir(layout, tool))
	if (!entry.ok) {
		return entry
	}

	let shim = false
	for (const kind of ["posix", "windows"] as const) {
		const stats = await safeLstat(shimPath(layout, tool, kind))
		if (!stats.ok) {
			return stats
		}
		if (stats.value) {
			shim = true
		}
	}
	return { ok: true, value: { entry: entry.value !== null, shim } }
}
