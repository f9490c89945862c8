import {
	type CacheIoError,
	checksumDigest,
	coerceChecksum,
	type Result,
	type ToolName,
} from "@frate/core"
import { type CacheLayout, shimPath, toolDir } from "@/cache/layout"
import {
	clearDownloads,
	clearTmp,
	listInstalledTools,
	readInstallRecord,
	removeMeasured,
} from "@/cache/manager"
import type { CleanReport, InstallEventHandler } from "@/install/types"
import type { IoResult } from "@/io/types"
import { listShimmedTools } from "@/shims/shim"

export interface CleanOptions {
	/** Clean only this tool's entry, shim and downloads */
	tool?: ToolName
	layout: CacheLayout
	onEvent?: InstallEventHandler
}

/**
 * Deletes cache contents outright, shims first. Without a tool this wipes
 * every entry, every shim (orphans included), the download cache and
 * leftover staging directories.
 */
export async function cleanCache(
	options: CleanOptions,
): Promise<Result<CleanReport, CacheIoError>> {
	return options.tool === undefined
		? cleanEverything(options.layout, options.onEvent)
		: cleanTool(options.layout, options.tool, options.onEvent)
}

async function cleanTool(
	layout: CacheLayout,
	tool: ToolName,
	onEvent: InstallEventHandler | undefined,
): Promise<Result<CleanReport, CacheIoError>> {
	const report: CleanReport = { failed: [], reclaimedBytes: 0, removed: [], skipped: [] }

	// An unreadable record only means its downloads cannot be matched.
	const record = await readInstallRecord(layout, tool)
	const digests = new Set<string>()
	if (record.ok && record.value) {
		for (const install of Object.values(record.value.installs)) {
			const checksum = coerceChecksum(install.checksum)
			if (checksum) {
				digests.add(checksumDigest(checksum))
			}
		}
	}

	const removed = await removeToolEntry(layout, tool)
	if (!removed.ok) {
		report.failed.push({ error: removed.error, tool })
		return { ok: true, value: report }
	}

	const downloads = digests.size > 0 ? await clearDownloads(layout, digests) : undefined
	if (downloads && !downloads.ok) {
		report.failed.push({ error: downloads.error, tool })
		return { ok: true, value: report }
	}

	const reclaimed = removed.value + (downloads?.value ?? 0)
	report.reclaimedBytes = reclaimed
	if (reclaimed > 0) {
		report.removed.push(tool)
		onEvent?.({ tool, type: "removed" })
	} else {
		report.skipped.push(tool)
	}
	return { ok: true, value: report }
}

async function cleanEverything(
	layout: CacheLayout,
	onEvent: InstallEventHandler | undefined,
): Promise<Result<CleanReport, CacheIoError>> {
	const report: CleanReport = { failed: [], reclaimedBytes: 0, removed: [], skipped: [] }

	const installed = await listInstalledTools(layout)
	if (!installed.ok) {
		return installed
	}
	const shimmed = await listShimmedTools(layout)
	if (!shimmed.ok) {
		return shimmed
	}

	const tools = [...new Set<string>([...installed.value, ...shimmed.value])].sort()
	for (const tool of tools) {
		const removed = await removeToolEntry(layout, tool)
		if (!removed.ok) {
			report.failed.push({ error: removed.error, tool })
			continue
		}
		report.reclaimedBytes += removed.value
		report.removed.push(tool)
		onEvent?.({ tool, type: "removed" })
	}

	for (const clear of [clearDownloads, clearTmp]) {
		const cleared = await clear(layout)
		if (!cleared.ok) {
			return cleared
		}
		report.reclaimedBytes += cleared.value
	}

	return { ok: true, value: report }
}

/**
 * Removes both shim variants and the tool directory, returning the bytes
 * freed.
 */
async function removeToolEntry(layout: CacheLayout, tool: string): Promise<IoResult<number>> {
	let reclaimed = 0
	for (const target of [
		shimPath(layout, tool, "posix"),
		shimPath(layout, tool, "windows"),
		toolDir(layout, tool),
	]) {
		const removed = await removeMeasured(target)
		if (!removed.ok) {
			return removed
		}
		reclaimed += removed.value
	}
	return { ok: true, value: reclaimed }
}
