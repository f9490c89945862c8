import path from "node:path"
import {
	acceptsPlatform,
	type ArchiveFormat,
	archiveFormatFromUrl,
	describePlatform,
	type LockedEntry,
	type Lockfile,
	type NoCompatibleAssetError,
	type NotFoundError,
	type Platform,
	type Result,
	type ShimTarget,
	type ToolName,
} from "@frate/core"
import { extractArchive } from "@/archive/extract"
import { type CacheLayout, versionDir } from "@/cache/layout"
import {
	commitVersionDir,
	discardStaged,
	readInstallRecord,
	removeShim,
	removeToolDir,
	removeToolVersion,
	writeInstallRecord,
} from "@/cache/manager"
import { emptyInstallRecord, type InstallRecord } from "@/cache/record"
import { fetchVerified } from "@/fetch/download"
import type { FetchLike } from "@/fetch/types"
import type {
	InstallError,
	InstallEventHandler,
	InstallReport,
} from "@/install/types"
import { safeStat } from "@/io/fs"
import { detectBinary } from "@/shims/detect"
import { shimIsCurrent, shimKindFor, writeShim } from "@/shims/shim"

export interface InstallOptions {
	lockfile: Lockfile
	/** Install only this tool; every locked tool otherwise */
	tool?: ToolName
	layout: CacheLayout
	platform: Platform
	fetch?: FetchLike
	onEvent?: InstallEventHandler
	/** Clock for install timestamps */
	now?: () => Date
}

type InstallOutcome = "installed" | "relinked" | "skipped"

/**
 * Installs locked tools one at a time, in name order. A failing tool does not
 * stop the others; its error is collected in the report.
 */
export async function installTools(
	options: InstallOptions,
): Promise<Result<InstallReport, NotFoundError>> {
	const selected = selectEntries(options.lockfile, options.tool)
	if (!selected.ok) {
		return selected
	}

	const report: InstallReport = { failed: [], installed: [], skipped: [] }
	for (const [tool, entry] of selected.value) {
		options.onEvent?.({ tool, type: "start", version: entry.resolvedVersion })
		const outcome = await installTool(tool, entry, options)
		if (!outcome.ok) {
			report.failed.push({ error: outcome.error, tool })
			options.onEvent?.({ error: outcome.error, tool, type: "failed" })
			continue
		}

		if (outcome.value === "skipped") {
			report.skipped.push(tool)
			options.onEvent?.({ tool, type: "skipped", version: entry.resolvedVersion })
		} else {
			report.installed.push(tool)
		}
	}

	return { ok: true, value: report }
}

function selectEntries(
	lockfile: Lockfile,
	tool: ToolName | undefined,
): Result<[ToolName, LockedEntry][], NotFoundError> {
	if (tool === undefined) {
		return { ok: true, value: [...lockfile.entries] }
	}

	const entry = lockfile.entries.get(tool)
	if (!entry) {
		return {
			error: {
				message: `${tool} is not in the lockfile. Add it with \`frate add\` first.`,
				name: tool,
				target: "lockfile",
				type: "not_found",
			},
			ok: false,
		}
	}
	return { ok: true, value: [[tool, entry]] }
}

async function installTool(
	tool: ToolName,
	entry: LockedEntry,
	options: InstallOptions,
): Promise<Result<InstallOutcome, InstallError>> {
	const { layout, platform } = options
	const version = entry.resolvedVersion

	const format = checkEntry(tool, entry, platform)
	if (!format.ok) {
		return format
	}

	const stored = await readInstallRecord(layout, tool)
	if (!stored.ok) {
		return stored
	}
	const record = stored.value ?? emptyInstallRecord()

	const existing = record.installs[version]
	if (existing && existing.checksum === entry.checksum) {
		const binaryStats = await safeStat(
			path.join(versionDir(layout, tool, version), existing.binary),
		)
		if (!binaryStats.ok) {
			return binaryStats
		}
		if (binaryStats.value?.isFile()) {
			return relink(tool, { binary: existing.binary, tool, version }, record, options)
		}
	}

	const archive = await fetchVerified(entry, layout, {
		fetch: options.fetch,
		format: format.value,
	})
	if (!archive.ok) {
		return archive
	}
	options.onEvent?.({
		cached: archive.value.fromCache,
		tool,
		type: "download",
		url: entry.downloadUrl,
		version,
	})

	const staged = await extractArchive(archive.value.path, format.value, layout)
	if (!staged.ok) {
		return staged
	}

	// Nothing under tools/ changes until a binary is found.
	const detected = await detectBinary(tool, staged.value, { windows: platform.windows })
	if (!detected.ok) {
		await discardStaged(layout, staged.value)
		return detected
	}

	const committed = await commitVersionDir(staged.value, versionDir(layout, tool, version))
	if (!committed.ok) {
		await discardStaged(layout, staged.value)
		await abandonVersion(layout, tool, version, record)
		return committed
	}

	const updated: InstallRecord = {
		...record,
		current: version,
		installs: {
			...record.installs,
			[version]: {
				binary: detected.value.binary,
				candidates: detected.value.candidates,
				checksum: entry.checksum,
				installed_at: (options.now?.() ?? new Date()).toISOString(),
			},
		},
	}
	const written = await writeInstallRecord(layout, tool, updated)
	if (!written.ok) {
		await abandonVersion(layout, tool, version, record)
		return written
	}

	const shim = await writeShim(
		layout,
		{ binary: detected.value.binary, tool, version },
		shimKindFor(platform),
	)
	if (!shim.ok) {
		await abandonVersion(layout, tool, version, updated)
		return shim
	}

	options.onEvent?.({ binary: detected.value.binary, tool, type: "installed", version })
	return { ok: true, value: "installed" }
}

/**
 * The version is already unpacked; make sure the record and shim point at it.
 */
async function relink(
	tool: ToolName,
	target: ShimTarget,
	record: InstallRecord,
	options: InstallOptions,
): Promise<Result<InstallOutcome, InstallError>> {
	const kind = shimKindFor(options.platform)
	if (record.current === target.version) {
		const current = await shimIsCurrent(options.layout, target, kind)
		if (!current.ok) {
			return current
		}
		if (current.value) {
			return { ok: true, value: "skipped" }
		}
	}

	const written = await writeInstallRecord(options.layout, tool, {
		...record,
		current: target.version,
	})
	if (!written.ok) {
		return written
	}

	const shim = await writeShim(options.layout, target, kind)
	if (!shim.ok) {
		return shim
	}

	options.onEvent?.({ tool, type: "relinked", version: target.version })
	return { ok: true, value: "relinked" }
}

/**
 * Locked entries are only installable on a platform that accepts them and
 * from a supported archive format.
 */
function checkEntry(
	tool: ToolName,
	entry: LockedEntry,
	platform: Platform,
): Result<ArchiveFormat, NoCompatibleAssetError> {
	const failure = (message: string): Result<ArchiveFormat, NoCompatibleAssetError> => ({
		error: {
			available: [entry.platform],
			message,
			platform: describePlatform(platform),
			tool,
			type: "no_compatible_asset",
			version: entry.resolvedVersion,
		},
		ok: false,
	})

	if (!acceptsPlatform(platform, entry.platform)) {
		return failure(
			`${tool} ${entry.resolvedVersion} is locked for ${entry.platform}, not ${describePlatform(platform)}. Run \`frate sync\` to re-lock it.`,
		)
	}

	const format = archiveFormatFromUrl(entry.downloadUrl)
	if (!format) {
		return failure(`Unsupported archive format for ${tool}: ${entry.downloadUrl}`)
	}
	return { ok: true, value: format }
}

/**
 * Backs out a version whose directory may already have been replaced. When
 * the shim could point at it, the whole entry goes with the shim; otherwise
 * only the version and its record entry.
 */
async function abandonVersion(
	layout: CacheLayout,
	tool: ToolName,
	version: string,
	record: InstallRecord,
): Promise<void> {
	const installs = Object.fromEntries(
		Object.entries(record.installs).filter(([installed]) => installed !== version),
	)
	if (record.current === version || Object.keys(installs).length === 0) {
		await removeShim(layout, tool)
		await removeToolDir(layout, tool)
		return
	}

	await removeToolVersion(layout, tool, version)
	await writeInstallRecord(layout, tool, { ...record, installs })
}
