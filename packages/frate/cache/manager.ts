import { randomUUID } from "node:crypto"
import path from "node:path"
import {
	type AbsolutePath,
	type ArchiveFormat,
	coerceToolName,
	type ShimKind,
	type ToolName,
} from "@frate/core"
import {
	type CacheLayout,
	downloadPath,
	installRecordPath,
	shimPath,
	toolDir,
	versionDir,
} from "@/cache/layout"
import {
	type InstallRecord,
	parseInstallRecord,
	serializeInstallRecord,
} from "@/cache/record"
import {
	ensureDir,
	hashFile,
	listDir,
	makeTempDir,
	pathSize,
	readTextFileIfExists,
	removeEmptyDir,
	removePath,
	renamePath,
	safeStat,
	toAbsolutePath,
	writeChunks,
	writeFileAtomic,
} from "@/io/fs"
import type { IoResult } from "@/io/types"

const SHIM_MODE = 0o755

// Every write below the cache root goes through this module. The only
// exception is the inside of a staging directory handed out by
// createStagingDir, which its caller fills before committing or discarding it.

export async function ensureLayout(layout: CacheLayout): Promise<IoResult<void>> {
	for (const dir of [layout.binDir, layout.toolsDir, layout.downloadsDir, layout.tmpDir]) {
		const ensured = await ensureDir(dir)
		if (!ensured.ok) {
			return ensured
		}
	}
	return { ok: true, value: undefined }
}

/**
 * The tool's install record, or null when the tool has no cache entry.
 */
export async function readInstallRecord(
	layout: CacheLayout,
	tool: string,
): Promise<IoResult<InstallRecord | null>> {
	const recordPath = installRecordPath(layout, tool)
	const contents = await readTextFileIfExists(recordPath)
	if (!contents.ok) {
		return contents
	}
	if (contents.value === null) {
		return { ok: true, value: null }
	}
	return parseInstallRecord(contents.value, recordPath)
}

export async function writeInstallRecord(
	layout: CacheLayout,
	tool: string,
	record: InstallRecord,
): Promise<IoResult<void>> {
	const ensured = await ensureDir(toolDir(layout, tool))
	if (!ensured.ok) {
		return ensured
	}
	return writeFileAtomic(installRecordPath(layout, tool), serializeInstallRecord(record))
}

/**
 * Tools with a directory under `tools/`, sorted by name.
 */
export async function listInstalledTools(layout: CacheLayout): Promise<IoResult<ToolName[]>> {
	const entries = await listDir(layout.toolsDir)
	if (!entries.ok) {
		return entries
	}

	const tools: ToolName[] = []
	for (const entry of entries.value) {
		if (!entry.isDirectory()) continue
		const name = coerceToolName(entry.name)
		if (name) {
			tools.push(name)
		}
	}
	return { ok: true, value: tools }
}

export async function createStagingDir(
	layout: CacheLayout,
	prefix: string,
): Promise<IoResult<AbsolutePath>> {
	return makeTempDir(layout.tmpDir, prefix)
}

/**
 * Removes a staged file or directory, and `tmp/` itself once nothing else is
 * staged there.
 */
export async function discardStaged(
	layout: CacheLayout,
	staged: AbsolutePath,
): Promise<IoResult<void>> {
	const removed = await removePath(staged)
	if (!removed.ok) {
		return removed
	}
	return removeEmptyDir(layout.tmpDir)
}

/**
 * The cached archive for a digest when it still hashes to that digest. A
 * stale file is removed and reads as null.
 */
export async function verifiedDownload(
	layout: CacheLayout,
	digest: string,
	format: ArchiveFormat,
): Promise<IoResult<AbsolutePath | null>> {
	const cachedPath = downloadPath(layout, digest, format)
	const stats = await safeStat(cachedPath)
	if (!stats.ok) {
		return stats
	}
	if (!stats.value?.isFile()) {
		return { ok: true, value: null }
	}

	const actual = await hashFile(cachedPath)
	if (!actual.ok) {
		return actual
	}
	if (actual.value === digest) {
		return { ok: true, value: cachedPath }
	}

	const removed = await removePath(cachedPath)
	if (!removed.ok) {
		return removed
	}
	return { ok: true, value: null }
}

/**
 * Streams a download into a new file under `tmp/`.
 */
export async function stageDownload(
	layout: CacheLayout,
	chunks: AsyncIterable<Uint8Array>,
): Promise<IoResult<AbsolutePath>> {
	const ensured = await ensureDir(layout.tmpDir)
	if (!ensured.ok) {
		return ensured
	}

	const staged = toAbsolutePath(path.join(layout.tmpDir, `download-${randomUUID()}`))
	const written = await writeChunks(staged, chunks)
	if (!written.ok) {
		await discardStaged(layout, staged)
		return written
	}
	return { ok: true, value: staged }
}

/**
 * Moves a verified download into `downloads/`, named by its digest.
 */
export async function storeDownload(
	layout: CacheLayout,
	staged: AbsolutePath,
	digest: string,
	format: ArchiveFormat,
): Promise<IoResult<AbsolutePath>> {
	const ensured = await ensureDir(layout.downloadsDir)
	if (!ensured.ok) {
		await discardStaged(layout, staged)
		return ensured
	}

	const stored = downloadPath(layout, digest, format)
	const moved = await renamePath(staged, stored)
	if (!moved.ok) {
		await discardStaged(layout, staged)
		return moved
	}
	const dropped = await removeEmptyDir(layout.tmpDir)
	if (!dropped.ok) {
		return dropped
	}
	return { ok: true, value: stored }
}

/**
 * Moves a fully populated staging directory into place as the version
 * directory, replacing a stale one. The staging parent goes once empty.
 */
export async function commitVersionDir(
	staging: AbsolutePath,
	target: AbsolutePath,
): Promise<IoResult<void>> {
	const ensured = await ensureDir(path.dirname(target))
	if (!ensured.ok) {
		return ensured
	}

	const existing = await safeStat(target)
	if (!existing.ok) {
		return existing
	}
	if (existing.value) {
		const removed = await removePath(target)
		if (!removed.ok) {
			return removed
		}
	}

	const moved = await renamePath(staging, target)
	if (!moved.ok) {
		return moved
	}
	return removeEmptyDir(path.dirname(staging))
}

/**
 * Writes a rendered shim into `bin/`, replacing any previous one atomically.
 */
export async function writeShimFile(
	layout: CacheLayout,
	tool: string,
	kind: ShimKind,
	contents: string,
): Promise<IoResult<AbsolutePath>> {
	const ensured = await ensureDir(layout.binDir)
	if (!ensured.ok) {
		return ensured
	}

	const destination = shimPath(layout, tool, kind)
	const written = await writeFileAtomic(destination, contents, { mode: SHIM_MODE })
	if (!written.ok) {
		return written
	}
	return { ok: true, value: destination }
}

/**
 * Removes both shim variants for the tool; missing shims are fine.
 */
export async function removeShim(layout: CacheLayout, tool: string): Promise<IoResult<void>> {
	for (const kind of ["posix", "windows"] as const) {
		const removed = await removePath(shimPath(layout, tool, kind))
		if (!removed.ok) {
			return removed
		}
	}
	return { ok: true, value: undefined }
}

export async function removeToolDir(layout: CacheLayout, tool: string): Promise<IoResult<void>> {
	return removePath(toolDir(layout, tool))
}

export async function removeToolVersion(
	layout: CacheLayout,
	tool: string,
	version: string,
): Promise<IoResult<void>> {
	return removePath(versionDir(layout, tool, version))
}

/**
 * Removes cached archives. With digests, only archives named after one of
 * them. Returns the number of bytes freed.
 */
export async function clearDownloads(
	layout: CacheLayout,
	digests?: ReadonlySet<string>,
): Promise<IoResult<number>> {
	const entries = await listDir(layout.downloadsDir)
	if (!entries.ok) {
		return entries
	}

	let reclaimed = 0
	for (const entry of entries.value) {
		const digest = entry.name.split(".", 1)[0] ?? ""
		if (digests && !digests.has(digest)) continue

		const removed = await removeMeasured(path.join(layout.downloadsDir, entry.name))
		if (!removed.ok) {
			return removed
		}
		reclaimed += removed.value
	}
	return { ok: true, value: reclaimed }
}

/**
 * Removes leftover staging directories and partial downloads.
 */
export async function clearTmp(layout: CacheLayout): Promise<IoResult<number>> {
	return removeMeasured(layout.tmpDir)
}

export async function removeMeasured(targetPath: string): Promise<IoResult<number>> {
	const size = await pathSize(targetPath)
	if (!size.ok) {
		return size
	}
	const removed = await removePath(targetPath)
	if (!removed.ok) {
		return removed
	}
	return { ok: true, value: size.value }
}
