import { mkdir } from "node:fs/promises"
import path from "node:path"
import type {
	AbsolutePath,
	ArchiveError,
	CacheIoError,
	Result,
	UnsafeArchiveEntryError,
} from "@frate/core"
import { toAbsolutePath } from "@/io/fs"

export const DEFAULT_FILE_MODE = 0o644

/**
 * Where an archive entry lands inside the staging directory. Null for
 * entries naming the staging directory itself (`./`). Absolute names and
 * names that resolve outside the staging directory are unsafe.
 */
export function resolveEntryPath(
	archivePath: AbsolutePath,
	stagingDir: AbsolutePath,
	entryName: string,
): Result<string | null, UnsafeArchiveEntryError> {
	const normalized = entryName.replace(/\\/g, "/")
	if (
		normalized.startsWith("/") ||
		/^[A-Za-z]:/.test(normalized) ||
		normalized.includes("\0")
	) {
		return unsafeEntry(archivePath, entryName, "is an absolute path")
	}

	const resolved = path.resolve(stagingDir, normalized)
	const relative = path.relative(stagingDir, resolved)
	if (relative === "") {
		return { ok: true, value: null }
	}
	if (relative === ".." || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
		return unsafeEntry(archivePath, entryName, "resolves outside the extraction directory")
	}
	return { ok: true, value: resolved }
}

export function unsafeEntry(
	archivePath: AbsolutePath,
	entryName: string,
	reason: string,
): { ok: false; error: UnsafeArchiveEntryError } {
	return {
		error: {
			entry: entryName,
			message: `Unsafe archive entry "${entryName}": ${reason}.`,
			path: archivePath,
			type: "unsafe_archive_entry",
		},
		ok: false,
	}
}

export function corruptArchive(
	archivePath: AbsolutePath,
	error: unknown,
): { ok: false; error: ArchiveError } {
	return {
		error: {
			message: `Unable to read archive ${archivePath}.`,
			path: archivePath,
			rawError: error instanceof Error ? error : undefined,
			type: "archive",
		},
		ok: false,
	}
}

export async function makeEntryDir(targetPath: string): Promise<Result<void, CacheIoError>> {
	try {
		await mkdir(targetPath, { recursive: true })
		return { ok: true, value: undefined }
	} catch (error) {
		return entryWriteFailure(targetPath, "mkdir", error)
	}
}

export function entryWriteFailure(
	targetPath: string,
	operation: string,
	error: unknown,
): { ok: false; error: CacheIoError } {
	return {
		error: {
			message: `Unable to extract ${targetPath}.`,
			operation,
			path: toAbsolutePath(targetPath),
			rawError: error instanceof Error ? error : undefined,
			type: "cache_io",
		},
		ok: false,
	}
}

/**
 * Permission bits to give an extracted file; entries without any fall back
 * to the default file mode.
 */
export function permissionBits(mode: number | undefined): number {
	const bits = (mode ?? 0) & 0o777
	return bits === 0 ? DEFAULT_FILE_MODE : bits
}
