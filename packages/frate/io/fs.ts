import { createHash, randomUUID } from "node:crypto"
import { createReadStream, type Dirent, type Stats } from "node:fs"
import {
	chmod,
	type FileHandle,
	lstat,
	mkdir,
	mkdtemp,
	open,
	readdir,
	readFile,
	rename,
	rm,
	rmdir,
	stat,
	writeFile,
} from "node:fs/promises"
import path from "node:path"
import { type AbsolutePath, assertAbsolutePathDirect } from "@frate/core"
import type { CacheIoError, IoResult } from "@/io/types"

export type { CacheIoError, IoResult } from "@/io/types"

type StatResult = IoResult<Stats | null>
type LStatResult = IoResult<Stats | null>

export async function safeStat(targetPath: string): Promise<StatResult> {
	try {
		const stats = await stat(targetPath)
		return { ok: true, value: stats }
	} catch (error) {
		if (isNotFound(error)) {
			return { ok: true, value: null }
		}

		return ioFailure(`Unable to access ${targetPath}.`, "stat", targetPath, error)
	}
}

export async function safeLstat(targetPath: string): Promise<LStatResult> {
	try {
		const stats = await lstat(targetPath)
		return { ok: true, value: stats }
	} catch (error) {
		if (isNotFound(error)) {
			return { ok: true, value: null }
		}

		return ioFailure(`Unable to access ${targetPath}.`, "lstat", targetPath, error)
	}
}

export async function ensureDir(targetPath: string): Promise<IoResult<void>> {
	const stats = await safeStat(targetPath)
	if (!stats.ok) {
		return stats
	}

	if (stats.value && !stats.value.isDirectory()) {
		return {
			error: {
				message: `Expected directory at ${targetPath}.`,
				operation: "mkdir",
				path: toAbsolutePath(targetPath),
				type: "cache_io",
			},
			ok: false,
		}
	}

	if (!stats.value) {
		try {
			await mkdir(targetPath, { recursive: true })
		} catch (error) {
			return ioFailure(`Unable to create ${targetPath}.`, "mkdir", targetPath, error)
		}
	}

	return { ok: true, value: undefined }
}

/**
 * File contents as UTF-8; a missing file reads as null.
 */
export async function readTextFileIfExists(
	targetPath: string,
): Promise<IoResult<string | null>> {
	try {
		const contents = await readFile(targetPath, "utf8")
		return { ok: true, value: contents }
	} catch (error) {
		if (isNotFound(error)) {
			return { ok: true, value: null }
		}
		return ioFailure(`Unable to read ${targetPath}.`, "readFile", targetPath, error)
	}
}

/**
 * Writes to a unique sibling first and renames it into place, so readers
 * only ever see the old or the new contents.
 */
export async function writeFileAtomic(
	targetPath: string,
	contents: string | Uint8Array,
	options: { mode?: number } = {},
): Promise<IoResult<void>> {
	const tempPath = path.join(
		path.dirname(targetPath),
		`.${path.basename(targetPath)}.${randomUUID()}.tmp`,
	)

	try {
		await writeFile(tempPath, contents, { mode: options.mode })
		if (options.mode !== undefined) {
			// writeFile's mode is filtered through the umask
			await chmod(tempPath, options.mode)
		}
	} catch (error) {
		await rm(tempPath, { force: true })
		return ioFailure(`Unable to write ${targetPath}.`, "writeFile", targetPath, error)
	}

	return renamePath(tempPath, targetPath, { removeSourceOnFailure: true })
}

export async function renamePath(
	from: string,
	to: string,
	options: { removeSourceOnFailure?: boolean } = {},
): Promise<IoResult<void>> {
	try {
		await rename(from, to)
		return { ok: true, value: undefined }
	} catch (error) {
		if (options.removeSourceOnFailure) {
			await rm(from, { force: true, recursive: true })
		}
		return ioFailure(`Unable to move ${from} to ${to}.`, "rename", to, error)
	}
}

export async function removePath(targetPath: string): Promise<IoResult<void>> {
	try {
		await rm(targetPath, { force: true, recursive: true })
		return { ok: true, value: undefined }
	} catch (error) {
		return ioFailure(`Unable to remove ${targetPath}.`, "rm", targetPath, error)
	}
}

/**
 * Writes the chunks to a new file as they arrive.
 */
export async function writeChunks(
	targetPath: string,
	chunks: AsyncIterable<Uint8Array>,
): Promise<IoResult<void>> {
	let handle: FileHandle
	try {
		handle = await open(targetPath, "w")
	} catch (error) {
		return ioFailure(`Unable to write ${targetPath}.`, "writeFile", targetPath, error)
	}

	try {
		for await (const chunk of chunks) {
			await handle.write(chunk)
		}
	} catch (error) {
		return ioFailure(`Unable to write ${targetPath}.`, "writeFile", targetPath, error)
	} finally {
		await handle.close()
	}
	return { ok: true, value: undefined }
}

/**
 * Removes a directory only when it is empty. Missing and non-empty
 * directories are left alone.
 */
export async function removeEmptyDir(targetPath: string): Promise<IoResult<void>> {
	try {
		await rmdir(targetPath)
	} catch (error) {
		if (!isNotFound(error) && !hasCode(error, "ENOTEMPTY") && !hasCode(error, "EEXIST")) {
			return ioFailure(`Unable to remove ${targetPath}.`, "rmdir", targetPath, error)
		}
	}
	return { ok: true, value: undefined }
}

/**
 * Directory entries sorted by name. A missing directory has no entries.
 */
export async function listDir(targetPath: string): Promise<IoResult<Dirent[]>> {
	try {
		const entries = await readdir(targetPath, { withFileTypes: true })
		return {
			ok: true,
			value: entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0)),
		}
	} catch (error) {
		if (isNotFound(error)) {
			return { ok: true, value: [] }
		}
		return ioFailure(`Unable to list ${targetPath}.`, "readdir", targetPath, error)
	}
}

export async function makeTempDir(
	parent: string,
	prefix: string,
): Promise<IoResult<AbsolutePath>> {
	const ensured = await ensureDir(parent)
	if (!ensured.ok) {
		return ensured
	}

	try {
		const created = await mkdtemp(path.join(parent, prefix))
		return { ok: true, value: toAbsolutePath(created) }
	} catch (error) {
		return ioFailure(`Unable to create a directory in ${parent}.`, "mkdtemp", parent, error)
	}
}

export async function chmodPath(targetPath: string, mode: number): Promise<IoResult<void>> {
	try {
		await chmod(targetPath, mode)
		return { ok: true, value: undefined }
	} catch (error) {
		return ioFailure(`Unable to change mode of ${targetPath}.`, "chmod", targetPath, error)
	}
}

/**
 * Total size in bytes of a file or directory tree. Symlinks count as
 * themselves and are not followed.
 */
export async function pathSize(targetPath: string): Promise<IoResult<number>> {
	const stats = await safeLstat(targetPath)
	if (!stats.ok) {
		return stats
	}
	if (!stats.value) {
		return { ok: true, value: 0 }
	}
	if (!stats.value.isDirectory()) {
		return { ok: true, value: stats.value.size }
	}

	const entries = await listDir(targetPath)
	if (!entries.ok) {
		return entries
	}

	let total = 0
	for (const entry of entries.value) {
		const size = await pathSize(path.join(targetPath, entry.name))
		if (!size.ok) {
			return size
		}
		total += size.value
	}
	return { ok: true, value: total }
}

/**
 * Hex SHA-256 of a file, read as a stream.
 */
export async function hashFile(targetPath: string): Promise<IoResult<string>> {
	const hash = createHash("sha256")
	try {
		for await (const chunk of createReadStream(targetPath)) {
			hash.update(chunk)
		}
	} catch (error) {
		return ioFailure(`Unable to read ${targetPath}.`, "readFile", targetPath, error)
	}
	return { ok: true, value: hash.digest("hex") }
}

export function toAbsolutePath(value: string): AbsolutePath {
	return assertAbsolutePathDirect(path.resolve(value))
}

export function isNotFound(error: unknown): boolean {
	return hasCode(error, "ENOENT")
}

function hasCode(error: unknown, code: string): boolean {
	return typeof error === "object" && error !== null && "code" in error && error.code === code
}

function ioFailure(
	message: string,
	operation: string,
	targetPath: string,
	error: unknown,
): { ok: false; error: CacheIoError } {
	return {
		error: {
			message,
			operation,
			path: toAbsolutePath(targetPath),
			rawError: error instanceof Error ? error : undefined,
			type: "cache_io",
		},
		ok: false,
	}
}
