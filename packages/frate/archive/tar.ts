import { createReadStream, createWriteStream } from "node:fs"
import { chmod } from "node:fs/promises"
import path from "node:path"
import type { Readable } from "node:stream"
import { finished, pipeline } from "node:stream/promises"
import { createGunzip } from "node:zlib"
import type { AbsolutePath } from "@frate/core"
import { extract } from "tar-stream"
import {
	corruptArchive,
	entryWriteFailure,
	makeEntryDir,
	permissionBits,
	resolveEntryPath,
	unsafeEntry,
} from "@/archive/entries"
import type { ExtractError, ExtractResult, Extractor } from "@/archive/types"

interface TarEntry {
	name: string
	type: string | null | undefined
	mode: number | undefined
}

/**
 * Gzip-compressed tar extraction. Regular files and directories are
 * written; links are refused; device files, fifos and the like are skipped.
 */
export const extractTarGz: Extractor = async (archivePath, stagingDir) => {
	const extractor = extract()
	let failure: ExtractError | undefined

	extractor.on("entry", (header, stream, next) => {
		const entry: TarEntry = { mode: header.mode, name: header.name, type: header.type }
		void writeEntry(archivePath, stagingDir, entry, stream).then(
			(result) => {
				if (result.ok) {
					next()
					return
				}
				failure = result.error
				next(new Error(result.error.message))
			},
			(error: unknown) => next(error),
		)
	})

	try {
		await pipeline(createReadStream(archivePath), createGunzip(), extractor)
	} catch (error) {
		if (failure) {
			return { error: failure, ok: false }
		}
		return corruptArchive(archivePath, error)
	}

	return { ok: true, value: undefined }
}

async function writeEntry(
	archivePath: AbsolutePath,
	stagingDir: AbsolutePath,
	entry: TarEntry,
	stream: Readable,
): Promise<ExtractResult> {
	const target = resolveEntryPath(archivePath, stagingDir, entry.name)
	if (!target.ok) {
		return target
	}

	switch (entry.type) {
		case "symlink":
		case "link":
			return unsafeEntry(archivePath, entry.name, "links are not allowed")
		case "directory": {
			await drain(stream)
			return target.value === null ? { ok: true, value: undefined } : makeEntryDir(target.value)
		}
		case "file":
		case "contiguous-file":
		case null:
		case undefined:
			break
		default:
			await drain(stream)
			return { ok: true, value: undefined }
	}

	if (target.value === null) {
		await drain(stream)
		return { ok: true, value: undefined }
	}

	const made = await makeEntryDir(path.dirname(target.value))
	if (!made.ok) {
		return made
	}

	const mode = permissionBits(entry.mode)
	try {
		await pipeline(stream, createWriteStream(target.value, { mode }))
		await chmod(target.value, mode)
	} catch (error) {
		return entryWriteFailure(target.value, "writeFile", error)
	}
	return { ok: true, value: undefined }
}

async function drain(stream: Readable): Promise<void> {
	stream.resume()
	await finished(stream)
}
