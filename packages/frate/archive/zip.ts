import { chmod, writeFile } from "node:fs/promises"
import path from "node:path"
import AdmZip from "adm-zip"
import {
	corruptArchive,
	entryWriteFailure,
	makeEntryDir,
	permissionBits,
	resolveEntryPath,
	unsafeEntry,
} from "@/archive/entries"
import type { Extractor } from "@/archive/types"

const S_IFMT = 0o170000
const S_IFLNK = 0o120000

/**
 * Zip extraction. Unix permissions come from the upper half of each entry's
 * external attributes; archives made on Windows carry none.
 */
export const extractZip: Extractor = async (archivePath, stagingDir) => {
	let zip: AdmZip
	try {
		zip = new AdmZip(archivePath)
	} catch (error) {
		return corruptArchive(archivePath, error)
	}

	for (const entry of zip.getEntries()) {
		const target = resolveEntryPath(archivePath, stagingDir, entry.entryName)
		if (!target.ok) {
			return target
		}
		if (target.value === null) continue

		const unixMode = (entry.attr >>> 16) & 0xffff
		if ((unixMode & S_IFMT) === S_IFLNK) {
			return unsafeEntry(archivePath, entry.entryName, "links are not allowed")
		}

		if (entry.isDirectory) {
			const made = await makeEntryDir(target.value)
			if (!made.ok) {
				return made
			}
			continue
		}

		let data: Buffer
		try {
			data = entry.getData()
		} catch (error) {
			return corruptArchive(archivePath, error)
		}

		const made = await makeEntryDir(path.dirname(target.value))
		if (!made.ok) {
			return made
		}

		const mode = permissionBits(unixMode)
		try {
			await writeFile(target.value, data)
			await chmod(target.value, mode)
		} catch (error) {
			return entryWriteFailure(target.value, "writeFile", error)
		}
	}

	return { ok: true, value: undefined }
}
