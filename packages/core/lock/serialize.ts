import { stringify } from "smol-toml"
import { LOCKFILE_HEADER, LOCKFILE_VERSION } from "../constants"
import { createLockfile } from "./model"
import type { Lockfile } from "./types"

/**
 * Serialize a Lockfile to TOML. The output depends only on the entries,
 * never on insertion order, so re-locking an unchanged project is
 * byte-identical.
 */
export function serializeLockfile(lockfile: Lockfile): string {
	const sorted = createLockfile(lockfile.entries)
	const tools: Record<string, Record<string, string>> = {}
	for (const [name, entry] of sorted.entries) {
		tools[name] = {
			checksum: entry.checksum,
			download_url: entry.downloadUrl,
			platform: entry.platform,
			resolved_version: entry.resolvedVersion,
		}
	}

	const body = stringify({ version: LOCKFILE_VERSION }).trim()
	const toolsBody = sorted.entries.size > 0 ? `\n\n${stringify({ tools }).trim()}` : ""
	return `${LOCKFILE_HEADER}\n\n${body}${toolsBody}\n`
}
