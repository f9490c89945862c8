import type { Checksum, ExactVersion, NonEmptyString, ToolName } from "../types/branded"

export interface LockedEntry {
	readonly resolvedVersion: ExactVersion
	readonly downloadUrl: NonEmptyString
	readonly checksum: Checksum
	readonly platform: NonEmptyString
}

/**
 * In-memory `frate.lock`. Entries are always kept sorted by tool name.
 */
export interface Lockfile {
	readonly entries: ReadonlyMap<ToolName, LockedEntry>
}
