import type { ToolName } from "../types/branded"
import type { LockedEntry, Lockfile } from "./types"

export function createLockfile(
	entries: Iterable<readonly [ToolName, LockedEntry]> = [],
): Lockfile {
	const sorted = [...entries].sort(([a], [b]) => compareNames(a, b))
	return { entries: new Map(sorted) }
}

export function getLocked(lockfile: Lockfile, name: ToolName): LockedEntry | undefined {
	return lockfile.entries.get(name)
}

export function lockedEntriesEqual(a: LockedEntry, b: LockedEntry): boolean {
	return (
		a.resolvedVersion === b.resolvedVersion &&
		a.downloadUrl === b.downloadUrl &&
		a.checksum === b.checksum &&
		a.platform === b.platform
	)
}

export function compareNames(a: string, b: string): number {
	if (a < b) return -1
	if (a > b) return 1
	return 0
}
