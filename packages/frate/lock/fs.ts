import {
	type AbsolutePath,
	type CacheIoError,
	createLockfile,
	type Lockfile,
	type ManifestParseError,
	type NotFoundError,
	parseLockfile,
	type Result,
	serializeLockfile,
} from "@frate/core"
import { readTextFileIfExists, writeFileAtomic } from "@/io/fs"

/**
 * Reads `frate.lock`. A missing lockfile reads as an empty one.
 */
export async function readLockfile(
	lockfilePath: AbsolutePath,
): Promise<Result<Lockfile, ManifestParseError | CacheIoError>> {
	const contents = await readTextFileIfExists(lockfilePath)
	if (!contents.ok) {
		return contents
	}
	if (contents.value === null) {
		return { ok: true, value: createLockfile() }
	}
	return parseLockfile(contents.value, lockfilePath)
}

/**
 * Like readLockfile, but a missing lockfile is an error.
 */
export async function requireLockfile(
	lockfilePath: AbsolutePath,
): Promise<Result<Lockfile, ManifestParseError | CacheIoError | NotFoundError>> {
	const contents = await readTextFileIfExists(lockfilePath)
	if (!contents.ok) {
		return contents
	}
	if (contents.value === null) {
		return {
			error: {
				message: `Lockfile not found: ${lockfilePath}. Run \`frate sync\` first.`,
				path: lockfilePath,
				target: "lockfile",
				type: "not_found",
			},
			ok: false,
		}
	}
	return parseLockfile(contents.value, lockfilePath)
}

export async function writeLockfile(
	lockfilePath: AbsolutePath,
	lockfile: Lockfile,
): Promise<Result<void, CacheIoError>> {
	return writeFileAtomic(lockfilePath, serializeLockfile(lockfile))
}
