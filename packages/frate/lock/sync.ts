import {
	type AbsolutePath,
	acceptsPlatform,
	type CacheIoError,
	createLockfile,
	type ExactVersion,
	findRelease,
	getLocked,
	type LockedEntry,
	type Lockfile,
	lockedEntriesEqual,
	type Manifest,
	type NoCompatibleAssetError,
	type NoMatchingVersionError,
	type NotFoundError,
	type Platform,
	type RegistryUnavailableError,
	type Result,
	resolveVersion,
	type SelectedAsset,
	satisfiesRequirement,
	selectAsset,
	type ToolName,
	type ToolRecord,
	type VersionRequirement,
} from "@frate/core"
import { writeLockfile } from "@/lock/fs"
import type { RegistryClient } from "@/registry/client"

export interface SyncLockfileOptions {
	manifest: Manifest
	lockfile: Lockfile
	platform: Platform
	registry: RegistryClient
	/** Re-resolve kept entries whose locked version has left the registry */
	refresh?: boolean
}

export interface LockSyncSummary {
	added: ToolName[]
	updated: ToolName[]
	kept: ToolName[]
	removed: ToolName[]
}

export interface LockSyncOutcome {
	lockfile: Lockfile
	summary: LockSyncSummary
	changed: boolean
}

export type LockSyncError =
	| NoMatchingVersionError
	| NoCompatibleAssetError
	| RegistryUnavailableError
	| NotFoundError

type LockSyncResult<T> = Result<T, LockSyncError>

/**
 * Brings the lockfile in line with the manifest. Locked entries that still
 * satisfy their requirement on this platform keep their version, with the
 * asset re-selected from the registry's current record; everything else is
 * resolved afresh. The first failure aborts the whole sync.
 */
export async function syncLockfile(
	options: SyncLockfileOptions,
): Promise<LockSyncResult<LockSyncOutcome>> {
	const { manifest, lockfile } = options
	const summary: LockSyncSummary = { added: [], kept: [], removed: [], updated: [] }
	const entries: [ToolName, LockedEntry][] = []

	for (const [name, requirement] of manifest.dependencies) {
		const locked = getLocked(lockfile, name)
		const resolved = await lockTool(name, requirement, locked, options)
		if (!resolved.ok) {
			return resolved
		}

		entries.push([name, resolved.value])
		if (!locked) {
			summary.added.push(name)
		} else if (lockedEntriesEqual(locked, resolved.value)) {
			summary.kept.push(name)
		} else {
			summary.updated.push(name)
		}
	}

	for (const name of lockfile.entries.keys()) {
		if (!manifest.dependencies.has(name)) {
			summary.removed.push(name)
		}
	}

	const changed =
		summary.added.length > 0 || summary.updated.length > 0 || summary.removed.length > 0
	return {
		ok: true,
		value: { changed, lockfile: createLockfile(entries), summary },
	}
}

/**
 * Sync followed by an atomic write of the lockfile. Nothing is written when
 * the sync fails.
 */
export async function resolveAndLock(
	options: SyncLockfileOptions & { lockfilePath: AbsolutePath },
): Promise<Result<LockSyncOutcome, LockSyncError | CacheIoError>> {
	const synced = await syncLockfile(options)
	if (!synced.ok) {
		return synced
	}

	const written = await writeLockfile(options.lockfilePath, synced.value.lockfile)
	if (!written.ok) {
		return written
	}
	return synced
}

async function lockTool(
	name: ToolName,
	requirement: VersionRequirement,
	locked: LockedEntry | undefined,
	options: SyncLockfileOptions,
): Promise<LockSyncResult<LockedEntry>> {
	const { platform, registry } = options
	const record = await registry.getTool(name)
	if (!record.ok) {
		return record
	}

	const reusable =
		locked !== undefined &&
		satisfiesRequirement(locked.resolvedVersion, requirement) &&
		acceptsPlatform(platform, locked.platform)

	if (reusable) {
		const reselected = reselectAsset(name, locked.resolvedVersion, record.value, platform)
		if (reselected) {
			return { ok: true, value: reselected }
		}
		// Version or asset withdrawn upstream; only a refresh moves off it.
		if (!options.refresh) {
			return { ok: true, value: locked }
		}
	}

	const version = resolveVersion(
		name,
		requirement,
		record.value.versions.map((release) => release.version),
	)
	if (!version.ok) {
		return version
	}

	const release = findRelease(record.value.versions, version.value)
	if (!release) {
		return {
			error: {
				available: [],
				message: `${name} ${version.value} is not published.`,
				requirement,
				tool: name,
				type: "no_matching_version",
			},
			ok: false,
		}
	}

	const asset = selectAsset(name, release, platform)
	if (!asset.ok) {
		return asset
	}
	return { ok: true, value: toLockedEntry(version.value, asset.value) }
}

/**
 * The locked version's current best asset, or undefined when the version or
 * every compatible asset has disappeared from the registry.
 */
function reselectAsset(
	name: ToolName,
	version: ExactVersion,
	record: ToolRecord,
	platform: Platform,
): LockedEntry | undefined {
	const release = findRelease(record.versions, version)
	if (!release) {
		return undefined
	}
	const asset = selectAsset(name, release, platform)
	return asset.ok ? toLockedEntry(version, asset.value) : undefined
}

function toLockedEntry(version: ExactVersion, asset: SelectedAsset): LockedEntry {
	return {
		checksum: asset.checksum,
		downloadUrl: asset.url,
		platform: asset.platform,
		resolvedVersion: version,
	}
}
