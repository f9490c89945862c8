import { parse } from "smol-toml"
import { z } from "zod"
import { LOCKFILE_FILENAME, LOCKFILE_VERSION } from "../constants"
import type { AbsolutePath, ToolName } from "../types/branded"
import {
	coerceChecksum,
	coerceExactVersion,
	coerceNonEmpty,
	coerceToolName,
} from "../types/coerce"
import type { ManifestParseError, Result } from "../types/error"
import { createLockfile } from "./model"
import type { LockedEntry, Lockfile } from "./types"

const LockedEntrySchema = z.object({
	checksum: z.string(),
	download_url: z.string(),
	platform: z.string(),
	resolved_version: z.string(),
})

const LockfileSchema = z.object({
	tools: z.record(z.string(), LockedEntrySchema).default({}),
	version: z.number().int(),
})

export type LockfileResult = Result<Lockfile, ManifestParseError>

export function parseLockfile(contents: string, sourcePath?: AbsolutePath): LockfileResult {
	let document: unknown
	try {
		document = parse(contents)
	} catch (error) {
		return {
			error: {
				message: `Invalid TOML: ${error instanceof Error ? error.message : String(error)}`,
				path: sourcePath,
				rawError: error instanceof Error ? error : undefined,
				source: LOCKFILE_FILENAME,
				type: "manifest_parse",
			},
			ok: false,
		}
	}

	const result = LockfileSchema.safeParse(document)
	if (!result.success) {
		return {
			error: {
				field: "lockfile",
				message: `Invalid ${LOCKFILE_FILENAME} structure.`,
				path: sourcePath,
				rawError: result.error,
				source: LOCKFILE_FILENAME,
				type: "manifest_parse",
				zodError: result.error,
			},
			ok: false,
		}
	}

	if (result.data.version !== LOCKFILE_VERSION) {
		return lockFailure(
			"version",
			`Unsupported lockfile version ${result.data.version}.`,
			sourcePath,
		)
	}

	const entries: [ToolName, LockedEntry][] = []
	for (const [rawName, raw] of Object.entries(result.data.tools)) {
		const name = coerceToolName(rawName)
		if (!name || name !== rawName) {
			return lockFailure(`tools.${rawName}`, `Invalid tool name: ${rawName}.`, sourcePath)
		}

		const resolvedVersion = coerceExactVersion(raw.resolved_version)
		if (!resolvedVersion) {
			return lockFailure(
				`tools.${rawName}.resolved_version`,
				`Invalid resolved version for ${rawName}: "${raw.resolved_version}".`,
				sourcePath,
			)
		}

		const checksum = coerceChecksum(raw.checksum)
		if (!checksum) {
			return lockFailure(
				`tools.${rawName}.checksum`,
				`Invalid checksum for ${rawName}.`,
				sourcePath,
			)
		}

		const downloadUrl = coerceNonEmpty(raw.download_url)
		const platform = coerceNonEmpty(raw.platform)
		if (!downloadUrl || !platform) {
			return lockFailure(
				`tools.${rawName}`,
				`Locked entry for ${rawName} must have a download_url and a platform.`,
				sourcePath,
			)
		}

		entries.push([name, { checksum, downloadUrl, platform, resolvedVersion }])
	}

	return { ok: true, value: createLockfile(entries) }
}

function lockFailure(
	field: string,
	message: string,
	sourcePath: AbsolutePath | undefined,
): LockfileResult {
	return {
		error: {
			field,
			message,
			path: sourcePath,
			source: LOCKFILE_FILENAME,
			type: "manifest_parse",
		},
		ok: false,
	}
}
