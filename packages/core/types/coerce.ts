import path from "node:path"
import semver from "semver"
import type {
	AbsolutePath,
	Checksum,
	ExactVersion,
	NonEmptyString,
	ToolName,
	VersionRequirement,
} from "./branded"

export function coerceNonEmpty(value: string): NonEmptyString | null {
	const trimmed = value.trim()
	if (trimmed.length === 0) return null
	return trimmed as NonEmptyString
}

const TOOL_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/

export function coerceToolName(value: string): ToolName | null {
	const trimmed = value.trim()
	if (!TOOL_NAME_PATTERN.test(trimmed)) return null
	return trimmed as ToolName
}

export function coerceVersionRequirement(value: string): VersionRequirement | null {
	const trimmed = value.trim()
	if (trimmed.length === 0) return null
	if (semver.validRange(trimmed) === null) return null
	return trimmed as VersionRequirement
}

export function coerceExactVersion(value: string): ExactVersion | null {
	const cleaned = semver.valid(value.trim())
	if (cleaned === null) return null
	return cleaned as ExactVersion
}

const SHA256_HEX = /^[0-9a-f]{64}$/

/**
 * Accepts `sha256:<hex>` or a bare hex digest and returns the prefixed,
 * lowercase form.
 */
export function coerceChecksum(value: string): Checksum | null {
	const trimmed = value.trim().toLowerCase()
	const digest = trimmed.startsWith("sha256:") ? trimmed.slice(7) : trimmed
	if (!SHA256_HEX.test(digest)) return null
	return `sha256:${digest}` as Checksum
}

export function checksumDigest(checksum: Checksum): string {
	return checksum.slice("sha256:".length)
}

function coerceAbsolutePathDirect(value: string): AbsolutePath | null {
	const trimmed = value.trim()
	if (trimmed.length === 0) return null
	if (!path.isAbsolute(trimmed)) return null
	return path.normalize(trimmed) as AbsolutePath
}

export function assertAbsolutePathDirect(value: string): AbsolutePath {
	const result = coerceAbsolutePathDirect(value)
	if (!result) {
		throw new Error(`Expected absolute path, got: ${value}`)
	}
	return result
}
