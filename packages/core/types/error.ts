import type { ZodError } from "zod"
import type { AbsolutePath } from "./branded"

export interface BaseError {
	type: string
	message: string
	cause?: BaseError
	rawError?: Error
}

export type ManifestSource = "frate.toml" | "frate.lock"

export type ManifestParseError = BaseError & {
	type: "manifest_parse"
	source: ManifestSource
	field?: string
	path?: AbsolutePath
	zodError?: ZodError
}

export type NoMatchingVersionError = BaseError & {
	type: "no_matching_version"
	tool: string
	requirement: string
	available: string[]
}

export type NoCompatibleAssetError = BaseError & {
	type: "no_compatible_asset"
	tool: string
	version: string
	platform: string
	available: string[]
}

export type RegistryUnavailableError = BaseError & {
	type: "registry_unavailable"
	url: string
	status?: number
}

export type FetchError = BaseError & {
	type: "fetch"
	url: string
	status?: number
	retryable: true
}

export type IntegrityError = BaseError & {
	type: "integrity"
	url: string
	expected: string
	actual: string
}

export type UnsafeArchiveEntryError = BaseError & {
	type: "unsafe_archive_entry"
	entry: string
	path: AbsolutePath
}

export type ArchiveError = BaseError & {
	type: "archive"
	path: AbsolutePath
}

export type CacheIoError = BaseError & {
	type: "cache_io"
	path: AbsolutePath
	operation: string
}

export type ShimGenerationError = BaseError & {
	type: "shim_generation"
	tool: string
	path?: AbsolutePath
}

export type NotFoundTarget = "manifest" | "lockfile" | "cache" | "registry"

export type NotFoundError = BaseError & {
	type: "not_found"
	target: NotFoundTarget
	name?: string
	path?: AbsolutePath
}

export type FrateError =
	| ManifestParseError
	| NoMatchingVersionError
	| NoCompatibleAssetError
	| RegistryUnavailableError
	| FetchError
	| IntegrityError
	| UnsafeArchiveEntryError
	| ArchiveError
	| CacheIoError
	| ShimGenerationError
	| NotFoundError

export type Result<T, E extends BaseError = FrateError> =
	| { ok: true; value: T }
	| { ok: false; error: E }
