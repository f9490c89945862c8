/**
 * @frate/core
 *
 * Pure data model and algorithms: manifests, lockfiles, registry records,
 * version resolution, asset selection, binary ranking and shim rendering.
 */

export {
	binaryStem,
	classifyCandidate,
	isWindowsExecutableName,
	rankBinaryCandidates,
	stripDecorations,
} from "./binary/rank"
export type { BinaryMatch, RankedCandidate } from "./binary/rank"
export {
	BIN_DIR,
	DEFAULT_PROJECT_VERSION,
	DOWNLOADS_DIR,
	FRATE_GLOBAL_DIR,
	LOCKFILE_FILENAME,
	LOCKFILE_HEADER,
	LOCKFILE_VERSION,
	MANIFEST_FILENAME,
	TMP_DIR,
	TOOL_RECORD_FILENAME,
	TOOL_RECORD_SCHEMA,
	TOOLS_DIR,
} from "./constants"
export { compareNames, createLockfile, getLocked, lockedEntriesEqual } from "./lock/model"
export { parseLockfile } from "./lock/parse"
export type { LockfileResult } from "./lock/parse"
export { serializeLockfile } from "./lock/serialize"
export type { LockedEntry, Lockfile } from "./lock/types"
export { serializeManifest, toRawManifest } from "./manifest/serialize"
export { createManifest, removeDependency, setDependency } from "./manifest/transform"
export type { Manifest, ProjectInfo, RawManifest } from "./manifest/types"
export { parseManifest } from "./manifest/validate"
export type { ManifestResult } from "./manifest/validate"
export { acceptsPlatform, describePlatform, platformFor } from "./platform/platform"
export type { Platform } from "./platform/platform"
export { findToolRecord, parseRegistryDocument } from "./registry/parse"
export type {
	PlatformAsset,
	RegistryDocument,
	RegistryVersion,
	ToolRecord,
} from "./registry/types"
export { archiveExtension, archiveFormatFromUrl, selectAsset } from "./resolve/asset"
export type { ArchiveFormat, SelectedAsset } from "./resolve/asset"
export { findRelease, resolveVersion, satisfiesRequirement } from "./resolve/version"
export { renderShim, shimFileName, shimTargetPath } from "./shims/render"
export type { ShimKind, ShimTarget } from "./shims/render"
export type {
	AbsolutePath,
	Checksum,
	ExactVersion,
	NonEmptyString,
	ToolName,
	VersionRequirement,
} from "./types/branded"
export {
	assertAbsolutePathDirect,
	checksumDigest,
	coerceChecksum,
	coerceExactVersion,
	coerceNonEmpty,
	coerceToolName,
	coerceVersionRequirement,
} from "./types/coerce"
export type {
	ArchiveError,
	BaseError,
	CacheIoError,
	FetchError,
	FrateError,
	IntegrityError,
	ManifestParseError,
	ManifestSource,
	NoCompatibleAssetError,
	NoMatchingVersionError,
	NotFoundError,
	NotFoundTarget,
	RegistryUnavailableError,
	Result,
	ShimGenerationError,
	UnsafeArchiveEntryError,
} from "./types/error"
