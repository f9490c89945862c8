import type {
	AbsolutePath,
	ArchiveError,
	CacheIoError,
	Result,
	UnsafeArchiveEntryError,
} from "@frate/core"

export type ExtractError = UnsafeArchiveEntryError | ArchiveError | CacheIoError

export type ExtractResult = Result<void, ExtractError>

/**
 * Unpacks `archivePath` into `stagingDir`, which already exists and is empty.
 */
export type Extractor = (
	archivePath: AbsolutePath,
	stagingDir: AbsolutePath,
) => Promise<ExtractResult>
