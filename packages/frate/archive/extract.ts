import type { AbsolutePath, ArchiveFormat, Result } from "@frate/core"
import { extractTarGz } from "@/archive/tar"
import type { ExtractError, Extractor } from "@/archive/types"
import { extractZip } from "@/archive/zip"
import type { CacheLayout } from "@/cache/layout"
import { createStagingDir, discardStaged } from "@/cache/manager"

const EXTRACTORS: Readonly<Record<ArchiveFormat, Extractor>> = {
	"tar.gz": extractTarGz,
	zip: extractZip,
}

/**
 * Unpacks into a fresh staging directory under `tmp/` and returns it once
 * every entry has been written. The caller commits it into place or discards
 * it. On failure nothing is left behind.
 */
export async function extractArchive(
	archivePath: AbsolutePath,
	format: ArchiveFormat,
	layout: CacheLayout,
): Promise<Result<AbsolutePath, ExtractError>> {
	const staging = await createStagingDir(layout, "extract-")
	if (!staging.ok) {
		return staging
	}

	const extracted = await EXTRACTORS[format](archivePath, staging.value)
	if (!extracted.ok) {
		await discardStaged(layout, staging.value)
		return extracted
	}
	return staging
}
