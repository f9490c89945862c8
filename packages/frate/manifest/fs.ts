import {
	type AbsolutePath,
	type CacheIoError,
	type Manifest,
	type ManifestParseError,
	type NotFoundError,
	parseManifest,
	type Result,
	serializeManifest,
} from "@frate/core"
import { readTextFileIfExists, writeFileAtomic } from "@/io/fs"

export type ManifestLoadError = ManifestParseError | NotFoundError | CacheIoError

/**
 * Load a manifest from a specific path.
 */
export async function loadManifest(
	manifestPath: AbsolutePath,
): Promise<Result<Manifest, ManifestLoadError>> {
	const contents = await readTextFileIfExists(manifestPath)
	if (!contents.ok) {
		return contents
	}
	if (contents.value === null) {
		return {
			error: {
				message: `Manifest not found: ${manifestPath}`,
				path: manifestPath,
				target: "manifest",
				type: "not_found",
			},
			ok: false,
		}
	}

	return parseManifest(contents.value, manifestPath)
}

/**
 * Save a manifest to disk.
 */
export async function saveManifest(
	manifest: Manifest,
	manifestPath: AbsolutePath,
): Promise<Result<void, CacheIoError>> {
	return writeFileAtomic(manifestPath, serializeManifest(manifest))
}
