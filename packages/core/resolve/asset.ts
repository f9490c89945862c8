import type { Platform } from "../platform/platform"
import { describePlatform } from "../platform/platform"
import type { RegistryVersion } from "../registry/types"
import type { Checksum, NonEmptyString } from "../types/branded"
import { coerceChecksum, coerceNonEmpty } from "../types/coerce"
import type { NoCompatibleAssetError, Result } from "../types/error"

export type ArchiveFormat = "zip" | "tar.gz"

export interface SelectedAsset {
	readonly platform: NonEmptyString
	readonly url: NonEmptyString
	readonly checksum: Checksum
	readonly format: ArchiveFormat
}

/**
 * Archive format is taken from the URL's file extension, ignoring any query
 * string or fragment.
 */
export function archiveFormatFromUrl(url: string): ArchiveFormat | null {
	const pathname = url.split(/[?#]/, 1)[0]?.toLowerCase() ?? ""
	if (pathname.endsWith(".zip")) return "zip"
	if (pathname.endsWith(".tar.gz") || pathname.endsWith(".tgz")) return "tar.gz"
	return null
}

export function archiveExtension(format: ArchiveFormat): string {
	return format === "zip" ? ".zip" : ".tar.gz"
}

export function selectAsset(
	tool: string,
	release: RegistryVersion,
	platform: Platform,
): Result<SelectedAsset, NoCompatibleAssetError> {
	for (const target of platform.targets) {
		for (const asset of release.platform_assets) {
			if (asset.platform !== target) continue

			const format = archiveFormatFromUrl(asset.url)
			const checksum = coerceChecksum(asset.checksum)
			const url = coerceNonEmpty(asset.url)
			const assetPlatform = coerceNonEmpty(asset.platform)
			if (!format || !checksum || !url || !assetPlatform) continue

			return {
				ok: true,
				value: { checksum, format, platform: assetPlatform, url },
			}
		}
	}

	const available = release.platform_assets.map((asset) => asset.platform)
	return {
		error: {
			available,
			message: `No ${tool} ${release.version} asset for ${describePlatform(platform)}.`,
			platform: describePlatform(platform),
			tool,
			type: "no_compatible_asset",
			version: release.version,
		},
		ok: false,
	}
}
