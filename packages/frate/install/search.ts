import {
	acceptsPlatform,
	type NotFoundError,
	type Platform,
	type RegistryUnavailableError,
	type Result,
} from "@frate/core"
import semver from "semver"
import type { RegistryClient } from "@/registry/client"

export interface SearchedVersion {
	version: string
	/** True when a release asset exists for the running platform */
	available: boolean
}

export interface SearchResult {
	name: string
	description?: string
	/** Published versions, newest first; unparsable versions are left out */
	versions: SearchedVersion[]
}

export async function searchTool(
	name: string,
	registry: RegistryClient,
	platform: Platform,
): Promise<Result<SearchResult, RegistryUnavailableError | NotFoundError>> {
	const record = await registry.getTool(name)
	if (!record.ok) {
		return record
	}

	const versions = record.value.versions
		.filter((release) => semver.valid(release.version) !== null)
		.sort((a, b) => semver.rcompare(a.version, b.version))
		.map((release) => ({
			available: release.platform_assets.some((asset) =>
				acceptsPlatform(platform, asset.platform),
			),
			version: release.version,
		}))

	return {
		ok: true,
		value: { description: record.value.description, name: record.value.name, versions },
	}
}
