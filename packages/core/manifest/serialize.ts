import { stringify } from "smol-toml"
import type { Manifest, RawManifest } from "./types"

/**
 * Serialize a Manifest to TOML. `[project]` comes first, `[dependencies]`
 * is always present.
 */
export function serializeManifest(manifest: Manifest): string {
	const raw = toRawManifest(manifest)
	const project = stringify({ project: raw.project }).trim()
	const dependencies =
		raw.dependencies && Object.keys(raw.dependencies).length > 0
			? stringify({ dependencies: raw.dependencies }).trim()
			: "[dependencies]"

	return `${project}\n\n${dependencies}\n`
}

export function toRawManifest(manifest: Manifest): RawManifest {
	return {
		dependencies: Object.fromEntries(manifest.dependencies),
		project: {
			name: manifest.project.name,
			version: manifest.project.version,
		},
	}
}
