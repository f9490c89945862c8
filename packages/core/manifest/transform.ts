import type { NonEmptyString, ToolName, VersionRequirement } from "../types/branded"
import type { Manifest } from "./types"

export function createManifest(projectName: NonEmptyString, version: NonEmptyString): Manifest {
	return {
		dependencies: new Map<ToolName, VersionRequirement>(),
		project: { name: projectName, version },
	}
}

/**
 * Adds or replaces a dependency. A replaced dependency keeps its position.
 */
export function setDependency(
	manifest: Manifest,
	name: ToolName,
	requirement: VersionRequirement,
): Manifest {
	const dependencies = new Map(manifest.dependencies)
	dependencies.set(name, requirement)
	return { ...manifest, dependencies }
}

export function removeDependency(manifest: Manifest, name: ToolName): Manifest {
	if (!manifest.dependencies.has(name)) {
		return manifest
	}

	const dependencies = new Map(manifest.dependencies)
	dependencies.delete(name)
	return { ...manifest, dependencies }
}
