import type {
	AbsolutePath,
	NonEmptyString,
	ToolName,
	VersionRequirement,
} from "../types/branded"

export interface ProjectInfo {
	readonly name: NonEmptyString
	readonly version: NonEmptyString
}

/**
 * In-memory `frate.toml`. Dependency order is the declaration order.
 */
export interface Manifest {
	readonly project: ProjectInfo
	readonly dependencies: ReadonlyMap<ToolName, VersionRequirement>
	readonly sourcePath?: AbsolutePath
}

export interface RawManifest {
	project: { name: string; version: string }
	dependencies?: Record<string, string>
}
