import { parse } from "smol-toml"
import { z } from "zod"
import { MANIFEST_FILENAME } from "../constants"
import type { AbsolutePath, ToolName, VersionRequirement } from "../types/branded"
import { coerceNonEmpty, coerceToolName, coerceVersionRequirement } from "../types/coerce"
import type { ManifestParseError, Result } from "../types/error"
import type { Manifest } from "./types"

const ManifestSchema = z.object({
	dependencies: z.record(z.string(), z.string()).default({}),
	project: z.object({
		name: z.string(),
		version: z.string(),
	}),
})

export type ManifestResult = Result<Manifest, ManifestParseError>

export function parseManifest(contents: string, sourcePath?: AbsolutePath): ManifestResult {
	let document: unknown
	try {
		document = parse(contents)
	} catch (error) {
		return {
			error: {
				message: `Invalid TOML: ${error instanceof Error ? error.message : String(error)}`,
				path: sourcePath,
				rawError: error instanceof Error ? error : undefined,
				source: MANIFEST_FILENAME,
				type: "manifest_parse",
			},
			ok: false,
		}
	}

	const result = ManifestSchema.safeParse(document)
	if (!result.success) {
		return {
			error: {
				field: "manifest",
				message: `Invalid ${MANIFEST_FILENAME} structure.`,
				path: sourcePath,
				rawError: result.error,
				source: MANIFEST_FILENAME,
				type: "manifest_parse",
				zodError: result.error,
			},
			ok: false,
		}
	}

	const name = coerceNonEmpty(result.data.project.name)
	if (!name) {
		return manifestFailure("project.name", "Project name must be non-empty.", sourcePath)
	}

	const version = coerceNonEmpty(result.data.project.version)
	if (!version) {
		return manifestFailure(
			"project.version",
			"Project version must be non-empty.",
			sourcePath,
		)
	}

	const dependencies = new Map<ToolName, VersionRequirement>()
	for (const [rawName, rawRequirement] of Object.entries(result.data.dependencies)) {
		const toolName = coerceToolName(rawName)
		if (!toolName || toolName !== rawName) {
			return manifestFailure(
				`dependencies.${rawName}`,
				`Invalid tool name: ${rawName}.`,
				sourcePath,
			)
		}

		const requirement = coerceVersionRequirement(rawRequirement)
		if (!requirement) {
			return manifestFailure(
				`dependencies.${rawName}`,
				`Invalid version requirement for ${rawName}: "${rawRequirement}".`,
				sourcePath,
			)
		}

		dependencies.set(toolName, requirement)
	}

	return {
		ok: true,
		value: {
			dependencies,
			project: { name, version },
			sourcePath,
		},
	}
}

function manifestFailure(
	field: string,
	message: string,
	sourcePath: AbsolutePath | undefined,
): ManifestResult {
	return {
		error: {
			field,
			message,
			path: sourcePath,
			source: MANIFEST_FILENAME,
			type: "manifest_parse",
		},
		ok: false,
	}
}
