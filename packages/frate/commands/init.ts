import path from "node:path"
import {
	coerceNonEmpty,
	createManifest,
	DEFAULT_PROJECT_VERSION,
	type Manifest,
} from "@frate/core"
import { consola } from "consola"
import { ensureLayout } from "@/cache/manager"
import { type CommandContext, createCommandContext, manifestPathFor } from "@/commands/context"
import { CommandResult, printOutcome } from "@/commands/types"
import { safeStat } from "@/io/fs"
import { saveManifest } from "@/manifest/fs"

export async function initCommand(): Promise<void> {
	consola.info("frate init")
	printOutcome(await runInit(createCommandContext()))
}

/**
 * Writes an empty `frate.toml` named after the project directory and makes
 * sure the cache layout exists.
 */
export async function runInit(context: CommandContext): Promise<CommandResult<Manifest>> {
	const manifestPath = manifestPathFor(context)
	const stats = await safeStat(manifestPath)
	if (!stats.ok) {
		return CommandResult.failed(stats.error)
	}
	if (stats.value) {
		return CommandResult.failed({
			message: `Manifest already exists at ${manifestPath}.`,
			path: manifestPath,
			target: "manifest",
			type: "conflict",
		})
	}

	const projectName = coerceNonEmpty(path.basename(context.cwd)) ?? coerceNonEmpty("project")
	const version = coerceNonEmpty(DEFAULT_PROJECT_VERSION)
	if (!projectName || !version) {
		return CommandResult.failed({
			field: "project.name",
			message: "Unable to derive a project name.",
			type: "validation",
		})
	}

	const manifest = createManifest(projectName, version)
	const saved = await saveManifest(manifest, manifestPath)
	if (!saved.ok) {
		return CommandResult.failed(saved.error)
	}

	const layout = await ensureLayout(context.layout)
	if (!layout.ok) {
		return CommandResult.failed(layout.error)
	}

	consola.success("Manifest created.")
	consola.info(`Manifest: ${manifestPath}`)
	consola.info(`Add ${context.layout.binDir} to your PATH to use installed tools.`)
	return CommandResult.completed(manifest)
}
