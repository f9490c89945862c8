import { type Manifest, removeDependency } from "@frate/core"
import { consola } from "consola"
import {
	type CommandContext,
	createCommandContext,
	lockfilePathFor,
	manifestPathFor,
} from "@/commands/context"
import { parseToolName, requireManifest } from "@/commands/shared"
import { CommandResult, printOutcome } from "@/commands/types"
import { readLockfile, writeLockfile } from "@/lock/fs"
import { syncLockfile } from "@/lock/sync"
import { saveManifest } from "@/manifest/fs"

export async function removeCommand(name: string): Promise<void> {
	consola.info("frate remove")
	printOutcome(await runRemove(createCommandContext(), name))
}

/**
 * Drops a dependency from the manifest and its entry from the lockfile. The
 * installed tool, if any, stays until `frate uninstall`.
 */
export async function runRemove(
	context: CommandContext,
	rawName: string,
): Promise<CommandResult<Manifest>> {
	const name = parseToolName(rawName)
	if (!name.ok) {
		return CommandResult.failed(name.error)
	}

	const loaded = await requireManifest(context)
	if (loaded.status !== "completed") {
		return loaded
	}

	const manifestPath = manifestPathFor(context)
	if (!loaded.value.dependencies.has(name.value)) {
		return CommandResult.failed({
			message: `Dependency not found: ${name.value}`,
			name: name.value,
			path: manifestPath,
			target: "manifest",
			type: "not_found",
		})
	}
	const manifest = removeDependency(loaded.value, name.value)

	const lockfilePath = lockfilePathFor(context)
	const lockfile = await readLockfile(lockfilePath)
	if (!lockfile.ok) {
		return CommandResult.failed(lockfile.error)
	}

	const synced = await syncLockfile({
		lockfile: lockfile.value,
		manifest,
		platform: context.platform,
		registry: context.registry,
	})
	if (!synced.ok) {
		return CommandResult.failed(synced.error)
	}

	const saved = await saveManifest(manifest, manifestPath)
	if (!saved.ok) {
		return CommandResult.failed(saved.error)
	}
	const written = await writeLockfile(lockfilePath, synced.value.lockfile)
	if (!written.ok) {
		return CommandResult.failed(written.error)
	}

	consola.success(`Removed dependency: ${name.value}.`)
	consola.info(`Manifest: ${manifestPath} (updated).`)
	return CommandResult.completed(manifest)
}
