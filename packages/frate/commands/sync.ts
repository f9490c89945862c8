import type { Manifest } from "@frate/core"
import { consola } from "consola"
import { type CommandContext, createCommandContext, lockfilePathFor } from "@/commands/context"
import { requireManifest } from "@/commands/shared"
import { CommandResult, printOutcome } from "@/commands/types"
import { readLockfile } from "@/lock/fs"
import { type LockSyncOutcome, resolveAndLock } from "@/lock/sync"

export async function syncCommand(options: { refresh: boolean }): Promise<void> {
	consola.info("frate sync")
	const context = createCommandContext()
	const manifest = await requireManifest(context)
	if (manifest.status !== "completed") {
		printOutcome(manifest)
		return
	}
	printOutcome(await syncWithManifest(context, manifest.value, options))
}

/**
 * Resolves the manifest against the registry and rewrites `frate.lock`.
 * Nothing is written when any tool fails to resolve.
 */
export async function syncWithManifest(
	context: CommandContext,
	manifest: Manifest,
	options: { refresh: boolean },
): Promise<CommandResult<LockSyncOutcome>> {
	const lockfilePath = lockfilePathFor(context)
	const lockfile = await readLockfile(lockfilePath)
	if (!lockfile.ok) {
		return CommandResult.failed(lockfile.error)
	}

	consola.start(options.refresh ? "Refreshing lockfile..." : "Syncing lockfile...")
	const synced = await resolveAndLock({
		lockfile: lockfile.value,
		lockfilePath,
		manifest,
		platform: context.platform,
		refresh: options.refresh,
		registry: context.registry,
	})
	if (!synced.ok) {
		return CommandResult.failed(synced.error)
	}

	const { summary } = synced.value
	for (const [name, entry] of synced.value.lockfile.entries) {
		if (summary.added.includes(name)) {
			consola.info(`+ ${name} ${entry.resolvedVersion}`)
		} else if (summary.updated.includes(name)) {
			consola.info(`~ ${name} ${entry.resolvedVersion}`)
		}
	}
	for (const name of summary.removed) {
		consola.info(`- ${name}`)
	}

	if (!synced.value.changed) {
		return CommandResult.unchanged("Lockfile is up to date.")
	}
	consola.success(`Locked ${synced.value.lockfile.entries.size} tool(s).`)
	return CommandResult.completed(synced.value)
}
