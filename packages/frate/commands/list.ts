import type { LockedEntry, ToolName } from "@frate/core"
import { consola } from "consola"
import { readInstallRecord } from "@/cache/manager"
import { type CommandContext, createCommandContext, lockfilePathFor } from "@/commands/context"
import { requireManifest } from "@/commands/shared"
import { CommandResult, printOutcome } from "@/commands/types"
import { readLockfile } from "@/lock/fs"

export interface ListedTool {
	name: ToolName
	requirement: string
	locked?: LockedEntry
	/** Version the shim points at, when installed */
	installed?: string
}

export async function listCommand(options: { verbose: boolean }): Promise<void> {
	const result = await runList(createCommandContext(), options)
	if (result.status !== "completed") {
		printOutcome(result)
	}
}

/**
 * Reports each declared tool with its lock and install state.
 */
export async function runList(
	context: CommandContext,
	options: { verbose: boolean },
): Promise<CommandResult<ListedTool[]>> {
	const manifest = await requireManifest(context)
	if (manifest.status !== "completed") {
		return manifest
	}

	const lockfile = await readLockfile(lockfilePathFor(context))
	if (!lockfile.ok) {
		return CommandResult.failed(lockfile.error)
	}

	if (manifest.value.dependencies.size === 0) {
		return CommandResult.unchanged("No dependencies.")
	}

	const listed: ListedTool[] = []
	for (const [name, requirement] of manifest.value.dependencies) {
		const record = await readInstallRecord(context.layout, name)
		if (!record.ok) {
			return CommandResult.failed(record.error)
		}
		listed.push({
			installed: record.value?.current ?? undefined,
			locked: lockfile.value.entries.get(name),
			name,
			requirement,
		})
	}

	for (const tool of listed) {
		consola.log(formatListedTool(tool, options.verbose))
	}
	return CommandResult.completed(listed)
}

export function formatListedTool(tool: ListedTool, verbose: boolean): string {
	const lines = [`${tool.name}: ${tool.requirement}`]
	if (!tool.locked) {
		lines.push("  unlocked")
	} else {
		lines.push(`  locked at: ${tool.locked.resolvedVersion}`)
		if (verbose) {
			lines.push(`  platform: ${tool.locked.platform}`)
			lines.push(`  checksum: ${tool.locked.checksum}`)
			lines.push(`  source: ${tool.locked.downloadUrl}`)
		}
	}

	if (tool.installed === undefined) {
		lines.push("  not installed")
	} else if (tool.locked && tool.installed !== tool.locked.resolvedVersion) {
		lines.push(`  installed: ${tool.installed} (out of date)`)
	} else {
		lines.push(`  installed: ${tool.installed}`)
	}
	return lines.join("\n")
}
