import type { ToolName } from "@frate/core"
import { consola } from "consola"
import { type CommandContext, createCommandContext, lockfilePathFor } from "@/commands/context"
import { logInstallEvent, parseToolName, partialFailure, requireManifest } from "@/commands/shared"
import { CommandResult, printOutcome } from "@/commands/types"
import { installTools } from "@/install/install"
import type { InstallReport } from "@/install/types"
import { requireLockfile } from "@/lock/fs"

export async function installCommand(options: { name?: string }): Promise<void> {
	consola.info("frate install")
	printOutcome(await runInstall(createCommandContext(), options))
}

/**
 * Installs every locked tool, or only the named one.
 */
export async function runInstall(
	context: CommandContext,
	options: { name?: string },
): Promise<CommandResult<InstallReport>> {
	let tool: ToolName | undefined
	if (options.name !== undefined) {
		const parsed = parseToolName(options.name)
		if (!parsed.ok) {
			return CommandResult.failed(parsed.error)
		}
		tool = parsed.value
	}

	const manifest = await requireManifest(context)
	if (manifest.status !== "completed") {
		return manifest
	}

	const lockfile = await requireLockfile(lockfilePathFor(context))
	if (!lockfile.ok) {
		return CommandResult.failed(lockfile.error)
	}
	if (lockfile.value.entries.size === 0) {
		return CommandResult.unchanged("No tools are locked.")
	}

	const installed = await installTools({
		fetch: context.fetch,
		layout: context.layout,
		lockfile: lockfile.value,
		onEvent: logInstallEvent,
		platform: context.platform,
		tool,
	})
	if (!installed.ok) {
		return CommandResult.failed(installed.error)
	}

	const report = installed.value
	const total = report.installed.length + report.skipped.length + report.failed.length
	if (report.failed.length > 0) {
		return CommandResult.failed(partialFailure("install", report.failed, total))
	}
	if (report.installed.length === 0) {
		return CommandResult.unchanged("All tools are already installed.")
	}

	consola.info(`Shims: ${context.layout.binDir}`)
	return CommandResult.completed(report)
}
