import type { ToolName } from "@frate/core"
import { consola } from "consola"
import { type CommandContext, createCommandContext } from "@/commands/context"
import { logInstallEvent, parseToolName, partialFailure } from "@/commands/shared"
import { CommandResult, printOutcome } from "@/commands/types"
import type { RemovalReport } from "@/install/types"
import { uninstallTools } from "@/install/uninstall"

export async function uninstallCommand(options: { name?: string }): Promise<void> {
	consola.info("frate uninstall")
	printOutcome(await runUninstall(createCommandContext(), options))
}

/**
 * Removes the named tool, or every installed tool, from the cache.
 */
export async function runUninstall(
	context: CommandContext,
	options: { name?: string },
): Promise<CommandResult<RemovalReport>> {
	let tool: ToolName | undefined
	if (options.name !== undefined) {
		const parsed = parseToolName(options.name)
		if (!parsed.ok) {
			return CommandResult.failed(parsed.error)
		}
		tool = parsed.value
	}

	const uninstalled = await uninstallTools({
		layout: context.layout,
		onEvent: logInstallEvent,
		tool,
	})
	if (!uninstalled.ok) {
		return CommandResult.failed(uninstalled.error)
	}

	const report = uninstalled.value
	if (report.failed.length > 0) {
		const total = report.removed.length + report.skipped.length + report.failed.length
		return CommandResult.failed(partialFailure("uninstall", report.failed, total))
	}
	if (report.removed.length === 0) {
		return CommandResult.unchanged(
			tool === undefined ? "No tools are installed." : `${tool} is not installed.`,
		)
	}
	return CommandResult.completed(report)
}
