import { confirm, isCancel } from "@clack/prompts"
import type { ToolName } from "@frate/core"
import { consola } from "consola"
import { type CommandContext, createCommandContext } from "@/commands/context"
import { formatBytes, logInstallEvent, parseToolName, partialFailure } from "@/commands/shared"
import { CommandResult, printOutcome } from "@/commands/types"
import { cleanCache } from "@/install/clean"
import type { CleanReport } from "@/install/types"

export async function cleanCommand(options: { name?: string; yes: boolean }): Promise<void> {
	consola.info("frate clean")
	printOutcome(await runClean(createCommandContext(), options))
}

/**
 * Deletes cache contents. Wiping the whole cache asks first unless `yes` is
 * set or prompts are unavailable.
 */
export async function runClean(
	context: CommandContext,
	options: { name?: string; yes: boolean },
): Promise<CommandResult<CleanReport>> {
	let tool: ToolName | undefined
	if (options.name !== undefined) {
		const parsed = parseToolName(options.name)
		if (!parsed.ok) {
			return CommandResult.failed(parsed.error)
		}
		tool = parsed.value
	}

	if (tool === undefined && !options.yes && context.interactive) {
		const proceed = await confirm({
			initialValue: false,
			message: `Remove every tool, shim and download under ${context.layout.root}?`,
		})
		if (isCancel(proceed) || !proceed) {
			return CommandResult.cancelled()
		}
	}

	const cleaned = await cleanCache({ layout: context.layout, onEvent: logInstallEvent, tool })
	if (!cleaned.ok) {
		return CommandResult.failed(cleaned.error)
	}

	const report = cleaned.value
	if (report.failed.length > 0) {
		const total = report.removed.length + report.skipped.length + report.failed.length
		return CommandResult.failed(partialFailure("clean", report.failed, total))
	}
	if (report.reclaimedBytes === 0) {
		return CommandResult.unchanged("Nothing to clean.")
	}

	consola.success(`Reclaimed ${formatBytes(report.reclaimedBytes)}.`)
	return CommandResult.completed(report)
}
