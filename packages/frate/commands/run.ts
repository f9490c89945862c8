import { spawn } from "node:child_process"
import { type CommandContext, createCommandContext } from "@/commands/context"
import { parseToolName } from "@/commands/shared"
import { CommandResult, printOutcome } from "@/commands/types"
import { locateTool } from "@/install/locate"

export async function runCommand(name: string, args: string[]): Promise<void> {
	const result = await runTool(createCommandContext(), name, args)
	if (result.status === "completed") {
		process.exitCode = result.value
		return
	}
	printOutcome(result)
}

/**
 * Runs an installed tool's binary directly, with inherited stdio. Completes
 * with the child's exit code.
 */
export async function runTool(
	context: CommandContext,
	rawName: string,
	args: string[],
): Promise<CommandResult<number>> {
	const name = parseToolName(rawName)
	if (!name.ok) {
		return CommandResult.failed(name.error)
	}

	const located = await locateTool(name.value, context.layout, context.platform)
	if (!located.ok) {
		return CommandResult.failed(located.error)
	}

	const binaryPath = located.value.binaryPath
	return await new Promise<CommandResult<number>>((resolve) => {
		const child = spawn(binaryPath, args, { stdio: "inherit" })
		child.on("error", (error) => {
			resolve(
				CommandResult.failed({
					message: `Unable to run ${binaryPath}.`,
					operation: "spawn",
					path: binaryPath,
					rawError: error,
					type: "cache_io",
				}),
			)
		})
		child.on("close", (code, signal) => {
			resolve(CommandResult.completed(code ?? (signal ? 128 : 1)))
		})
	})
}
