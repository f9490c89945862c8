import { consola } from "consola"
import { type CommandContext, createCommandContext } from "@/commands/context"
import { parseToolName } from "@/commands/shared"
import { CommandResult, printOutcome } from "@/commands/types"
import { locateTool, type ToolLocation } from "@/install/locate"

export async function whichCommand(name: string, options: { verbose: boolean }): Promise<void> {
	const result = await runWhich(createCommandContext(), name, options)
	if (result.status !== "completed") {
		printOutcome(result)
	}
}

export async function runWhich(
	context: CommandContext,
	rawName: string,
	options: { verbose: boolean },
): Promise<CommandResult<ToolLocation>> {
	const name = parseToolName(rawName)
	if (!name.ok) {
		return CommandResult.failed(name.error)
	}

	const located = await locateTool(name.value, context.layout, context.platform)
	if (!located.ok) {
		return CommandResult.failed(located.error)
	}

	const location = located.value
	consola.log(`Executable: ${location.binaryPath}`)
	consola.log(`Shim: ${location.shimPath ?? "(missing)"}`)
	if (options.verbose) {
		consola.log(`Version: ${location.version}`)
		consola.log(`Candidates: ${location.candidates.join(", ")}`)
	}
	return CommandResult.completed(location)
}
