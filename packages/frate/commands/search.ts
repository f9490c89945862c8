import { describePlatform } from "@frate/core"
import { consola } from "consola"
import { type CommandContext, createCommandContext } from "@/commands/context"
import { CommandResult, printOutcome } from "@/commands/types"
import { type SearchResult, searchTool } from "@/install/search"

export async function searchCommand(name: string): Promise<void> {
	const result = await runSearch(createCommandContext(), name)
	if (result.status !== "completed") {
		printOutcome(result)
	}
}

/**
 * Prints the published versions of a tool, newest first, marking those with
 * no release for the running platform.
 */
export async function runSearch(
	context: CommandContext,
	name: string,
): Promise<CommandResult<SearchResult>> {
	const found = await searchTool(name.trim(), context.registry, context.platform)
	if (!found.ok) {
		return CommandResult.failed(found.error)
	}

	const result = found.value
	consola.log(result.description ? `${result.name}: ${result.description}` : result.name)
	if (result.versions.length === 0) {
		consola.log("  no published versions")
	}
	for (const release of result.versions) {
		consola.log(
			release.available
				? `  ${release.version}`
				: `  ${release.version} (not available for ${describePlatform(context.platform)})`,
		)
	}
	return CommandResult.completed(result)
}
