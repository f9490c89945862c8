import {
	coerceToolName,
	type Manifest,
	type Result,
	type ToolName,
} from "@frate/core"
import { consola } from "consola"
import { type CommandContext, manifestPathFor } from "@/commands/context"
import { CommandResult } from "@/commands/types"
import type { InstallEvent, ToolFailure } from "@/install/types"
import { loadManifest } from "@/manifest/fs"
import type { PartialFailureError, ValidationError } from "@/types/errors"

export function parseToolName(value: string): Result<ToolName, ValidationError> {
	const name = coerceToolName(value)
	if (!name) {
		return {
			error: {
				field: "name",
				message: `Invalid tool name: ${value.trim() || "(empty)"}`,
				type: "validation",
			},
			ok: false,
		}
	}
	return { ok: true, value: name }
}

/**
 * Loads `frate.toml` from the project directory; every command but `init`
 * needs one.
 */
export async function requireManifest(context: CommandContext): Promise<CommandResult<Manifest>> {
	const loaded = await loadManifest(manifestPathFor(context))
	if (!loaded.ok) {
		if (loaded.error.type === "not_found") {
			return CommandResult.failed({
				...loaded.error,
				message: `${loaded.error.message}. Run \`frate init\` to create one.`,
			})
		}
		return CommandResult.failed(loaded.error)
	}
	return CommandResult.completed(loaded.value)
}

export function partialFailure(
	operation: string,
	failed: readonly ToolFailure[],
	total: number,
): PartialFailureError {
	const tools = failed.map((failure) => failure.tool)
	return {
		cause: failed[0]?.error,
		message: `${failed.length} of ${total} tool(s) failed to ${operation}: ${tools.join(", ")}.`,
		operation,
		tools,
		type: "partial_failure",
	}
}

export function logInstallEvent(event: InstallEvent): void {
	switch (event.type) {
		case "start":
			consola.start(`${event.tool} ${event.version}`)
			break
		case "download":
			consola.info(
				event.cached
					? `${event.tool}: using cached archive.`
					: `${event.tool}: downloaded ${event.url}`,
			)
			break
		case "installed":
			consola.success(`Installed ${event.tool} ${event.version} (${event.binary}).`)
			break
		case "relinked":
			consola.success(`Linked ${event.tool} ${event.version}.`)
			break
		case "skipped":
			consola.info(`${event.tool} ${event.version} is already installed.`)
			break
		case "failed":
			consola.warn(`${event.tool}: ${event.error.message}`)
			break
		case "removed":
			consola.success(`Removed ${event.tool}.`)
			break
	}
}

export function formatBytes(bytes: number): string {
	if (bytes < 1024) return `${bytes} B`
	const units = ["KiB", "MiB", "GiB"]
	let value = bytes / 1024
	let unit = 0
	while (value >= 1024 && unit < units.length - 1) {
		value /= 1024
		unit += 1
	}
	return `${value.toFixed(1)} ${units[unit]}`
}
