import { createCommandContext } from "@/commands/context"

/**
 * Prints the bin directory so shells can add it to PATH.
 */
export function shimPathCommand(): void {
	console.log(createCommandContext().layout.binDir)
}
