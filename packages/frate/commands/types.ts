import type { BaseError } from "@frate/core"
import { consola } from "consola"
import { ZodError } from "zod"
import type { CliError } from "@/types/errors"

export type CommandResult<T = void> =
	| { status: "completed"; value: T }
	| { status: "unchanged"; reason: string }
	| { status: "cancelled" }
	| { status: "failed"; error: CliError }

export const CommandResult = {
	cancelled: (): CommandResult<never> => ({ status: "cancelled" }),
	completed: <T>(value: T): CommandResult<T> => ({ status: "completed", value }),
	failed: (error: CliError): CommandResult<never> => ({ error, status: "failed" }),
	unchanged: (reason: string): CommandResult<never> => ({
		reason,
		status: "unchanged",
	}),
} as const

export function printOutcome(result: CommandResult<unknown>): void {
	switch (result.status) {
		case "completed":
			consola.success("Done.")
			break
		case "unchanged":
			consola.info(result.reason)
			break
		case "cancelled":
			consola.info("Canceled.")
			break
		case "failed":
			consola.error(formatErrorChain(result.error))
			process.exitCode = 1
			break
	}
}

export function formatErrorChain(error: BaseError): string {
	return formatErrorChainLines(error, 0).join("\n")
}

function formatErrorChainLines(error: BaseError, indent: number): string[] {
	const prefix = " ".repeat(indent)
	const detailParts = buildDetailParts(error)
	const details = detailParts.length ? ` (${detailParts.join(", ")})` : ""
	const lines = [`${prefix}[${error.type}] ${error.message}${details}`]

	const zodError = "zodError" in error ? error.zodError : undefined
	if (zodError instanceof ZodError) {
		lines.push(`${prefix}  Zod issues:`)
		for (const issue of zodError.issues) {
			const pathLabel = issue.path.length > 0 ? issue.path.join(".") : "<root>"
			lines.push(`${prefix}  - ${pathLabel}: ${issue.message}`)
		}
	} else if (error.rawError) {
		lines.push(`${prefix}  ${error.rawError.message}`)
	}

	if (error.cause) {
		lines.push(`${prefix}Caused by:`)
		lines.push(...formatErrorChainLines(error.cause, indent + 2))
	}

	return lines
}

// Printed in this order after the message, when the error carries them.
const STRING_DETAILS = [
	"field",
	"path",
	"source",
	"operation",
	"target",
	"tool",
	"requirement",
	"version",
	"platform",
	"entry",
	"url",
] as const

function buildDetailParts(error: BaseError): string[] {
	const details: string[] = []
	for (const key of STRING_DETAILS) {
		if (key in error) {
			const value: unknown = Reflect.get(error, key)
			if (typeof value === "string") {
				details.push(`${key}=${value}`)
			}
		}
	}
	if ("status" in error && typeof error.status === "number") {
		details.push(`status=${error.status}`)
	}
	if ("expected" in error && typeof error.expected === "string") {
		details.push(`expected=${error.expected}`)
	}
	if ("actual" in error && typeof error.actual === "string") {
		details.push(`actual=${error.actual}`)
	}
	return details
}
