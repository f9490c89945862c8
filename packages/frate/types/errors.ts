import type { AbsolutePath, BaseError, FrateError } from "@frate/core"

export type ValidationError = BaseError & {
	type: "validation"
	field: string
	path?: AbsolutePath
}

export type ConflictError = BaseError & {
	type: "conflict"
	target: string
	path?: AbsolutePath
}

/** Some tools in a batch failed; `cause` is the first failure. */
export type PartialFailureError = BaseError & {
	type: "partial_failure"
	operation: string
	tools: string[]
}

/** Everything a command can fail with. */
export type CliError = FrateError | ValidationError | ConflictError | PartialFailureError
