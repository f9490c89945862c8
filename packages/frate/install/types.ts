import type {
	CacheIoError,
	NoCompatibleAssetError,
	NotFoundError,
	ShimGenerationError,
} from "@frate/core"
import type { ExtractError } from "@/archive/types"
import type { FetchVerifyError } from "@/fetch/download"

export type InstallError =
	| FetchVerifyError
	| ExtractError
	| ShimGenerationError
	| CacheIoError
	| NoCompatibleAssetError
	| NotFoundError

export interface ToolFailure {
	tool: string
	error: InstallError
}

export interface InstallReport {
	/** Tools fetched and unpacked, or relinked to an existing version */
	installed: string[]
	/** Tools already installed at the locked version */
	skipped: string[]
	failed: ToolFailure[]
}

export interface RemovalReport {
	removed: string[]
	/** Tools that had nothing to remove */
	skipped: string[]
	failed: ToolFailure[]
}

export interface CleanReport extends RemovalReport {
	reclaimedBytes: number
}

export type InstallEvent =
	| { type: "start"; tool: string; version: string }
	| { type: "download"; tool: string; version: string; url: string; cached: boolean }
	| { type: "installed"; tool: string; version: string; binary: string }
	| { type: "relinked"; tool: string; version: string }
	| { type: "skipped"; tool: string; version: string }
	| { type: "failed"; tool: string; error: InstallError }
	| { type: "removed"; tool: string }

export type InstallEventHandler = (event: InstallEvent) => void
