import path from "node:path"
import type {
	AbsolutePath,
	CacheIoError,
	NotFoundError,
	Platform,
	Result,
	ToolName,
} from "@frate/core"
import { type CacheLayout, shimPath, versionDir } from "@/cache/layout"
import { readInstallRecord } from "@/cache/manager"
import { currentInstall } from "@/cache/record"
import { safeStat, toAbsolutePath } from "@/io/fs"
import { shimKindFor } from "@/shims/shim"

export interface ToolLocation {
	tool: ToolName
	version: string
	binaryPath: AbsolutePath
	/** Null when the shim is missing */
	shimPath: AbsolutePath | null
	/** Every executable considered when the binary was chosen, best first */
	candidates: string[]
	/** All versions present in the cache */
	versions: string[]
}

export async function locateTool(
	tool: ToolName,
	layout: CacheLayout,
	platform: Platform,
): Promise<Result<ToolLocation, NotFoundError | CacheIoError>> {
	const record = await readInstallRecord(layout, tool)
	if (!record.ok) {
		return record
	}

	const install = record.value ? currentInstall(record.value) : undefined
	if (!record.value || record.value.current === null || !install) {
		return {
			error: {
				message: `${tool} is not installed. Run \`frate install --name ${tool}\`.`,
				name: tool,
				target: "cache",
				type: "not_found",
			},
			ok: false,
		}
	}

	const version = record.value.current
	const shim = shimPath(layout, tool, shimKindFor(platform))
	const shimStats = await safeStat(shim)
	if (!shimStats.ok) {
		return shimStats
	}

	return {
		ok: true,
		value: {
			binaryPath: toAbsolutePath(path.join(versionDir(layout, tool, version), install.binary)),
			candidates: install.candidates,
			shimPath: shimStats.value ? shim : null,
			tool,
			version,
			versions: Object.keys(record.value.installs).sort(),
		},
	}
}
