import { type AbsolutePath, TOOL_RECORD_SCHEMA } from "@frate/core"
import { z } from "zod"
import type { CacheIoError, IoResult } from "@/io/types"

const VersionInstallSchema = z.object({
	binary: z.string().min(1),
	candidates: z.array(z.string()),
	checksum: z.string(),
	installed_at: z.string(),
})

const InstallRecordSchema = z.object({
	current: z.string().nullable(),
	installs: z.record(z.string(), VersionInstallSchema),
	schema: z.literal(TOOL_RECORD_SCHEMA),
})

export type VersionInstall = z.infer<typeof VersionInstallSchema>

/**
 * Contents of `tools/<name>/tool.json`: which version the shim targets and
 * what was detected for every installed version.
 */
export type InstallRecord = z.infer<typeof InstallRecordSchema>

export function emptyInstallRecord(): InstallRecord {
	return { current: null, installs: {}, schema: TOOL_RECORD_SCHEMA }
}

export function parseInstallRecord(
	contents: string,
	recordPath: AbsolutePath,
): IoResult<InstallRecord> {
	let data: unknown
	try {
		data = JSON.parse(contents)
	} catch (error) {
		return invalidRecord(recordPath, error instanceof Error ? error : undefined)
	}

	const parsed = InstallRecordSchema.safeParse(data)
	if (!parsed.success) {
		return invalidRecord(recordPath, parsed.error)
	}
	return { ok: true, value: parsed.data }
}

export function serializeInstallRecord(record: InstallRecord): string {
	const installs: Record<string, VersionInstall> = {}
	for (const version of Object.keys(record.installs).sort()) {
		const install = record.installs[version]
		if (install) {
			installs[version] = install
		}
	}
	return `${JSON.stringify({ current: record.current, installs, schema: record.schema }, null, 2)}\n`
}

export function currentInstall(record: InstallRecord): VersionInstall | undefined {
	return record.current === null ? undefined : record.installs[record.current]
}

function invalidRecord(
	recordPath: AbsolutePath,
	rawError: Error | undefined,
): { ok: false; error: CacheIoError } {
	return {
		error: {
			message: `Invalid install record at ${recordPath}.`,
			operation: "parse",
			path: recordPath,
			rawError,
			type: "cache_io",
		},
		ok: false,
	}
}
