import { z } from "zod"
import type { RegistryUnavailableError, Result } from "../types/error"
import type { RegistryDocument, ToolRecord } from "./types"

const PlatformAssetSchema = z.object({
	checksum: z.string(),
	platform: z.string().trim().min(1),
	url: z.string().trim().min(1),
})

const RegistryVersionSchema = z.object({
	platform_assets: z.array(PlatformAssetSchema).default([]),
	version: z.string().trim().min(1),
})

const ToolRecordSchema: z.ZodType<ToolRecord, z.ZodTypeDef, unknown> = z.object({
	description: z.string().optional(),
	name: z.string().trim().min(1),
	versions: z.array(RegistryVersionSchema),
})

/**
 * Validates a decoded registry payload. Unknown fields are stripped; records
 * that do not match are skipped rather than failing the whole registry.
 */
export function parseRegistryDocument(
	value: unknown,
	url: string,
): Result<RegistryDocument, RegistryUnavailableError> {
	if (!Array.isArray(value)) {
		return {
			error: {
				message: "Registry response must be a JSON array of tool records.",
				type: "registry_unavailable",
				url,
			},
			ok: false,
		}
	}

	const tools: ToolRecord[] = []
	let skipped = 0
	for (const entry of value) {
		const parsed = ToolRecordSchema.safeParse(entry)
		if (parsed.success) {
			tools.push(parsed.data)
		} else {
			skipped += 1
		}
	}

	return { ok: true, value: { skipped, tools } }
}

export function findToolRecord(
	document: RegistryDocument,
	name: string,
): ToolRecord | undefined {
	return document.tools.find((tool) => tool.name === name)
}
