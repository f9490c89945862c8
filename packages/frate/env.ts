import { homedir } from "node:os"
import path from "node:path"
import { FRATE_GLOBAL_DIR } from "@frate/core"

export const FRATE_REGISTRY_URL = normalizeBaseUrl(
	process.env.FRATE_REGISTRY_URL ?? "https://registry.frate.dev/tools.json",
)

export const FRATE_HOME = resolveHome(process.env.FRATE_HOME)

function normalizeBaseUrl(baseUrl: string): string {
	return baseUrl.endsWith("/") ? baseUrl.slice(0, -1) : baseUrl
}

function resolveHome(value: string | undefined): string {
	const trimmed = value?.trim()
	if (!trimmed) {
		return path.join(homedir(), FRATE_GLOBAL_DIR)
	}
	return path.resolve(trimmed)
}
