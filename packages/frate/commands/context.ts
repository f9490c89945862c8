import path from "node:path"
import {
	type AbsolutePath,
	assertAbsolutePathDirect,
	LOCKFILE_FILENAME,
	MANIFEST_FILENAME,
	type Platform,
} from "@frate/core"
import { type CacheLayout, resolveCacheLayout } from "@/cache/layout"
import { FRATE_HOME, FRATE_REGISTRY_URL } from "@/env"
import type { FetchLike } from "@/fetch/types"
import { currentPlatform } from "@/platform"
import { createRegistryClient, type RegistryClient } from "@/registry/client"

/**
 * Everything a command needs from its surroundings. The CLI builds one from
 * the environment; tests build one around a temporary directory.
 */
export interface CommandContext {
	/** Project directory holding `frate.toml` and `frate.lock` */
	cwd: AbsolutePath
	layout: CacheLayout
	platform: Platform
	registry: RegistryClient
	fetch?: FetchLike
	/** Whether prompts may be shown */
	interactive: boolean
}

export function createCommandContext(): CommandContext {
	return {
		cwd: assertAbsolutePathDirect(process.cwd()),
		interactive: Boolean(process.stdin.isTTY && process.stdout.isTTY),
		layout: resolveCacheLayout(assertAbsolutePathDirect(FRATE_HOME)),
		platform: currentPlatform(),
		registry: createRegistryClient({ url: FRATE_REGISTRY_URL }),
	}
}

export function manifestPathFor(context: CommandContext): AbsolutePath {
	return assertAbsolutePathDirect(path.join(context.cwd, MANIFEST_FILENAME))
}

export function lockfilePathFor(context: CommandContext): AbsolutePath {
	return assertAbsolutePathDirect(path.join(context.cwd, LOCKFILE_FILENAME))
}
