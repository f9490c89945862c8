import {
	coerceVersionRequirement,
	type Manifest,
	type Result,
	setDependency,
	type ToolName,
	type VersionRequirement,
} from "@frate/core"
import { consola } from "consola"
import {
	type CommandContext,
	createCommandContext,
	lockfilePathFor,
	manifestPathFor,
} from "@/commands/context"
import { parseToolName, requireManifest } from "@/commands/shared"
import { CommandResult, printOutcome } from "@/commands/types"
import { readLockfile, writeLockfile } from "@/lock/fs"
import { type LockSyncOutcome, syncLockfile } from "@/lock/sync"
import { saveManifest } from "@/manifest/fs"
import type { ValidationError } from "@/types/errors"

export async function addCommand(spec: string): Promise<void> {
	consola.info("frate add")
	printOutcome(await runAdd(createCommandContext(), spec))
}

/**
 * Adds or replaces a dependency and re-locks. The manifest and lockfile are
 * only written once the new requirement resolves. The tool is not installed.
 */
export async function runAdd(
	context: CommandContext,
	spec: string,
): Promise<CommandResult<{ manifest: Manifest; lock: LockSyncOutcome }>> {
	const parsed = parseToolSpec(spec)
	if (!parsed.ok) {
		return CommandResult.failed(parsed.error)
	}

	const loaded = await requireManifest(context)
	if (loaded.status !== "completed") {
		return loaded
	}

	const { name, requirement } = parsed.value
	if (loaded.value.dependencies.get(name) === requirement) {
		return CommandResult.unchanged(`${name} already requires ${requirement}.`)
	}
	const manifest = setDependency(loaded.value, name, requirement)

	const lockfilePath = lockfilePathFor(context)
	const lockfile = await readLockfile(lockfilePath)
	if (!lockfile.ok) {
		return CommandResult.failed(lockfile.error)
	}

	consola.start(`Resolving ${name}@${requirement}...`)
	const synced = await syncLockfile({
		lockfile: lockfile.value,
		manifest,
		platform: context.platform,
		registry: context.registry,
	})
	if (!synced.ok) {
		return CommandResult.failed(synced.error)
	}

	const saved = await saveManifest(manifest, manifestPathFor(context))
	if (!saved.ok) {
		return CommandResult.failed(saved.error)
	}
	const written = await writeLockfile(lockfilePath, synced.value.lockfile)
	if (!written.ok) {
		return CommandResult.failed(written.error)
	}

	const locked = synced.value.lockfile.entries.get(name)
	consola.success(
		`Added ${name}@${requirement}${locked ? ` (locked at ${locked.resolvedVersion})` : ""}.`,
	)
	consola.info(`Run \`frate install --name ${name}\` to install it.`)
	return CommandResult.completed({ lock: synced.value, manifest })
}

/**
 * Splits `<name>@<requirement>`.
 */
export function parseToolSpec(
	spec: string,
): Result<{ name: ToolName; requirement: VersionRequirement }, ValidationError> {
	const trimmed = spec.trim()
	const at = trimmed.indexOf("@")
	if (at <= 0 || at === trimmed.length - 1) {
		return {
			error: {
				field: "spec",
				message: `Expected <name>@<version>, got "${trimmed}".`,
				type: "validation",
			},
			ok: false,
		}
	}

	const name = parseToolName(trimmed.slice(0, at))
	if (!name.ok) {
		return name
	}

	const rawRequirement = trimmed.slice(at + 1)
	const requirement = coerceVersionRequirement(rawRequirement)
	if (!requirement) {
		return {
			error: {
				field: "spec",
				message: `Invalid version requirement for ${name.value}: "${rawRequirement}".`,
				type: "validation",
			},
			ok: false,
		}
	}

	return { ok: true, value: { name: name.value, requirement } }
}
