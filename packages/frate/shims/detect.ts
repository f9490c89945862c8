import path from "node:path"
import {
	type AbsolutePath,
	type CacheIoError,
	isWindowsExecutableName,
	rankBinaryCandidates,
	type Result,
	type ShimGenerationError,
} from "@frate/core"
import { chmodPath, listDir, safeStat } from "@/io/fs"

export interface DetectedBinary {
	/** Chosen executable, relative to the version directory */
	binary: string
	/** Every candidate considered, best first */
	candidates: string[]
}

interface FoundFile {
	relativePath: string
	executable: boolean
}

/**
 * Finds the tool's primary executable in an extracted release. When the
 * archive carried no executable bits at all, files whose name matches the
 * tool are taken instead and made executable.
 */
export async function detectBinary(
	tool: string,
	versionDir: AbsolutePath,
	options: { windows: boolean },
): Promise<Result<DetectedBinary, ShimGenerationError | CacheIoError>> {
	const files = await walkFiles(versionDir, "", options.windows)
	if (!files.ok) {
		return files
	}

	const executables = files.value.filter((file) => file.executable)
	if (executables.length > 0) {
		const ranked = rankBinaryCandidates(
			tool,
			executables.map((file) => file.relativePath),
		)
		return chosen(
			tool,
			versionDir,
			ranked.map((candidate) => candidate.relativePath),
		)
	}

	const named = rankBinaryCandidates(
		tool,
		files.value.map((file) => file.relativePath),
	).filter((candidate) => candidate.match === "exact" || candidate.match === "stripped")
	const best = named[0]
	if (best && !options.windows) {
		const made = await chmodPath(path.join(versionDir, best.relativePath), 0o755)
		if (!made.ok) {
			return made
		}
	}
	return chosen(
		tool,
		versionDir,
		named.map((candidate) => candidate.relativePath),
	)
}

function chosen(
	tool: string,
	versionDir: AbsolutePath,
	candidates: string[],
): Result<DetectedBinary, ShimGenerationError> {
	const binary = candidates[0]
	if (binary === undefined) {
		return {
			error: {
				message: `No executable for ${tool} found in ${versionDir}.`,
				path: versionDir,
				tool,
				type: "shim_generation",
			},
			ok: false,
		}
	}
	return { ok: true, value: { binary, candidates } }
}

async function walkFiles(
	root: AbsolutePath,
	relativeDir: string,
	windows: boolean,
): Promise<Result<FoundFile[], CacheIoError>> {
	const entries = await listDir(path.join(root, relativeDir))
	if (!entries.ok) {
		return entries
	}

	const found: FoundFile[] = []
	for (const entry of entries.value) {
		const relativePath = relativeDir ? `${relativeDir}/${entry.name}` : entry.name
		if (entry.isDirectory()) {
			const nested = await walkFiles(root, relativePath, windows)
			if (!nested.ok) {
				return nested
			}
			found.push(...nested.value)
			continue
		}
		if (!entry.isFile()) continue

		if (windows) {
			found.push({ executable: isWindowsExecutableName(relativePath), relativePath })
			continue
		}

		const stats = await safeStat(path.join(root, relativePath))
		if (!stats.ok) {
			return stats
		}
		found.push({
			executable: stats.value !== null && (stats.value.mode & 0o111) !== 0,
			relativePath,
		})
	}
	return { ok: true, value: found }
}
