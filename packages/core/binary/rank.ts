/**
 * Ranking of executable candidates found in an extracted release. Lower
 * scores win; ties fall back to path depth and then plain string order, so
 * the result never depends on directory enumeration order.
 */

export type BinaryMatch = "exact" | "stripped" | "prefix" | "other"

export interface RankedCandidate {
	/** Path relative to the version directory, `/`-separated */
	readonly relativePath: string
	readonly match: BinaryMatch
}

const MATCH_SCORE: Readonly<Record<BinaryMatch, number>> = {
	exact: 0,
	other: 3,
	prefix: 2,
	stripped: 1,
}

const EXECUTABLE_EXTENSIONS = [".exe", ".cmd", ".bat", ".com"]

const DECORATION_TOKENS = new Set([
	"aarch64",
	"amd64",
	"apple",
	"arm",
	"arm64",
	"armv7",
	"darwin",
	"gnu",
	"gnueabihf",
	"i386",
	"i686",
	"linux",
	"macos",
	"msvc",
	"musl",
	"osx",
	"pc",
	"static",
	"universal",
	"unknown",
	"win",
	"win32",
	"win64",
	"windows",
	"x64",
	"x86",
])

const VERSION_TOKEN = /^v?\d+$/

export function binaryStem(relativePath: string): string {
	const fileName = relativePath.split("/").pop() ?? relativePath
	const lower = fileName.toLowerCase()
	for (const extension of EXECUTABLE_EXTENSIONS) {
		if (lower.endsWith(extension)) {
			return lower.slice(0, -extension.length)
		}
	}
	return lower
}

/**
 * Drops version numbers and platform words: `just-1.42.1-x86_64-linux`
 * becomes `just`.
 */
export function stripDecorations(name: string): string {
	return name
		.toLowerCase()
		.split(/[-_.]+/)
		.filter((token) => token && !VERSION_TOKEN.test(token) && !DECORATION_TOKENS.has(token))
		.join("-")
}

export function classifyCandidate(tool: string, relativePath: string): BinaryMatch {
	const stem = binaryStem(relativePath)
	const toolName = tool.toLowerCase()
	if (stem === toolName) return "exact"

	const strippedTool = stripDecorations(toolName)
	if (strippedTool && stripDecorations(stem) === strippedTool) return "stripped"

	if (stem.startsWith(toolName)) return "prefix"
	return "other"
}

export function rankBinaryCandidates(
	tool: string,
	relativePaths: readonly string[],
): RankedCandidate[] {
	return relativePaths
		.map((relativePath) => ({
			match: classifyCandidate(tool, relativePath),
			relativePath,
		}))
		.sort(compareCandidates)
}

export function isWindowsExecutableName(relativePath: string): boolean {
	const lower = relativePath.toLowerCase()
	return EXECUTABLE_EXTENSIONS.some((extension) => lower.endsWith(extension))
}

function compareCandidates(a: RankedCandidate, b: RankedCandidate): number {
	const scoreDelta = MATCH_SCORE[a.match] - MATCH_SCORE[b.match]
	if (scoreDelta !== 0) return scoreDelta

	const depthDelta = depth(a.relativePath) - depth(b.relativePath)
	if (depthDelta !== 0) return depthDelta

	if (a.relativePath < b.relativePath) return -1
	if (a.relativePath > b.relativePath) return 1
	return 0
}

function depth(relativePath: string): number {
	return relativePath.split("/").length
}
