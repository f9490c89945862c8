import semver from "semver"
import type { ExactVersion } from "../types/branded"
import { coerceExactVersion } from "../types/coerce"
import type { NoMatchingVersionError, Result } from "../types/error"

/**
 * Picks the highest published version satisfying `requirement`. Unparsable
 * published versions are ignored, prereleases only match requirements that
 * name a prerelease, and an exact requirement must be published as-is.
 * Registry order never affects the outcome.
 */
export function resolveVersion(
	tool: string,
	requirement: string,
	published: readonly string[],
): Result<ExactVersion, NoMatchingVersionError> {
	const candidates = published
		.map((version) => coerceExactVersion(version))
		.filter((version): version is ExactVersion => version !== null)

	if (semver.validRange(requirement) === null) {
		return noMatch(
			tool,
			requirement,
			candidates,
			`Invalid version requirement for ${tool}: "${requirement}".`,
		)
	}

	const exact = semver.valid(requirement)
	if (exact !== null) {
		const match = candidates.find((candidate) => semver.eq(candidate, exact))
		if (match) {
			return { ok: true, value: match }
		}

		return noMatch(tool, requirement, candidates, `${tool} ${exact} is not published.`)
	}

	const best = semver.maxSatisfying(candidates, requirement)
	if (best === null) {
		return noMatch(
			tool,
			requirement,
			candidates,
			`No published version of ${tool} satisfies "${requirement}".`,
		)
	}

	return { ok: true, value: best }
}

export function satisfiesRequirement(version: string, requirement: string): boolean {
	if (semver.valid(version) === null || semver.validRange(requirement) === null) {
		return false
	}
	return semver.satisfies(version, requirement)
}

export function findRelease<T extends { readonly version: string }>(
	releases: readonly T[],
	version: ExactVersion,
): T | undefined {
	return releases.find((release) => {
		const cleaned = semver.valid(release.version)
		return cleaned !== null && semver.eq(cleaned, version)
	})
}

function noMatch(
	tool: string,
	requirement: string,
	candidates: readonly ExactVersion[],
	message: string,
): Result<ExactVersion, NoMatchingVersionError> {
	return {
		error: {
			available: semver.sort([...candidates]),
			message,
			requirement,
			tool,
			type: "no_matching_version",
		},
		ok: false,
	}
}
