import { type Platform, platformFor } from "@frate/core"

export function currentPlatform(): Platform {
	return platformFor(process.platform, process.arch)
}
