/**
 * Platforms are identified by target triples, the naming release assets
 * conventionally use. A running platform accepts several triples in
 * preference order (glibc builds first, musl as a fallback).
 */
export interface Platform {
	readonly os: string
	readonly arch: string
	readonly windows: boolean
	readonly targets: readonly string[]
}

const ARCH_NAMES: Readonly<Record<string, string>> = {
	arm64: "aarch64",
	ia32: "i686",
	x64: "x86_64",
}

export function platformFor(os: string, arch: string): Platform {
	const cpu = ARCH_NAMES[arch] ?? arch
	switch (os) {
		case "linux":
			return {
				arch: cpu,
				os,
				targets: [`${cpu}-unknown-linux-gnu`, `${cpu}-unknown-linux-musl`],
				windows: false,
			}
		case "darwin":
			return {
				arch: cpu,
				os,
				targets: [`${cpu}-apple-darwin`],
				windows: false,
			}
		case "win32":
			return {
				arch: cpu,
				os,
				targets: [`${cpu}-pc-windows-msvc`, `${cpu}-pc-windows-gnu`],
				windows: true,
			}
		default:
			return {
				arch: cpu,
				os,
				targets: [`${cpu}-unknown-${os}`],
				windows: false,
			}
	}
}

export function acceptsPlatform(platform: Platform, target: string): boolean {
	return platform.targets.includes(target)
}

export function describePlatform(platform: Platform): string {
	return platform.targets[0] ?? `${platform.arch}-${platform.os}`
}
