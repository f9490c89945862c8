import { describe, expect, it } from "vitest"
import { platformFor } from "../platform/platform"
import type { RegistryVersion } from "../registry/types"
import { archiveFormatFromUrl, selectAsset } from "./asset"

const CHECKSUM_A = `sha256:${"a".repeat(64)}`
const CHECKSUM_B = `sha256:${"b".repeat(64)}`

const linux = platformFor("linux", "x64")

describe("archiveFormatFromUrl", () => {
	it("detects zip and gzip-tar archives", () => {
		expect(archiveFormatFromUrl("https://example.test/just.zip")).toBe("zip")
		expect(archiveFormatFromUrl("https://example.test/just.tar.gz")).toBe("tar.gz")
		expect(archiveFormatFromUrl("https://example.test/just.TGZ")).toBe("tar.gz")
	})

	it("ignores query strings and fragments", () => {
		expect(archiveFormatFromUrl("https://example.test/just.zip?token=x#top")).toBe("zip")
	})

	it("returns null for anything else", () => {
		expect(archiveFormatFromUrl("https://example.test/just.msi")).toBeNull()
		expect(archiveFormatFromUrl("https://example.test/just.tar.xz")).toBeNull()
	})
})

describe("platformFor", () => {
	it("maps node platform names to target triples", () => {
		expect(platformFor("linux", "x64").targets).toEqual([
			"x86_64-unknown-linux-gnu",
			"x86_64-unknown-linux-musl",
		])
		expect(platformFor("darwin", "arm64").targets).toEqual(["aarch64-apple-darwin"])
		expect(platformFor("win32", "x64").windows).toBe(true)
	})
})

describe("selectAsset", () => {
	it("prefers the platform's first target over a fallback", () => {
		const release: RegistryVersion = {
			platform_assets: [
				{
					checksum: CHECKSUM_B,
					platform: "x86_64-unknown-linux-musl",
					url: "https://example.test/just-musl.tar.gz",
				},
				{
					checksum: CHECKSUM_A,
					platform: "x86_64-unknown-linux-gnu",
					url: "https://example.test/just-gnu.tar.gz",
				},
			],
			version: "1.42.1",
		}

		const result = selectAsset("just", release, linux)

		expect(result).toEqual({
			ok: true,
			value: {
				checksum: CHECKSUM_A,
				format: "tar.gz",
				platform: "x86_64-unknown-linux-gnu",
				url: "https://example.test/just-gnu.tar.gz",
			},
		})
	})

	it("falls back to a compatible target", () => {
		const release: RegistryVersion = {
			platform_assets: [
				{
					checksum: CHECKSUM_B.toUpperCase().replace("SHA256:", ""),
					platform: "x86_64-unknown-linux-musl",
					url: "https://example.test/just-musl.zip",
				},
			],
			version: "1.42.1",
		}

		const result = selectAsset("just", release, linux)

		expect(result.ok).toBe(true)
		if (result.ok) {
			expect(result.value.platform).toBe("x86_64-unknown-linux-musl")
			expect(result.value.checksum).toBe(CHECKSUM_B)
			expect(result.value.format).toBe("zip")
		}
	})

	it("skips assets with unsupported formats or bad checksums", () => {
		const release: RegistryVersion = {
			platform_assets: [
				{
					checksum: CHECKSUM_A,
					platform: "x86_64-unknown-linux-gnu",
					url: "https://example.test/just.deb",
				},
				{
					checksum: "md5:abc",
					platform: "x86_64-unknown-linux-gnu",
					url: "https://example.test/just.tar.gz",
				},
			],
			version: "1.42.1",
		}

		const result = selectAsset("just", release, linux)

		expect(result.ok).toBe(false)
	})

	it("reports the platforms that were available", () => {
		const release: RegistryVersion = {
			platform_assets: [
				{
					checksum: CHECKSUM_A,
					platform: "aarch64-apple-darwin",
					url: "https://example.test/just.tar.gz",
				},
			],
			version: "1.42.1",
		}

		const result = selectAsset("just", release, linux)

		expect(result).toEqual({
			error: {
				available: ["aarch64-apple-darwin"],
				message: "No just 1.42.1 asset for x86_64-unknown-linux-gnu.",
				platform: "x86_64-unknown-linux-gnu",
				tool: "just",
				type: "no_compatible_asset",
				version: "1.42.1",
			},
			ok: false,
		})
	})
})
