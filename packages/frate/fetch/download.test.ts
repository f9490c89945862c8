import { mkdir, readFile, writeFile } from "node:fs/promises"
import { join } from "node:path"
import { coerceChecksum, type LockedEntry } from "@frate/core"
import { describe, expect, it } from "vitest"
import { type CacheLayout, downloadPath, resolveCacheLayout } from "@/cache/layout"
import { fetchVerified } from "@/fetch/download"
import {
	abs,
	createFakeServer,
	LINUX_TARGET,
	listTree,
	nes,
	sha256,
	ver,
	withTempDir,
} from "@/tests/helpers"

const ARCHIVE_URL = "https://downloads.test/just/just-1.42.1.tar.gz"
const ARCHIVE = new TextEncoder().encode("release bytes")

function lockedEntry(bytes: Uint8Array): LockedEntry {
	const checksum = coerceChecksum(sha256(bytes))
	if (!checksum) throw new Error("bad checksum")
	return {
		checksum,
		downloadUrl: nes(ARCHIVE_URL),
		platform: nes(LINUX_TARGET),
		resolvedVersion: ver("1.42.1"),
	}
}

function layoutIn(dir: string): CacheLayout {
	return resolveCacheLayout(abs(join(dir, "home")))
}

describe("fetchVerified", () => {
	it("downloads into the download cache named by digest", async () => {
		await withTempDir(async (dir) => {
			const layout = layoutIn(dir)
			const server = createFakeServer()
			server.serve(ARCHIVE_URL, ARCHIVE)
			const entry = lockedEntry(ARCHIVE)

			const result = await fetchVerified(entry, layout, {
				fetch: server.fetch,
				format: "tar.gz",
			})

			const digest = sha256(ARCHIVE).slice("sha256:".length)
			expect(result).toEqual({
				ok: true,
				value: {
					format: "tar.gz",
					fromCache: false,
					path: downloadPath(layout, digest, "tar.gz"),
				},
			})
			expect(await readFile(join(layout.downloadsDir, `${digest}.tar.gz`), "utf8")).toBe(
				"release bytes",
			)
			expect(await listTree(layout.tmpDir)).toEqual([])
		})
	})

	it("reuses a verified archive without fetching", async () => {
		await withTempDir(async (dir) => {
			const layout = layoutIn(dir)
			const server = createFakeServer()
			server.serve(ARCHIVE_URL, ARCHIVE)
			const entry = lockedEntry(ARCHIVE)

			await fetchVerified(entry, layout, { fetch: server.fetch, format: "tar.gz" })
			const again = await fetchVerified(entry, layout, { fetch: server.fetch, format: "tar.gz" })

			expect(again.ok && again.value.fromCache).toBe(true)
			expect(server.requests).toEqual([ARCHIVE_URL])
		})
	})

	it("replaces a cached archive that no longer matches its digest", async () => {
		await withTempDir(async (dir) => {
			const layout = layoutIn(dir)
			const server = createFakeServer()
			server.serve(ARCHIVE_URL, ARCHIVE)
			const entry = lockedEntry(ARCHIVE)
			const digest = sha256(ARCHIVE).slice("sha256:".length)
			await mkdir(layout.downloadsDir, { recursive: true })
			await writeFile(downloadPath(layout, digest, "tar.gz"), "tampered")

			const result = await fetchVerified(entry, layout, {
				fetch: server.fetch,
				format: "tar.gz",
			})

			expect(result.ok && result.value.fromCache).toBe(false)
			expect(await readFile(downloadPath(layout, digest, "tar.gz"), "utf8")).toBe(
				"release bytes",
			)
		})
	})

	it("rejects a download whose digest does not match and keeps nothing", async () => {
		await withTempDir(async (dir) => {
			const layout = layoutIn(dir)
			const server = createFakeServer()
			const corrupted = new TextEncoder().encode("release bytez")
			server.serve(ARCHIVE_URL, corrupted)

			const result = await fetchVerified(lockedEntry(ARCHIVE), layout, {
				fetch: server.fetch,
				format: "tar.gz",
			})

			expect(result).toBeErrOfType("integrity")
			if (!result.ok && result.error.type === "integrity") {
				expect(result.error.expected).toBe(sha256(ARCHIVE))
				expect(result.error.actual).toBe(sha256(corrupted))
				expect(result.error.url).toBe(ARCHIVE_URL)
			}
			expect(await listTree(layout.root)).toEqual([])
		})
	})

	it("reports a body that fails part way and keeps nothing", async () => {
		await withTempDir(async (dir) => {
			const layout = layoutIn(dir)
			const broken = async (): Promise<Response> =>
				new Response(
					new ReadableStream<Uint8Array>({
						pull(controller) {
							controller.error(new Error("connection reset"))
						},
					}),
				)

			const result = await fetchVerified(lockedEntry(ARCHIVE), layout, {
				fetch: broken,
				format: "tar.gz",
			})

			expect(result).toBeErrOfType("fetch")
			if (!result.ok) {
				expect(result.error.message).toBe(`Download of ${ARCHIVE_URL} was interrupted.`)
			}
			expect(await listTree(layout.root)).toEqual([])
		})
	})

	it("reports an HTTP failure as a retryable fetch error", async () => {
		await withTempDir(async (dir) => {
			const layout = layoutIn(dir)
			const server = createFakeServer()

			const result = await fetchVerified(lockedEntry(ARCHIVE), layout, {
				fetch: server.fetch,
				format: "tar.gz",
			})

			expect(result).toBeErrOfType("fetch")
			if (!result.ok && result.error.type === "fetch") {
				expect(result.error.status).toBe(404)
				expect(result.error.retryable).toBe(true)
			}
			expect(await listTree(layout.root)).toEqual([])
		})
	})

	it("reports a network failure as a fetch error", async () => {
		await withTempDir(async (dir) => {
			const layout = layoutIn(dir)
			const server = createFakeServer()
			server.fail(ARCHIVE_URL)

			const result = await fetchVerified(lockedEntry(ARCHIVE), layout, {
				fetch: server.fetch,
				format: "tar.gz",
			})

			expect(result).toBeErrOfType("fetch")
			if (!result.ok) {
				expect(result.error.message).toBe(`Unable to download ${ARCHIVE_URL}.`)
			}
		})
	})
})
