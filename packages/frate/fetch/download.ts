import { createHash, type Hash } from "node:crypto"
import {
	type AbsolutePath,
	type ArchiveFormat,
	type CacheIoError,
	checksumDigest,
	type FetchError,
	type IntegrityError,
	type LockedEntry,
	type Result,
} from "@frate/core"
import type { CacheLayout } from "@/cache/layout"
import {
	discardStaged,
	stageDownload,
	storeDownload,
	verifiedDownload,
} from "@/cache/manager"
import type { FetchLike } from "@/fetch/types"

export interface VerifiedArchive {
	path: AbsolutePath
	format: ArchiveFormat
	/** True when a previously verified download was reused */
	fromCache: boolean
}

export type FetchVerifyError = FetchError | IntegrityError | CacheIoError

export interface FetchVerifiedOptions {
	format: ArchiveFormat
	fetch?: FetchLike
}

interface BodyRead {
	/** Set when the response body failed part way through */
	interruption?: { error: unknown }
}

/**
 * Produces a local copy of the entry's archive whose SHA-256 matches the
 * locked checksum. Verified archives are kept under `downloads/`, named by
 * digest, and re-hashed before reuse. A failed download or a mismatch leaves
 * nothing behind.
 */
export async function fetchVerified(
	entry: LockedEntry,
	layout: CacheLayout,
	options: FetchVerifiedOptions,
): Promise<Result<VerifiedArchive, FetchVerifyError>> {
	const expected = checksumDigest(entry.checksum)
	const url = entry.downloadUrl

	const cached = await verifiedDownload(layout, expected, options.format)
	if (!cached.ok) {
		return cached
	}
	if (cached.value) {
		return { ok: true, value: { format: options.format, fromCache: true, path: cached.value } }
	}

	let response: Response
	try {
		response = await (options.fetch ?? fetch)(url)
	} catch (error) {
		return fetchFailure(url, `Unable to download ${url}.`, error)
	}

	if (!response.ok || !response.body) {
		return {
			error: {
				message: `Download failed (${response.status} ${response.statusText}): ${url}`,
				retryable: true,
				status: response.status,
				type: "fetch",
				url,
			},
			ok: false,
		}
	}

	const hash = createHash("sha256")
	const read: BodyRead = {}
	const staged = await stageDownload(layout, hashedChunks(response.body, hash, read))
	if (!staged.ok) {
		return staged
	}

	if (read.interruption) {
		await discardStaged(layout, staged.value)
		return fetchFailure(
			url,
			`Download of ${url} was interrupted.`,
			read.interruption.error,
			response.status,
		)
	}

	const actual = hash.digest("hex")
	if (actual !== expected) {
		await discardStaged(layout, staged.value)
		return {
			error: {
				actual: `sha256:${actual}`,
				expected: entry.checksum,
				message: `Checksum mismatch for ${url}.`,
				type: "integrity",
				url,
			},
			ok: false,
		}
	}

	const stored = await storeDownload(layout, staged.value, expected, options.format)
	if (!stored.ok) {
		return stored
	}
	return { ok: true, value: { format: options.format, fromCache: false, path: stored.value } }
}

/**
 * Yields the body's chunks, hashing them on the way. A read failure ends the
 * stream early and is recorded on `read`.
 */
async function* hashedChunks(
	body: NonNullable<Response["body"]>,
	hash: Hash,
	read: BodyRead,
): AsyncGenerator<Uint8Array> {
	const reader = body.getReader()
	while (true) {
		let chunk: Awaited<ReturnType<typeof reader.read>>
		try {
			chunk = await reader.read()
		} catch (error) {
			read.interruption = { error }
			return
		}
		if (chunk.done) return

		hash.update(chunk.value)
		yield chunk.value
	}
}

function fetchFailure(
	url: string,
	message: string,
	error: unknown,
	status?: number,
): { ok: false; error: FetchError } {
	return {
		error: {
			message,
			rawError: error instanceof Error ? error : undefined,
			retryable: true,
			status,
			type: "fetch",
			url,
		},
		ok: false,
	}
}
