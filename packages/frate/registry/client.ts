import {
	findToolRecord,
	type NotFoundError,
	parseRegistryDocument,
	type RegistryDocument,
	type RegistryUnavailableError,
	type Result,
	type ToolRecord,
} from "@frate/core"
import type { FetchLike } from "@/fetch/types"

export type RegistryResult<T> = Result<T, RegistryUnavailableError>

export interface RegistryClient {
	readonly url: string
	listTools(): Promise<RegistryResult<RegistryDocument>>
	getTool(name: string): Promise<Result<ToolRecord, RegistryUnavailableError | NotFoundError>>
}

/**
 * Read-only client for a registry served as a single JSON document. The
 * document is fetched at most once per client; failures are not cached.
 */
export function createRegistryClient(options: {
	url: string
	fetch?: FetchLike
}): RegistryClient {
	const fetchImpl = options.fetch ?? fetch
	let cached: RegistryDocument | undefined

	async function listTools(): Promise<RegistryResult<RegistryDocument>> {
		if (cached) {
			return { ok: true, value: cached }
		}

		const fetched = await fetchRegistryDocument(fetchImpl, options.url)
		if (fetched.ok) {
			cached = fetched.value
		}
		return fetched
	}

	async function getTool(
		name: string,
	): Promise<Result<ToolRecord, RegistryUnavailableError | NotFoundError>> {
		const document = await listTools()
		if (!document.ok) {
			return document
		}

		const record = findToolRecord(document.value, name)
		if (!record) {
			return {
				error: {
					message: `Tool not found in registry: ${name}`,
					name,
					target: "registry",
					type: "not_found",
				},
				ok: false,
			}
		}
		return { ok: true, value: record }
	}

	return { getTool, listTools, url: options.url }
}

async function fetchRegistryDocument(
	fetchImpl: FetchLike,
	url: string,
): Promise<RegistryResult<RegistryDocument>> {
	let response: Response
	try {
		response = await fetchImpl(url, { headers: { Accept: "application/json" } })
	} catch (error) {
		return {
			error: {
				message: `Unable to reach registry: ${url}.`,
				rawError: error instanceof Error ? error : undefined,
				type: "registry_unavailable",
				url,
			},
			ok: false,
		}
	}

	if (!response.ok) {
		return {
			error: {
				message: `Registry request failed (${response.status} ${response.statusText}).`,
				status: response.status,
				type: "registry_unavailable",
				url,
			},
			ok: false,
		}
	}

	let data: unknown
	try {
		data = await response.json()
	} catch (error) {
		return {
			error: {
				message: `Registry response is not valid JSON: ${url}.`,
				rawError: error instanceof Error ? error : undefined,
				type: "registry_unavailable",
				url,
			},
			ok: false,
		}
	}

	return parseRegistryDocument(data, url)
}
