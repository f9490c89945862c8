export interface PlatformAsset {
	readonly platform: string
	readonly url: string
	readonly checksum: string
}

export interface RegistryVersion {
	readonly version: string
	readonly platform_assets: readonly PlatformAsset[]
}

/**
 * One tool as published by the registry. Lives only for the duration of a
 * command.
 */
export interface ToolRecord {
	readonly name: string
	readonly description?: string
	readonly versions: readonly RegistryVersion[]
}

export interface RegistryDocument {
	readonly tools: readonly ToolRecord[]
	/** Records dropped because they did not match the expected shape */
	readonly skipped: number
}
