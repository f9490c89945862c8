import path from "node:path"
import {
	type AbsolutePath,
	type ArchiveFormat,
	archiveExtension,
	assertAbsolutePathDirect,
	BIN_DIR,
	DOWNLOADS_DIR,
	type ShimKind,
	shimFileName,
	TMP_DIR,
	TOOL_RECORD_FILENAME,
	TOOLS_DIR,
} from "@frate/core"

/**
 * Directory layout below a cache root. The root is always passed in
 * explicitly; nothing here reads the environment.
 */
export interface CacheLayout {
	readonly root: AbsolutePath
	readonly binDir: AbsolutePath
	readonly toolsDir: AbsolutePath
	readonly downloadsDir: AbsolutePath
	readonly tmpDir: AbsolutePath
}

export function resolveCacheLayout(root: AbsolutePath): CacheLayout {
	return {
		binDir: join(root, BIN_DIR),
		downloadsDir: join(root, DOWNLOADS_DIR),
		root,
		tmpDir: join(root, TMP_DIR),
		toolsDir: join(root, TOOLS_DIR),
	}
}

export function toolDir(layout: CacheLayout, tool: string): AbsolutePath {
	return join(layout.toolsDir, tool)
}

export function versionDir(layout: CacheLayout, tool: string, version: string): AbsolutePath {
	return join(layout.toolsDir, tool, version)
}

export function installRecordPath(layout: CacheLayout, tool: string): AbsolutePath {
	return join(layout.toolsDir, tool, TOOL_RECORD_FILENAME)
}

export function shimPath(layout: CacheLayout, tool: string, kind: ShimKind): AbsolutePath {
	return join(layout.binDir, shimFileName(tool, kind))
}

export function downloadPath(
	layout: CacheLayout,
	digest: string,
	format: ArchiveFormat,
): AbsolutePath {
	return join(layout.downloadsDir, `${digest}${archiveExtension(format)}`)
}

function join(...segments: string[]): AbsolutePath {
	return assertAbsolutePathDirect(path.join(...segments))
}
