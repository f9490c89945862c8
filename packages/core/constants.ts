/**
 * Shared constants for manifests, lockfiles and the cache layout.
 */

/** Project manifest - declares tools and their version requirements */
export const MANIFEST_FILENAME = "frate.toml"

/** Project lockfile - pins every declared tool to one version and asset */
export const LOCKFILE_FILENAME = "frate.lock"

export const LOCKFILE_VERSION = 1

export const LOCKFILE_HEADER =
	"# This file is generated by frate. It is not intended for manual editing."

/** Global frate directory (relative to home) */
export const FRATE_GLOBAL_DIR = ".frate"

export const BIN_DIR = "bin"
export const TOOLS_DIR = "tools"
export const DOWNLOADS_DIR = "downloads"
export const TMP_DIR = "tmp"

/** Per-tool metadata record inside `tools/<name>/` */
export const TOOL_RECORD_FILENAME = "tool.json"
export const TOOL_RECORD_SCHEMA = 1

/** Default `[project]` version written by `frate init` */
export const DEFAULT_PROJECT_VERSION = "0.1.0"
