/**
 * Archive fixtures
 *
 * Builds release archives in memory so tests never touch the network.
 */

import { createHash } from "node:crypto"
import { gzipSync } from "node:zlib"
import AdmZip from "adm-zip"
import { pack } from "tar-stream"

export interface ArchiveEntry {
	name: string
	contents?: string
	/** Permission bits; files default to 0o644 */
	mode?: number
	type?: "file" | "directory" | "symlink"
	/** Symlink target */
	linkname?: string
}

const S_IFREG = 0o100000
const S_IFDIR = 0o040000
const S_IFLNK = 0o120000

export async function buildTarGz(entries: readonly ArchiveEntry[]): Promise<Buffer> {
	const packer = pack()
	const chunks: Buffer[] = []
	const done = new Promise<void>((resolve, reject) => {
		packer.on("data", (chunk: Buffer) => chunks.push(chunk))
		packer.on("end", () => resolve())
		packer.on("error", reject)
	})

	for (const entry of entries) {
		const type = entry.type ?? "file"
		await new Promise<void>((resolve, reject) => {
			packer.entry(
				{
					linkname: entry.linkname,
					mode: entry.mode ?? (type === "directory" ? 0o755 : 0o644),
					mtime: new Date(0),
					name: entry.name,
					type,
				},
				type === "file" ? (entry.contents ?? "") : undefined,
				(error) => (error ? reject(error) : resolve()),
			)
		})
	}
	packer.finalize()
	await done

	return gzipSync(Buffer.concat(chunks))
}

export function buildZip(entries: readonly ArchiveEntry[]): Buffer {
	const zip = new AdmZip()
	for (const entry of entries) {
		const type = entry.type ?? "file"
		const name = type === "directory" && !entry.name.endsWith("/") ? `${entry.name}/` : entry.name
		const contents = type === "symlink" ? (entry.linkname ?? "") : (entry.contents ?? "")
		zip.addFile(name, Buffer.from(contents))

		const added = zip.getEntry(name)
		if (!added) {
			throw new Error(`Zip entry was not added: ${name}`)
		}
		const fileType = type === "directory" ? S_IFDIR : type === "symlink" ? S_IFLNK : S_IFREG
		const mode = entry.mode ?? (type === "file" ? 0o644 : 0o755)
		added.attr = ((fileType | mode) << 16) >>> 0
	}
	return zip.toBuffer()
}

/**
 * A release laid out the way most projects publish one: a top-level
 * `<tool>-<version>/` directory holding the binary and a readme.
 */
export function releaseEntries(tool: string, version: string): ArchiveEntry[] {
	return [
		{ name: `${tool}-${version}/`, type: "directory" },
		{ contents: `# ${tool}\n`, name: `${tool}-${version}/README.md` },
		{
			contents: `#!/bin/sh\necho "${tool} ${version}"\n`,
			mode: 0o755,
			name: `${tool}-${version}/${tool}`,
		},
	]
}

export function sha256(bytes: Uint8Array): string {
	return `sha256:${createHash("sha256").update(bytes).digest("hex")}`
}
