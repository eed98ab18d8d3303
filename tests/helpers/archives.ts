/**
 * In-process zip fixtures for pack and world archives.
 */

import { strToU8, zipSync } from "fflate"
import { writeFixture } from "@/tests/helpers/fs"

export type ZipEntries = Record<string, string | Uint8Array>

export interface FixtureManifest {
	uuid?: string
	name?: string
	version?: [number, number, number]
	modules?: string[]
}

export function buildZip(entries: ZipEntries): Uint8Array {
	const files: Record<string, Uint8Array> = {}
	for (const [name, contents] of Object.entries(entries)) {
		files[name] = typeof contents === "string" ? strToU8(contents) : contents
	}
	return zipSync(files)
}

export async function writeZip(path: string, entries: ZipEntries): Promise<void> {
	await writeFixture(path, buildZip(entries))
}

/**
 * A manifest.json document. `uuid` is omitted from the header when undefined.
 */
export function manifestJson(manifest: FixtureManifest): string {
	const header: Record<string, unknown> = {
		version: manifest.version ?? [1, 0, 0],
	}
	if (manifest.uuid !== undefined) {
		header.uuid = manifest.uuid
	}
	if (manifest.name !== undefined) {
		header.name = manifest.name
	}

	return JSON.stringify({
		format_version: 2,
		header,
		modules: (manifest.modules ?? ["resources"]).map((type) => ({ type })),
	})
}
