import path from "node:path"
import { findManifests, unpackArchive } from "@/archive/unpack"
import { PACK_ARCHIVE_EXTENSIONS } from "@/constants"
import { readDirEntries, safeStat } from "@/io/fs"
import type { IoResult } from "@/io/types"
import { readPackManifest } from "@/manifest/parse"
import { classifyPack } from "@/packs/classify"
import type { InventoryScan, PackRecord, SkippedEntry } from "@/packs/types"
import type { AbsolutePath, PackId } from "@/types/branded"
import { joinAbsolute } from "@/types/coerce"

export function isPackArchive(filename: string): boolean {
	return PACK_ARCHIVE_EXTENSIONS.has(path.extname(filename).toLowerCase())
}

/**
 * List pack archives directly inside `modsDir`, sorted by filename. A missing
 * directory lists as empty.
 */
export async function listPackArchives(modsDir: AbsolutePath): Promise<IoResult<AbsolutePath[]>> {
	const stats = await safeStat(modsDir)
	if (!stats.ok) {
		return stats
	}
	if (!stats.value) {
		return { ok: true, value: [] }
	}

	const entries = await readDirEntries(modsDir)
	if (!entries.ok) {
		return entries
	}

	const archives = entries.value
		.filter((entry) => entry.isFile() && isPackArchive(entry.name))
		.map((entry) => joinAbsolute(modsDir, entry.name))
	return { ok: true, value: archives }
}

/**
 * Unpack every pack archive in `modsDir` under `scratchDir` and index the
 * manifests found. The first archive (by filename) to declare an id keeps it;
 * later declarations are reported as duplicates.
 */
export async function buildInventory(
	modsDir: AbsolutePath,
	scratchDir: AbsolutePath,
): Promise<IoResult<InventoryScan>> {
	const archives = await listPackArchives(modsDir)
	if (!archives.ok) {
		return archives
	}

	const inventory = new Map<PackId, PackRecord>()
	const skipped: SkippedEntry[] = []
	const usedDirs = new Set<string>()

	for (const archivePath of archives.value) {
		const archive = path.basename(archivePath)
		const extractDir = joinAbsolute(scratchDir, scratchName(archive, usedDirs))

		const unpacked = await unpackArchive(archivePath, extractDir)
		if (!unpacked.ok) {
			skipped.push({ archive, error: unpacked.error, kind: "archive" })
			continue
		}

		const manifests = await collectManifests(unpacked.value)
		if (!manifests.ok) {
			skipped.push({
				archive,
				error: {
					archive: archivePath,
					cause: manifests.error,
					message: `Unable to scan the contents of ${archive}.`,
					type: "archive",
				},
				kind: "archive",
			})
			continue
		}

		for (const manifestPath of manifests.value) {
			const manifest = await readPackManifest(manifestPath)
			if (!manifest.ok) {
				skipped.push({ archive, error: manifest.error, kind: "manifest" })
				continue
			}

			const existing = inventory.get(manifest.value.id)
			if (existing) {
				skipped.push({
					archive,
					id: manifest.value.id,
					keptFrom: existing.sourceArchive,
					kind: "duplicate",
				})
				continue
			}

			inventory.set(manifest.value.id, {
				displayName: manifest.value.name ?? stemOf(archive),
				identity: { id: manifest.value.id, version: manifest.value.version },
				packDir: path.dirname(manifestPath) as AbsolutePath,
				role: classifyPack(manifest.value.moduleTypes),
				sourceArchive: archive,
			})
		}
	}

	return {
		ok: true,
		value: {
			archives: archives.value.map((archivePath) => path.basename(archivePath)),
			inventory,
			skipped,
		},
	}
}

export function countByRole(scan: InventoryScan): { behavior: number; resource: number } {
	let behavior = 0
	let resource = 0
	for (const record of scan.inventory.values()) {
		if (record.role === "behavior") {
			behavior += 1
		} else {
			resource += 1
		}
	}
	return { behavior, resource }
}

async function collectManifests(root: AbsolutePath): Promise<IoResult<AbsolutePath[]>> {
	const manifests: AbsolutePath[] = []
	for await (const found of findManifests(root)) {
		if (!found.ok) {
			return found
		}
		manifests.push(found.value)
	}
	return { ok: true, value: manifests }
}

function stemOf(filename: string): string {
	return path.basename(filename, path.extname(filename))
}

// Archives sharing a stem (pack.mcpack, pack.mcaddon) get distinct directories.
function scratchName(archive: string, used: Set<string>): string {
	const stem = stemOf(archive)
	let candidate = stem
	let index = 2
	while (used.has(candidate)) {
		candidate = `${stem}-${index}`
		index += 1
	}
	used.add(candidate)
	return candidate
}
