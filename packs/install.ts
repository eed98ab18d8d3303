import type { ServerLayout } from "@/config/layout"
import { PROTECTED_PACK_DIRS, PROTECTED_PACK_PREFIX } from "@/constants"
import { copyDirectory, ensureDir, readDirEntries, removePath, safeStat } from "@/io/fs"
import type { IoResult } from "@/io/types"
import type { PackInventory, PackRecord, PackRole } from "@/packs/types"
import type { AbsolutePath } from "@/types/branded"
import { joinAbsolute } from "@/types/coerce"
import type { IoError, Result, ValidationError } from "@/types/error"

export interface InstalledPack {
	record: PackRecord
	targetPath: AbsolutePath
}

export interface InstallSummary {
	installed: InstalledPack[]
	removed: string[]
	kept: string[]
}

export function isProtectedPackDir(name: string): boolean {
	const lower = name.toLowerCase()
	return lower.startsWith(PROTECTED_PACK_PREFIX) || PROTECTED_PACK_DIRS.has(lower)
}

export function packRoleDir(layout: ServerLayout, role: PackRole): AbsolutePath {
	return role === "behavior" ? layout.behaviorPacksDir : layout.resourcePacksDir
}

/**
 * Replace every previously deployed pack with the inventory's packs, one
 * directory per pack id under the directory for its role. Directories that ship
 * with the server are left in place.
 */
export async function installPacks(
	inventory: PackInventory,
	layout: ServerLayout,
): Promise<Result<InstallSummary, IoError | ValidationError>> {
	for (const record of inventory.values()) {
		const id = record.identity.id
		if (id.includes("/") || id.includes("\\") || id === "." || id === "..") {
			return {
				error: {
					field: "header.uuid",
					message: `Pack id "${id}" from ${record.sourceArchive} is not a valid directory name.`,
					path: record.packDir,
					source: "manual",
					type: "validation",
				},
				ok: false,
			}
		}
	}

	const removed: string[] = []
	const kept: string[] = []

	for (const dir of [layout.behaviorPacksDir, layout.resourcePacksDir]) {
		const cleared = await clearDeployedPacks(dir, removed, kept)
		if (!cleared.ok) {
			return cleared
		}

		const ensured = await ensureDir(dir)
		if (!ensured.ok) {
			return ensured
		}
	}

	const installed: InstalledPack[] = []
	for (const record of inventory.values()) {
		const targetPath = joinAbsolute(packRoleDir(layout, record.role), record.identity.id)
		const cleared = await removePath(targetPath)
		if (!cleared.ok) {
			return cleared
		}

		const copied = await copyDirectory(record.packDir, targetPath)
		if (!copied.ok) {
			return copied
		}

		installed.push({ record, targetPath })
	}

	return { ok: true, value: { installed, kept, removed } }
}

async function clearDeployedPacks(
	dir: AbsolutePath,
	removed: string[],
	kept: string[],
): Promise<IoResult<void>> {
	const stats = await safeStat(dir)
	if (!stats.ok) {
		return stats
	}
	if (!stats.value) {
		return { ok: true, value: undefined }
	}

	const entries = await readDirEntries(dir)
	if (!entries.ok) {
		return entries
	}

	for (const entry of entries.value) {
		if (!entry.isDirectory()) {
			continue
		}
		if (isProtectedPackDir(entry.name)) {
			kept.push(entry.name)
			continue
		}

		const result = await removePath(joinAbsolute(dir, entry.name))
		if (!result.ok) {
			return result
		}
		removed.push(entry.name)
	}

	return { ok: true, value: undefined }
}
