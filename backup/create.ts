import { packDirectory } from "@/archive/pack"
import { nextBackupName, readLevelName } from "@/backup/naming"
import type { ServerLayout } from "@/config/layout"
import { WORLD_ARCHIVE_EXTENSION } from "@/constants"
import { ensureDir, readDirEntries, removePath, safeStat } from "@/io/fs"
import type { IoResult } from "@/io/types"
import type { AbsolutePath } from "@/types/branded"
import { joinAbsolute } from "@/types/coerce"
import type { IoError, NotFoundError, Result } from "@/types/error"

export interface BackupSummary {
	name: string
	archivePath: AbsolutePath
	files: number
	sourceBytes: number
	archiveBytes: number
}

export interface BackupEntry {
	name: string
	path: AbsolutePath
	sizeBytes: number
	modifiedAt: Date
}

/**
 * Archive the active world as `<backupsDir>/<name>.mcworld`. A partially
 * written archive is deleted when packing fails.
 */
export async function createWorldBackup(
	layout: ServerLayout,
	date: Date,
	onFile?: (relativePath: string, count: number) => void,
): Promise<Result<BackupSummary, IoError | NotFoundError>> {
	const world = await safeStat(layout.activeWorld)
	if (!world.ok) {
		return world
	}
	if (!world.value?.isDirectory()) {
		return {
			error: {
				message: `World directory not found: ${layout.activeWorld}`,
				path: layout.activeWorld,
				target: "world",
				type: "not_found",
			},
			ok: false,
		}
	}

	const ensured = await ensureDir(layout.backupsDir)
	if (!ensured.ok) {
		return ensured
	}

	const levelName = await readLevelName(layout.activeWorld)
	if (!levelName.ok) {
		return levelName
	}

	const name = await nextBackupName(layout.backupsDir, levelName.value, date)
	if (!name.ok) {
		return name
	}

	const archivePath = joinAbsolute(layout.backupsDir, `${name.value}${WORLD_ARCHIVE_EXTENSION}`)
	const packed = await packDirectory(layout.activeWorld, archivePath, onFile)
	if (!packed.ok) {
		const cleaned = await removePath(archivePath)
		if (!cleaned.ok) {
			return { error: { ...cleaned.error, cause: packed.error }, ok: false }
		}
		return packed
	}

	return {
		ok: true,
		value: {
			archiveBytes: packed.value.archiveBytes,
			archivePath,
			files: packed.value.files,
			name: `${name.value}${WORLD_ARCHIVE_EXTENSION}`,
			sourceBytes: packed.value.sourceBytes,
		},
	}
}

/**
 * World archives in `dir`, newest name first. A missing directory lists as empty.
 */
export async function listBackups(dir: AbsolutePath): Promise<IoResult<BackupEntry[]>> {
	const stats = await safeStat(dir)
	if (!stats.ok) {
		return stats
	}
	if (!stats.value) {
		return { ok: true, value: [] }
	}

	const entries = await readDirEntries(dir)
	if (!entries.ok) {
		return entries
	}

	const backups: BackupEntry[] = []
	for (const entry of entries.value) {
		if (!entry.isFile() || !entry.name.toLowerCase().endsWith(WORLD_ARCHIVE_EXTENSION)) {
			continue
		}

		const entryPath = joinAbsolute(dir, entry.name)
		const fileStats = await safeStat(entryPath)
		if (!fileStats.ok) {
			return fileStats
		}
		if (!fileStats.value) {
			continue
		}

		backups.push({
			modifiedAt: fileStats.value.mtime,
			name: entry.name,
			path: entryPath,
			sizeBytes: fileStats.value.size,
		})
	}

	backups.sort((a, b) => (a.name < b.name ? 1 : a.name > b.name ? -1 : 0))
	return { ok: true, value: backups }
}

export function formatMegabytes(bytes: number): string {
	return `${(bytes / (1024 * 1024)).toFixed(2)} MB`
}
