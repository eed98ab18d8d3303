import { DEFAULT_LEVEL_NAME, LEVELNAME_FILENAME, WORLD_ARCHIVE_EXTENSION } from "@/constants"
import { pathExists, readTextFile, safeStat } from "@/io/fs"
import type { IoResult } from "@/io/types"
import type { AbsolutePath } from "@/types/branded"
import { joinAbsolute } from "@/types/coerce"

const MONTHS = ["Jan", "Feb", "Mar", "Apr", "May", "Jun", "Jul", "Aug", "Sep", "Oct", "Nov", "Dec"]

const SUFFIX_LETTERS = "abcdefghijklmnopqrstuvwxyz"

const pad = (n: number): string => String(n).padStart(2, "0")

/** `Jan01_2024`, in local time. */
export function formatBackupDate(date: Date): string {
	return `${MONTHS[date.getMonth()]}${pad(date.getDate())}_${date.getFullYear()}`
}

/** `20240101_093005`, in local time. */
export function formatBackupTimestamp(date: Date): string {
	return [
		date.getFullYear(),
		pad(date.getMonth() + 1),
		pad(date.getDate()),
		"_",
		pad(date.getHours()),
		pad(date.getMinutes()),
		pad(date.getSeconds()),
	].join("")
}

/** Whitespace, path separators and characters Windows rejects in file names. */
const UNSAFE_NAME_CHARS = /[\s/\\:*?"<>|]/g

/**
 * `<level>_<date>`, with every character that could leave the backups
 * directory or break the file name replaced by `_`.
 */
export function backupBaseName(levelName: string, date: Date): string {
	return `${levelName.replace(UNSAFE_NAME_CHARS, "_")}_${formatBackupDate(date)}`
}

/**
 * Pick the first free backup name for `date`: the bare base name, then the base
 * with a single letter a-z, then a timestamped fallback. Returned without the
 * .mcworld extension.
 */
export async function nextBackupName(
	backupsDir: AbsolutePath,
	levelName: string,
	date: Date,
): Promise<IoResult<string>> {
	const base = backupBaseName(levelName, date)
	const candidates = [base, ...Array.from(SUFFIX_LETTERS, (letter) => `${base}${letter}`)]

	for (const candidate of candidates) {
		const taken = await pathExists(joinAbsolute(backupsDir, `${candidate}${WORLD_ARCHIVE_EXTENSION}`))
		if (!taken.ok) {
			return taken
		}
		if (!taken.value) {
			return { ok: true, value: candidate }
		}
	}

	return { ok: true, value: `${base}_backup_${formatBackupTimestamp(date)}` }
}

/**
 * The display name in levelname.txt, or `World` when it is absent or blank.
 */
export async function readLevelName(worldDir: AbsolutePath): Promise<IoResult<string>> {
	const levelFile = joinAbsolute(worldDir, LEVELNAME_FILENAME)
	const stats = await safeStat(levelFile)
	if (!stats.ok) {
		return stats
	}
	if (!stats.value) {
		return { ok: true, value: DEFAULT_LEVEL_NAME }
	}

	const contents = await readTextFile(levelFile)
	if (!contents.ok) {
		return contents
	}

	const name = contents.value.trim()
	return { ok: true, value: name.length > 0 ? name : DEFAULT_LEVEL_NAME }
}
