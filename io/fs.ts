import type { Dirent, ReadStream, Stats, WriteStream } from "node:fs"
import { cp, mkdir, open, readdir, readFile, rename, rm, stat, writeFile } from "node:fs/promises"
import path from "node:path"
import type { AbsolutePath } from "@/types/branded"
import type { IoResult } from "@/io/types"
import { ioFailure } from "@/io/types"

// Re-export types for convenience
export type { IoError, IoResult } from "@/io/types"

type StatResult = IoResult<Stats | null>

export async function safeStat(targetPath: string): Promise<StatResult> {
	try {
		const stats = await stat(targetPath)
		return { ok: true, value: stats }
	} catch (error) {
		if (hasErrorCode(error, "ENOENT")) {
			return { ok: true, value: null }
		}

		return ioFailure(`Unable to access ${targetPath}.`, toAbsolutePath(targetPath), "stat", error)
	}
}

export async function pathExists(targetPath: string): Promise<IoResult<boolean>> {
	const stats = await safeStat(targetPath)
	if (!stats.ok) {
		return stats
	}

	return { ok: true, value: stats.value !== null }
}

export async function ensureDir(targetPath: string): Promise<IoResult<void>> {
	const stats = await safeStat(targetPath)
	if (!stats.ok) {
		return stats
	}

	if (stats.value && !stats.value.isDirectory()) {
		return ioFailure(`Expected directory at ${targetPath}.`, toAbsolutePath(targetPath), "mkdir")
	}

	if (!stats.value) {
		try {
			await mkdir(targetPath, { recursive: true })
		} catch (error) {
			return ioFailure(
				`Unable to create ${targetPath}.`,
				toAbsolutePath(targetPath),
				"mkdir",
				error,
			)
		}
	}

	return { ok: true, value: undefined }
}

export async function readDirEntries(targetPath: string): Promise<IoResult<Dirent[]>> {
	try {
		const entries = await readdir(targetPath, { withFileTypes: true })
		entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
		return { ok: true, value: entries }
	} catch (error) {
		return ioFailure(`Unable to list ${targetPath}.`, toAbsolutePath(targetPath), "readdir", error)
	}
}

export async function readTextFile(targetPath: string): Promise<IoResult<string>> {
	try {
		const contents = await readFile(targetPath, "utf8")
		return { ok: true, value: contents }
	} catch (error) {
		return ioFailure(`Unable to read ${targetPath}.`, toAbsolutePath(targetPath), "readFile", error)
	}
}

/**
 * Open a file for streamed reading. Open errors surface here rather than on
 * the first read.
 */
export async function openReadStream(targetPath: string): Promise<IoResult<ReadStream>> {
	try {
		const handle = await open(targetPath, "r")
		return { ok: true, value: handle.createReadStream() }
	} catch (error) {
		return ioFailure(`Unable to read ${targetPath}.`, toAbsolutePath(targetPath), "open", error)
	}
}

export async function openWriteStream(targetPath: string): Promise<IoResult<WriteStream>> {
	try {
		const handle = await open(targetPath, "w")
		return { ok: true, value: handle.createWriteStream() }
	} catch (error) {
		return ioFailure(`Unable to write ${targetPath}.`, toAbsolutePath(targetPath), "open", error)
	}
}

export async function writeTextFile(
	targetPath: string,
	contents: string,
): Promise<IoResult<void>> {
	try {
		await writeFile(targetPath, contents, "utf8")
		return { ok: true, value: undefined }
	} catch (error) {
		return ioFailure(`Unable to write ${targetPath}.`, toAbsolutePath(targetPath), "writeFile", error)
	}
}

export async function writeBytes(
	targetPath: string,
	contents: Uint8Array,
): Promise<IoResult<void>> {
	try {
		await writeFile(targetPath, contents)
		return { ok: true, value: undefined }
	} catch (error) {
		return ioFailure(`Unable to write ${targetPath}.`, toAbsolutePath(targetPath), "writeFile", error)
	}
}

export async function removePath(targetPath: string): Promise<IoResult<void>> {
	try {
		await rm(targetPath, { force: true, recursive: true })
		return { ok: true, value: undefined }
	} catch (error) {
		return ioFailure(`Unable to remove ${targetPath}.`, toAbsolutePath(targetPath), "rm", error)
	}
}

export async function copyDirectory(
	sourcePath: string,
	targetPath: string,
): Promise<IoResult<void>> {
	try {
		await cp(sourcePath, targetPath, { errorOnExist: true, force: false, recursive: true })
		return { ok: true, value: undefined }
	} catch (error) {
		return ioFailure(
			`Unable to copy ${sourcePath} to ${targetPath}.`,
			toAbsolutePath(targetPath),
			"cp",
			error,
		)
	}
}

/**
 * Rename a directory in place. Across filesystems the tree is copied, the copy
 * is checked, and only then is the source removed.
 */
export async function movePath(sourcePath: string, targetPath: string): Promise<IoResult<void>> {
	try {
		await rename(sourcePath, targetPath)
		return { ok: true, value: undefined }
	} catch (error) {
		if (!hasErrorCode(error, "EXDEV")) {
			return ioFailure(
				`Unable to move ${sourcePath} to ${targetPath}.`,
				toAbsolutePath(targetPath),
				"rename",
				error,
			)
		}
	}

	const existing = await safeStat(targetPath)
	if (!existing.ok) {
		return existing
	}
	if (existing.value) {
		return ioFailure(`Refusing to overwrite ${targetPath}.`, toAbsolutePath(targetPath), "cp")
	}

	const copied = await copyDirectory(sourcePath, targetPath)
	if (!copied.ok) {
		const partial = await removePath(targetPath)
		return partial.ok ? copied : { error: { ...partial.error, cause: copied.error }, ok: false }
	}

	const verified = await safeStat(targetPath)
	if (!verified.ok) {
		return verified
	}
	if (!verified.value) {
		return ioFailure(
			`Copy of ${sourcePath} is missing at ${targetPath}.`,
			toAbsolutePath(targetPath),
			"cp",
		)
	}

	return removePath(sourcePath)
}

export function toAbsolutePath(value: string): AbsolutePath {
	const resolved = path.isAbsolute(value) ? path.normalize(value) : path.resolve(value)
	return resolved as AbsolutePath
}

function hasErrorCode(error: unknown, code: string): boolean {
	return (
		typeof error === "object" &&
		error !== null &&
		"code" in error &&
		(error as { code?: string }).code === code
	)
}
