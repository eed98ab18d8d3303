import path from "node:path"
import { Unzip, UnzipInflate } from "fflate"
import { MANIFEST_FILENAME } from "@/constants"
import { ensureDir, openReadStream, readDirEntries, writeBytes } from "@/io/fs"
import type { IoResult } from "@/io/types"
import type { AbsolutePath } from "@/types/branded"
import { joinAbsolute } from "@/types/coerce"
import type { ArchiveError, Result } from "@/types/error"

export type UnpackResult = Result<AbsolutePath, ArchiveError>

/** Local file header and end-of-central-directory signatures. */
const ZIP_SIGNATURES: ReadonlyArray<readonly number[]> = [
	[0x50, 0x4b, 0x03, 0x04],
	[0x50, 0x4b, 0x05, 0x06],
]

interface InflatedEntry {
	name: string
	chunks: Uint8Array[]
}

/**
 * Expand a zip-family archive (.mcpack, .mcaddon, .mcworld) under `destination`,
 * creating it when absent.
 *
 * The archive is read as a stream and each entry is written once it has been
 * inflated, so only one entry is held in memory at a time.
 */
export async function unpackArchive(
	archivePath: AbsolutePath,
	destination: AbsolutePath,
): Promise<UnpackResult> {
	const input = await openReadStream(archivePath)
	if (!input.ok) {
		return archiveFailure(archivePath, `Unable to read archive ${archivePath}.`, {
			cause: input.error,
		})
	}

	const root = await ensureDir(destination)
	if (!root.ok) {
		input.value.destroy()
		return archiveFailure(archivePath, `Unable to prepare ${destination}.`, {
			cause: root.error,
		})
	}

	const ready: InflatedEntry[] = []
	let inflating = 0
	let entries = 0
	let corruption: Error | undefined
	let escaped: string | undefined

	const unzip = new Unzip((file) => {
		entries += 1
		const target = entryTarget(destination, file.name)
		if (target === null) {
			if (escaped === undefined) {
				escaped = file.name
			}
			return
		}

		const entry: InflatedEntry = { chunks: [], name: file.name }
		if (file.name.endsWith("/")) {
			ready.push(entry)
			return
		}

		inflating += 1
		file.ondata = (error, data, final) => {
			if (error) {
				corruption = corruption ?? error
				return
			}
			entry.chunks.push(data)
			if (final) {
				inflating -= 1
				ready.push(entry)
			}
		}
		file.start()
	})
	unzip.register(UnzipInflate)

	const flush = async (): Promise<UnpackResult | null> => {
		if (escaped !== undefined) {
			return archiveFailure(
				archivePath,
				`Archive entry "${escaped}" escapes the extraction directory.`,
			)
		}
		if (corruption) {
			return archiveFailure(archivePath, `Corrupt archive ${archivePath}.`, {
				rawError: corruption,
			})
		}

		for (const entry of ready.splice(0)) {
			const written = await writeEntry(destination, entry)
			if (!written.ok) {
				return archiveFailure(archivePath, `Unable to extract "${entry.name}".`, {
					cause: written.error,
				})
			}
		}
		return null
	}

	let leading: number[] = []
	try {
		for await (const chunk of input.value) {
			const bytes: Uint8Array = chunk
			if (leading.length < 4) {
				leading = [...leading, ...bytes.subarray(0, 4 - leading.length)]
			}
			unzip.push(bytes)

			const failed = await flush()
			if (failed) {
				return failed
			}
		}
		unzip.push(new Uint8Array(0), true)
	} catch (error) {
		return archiveFailure(archivePath, `Corrupt archive ${archivePath}.`, {
			rawError: error instanceof Error ? error : undefined,
		})
	}

	const failed = await flush()
	if (failed) {
		return failed
	}

	const recognised = ZIP_SIGNATURES.some((signature) =>
		signature.every((byte, index) => leading[index] === byte),
	)
	if (!recognised || (entries === 0 && leading[2] !== 0x05) || inflating > 0) {
		return archiveFailure(archivePath, `Corrupt archive ${archivePath}.`)
	}

	return { ok: true, value: destination }
}

async function writeEntry(destination: AbsolutePath, entry: InflatedEntry): Promise<IoResult<void>> {
	const target = entryTarget(destination, entry.name)
	if (target === null || target === destination) {
		return { ok: true, value: undefined }
	}

	if (entry.name.endsWith("/")) {
		return ensureDir(target)
	}

	const parent = await ensureDir(path.dirname(target))
	if (!parent.ok) {
		return parent
	}

	const size = entry.chunks.reduce((total, chunk) => total + chunk.byteLength, 0)
	const contents = new Uint8Array(size)
	let offset = 0
	for (const chunk of entry.chunks) {
		contents.set(chunk, offset)
		offset += chunk.byteLength
	}
	return writeBytes(target, contents)
}

/**
 * Where an entry lands under `destination`, or null when it would escape it.
 * Entries naming the destination itself (such as `./`) resolve to it.
 */
function entryTarget(destination: AbsolutePath, name: string): string | null {
	const target = path.resolve(destination, name.replace(/\\/g, "/"))
	const relative = path.relative(destination, target)
	if (relative === ".." || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
		return null
	}
	return target
}

/**
 * Lazily walk `root` for manifest documents at any depth. Packs may sit flat at
 * the archive root or nested one or more directories down.
 */
export async function* findManifests(
	root: AbsolutePath,
): AsyncGenerator<IoResult<AbsolutePath>> {
	const entries = await readDirEntries(root)
	if (!entries.ok) {
		yield entries
		return
	}

	for (const entry of entries.value) {
		const entryPath = joinAbsolute(root, entry.name)
		if (entry.isDirectory()) {
			yield* findManifests(entryPath)
		} else if (entry.isFile() && entry.name === MANIFEST_FILENAME) {
			yield { ok: true, value: entryPath }
		}
	}
}

function archiveFailure(
	archive: AbsolutePath,
	message: string,
	extra: { cause?: ArchiveError["cause"]; rawError?: Error } = {},
): UnpackResult {
	return {
		error: {
			...extra,
			archive,
			message,
			type: "archive",
		},
		ok: false,
	}
}
