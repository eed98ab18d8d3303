import type { WriteStream } from "node:fs"
import { once } from "node:events"
import path from "node:path"
import { finished } from "node:stream/promises"
import { Zip, ZipDeflate } from "fflate"
import { openReadStream, openWriteStream, readDirEntries } from "@/io/fs"
import type { IoResult } from "@/io/types"
import { ioFailure } from "@/io/types"
import type { AbsolutePath } from "@/types/branded"
import { joinAbsolute } from "@/types/coerce"

export interface PackedArchive {
	files: number
	sourceBytes: number
	archiveBytes: number
}

/**
 * Deflate every file under `sourceDir` into a zip at `outputPath`, with entry
 * names relative to `sourceDir`. Empty directories are not recorded.
 *
 * Files are streamed through the archive one chunk at a time, so memory use
 * does not grow with the size of the world.
 */
export async function packDirectory(
	sourceDir: AbsolutePath,
	outputPath: AbsolutePath,
	onFile?: (relativePath: string, count: number) => void,
): Promise<IoResult<PackedArchive>> {
	const opened = await openWriteStream(outputPath)
	if (!opened.ok) {
		return opened
	}
	const writer = opened.value

	let writeError: Error | undefined
	writer.on("error", (error) => {
		writeError = error
	})

	let zipError: Error | undefined
	let archiveBytes = 0
	const zip = new Zip((error, chunk) => {
		if (error) {
			zipError = error
			return
		}
		archiveBytes += chunk.byteLength
		writer.write(chunk)
	})

	let files = 0
	let sourceBytes = 0
	const added = await collectFiles(sourceDir, async (filePath) => {
		const input = await openReadStream(filePath)
		if (!input.ok) {
			return input
		}

		const relative = path.relative(sourceDir, filePath).split(path.sep).join("/")
		const entry = new ZipDeflate(relative, { level: 6 })
		zip.add(entry)

		try {
			for await (const chunk of input.value) {
				const bytes: Uint8Array = chunk
				sourceBytes += bytes.byteLength
				entry.push(bytes)
				await drained(writer)
			}
		} catch (error) {
			return writeError
				? ioFailure(`Unable to write ${outputPath}.`, outputPath, "write", writeError)
				: ioFailure(`Unable to read ${filePath}.`, filePath, "read", error)
		}
		entry.push(new Uint8Array(0), true)

		files += 1
		onFile?.(relative, files)
		return { ok: true, value: undefined }
	})
	if (!added.ok) {
		return abandon(writer, added)
	}

	zip.end()
	if (zipError) {
		return abandon(
			writer,
			ioFailure(`Unable to compress into ${outputPath}.`, outputPath, "zip", zipError),
		)
	}

	writer.end()
	try {
		await finished(writer)
	} catch (error) {
		return ioFailure(`Unable to write ${outputPath}.`, outputPath, "write", error)
	}

	return { ok: true, value: { archiveBytes, files, sourceBytes } }
}

async function drained(writer: WriteStream): Promise<void> {
	if (writer.writableNeedDrain) {
		await once(writer, "drain")
	}
}

/** Close the output without finishing the archive; the caller removes it. */
async function abandon(writer: WriteStream, failure: IoResult<never>): Promise<IoResult<never>> {
	if (!writer.closed) {
		const closed = once(writer, "close")
		writer.destroy()
		await closed
	}
	return failure
}

async function collectFiles(
	dir: AbsolutePath,
	visit: (filePath: AbsolutePath) => Promise<IoResult<void>>,
): Promise<IoResult<void>> {
	const entries = await readDirEntries(dir)
	if (!entries.ok) {
		return entries
	}

	for (const entry of entries.value) {
		const entryPath = joinAbsolute(dir, entry.name)
		if (entry.isDirectory()) {
			const nested = await collectFiles(entryPath, visit)
			if (!nested.ok) {
				return nested
			}
		} else if (entry.isFile()) {
			const visited = await visit(entryPath)
			if (!visited.ok) {
				return visited
			}
		}
	}

	return { ok: true, value: undefined }
}
