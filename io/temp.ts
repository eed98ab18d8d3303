import { mkdtemp } from "node:fs/promises"
import { tmpdir } from "node:os"
import path from "node:path"
import type { AbsolutePath } from "@/types/branded"
import { removePath, toAbsolutePath } from "@/io/fs"
import type { IoResult } from "@/io/types"
import { ioFailure } from "@/io/types"

export async function createTempDir(
	prefix: string,
	parent: string = tmpdir(),
): Promise<IoResult<AbsolutePath>> {
	const safePrefix = prefix.endsWith("-") ? prefix : `${prefix}-`
	const base = path.join(parent, safePrefix)

	try {
		const dir = await mkdtemp(base)
		return { ok: true, value: toAbsolutePath(dir) }
	} catch (error) {
		return ioFailure(
			`Unable to create a temporary directory under ${parent}.`,
			toAbsolutePath(base),
			"mkdtemp",
			error,
		)
	}
}

export async function cleanupTempDir(targetPath: string): Promise<IoResult<void>> {
	return removePath(targetPath)
}

/**
 * Run `fn` with a fresh scratch directory that is removed on every exit path,
 * including a throw from `fn`.
 */
export async function withScratchDir<T>(
	prefix: string,
	fn: (dir: AbsolutePath) => Promise<T>,
	parent?: string,
): Promise<IoResult<T>> {
	const created = await createTempDir(prefix, parent)
	if (!created.ok) {
		return created
	}

	let value: T
	try {
		value = await fn(created.value)
	} catch (error) {
		// The original failure wins over a cleanup failure.
		await cleanupTempDir(created.value)
		throw error
	}

	const cleaned = await cleanupTempDir(created.value)
	if (!cleaned.ok) {
		return cleaned
	}

	return { ok: true, value }
}
