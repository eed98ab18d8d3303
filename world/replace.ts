import { unpackArchive } from "@/archive/unpack"
import type { ServerLayout } from "@/config/layout"
import { ensureDir, movePath, removePath, safeStat } from "@/io/fs"
import type { IoResult } from "@/io/types"
import type { AbsolutePath } from "@/types/branded"
import { joinAbsolute } from "@/types/coerce"
import type { ArchiveError, IoError, NotFoundError, Result } from "@/types/error"

// idle -> staged -> committed, idle -> failed, and idle -> committed in skip mode.

export interface StagedWorld {
	readonly state: "staged"
	readonly archive: AbsolutePath
	readonly stagedDir: AbsolutePath
}

export interface CommittedWorld {
	readonly state: "committed"
	readonly activeWorld: AbsolutePath
	/** Where the replaced world now lives, or null when nothing was replaced. */
	readonly previousWorld: AbsolutePath | null
	readonly source: "archive" | "existing"
}

export type StageResult = Result<StagedWorld, ArchiveError>

export type CommitResult = Result<CommittedWorld, IoError>

/**
 * Unpack a world archive into `scratchDir`. The active world is not touched.
 */
export async function stageWorld(
	archivePath: AbsolutePath,
	scratchDir: AbsolutePath,
): Promise<StageResult> {
	const stagedDir = joinAbsolute(scratchDir, "world")
	const cleared = await removePath(stagedDir)
	if (!cleared.ok) {
		return {
			error: {
				archive: archivePath,
				cause: cleared.error,
				message: `Unable to prepare staging directory for ${archivePath}.`,
				type: "archive",
			},
			ok: false,
		}
	}

	const unpacked = await unpackArchive(archivePath, stagedDir)
	if (!unpacked.ok) {
		return unpacked
	}

	return { ok: true, value: { archive: archivePath, stagedDir, state: "staged" } }
}

/**
 * Move the active world into the backup slot, replacing any previous backup.
 * The old backup is only removed while the active world still exists, and the
 * active world leaves its location by a single rename.
 */
export async function backupActiveWorld(
	layout: ServerLayout,
): Promise<IoResult<AbsolutePath | null>> {
	const active = await safeStat(layout.activeWorld)
	if (!active.ok) {
		return active
	}
	if (!active.value) {
		return { ok: true, value: null }
	}

	const cleared = await removePath(layout.previousWorld)
	if (!cleared.ok) {
		return cleared
	}

	const moved = await movePath(layout.activeWorld, layout.previousWorld)
	if (!moved.ok) {
		return moved
	}

	return { ok: true, value: layout.previousWorld }
}

/**
 * Bring the staged world into the incoming slot beside the active world. This
 * may copy across filesystems; the active world is not touched.
 */
export async function receiveStagedWorld(
	staged: StagedWorld,
	layout: ServerLayout,
): Promise<IoResult<void>> {
	const cleared = await removePath(layout.incomingWorld)
	if (!cleared.ok) {
		return cleared
	}

	return movePath(staged.stagedDir, layout.incomingWorld)
}

export async function promoteStagedWorld(layout: ServerLayout): Promise<IoResult<void>> {
	return movePath(layout.incomingWorld, layout.activeWorld)
}

/**
 * Replace the active world with a staged one. The staged tree is first moved
 * into the incoming slot, so the swap itself is two renames within the worlds
 * directory. When promotion fails the backup is moved back so the active
 * location is never left empty by this call.
 */
export async function commitWorld(
	staged: StagedWorld,
	layout: ServerLayout,
): Promise<CommitResult> {
	const worldsReady = await ensureDir(layout.worldsDir)
	if (!worldsReady.ok) {
		return worldsReady
	}

	const received = await receiveStagedWorld(staged, layout)
	if (!received.ok) {
		return received
	}

	const backedUp = await backupActiveWorld(layout)
	if (!backedUp.ok) {
		return backedUp
	}

	const promoted = await promoteStagedWorld(layout)
	if (!promoted.ok) {
		if (backedUp.value) {
			const restored = await movePath(backedUp.value, layout.activeWorld)
			if (!restored.ok) {
				return {
					error: {
						...restored.error,
						cause: promoted.error,
						message: `Unable to promote the new world or restore ${backedUp.value}; the previous world remains there.`,
					},
					ok: false,
				}
			}
		}
		return promoted
	}

	return {
		ok: true,
		value: {
			activeWorld: layout.activeWorld,
			previousWorld: backedUp.value,
			source: "archive",
			state: "committed",
		},
	}
}

/**
 * Skip mode: keep whatever world is active. Fails when there is none.
 */
export async function keepActiveWorld(
	layout: ServerLayout,
): Promise<Result<CommittedWorld, IoError | NotFoundError>> {
	const active = await safeStat(layout.activeWorld)
	if (!active.ok) {
		return active
	}
	if (!active.value?.isDirectory()) {
		return {
			error: {
				message: `No world selected and no existing world at ${layout.activeWorld}.`,
				path: layout.activeWorld,
				target: "world",
				type: "not_found",
			},
			ok: false,
		}
	}

	return {
		ok: true,
		value: {
			activeWorld: layout.activeWorld,
			previousWorld: null,
			source: "existing",
			state: "committed",
		},
	}
}

export type RecoveryOutcome = "restored" | "active-present"

/**
 * Bring the backup slot back into the active location after an interrupted
 * replace. An existing active world is left alone. A leftover incoming slot
 * may be a partial copy and is always discarded.
 */
export async function recoverWorld(
	layout: ServerLayout,
): Promise<Result<RecoveryOutcome, IoError | NotFoundError>> {
	const discarded = await removePath(layout.incomingWorld)
	if (!discarded.ok) {
		return discarded
	}

	const active = await safeStat(layout.activeWorld)
	if (!active.ok) {
		return active
	}
	if (active.value) {
		return { ok: true, value: "active-present" }
	}

	const previous = await safeStat(layout.previousWorld)
	if (!previous.ok) {
		return previous
	}
	if (!previous.value) {
		return {
			error: {
				message: `No backup world at ${layout.previousWorld}.`,
				path: layout.previousWorld,
				target: "backup",
				type: "not_found",
			},
			ok: false,
		}
	}

	const moved = await movePath(layout.previousWorld, layout.activeWorld)
	if (!moved.ok) {
		return moved
	}

	return { ok: true, value: "restored" }
}
