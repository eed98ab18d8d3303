import { BACKUP_SLOT_SUFFIX, DEFAULT_WORLD_NAME, INCOMING_SLOT_SUFFIX } from "@/constants"
import type { AbsolutePath } from "@/types/branded"
import { coerceAbsolutePathDirect, joinAbsolute } from "@/types/coerce"
import type { Result, ValidationError } from "@/types/error"

/**
 * Every filesystem location the tooling touches, resolved once and passed to
 * each operation.
 */
export interface ServerLayout {
	serverRoot: AbsolutePath
	/** World archives offered for import */
	worldArchivesDir: AbsolutePath
	/** Dated .mcworld backups of the active world */
	backupsDir: AbsolutePath
	/** Flat directory of .mcaddon / .mcpack archives */
	modsDir: AbsolutePath
	worldsDir: AbsolutePath
	activeWorld: AbsolutePath
	/** Single backup slot, sibling of the active world */
	previousWorld: AbsolutePath
	/** Staged world copied beside the active one, so the swap is a rename */
	incomingWorld: AbsolutePath
	behaviorPacksDir: AbsolutePath
	resourcePacksDir: AbsolutePath
}

export interface LayoutOptions {
	serverRoot: string
	worldName?: string
}

export function resolveServerLayout(
	options: LayoutOptions,
): Result<ServerLayout, ValidationError> {
	const serverRoot = coerceAbsolutePathDirect(options.serverRoot)
	if (!serverRoot) {
		return {
			error: {
				field: "serverRoot",
				message: "Server root cannot be empty.",
				source: "manual",
				type: "validation",
			},
			ok: false,
		}
	}

	const worldName = options.worldName?.trim() || DEFAULT_WORLD_NAME
	if (worldName.includes("/") || worldName.includes("\\") || worldName === "." || worldName === "..") {
		return {
			error: {
				field: "worldName",
				message: `World name "${worldName}" must be a single directory name.`,
				source: "manual",
				type: "validation",
			},
			ok: false,
		}
	}

	const mcpeDir = joinAbsolute(serverRoot, "mcpe")
	const worldsDir = joinAbsolute(mcpeDir, "worlds")

	return {
		ok: true,
		value: {
			activeWorld: joinAbsolute(worldsDir, worldName),
			backupsDir: joinAbsolute(serverRoot, "backups"),
			behaviorPacksDir: joinAbsolute(mcpeDir, "behavior_packs"),
			incomingWorld: joinAbsolute(worldsDir, `${worldName}${INCOMING_SLOT_SUFFIX}`),
			modsDir: joinAbsolute(serverRoot, "mods"),
			previousWorld: joinAbsolute(worldsDir, `${worldName}${BACKUP_SLOT_SUFFIX}`),
			resourcePacksDir: joinAbsolute(mcpeDir, "resource_packs"),
			serverRoot,
			worldArchivesDir: joinAbsolute(serverRoot, "world_backups"),
			worldsDir,
		},
	}
}
