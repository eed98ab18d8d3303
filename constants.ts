/**
 * Filenames and directory names the Bedrock dedicated server expects.
 */

/** Pack and world manifest document */
export const MANIFEST_FILENAME = "manifest.json"

/** Archive extensions recognised as packs in the mods directory */
export const PACK_ARCHIVE_EXTENSIONS: ReadonlySet<string> = new Set([".mcaddon", ".mcpack"])

/** World archive extension, used for both imports and backups */
export const WORLD_ARCHIVE_EXTENSION = ".mcworld"

/** Pack-reference documents at the root of a world */
export const WORLD_BEHAVIOR_PACKS_FILENAME = "world_behavior_packs.json"
export const WORLD_RESOURCE_PACKS_FILENAME = "world_resource_packs.json"

/** Display name of a world, one line of text */
export const LEVELNAME_FILENAME = "levelname.txt"

export const DEFAULT_WORLD_NAME = "Bedrock level"
export const BACKUP_SLOT_SUFFIX = ".backup"
export const INCOMING_SLOT_SUFFIX = ".incoming"
export const DEFAULT_LEVEL_NAME = "World"

/**
 * Deployed pack directories that ship with the server and survive a reinstall.
 */
export const PROTECTED_PACK_DIRS: ReadonlySet<string> = new Set([
	"chemistry",
	"definitions",
	"experimental",
])

export const PROTECTED_PACK_PREFIX = "vanilla"
