import { z } from "zod"
import { WORLD_BEHAVIOR_PACKS_FILENAME, WORLD_RESOURCE_PACKS_FILENAME } from "@/constants"
import { readTextFile, safeStat, writeTextFile } from "@/io/fs"
import type { IoResult } from "@/io/types"
import type { PackVersion } from "@/manifest/types"
import { PackIdSchema, PackVersionSchema } from "@/manifest/schema"
import { PACK_ROLES, type PackInventory, type PackRole, type WorldRequirement } from "@/packs/types"
import type { AbsolutePath, PackId } from "@/types/branded"
import { joinAbsolute } from "@/types/coerce"
import type { ParseError, Result, ValidationError } from "@/types/error"

/** One entry of world_behavior_packs.json / world_resource_packs.json. */
export interface PackReference {
	pack_id: PackId
	version: PackVersion
}

const PackReferenceListSchema = z.array(z.unknown())

const PackReferenceEntrySchema = z
	.object({
		pack_id: PackIdSchema,
		version: z.unknown(),
	})
	.passthrough()

/** Stands in for an entry's version when the list omits it. */
const UNKNOWN_VERSION: PackVersion = [0, 0, 0]

export interface ParsedPackReferences {
	references: PackReference[]
	/** One message per entry that was dropped or read with a fallback version. */
	problems: string[]
}

type PackReferenceError = ParseError | ValidationError

export const PACK_REFERENCE_FILES: Readonly<Record<PackRole, string>> = {
	behavior: WORLD_BEHAVIOR_PACKS_FILENAME,
	resource: WORLD_RESOURCE_PACKS_FILENAME,
}

export function serializePackReferences(references: readonly PackReference[]): string {
	const output = references.map((reference) => ({
		pack_id: reference.pack_id,
		version: [...reference.version],
	}))
	return `${JSON.stringify(output, null, 2)}\n`
}

export function parsePackReferences(
	contents: string,
	sourcePath?: AbsolutePath,
): Result<ParsedPackReferences, PackReferenceError> {
	let parsed: unknown
	try {
		parsed = JSON.parse(contents)
	} catch (error) {
		return {
			error: {
				message: "Invalid JSON in pack reference list.",
				path: sourcePath,
				rawError: error instanceof Error ? error : undefined,
				source: "world_packs",
				type: "parse",
			},
			ok: false,
		}
	}

	const result = PackReferenceListSchema.safeParse(parsed)
	if (!result.success) {
		return {
			error: {
				field: "packs",
				message: "Pack reference list must be a JSON array.",
				path: sourcePath,
				source: "zod",
				type: "validation",
				zodError: result.error,
			},
			ok: false,
		}
	}

	const references: PackReference[] = []
	const problems: string[] = []
	result.data.forEach((raw, index) => {
		const entry = PackReferenceEntrySchema.safeParse(raw)
		if (!entry.success) {
			problems.push(`Entry ${index} has no pack_id; ignoring it.`)
			return
		}

		const { pack_id, version } = entry.data
		if (version === undefined) {
			references.push({ pack_id, version: UNKNOWN_VERSION })
			return
		}

		const parsedVersion = PackVersionSchema.safeParse(version)
		if (!parsedVersion.success) {
			problems.push(`Entry ${index} (${pack_id}) has an invalid version; reading it as 0.0.0.`)
			references.push({ pack_id, version: UNKNOWN_VERSION })
			return
		}
		references.push({ pack_id, version: parsedVersion.data })
	})

	return { ok: true, value: { problems, references } }
}

/**
 * Build the reference lists for every available pack, split by the role the
 * inventory assigned. Inventory order is preserved.
 */
export function buildPackReferences(
	inventory: PackInventory,
): Record<PackRole, PackReference[]> {
	const references: Record<PackRole, PackReference[]> = { behavior: [], resource: [] }
	for (const record of inventory.values()) {
		references[record.role].push({
			pack_id: record.identity.id,
			version: record.identity.version,
		})
	}
	return references
}

export async function writeWorldPackReferences(
	worldDir: AbsolutePath,
	inventory: PackInventory,
): Promise<IoResult<Record<PackRole, number>>> {
	const references = buildPackReferences(inventory)
	const counts: Record<PackRole, number> = { behavior: 0, resource: 0 }

	for (const role of PACK_ROLES) {
		const target = joinAbsolute(worldDir, PACK_REFERENCE_FILES[role])
		const written = await writeTextFile(target, serializePackReferences(references[role]))
		if (!written.ok) {
			return written
		}
		counts[role] = references[role].length
	}

	return { ok: true, value: counts }
}

export interface WorldRequirements {
	requirements: WorldRequirement[]
	warnings: string[]
}

/**
 * Read the packs a world declares. Absent lists contribute nothing; lists that
 * cannot be parsed contribute a warning instead of failing the read. Entries
 * are read one by one, so a malformed entry only drops itself.
 */
export async function readWorldRequirements(
	worldDir: AbsolutePath,
): Promise<IoResult<WorldRequirements>> {
	const requirements: WorldRequirement[] = []
	const warnings: string[] = []

	for (const role of PACK_ROLES) {
		const listPath = joinAbsolute(worldDir, PACK_REFERENCE_FILES[role])
		const stats = await safeStat(listPath)
		if (!stats.ok) {
			return stats
		}
		if (!stats.value || !stats.value.isFile()) {
			continue
		}

		const contents = await readTextFile(listPath)
		if (!contents.ok) {
			return contents
		}

		const parsed = parsePackReferences(contents.value, listPath)
		if (!parsed.ok) {
			warnings.push(`Could not read ${PACK_REFERENCE_FILES[role]}: ${parsed.error.message}`)
			continue
		}

		for (const problem of parsed.value.problems) {
			warnings.push(`${PACK_REFERENCE_FILES[role]}: ${problem}`)
		}
		for (const reference of parsed.value.references) {
			requirements.push({ id: reference.pack_id, role, version: reference.version })
		}
	}

	return { ok: true, value: { requirements, warnings } }
}
