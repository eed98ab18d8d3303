import { readTextFile } from "@/io/fs"
import { PackManifestSchema } from "@/manifest/schema"
import type { ManifestParseResult } from "@/manifest/types"
import type { AbsolutePath } from "@/types/branded"
import type { ValidationError } from "@/types/error"

/**
 * Parse a pack manifest document.
 *
 * A document without a usable `header.uuid` is reported as `missing_identity`.
 * Archives often carry unrelated JSON named `manifest.json`, so callers skip
 * these instead of aborting.
 */
export function parsePackManifest(
	contents: string,
	manifestPath: AbsolutePath,
): ManifestParseResult {
	let parsed: unknown
	try {
		parsed = JSON.parse(contents)
	} catch (error) {
		return {
			error: {
				message: `Invalid JSON in ${manifestPath}.`,
				path: manifestPath,
				rawError: error instanceof Error ? error : undefined,
				source: "manifest.json",
				type: "parse",
			},
			ok: false,
		}
	}

	if (!hasIdentity(parsed)) {
		return {
			error: {
				message: `No header.uuid in ${manifestPath}.`,
				path: manifestPath,
				reason: "missing_identity",
				type: "manifest",
			},
			ok: false,
		}
	}

	const result = PackManifestSchema.safeParse(parsed)
	if (!result.success) {
		const cause: ValidationError = {
			field: "manifest",
			message: "Manifest validation failed.",
			path: manifestPath,
			source: "zod",
			type: "validation",
			zodError: result.error,
		}
		return {
			error: {
				cause,
				message: `Invalid manifest fields in ${manifestPath}.`,
				path: manifestPath,
				reason: "invalid_fields",
				type: "manifest",
			},
			ok: false,
		}
	}

	const { header, modules } = result.data
	const moduleTypes: string[] = []
	for (const module of modules) {
		if (module.type) {
			moduleTypes.push(module.type)
		}
	}

	return {
		ok: true,
		value: {
			id: header.uuid,
			moduleTypes,
			name: header.name,
			version: header.version,
		},
	}
}

export async function readPackManifest(manifestPath: AbsolutePath): Promise<ManifestParseResult> {
	const contents = await readTextFile(manifestPath)
	if (!contents.ok) {
		return {
			error: {
				cause: contents.error,
				message: `Unable to read ${manifestPath}.`,
				path: manifestPath,
				source: "manifest.json",
				type: "parse",
			},
			ok: false,
		}
	}

	return parsePackManifest(contents.value, manifestPath)
}

function hasIdentity(value: unknown): boolean {
	if (typeof value !== "object" || value === null || !("header" in value)) {
		return false
	}

	const header = value.header
	if (typeof header !== "object" || header === null || !("uuid" in header)) {
		return false
	}

	return typeof header.uuid === "string" && header.uuid.trim().length > 0
}
