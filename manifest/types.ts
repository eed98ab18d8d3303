import type { PackId } from "@/types/branded"
import type { ManifestError, ParseError, Result } from "@/types/error"

export type PackVersion = readonly [number, number, number]

export interface PackManifest {
	id: PackId
	version: PackVersion
	name?: string
	moduleTypes: string[]
}

export type ManifestParseError = ManifestError | ParseError

export type ManifestParseResult = Result<PackManifest, ManifestParseError>

export function formatVersion(version: PackVersion): string {
	return version.join(".")
}

export function sameVersion(a: PackVersion, b: PackVersion): boolean {
	return a[0] === b[0] && a[1] === b[1] && a[2] === b[2]
}
