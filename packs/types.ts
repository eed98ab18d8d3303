import type { PackVersion } from "@/manifest/types"
import type { AbsolutePath, PackId } from "@/types/branded"
import type { ArchiveError, ManifestError, ParseError } from "@/types/error"

export type PackRole = "behavior" | "resource"

export const PACK_ROLES: ReadonlyArray<PackRole> = ["behavior", "resource"] as const

export interface PackIdentity {
	readonly id: PackId
	readonly version: PackVersion
}

export interface PackRecord {
	readonly identity: PackIdentity
	readonly role: PackRole
	readonly sourceArchive: string
	readonly displayName: string
	/** Unpacked directory holding the manifest; valid while its scratch scope lives. */
	readonly packDir: AbsolutePath
}

export type PackInventory = ReadonlyMap<PackId, PackRecord>

export type SkippedEntry =
	| { kind: "archive"; archive: string; error: ArchiveError }
	| { kind: "manifest"; archive: string; error: ManifestError | ParseError }
	| { kind: "duplicate"; archive: string; id: PackId; keptFrom: string }

export interface InventoryScan {
	inventory: PackInventory
	archives: string[]
	skipped: SkippedEntry[]
}

export interface WorldRequirement {
	readonly id: PackId
	readonly version: PackVersion
	readonly role: PackRole
}

export interface MatchedRequirement {
	requirement: WorldRequirement
	record: PackRecord
}

export interface ReconciliationResult {
	matched: MatchedRequirement[]
	missing: WorldRequirement[]
	/** Matched by id, but the available version differs. */
	versionDrift: MatchedRequirement[]
	/** Matched by id, but declared in the other role's list. */
	roleMismatches: MatchedRequirement[]
}
