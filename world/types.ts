import type { InstallSummary } from "@/packs/install"
import type { InventoryScan, PackRole, ReconciliationResult } from "@/packs/types"
import type { AbsolutePath } from "@/types/branded"
import type { Result, WorldError } from "@/types/error"
import type { CommittedWorld } from "@/world/replace"

export type SetupStage =
	| "scratch"
	| "inventory"
	| "select"
	| "stage"
	| "requirements"
	| "replace"
	| "references"
	| "install"

export type SetupError = WorldError & { stage: SetupStage }

export type SetupResult<T> = Result<T, SetupError>

export interface SetupSummary {
	world: CommittedWorld
	archive: AbsolutePath | null
	scan: InventoryScan
	reconciliation: ReconciliationResult | null
	references: Record<PackRole, number>
	install: InstallSummary
	warnings: string[]
}

export type SetupOutcome =
	| { status: "completed"; summary: SetupSummary }
	| { status: "cancelled"; reason: string }

export type SetupEvent =
	| { type: "stage"; stage: SetupStage }
	| { type: "inventory"; scan: InventoryScan }
	| { type: "reconciled"; result: ReconciliationResult; warnings: string[] }

export interface SetupOptions {
	/** Import this archive instead of asking. */
	worldArchive?: AbsolutePath
	/** Keep the active world instead of asking. */
	keepExisting?: boolean
	/** Parent directory for the scratch tree; defaults to the OS temp dir. */
	scratchParent?: string
	report?: (event: SetupEvent) => void
}
