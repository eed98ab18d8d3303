import { formatMegabytes, listBackups } from "@/backup/create"
import type { ServerLayout } from "@/config/layout"
import { withScratchDir } from "@/io/temp"
import { formatVersion } from "@/manifest/types"
import { installPacks } from "@/packs/install"
import { buildInventory } from "@/packs/inventory"
import { isFullyMatched, reconcile } from "@/packs/reconcile"
import type { ReconciliationResult } from "@/packs/types"
import type { AbsolutePath } from "@/types/branded"
import { joinAbsolute } from "@/types/coerce"
import { failSetup } from "@/world/errors"
import { readWorldRequirements, writeWorldPackReferences } from "@/world/pack-references"
import type { Prompter } from "@/world/prompter"
import type { CommittedWorld } from "@/world/replace"
import { commitWorld, keepActiveWorld, stageWorld } from "@/world/replace"
import type { SetupOptions, SetupOutcome, SetupResult, SetupStage } from "@/world/types"

type Selection = { kind: "archive"; archive: AbsolutePath } | { kind: "existing" }

/**
 * Import (or keep) the world and deploy every available pack. All unpacking
 * happens in one scratch directory that is removed before this resolves.
 */
export async function runWorldSetup(
	layout: ServerLayout,
	prompter: Prompter,
	options: SetupOptions = {},
): Promise<SetupResult<SetupOutcome>> {
	const scoped = await withScratchDir(
		"bw-setup",
		(scratchDir) => setupInScratch(layout, prompter, options, scratchDir),
		options.scratchParent,
	)
	if (!scoped.ok) {
		return failSetup("scratch", scoped.error)
	}

	return scoped.value
}

async function setupInScratch(
	layout: ServerLayout,
	prompter: Prompter,
	options: SetupOptions,
	scratchDir: AbsolutePath,
): Promise<SetupResult<SetupOutcome>> {
	const report = options.report ?? (() => {})
	const enter = (stage: SetupStage): void => report({ stage, type: "stage" })

	enter("inventory")
	const scanned = await buildInventory(layout.modsDir, joinAbsolute(scratchDir, "packs"))
	if (!scanned.ok) {
		return failSetup("inventory", scanned.error)
	}
	const scan = scanned.value
	report({ scan, type: "inventory" })

	enter("select")
	const selected = await selectWorld(layout, prompter, options)
	if (!selected.ok) {
		return selected
	}
	if (!selected.value) {
		return { ok: true, value: { reason: "No world selected.", status: "cancelled" } }
	}
	const selection = selected.value

	const warnings: string[] = []
	let reconciliation: ReconciliationResult | null = null
	let world: CommittedWorld

	if (selection.kind === "archive") {
		enter("stage")
		const staged = await stageWorld(selection.archive, scratchDir)
		if (!staged.ok) {
			return failSetup("stage", staged.error)
		}

		enter("requirements")
		const declared = await readWorldRequirements(staged.value.stagedDir)
		if (!declared.ok) {
			return failSetup("requirements", declared.error)
		}
		reconciliation = reconcile(declared.value.requirements, scan.inventory)
		warnings.push(...declared.value.warnings, ...describeDiscrepancies(reconciliation))
		report({ result: reconciliation, type: "reconciled", warnings })

		if (!isFullyMatched(reconciliation)) {
			const proceed = await prompter.confirm(missingPacksMessage(reconciliation), false)
			if (!proceed) {
				return {
					ok: true,
					value: { reason: "Required packs are missing.", status: "cancelled" },
				}
			}
		}

		enter("replace")
		const committed = await commitWorld(staged.value, layout)
		if (!committed.ok) {
			return failSetup("replace", committed.error)
		}
		world = committed.value
	} else {
		enter("replace")
		const kept = await keepActiveWorld(layout)
		if (!kept.ok) {
			return failSetup("replace", kept.error)
		}
		world = kept.value
	}

	enter("references")
	const references = await writeWorldPackReferences(world.activeWorld, scan.inventory)
	if (!references.ok) {
		return failSetup("references", references.error)
	}

	enter("install")
	const installed = await installPacks(scan.inventory, layout)
	if (!installed.ok) {
		return failSetup("install", installed.error)
	}

	return {
		ok: true,
		value: {
			status: "completed",
			summary: {
				archive: selection.kind === "archive" ? selection.archive : null,
				install: installed.value,
				reconciliation,
				references: references.value,
				scan,
				warnings,
				world,
			},
		},
	}
}

async function selectWorld(
	layout: ServerLayout,
	prompter: Prompter,
	options: SetupOptions,
): Promise<SetupResult<Selection | null>> {
	if (options.worldArchive) {
		return { ok: true, value: { archive: options.worldArchive, kind: "archive" } }
	}
	if (options.keepExisting) {
		return { ok: true, value: { kind: "existing" } }
	}

	const archives = await listBackups(layout.worldArchivesDir)
	if (!archives.ok) {
		return failSetup("select", archives.error)
	}

	const choices = archives.value.map((entry) => ({
		hint: formatMegabytes(entry.sizeBytes),
		label: entry.name,
	}))
	choices.push({
		hint: layout.activeWorld,
		label: "Skip - keep the existing world",
	})

	const index = await prompter.choose("Select a world to import", choices)
	if (index === null) {
		return { ok: true, value: null }
	}

	const entry = archives.value[index]
	return {
		ok: true,
		value: entry ? { archive: entry.path, kind: "archive" } : { kind: "existing" },
	}
}

export function missingPacksMessage(result: ReconciliationResult): string {
	const lines = [`Missing ${result.missing.length} required pack(s):`]
	for (const requirement of result.missing) {
		lines.push(
			`  - [${requirement.role.toUpperCase()}] ${requirement.id} (${formatVersion(requirement.version)})`,
		)
	}
	lines.push("The world may not work correctly without them. Continue anyway?")
	return lines.join("\n")
}

function describeDiscrepancies(result: ReconciliationResult): string[] {
	const warnings: string[] = []
	for (const { record, requirement } of result.versionDrift) {
		warnings.push(
			`${record.displayName} (${requirement.id}): world expects ${formatVersion(requirement.version)}, ${record.sourceArchive} provides ${formatVersion(record.identity.version)}.`,
		)
	}
	for (const { record, requirement } of result.roleMismatches) {
		warnings.push(
			`${record.displayName} (${requirement.id}) is listed as a ${requirement.role} pack but ${record.sourceArchive} provides a ${record.role} pack.`,
		)
	}
	return warnings
}
