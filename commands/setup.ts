import { consola } from "consola"
import type { ServerLayout } from "@/config/layout"
import { createFlagPrompter, createTerminalPrompter } from "@/commands/prompter"
import { type LayoutFlags, resolveCommandLayout } from "@/commands/shared"
import { CommandResult, formatErrorChain, printOutcome } from "@/commands/types"
import { formatVersion } from "@/manifest/types"
import { countByRole } from "@/packs/inventory"
import type { InventoryScan, ReconciliationResult, SkippedEntry } from "@/packs/types"
import type { AbsolutePath } from "@/types/branded"
import { coerceAbsolutePath } from "@/types/coerce"
import type { ValidationError } from "@/types/error"
import type { Prompter } from "@/world/prompter"
import { runWorldSetup } from "@/world/setup"
import type { SetupEvent, SetupStage, SetupSummary } from "@/world/types"

export interface SetupFlags extends LayoutFlags {
	world?: string
	keepExisting: boolean
	nonInteractive: boolean
	yes: boolean
}

const STAGE_LABELS: Record<SetupStage, string> = {
	install: "Installing packs...",
	inventory: "Scanning pack archives...",
	references: "Writing world pack references...",
	replace: "Replacing the active world...",
	requirements: "Reading world pack requirements...",
	scratch: "Preparing scratch directory...",
	select: "Selecting a world...",
	stage: "Unpacking world archive...",
}

export async function setupCommand(flags: SetupFlags): Promise<void> {
	const layout = resolveCommandLayout(flags)
	if (layout.status !== "completed") {
		printOutcome(layout)
		return
	}

	const prompter = flags.nonInteractive
		? createFlagPrompter({ yes: flags.yes })
		: createTerminalPrompter()

	printOutcome(await setupWorld(layout.value, prompter, flags))
}

export async function setupWorld(
	layout: ServerLayout,
	prompter: Prompter,
	flags: Pick<SetupFlags, "keepExisting" | "world">,
): Promise<CommandResult<SetupSummary>> {
	consola.info("bw setup")

	if (flags.world && flags.keepExisting) {
		return CommandResult.failed(
			invalidWorldFlag("--world and --keep-existing cannot be used together."),
		)
	}

	let worldArchive: AbsolutePath | undefined
	if (flags.world) {
		const resolved = coerceAbsolutePath(flags.world, layout.worldArchivesDir)
		if (!resolved) {
			return CommandResult.failed(invalidWorldFlag("World archive path cannot be empty."))
		}
		worldArchive = resolved
	}

	const result = await runWorldSetup(layout, prompter, {
		keepExisting: flags.keepExisting,
		report: (event) => reportEvent(layout, event),
		worldArchive,
	})
	if (!result.ok) {
		return CommandResult.failed(result.error)
	}

	const outcome = result.value
	if (outcome.status === "cancelled") {
		return CommandResult.cancelled(outcome.reason)
	}

	printSummary(layout, outcome.summary)
	return CommandResult.completed(outcome.summary)
}

function invalidWorldFlag(message: string): ValidationError {
	return { field: "world", message, source: "manual", type: "validation" }
}

function reportEvent(layout: ServerLayout, event: SetupEvent): void {
	switch (event.type) {
		case "stage":
			consola.start(STAGE_LABELS[event.stage])
			break
		case "inventory":
			printInventory(layout, event.scan)
			break
		case "reconciled":
			printReconciliation(event.result)
			for (const warning of event.warnings) {
				consola.warn(warning)
			}
			break
	}
}

function printInventory(layout: ServerLayout, scan: InventoryScan): void {
	if (scan.archives.length === 0) {
		consola.warn(`No pack archives in ${layout.modsDir}.`)
		return
	}

	const counts = countByRole(scan)
	consola.info(
		`Found ${scan.inventory.size} pack(s) in ${scan.archives.length} archive(s): ${counts.behavior} behavior, ${counts.resource} resource.`,
	)
	for (const entry of scan.skipped) {
		consola.warn(describeSkipped(entry))
	}
}

export function describeSkipped(entry: SkippedEntry): string {
	switch (entry.kind) {
		case "archive":
			return `Skipped ${entry.archive}: ${entry.error.message}`
		case "manifest":
			return `Skipped a pack in ${entry.archive}:\n${formatErrorChain(entry.error)}`
		case "duplicate":
			return `Skipped ${entry.id} in ${entry.archive}: already provided by ${entry.keptFrom}.`
	}
}

function printReconciliation(result: ReconciliationResult): void {
	const total = result.matched.length + result.missing.length
	if (total === 0) {
		consola.info("The world does not declare any packs.")
		return
	}

	consola.info(`World requires ${total} pack(s); ${result.matched.length} available.`)
	for (const { record, requirement } of result.matched) {
		consola.log(`  ok      [${requirement.role}] ${record.displayName} (${requirement.id})`)
	}
	for (const requirement of result.missing) {
		consola.log(
			`  missing [${requirement.role}] ${requirement.id} (${formatVersion(requirement.version)})`,
		)
	}
}

function printSummary(layout: ServerLayout, summary: SetupSummary): void {
	if (summary.world.source === "archive") {
		consola.success(`Imported ${summary.archive ?? "world"} into ${summary.world.activeWorld}`)
		if (summary.world.previousWorld) {
			consola.info(`Previous world kept at ${summary.world.previousWorld}`)
		}
	} else {
		consola.success(`Kept the existing world at ${summary.world.activeWorld}`)
	}

	consola.info(
		`Pack references: ${summary.references.behavior} behavior, ${summary.references.resource} resource.`,
	)
	consola.info(
		`Installed ${summary.install.installed.length} pack(s), removed ${summary.install.removed.length} old pack(s).`,
	)
	if (summary.install.kept.length > 0) {
		consola.info(`Left in place: ${summary.install.kept.join(", ")}`)
	}

	consola.box(
		[
			"Next steps:",
			`1. Restart the server in ${layout.serverRoot}.`,
			"2. Check the server log for pack loading errors.",
		].join("\n"),
	)
}
