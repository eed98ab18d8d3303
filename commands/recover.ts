import { consola } from "consola"
import { type LayoutFlags, resolveCommandLayout } from "@/commands/shared"
import { CommandResult, printOutcome } from "@/commands/types"
import { recoverWorld } from "@/world/replace"

export async function recoverCommand(flags: LayoutFlags): Promise<void> {
	const layout = resolveCommandLayout(flags)
	if (layout.status !== "completed") {
		printOutcome(layout)
		return
	}

	consola.info("bw recover")
	const result = await recoverWorld(layout.value)
	if (!result.ok) {
		printOutcome(CommandResult.failed(result.error))
		return
	}

	if (result.value === "active-present") {
		printOutcome(
			CommandResult.unchanged(`${layout.value.activeWorld} is present; nothing to recover.`),
		)
		return
	}

	consola.success(`Restored ${layout.value.previousWorld} to ${layout.value.activeWorld}.`)
	printOutcome(CommandResult.completed(undefined))
}
