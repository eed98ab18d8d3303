import { consola } from "consola"
import type { ServerLayout } from "@/config/layout"
import { resolveServerLayout } from "@/config/layout"
import { CommandResult } from "@/commands/types"
import { BW_SERVER_ROOT, BW_WORLD_NAME } from "@/env"

export interface LayoutFlags {
	root?: string
	worldName?: string
}

export function resolveCommandLayout(flags: LayoutFlags): CommandResult<ServerLayout> {
	const resolved = resolveServerLayout({
		serverRoot: flags.root ?? BW_SERVER_ROOT,
		worldName: flags.worldName ?? BW_WORLD_NAME,
	})
	if (!resolved.ok) {
		return CommandResult.failed(resolved.error)
	}

	consola.debug(`Server root: ${resolved.value.serverRoot}`)
	return CommandResult.completed(resolved.value)
}
