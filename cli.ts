#!/usr/bin/env tsx

import { Command } from "commander"
import { consola } from "consola"
import { backupCommand, backupsCommand } from "@/commands/backup"
import { recoverCommand } from "@/commands/recover"
import { setupCommand } from "@/commands/setup"
import pkg from "./package.json" with { type: "json" }

type GlobalOptions = { root?: string; worldName?: string }

async function main(): Promise<void> {
	const program = new Command()

	program
		.name("bw")
		.description("Bedrock dedicated server world and pack tooling")
		.version(pkg.version, "-V, --version", "Output the version number")
		.option("--root <dir>", "Server root directory (default: $BW_SERVER_ROOT or cwd)")
		.option("--world-name <name>", "Active world directory name (default: $BW_WORLD_NAME)")
		.showHelpAfterError()
		.showSuggestionAfterError()

	const layoutFlags = (): GlobalOptions => {
		const options = program.opts<GlobalOptions>()
		return { root: options.root, worldName: options.worldName }
	}

	program
		.command("backup")
		.description("Archive the active world into backups/")
		.action(async () => {
			await backupCommand(layoutFlags())
		})

	program
		.command("backups")
		.description("List world backups")
		.action(async () => {
			await backupsCommand(layoutFlags())
		})

	program
		.command("setup")
		.description("Import a world and install every pack from mods/")
		.option("--world <archive>", "World archive to import (relative to world_backups/)")
		.option("--keep-existing", "Keep the active world and only refresh packs")
		.option("--non-interactive", "Run without prompts")
		.option("-y, --yes", "Continue when required packs are missing")
		.action(
			async (options: {
				keepExisting?: boolean
				nonInteractive?: boolean
				world?: string
				yes?: boolean
			}) => {
				await setupCommand({
					...layoutFlags(),
					keepExisting: Boolean(options.keepExisting),
					nonInteractive: Boolean(options.nonInteractive),
					world: options.world,
					yes: Boolean(options.yes),
				})
			},
		)

	program
		.command("recover")
		.description("Restore the previous world after an interrupted setup")
		.action(async () => {
			await recoverCommand(layoutFlags())
		})

	if (process.argv.length <= 2) {
		program.outputHelp()
		return
	}

	await program.parseAsync(process.argv)
}

main().catch((error: unknown) => {
	consola.error(error)
	process.exit(1)
})
