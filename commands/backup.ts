import { consola } from "consola"
import type { BackupEntry } from "@/backup/create"
import { createWorldBackup, formatMegabytes, listBackups } from "@/backup/create"
import type { ServerLayout } from "@/config/layout"
import { type LayoutFlags, resolveCommandLayout } from "@/commands/shared"
import { CommandResult, printOutcome } from "@/commands/types"

const PROGRESS_INTERVAL = 100

export async function backupCommand(flags: LayoutFlags): Promise<void> {
	const layout = resolveCommandLayout(flags)
	if (layout.status !== "completed") {
		printOutcome(layout)
		return
	}

	printOutcome(await backupWorld(layout.value, new Date()))
}

export async function backupsCommand(flags: LayoutFlags): Promise<void> {
	const layout = resolveCommandLayout(flags)
	if (layout.status !== "completed") {
		printOutcome(layout)
		return
	}

	const result = await listBackups(layout.value.backupsDir)
	if (!result.ok) {
		printOutcome(CommandResult.failed(result.error))
		return
	}
	if (result.value.length === 0) {
		printOutcome(CommandResult.unchanged(`No backups in ${layout.value.backupsDir}.`))
		return
	}

	printBackupList(result.value)
}

export async function backupWorld(
	layout: ServerLayout,
	date: Date,
): Promise<CommandResult<void>> {
	consola.info("bw backup")
	consola.start(`Archiving ${layout.activeWorld}...`)

	const created = await createWorldBackup(layout, date, (relativePath, count) => {
		if (count % PROGRESS_INTERVAL === 0) {
			consola.debug(`${count} file(s) read, last: ${relativePath}`)
		}
	})
	if (!created.ok) {
		return CommandResult.failed(created.error)
	}

	const summary = created.value
	consola.success(`Backup written to ${summary.archivePath}`)
	consola.info(`Files: ${summary.files}`)
	consola.info(
		`Size: ${formatMegabytes(summary.sourceBytes)} -> ${formatMegabytes(summary.archiveBytes)} (${compressionPercent(summary.sourceBytes, summary.archiveBytes)}% saved)`,
	)

	const backups = await listBackups(layout.backupsDir)
	if (!backups.ok) {
		return CommandResult.failed(backups.error)
	}
	printBackupList(backups.value)

	return CommandResult.completed(undefined)
}

export function compressionPercent(sourceBytes: number, archiveBytes: number): string {
	if (sourceBytes === 0) {
		return "0.0"
	}
	return ((1 - archiveBytes / sourceBytes) * 100).toFixed(1)
}

function printBackupList(backups: BackupEntry[]): void {
	consola.info(`${backups.length} backup(s):`)
	for (const backup of backups) {
		consola.log(
			`  ${backup.name}  ${formatMegabytes(backup.sizeBytes)}  ${backup.modifiedAt.toLocaleString()}`,
		)
	}
}
