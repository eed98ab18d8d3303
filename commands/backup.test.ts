import { join } from "node:path"
import { describe, expect, it } from "vitest"
import { backupWorld, compressionPercent } from "@/commands/backup"
import { exists, testLayout, withTempDir, writeFixture } from "@/tests/helpers"

describe("compressionPercent", () => {
	it("reports the share of bytes saved", () => {
		expect(compressionPercent(1000, 250)).toBe("75.0")
		expect(compressionPercent(0, 22)).toBe("0.0")
	})
})

describe("backupWorld", () => {
	it("completes and writes the archive", async () => {
		await withTempDir(async (dir) => {
			const layout = testLayout(dir)
			await writeFixture(join(layout.activeWorld, "levelname.txt"), "World")

			const result = await backupWorld(layout, new Date(2024, 0, 1))

			expect(result).toEqual({ status: "completed", value: undefined })
			expect(await exists(join(layout.backupsDir, "World_Jan01_2024.mcworld"))).toBe(true)
		})
	})

	it("fails without an active world", async () => {
		await withTempDir(async (dir) => {
			const result = await backupWorld(testLayout(dir), new Date(2024, 0, 1))

			expect(result.status).toBe("failed")
		})
	})
})
