import { describe, expect, it } from "vitest"
import { describeSkipped, setupWorld } from "@/commands/setup"
import { abs, packId, testLayout, withTempDir } from "@/tests/helpers"
import type { Prompter } from "@/world/prompter"

const declining: Prompter = {
	choose: async () => null,
	confirm: async () => false,
}

describe("setupWorld", () => {
	it("rejects --world together with --keep-existing", async () => {
		await withTempDir(async (dir) => {
			const result = await setupWorld(testLayout(dir), declining, {
				keepExisting: true,
				world: "island.mcworld",
			})

			expect(result.status).toBe("failed")
			if (result.status === "failed") {
				expect(result.error.message).toBe(
					"--world and --keep-existing cannot be used together.",
				)
			}
		})
	})

	it("reports a declined selection as cancelled", async () => {
		await withTempDir(async (dir) => {
			const result = await setupWorld(testLayout(dir), declining, { keepExisting: false })

			expect(result).toEqual({ reason: "No world selected.", status: "cancelled" })
		})
	})

	it("resolves --world against the world archives directory", async () => {
		await withTempDir(async (dir) => {
			const layout = testLayout(dir)

			const result = await setupWorld(layout, declining, {
				keepExisting: false,
				world: "missing.mcworld",
			})

			expect(result.status).toBe("failed")
			if (result.status === "failed") {
				expect(result.error.cause?.message).toBe(
					`Unable to read archive ${layout.worldArchivesDir}/missing.mcworld.`,
				)
			}
		})
	})
})

describe("describeSkipped", () => {
	it("names the archive that kept a duplicate id", () => {
		expect(
			describeSkipped({
				archive: "b.mcpack",
				id: packId("u1"),
				keptFrom: "a.mcaddon",
				kind: "duplicate",
			}),
		).toBe("Skipped u1 in b.mcpack: already provided by a.mcaddon.")
	})

	it("includes the archive error message", () => {
		expect(
			describeSkipped({
				archive: "c.mcpack",
				error: {
					archive: abs("/srv/mods/c.mcpack"),
					message: "Corrupt archive /srv/mods/c.mcpack.",
					type: "archive",
				},
				kind: "archive",
			}),
		).toBe("Skipped c.mcpack: Corrupt archive /srv/mods/c.mcpack.")
	})
})
