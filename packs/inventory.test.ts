import { join } from "node:path"
import { afterEach, describe, expect, it, vi } from "vitest"
import { readDirEntries } from "@/io/fs"
import { ioFailure } from "@/io/types"
import { buildInventory, countByRole, isPackArchive, listPackArchives } from "@/packs/inventory"
import {
	abs,
	manifestJson,
	packId,
	withTempDir,
	writeFixture,
	writeZip,
} from "@/tests/helpers"

vi.mock("@/io/fs", async (importOriginal) => {
	const actual = await importOriginal<typeof import("@/io/fs")>()
	return { ...actual, readDirEntries: vi.fn(actual.readDirEntries) }
})

afterEach(() => {
	vi.mocked(readDirEntries).mockReset()
})

describe("isPackArchive", () => {
	it("accepts .mcpack and .mcaddon in any case", () => {
		expect(isPackArchive("a.mcpack")).toBe(true)
		expect(isPackArchive("b.MCADDON")).toBe(true)
		expect(isPackArchive("world.mcworld")).toBe(false)
		expect(isPackArchive("notes.txt")).toBe(false)
	})
})

describe("listPackArchives", () => {
	it("lists an absent directory as empty", async () => {
		await withTempDir(async (dir) => {
			expect(await listPackArchives(abs(join(dir, "mods")))).toEqual({ ok: true, value: [] })
		})
	})

	it("lists only pack archives, sorted by name", async () => {
		await withTempDir(async (dir) => {
			await writeFixture(join(dir, "b.mcpack"), "")
			await writeFixture(join(dir, "a.mcaddon"), "")
			await writeFixture(join(dir, "readme.txt"), "")
			await writeFixture(join(dir, "nested.mcpack", "inner"), "")

			expect(await listPackArchives(dir)).toEqual({
				ok: true,
				value: [join(dir, "a.mcaddon"), join(dir, "b.mcpack")],
			})
		})
	})
})

describe("buildInventory", () => {
	it("indexes every pack of a multi-pack addon and skips bad entries", async () => {
		await withTempDir(async (dir) => {
			const mods = join(dir, "mods")
			await writeZip(join(mods, "a.mcaddon"), {
				"Addon BP/manifest.json": manifestJson({
					modules: ["data"],
					name: "Addon BP",
					uuid: "u1",
					version: [1, 0, 0],
				}),
				"Addon RP/manifest.json": manifestJson({
					modules: ["resources"],
					uuid: "u2",
					version: [1, 0, 0],
				}),
			})
			await writeZip(join(mods, "b.mcpack"), {
				"manifest.json": manifestJson({ modules: ["resources"], uuid: "u1", version: [2, 0, 0] }),
			})
			await writeFixture(join(mods, "c.mcpack"), "corrupt")
			await writeZip(join(mods, "d.mcpack"), {
				"manifest.json": manifestJson({ name: "No identity" }),
			})
			await writeFixture(join(mods, "e.txt"), "ignored")

			const result = await buildInventory(abs(mods), abs(join(dir, "scratch")))
			if (!result.ok) {
				throw new Error(result.error.message)
			}
			const scan = result.value

			expect(scan.archives).toEqual(["a.mcaddon", "b.mcpack", "c.mcpack", "d.mcpack"])
			expect([...scan.inventory.keys()]).toEqual(["u1", "u2"])

			const behavior = scan.inventory.get(packId("u1"))
			expect(behavior).toEqual({
				displayName: "Addon BP",
				identity: { id: "u1", version: [1, 0, 0] },
				packDir: join(dir, "scratch", "a", "Addon BP"),
				role: "behavior",
				sourceArchive: "a.mcaddon",
			})
			expect(scan.inventory.get(packId("u2"))?.displayName).toBe("a")
			expect(scan.inventory.get(packId("u2"))?.role).toBe("resource")

			expect(scan.skipped.map((entry) => [entry.kind, entry.archive])).toEqual([
				["duplicate", "b.mcpack"],
				["archive", "c.mcpack"],
				["manifest", "d.mcpack"],
			])
			const duplicate = scan.skipped[0]
			expect(duplicate?.kind === "duplicate" && duplicate.keptFrom).toBe("a.mcaddon")

			expect(countByRole(scan)).toEqual({ behavior: 1, resource: 1 })
		})
	})

	it("unpacks archives that share a stem into separate directories", async () => {
		await withTempDir(async (dir) => {
			const mods = join(dir, "mods")
			await writeZip(join(mods, "pack.mcaddon"), {
				"manifest.json": manifestJson({ uuid: "first" }),
			})
			await writeZip(join(mods, "pack.mcpack"), {
				"manifest.json": manifestJson({ uuid: "second" }),
			})

			const result = await buildInventory(abs(mods), abs(join(dir, "scratch")))

			expect(result.ok && result.value.inventory.get(packId("first"))?.packDir).toBe(
				join(dir, "scratch", "pack"),
			)
			expect(result.ok && result.value.inventory.get(packId("second"))?.packDir).toBe(
				join(dir, "scratch", "pack-2"),
			)
		})
	})

	it("returns an empty scan when the mods directory is absent", async () => {
		await withTempDir(async (dir) => {
			const result = await buildInventory(abs(join(dir, "mods")), abs(join(dir, "scratch")))

			expect(result.ok && result.value.inventory.size).toBe(0)
			expect(result.ok && result.value.skipped).toEqual([])
		})
	})

	it("skips an archive whose unpacked contents cannot be listed", async () => {
		await withTempDir(async (dir) => {
			const mods = join(dir, "mods")
			const scratch = abs(join(dir, "scratch"))
			await writeZip(join(mods, "a.mcpack"), {
				"manifest.json": manifestJson({ uuid: "u1" }),
			})
			await writeZip(join(mods, "b.mcpack"), {
				"manifest.json": manifestJson({ uuid: "u2" }),
			})
			const { readDirEntries: listDirectory } =
				await vi.importActual<typeof import("@/io/fs")>("@/io/fs")
			vi.mocked(readDirEntries).mockImplementation(async (target) =>
				target === join(scratch, "a")
					? ioFailure(`Unable to list ${target}.`, abs(target), "readdir")
					: listDirectory(target),
			)

			const result = await buildInventory(abs(mods), scratch)
			if (!result.ok) {
				throw new Error(result.error.message)
			}

			expect([...result.value.inventory.keys()]).toEqual(["u2"])
			expect(result.value.skipped).toEqual([
				{
					archive: "a.mcpack",
					error: {
						archive: join(mods, "a.mcpack"),
						cause: {
							message: `Unable to list ${join(scratch, "a")}.`,
							operation: "readdir",
							path: join(scratch, "a"),
							rawError: undefined,
							type: "io",
						},
						message: "Unable to scan the contents of a.mcpack.",
						type: "archive",
					},
					kind: "archive",
				},
			])
		})
	})
})
