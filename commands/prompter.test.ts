import { beforeEach, describe, expect, it, vi } from "vitest"

vi.mock("@clack/prompts", () => ({
	confirm: vi.fn(),
	isCancel: (value: unknown) => typeof value === "symbol",
	select: vi.fn(),
}))

import { confirm, select } from "@clack/prompts"
import { createFlagPrompter, createTerminalPrompter } from "@/commands/prompter"

const selectMock = vi.mocked(select)
const confirmMock = vi.mocked(confirm)

beforeEach(() => {
	selectMock.mockReset()
	confirmMock.mockReset()
})

describe("createTerminalPrompter", () => {
	it("offers options by index and returns the chosen one", async () => {
		selectMock.mockResolvedValue(1)

		const choice = await createTerminalPrompter().choose("Select a world to import", [
			{ hint: "1.00 MB", label: "a.mcworld" },
			{ label: "Skip - keep the existing world" },
		])

		expect(choice).toBe(1)
		expect(selectMock).toHaveBeenCalledWith({
			message: "Select a world to import",
			options: [
				{ hint: "1.00 MB", label: "a.mcworld", value: 0 },
				{ hint: undefined, label: "Skip - keep the existing world", value: 1 },
			],
		})
	})

	it("maps a cancelled selection to null and a cancelled confirm to no", async () => {
		selectMock.mockResolvedValue(Symbol("cancel"))
		confirmMock.mockResolvedValue(Symbol("cancel"))
		const prompter = createTerminalPrompter()

		expect(await prompter.choose("Pick", [{ label: "only" }])).toBeNull()
		expect(await prompter.confirm("Continue?", true)).toBe(false)
	})

	it("passes the default answer to confirm", async () => {
		confirmMock.mockResolvedValue(true)

		expect(await createTerminalPrompter().confirm("Continue?", false)).toBe(true)
		expect(confirmMock).toHaveBeenCalledWith({ initialValue: false, message: "Continue?" })
	})
})

describe("createFlagPrompter", () => {
	it("never chooses a world", async () => {
		expect(await createFlagPrompter({ yes: true }).choose("Pick", [{ label: "a" }])).toBeNull()
	})

	it("confirms only with --yes or a default of yes", async () => {
		expect(await createFlagPrompter({ yes: true }).confirm("Continue?", false)).toBe(true)
		expect(await createFlagPrompter({ yes: false }).confirm("Continue?", false)).toBe(false)
		expect(await createFlagPrompter({ yes: false }).confirm("Continue?", true)).toBe(true)
		expect(selectMock).not.toHaveBeenCalled()
	})
})
