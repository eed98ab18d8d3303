import { describe, expect, it } from "vitest"
import { z } from "zod"
import { CommandResult, formatErrorChain } from "@/commands/types"
import { abs } from "@/tests/helpers"
import type { NotFoundError, ValidationError } from "@/types/error"
import { failSetup } from "@/world/errors"

describe("formatErrorChain", () => {
	it("prints the stage wrapper and its cause with details", () => {
		const notFound: NotFoundError = {
			message: "No world selected and no existing world at /srv/worlds/Test.",
			path: abs("/srv/worlds/Test"),
			target: "world",
			type: "not_found",
		}
		const failed = failSetup("replace", notFound)
		if (failed.ok) {
			throw new Error("expected a failure")
		}

		expect(formatErrorChain(failed.error)).toBe(
			[
				"[not_found] Setup failed at replace. (stage=replace, path=/srv/worlds/Test, target=world)",
				"Caused by:",
				"  [not_found] No world selected and no existing world at /srv/worlds/Test. (path=/srv/worlds/Test, target=world)",
			].join("\n"),
		)
	})

	it("lists zod issues by path", () => {
		const parsed = z.object({ version: z.number() }).safeParse({ version: "1" })
		if (parsed.success) {
			throw new Error("expected a zod failure")
		}
		const error: ValidationError = {
			field: "packs",
			message: "Pack reference list validation failed.",
			source: "zod",
			type: "validation",
			zodError: parsed.error,
		}

		const lines = formatErrorChain(error).split("\n")

		expect(lines[0]).toBe(
			"[validation] Pack reference list validation failed. (field=packs, source=zod)",
		)
		expect(lines[1]).toBe("  Zod issues:")
		expect(lines[2]).toBe("  - version: Expected number, received string")
	})
})

describe("CommandResult", () => {
	it("builds each outcome", () => {
		expect(CommandResult.completed(3)).toEqual({ status: "completed", value: 3 })
		expect(CommandResult.unchanged("nothing to do")).toEqual({
			reason: "nothing to do",
			status: "unchanged",
		})
		expect(CommandResult.cancelled()).toEqual({ status: "cancelled" })
		expect(CommandResult.cancelled("No world selected.")).toEqual({
			reason: "No world selected.",
			status: "cancelled",
		})
	})
})
