import { describe, expect, it } from "vitest"
import { classifyPack } from "@/packs/classify"

describe("classifyPack", () => {
	it("treats data, script and javascript modules as behavior", () => {
		expect(classifyPack(["data"])).toBe("behavior")
		expect(classifyPack(["script"])).toBe("behavior")
		expect(classifyPack(["javascript"])).toBe("behavior")
	})

	it("treats resources and client_data as resource", () => {
		expect(classifyPack(["resources"])).toBe("resource")
		expect(classifyPack(["client_data"])).toBe("resource")
	})

	it("prefers behavior regardless of module order", () => {
		expect(classifyPack(["resources", "data"])).toBe("behavior")
		expect(classifyPack(["data", "resources"])).toBe("behavior")
	})

	it("falls back to resource for empty or unknown modules", () => {
		expect(classifyPack([])).toBe("resource")
		expect(classifyPack(["skin_pack", "world_template"])).toBe("resource")
	})
})
