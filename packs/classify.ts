import type { PackRole } from "@/packs/types"

/** Module types that carry code or data the server has to load as a behavior pack. */
const BEHAVIOR_MODULE_TYPES: ReadonlySet<string> = new Set(["data", "script", "javascript"])

const RESOURCE_MODULE_TYPES: ReadonlySet<string> = new Set(["resources", "client_data"])

/**
 * Behavior indicators win over resource indicators regardless of module order.
 * Unrecognised or empty module lists fall back to `resource`.
 */
export function classifyPack(moduleTypes: readonly string[]): PackRole {
	if (moduleTypes.some((type) => BEHAVIOR_MODULE_TYPES.has(type))) {
		return "behavior"
	}

	if (moduleTypes.some((type) => RESOURCE_MODULE_TYPES.has(type))) {
		return "resource"
	}

	return "resource"
}
