import { sameVersion } from "@/manifest/types"
import type {
	MatchedRequirement,
	PackInventory,
	ReconciliationResult,
	WorldRequirement,
} from "@/packs/types"

/**
 * Check which declared packs are available. Matching is by id only: a version
 * difference or a role disagreement is reported, never treated as missing.
 * Output lists are sorted by role then id so input order does not matter.
 */
export function reconcile(
	requirements: readonly WorldRequirement[],
	inventory: PackInventory,
): ReconciliationResult {
	const matched: MatchedRequirement[] = []
	const missing: WorldRequirement[] = []
	const seen = new Set<string>()

	for (const requirement of [...requirements].sort(compareRequirements)) {
		const key = `${requirement.role}:${requirement.id}`
		if (seen.has(key)) {
			continue
		}
		seen.add(key)

		const record = inventory.get(requirement.id)
		if (record) {
			matched.push({ record, requirement })
		} else {
			missing.push(requirement)
		}
	}

	return {
		matched,
		missing,
		roleMismatches: matched.filter((match) => match.record.role !== match.requirement.role),
		versionDrift: matched.filter(
			(match) => !sameVersion(match.record.identity.version, match.requirement.version),
		),
	}
}

export function isFullyMatched(result: ReconciliationResult): boolean {
	return result.missing.length === 0
}

function compareRequirements(a: WorldRequirement, b: WorldRequirement): number {
	if (a.role !== b.role) {
		return a.role < b.role ? -1 : 1
	}
	if (a.id !== b.id) {
		return a.id < b.id ? -1 : 1
	}
	return compareVersions(a.version, b.version)
}

function compareVersions(a: WorldRequirement["version"], b: WorldRequirement["version"]): number {
	for (let index = 0; index < 3; index += 1) {
		const left = a[index] ?? 0
		const right = b[index] ?? 0
		if (left !== right) {
			return left - right
		}
	}
	return 0
}
