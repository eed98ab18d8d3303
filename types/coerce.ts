import path from "node:path"
import type { AbsolutePath } from "@/types/branded"

export function coerceAbsolutePath(
	value: string,
	basePath?: string,
): AbsolutePath | null {
	const trimmed = value.trim()
	if (trimmed.length === 0) return null

	let resolved: string
	if (path.isAbsolute(trimmed)) {
		resolved = path.normalize(trimmed)
	} else if (basePath) {
		resolved = path.resolve(basePath, trimmed)
	} else {
		return null
	}

	return resolved as AbsolutePath
}

/**
 * Resolve against the current working directory when the value is relative.
 */
export function coerceAbsolutePathDirect(value: string): AbsolutePath | null {
	return coerceAbsolutePath(value, process.cwd())
}

export function joinAbsolute(base: AbsolutePath, ...segments: string[]): AbsolutePath {
	return path.join(base, ...segments) as AbsolutePath
}
