import { DEFAULT_WORLD_NAME } from "@/constants"

export const BW_SERVER_ROOT = process.env.BW_SERVER_ROOT ?? process.cwd()

export const BW_WORLD_NAME = normalizeWorldName(process.env.BW_WORLD_NAME ?? DEFAULT_WORLD_NAME)

function normalizeWorldName(name: string): string {
	const trimmed = name.trim()
	return trimmed.length > 0 ? trimmed : DEFAULT_WORLD_NAME
}
