import { z } from "zod"
import type { PackId } from "@/types/branded"

const VersionPartSchema = z.number().int().nonnegative()

export const PackVersionSchema = z.tuple([
	VersionPartSchema,
	VersionPartSchema,
	VersionPartSchema,
])

export const PackIdSchema = z
	.string()
	.trim()
	.min(1)
	.transform((value) => value as PackId)

const ModuleSchema = z
	.object({
		type: z.string().optional(),
	})
	.passthrough()

export const PackManifestSchema = z
	.object({
		header: z
			.object({
				name: z.string().optional(),
				uuid: PackIdSchema,
				version: PackVersionSchema,
			})
			.passthrough(),
		modules: z.array(ModuleSchema).default([]),
	})
	.passthrough()
