import type { ZodError } from "zod"
import type { AbsolutePath } from "@/types/branded"

export interface BaseError {
	type: string
	message: string
	cause?: BaseError
	rawError?: Error
}

export type ValidationError =
	| (BaseError & {
			type: "validation"
			source: "zod"
			field: string
			path?: AbsolutePath
			zodError: ZodError
	  })
	| (BaseError & {
			type: "validation"
			source: "manual"
			field: string
			path?: AbsolutePath
	  })

export type ParseError = BaseError & {
	type: "parse"
	source: string
	path?: AbsolutePath
}

/** Unreadable or corrupt archive. Skipped while scanning packs, fatal for worlds. */
export type ArchiveError = BaseError & {
	type: "archive"
	archive: AbsolutePath
}

export type ManifestErrorReason = "missing_identity" | "invalid_fields"

/** Missing or malformed identity fields. Only the manifest is skipped. */
export type ManifestError = BaseError & {
	type: "manifest"
	reason: ManifestErrorReason
	path: AbsolutePath
}

/** Permission, space or missing-path failure while touching the filesystem. */
export type IoError = BaseError & {
	type: "io"
	path: AbsolutePath
	operation: string
}

export type NotFoundError = BaseError & {
	type: "not_found"
	target: string
	path?: AbsolutePath
}

export type WorldError =
	| ValidationError
	| ParseError
	| ArchiveError
	| ManifestError
	| IoError
	| NotFoundError

export type Result<T, E extends BaseError = WorldError> =
	| { ok: true; value: T }
	| { ok: false; error: E }
