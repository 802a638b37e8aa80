import type { BaseError } from "@strand/core"

/** Filesystem calls the installer makes; carried on errors so reports can name the step. */
export type IoOperation = "lstat" | "mkdir" | "mkdtemp" | "readFile" | "rename" | "rm"

export interface IoError extends BaseError {
	readonly type: "io_error"
	readonly operation: IoOperation
	readonly path: string
}

export type IoResult<T> = { ok: true; value: T } | { ok: false; error: IoError }

export function ioFailure(
	operation: IoOperation,
	targetPath: string,
	message: string,
): { ok: false; error: IoError } {
	return { error: { message, operation, path: targetPath, type: "io_error" }, ok: false }
}
