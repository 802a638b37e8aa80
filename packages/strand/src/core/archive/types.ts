import type { Readable } from "node:stream"
import type { BaseError } from "@strand/core"

// =============================================================================
// FETCH
// =============================================================================

export type ArchiveFetchErrorType = "http_status" | "network" | "empty_body"

export interface ArchiveFetchError extends BaseError {
	readonly type: ArchiveFetchErrorType
	readonly url: string
	readonly status?: number
}

export type ArchiveFetchResult =
	| { ok: true; value: Readable }
	| { ok: false; error: ArchiveFetchError }

/** The subset of the WHATWG fetch signature the fetcher relies on. */
export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>

export interface FetchOptions {
	fetch?: FetchLike
	timeoutMs?: number
	userAgent?: string
}

// =============================================================================
// EXTRACT
// =============================================================================

export type ArchiveExtractErrorType =
	| "path_traversal"
	| "missing_wrapper"
	| "unsupported_entry"
	| "corrupt_archive"
	/** The archive stream itself failed: a dropped connection or a stalled body */
	| "download_interrupted"
	| "io_error"
	| "unexpected"

export interface ArchiveExtractError extends BaseError {
	readonly type: ArchiveExtractErrorType
	/** Entry name as stored in the archive, when the failure is tied to one */
	readonly entry?: string
}

export interface ExtractSummary {
	readonly files: number
	readonly directories: number
	/** Name of the wrapper directory that was stripped */
	readonly wrapper: string | null
}

export type ArchiveExtractResult =
	| { ok: true; value: ExtractSummary }
	| { ok: false; error: ArchiveExtractError }
