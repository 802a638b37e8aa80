import type { BaseError, PluginSpec, ResolvedPlugin } from "@strand/core"
import type {
	ArchiveExtractError,
	ArchiveFetchError,
	FetchLike,
} from "@/src/core/archive/types"
import type { IoOperation } from "@/src/core/io/types"

// =============================================================================
// OUTCOMES
// =============================================================================

/**
 * Terminal result of installing one plugin. Failures are data; nothing a single
 * plugin does is thrown past its task.
 */
export type InstallOutcome =
	| { readonly status: "installed"; readonly destination: string }
	| { readonly status: "fetch_failed"; readonly error: ArchiveFetchError }
	| { readonly status: "extract_failed"; readonly error: ArchiveExtractError }
	| {
			readonly status: "conflict"
			/** Index of the earlier spec that claimed the same directory name */
			readonly claimedBy: number
	  }

export interface InstallEntry {
	readonly spec: PluginSpec
	readonly resolved: ResolvedPlugin
	readonly outcome: InstallOutcome
}

/** One entry per input spec, in input order. */
export type InstallReport = readonly InstallEntry[]

// =============================================================================
// ERRORS
// =============================================================================

export interface DirectorySetupError extends BaseError {
	readonly type: "directory_setup"
	readonly path: string
	readonly operation: IoOperation
}

export type InstallAllResult =
	| { ok: true; value: InstallReport }
	| { ok: false; error: DirectorySetupError }

// =============================================================================
// OPTIONS
// =============================================================================

export interface InstallTaskOptions {
	fetch?: FetchLike
	timeoutMs?: number
}

export interface InstallOptions extends InstallTaskOptions {
	concurrency?: number
	onStart?: (spec: PluginSpec, resolved: ResolvedPlugin) => void
	onComplete?: (entry: InstallEntry) => void
}
