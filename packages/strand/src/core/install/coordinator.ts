import {
	type AbsolutePath,
	type PluginSpec,
	type ResolvedPlugin,
	resolvePlugin,
} from "@strand/core"
import { ensureDir, resetDir } from "@/src/core/io/fs"
import type { IoError } from "@/src/core/io/types"
import { mapWithConcurrency } from "@/src/core/install/pool"
import { runInstallTask } from "@/src/core/install/task"
import type {
	DirectorySetupError,
	InstallAllResult,
	InstallEntry,
	InstallOptions,
	InstallReport,
} from "@/src/core/install/types"

export const DEFAULT_CONCURRENCY = 8

export interface PlannedInstall {
	spec: PluginSpec
	resolved: ResolvedPlugin
	/** Index of an earlier spec with the same directory name, if any */
	claimedBy: number | null
}

/**
 * Replace pluginDir wholesale with the given plugins.
 *
 * The directory is removed and recreated before any download starts; after that
 * every plugin succeeds or fails on its own. Only a failure to prepare the
 * directory fails the run as a whole.
 */
export async function installAll(
	specs: readonly PluginSpec[],
	pluginDir: AbsolutePath,
	options: InstallOptions = {},
): Promise<InstallAllResult> {
	const reset = await resetDir(pluginDir)
	if (!reset.ok) {
		return setupFailure(pluginDir, reset.error)
	}

	const report = await runInstalls(specs, pluginDir, options)
	return { ok: true, value: report }
}

/**
 * Install plugins into an existing pluginDir, replacing only their own
 * directories and leaving every other plugin in place.
 */
export async function installInto(
	specs: readonly PluginSpec[],
	pluginDir: AbsolutePath,
	options: InstallOptions = {},
): Promise<InstallAllResult> {
	const ensured = await ensureDir(pluginDir)
	if (!ensured.ok) {
		return setupFailure(pluginDir, ensured.error)
	}

	const report = await runInstalls(specs, pluginDir, options)
	return { ok: true, value: report }
}

/**
 * Resolve every spec and mark the ones whose directory name was already taken by
 * an earlier spec. Those are reported instead of silently overwriting each other.
 */
export function planInstalls(specs: readonly PluginSpec[]): PlannedInstall[] {
	const claimed = new Map<string, number>()

	return specs.map((spec, index) => {
		const resolved = resolvePlugin(spec)
		const previous = claimed.get(resolved.destName)
		if (previous !== undefined) {
			return { claimedBy: previous, resolved, spec }
		}

		claimed.set(resolved.destName, index)
		return { claimedBy: null, resolved, spec }
	})
}

async function runInstalls(
	specs: readonly PluginSpec[],
	pluginDir: AbsolutePath,
	options: InstallOptions,
): Promise<InstallReport> {
	const planned = planInstalls(specs)
	const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY

	return mapWithConcurrency(planned, concurrency, async (plan) => {
		if (plan.claimedBy !== null) {
			return complete(options, {
				outcome: { claimedBy: plan.claimedBy, status: "conflict" },
				resolved: plan.resolved,
				spec: plan.spec,
			})
		}

		options.onStart?.(plan.spec, plan.resolved)
		const outcome = await runInstallTask(plan.spec, plan.resolved, pluginDir, {
			fetch: options.fetch,
			timeoutMs: options.timeoutMs,
		})

		return complete(options, { outcome, resolved: plan.resolved, spec: plan.spec })
	})
}

function complete(options: InstallOptions, entry: InstallEntry): InstallEntry {
	options.onComplete?.(entry)
	return entry
}

function setupFailure(
	pluginDir: AbsolutePath,
	error: IoError,
): { ok: false; error: DirectorySetupError } {
	return {
		error: {
			message: `Unable to prepare plugin directory ${pluginDir}: ${error.message}`,
			operation: error.operation,
			path: pluginDir,
			type: "directory_setup",
		},
		ok: false,
	}
}
