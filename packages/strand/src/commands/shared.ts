import { homedir } from "node:os"
import { consola } from "consola"
import type { FetchLike } from "@/src/core/archive/types"
import { resolveConfigPath } from "@/src/core/config/paths"
import type { StrandConfig } from "@/src/core/config/types"
import type { InstallAllResult, InstallOptions } from "@/src/core/install/types"
import { APPDATA, STRAND_CONFIG_DIR, XDG_CONFIG_HOME } from "@/src/env"
import { CommandResult } from "@/src/commands/types"
import { logInstallComplete, logInstallStart, printReport, type ReportSummary } from "@/src/ui/report"

export interface RunOptions {
	/** Overrides `concurrency` from the config file */
	concurrency?: number
	fetch?: FetchLike
}

export function defaultConfigPath(): string {
	return resolveConfigPath({
		appData: APPDATA,
		configDir: STRAND_CONFIG_DIR,
		homeDir: homedir(),
		platform: process.platform,
		xdgConfigHome: XDG_CONFIG_HOME,
	})
}

export function buildInstallOptions(
	config: StrandConfig,
	options: RunOptions,
): InstallOptions {
	return {
		concurrency: options.concurrency ?? config.concurrency,
		fetch: options.fetch,
		onComplete: logInstallComplete,
		onStart: logInstallStart,
		timeoutMs: config.timeoutMs,
	}
}

export function finishInstall(result: InstallAllResult): CommandResult<ReportSummary> {
	if (!result.ok) {
		return CommandResult.failed(result.error.message)
	}

	return CommandResult.completed(printReport(result.value))
}

/**
 * Map a finished command onto the process exit code: non-zero when the run could
 * not start or any plugin failed.
 */
export function reportCommandResult(
	result: CommandResult<ReportSummary>,
	failureLabel: string,
): void {
	if (result.status === "failed") {
		consola.error(result.message)
		consola.error(failureLabel)
		process.exitCode = 1
		return
	}

	if (result.value.failed > 0) {
		process.exitCode = 1
	}
}
