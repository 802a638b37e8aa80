import { homedir } from "node:os"
import { consola } from "consola"
import { loadConfig } from "@/src/core/config/parse"
import type { StrandConfig } from "@/src/core/config/types"
import { installAll } from "@/src/core/install/coordinator"
import {
	buildInstallOptions,
	defaultConfigPath,
	finishInstall,
	type RunOptions,
	reportCommandResult,
} from "@/src/commands/shared"
import { CommandResult } from "@/src/commands/types"
import type { ReportSummary } from "@/src/ui/report"
import { formatError } from "@/src/utils/errors"

export async function syncCommand(options: RunOptions): Promise<void> {
	consola.info("strand sync")

	try {
		const config = await loadConfig(defaultConfigPath(), homedir())
		if (!config.ok) {
			reportCommandResult(
				CommandResult.failed(`[${config.error.stage}] ${config.error.message}`),
				"Sync failed.",
			)
			return
		}

		reportCommandResult(await syncWithConfig(config.value, options), "Sync failed.")
	} catch (error) {
		reportCommandResult(CommandResult.failed(formatError(error)), "Sync failed.")
	}
}

/**
 * Clear the configured plugin directory and install every configured plugin.
 */
export async function syncWithConfig(
	config: StrandConfig,
	options: RunOptions,
): Promise<CommandResult<ReportSummary>> {
	consola.start(
		`Installing ${config.plugins.length} plugin(s) into ${config.pluginDir}...`,
	)

	const result = await installAll(
		config.plugins,
		config.pluginDir,
		buildInstallOptions(config, options),
	)
	return finishInstall(result)
}
