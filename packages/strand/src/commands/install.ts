import { homedir } from "node:os"
import { type PluginSpec, parsePluginString } from "@strand/core"
import { consola } from "consola"
import { loadConfig } from "@/src/core/config/parse"
import type { StrandConfig } from "@/src/core/config/types"
import { installInto } from "@/src/core/install/coordinator"
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

export async function installCommand(
	plugins: string[],
	options: RunOptions,
): Promise<void> {
	consola.info("strand install")

	try {
		const config = await loadConfig(defaultConfigPath(), homedir())
		if (!config.ok) {
			reportCommandResult(
				CommandResult.failed(`[${config.error.stage}] ${config.error.message}`),
				"Install failed.",
			)
			return
		}

		reportCommandResult(
			await installWithConfig(plugins, config.value, options),
			"Install failed.",
		)
	} catch (error) {
		reportCommandResult(CommandResult.failed(formatError(error)), "Install failed.")
	}
}

/**
 * Install the given plugins into the configured plugin directory without
 * clearing it and without touching the config file.
 */
export async function installWithConfig(
	plugins: string[],
	config: StrandConfig,
	options: RunOptions,
): Promise<CommandResult<ReportSummary>> {
	const specs: PluginSpec[] = []
	for (const input of plugins) {
		const parsed = parsePluginString(input)
		if (!parsed.ok) {
			return CommandResult.failed(parsed.error.message)
		}
		specs.push(parsed.value)
	}

	if (specs.length === 0) {
		return CommandResult.failed("No plugins given.")
	}

	consola.start(`Installing ${specs.length} plugin(s) into ${config.pluginDir}...`)

	const result = await installInto(
		specs,
		config.pluginDir,
		buildInstallOptions(config, options),
	)
	return finishInstall(result)
}
