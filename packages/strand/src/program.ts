import { Command } from "commander"
import { consola } from "consola"
import { installCommand } from "@/src/commands/install"
import { defaultConfigPath } from "@/src/commands/shared"
import { syncCommand } from "@/src/commands/sync"

interface ProgramOptions {
	configLocation?: boolean
	concurrency?: string
}

/**
 * Build the strand command tree. `strand` on its own syncs; anything it does not
 * recognise is an error, never a sync.
 */
export function createProgram(): Command {
	const program = new Command()

	program
		.name("strand")
		.description("Install editor plugins from Git hosts and tarballs")
		.option("--config-location", "Print the config file location and exit")
		.option("--concurrency <count>", "Plugins to install at the same time")
		.allowExcessArguments(false)
		.showHelpAfterError()
		.showSuggestionAfterError()

	program.action(async () => {
		const options = program.opts<ProgramOptions>()
		if (options.configLocation) {
			console.log(defaultConfigPath())
			return
		}

		const concurrency = parseConcurrency(options.concurrency)
		if (concurrency === null) {
			return
		}
		await syncCommand({ concurrency })
	})

	program
		.command("sync")
		.description("Clear the plugin directory and install every configured plugin")
		.allowExcessArguments(false)
		.action(async () => {
			const concurrency = parseConcurrency(program.opts<ProgramOptions>().concurrency)
			if (concurrency === null) {
				return
			}
			await syncCommand({ concurrency })
		})

	program
		.command("install")
		.description("Install plugins without adding them to the config file")
		.argument("<plugins...>", "[provider@]owner/repo[:ref] or archive URL")
		.action(async (plugins: string[]) => {
			const concurrency = parseConcurrency(program.opts<ProgramOptions>().concurrency)
			if (concurrency === null) {
				return
			}
			await installCommand(plugins, { concurrency })
		})

	return program
}

/**
 * Undefined when the flag was not given, null (after reporting) when invalid.
 */
function parseConcurrency(value: string | undefined): number | undefined | null {
	if (value === undefined) {
		return undefined
	}

	const count = Number(value)
	if (!Number.isInteger(count) || count <= 0) {
		consola.error("--concurrency must be a positive integer.")
		process.exitCode = 1
		return null
	}

	return count
}
