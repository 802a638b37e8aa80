import path from "node:path"
import { coerceAbsolutePath, type PluginSpec, parsePluginDeclaration } from "@strand/core"
import { parse, TomlError } from "smol-toml"
import { z } from "zod"
import { expandHome } from "@/src/core/config/paths"
import type {
	ConfigError,
	ConfigResult,
	ConfigStage,
	StrandConfig,
} from "@/src/core/config/types"
import { readFileUtf8 } from "@/src/core/io/fs"
import { formatError } from "@/src/utils/errors"

const trimmedString = z
	.string()
	.transform((value) => value.trim())
	.refine((value) => value.length > 0, { message: "Must not be empty." })

// Node timers overflow past 2^31 - 1 ms and then fire almost immediately.
const MAX_TIMEOUT_SECONDS = 2_147_483

const pluginSchema = z.union([
	z.string(),
	z.object({ git: z.string() }).strict(),
	z.object({ archive: z.string() }).strict(),
])

const configSchema = z
	.object({
		concurrency: z.number().int().positive().optional(),
		plugin_dir: trimmedString,
		plugins: z.array(pluginSchema).default([]),
		timeout_seconds: z.number().positive().max(MAX_TIMEOUT_SECONDS).optional(),
	})
	.strict()

/**
 * Read and parse the config file at configPath.
 */
export async function loadConfig(
	configPath: string,
	homeDir: string,
): Promise<ConfigResult<StrandConfig>> {
	const contents = await readFileUtf8(configPath)
	if (!contents.ok) {
		return failure(
			"read",
			`Unable to read config file ${configPath}: ${contents.error.message}`,
			configPath,
		)
	}

	return parseConfig(contents.value, configPath, homeDir)
}

/**
 * Parse config.toml contents. `plugin_dir` may start with `~`; a relative path is
 * taken relative to the config file's directory.
 */
export function parseConfig(
	contents: string,
	configPath: string,
	homeDir: string,
): ConfigResult<StrandConfig> {
	let raw: unknown
	try {
		raw = parse(contents)
	} catch (error) {
		const detail = error instanceof TomlError ? error.message : formatError(error)
		return failure("parse", `Invalid TOML in ${configPath}: ${detail}`, configPath)
	}

	const parsed = configSchema.safeParse(raw)
	if (!parsed.success) {
		const issue = parsed.error.issues[0]
		const field = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : ""
		const message = issue ? issue.message : "Invalid config."
		return failure("validate", `${field}${message}`, configPath)
	}

	const configDir = path.dirname(path.resolve(configPath))
	const absoluteConfigPath = coerceAbsolutePath(configPath, process.cwd())
	const pluginDir = coerceAbsolutePath(
		expandHome(parsed.data.plugin_dir, homeDir),
		configDir,
	)
	if (!absoluteConfigPath || !pluginDir) {
		return failure("validate", "plugin_dir must not be empty.", configPath)
	}

	const plugins = parsePlugins(parsed.data.plugins, configPath)
	if (!plugins.ok) {
		return plugins
	}

	return {
		ok: true,
		value: {
			concurrency: parsed.data.concurrency,
			configPath: absoluteConfigPath,
			pluginDir,
			plugins: plugins.value,
			timeoutMs:
				parsed.data.timeout_seconds === undefined
					? undefined
					: Math.round(parsed.data.timeout_seconds * 1000),
		},
	}
}

function parsePlugins(
	declarations: z.infer<typeof pluginSchema>[],
	configPath: string,
): ConfigResult<PluginSpec[]> {
	const plugins: PluginSpec[] = []

	for (const [index, declaration] of declarations.entries()) {
		const result = parsePluginDeclaration(declaration)
		if (!result.ok) {
			return failure(
				"validate",
				`plugins[${index}]: ${result.error.message}`,
				configPath,
				index,
			)
		}
		plugins.push(result.value)
	}

	return { ok: true, value: plugins }
}

function failure(
	stage: ConfigStage,
	message: string,
	configPath: string,
	index?: number,
): { ok: false; error: ConfigError } {
	return {
		error: {
			index,
			message,
			path: configPath,
			stage,
			type: "config",
		},
		ok: false,
	}
}
