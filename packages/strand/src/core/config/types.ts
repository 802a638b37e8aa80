import type { AbsolutePath, BaseError, PluginSpec } from "@strand/core"

export interface StrandConfig {
	readonly configPath: AbsolutePath
	readonly pluginDir: AbsolutePath
	readonly plugins: readonly PluginSpec[]
	readonly concurrency?: number
	readonly timeoutMs?: number
}

export type ConfigStage = "read" | "parse" | "validate"

export interface ConfigError extends BaseError {
	readonly type: "config"
	readonly stage: ConfigStage
	readonly path: string
	/** Position in `plugins` of the entry that failed to parse */
	readonly index?: number
}

export type ConfigResult<T> = { ok: true; value: T } | { ok: false; error: ConfigError }

export interface ConfigLocationEnv {
	configDir?: string
	xdgConfigHome?: string
	appData?: string
	homeDir: string
	platform: NodeJS.Platform
}
