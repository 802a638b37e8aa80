import path from "node:path"
import { CONFIG_DIRNAME, CONFIG_FILENAME } from "@strand/core"
import type { ConfigLocationEnv } from "@/src/core/config/types"

/**
 * Where strand keeps its config:
 * $STRAND_CONFIG_DIR, then $XDG_CONFIG_HOME/strand, then the platform default
 * (%APPDATA%\strand on Windows, ~/.config/strand elsewhere).
 */
export function resolveConfigDir(env: ConfigLocationEnv): string {
	if (env.configDir) {
		return path.resolve(expandHome(env.configDir, env.homeDir))
	}

	if (env.xdgConfigHome) {
		return path.join(path.resolve(env.xdgConfigHome), CONFIG_DIRNAME)
	}

	if (env.platform === "win32" && env.appData) {
		return path.join(env.appData, CONFIG_DIRNAME)
	}

	return path.join(env.homeDir, ".config", CONFIG_DIRNAME)
}

export function resolveConfigPath(env: ConfigLocationEnv): string {
	return path.join(resolveConfigDir(env), CONFIG_FILENAME)
}

/**
 * Replace a leading `~` with the home directory. `~user` forms are left alone.
 */
export function expandHome(value: string, homeDir: string): string {
	if (value === "~") {
		return homeDir
	}

	if (value.startsWith("~/") || value.startsWith("~\\")) {
		return path.join(homeDir, value.slice(2))
	}

	return value
}
