/**
 * Shared constants for plugin resolution and installation.
 */

import type { DestName } from "./types/branded"

/** Ref requested when a Git plugin does not name one; providers map it to the default branch */
export const DEFAULT_GIT_REF = "HEAD"

/** Directory name used only when a URL yields no usable segment */
export const FALLBACK_DEST_NAME = "archive" as DestName

/** Config file inside the strand config directory */
export const CONFIG_FILENAME = "config.toml"

/** Name of the strand config directory under the XDG config home */
export const CONFIG_DIRNAME = "strand"

/** Prefix of staging directories created inside the plugin directory */
export const STAGING_PREFIX = "."
