/**
 * @strand/core
 *
 * Plugin specs, their parsing, and archive URL resolution. Pure, no IO.
 */

export {
	CONFIG_DIRNAME,
	CONFIG_FILENAME,
	DEFAULT_GIT_REF,
	FALLBACK_DEST_NAME,
	STAGING_PREFIX,
} from "./constants"
export {
	parseArchivePlugin,
	parseGitPlugin,
	parsePluginDeclaration,
	parsePluginString,
} from "./parsing/plugin-spec"
export {
	archiveDestName,
	buildGitArchiveUrl,
	describePlugin,
	resolvePlugin,
} from "./resolve/archive-url"
export type {
	AbsolutePath,
	ArchiveUrl,
	DestName,
	NonEmptyString,
} from "./types/branded"
export {
	coerceAbsolutePath,
	coerceArchiveUrl,
	coerceDestName,
	coerceGitProvider,
	coerceNonEmpty,
	VALID_GIT_PROVIDERS,
} from "./types/coerce"
export type { BaseError, CoreError, Result, ValidationError } from "./types/error"
export type {
	ArchivePlugin,
	GitPlugin,
	GitProvider,
	PluginSpec,
	RawPluginDeclaration,
	ResolvedPlugin,
} from "./types/plugin"
