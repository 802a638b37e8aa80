import type { ArchiveUrl, DestName, NonEmptyString } from "./branded"

export type GitProvider = "github" | "gitlab" | "bitbucket"

/**
 * What a config file or the command line may hold for one plugin.
 * Strings are parsed as `[provider@]owner/repo[:ref]` or as an archive URL.
 */
export type RawPluginDeclaration = string | { git: string } | { archive: string }

export interface GitPlugin {
	readonly type: "git"
	readonly provider: GitProvider
	readonly owner: NonEmptyString
	readonly repo: NonEmptyString
	/** Branch, tag or commit. Absent means the provider's default branch. */
	readonly ref?: NonEmptyString
}

export interface ArchivePlugin {
	readonly type: "archive"
	readonly url: ArchiveUrl
}

export type PluginSpec = GitPlugin | ArchivePlugin

export interface ResolvedPlugin {
	readonly archiveUrl: ArchiveUrl
	readonly destName: DestName
}
