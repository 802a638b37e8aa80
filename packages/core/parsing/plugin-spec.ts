import { archiveDestName } from "../resolve/archive-url"
import {
	coerceArchiveUrl,
	coerceDestName,
	coerceGitProvider,
	coerceNonEmpty,
} from "../types/coerce"
import type { Result } from "../types/error"
import type {
	ArchivePlugin,
	GitPlugin,
	GitProvider,
	PluginSpec,
	RawPluginDeclaration,
} from "../types/plugin"

const URL_SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:\/\//i
const GIT_FORM = "[provider@]owner/repo[:ref]"

/**
 * Parse a plugin declaration from a config file or the command line.
 */
export function parsePluginDeclaration(raw: RawPluginDeclaration): Result<PluginSpec> {
	if (typeof raw === "string") {
		return parsePluginString(raw)
	}

	if ("git" in raw) {
		return parseGitPlugin(raw.git)
	}

	return parseArchivePlugin(raw.archive)
}

/**
 * Strings that start with a URL scheme are archive plugins; everything else is
 * read as `[provider@]owner/repo[:ref]`.
 */
export function parsePluginString(input: string): Result<PluginSpec> {
	const trimmed = input.trim()
	if (!trimmed) {
		return invalid("plugin", "Plugin must not be empty.")
	}

	if (URL_SCHEME_PATTERN.test(trimmed)) {
		return parseArchivePlugin(trimmed)
	}

	return parseGitPlugin(trimmed)
}

export function parseGitPlugin(input: string): Result<GitPlugin> {
	const trimmed = input.trim()
	if (!trimmed) {
		return invalid("git", "Git plugin must not be empty.")
	}

	if (URL_SCHEME_PATTERN.test(trimmed)) {
		return invalid(
			"git",
			`Git plugin "${trimmed}" must be in the form ${GIT_FORM}, not a URL.`,
		)
	}

	let provider: GitProvider = "github"
	let rest = trimmed
	const at = rest.indexOf("@")
	const firstSlash = rest.indexOf("/")
	if (at !== -1 && (firstSlash === -1 || at < firstSlash)) {
		const providerName = rest.slice(0, at)
		const coerced = coerceGitProvider(providerName)
		if (!coerced) {
			return invalid(
				"provider",
				`Git provider ${providerName} not recognised -- try 'github', 'gitlab' or 'bitbucket' instead.`,
			)
		}
		provider = coerced
		rest = rest.slice(at + 1)
	}

	let ref: GitPlugin["ref"]
	const colon = rest.indexOf(":")
	if (colon !== -1) {
		const rawRef = rest.slice(colon + 1)
		const coercedRef = coerceNonEmpty(rawRef)
		if (!coercedRef) {
			return invalid("ref", `Git plugin "${trimmed}" has an empty ref after ':'.`)
		}
		ref = coercedRef
		rest = rest.slice(0, colon)
	}

	const slash = rest.lastIndexOf("/")
	if (slash === -1) {
		return invalid("owner", `Git plugin "${trimmed}" must be in the form ${GIT_FORM}.`)
	}

	const owner = coerceNonEmpty(rest.slice(0, slash))
	const rawRepo = rest.slice(slash + 1).trim()
	const repo = coerceNonEmpty(rawRepo.endsWith(".git") ? rawRepo.slice(0, -4) : rawRepo)
	if (!owner || !repo) {
		return invalid("owner", `Git plugin "${trimmed}" must be in the form ${GIT_FORM}.`)
	}

	// Only GitLab has nested groups.
	if (provider !== "gitlab" && owner.includes("/")) {
		return invalid(
			"owner",
			`Git plugin "${trimmed}" has a nested owner, which only GitLab supports.`,
		)
	}

	if (!coerceDestName(repo)) {
		return invalid("repo", `Git plugin "${trimmed}" has an invalid repository name.`)
	}

	const plugin: GitPlugin = ref
		? { owner, provider, ref, repo, type: "git" }
		: { owner, provider, repo, type: "git" }
	return { ok: true, value: plugin }
}

export function parseArchivePlugin(input: string): Result<ArchivePlugin> {
	const url = coerceArchiveUrl(input)
	if (!url) {
		return invalid("archive", `Archive URL "${input.trim()}" must be an http(s) URL.`)
	}

	if (!archiveDestName(url)) {
		return invalid(
			"archive",
			`Archive URL "${url}" has no file name to name the plugin directory after.`,
		)
	}

	return { ok: true, value: { type: "archive", url } }
}

function invalid(field: string, message: string): Result<never> {
	return {
		error: {
			field,
			message,
			source: "manual",
			type: "validation",
		},
		ok: false,
	}
}
