import path from "node:path"
import type { AbsolutePath, ArchiveUrl, DestName, NonEmptyString } from "./branded"
import type { GitProvider } from "./plugin"

export const VALID_GIT_PROVIDERS: ReadonlyArray<GitProvider> = [
	"github",
	"gitlab",
	"bitbucket",
] as const

export function coerceGitProvider(value: string): GitProvider | null {
	const trimmed = value.trim().toLowerCase()
	return VALID_GIT_PROVIDERS.find((provider) => provider === trimmed) ?? null
}

export function coerceNonEmpty(value: string): NonEmptyString | null {
	const trimmed = value.trim()
	if (trimmed.length === 0) return null
	return trimmed as NonEmptyString
}

export function coerceAbsolutePath(
	value: string,
	basePath?: string,
): AbsolutePath | null {
	const trimmed = value.trim()
	if (trimmed.length === 0) return null

	let resolved: string
	if (path.isAbsolute(trimmed)) {
		resolved = path.normalize(trimmed)
	} else if (basePath) {
		resolved = path.resolve(basePath, trimmed)
	} else {
		return null
	}

	return resolved as AbsolutePath
}

export function coerceArchiveUrl(value: string): ArchiveUrl | null {
	const trimmed = value.trim()
	if (trimmed.length === 0) return null

	let parsed: URL
	try {
		parsed = new URL(trimmed)
	} catch {
		return null
	}

	if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
		return null
	}

	return parsed.href as ArchiveUrl
}

const DEST_NAME_INVALID_CHARS = /[/\\\0]/

export function coerceDestName(value: string): DestName | null {
	const trimmed = value.trim()
	if (trimmed.length === 0) return null
	if (trimmed === "." || trimmed === "..") return null
	if (DEST_NAME_INVALID_CHARS.test(trimmed)) return null
	return trimmed as DestName
}
