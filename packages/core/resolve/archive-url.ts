/**
 * Archive URL resolution
 *
 * Maps a plugin spec to the URL of a gzip-compressed tarball and the name of the
 * directory it is installed into. Pure: no IO, never fails.
 */

import { DEFAULT_GIT_REF, FALLBACK_DEST_NAME } from "../constants"
import type { ArchiveUrl, DestName } from "../types/branded"
import { coerceDestName } from "../types/coerce"
import type { GitPlugin, PluginSpec, ResolvedPlugin } from "../types/plugin"

const ARCHIVE_EXTENSIONS = [".tar.gz", ".tgz", ".tar"] as const

export function resolvePlugin(spec: PluginSpec): ResolvedPlugin {
	switch (spec.type) {
		case "git":
			return {
				archiveUrl: buildGitArchiveUrl(spec),
				destName: gitDestName(spec),
			}
		case "archive":
			return {
				archiveUrl: spec.url,
				destName: archiveDestName(spec.url) ?? FALLBACK_DEST_NAME,
			}
	}
}

export function buildGitArchiveUrl(spec: GitPlugin): ArchiveUrl {
	const owner = encodePathSegments(spec.owner)
	const repo = encodeURIComponent(spec.repo)
	const ref = spec.ref ?? DEFAULT_GIT_REF
	const refPath = encodePathSegments(ref)

	switch (spec.provider) {
		case "github":
			return `https://codeload.github.com/${owner}/${repo}/tar.gz/${refPath}` as ArchiveUrl
		case "gitlab": {
			// GitLab names the file after the ref with slashes flattened to dashes.
			const fileRef = encodeURIComponent(ref.replace(/\//g, "-"))
			return `https://gitlab.com/${owner}/${repo}/-/archive/${refPath}/${repo}-${fileRef}.tar.gz` as ArchiveUrl
		}
		case "bitbucket":
			return `https://bitbucket.org/${owner}/${repo}/get/${refPath}.tar.gz` as ArchiveUrl
	}
}

/**
 * Directory name for an archive plugin: the last non-empty path segment of the
 * URL without its archive extension. Null when nothing usable remains.
 */
export function archiveDestName(url: string): DestName | null {
	let pathname: string
	try {
		pathname = new URL(url).pathname
	} catch {
		return null
	}

	const segments = pathname.split("/").filter((segment) => segment.length > 0)
	const last = segments.at(-1)
	if (!last) {
		return null
	}

	let decoded: string
	try {
		decoded = decodeURIComponent(last)
	} catch {
		decoded = last
	}

	return coerceDestName(stripArchiveExtension(decoded))
}

export function describePlugin(spec: PluginSpec): string {
	switch (spec.type) {
		case "git": {
			const provider = spec.provider === "github" ? "" : `${spec.provider}@`
			const ref = spec.ref ? `:${spec.ref}` : ""
			return `${provider}${spec.owner}/${spec.repo}${ref}`
		}
		case "archive":
			return spec.url
	}
}

function gitDestName(spec: GitPlugin): DestName {
	return coerceDestName(spec.repo) ?? FALLBACK_DEST_NAME
}

function stripArchiveExtension(name: string): string {
	const lower = name.toLowerCase()
	for (const extension of ARCHIVE_EXTENSIONS) {
		if (lower.endsWith(extension)) {
			return name.slice(0, -extension.length)
		}
	}

	return name
}

function encodePathSegments(value: string): string {
	return value
		.split("/")
		.map((segment) => encodeURIComponent(segment))
		.join("/")
}
