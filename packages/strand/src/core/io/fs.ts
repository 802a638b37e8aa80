import { lstat, mkdir, readFile, rename, rm } from "node:fs/promises"
import type { IoResult } from "@/src/core/io/types"
import { ioFailure } from "@/src/core/io/types"
import { formatError, isErrnoCode } from "@/src/utils/errors"

export type { IoError, IoResult } from "@/src/core/io/types"

type LStatResult = IoResult<Awaited<ReturnType<typeof lstat>> | null>

export async function safeLstat(targetPath: string): Promise<LStatResult> {
	try {
		const stats = await lstat(targetPath)
		return { ok: true, value: stats }
	} catch (error) {
		if (isErrnoCode(error, "ENOENT")) {
			return { ok: true, value: null }
		}

		return ioFailure("lstat", targetPath, formatError(error))
	}
}

export async function ensureDir(targetPath: string): Promise<IoResult<void>> {
	const stats = await safeLstat(targetPath)
	if (!stats.ok) {
		return stats
	}

	if (stats.value && !stats.value.isDirectory()) {
		return ioFailure("mkdir", targetPath, `Expected directory at ${targetPath}.`)
	}

	if (!stats.value) {
		try {
			await mkdir(targetPath, { recursive: true })
		} catch (error) {
			return ioFailure("mkdir", targetPath, formatError(error))
		}
	}

	return { ok: true, value: undefined }
}

/**
 * Remove whatever is at targetPath (file, symlink or directory tree) and create
 * an empty directory in its place.
 */
export async function resetDir(targetPath: string): Promise<IoResult<void>> {
	const removed = await removePath(targetPath)
	if (!removed.ok) {
		return removed
	}

	try {
		await mkdir(targetPath, { recursive: true })
		return { ok: true, value: undefined }
	} catch (error) {
		return ioFailure("mkdir", targetPath, formatError(error))
	}
}

export async function readFileUtf8(targetPath: string): Promise<IoResult<string>> {
	try {
		const contents = await readFile(targetPath, "utf8")
		return { ok: true, value: contents }
	} catch (error) {
		return ioFailure("readFile", targetPath, formatError(error))
	}
}

export async function removePath(targetPath: string): Promise<IoResult<void>> {
	try {
		await rm(targetPath, { force: true, recursive: true })
		return { ok: true, value: undefined }
	} catch (error) {
		return ioFailure("rm", targetPath, formatError(error))
	}
}

export async function movePath(from: string, to: string): Promise<IoResult<void>> {
	try {
		await rename(from, to)
		return { ok: true, value: undefined }
	} catch (error) {
		return ioFailure("rename", to, formatError(error))
	}
}
