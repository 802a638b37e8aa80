import { mkdtemp } from "node:fs/promises"
import path from "node:path"
import { removePath } from "@/src/core/io/fs"
import type { IoResult } from "@/src/core/io/types"
import { ioFailure } from "@/src/core/io/types"
import { formatError } from "@/src/utils/errors"

/**
 * Create a uniquely named directory inside parentDir. Staging directories live next
 * to their final location so the last step is a same-filesystem rename.
 */
export async function createStagingDir(
	parentDir: string,
	prefix: string,
): Promise<IoResult<string>> {
	const safePrefix = prefix.endsWith("-") ? prefix : `${prefix}-`
	const base = path.join(parentDir, safePrefix)

	try {
		const dir = await mkdtemp(base)
		return { ok: true, value: dir }
	} catch (error) {
		return ioFailure("mkdtemp", base, formatError(error))
	}
}

export async function cleanupStagingDir(targetPath: string): Promise<IoResult<void>> {
	return removePath(targetPath)
}
