import { chmod, mkdir, open } from "node:fs/promises"
import path from "node:path"
import type { Readable } from "node:stream"
import { createGunzip } from "node:zlib"
import * as tar from "tar-stream"
import type {
	ArchiveExtractError,
	ArchiveExtractResult,
	ExtractSummary,
} from "@/src/core/archive/types"
import { formatError } from "@/src/utils/errors"

const EXECUTABLE_FILE_MODE = 0o755
const REGULAR_FILE_MODE = 0o644

// Metadata records; tar-stream folds most of them into the next header itself.
const SKIPPED_ENTRY_TYPES: ReadonlySet<string> = new Set([
	"pax-header",
	"pax-global-header",
	"gnu-long-path",
	"gnu-long-link-path",
])

type EntryResult = { ok: true } | { ok: false; error: ArchiveExtractError }

type EntryPlan =
	| { ok: true; value: { kind: "skip" } | { kind: "write"; target: string } }
	| { ok: false; error: ArchiveExtractError }

interface ExtractState {
	destDir: string
	directories: number
	files: number
	wrapper: string | null
}

/**
 * Gunzip and unpack a tarball into destDir, dropping the single top-level
 * directory that hosting providers wrap source archives in.
 *
 * Entries that are absolute, contain `..`, or sit outside the wrapper fail the
 * whole extraction, as do links and special files. A failing source stream is
 * reported as `download_interrupted`, separate from bad archive data.
 * Whatever was already written stays in destDir; callers extract into a
 * staging directory.
 */
export function extractArchive(
	source: Readable,
	destDir: string,
): Promise<ArchiveExtractResult> {
	const state: ExtractState = {
		destDir: path.resolve(destDir),
		directories: 0,
		files: 0,
		wrapper: null,
	}

	return new Promise((resolve) => {
		const gunzip = createGunzip()
		const extract = tar.extract()
		let settled = false

		const settle = (result: ArchiveExtractResult): void => {
			if (settled) {
				return
			}
			settled = true
			if (!result.ok) {
				source.unpipe(gunzip)
				gunzip.unpipe(extract)
				source.destroy()
				gunzip.destroy()
				extract.destroy()
			}
			resolve(result)
		}

		const corrupt = (label: string) => (error: unknown) => {
			settle(failure("corrupt_archive", `${label}: ${formatError(error)}`))
		}

		source.on("error", (error: unknown) => {
			settle(
				failure(
					"download_interrupted",
					`Archive download was interrupted: ${formatError(error)}`,
				),
			)
		})
		gunzip.on("error", corrupt("Invalid gzip data"))
		extract.on("error", corrupt("Invalid tar data"))

		extract.on("entry", (header, stream, next) => {
			handleEntry(header, stream, state).then(
				(result) => {
					if (!result.ok) {
						settle(result)
						return
					}
					next()
				},
				(error: unknown) => {
					settle(failure("unexpected", formatError(error), header.name))
				},
			)
		})

		extract.on("finish", () => {
			const summary: ExtractSummary = {
				directories: state.directories,
				files: state.files,
				wrapper: state.wrapper,
			}
			settle({ ok: true, value: summary })
		})

		source.pipe(gunzip).pipe(extract)
	})
}

async function handleEntry(
	header: tar.Headers,
	stream: Readable,
	state: ExtractState,
): Promise<EntryResult> {
	const type = header.type ?? "file"
	if (SKIPPED_ENTRY_TYPES.has(type)) {
		await discard(stream)
		return { ok: true }
	}

	const plan = planEntry(header.name, type === "directory", state)
	if (!plan.ok) {
		return plan
	}

	if (plan.value.kind === "skip") {
		await discard(stream)
		return { ok: true }
	}

	switch (type) {
		case "directory":
			await discard(stream)
			return createDirectory(plan.value.target, header.name, state)
		case "file":
		case "contiguous-file":
			return writeFile(plan.value.target, header, stream, state)
		case "symlink":
		case "link":
			return failure(
				"unsupported_entry",
				`Archive entry ${header.name} is a link; links are not extracted.`,
				header.name,
			)
		default:
			return failure(
				"unsupported_entry",
				`Archive entry ${header.name} has unsupported type ${type}.`,
				header.name,
			)
	}
}

/**
 * Map an entry name to its location under destDir with the wrapper removed.
 */
export function planEntry(
	name: string,
	isDirectory: boolean,
	state: Pick<ExtractState, "destDir" | "wrapper">,
): EntryPlan {
	const normalized = name.replace(/\\/g, "/")
	if (normalized.startsWith("/") || /^[a-zA-Z]:\//.test(normalized)) {
		return failure(
			"path_traversal",
			`Archive entry ${name} has an absolute path.`,
			name,
		)
	}

	const segments = normalized
		.split("/")
		.filter((segment) => segment !== "" && segment !== ".")
	if (segments.includes("..")) {
		return failure(
			"path_traversal",
			`Archive entry ${name} points outside the plugin directory.`,
			name,
		)
	}

	const [wrapper, ...rest] = segments
	if (!wrapper) {
		return isDirectory
			? { ok: true, value: { kind: "skip" } }
			: failure("missing_wrapper", `Archive entry ${name} has an empty path.`, name)
	}

	if (state.wrapper === null) {
		state.wrapper = wrapper
	} else if (state.wrapper !== wrapper) {
		return failure(
			"missing_wrapper",
			`Archive has more than one top-level entry (${state.wrapper}, ${wrapper}).`,
			name,
		)
	}

	if (rest.length === 0) {
		return isDirectory
			? { ok: true, value: { kind: "skip" } }
			: failure(
					"missing_wrapper",
					`Archive entry ${name} is not inside a top-level directory.`,
					name,
				)
	}

	const target = path.join(state.destDir, ...rest)
	const relative = path.relative(state.destDir, target)
	if (!relative || relative.startsWith("..") || path.isAbsolute(relative)) {
		return failure(
			"path_traversal",
			`Archive entry ${name} points outside the plugin directory.`,
			name,
		)
	}

	return { ok: true, value: { kind: "write", target } }
}

async function createDirectory(
	target: string,
	entryName: string,
	state: ExtractState,
): Promise<EntryResult> {
	try {
		await mkdir(target, { recursive: true })
	} catch (error) {
		return failure("io_error", formatError(error), entryName)
	}

	state.directories += 1
	return { ok: true }
}

async function writeFile(
	target: string,
	header: tar.Headers,
	stream: Readable,
	state: ExtractState,
): Promise<EntryResult> {
	const mode = fileMode(header.mode)

	try {
		await mkdir(path.dirname(target), { recursive: true })
		const handle = await open(target, "w", mode)
		try {
			for await (const chunk of stream) {
				await handle.write(chunk)
			}
		} finally {
			await handle.close()
		}
		// open() is subject to the umask.
		await chmod(target, mode)
	} catch (error) {
		return failure("io_error", formatError(error), header.name)
	}

	state.files += 1
	return { ok: true }
}

export function fileMode(archiveMode: number | undefined): number {
	if (archiveMode !== undefined && (archiveMode & 0o111) !== 0) {
		return EXECUTABLE_FILE_MODE
	}

	return REGULAR_FILE_MODE
}

async function discard(stream: Readable): Promise<number> {
	let bytes = 0
	for await (const chunk of stream) {
		bytes += Buffer.byteLength(chunk)
	}
	return bytes
}

function failure(
	type: ArchiveExtractError["type"],
	message: string,
	entry?: string,
): { ok: false; error: ArchiveExtractError } {
	return {
		error: {
			entry,
			message,
			type,
		},
		ok: false,
	}
}
