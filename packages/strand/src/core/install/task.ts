import path from "node:path"
import {
	type AbsolutePath,
	describePlugin,
	type PluginSpec,
	type ResolvedPlugin,
	STAGING_PREFIX,
} from "@strand/core"
import { extractArchive } from "@/src/core/archive/extract"
import { fetchArchive } from "@/src/core/archive/fetch"
import type { ArchiveExtractError } from "@/src/core/archive/types"
import { movePath, removePath } from "@/src/core/io/fs"
import { cleanupStagingDir, createStagingDir } from "@/src/core/io/temp"
import type { InstallOutcome, InstallTaskOptions } from "@/src/core/install/types"
import { formatError } from "@/src/utils/errors"

type ExtractFailedOutcome = Extract<InstallOutcome, { status: "extract_failed" }>
type FailedOutcome = Extract<InstallOutcome, { status: "fetch_failed" | "extract_failed" }>

/**
 * Fetch one plugin's archive and unpack it into pluginDir/<destName>.
 *
 * The archive is extracted into a hidden staging directory next to the
 * destination and renamed into place only once extraction has succeeded, so a
 * failed plugin leaves nothing behind. Never rejects.
 */
export async function runInstallTask(
	spec: PluginSpec,
	resolved: ResolvedPlugin,
	pluginDir: AbsolutePath,
	options: InstallTaskOptions = {},
): Promise<InstallOutcome> {
	try {
		return await installPlugin(resolved, pluginDir, options)
	} catch (error) {
		return extractFailed({
			message: `Unexpected failure installing ${describePlugin(spec)}: ${formatError(error)}`,
			type: "unexpected",
		})
	}
}

async function installPlugin(
	resolved: ResolvedPlugin,
	pluginDir: AbsolutePath,
	options: InstallTaskOptions,
): Promise<InstallOutcome> {
	const fetched = await fetchArchive(resolved.archiveUrl, {
		fetch: options.fetch,
		timeoutMs: options.timeoutMs,
	})
	if (!fetched.ok) {
		return { error: fetched.error, status: "fetch_failed" }
	}

	const staging = await createStagingDir(pluginDir, `${STAGING_PREFIX}${resolved.destName}`)
	if (!staging.ok) {
		fetched.value.destroy()
		return extractFailed({ message: staging.error.message, type: "io_error" })
	}

	const extracted = await extractArchive(fetched.value, staging.value)
	if (!extracted.ok) {
		return discardStaging(staging.value, extractionOutcome(extracted.error, resolved))
	}

	const destination = path.join(pluginDir, resolved.destName)

	// `strand install` writes into a populated directory and replaces the old copy.
	const cleared = await removePath(destination)
	if (!cleared.ok) {
		return discardStaging(
			staging.value,
			extractFailed({ message: cleared.error.message, type: "io_error" }),
		)
	}

	const moved = await movePath(staging.value, destination)
	if (!moved.ok) {
		return discardStaging(
			staging.value,
			extractFailed({ message: moved.error.message, type: "io_error" }),
		)
	}

	return { destination, status: "installed" }
}

/**
 * A body that stopped arriving is a download failure even though it surfaced
 * while extracting.
 */
function extractionOutcome(
	error: ArchiveExtractError,
	resolved: ResolvedPlugin,
): FailedOutcome {
	if (error.type === "download_interrupted") {
		return {
			error: { message: error.message, type: "network", url: resolved.archiveUrl },
			status: "fetch_failed",
		}
	}

	return extractFailed(error)
}

async function discardStaging(
	stagingDir: string,
	outcome: FailedOutcome,
): Promise<InstallOutcome> {
	const removed = await cleanupStagingDir(stagingDir)
	if (removed.ok) {
		return outcome
	}

	const message = `${outcome.error.message} (staging directory ${stagingDir} could not be removed: ${removed.error.message})`
	if (outcome.status === "fetch_failed") {
		return { ...outcome, error: { ...outcome.error, message } }
	}
	return { ...outcome, error: { ...outcome.error, message } }
}

function extractFailed(error: ArchiveExtractError): ExtractFailedOutcome {
	return { error, status: "extract_failed" }
}
