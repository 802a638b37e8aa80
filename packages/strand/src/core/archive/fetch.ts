import { pipeline, Readable, Transform } from "node:stream"
import type {
	ArchiveFetchError,
	ArchiveFetchResult,
	FetchOptions,
} from "@/src/core/archive/types"
import { formatError } from "@/src/utils/errors"

export const DEFAULT_FETCH_TIMEOUT_MS = 60_000
const DEFAULT_USER_AGENT = "strand"

/**
 * GET an archive and hand back its body as a Node stream. Redirects are followed;
 * anything other than a 2xx response is a failure. There is no retry.
 *
 * `timeoutMs` bounds the wait for response headers and, once the body is
 * flowing, each gap between chunks. A slow download that keeps making progress
 * is never cut off. A stalled body fails the returned stream with a
 * `TimeoutError`.
 */
export async function fetchArchive(
	url: string,
	options: FetchOptions = {},
): Promise<ArchiveFetchResult> {
	const fetchImpl = options.fetch ?? fetch
	const timeoutMs = options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS
	const controller = new AbortController()
	const headerTimer = setTimeout(() => {
		controller.abort(timeoutError(`No response within ${timeoutMs}ms.`))
	}, timeoutMs)

	let response: Response
	try {
		response = await fetchImpl(url, {
			headers: {
				accept: "application/gzip, application/x-gzip, application/octet-stream, */*",
				"user-agent": options.userAgent ?? DEFAULT_USER_AGENT,
			},
			redirect: "follow",
			signal: controller.signal,
		})
	} catch (error) {
		return failure("network", describeNetworkError(error), url)
	} finally {
		clearTimeout(headerTimer)
	}

	if (!response.ok) {
		// Release the connection instead of leaving the unread body to the GC.
		await response.body?.cancel()
		const statusText = response.statusText ? ` ${response.statusText}` : ""
		return failure(
			"http_status",
			`Server responded with ${response.status}${statusText}.`,
			url,
			response.status,
		)
	}

	if (!response.body) {
		return failure("empty_body", "Server responded without a body.", url)
	}

	return { ok: true, value: withIdleTimeout(Readable.fromWeb(response.body), timeoutMs) }
}

/**
 * Pass body chunks through, failing the stream when no chunk arrives for
 * timeoutMs. The timer restarts on every chunk.
 */
function withIdleTimeout(body: Readable, timeoutMs: number): Readable {
	const timer = setTimeout(() => {
		output.destroy(timeoutError(`No data received for ${timeoutMs}ms.`))
	}, timeoutMs)

	const output = new Transform({
		flush(callback) {
			clearTimeout(timer)
			callback()
		},
		transform(chunk: Buffer, _encoding, callback) {
			timer.refresh()
			callback(null, chunk)
		},
	})

	// Errors from the body reach `output`, which is what the caller reads.
	pipeline(body, output, () => {
		clearTimeout(timer)
	})

	return output
}

function timeoutError(message: string): Error {
	const error = new Error(message)
	error.name = "TimeoutError"
	return error
}

function describeNetworkError(error: unknown): string {
	if (error instanceof Error && error.name === "TimeoutError") {
		return `Request timed out: ${error.message}`
	}

	// undici wraps the interesting part (ENOTFOUND, ECONNRESET, ...) in `cause`.
	if (error instanceof Error && error.cause !== undefined) {
		return `${error.message}: ${formatError(error.cause)}`
	}

	return formatError(error)
}

function failure(
	type: ArchiveFetchError["type"],
	message: string,
	url: string,
	status?: number,
): { ok: false; error: ArchiveFetchError } {
	return {
		error: {
			message,
			status,
			type,
			url,
		},
		ok: false,
	}
}
