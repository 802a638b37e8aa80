/**
 * Run worker over every item with at most `limit` calls in flight. Results are
 * stored by index, so the output lines up with the input regardless of which
 * call finishes first.
 */
export async function mapWithConcurrency<T, R>(
	items: readonly T[],
	limit: number,
	worker: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
	if (!Number.isInteger(limit) || limit < 1) {
		throw new RangeError(`Concurrency must be a positive integer, got ${limit}.`)
	}

	const results = new Array<R>(items.length)
	let cursor = 0

	const runWorker = async (): Promise<void> => {
		while (cursor < items.length) {
			const index = cursor
			cursor += 1
			results[index] = await worker(items[index], index)
		}
	}

	const workers = Array.from({ length: Math.min(limit, items.length) }, () =>
		runWorker(),
	)
	await Promise.all(workers)

	return results
}
