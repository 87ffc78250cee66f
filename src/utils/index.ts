import path from "path";

/**
 * Run `processor` over `items` with at most `concurrency` in flight.
 * Results keep the order of `items`.
 */
export async function processInBatches<T, R>(
	items: T[],
	concurrency: number,
	processor: (item: T, index: number) => Promise<R>
): Promise<R[]> {
	const results: R[] = new Array(items.length);
	const executing = new Set<Promise<void>>();

	for (let index = 0; index < items.length; index++) {
		const promise: Promise<void> = processor(items[index], index).then((result) => {
			results[index] = result;
			executing.delete(promise);
		});
		executing.add(promise);

		if (executing.size >= Math.max(1, concurrency)) {
			await Promise.race(executing);
		}
	}

	await Promise.all(executing);
	return results;
}

export function normalizePath(value: string): string {
	return value.replace(/\\/g, "/");
}

/**
 * Display a path relative to the working directory when it lives below it
 */
export function displayPath(value: string): string {
	const relative = path.relative(process.cwd(), value);
	return relative && !relative.startsWith("..") && !path.isAbsolute(relative) ? normalizePath(relative) : value;
}
