/**
 * Serializes async tasks that share a key
 * Tasks with different keys run concurrently; tasks with the same key run one
 * after the other in submission order.
 */
export interface KeyedLock {
	run: <T>(key: string, task: () => Promise<T>) => Promise<T>;
}

export function createKeyedLock(): KeyedLock {
	// Tail of each key's chain; settled tails never reject
	const tails = new Map<string, Promise<void>>();

	const run = async <T>(key: string, task: () => Promise<T>): Promise<T> => {
		const previous = tails.get(key) ?? Promise.resolve();
		const current = previous.then(task);
		const tail = current.then(
			() => undefined,
			() => undefined,
		);
		tails.set(key, tail);

		try {
			return await current;
		} finally {
			if (tails.get(key) === tail) {
				tails.delete(key);
			}
		}
	};

	return { run };
}
