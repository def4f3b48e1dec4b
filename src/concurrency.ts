export interface ExclusiveQueue {
	run<T>(task: () => Promise<T>): Promise<T>;
}

/**
 * Serialize async tasks: each task starts only after the previous one has
 * settled, whether it resolved or rejected. A rejection is returned to the
 * caller of that task and does not poison the queue.
 */
export function createExclusiveQueue(): ExclusiveQueue {
	let queue: Promise<void> = Promise.resolve();

	function run<T>(task: () => Promise<T>): Promise<T> {
		const next = queue.then(task, task);
		queue = next.then(
			() => undefined,
			() => undefined,
		);
		return next;
	}

	return { run };
}
