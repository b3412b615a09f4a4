/**
 * Promise-chain lock. Tasks passed to `runExclusive` run one at a time in
 * submission order; a rejected task releases the lock for the next one.
 */
export class Mutex {
	private tail: Promise<void> = Promise.resolve();

	runExclusive<T>(task: () => T | Promise<T>): Promise<T> {
		const run = this.tail.then(task);
		this.tail = run.then(
			() => undefined,
			() => undefined,
		);
		return run;
	}
}
