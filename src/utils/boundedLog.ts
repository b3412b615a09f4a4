/**
 * Append-only log that keeps the newest `capacity` entries. Evicted entries
 * are dropped from the front lazily, so `push` stays O(1) amortized.
 */
export class BoundedLog<T> {
	private items: T[] = [];
	private head = 0;

	constructor(private readonly capacity: number) {
		if (!Number.isInteger(capacity) || capacity < 1) {
			throw new Error(`BoundedLog capacity must be a positive integer, got ${capacity}`);
		}
	}

	get length(): number {
		return this.items.length - this.head;
	}

	push(item: T): T | undefined {
		this.items.push(item);
		let evicted: T | undefined;
		if (this.length > this.capacity) {
			evicted = this.items[this.head];
			this.head += 1;
		}
		if (this.head >= this.capacity) {
			this.items = this.items.slice(this.head);
			this.head = 0;
		}
		return evicted;
	}

	toArray(): T[] {
		return this.items.slice(this.head);
	}
}
