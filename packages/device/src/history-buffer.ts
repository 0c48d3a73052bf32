/**
 * Bounded FIFO shared by the acquisition loop (producer) and the session's
 * read path (consumer).
 *
 * Backed by a fixed ring of `capacity` slots. When full, `push` overwrites the
 * oldest slot and hands the evicted entry back; the producer is never blocked.
 *
 * Every method is synchronous. The producer only touches the buffer between
 * its awaits, so each call runs to completion before the other side can
 * observe the buffer.
 */
export class HistoryBuffer<T> {
	private readonly slots: Array<T | undefined>;
	private head = 0;
	private count = 0;

	constructor(readonly capacity: number = 10) {
		if (!Number.isInteger(capacity) || capacity <= 0) {
			throw new RangeError(
				`History capacity must be a positive integer (got ${capacity})`,
			);
		}
		this.slots = new Array<T | undefined>(capacity).fill(undefined);
	}

	/** Number of entries currently held */
	get size(): number {
		return this.count;
	}

	/**
	 * Append at the tail.
	 *
	 * @returns The entry that was evicted to make room, if the buffer was full
	 */
	push(entry: T): T | undefined {
		if (this.count < this.capacity) {
			this.slots[(this.head + this.count) % this.capacity] = entry;
			this.count++;
			return undefined;
		}

		const evicted = this.slots[this.head];
		this.slots[this.head] = entry;
		this.head = (this.head + 1) % this.capacity;
		return evicted;
	}

	/** Remove and return every entry, oldest first */
	drain(): T[] {
		const entries = this.snapshot();
		this.clear();
		return entries;
	}

	/**
	 * Empty the buffer and return only the most recently pushed entry.
	 * Older entries are dropped unread.
	 */
	takeLatest(): T | undefined {
		if (this.count === 0) {
			return undefined;
		}
		const latest = this.slots[(this.head + this.count - 1) % this.capacity];
		this.clear();
		return latest;
	}

	/** Copy of the current contents, oldest first */
	snapshot(): T[] {
		const entries: T[] = [];
		for (let i = 0; i < this.count; i++) {
			const entry = this.slots[(this.head + i) % this.capacity];
			if (entry !== undefined) {
				entries.push(entry);
			}
		}
		return entries;
	}

	clear(): void {
		this.slots.fill(undefined);
		this.head = 0;
		this.count = 0;
	}
}
