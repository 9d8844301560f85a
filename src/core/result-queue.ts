/**
 * Append-only collection shared by concurrent workers and drained once by
 * its owner after every worker has finished.
 *
 * Workers run on the event loop, so `put` never interleaves with another
 * `put`; what matters is that results are neither lost nor drained twice.
 */
export class ResultQueue<T> {
	private items: T[] = [];

	put(item: T): void {
		this.items.push(item);
	}

	get size(): number {
		return this.items.length;
	}

	isEmpty(): boolean {
		return this.items.length === 0;
	}

	/**
	 * Remove and return everything, in arrival order.
	 */
	drain(): T[] {
		const drained = this.items;
		this.items = [];
		return drained;
	}
}

export default ResultQueue;
