/**
 * Single-consumer queue: events are handled one at a time, in arrival order,
 * whatever the producer does. Handler state never sees concurrent calls.
 */
export class SerialQueue<T> {
	private readonly pending: T[] = [];
	private draining = false;
	private closed = false;
	private idleWaiters: Array<() => void> = [];

	constructor(
		private readonly handler: (item: T) => Promise<void>,
		private readonly onError: (error: unknown) => void
	) {}

	public push(item: T): void {
		if (this.closed) {
			return;
		}
		this.pending.push(item);
		if (!this.draining) {
			this.draining = true;
			setImmediate(() => {
				this.drain().catch(this.onError);
			});
		}
	}

	/**
	 * Stop accepting items; already queued items are dropped
	 */
	public close(): void {
		this.closed = true;
		this.pending.length = 0;
	}

	public size(): number {
		return this.pending.length;
	}

	/**
	 * Resolves once every queued item has been handled
	 */
	public onIdle(): Promise<void> {
		if (!this.draining) {
			return Promise.resolve();
		}
		return new Promise((resolve) => this.idleWaiters.push(resolve));
	}

	private async drain(): Promise<void> {
		try {
			while (this.pending.length > 0) {
				const [item] = this.pending.splice(0, 1);
				try {
					await this.handler(item);
				} catch (error) {
					this.onError(error);
				}
			}
		} finally {
			this.draining = false;
			const waiters = this.idleWaiters;
			this.idleWaiters = [];
			waiters.forEach((resolve) => resolve());
		}
	}
}
