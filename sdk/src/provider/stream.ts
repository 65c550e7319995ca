import { InMemoryQueue } from "../utils/queue.js";

type Failure = { error: unknown };

/**
 * Push-fed async iterator. Entries are yielded in the order they were pushed;
 * `next()` suspends while nothing is buffered. The stream cannot be restarted:
 * once closed or failed it stays that way.
 *
 * The release callback (e.g. the unwatch function of a subscription) and the
 * `onClose` callback each run exactly once, on the first of `close()`,
 * `return()` or `fail()`.
 */
export class EventStream<T> implements AsyncIterator<T, undefined>, AsyncIterable<T> {
	#buffer = new InMemoryQueue<T>();
	#waiters: Array<() => void> = [];
	#failure?: Failure;
	#closed = false;
	#release?: () => void;
	#released = false;
	#onClose?: () => void;
	#notified = false;

	constructor(onClose?: () => void) {
		this.#onClose = onClose;
	}

	/** Attaches the function that tears down the underlying subscription. */
	attach(release: () => void): void {
		if (this.#closed || this.#failure !== undefined) {
			release();
			this.#released = true;
			return;
		}
		this.#release = release;
	}

	push(entry: T): void {
		if (this.#closed || this.#failure !== undefined) return;
		this.#buffer.push(entry);
		this.#wake();
	}

	/** Ends the stream with an error once the buffered entries are consumed. */
	fail(error: unknown): void {
		if (this.#closed || this.#failure !== undefined) return;
		this.#failure = { error };
		this.#releaseSubscription();
		this.#notifyClosed();
		this.#wake();
	}

	close(): void {
		if (this.#closed) return;
		this.#closed = true;
		this.#buffer.clear();
		this.#releaseSubscription();
		this.#notifyClosed();
		this.#wake();
	}

	isClosed(): boolean {
		return this.#closed;
	}

	pending(): number {
		return this.#buffer.size();
	}

	async next(): Promise<IteratorResult<T, undefined>> {
		for (;;) {
			if (this.#closed) return { done: true, value: undefined };
			if (this.#buffer.size() > 0) {
				const entry = this.#buffer.pop();
				if (entry !== undefined) return { done: false, value: entry };
			}
			if (this.#failure !== undefined) {
				const { error } = this.#failure;
				this.close();
				throw error;
			}
			await new Promise<void>((resolve) => {
				this.#waiters.push(resolve);
			});
		}
	}

	async return(): Promise<IteratorResult<T, undefined>> {
		this.close();
		return { done: true, value: undefined };
	}

	[Symbol.asyncIterator](): this {
		return this;
	}

	#wake(): void {
		const waiters = this.#waiters;
		this.#waiters = [];
		for (const resolve of waiters) resolve();
	}

	#notifyClosed(): void {
		if (this.#notified) return;
		this.#notified = true;
		this.#onClose?.();
	}

	#releaseSubscription(): void {
		if (this.#released) return;
		this.#released = true;
		this.#release?.();
	}
}
