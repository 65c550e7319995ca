// FIFO style queue
export type Queue<T> = {
	// Add an item to the end of the queue
	push(element: T): void;
	// Peek at the next element
	peek(): T | undefined;
	// Remove the next item from the queue
	pop(): T | undefined;
	size(): number;
};

export class InMemoryQueue<T> implements Queue<T> {
	#elements: T[] = [];
	#head = 0;

	push(element: T): void {
		this.#elements.push(element);
	}

	peek(): T | undefined {
		return this.#elements.at(this.#head);
	}

	pop(): T | undefined {
		if (this.#head >= this.#elements.length) return undefined;
		const element = this.#elements[this.#head];
		this.#head++;
		// Compact once the consumed prefix dominates the backing array
		if (this.#head > 32 && this.#head * 2 > this.#elements.length) {
			this.#elements = this.#elements.slice(this.#head);
			this.#head = 0;
		}
		return element;
	}

	size(): number {
		return this.#elements.length - this.#head;
	}

	clear(): void {
		this.#elements = [];
		this.#head = 0;
	}
}
