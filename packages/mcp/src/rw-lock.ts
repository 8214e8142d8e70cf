/**
 * @webpuppet/mcp — async readers-writer lock.
 */

/** Mutable view of the guarded value, handed to writers. */
export interface WriteSlot<T> {
	value: T;
}

type Waiter = { mode: "read" | "write"; grant: () => void };

/**
 * Readers-writer lock around a value.
 *
 * Any number of readers share the lock; a writer holds it alone. Waiters are
 * served in arrival order, so a reader that arrives behind a queued writer
 * waits for that writer instead of overtaking it.
 *
 * Callbacks run while the lock is held. Never await another acquisition of
 * the same lock from inside a callback.
 *
 * @example
 * ```ts
 * const state = new RwLock<ServerState>("uninitialized");
 * await state.write((slot) => { slot.value = "ready"; });
 * const ready = await state.read((s) => s === "ready");
 * ```
 */
export class RwLock<T> {
	private value: T;
	private readers = 0;
	private writer = false;
	private readonly queue: Waiter[] = [];

	constructor(initial: T) {
		this.value = initial;
	}

	/** Run `fn` with shared access to the value. */
	async read<R>(fn: (value: T) => R | Promise<R>): Promise<R> {
		await this.acquire("read");
		try {
			return await fn(this.value);
		} finally {
			this.readers--;
			this.drain();
		}
	}

	/**
	 * Run `fn` with exclusive access. Assigning `slot.value` replaces the
	 * guarded value; the assignment sticks even if `fn` later throws.
	 */
	async write<R>(fn: (slot: WriteSlot<T>) => R | Promise<R>): Promise<R> {
		await this.acquire("write");
		const slot: WriteSlot<T> = { value: this.value };
		try {
			return await fn(slot);
		} finally {
			this.value = slot.value;
			this.writer = false;
			this.drain();
		}
	}

	/** Readers currently holding the lock. */
	get activeReaders(): number {
		return this.readers;
	}

	/** Whether a writer currently holds the lock. */
	get writeLocked(): boolean {
		return this.writer;
	}

	private acquire(mode: "read" | "write"): Promise<void> {
		if (this.queue.length === 0 && this.canGrant(mode)) {
			this.take(mode);
			return Promise.resolve();
		}
		return new Promise<void>((resolve) => {
			this.queue.push({ mode, grant: resolve });
		});
	}

	private canGrant(mode: "read" | "write"): boolean {
		if (this.writer) return false;
		return mode === "read" || this.readers === 0;
	}

	private take(mode: "read" | "write"): void {
		if (mode === "read") {
			this.readers++;
		} else {
			this.writer = true;
		}
	}

	/** Grant the head of the queue, plus every reader directly behind a granted reader. */
	private drain(): void {
		while (this.queue.length > 0) {
			const head = this.queue[0];
			if (!this.canGrant(head.mode)) return;
			this.queue.shift();
			this.take(head.mode);
			head.grant();
			if (head.mode === "write") return;
		}
	}
}
