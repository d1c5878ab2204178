interface RwLock {
	read<T>(fn: () => Promise<T> | T): Promise<T>;
	write<T>(fn: () => Promise<T> | T): Promise<T>;
}

interface Waiter {
	mode: 'read' | 'write';
	wake: () => void;
}

/**
 * Async reader/writer lock. Readers share the lock, a writer holds it alone.
 * Waiters are served in arrival order, so a queued writer blocks readers that
 * arrive after it.
 */
export function createRwLock(): RwLock {
	let activeReaders = 0;
	let writerActive = false;
	const queue: Waiter[] = [];

	function drain(): void {
		while (queue.length > 0) {
			const next = queue[0];
			if (!next) return;
			if (next.mode === 'write') {
				if (writerActive || activeReaders > 0) return;
				queue.shift();
				writerActive = true;
				next.wake();
				return;
			}
			if (writerActive) return;
			queue.shift();
			activeReaders += 1;
			next.wake();
		}
	}

	function acquire(mode: Waiter['mode']): Promise<void> {
		return new Promise((resolve) => {
			queue.push({ mode, wake: resolve });
			drain();
		});
	}

	function release(mode: Waiter['mode']): void {
		if (mode === 'write') {
			writerActive = false;
		} else {
			activeReaders -= 1;
		}
		drain();
	}

	async function run<T>(mode: Waiter['mode'], fn: () => Promise<T> | T): Promise<T> {
		await acquire(mode);
		try {
			return await fn();
		} finally {
			release(mode);
		}
	}

	return {
		read: (fn) => run('read', fn),
		write: (fn) => run('write', fn),
	};
}

export type { RwLock };
