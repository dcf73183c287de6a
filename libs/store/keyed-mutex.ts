/**
 * FIFO mutex per key. Work for one key runs one at a time, in arrival order;
 * different keys never wait on each other.
 */
export class KeyedMutex {
    private locked = new Set<string>();
    private queues = new Map<string, Array<() => void>>();

    private async acquire(key: string): Promise<void> {
        if (!this.locked.has(key)) {
            this.locked.add(key);
            return;
        }
        return new Promise(resolve => {
            const queue = this.queues.get(key) ?? [];
            queue.push(resolve);
            this.queues.set(key, queue);
        });
    }

    private release(key: string): void {
        const queue = this.queues.get(key);
        const next = queue?.shift();
        if (queue && queue.length === 0) this.queues.delete(key);
        if (next) {
            next();
        } else {
            this.locked.delete(key);
        }
    }

    async runExclusive<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
        await this.acquire(key);
        try {
            return await fn();
        } finally {
            this.release(key);
        }
    }

    isLocked(key: string): boolean {
        return this.locked.has(key);
    }
}
