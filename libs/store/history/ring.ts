/** Fixed-capacity ring; pushing onto a full ring overwrites the oldest slot. */
export class Ring<T> {
    private readonly slots: Array<T | undefined>;
    private head = 0; // index of the oldest entry
    private count = 0;

    constructor(readonly capacity: number) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new RangeError(`ring capacity must be a positive integer, got ${capacity}`);
        }
        this.slots = new Array<T | undefined>(capacity);
    }

    /** Returns the evicted entry, if any. */
    push(item: T): T | undefined {
        if (this.count < this.capacity) {
            this.slots[(this.head + this.count) % this.capacity] = item;
            this.count++;
            return undefined;
        }
        const evicted = this.slots[this.head];
        this.slots[this.head] = item;
        this.head = (this.head + 1) % this.capacity;
        return evicted;
    }

    /** Oldest first. */
    toArray(): T[] {
        const out: T[] = [];
        for (let i = 0; i < this.count; i++) {
            const v = this.slots[(this.head + i) % this.capacity];
            if (v !== undefined) out.push(v);
        }
        return out;
    }

    get length(): number {
        return this.count;
    }
}
