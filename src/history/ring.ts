/**
 * @module history/ring
 * @description Fixed-capacity circular buffer
 *
 * Storage is a preallocated arena plus a head index; pushing into a full
 * buffer overwrites the oldest slot.
 */

export class RingBuffer<T> {
    readonly capacity: number;
    private readonly arena: (T | undefined)[];
    /** Slot the next push writes to */
    private head = 0;
    private count = 0;

    constructor(capacity: number) {
        if (!Number.isInteger(capacity) || capacity <= 0) {
            throw new RangeError(`RingBuffer capacity must be a positive integer, got ${capacity}`);
        }
        this.capacity = capacity;
        this.arena = new Array<T | undefined>(capacity).fill(undefined);
    }

    get size(): number {
        return this.count;
    }

    push(item: T): void {
        this.arena[this.head] = item;
        this.head = (this.head + 1) % this.capacity;
        if (this.count < this.capacity) this.count++;
    }

    /**
     * Item `age` steps back from the newest (0 = newest), or `undefined`
     */
    at(age: number): T | undefined {
        if (!Number.isInteger(age) || age < 0 || age >= this.count) return undefined;
        return this.arena[(this.head - 1 - age + this.capacity) % this.capacity];
    }

    /**
     * Up to `n` items, newest first
     */
    newest(n: number = this.count): T[] {
        const out: T[] = [];
        const limit = Math.min(n, this.count);
        for (let age = 0; age < limit; age++) {
            const item = this.at(age);
            if (item !== undefined) out.push(item);
        }
        return out;
    }

    clear(): void {
        this.arena.fill(undefined);
        this.head = 0;
        this.count = 0;
    }
}
