/**
 * @module history/ledger
 * @description Rolling per-metric history for inspection
 *
 * One ring buffer per metric. Reads are newest-first and padded with
 * `NO_DATA` up to the requested length. The ledger is write-only from the
 * adapter's point of view: nothing in the control loop reads it back.
 */

import { RingBuffer } from './ring';

/** Fill value for history slots that have no sample yet */
export const NO_DATA = Number.NaN;

export const DEFAULT_HISTORY_CAPACITY = 100;

export class HistoryLedger {
    readonly capacity: number;
    private readonly buffers = new Map<string, RingBuffer<number>>();

    constructor(capacity: number = DEFAULT_HISTORY_CAPACITY, metrics: readonly string[] = []) {
        if (!Number.isInteger(capacity) || capacity <= 0) {
            throw new RangeError(`History capacity must be a positive integer, got ${capacity}`);
        }
        this.capacity = capacity;
        for (const metric of metrics) {
            this.buffers.set(metric, new RingBuffer<number>(capacity));
        }
    }

    push(metric: string, value: number): void {
        let buffer = this.buffers.get(metric);
        if (buffer === undefined) {
            buffer = new RingBuffer<number>(this.capacity);
            this.buffers.set(metric, buffer);
        }
        buffer.push(value);
    }

    /**
     * Push several metrics recorded at the same step
     */
    record(values: Readonly<Record<string, number>>): void {
        for (const [metric, value] of Object.entries(values)) {
            this.push(metric, value);
        }
    }

    /**
     * Exactly `n` values, newest first, `NO_DATA` past the oldest sample
     */
    recent(metric: string, n: number): number[] {
        if (!Number.isInteger(n) || n < 0) {
            throw new RangeError(`recent() needs a non-negative integer count, got ${n}`);
        }
        const values = this.buffers.get(metric)?.newest(n) ?? [];
        while (values.length < n) values.push(NO_DATA);
        return values;
    }

    latest(metric: string): number {
        return this.buffers.get(metric)?.at(0) ?? NO_DATA;
    }

    size(metric: string): number {
        return this.buffers.get(metric)?.size ?? 0;
    }

    /** Tracked metric names, in registration order */
    metrics(): string[] {
        return [...this.buffers.keys()];
    }

    clear(): void {
        for (const buffer of this.buffers.values()) {
            buffer.clear();
        }
    }
}
