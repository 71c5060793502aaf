/**
 * @module env/source
 * @description Where telemetry batches come from and where commands go
 *
 * A simulator connection implements `TelemetrySource`. `ReplayTelemetrySource`
 * is the in-process stand-in: it replays prepared batches (or generates them)
 * and records every command it is sent.
 */

import { AdapterError, ErrorCodes } from '../core/errors';
import { commandList, type CommandPayload, type PolicyCommand, type TelemetryBatch } from '../telemetry/record';

export interface Exchange {
    /** Telemetry measured after the commands took effect */
    batch: TelemetryBatch;
    /** The simulation has ended */
    terminated: boolean;
}

export interface TelemetrySource {
    /** Start (or continue) a session and return its first batch */
    reset(seed?: number): Promise<TelemetryBatch>;
    /** Send one step's commands in wire form and wait for the next batch */
    exchange(payload: CommandPayload): Promise<Exchange>;
    close(): void;
}

/**
 * Produces the batch with sequence number `index`. Index 0 is the first
 * reset batch; `commands` is empty for reset batches.
 */
export type BatchGenerator = (index: number, commands: readonly PolicyCommand[]) => TelemetryBatch;

export class ReplayTelemetrySource implements TelemetrySource {
    /** Commands received, one list per exchange */
    readonly sent: (readonly PolicyCommand[])[] = [];
    /** Batches available in total (reset batches included) */
    readonly length: number;
    private readonly generate: BatchGenerator;
    private cursor = 0;
    private closed = false;

    /**
     * @param batches - Prepared batches in delivery order, or a generator
     * @param length - Batches a generator may produce (default: unbounded)
     */
    constructor(batches: readonly TelemetryBatch[] | BatchGenerator, length?: number) {
        if (typeof batches === 'function') {
            this.generate = batches;
            this.length = length ?? Infinity;
        } else {
            this.generate = (index) => batches[index];
            this.length = Math.min(length ?? batches.length, batches.length);
        }
    }

    /** Batches delivered so far */
    get delivered(): number {
        return this.cursor;
    }

    private next(commands: readonly PolicyCommand[]): TelemetryBatch {
        if (this.closed) {
            throw new AdapterError(ErrorCodes.INTERNAL_ERROR, 'Telemetry source is closed');
        }
        if (this.cursor >= this.length) {
            throw new AdapterError(ErrorCodes.INTERNAL_ERROR, 'Telemetry replay is exhausted', { delivered: this.cursor });
        }
        return this.generate(this.cursor++, commands);
    }

    async reset(_seed?: number): Promise<TelemetryBatch> {
        return this.next([]);
    }

    async exchange(payload: CommandPayload): Promise<Exchange> {
        const commands = commandList(payload);
        this.sent.push(commands);
        const batch = this.next(commands);
        return { batch, terminated: this.cursor >= this.length };
    }

    close(): void {
        this.closed = true;
    }
}
