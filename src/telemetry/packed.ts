/**
 * @module telemetry/packed
 * @description Packed `(row, col)` indices
 *
 * Matrix-valued telemetry sends each cell as one integer id:
 * `id = (row << log2(cols)) | col`. Both dimensions are powers of two.
 */

import { ContractViolationError } from '../core/errors';

export interface Cell {
    row: number;
    col: number;
}

function isPowerOfTwo(n: number): boolean {
    return Number.isInteger(n) && n > 0 && (n & (n - 1)) === 0;
}

export class PackedIndexCodec {
    readonly rows: number;
    readonly cols: number;
    /** log2(cols) */
    readonly shift: number;

    constructor(rows: number, cols: number) {
        if (!isPowerOfTwo(rows) || !isPowerOfTwo(cols)) {
            throw new RangeError(`Packed matrix dimensions must be powers of two, got ${rows}x${cols}`);
        }
        this.rows = rows;
        this.cols = cols;
        this.shift = Math.log2(cols);
    }

    /** Number of valid ids */
    get size(): number {
        return this.rows * this.cols;
    }

    decode(id: number): Cell {
        if (!Number.isInteger(id) || id < 0) {
            throw new ContractViolationError(`Packed id ${id} is not a non-negative integer`, { id });
        }
        // exact for any safe integer, unlike the 32-bit shift
        const row = Math.floor(id / this.cols);
        const col = id % this.cols;
        if (row >= this.rows) {
            throw new ContractViolationError(
                `Packed id ${id} decodes to row ${row}, matrix has ${this.rows} rows`,
                { id, row, rows: this.rows }
            );
        }
        return { row, col };
    }

    encode(row: number, col: number): number {
        if (!Number.isInteger(row) || row < 0 || row >= this.rows
            || !Number.isInteger(col) || col < 0 || col >= this.cols) {
            throw new ContractViolationError(
                `Cell (${row}, ${col}) outside ${this.rows}x${this.cols}`,
                { row, col }
            );
        }
        return (row << this.shift) | col;
    }
}
