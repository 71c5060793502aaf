/**
 * @module core/tensor
 * @description Dense row-major tensors for observation data
 *
 * A tensor is a flat `number[]` plus a shape and a dtype class. Writes are
 * coerced to the dtype (float32 rounding, integer truncation) so a built
 * observation carries the precision its space declares.
 */

import { ContractViolationError } from './errors';

// ==================== Types ====================

/**
 * Numeric precision class of a tensor or space
 */
export type DType = 'int32' | 'int64' | 'uint32' | 'float32' | 'float64';

/**
 * Nested array form of a tensor (e.g. `[[1], [2]]` for shape `[2, 1]`)
 */
export type NestedNumbers = number | NestedNumbers[];

/**
 * Whether a dtype holds integers only
 */
export function isIntegerDType(dtype: DType): boolean {
    return dtype === 'int32' || dtype === 'int64' || dtype === 'uint32';
}

/**
 * Coerce a number to the representation of a dtype
 */
export function coerce(value: number, dtype: DType): number {
    switch (dtype) {
        case 'float32':
            return Math.fround(value);
        case 'float64':
            return value;
        case 'int32':
        case 'int64':
        case 'uint32':
            return Number.isFinite(value) ? Math.trunc(value) : value;
    }
}

/**
 * Number of elements for a shape
 */
export function shapeSize(shape: readonly number[]): number {
    return shape.reduce((a, b) => a * b, 1);
}

// ==================== Tensor ====================

export class Tensor {
    readonly shape: readonly number[];
    readonly dtype: DType;
    private readonly data: number[];
    private readonly strides: number[];
    private frozen = false;

    constructor(shape: readonly number[], dtype: DType = 'float32', data?: readonly number[]) {
        for (const dim of shape) {
            if (!Number.isInteger(dim) || dim < 0) {
                throw new ContractViolationError(`Invalid tensor shape [${shape.join(', ')}]`, { shape });
            }
        }
        const size = shapeSize(shape);
        if (data && data.length !== size) {
            throw new ContractViolationError(
                `Tensor data has ${data.length} elements, shape [${shape.join(', ')}] needs ${size}`,
                { shape, length: data.length }
            );
        }

        this.shape = [...shape];
        this.dtype = dtype;
        this.data = data ? data.map(v => coerce(v, dtype)) : new Array<number>(size).fill(0);

        this.strides = new Array<number>(shape.length);
        let stride = 1;
        for (let axis = shape.length - 1; axis >= 0; axis--) {
            this.strides[axis] = stride;
            stride *= shape[axis];
        }
    }

    /**
     * Zero-initialized tensor
     */
    static zeros(shape: readonly number[], dtype: DType = 'float32'): Tensor {
        return new Tensor(shape, dtype);
    }

    /**
     * Build a tensor from a nested array, inferring the shape
     */
    static fromArray(values: NestedNumbers, dtype: DType = 'float32'): Tensor {
        const shape: number[] = [];
        let level: NestedNumbers = values;
        while (Array.isArray(level)) {
            shape.push(level.length);
            if (level.length === 0) break;
            level = level[0];
        }

        const flat: number[] = [];
        const walk = (node: NestedNumbers, depth: number): void => {
            if (typeof node === 'number') {
                if (depth !== shape.length) {
                    throw new ContractViolationError('Ragged nested array', { depth });
                }
                flat.push(node);
                return;
            }
            if (node.length !== shape[depth]) {
                throw new ContractViolationError('Ragged nested array', { depth, length: node.length });
            }
            for (const child of node) walk(child, depth + 1);
        };
        walk(values, 0);

        return new Tensor(shape, dtype, flat);
    }

    get size(): number {
        return this.data.length;
    }

    get isFrozen(): boolean {
        return this.frozen;
    }

    /**
     * Flat offset of a multi-dimensional index
     */
    offset(index: readonly number[]): number {
        if (index.length !== this.shape.length) {
            throw new ContractViolationError(
                `Index rank ${index.length} does not match tensor rank ${this.shape.length}`,
                { index, shape: this.shape }
            );
        }

        let offset = 0;
        for (let axis = 0; axis < index.length; axis++) {
            const i = index[axis];
            if (!Number.isInteger(i) || i < 0 || i >= this.shape[axis]) {
                throw new ContractViolationError(
                    `Index ${i} out of bounds for axis ${axis} with size ${this.shape[axis]}`,
                    { index, shape: this.shape }
                );
            }
            offset += i * this.strides[axis];
        }
        return offset;
    }

    get(...index: number[]): number {
        return this.data[this.offset(index)];
    }

    set(index: readonly number[], value: number): void {
        if (this.frozen) {
            throw new ContractViolationError('Tensor is frozen', { index });
        }
        this.data[this.offset(index)] = coerce(value, this.dtype);
    }

    /**
     * Make the tensor read-only
     */
    freeze(): this {
        this.frozen = true;
        return this;
    }

    sum(): number {
        let total = 0;
        for (const v of this.data) total += v;
        return total;
    }

    /** Row-major copy of the data */
    toFlat(): number[] {
        return [...this.data];
    }

    /** Nested array form */
    toArray(): NestedNumbers {
        if (this.shape.length === 0) {
            return this.data[0];
        }

        const build = (axis: number, base: number): NestedNumbers[] => {
            const out: NestedNumbers[] = [];
            for (let i = 0; i < this.shape[axis]; i++) {
                const at = base + i * this.strides[axis];
                out.push(axis === this.shape.length - 1 ? this.data[at] : build(axis + 1, at));
            }
            return out;
        };
        return build(0, 0);
    }

    toJSON(): { shape: number[]; dtype: DType; data: NestedNumbers } {
        return { shape: [...this.shape], dtype: this.dtype, data: this.toArray() };
    }

    toString(): string {
        return `Tensor<${this.dtype}>[${this.shape.join('x')}] ${JSON.stringify(this.toArray())}`;
    }
}
