/**
 * @module core/space
 * @description Space contracts for observations and actions
 *
 * A space declares the shape, bounds and dtype class a value must have. Each
 * adapter variant publishes one action space and one observation space; the
 * observation builder produces values inside the observation space and the
 * policy encoder only accepts values inside the action space.
 */

import { Tensor, isIntegerDType, shapeSize, type DType } from './tensor';

// ==================== Browser-compatible Hash ====================

/**
 * Simple hash function that works in both browser and Node.js
 */
function simpleHash(str: string): string {
    let hash = 5381;
    for (let i = 0; i < str.length; i++) {
        hash = ((hash << 5) + hash) ^ str.charCodeAt(i);
    }
    return (hash >>> 0).toString(16).padStart(8, '0');
}

function browserHash(data: string): string {
    const h1 = simpleHash(data);
    const h2 = simpleHash(data + h1);
    const h3 = simpleHash(h1 + data);
    const h4 = simpleHash(h2 + h3);
    return h1 + h2 + h3 + h4;
}

// ==================== Space Types ====================

/**
 * Discrete space - integers in [start, start + n)
 */
export interface DiscreteSpace {
    readonly kind: 'discrete';
    /** Number of discrete values */
    readonly n: number;
    /** Smallest value */
    readonly start: number;
    /** Optional labels for each value */
    readonly labels?: readonly string[];
}

/**
 * Box space - bounded n-dimensional space
 */
export interface BoxSpace {
    readonly kind: 'box';
    /** Shape of the space (e.g., [8, 32] for a matrix) */
    readonly shape: readonly number[];
    /** Lower bound (scalar or per-element, row-major) */
    readonly low: number | readonly number[];
    /** Upper bound (scalar or per-element, row-major) */
    readonly high: number | readonly number[];
    readonly dtype: DType;
}

/**
 * MultiDiscrete space - one discrete range per element
 *
 * Element `i` takes integer values in `[start[i], start[i] + nvec[i])`.
 * `nvec` and `start` are stored row-major for `shape`.
 */
export interface MultiDiscreteSpace {
    readonly kind: 'multiDiscrete';
    readonly nvec: readonly number[];
    readonly start: readonly number[];
    readonly shape: readonly number[];
    readonly dtype: DType;
}

/**
 * Tuple space - ordered sequence of spaces
 */
export interface TupleSpace {
    readonly kind: 'tuple';
    readonly spaces: readonly Space[];
}

/**
 * Spaces that describe a single tensor
 */
export type LeafSpace = DiscreteSpace | BoxSpace | MultiDiscreteSpace;

export type Space = LeafSpace | TupleSpace;

/**
 * Value of a space: a scalar, a flat vector, a tensor, or a tuple of those
 */
export type SpaceValue = number | readonly number[] | Tensor | readonly SpaceValue[];

// ==================== Space Factories ====================

/**
 * Create a discrete space
 */
export function discrete(n: number, start = 0, labels?: string[]): DiscreteSpace {
    return { kind: 'discrete', n, start, labels };
}

/**
 * Create a box space
 */
export function box(
    shape: number[],
    low: number | number[] = -Infinity,
    high: number | number[] = Infinity,
    dtype: DType = 'float32'
): BoxSpace {
    return { kind: 'box', shape, low, high, dtype };
}

export interface MultiDiscreteOptions {
    /** Per-element start values (default: all zero) */
    start?: number[];
    /** Shape of the value (default: `[nvec.length]`) */
    shape?: number[];
    /** Integer dtype (default: int64) */
    dtype?: DType;
}

/**
 * Create a multi-discrete space
 */
export function multiDiscrete(nvec: number[], options: MultiDiscreteOptions = {}): MultiDiscreteSpace {
    const shape = options.shape ?? [nvec.length];
    const start = options.start ?? nvec.map(() => 0);
    if (shapeSize(shape) !== nvec.length || start.length !== nvec.length) {
        throw new RangeError(
            `multiDiscrete: nvec (${nvec.length}), start (${start.length}) and shape [${shape.join(', ')}] disagree`
        );
    }
    return { kind: 'multiDiscrete', nvec, start, shape, dtype: options.dtype ?? 'int64' };
}

/**
 * Create a tuple space
 */
export function tuple(spaces: Space[]): TupleSpace {
    return { kind: 'tuple', spaces };
}

// ==================== Leaf Accessors ====================

/**
 * Shape of the tensor a leaf space describes
 */
export function shapeOf(space: LeafSpace): readonly number[] {
    switch (space.kind) {
        case 'discrete':
            return [];
        case 'box':
        case 'multiDiscrete':
            return space.shape;
    }
}

/**
 * Dtype class of a leaf space
 */
export function dtypeOf(space: LeafSpace): DType {
    return space.kind === 'discrete' ? 'int64' : space.dtype;
}

/**
 * Inclusive bounds of the flat element `i` of a leaf space
 */
export function boundsAt(space: LeafSpace, i: number): { low: number; high: number } {
    switch (space.kind) {
        case 'discrete':
            return { low: space.start, high: space.start + space.n - 1 };
        case 'box': {
            const low = typeof space.low === 'number' ? space.low : (space.low[i] ?? -Infinity);
            const high = typeof space.high === 'number' ? space.high : (space.high[i] ?? Infinity);
            return { low, high };
        }
        case 'multiDiscrete':
            return { low: space.start[i], high: space.start[i] + space.nvec[i] - 1 };
    }
}

// ==================== Space Operations ====================

function collectNumbers(value: SpaceValue, out: number[]): void {
    if (typeof value === 'number') {
        out.push(value);
    } else if (value instanceof Tensor) {
        out.push(...value.toFlat());
    } else {
        for (const item of value) collectNumbers(item, out);
    }
}

/**
 * All numbers of a value in row-major order, without checking a space
 */
export function valueNumbers(value: SpaceValue): number[] {
    const out: number[] = [];
    collectNumbers(value, out);
    return out;
}

function leafElements(space: LeafSpace, value: SpaceValue): number[] | string {
    if (value instanceof Tensor) {
        const shape = shapeOf(space);
        if (value.shape.length !== shape.length || value.shape.some((d, i) => d !== shape[i])) {
            return `shape [${value.shape.join(', ')}] != [${shape.join(', ')}]`;
        }
        if (value.dtype !== dtypeOf(space)) {
            return `dtype ${value.dtype} != ${dtypeOf(space)}`;
        }
        return value.toFlat();
    }

    const flat: number[] = [];
    collectNumbers(value, flat);
    const expected = shapeSize(shapeOf(space));
    if (flat.length !== expected) {
        return `expected ${expected} elements, got ${flat.length}`;
    }
    return flat;
}

/**
 * Explain why a value is not contained in a space, or `null` when it is
 */
export function checkContains(space: Space, value: SpaceValue): string | null {
    if (space.kind === 'tuple') {
        if (typeof value === 'number' || value instanceof Tensor || value.length !== space.spaces.length) {
            return `expected a tuple of ${space.spaces.length} values`;
        }
        for (let i = 0; i < space.spaces.length; i++) {
            const reason = checkContains(space.spaces[i], value[i]);
            if (reason !== null) {
                return `[${i}] ${reason}`;
            }
        }
        return null;
    }

    const elements = leafElements(space, value);
    if (typeof elements === 'string') {
        return elements;
    }

    const integral = space.kind !== 'box' || isIntegerDType(space.dtype);
    for (let i = 0; i < elements.length; i++) {
        const v = elements[i];
        if (Number.isNaN(v)) {
            return `element ${i} is NaN`;
        }
        if (integral && !Number.isInteger(v)) {
            return `element ${i} (${v}) is not an integer`;
        }
        const { low, high } = boundsAt(space, i);
        if (v < low || v > high) {
            return `element ${i} (${v}) outside [${low}, ${high}]`;
        }
    }
    return null;
}

/**
 * Check if a value is contained within a space
 */
export function contains(space: Space, value: SpaceValue): boolean {
    return checkContains(space, value) === null;
}

/**
 * Sample a random value from a space
 * Uses provided random function for reproducibility
 */
export function sample(space: Space, random: () => number = Math.random): SpaceValue {
    switch (space.kind) {
        case 'discrete':
            return space.start + Math.floor(random() * space.n);

        case 'box': {
            const size = shapeSize(space.shape);
            const integral = isIntegerDType(space.dtype);
            const result: number[] = [];
            for (let i = 0; i < size; i++) {
                const { low, high } = boundsAt(space, i);
                // Handle infinite bounds
                const lo = Number.isFinite(low) ? low : -1e6;
                const hi = Number.isFinite(high) ? high : 1e6;
                result.push(integral
                    ? Math.ceil(lo) + Math.floor(random() * (Math.floor(hi) - Math.ceil(lo) + 1))
                    : lo + random() * (hi - lo));
            }
            return result;
        }

        case 'multiDiscrete':
            return space.nvec.map((n, i) => space.start[i] + Math.floor(random() * n));

        case 'tuple':
            return space.spaces.map(s => sample(s, random));
    }
}

/**
 * Get the total dimension of a space (for flat vector representation)
 */
export function getDimension(space: Space): number {
    switch (space.kind) {
        case 'discrete':
            return 1;
        case 'box':
        case 'multiDiscrete':
            return shapeSize(space.shape);
        case 'tuple':
            return space.spaces.reduce((sum, s) => sum + getDimension(s), 0);
    }
}

function canonical(value: unknown): unknown {
    if (Array.isArray(value)) {
        return value.map(canonical);
    }
    if (typeof value === 'number' && !Number.isFinite(value)) {
        return String(value);
    }
    if (typeof value === 'object' && value !== null) {
        const entries: [string, unknown][] = Object.entries(value);
        entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
        const sorted: Record<string, unknown> = {};
        for (const [key, v] of entries) {
            if (v !== undefined) sorted[key] = canonical(v);
        }
        return sorted;
    }
    return value;
}

/**
 * Serialize a space to a canonical JSON string (for schema hash)
 */
export function serialize(space: Space): string {
    return JSON.stringify(canonical(space));
}

/**
 * Compute schema hash for an observation/action space pair
 */
export function computeSchemaHash(observationSpace: Space, actionSpace: Space): string {
    const text = JSON.stringify({
        observation: serialize(observationSpace),
        action: serialize(actionSpace),
    });
    return browserHash(text);
}
