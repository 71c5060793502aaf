/**
 * @module telemetry/scatter
 * @description Write sparse `(id, value)` pairs into dense tensors
 *
 * Indices outside the target raise `ContractViolationError`; nothing is
 * clipped or dropped.
 */

import { ContractViolationError } from '../core/errors';
import type { Tensor } from '../core/tensor';
import type { PackedIndexCodec } from './packed';

function checkLengths(ids: readonly number[], values: readonly number[]): void {
    if (ids.length !== values.length) {
        throw new ContractViolationError(
            `ids has ${ids.length} entries, values has ${values.length}`,
            { ids: ids.length, values: values.length }
        );
    }
}

/**
 * `target[ids[i]] = values[i]` on a 1-D tensor
 */
export function scatterVector(target: Tensor, ids: readonly number[], values: readonly number[]): Tensor {
    checkLengths(ids, values);
    if (target.shape.length !== 1) {
        throw new ContractViolationError('scatterVector needs a 1-D target', { shape: target.shape });
    }
    for (let i = 0; i < ids.length; i++) {
        target.set([ids[i]], values[i]);
    }
    return target;
}

/**
 * `target[ids[i], column] = values[i]` on a 2-D tensor
 */
export function scatterColumn(
    target: Tensor,
    column: number,
    ids: readonly number[],
    values: readonly number[]
): Tensor {
    checkLengths(ids, values);
    if (target.shape.length !== 2) {
        throw new ContractViolationError('scatterColumn needs a 2-D target', { shape: target.shape });
    }
    for (let i = 0; i < ids.length; i++) {
        target.set([ids[i], column], values[i]);
    }
    return target;
}

/**
 * Decode packed ids and write each value at its `(row, col)` cell
 */
export function scatterPacked(
    target: Tensor,
    codec: PackedIndexCodec,
    ids: readonly number[],
    values: readonly number[]
): Tensor {
    checkLengths(ids, values);
    if (target.shape.length !== 2 || target.shape[0] !== codec.rows || target.shape[1] !== codec.cols) {
        throw new ContractViolationError(
            `scatterPacked target [${target.shape.join(', ')}] != [${codec.rows}, ${codec.cols}]`,
            { shape: target.shape }
        );
    }
    for (let i = 0; i < ids.length; i++) {
        const { row, col } = codec.decode(ids[i]);
        target.set([row, col], values[i]);
    }
    return target;
}
