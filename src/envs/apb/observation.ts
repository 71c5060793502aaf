/**
 * @module envs/apb/observation
 */

import { Tensor } from '../../core/tensor';
import { extractScalar, type DuplicatePolicy } from '../../telemetry/extract';
import type { TelemetryBatch } from '../../telemetry/record';
import { ADDEND_A, ADDEND_B } from './schema';

export interface Addends {
    a: number;
    b: number;
}

/**
 * Both addends, `-1` for a missing one
 */
export function extractAddends(batch: TelemetryBatch, policy: DuplicatePolicy = 'last'): Addends {
    return {
        a: extractScalar(batch, ADDEND_A, policy),
        b: extractScalar(batch, ADDEND_B, policy),
    };
}

export function buildApbObservation(batch: TelemetryBatch, policy: DuplicatePolicy = 'last'): Tensor {
    const { a, b } = extractAddends(batch, policy);
    return new Tensor([2, 1], 'int64', [a, b]);
}
