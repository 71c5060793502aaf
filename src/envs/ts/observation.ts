/**
 * @module envs/ts/observation
 */

import { Tensor } from '../../core/tensor';
import { extractScalar, type DuplicatePolicy } from '../../telemetry/extract';
import type { TelemetryBatch } from '../../telemetry/record';
import { FAILURE_COUNT, SUCCESS_COUNT } from './schema';

export interface TransmissionCounts {
    succ: number;
    fail: number;
}

/**
 * Success and failure counts, `-1` for a missing one
 */
export function extractCounts(batch: TelemetryBatch, policy: DuplicatePolicy = 'last'): TransmissionCounts {
    return {
        succ: extractScalar(batch, SUCCESS_COUNT, policy),
        fail: extractScalar(batch, FAILURE_COUNT, policy),
    };
}

export function buildTsObservation(batch: TelemetryBatch, policy: DuplicatePolicy = 'last'): Tensor {
    const { succ, fail } = extractCounts(batch, policy);
    return new Tensor([2, 1], 'uint32', [succ, fail]);
}
