/**
 * @module envs/ts/reward
 * @description Success ratio `succ / (succ + fail)`
 */

import type { RewardResult } from '../../adapter/adapter';
import { DivisionByZeroError } from '../../core/errors';
import type { TransmissionCounts } from './observation';

/**
 * @throws DivisionByZeroError when `succ + fail` is zero
 */
export function successRatio({ succ, fail }: TransmissionCounts): RewardResult {
    const total = succ + fail;
    if (total === 0) {
        throw new DivisionByZeroError(`Success ratio undefined: succ=${succ}, fail=${fail}`, { succ, fail });
    }
    return {
        reward: succ / total,
        breakdown: { succ, fail },
    };
}
