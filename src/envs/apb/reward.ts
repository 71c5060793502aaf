/**
 * @module envs/apb/reward
 * @description Difference reward `a - b`
 *
 * Informative only: the reward does not depend on the agent's answer.
 */

import type { RewardResult } from '../../adapter/adapter';
import type { Addends } from './observation';

export function differenceReward({ a, b }: Addends): RewardResult {
    return {
        reward: a - b,
        breakdown: { a, b },
    };
}
