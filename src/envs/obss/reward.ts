/**
 * @module envs/obss/reward
 * @description Weighted objective for the VR station
 *
 * reward = α·ΣThpt + β·(delayBudget − vrDelay) + η·(vrThpt − thptConstraint)
 */

import type { RewardResult } from '../../adapter/adapter';
import type { Tensor } from '../../core/tensor';
import {
    REWARD_ALPHA,
    REWARD_BETA,
    REWARD_ETA,
    VR_DELAY_CONSTRAINT_MS,
    VR_STATION_INDEX,
    VR_THPT_CONSTRAINT_MBPS,
} from './schema';

export interface WeightedObjectiveInput {
    /** Sum of uplink throughput over all nodes (Mbps) */
    totalThpt: number;
    /** VR station access delay (ms) */
    vrDelay: number;
    /** VR station uplink throughput (Mbps) */
    vrThpt: number;
}

export interface WeightedObjectiveWeights {
    alpha: number;
    beta: number;
    eta: number;
    delayBudgetMs: number;
    thptConstraintMbps: number;
}

export const DEFAULT_OBJECTIVE_WEIGHTS: WeightedObjectiveWeights = {
    alpha: REWARD_ALPHA,
    beta: REWARD_BETA,
    eta: REWARD_ETA,
    delayBudgetMs: VR_DELAY_CONSTRAINT_MS,
    thptConstraintMbps: VR_THPT_CONSTRAINT_MBPS,
};

export function weightedObjective(
    input: WeightedObjectiveInput,
    weights: WeightedObjectiveWeights = DEFAULT_OBJECTIVE_WEIGHTS
): RewardResult {
    const throughputTerm = weights.alpha * input.totalThpt;
    const delayTerm = weights.beta * (weights.delayBudgetMs - input.vrDelay);
    const vrTerm = weights.eta * (input.vrThpt - weights.thptConstraintMbps);

    return {
        reward: throughputTerm + delayTerm + vrTerm,
        breakdown: {
            totalThpt: input.totalThpt,
            vrThpt: input.vrThpt,
            vrDelay: input.vrDelay,
            throughputTerm,
            delayTerm,
            vrTerm,
        },
    };
}

/**
 * Objective inputs from the throughput and delay tensors
 */
export function objectiveInput(uplinkThpt: Tensor, vrDelay: Tensor): WeightedObjectiveInput {
    return {
        totalThpt: uplinkThpt.sum(),
        vrDelay: vrDelay.get(0),
        vrThpt: uplinkThpt.get(VR_STATION_INDEX),
    };
}
