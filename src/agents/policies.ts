/**
 * @module agents/policies
 * @description Baseline decision makers for the environment variants
 */

import type { Adapter } from '../adapter/adapter';
import { ConfigError } from '../core/errors';
import type { SeededRandom } from '../core/repro';
import type { DecisionMaker } from '../core/runner';
import { sample, valueNumbers, type Space, type SpaceValue } from '../core/space';

// ==================== Random Policy ====================

/**
 * Random Policy: uniform sample of the action space
 */
export class RandomPolicy implements DecisionMaker {
    readonly name = 'random';
    private actionSpace: Space;

    constructor(actionSpace: Space) {
        this.actionSpace = actionSpace;
    }

    decide(_observation: SpaceValue, rng: SeededRandom): SpaceValue {
        return sample(this.actionSpace, () => rng.random());
    }
}

// ==================== Sum Policy ====================

/**
 * Sum Policy: answers the sum of all observed values (addition calculator)
 */
export class SumPolicy implements DecisionMaker {
    readonly name = 'sum';

    decide(observation: SpaceValue, _rng: SeededRandom): SpaceValue {
        return [valueNumbers(observation).reduce((a, b) => a + b, 0)];
    }
}

// ==================== Thompson Sampling MCS Policy ====================

/**
 * PHY rate per MCS index at 20 MHz (Mbps)
 */
export const MCS_RATES_20MHZ_MBPS: readonly number[] = [
    8.6, 17.2, 25.8, 34.4, 51.6, 68.8, 77.4, 86.0, 103.2, 114.7, 129.0, 143.4,
];

/**
 * Thompson sampling over MCS indices
 *
 * Keeps a Beta posterior of the delivery probability per MCS. Each decision
 * credits the counts observed to the MCS picked last time, then picks the
 * MCS maximizing `p ~ Beta(α + 1, β + 1)` times its PHY rate.
 * Observations summing to zero leave the posterior and the choice unchanged,
 * and so do observations with a missing (negative) count.
 */
export class ThompsonMcsPolicy implements DecisionMaker {
    readonly name = 'thompson-mcs';
    private readonly rates: readonly number[];
    private alpha: number[];
    private beta: number[];
    private mcs: number;
    private decided = false;

    constructor(rates: readonly number[] = MCS_RATES_20MHZ_MBPS, initialMcs = 0) {
        this.rates = rates;
        this.alpha = rates.map(() => 0);
        this.beta = rates.map(() => 0);
        this.mcs = initialMcs;
    }

    /** Success and failure totals per MCS */
    get posterior(): { alpha: readonly number[]; beta: readonly number[] } {
        return { alpha: [...this.alpha], beta: [...this.beta] };
    }

    decide(observation: SpaceValue, rng: SeededRandom): SpaceValue {
        const counts = valueNumbers(observation);
        const succ = counts[0] ?? -1;
        const fail = counts[1] ?? -1;
        const usable = succ >= 0 && fail >= 0 && succ + fail > 0;

        if (this.decided && usable) {
            this.alpha[this.mcs] += succ;
            this.beta[this.mcs] += fail;

            let best = 0;
            let bestScore = -Infinity;
            for (let i = 0; i < this.rates.length; i++) {
                const score = rng.beta(this.alpha[i] + 1, this.beta[i] + 1) * this.rates[i];
                if (score > bestScore) {
                    best = i;
                    bestScore = score;
                }
            }
            this.mcs = best;
        }

        this.decided = true;
        return [this.mcs];
    }

    /**
     * Forget all observed counts
     */
    clear(initialMcs = 0): void {
        this.alpha = this.rates.map(() => 0);
        this.beta = this.rates.map(() => 0);
        this.mcs = initialMcs;
        this.decided = false;
    }
}

// ==================== Factory ====================

export const POLICY_NAMES = ['random', 'sum', 'thompson'] as const;

export type PolicyName = (typeof POLICY_NAMES)[number];

/**
 * Decision maker named by a configuration's `agent`
 */
export function createPolicy(name: string, adapter: Adapter): DecisionMaker {
    switch (name) {
        case 'random':
            return new RandomPolicy(adapter.getActionSpace());
        case 'sum':
            return new SumPolicy();
        case 'thompson':
            return new ThompsonMcsPolicy();
        default:
            throw new ConfigError(`Unknown agent '${name}' (available: ${POLICY_NAMES.join(', ')})`, { agent: name });
    }
}
