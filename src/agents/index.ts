/**
 * @module agents
 */

export type { PolicyName } from './policies';
export {
    RandomPolicy,
    SumPolicy,
    ThompsonMcsPolicy,
    MCS_RATES_20MHZ_MBPS,
    POLICY_NAMES,
    createPolicy,
} from './policies';
