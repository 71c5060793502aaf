/**
 * @module envs/apb/schema
 * @description Spaces and record names for the addition calculator
 *
 * The simulator reports two addends; the agent answers with their sum.
 */

import { computeSchemaHash, multiDiscrete } from '../../core/space';
import type { Selector } from '../../telemetry/record';

export const APB_ENV = 'apb';

// ==================== Records ====================

export const ADDEND_A: Selector = { source: 'calculator', name: 'addend::a' };
export const ADDEND_B: Selector = { source: 'calculator', name: 'addend::b' };

/** Command carrying the agent's answer */
export const SUM_COMMAND = 'sum';

// ==================== Space Definitions ====================

/**
 * Observation: `[[a], [b]]`, each addend in 1..10
 */
export const APB_OBS_SPACE = multiDiscrete([10, 10], { start: [1, 1], shape: [2, 1] });

/**
 * Action: the sum, 2..20
 */
export const APB_ACT_SPACE = multiDiscrete([19], { start: [2] });

export const APB_SCHEMA_HASH = computeSchemaHash(APB_OBS_SPACE, APB_ACT_SPACE);
