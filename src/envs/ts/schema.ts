/**
 * @module envs/ts/schema
 * @description Spaces and record names for single-link rate control
 *
 * The simulator counts successful and failed transmissions at the current
 * MCS; the agent picks the next MCS (0..11).
 */

import { box, computeSchemaHash, multiDiscrete } from '../../core/space';
import type { Selector } from '../../telemetry/record';

export const TS_ENV = 'ts';

export const SUCCESS_COUNT: Selector = { source: 'TsRateControl', name: 'meas::succ' };
export const FAILURE_COUNT: Selector = { source: 'TsRateControl', name: 'meas::fail' };

export const MCS_COMMAND = 'mcsNew';

/** Highest MCS index + 1 */
export const NUM_MCS = 12;

/**
 * Observation: `[[succ], [fail]]`
 */
export const TS_OBS_SPACE = box([2, 1], 0, 10000, 'uint32');

export const TS_ACT_SPACE = multiDiscrete([NUM_MCS], { start: [0] });

export const TS_SCHEMA_HASH = computeSchemaHash(TS_OBS_SPACE, TS_ACT_SPACE);
