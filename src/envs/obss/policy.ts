/**
 * @module envs/obss/policy
 */

import { deriveCommand, type PolicyCommand, type TelemetryRecord } from '../../telemetry/record';
import { OBSS_PD_COMMAND, TX_POWER_COMMAND } from './schema';

/**
 * Two commands for `[obssPd, txPower]`, both addressed to node 0
 */
export function encodeObssPolicy(action: readonly number[], template: TelemetryRecord): PolicyCommand[] {
    return [
        deriveCommand(template, { name: OBSS_PD_COMMAND, id: [0], value: [action[0]] }),
        deriveCommand(template, { name: TX_POWER_COMMAND, id: [0], value: [action[1]] }),
    ];
}
