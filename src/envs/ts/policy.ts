/**
 * @module envs/ts/policy
 */

import { deriveCommand, type PolicyCommand, type TelemetryRecord } from '../../telemetry/record';
import { MCS_COMMAND } from './schema';

export function encodeTsPolicy(action: readonly number[], template: TelemetryRecord): PolicyCommand[] {
    return [deriveCommand(template, { name: MCS_COMMAND, value: action })];
}
