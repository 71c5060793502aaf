/**
 * @module envs/apb/policy
 */

import { deriveCommand, type PolicyCommand, type TelemetryRecord } from '../../telemetry/record';
import { SUM_COMMAND } from './schema';

/**
 * One `sum` command; id and passthrough fields come from the template
 */
export function encodeApbPolicy(action: readonly number[], template: TelemetryRecord): PolicyCommand[] {
    return [deriveCommand(template, { name: SUM_COMMAND, value: action })];
}
