/**
 * @module envs/apb/adapter
 */

import { BaseAdapter, type AdapterOptions, type Observation, type RewardResult } from '../../adapter/adapter';
import type { AdapterConfig } from '../../adapter/config';
import type { PolicyCommand, TelemetryBatch, TelemetryRecord } from '../../telemetry/record';
import { buildApbObservation, extractAddends } from './observation';
import { encodeApbPolicy } from './policy';
import { differenceReward } from './reward';
import { ADDEND_A, APB_ACT_SPACE, APB_ENV, APB_OBS_SPACE } from './schema';

export class ApbAdapter extends BaseAdapter {
    constructor(config: AdapterConfig, options: AdapterOptions = {}) {
        super(
            {
                env: APB_ENV,
                rewardKind: 'difference',
                template: ADDEND_A,
                actionSpace: APB_ACT_SPACE,
                observationSpace: APB_OBS_SPACE,
                historyMetrics: ['sum'],
            },
            config,
            options
        );
    }

    protected observe(batch: TelemetryBatch): Observation {
        return buildApbObservation(batch, this.config.duplicatePolicy);
    }

    protected encode(action: readonly number[], template: TelemetryRecord): PolicyCommand[] {
        this.stageHistory({ sum: action[0] });
        return encodeApbPolicy(action, template);
    }

    protected score(batch: TelemetryBatch): RewardResult {
        return differenceReward(extractAddends(batch, this.config.duplicatePolicy));
    }
}
