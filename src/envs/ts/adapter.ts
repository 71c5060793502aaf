/**
 * @module envs/ts/adapter
 */

import { BaseAdapter, type AdapterOptions, type Observation, type RewardResult } from '../../adapter/adapter';
import type { AdapterConfig } from '../../adapter/config';
import { Tensor } from '../../core/tensor';
import type { PolicyCommand, TelemetryBatch, TelemetryRecord } from '../../telemetry/record';
import { buildTsObservation, extractCounts } from './observation';
import { encodeTsPolicy } from './policy';
import { makeLinkPanel, type LinkPanel } from './report';
import { successRatio } from './reward';
import { SUCCESS_COUNT, TS_ACT_SPACE, TS_ENV, TS_OBS_SPACE } from './schema';

export class TsAdapter extends BaseAdapter {
    private mcs: number | undefined;

    constructor(config: AdapterConfig, options: AdapterOptions = {}) {
        super(
            {
                env: TS_ENV,
                rewardKind: 'success-ratio',
                template: SUCCESS_COUNT,
                actionSpace: TS_ACT_SPACE,
                observationSpace: TS_OBS_SPACE,
                historyMetrics: ['mcs'],
            },
            config,
            options
        );
    }

    /** MCS of the last encoded action */
    get lastMcs(): number | undefined {
        return this.mcs;
    }

    protected observe(batch: TelemetryBatch): Observation {
        return buildTsObservation(batch, this.config.duplicatePolicy);
    }

    protected encode(action: readonly number[], template: TelemetryRecord): PolicyCommand[] {
        this.mcs = action[0];
        this.stageHistory({ mcs: action[0] });
        return encodeTsPolicy(action, template);
    }

    protected score(batch: TelemetryBatch): RewardResult {
        return successRatio(extractCounts(batch, this.config.duplicatePolicy));
    }

    /**
     * Link panel for the last observation, `undefined` before the first one
     */
    makePanel(): LinkPanel | undefined {
        const observation = this.snapshot.observation;
        return observation instanceof Tensor ? makeLinkPanel(observation, this.mcs) : undefined;
    }
}
