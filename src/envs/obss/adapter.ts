/**
 * @module envs/obss/adapter
 */

import { BaseAdapter, type AdapterOptions, type Observation, type RewardResult } from '../../adapter/adapter';
import type { AdapterConfig } from '../../adapter/config';
import { Tensor } from '../../core/tensor';
import type { PolicyCommand, TelemetryBatch, TelemetryRecord } from '../../telemetry/record';
import { buildAccessDelay, buildObssObservation, buildUplinkThroughput, toTuple } from './observation';
import { encodeObssPolicy } from './policy';
import { makeHistoryTable, makeScenarioPlot, type HistoryTable, type ScenarioPlot } from './report';
import { objectiveInput, weightedObjective } from './reward';
import { OBSS_ACT_SPACE, OBSS_ENV, OBSS_OBS_SPACE, RX_POWER } from './schema';

export class ObssAdapter extends BaseAdapter {
    constructor(config: AdapterConfig, options: AdapterOptions = {}) {
        super(
            {
                env: OBSS_ENV,
                rewardKind: 'weighted-objective',
                template: RX_POWER,
                actionSpace: OBSS_ACT_SPACE,
                observationSpace: OBSS_OBS_SPACE,
                historyMetrics: ['obssPd', 'txPower', 'totalThpt', 'vrThpt', 'vrDelay'],
            },
            config,
            options
        );
    }

    protected observe(batch: TelemetryBatch): Observation {
        return toTuple(buildObssObservation(batch, this.config.duplicatePolicy));
    }

    protected encode(action: readonly number[], template: TelemetryRecord): PolicyCommand[] {
        this.stageHistory({ obssPd: action[0], txPower: action[1] });
        return encodeObssPolicy(action, template);
    }

    protected score(batch: TelemetryBatch): RewardResult {
        const policy = this.config.duplicatePolicy;
        const input = objectiveInput(buildUplinkThroughput(batch, policy), buildAccessDelay(batch, policy));
        this.stageHistory({ totalThpt: input.totalThpt, vrThpt: input.vrThpt, vrDelay: input.vrDelay });
        return weightedObjective(input);
    }

    /**
     * Most recent steps as table rows
     */
    makeTable(n = 20): HistoryTable {
        return makeHistoryTable(this.history, n);
    }

    /**
     * Node positions of the last observation, `undefined` before the first one
     */
    makePlot(): ScenarioPlot | undefined {
        const observation = this.snapshot.observation;
        if (observation === undefined || observation instanceof Tensor) return undefined;
        const nodeLoc = observation[4];
        return nodeLoc === undefined ? undefined : makeScenarioPlot(nodeLoc);
    }
}
