/**
 * @module env/environment
 * @description Step environment driving an adapter against a telemetry source
 *
 * reset: batch → observation
 * step:  action → commands → exchange → observation → reward
 */

import type { Adapter } from '../adapter/adapter';
import { AdapterError, ErrorCodes, NotInitializedError, wrapError } from '../core/errors';
import type { Environment, Transition } from '../core/runner';
import type { Space, SpaceValue } from '../core/space';
import { commandPayload, type PolicyCommand } from '../telemetry/record';
import type { Exchange, TelemetrySource } from './source';

export interface NetworkStepInfo extends Record<string, unknown> {
    step: number;
    commands: PolicyCommand[];
    rewardBreakdown: Record<string, number>;
    /** Set when the observation fell outside its contract */
    violation?: string;
}

export interface NetworkEnvironmentOptions {
    /** Steps before `truncated`; defaults to the adapter configuration */
    stepsPerEpisode?: number;
}

export class NetworkEnvironment implements Environment<SpaceValue, SpaceValue, Record<string, unknown>> {
    readonly observationSpace: Space;
    readonly actionSpace: Space;
    readonly adapter: Adapter;
    private readonly source: TelemetrySource;
    private readonly stepsPerEpisode: number;
    private stepCount = 0;
    private ready = false;
    private busy = false;

    constructor(adapter: Adapter, source: TelemetrySource, options: NetworkEnvironmentOptions = {}) {
        this.adapter = adapter;
        this.source = source;
        this.observationSpace = adapter.getObservationSpace();
        this.actionSpace = adapter.getActionSpace();
        this.stepsPerEpisode = options.stepsPerEpisode ?? adapter.config.stepsPerEpisode;
    }

    async reset(seed?: number): Promise<{ observation: SpaceValue; info: Record<string, unknown> }> {
        const batch = await this.source.reset(seed ?? this.adapter.config.seed);
        const observation = this.adapter.buildObservation(batch);
        this.stepCount = 0;
        this.ready = true;
        return { observation, info: { violation: this.adapter.snapshot.violation } };
    }

    async step(action: SpaceValue): Promise<Transition<SpaceValue, NetworkStepInfo>> {
        if (!this.ready) {
            throw new NotInitializedError('NetworkEnvironment.step() called before reset()');
        }
        if (this.busy) {
            throw new AdapterError(ErrorCodes.INTERNAL_ERROR, 'A step is already in progress');
        }

        this.busy = true;
        try {
            const commands = this.adapter.encodePolicy(action);
            let exchange: Exchange;
            try {
                exchange = await this.source.exchange(commandPayload(commands));
            } catch (error) {
                throw wrapError(error);
            }
            const { batch, terminated } = exchange;
            const observation = this.adapter.buildObservation(batch);
            const reward = this.adapter.evaluateReward(batch);
            this.stepCount++;

            const snapshot = this.adapter.snapshot;
            return {
                observation,
                reward,
                done: terminated,
                truncated: !terminated && this.stepCount >= this.stepsPerEpisode,
                info: {
                    step: this.stepCount,
                    commands,
                    rewardBreakdown: snapshot.breakdown ?? {},
                    violation: snapshot.violation,
                },
            };
        } finally {
            this.busy = false;
        }
    }

    close(): void {
        this.source.close();
    }
}
