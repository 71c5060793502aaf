/**
 * @module adapter/adapter
 * @description Adapter interface and the shared step logic of all variants
 *
 * Per control step the caller runs, in order:
 * 1. `buildObservation(batch)` - telemetry → observation tensor(s)
 * 2. `encodePolicy(action)` - action vector → simulator command(s)
 * 3. `evaluateReward(batch)` - telemetry → scalar reward
 *
 * The adapter owns two pieces of state: the retained template record that
 * seeds outgoing commands, and the history ledger. Both are mutated only by
 * the three operations above. A batch that fails to build leaves the template
 * untouched, and history is written only once a step has a reward, so every
 * metric gains exactly one sample per completed step.
 */

import type { AdapterError } from '../core/errors';
import { EnvironmentMismatchError, ErrorCodes, NotInitializedError, ValidationError } from '../core/errors';
import { ConsoleLogger, type Logger } from '../core/logging';
import { checkContains, dtypeOf, valueNumbers, type LeafSpace, type Space, type SpaceValue } from '../core/space';
import { coerce, Tensor } from '../core/tensor';
import { HistoryLedger } from '../history/ledger';
import { findRecord } from '../telemetry/extract';
import type { PolicyCommand, Selector, TelemetryBatch, TelemetryRecord } from '../telemetry/record';
import type { AdapterConfig } from './config';

// ==================== Types ====================

/**
 * Reward formula family of a variant
 */
export type RewardKind = 'difference' | 'weighted-objective' | 'success-ratio';

/**
 * One observation: a single tensor or an ordered tuple of tensors
 */
export type Observation = Tensor | readonly Tensor[];

export interface RewardResult {
    reward: number;
    /** Named terms of the formula, for logging */
    breakdown: Record<string, number>;
}

/**
 * What the adapter saw and produced in the most recent step
 */
export interface StepSnapshot {
    /** Completed reward evaluations so far */
    step: number;
    observation?: Observation;
    action?: number[];
    commands?: PolicyCommand[];
    reward?: number;
    breakdown?: Record<string, number>;
    /** Why the last observation fell outside its contract, if it did */
    violation?: string;
}

/**
 * Static description of a variant
 */
export interface VariantDefinition {
    /** Variant name the configuration must carry */
    env: string;
    rewardKind: RewardKind;
    /** Record whose winning match seeds outgoing commands */
    template: Selector;
    actionSpace: LeafSpace;
    observationSpace: Space;
    /** History metrics registered up front (reads in this order) */
    historyMetrics?: readonly string[];
}

/**
 * Receives unrecoverable errors. Must not return.
 */
export type FatalHandler = (error: AdapterError) => never;

export interface AdapterOptions {
    logger?: Logger;
    /** Defaults to logging the error and exiting the process */
    onFatal?: FatalHandler;
}

export interface Adapter {
    readonly env: string;
    readonly rewardKind: RewardKind;
    readonly config: AdapterConfig;
    readonly history: HistoryLedger;
    /** Retained template record, `undefined` until one has been seen */
    readonly template: TelemetryRecord | undefined;
    readonly snapshot: StepSnapshot;

    getActionSpace(): LeafSpace;
    getObservationSpace(): Space;
    buildObservation(batch: TelemetryBatch): Observation;
    encodePolicy(action: SpaceValue): PolicyCommand[];
    evaluateReward(batch: TelemetryBatch): number;
}

// ==================== Fatal Handling ====================

/**
 * Default fatal handler: terminate with status 1. The adapter has already
 * logged the error through its own logger.
 */
export const exitOnFatal: FatalHandler = () => {
    process.exit(1);
};

// ==================== Base Adapter ====================

export abstract class BaseAdapter implements Adapter {
    readonly env: string;
    readonly rewardKind: RewardKind;
    readonly config: AdapterConfig;
    readonly history: HistoryLedger;

    protected readonly logger: Logger;
    private readonly variant: VariantDefinition;
    private templateRecord: TelemetryRecord | undefined;
    private steps = 0;
    private current: StepSnapshot = { step: 0 };
    private staged: Record<string, number> = {};

    constructor(variant: VariantDefinition, config: AdapterConfig, options: AdapterOptions = {}) {
        this.variant = variant;
        this.env = variant.env;
        this.rewardKind = variant.rewardKind;
        this.config = config;
        this.logger = options.logger ?? new ConsoleLogger({ env: variant.env, level: config.logLevel });

        if (config.env !== variant.env) {
            const error = new EnvironmentMismatchError(config.env, variant.env);
            this.logger.logEvent({ level: 'error', message: error.message, details: error.toJSON() });
            (options.onFatal ?? exitOnFatal)(error);
        }

        this.history = new HistoryLedger(config.historyCapacity, ['step', 'reward', ...(variant.historyMetrics ?? [])]);
    }

    get template(): TelemetryRecord | undefined {
        return this.templateRecord;
    }

    get snapshot(): StepSnapshot {
        return this.current;
    }

    getActionSpace(): LeafSpace {
        return this.variant.actionSpace;
    }

    getObservationSpace(): Space {
        return this.variant.observationSpace;
    }

    // ==================== Variant Hooks ====================

    /** Build the observation tensors from a batch */
    protected abstract observe(batch: TelemetryBatch): Observation;

    /** Turn a validated, dtype-coerced action into commands */
    protected abstract encode(action: readonly number[], template: TelemetryRecord): PolicyCommand[];

    /** Evaluate the reward formula on a batch */
    protected abstract score(batch: TelemetryBatch): RewardResult;

    /**
     * Queue history samples for the current step. They reach the ledger
     * together with `step` and `reward` once the reward is known; a later
     * value for the same metric replaces the queued one.
     */
    protected stageHistory(values: Readonly<Record<string, number>>): void {
        this.staged = { ...this.staged, ...values };
    }

    // ==================== Step Operations ====================

    buildObservation(batch: TelemetryBatch): Observation {
        const template = findRecord(batch, this.variant.template, this.config.duplicatePolicy);
        const observation = this.observe(batch);
        if (template !== undefined) {
            this.templateRecord = template;
        }
        const tensors: readonly Tensor[] = observation instanceof Tensor ? [observation] : observation;
        for (const tensor of tensors) tensor.freeze();

        const violation = checkContains(this.variant.observationSpace, observation) ?? undefined;
        if (violation !== undefined) {
            this.logger.logEvent({
                level: 'warn',
                message: `Observation outside its contract: ${violation}`,
                details: { step: this.steps + 1 },
            });
        }

        const { action, commands } = this.current;
        this.current = { step: this.steps, observation, violation, action, commands };
        this.logger.logStep({ step: this.steps + 1, observation });
        return observation;
    }

    encodePolicy(action: SpaceValue): PolicyCommand[] {
        const actionSpace = this.variant.actionSpace;
        const reason = checkContains(actionSpace, action);
        if (reason !== null) {
            throw new ValidationError(
                `Action outside the ${this.env} action space: ${reason}`,
                { action: valueNumbers(action) },
                ErrorCodes.INVALID_ACTION
            );
        }

        const template = this.templateRecord;
        if (template === undefined) {
            throw new NotInitializedError(
                `No ${this.variant.template.source}/${this.variant.template.name} record received yet; ` +
                'build an observation before encoding a policy'
            );
        }

        const dtype = dtypeOf(actionSpace);
        const values = valueNumbers(action).map(v => coerce(v, dtype));
        const commands = this.encode(values, template);

        this.current = { ...this.current, action: values, commands };
        this.logger.logStep({ step: this.steps + 1, action: values, commands });
        return commands;
    }

    evaluateReward(batch: TelemetryBatch): number {
        const { reward, breakdown } = this.score(batch);

        this.steps++;
        this.history.record({ step: this.steps, reward, ...this.staged });
        this.staged = {};

        this.current = { ...this.current, step: this.steps, reward, breakdown };
        this.logger.logStep({ step: this.steps, reward, rewardBreakdown: breakdown });
        return reward;
    }
}
