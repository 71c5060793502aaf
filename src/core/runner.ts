/**
 * @module core/runner
 * @description Episode runner for an environment and a decision maker
 *
 * Drives the control loop reset → decide → step → log for a configured number
 * of episodes. Steps never overlap: each one awaits the environment before the
 * next decision is taken.
 */

import { valueNumbers, type Space, type SpaceValue } from './space';
import type { Logger } from './logging';
import { createRng, type SeededRandom } from './repro';
import { NotInitializedError } from './errors';

// ==================== Core Interfaces ====================

export interface Transition<Obs, Info> {
    observation: Obs;
    reward: number;
    /** The environment ended the episode */
    done: boolean;
    /** A step limit cut the episode */
    truncated: boolean;
    info: Info;
}

/**
 * Step/reset environment interface
 */
export interface Environment<Obs = SpaceValue, Act = SpaceValue, Info = Record<string, unknown>> {
    observationSpace: Space;
    actionSpace: Space;

    /**
     * Start an episode
     * @param seed - Seed forwarded to the simulator session
     */
    reset(seed?: number): Promise<{ observation: Obs; info: Info }>;

    /** Apply one action and wait for its outcome */
    step(action: Act): Promise<Transition<Obs, Info>>;

    close(): void;
}

/**
 * Picks actions from observations
 */
export interface DecisionMaker<Obs = SpaceValue, Act = SpaceValue> {
    /** Name for logging */
    name: string;

    /**
     * @param rng - Seeded generator owned by the runner
     */
    decide(observation: Obs, rng: SeededRandom): Act | Promise<Act>;

    /** Called at the start of every episode */
    reset?(): void;
}

// ==================== Runner Configuration ====================

export interface RunnerConfig {
    /** Environment variant name (stamped on log entries) */
    env: string;
    /** Base seed; episode `k` resets with `seed + k` */
    seed: number;
    environment: Environment;
    decisionMaker: DecisionMaker;
    loggers?: Logger[];
    /** Hard cap on steps per episode, on top of the environment's own limit */
    maxStepsPerEpisode?: number;
    totalEpisodes?: number;
}

export interface StepResult extends Transition<SpaceValue, Record<string, unknown>> {
    /** Action that produced this transition */
    action: SpaceValue;
}

export interface EpisodeResult {
    episode: number;
    totalSteps: number;
    totalReward: number;
    avgReward: number;
    /** Ended by the environment rather than truncated */
    terminated: boolean;
    steps: StepResult[];
}

export interface RunResult {
    env: string;
    seed: number;
    totalEpisodes: number;
    totalSteps: number;
    avgEpisodeReward: number;
    avgEpisodeLength: number;
    episodes: EpisodeResult[];
}

// ==================== Runner ====================

export class Runner {
    private readonly config: Required<RunnerConfig>;
    private readonly rng: SeededRandom;
    private episodeIndex = 0;
    private stepIndex = 0;
    private observation: SpaceValue | undefined;

    constructor(config: RunnerConfig) {
        this.config = {
            loggers: [],
            maxStepsPerEpisode: 1000,
            totalEpisodes: 1,
            ...config,
        };
        this.rng = createRng(config.seed);
    }

    /** Index of the episode the next reset starts */
    get episode(): number {
        return this.episodeIndex;
    }

    async reset(): Promise<SpaceValue> {
        const { environment, decisionMaker, seed } = this.config;
        this.stepIndex = 0;
        decisionMaker.reset?.();

        const { observation } = await environment.reset(seed + this.episodeIndex);
        this.observation = observation;
        return observation;
    }

    async step(): Promise<StepResult> {
        if (this.observation === undefined) {
            throw new NotInitializedError('Runner.step() called before reset()');
        }

        const action = await this.config.decisionMaker.decide(this.observation, this.rng);
        const transition = await this.config.environment.step(action);
        this.stepIndex++;
        this.observation = transition.observation;

        const truncated = transition.truncated || this.stepIndex >= this.config.maxStepsPerEpisode;
        const result: StepResult = { ...transition, action, truncated };

        for (const logger of this.config.loggers) {
            logger.logStep({
                episode: this.episodeIndex,
                step: this.stepIndex,
                action: valueNumbers(action),
                reward: result.reward,
                done: result.done,
                truncated,
            });
        }
        return result;
    }

    async runEpisode(): Promise<EpisodeResult> {
        await this.reset();

        const steps: StepResult[] = [];
        let last: StepResult;
        do {
            last = await this.step();
            steps.push(last);
        } while (!(last.done || last.truncated));

        const totalReward = steps.reduce((sum, s) => sum + s.reward, 0);
        const result: EpisodeResult = {
            episode: this.episodeIndex,
            totalSteps: steps.length,
            totalReward,
            avgReward: totalReward / steps.length,
            terminated: last.done,
            steps,
        };

        for (const logger of this.config.loggers) {
            logger.logEpisode({
                episode: result.episode,
                totalSteps: result.totalSteps,
                totalReward: result.totalReward,
                avgReward: result.avgReward,
                terminated: result.terminated,
            });
        }

        this.episodeIndex++;
        return result;
    }

    /**
     * All configured episodes back to back; flushes the loggers at the end
     */
    async run(): Promise<RunResult> {
        const episodes: EpisodeResult[] = [];
        while (episodes.length < this.config.totalEpisodes) {
            episodes.push(await this.runEpisode());
        }

        for (const logger of this.config.loggers) logger.flush();

        const totalSteps = episodes.reduce((sum, e) => sum + e.totalSteps, 0);
        const count = Math.max(episodes.length, 1);
        return {
            env: this.config.env,
            seed: this.config.seed,
            totalEpisodes: episodes.length,
            totalSteps,
            avgEpisodeReward: episodes.reduce((sum, e) => sum + e.totalReward, 0) / count,
            avgEpisodeLength: totalSteps / count,
            episodes,
        };
    }

    /** Close the environment, then the loggers */
    close(): void {
        this.config.environment.close();
        for (const logger of this.config.loggers) logger.close();
    }
}

/**
 * Run all episodes, closing the runner afterwards
 */
export async function runExperiment(config: RunnerConfig): Promise<RunResult> {
    const runner = new Runner(config);
    try {
        return await runner.run();
    } finally {
        runner.close();
    }
}
