/**
 * Step Environment and Runner Tests
 * Drives adapters end to end against an in-process telemetry replay
 */

import { describe, it, expect, vi } from 'vitest';
import { NetworkEnvironment, ReplayTelemetrySource } from '../src/env';
import { RandomPolicy, SumPolicy, ThompsonMcsPolicy } from '../src/agents';
import { ApbAdapter } from '../src/envs/apb';
import { ObssAdapter, OBSS_ACT_SPACE } from '../src/envs/obss';
import { TsAdapter } from '../src/envs/ts';
import { record, type TelemetryBatch } from '../src/telemetry';
import {
    AdapterError,
    ErrorCodes,
    MemoryLogger,
    NotInitializedError,
    Runner,
    runExperiment,
    contains,
    Tensor,
} from '../src/core';
import { configFor, testOptions } from './test-utils';

function addends(a: number, b: number): TelemetryBatch {
    return [record('calculator', 'addend::a', [a]), record('calculator', 'addend::b', [b])];
}

function counts(succ: number, fail: number): TelemetryBatch {
    return [record('TsRateControl', 'meas::succ', [succ]), record('TsRateControl', 'meas::fail', [fail])];
}

function apbEnvironment(source: ReplayTelemetrySource, stepsPerEpisode?: number): NetworkEnvironment {
    return new NetworkEnvironment(new ApbAdapter(configFor('apb'), testOptions('apb')), source, { stepsPerEpisode });
}

// ==================== Telemetry Replay ====================

describe('ReplayTelemetrySource', () => {
    it('should deliver batches in order and record commands', async () => {
        const source = new ReplayTelemetrySource([addends(1, 1), addends(2, 2)]);
        expect(await source.reset()).toEqual(addends(1, 1));

        const exchange = await source.exchange([]);
        expect(exchange).toEqual({ batch: addends(2, 2), terminated: true });
        expect(source.sent).toEqual([[]]);
        expect(source.delivered).toBe(2);
    });

    it('should fail once exhausted', async () => {
        const source = new ReplayTelemetrySource([addends(1, 1)]);
        await source.reset();
        await expect(source.exchange([])).rejects.toThrow('Telemetry replay is exhausted');
    });

    it('should pass the index and commands to a generator', async () => {
        const generate = vi.fn((index: number) => addends(index + 1, 1));
        const source = new ReplayTelemetrySource(generate, 3);
        await source.reset();
        await source.exchange([]);
        expect(generate).toHaveBeenNthCalledWith(1, 0, []);
        expect(generate).toHaveBeenNthCalledWith(2, 1, []);
    });

    it('should refuse batches after close', async () => {
        const source = new ReplayTelemetrySource(() => addends(1, 1));
        source.close();
        await expect(source.reset()).rejects.toThrow('Telemetry source is closed');
    });
});

// ==================== Network Environment ====================

describe('NetworkEnvironment', () => {
    it('should run encode, exchange, observe and score in one step', async () => {
        const source = new ReplayTelemetrySource([addends(7, 3), addends(5, 3)]);
        const env = apbEnvironment(source);

        const { observation } = await env.reset();
        expect(observation).toBeInstanceOf(Tensor);

        const result = await env.step([10]);
        expect(source.sent).toEqual([[{ source: 'calculator', name: 'sum', id: [0], value: [10] }]]);
        expect(result.reward).toBe(2);
        expect(result.done).toBe(true);
        expect(result.truncated).toBe(false);
        expect(result.info).toEqual({
            step: 1,
            commands: source.sent[0],
            rewardBreakdown: { a: 5, b: 3 },
            violation: undefined,
        });
    });

    it('should send one command bare and several as a list', async () => {
        const apbSource = new ReplayTelemetrySource([addends(7, 3), addends(5, 3)]);
        const apbExchange = vi.spyOn(apbSource, 'exchange');
        const apb = apbEnvironment(apbSource);
        await apb.reset();
        await apb.step([10]);
        expect(apbExchange).toHaveBeenCalledWith({ source: 'calculator', name: 'sum', id: [0], value: [10] });

        const rx = [record('Obss', 'Cpp2Py::RxPowerDbmMatrix', [-60], [37])];
        const obssSource = new ReplayTelemetrySource(() => rx);
        const obssExchange = vi.spyOn(obssSource, 'exchange');
        const obss = new NetworkEnvironment(new ObssAdapter(configFor('obss'), testOptions('obss')), obssSource);
        await obss.reset();
        await obss.step([-70, 18]);
        expect(obssExchange).toHaveBeenCalledWith([
            { source: 'Obss', name: 'Py2Cpp::ObssPdNew', id: [0], value: [-70] },
            { source: 'Obss', name: 'Py2Cpp::TxPowerNew', id: [0], value: [18] },
        ]);
        expect(obssSource.sent[0]).toHaveLength(2);
    });

    it('should truncate after the configured number of steps', async () => {
        const env = apbEnvironment(new ReplayTelemetrySource(() => addends(5, 3)), 2);
        await env.reset();
        expect((await env.step([8])).truncated).toBe(false);
        const second = await env.step([8]);
        expect(second.truncated).toBe(true);
        expect(second.done).toBe(false);
    });

    it('should default the episode length to the adapter configuration', async () => {
        const adapter = new ApbAdapter(configFor('apb', { stepsPerEpisode: 1 }), testOptions('apb'));
        const env = new NetworkEnvironment(adapter, new ReplayTelemetrySource(() => addends(5, 3)));
        await env.reset();
        expect((await env.step([8])).truncated).toBe(true);
    });

    it('should refuse to step before reset', async () => {
        const env = apbEnvironment(new ReplayTelemetrySource(() => addends(5, 3)));
        await expect(env.step([8])).rejects.toThrow(NotInitializedError);
    });

    it('should refuse overlapping steps', async () => {
        const env = apbEnvironment(new ReplayTelemetrySource(() => addends(5, 3)));
        await env.reset();

        const first = env.step([8]);
        await expect(env.step([8])).rejects.toThrow('A step is already in progress');
        expect((await first).reward).toBe(2);
    });

    it('should release the step guard after a failure', async () => {
        const env = apbEnvironment(new ReplayTelemetrySource(() => addends(5, 3)));
        await env.reset();
        await expect(env.step([40])).rejects.toThrow('Action outside the apb action space');
        expect((await env.step([8])).reward).toBe(2);
    });

    it('should surface source failures', async () => {
        const env = apbEnvironment(new ReplayTelemetrySource([addends(5, 3)]));
        await env.reset();
        await expect(env.step([8])).rejects.toBeInstanceOf(AdapterError);
    });

    it('should wrap foreign source errors', async () => {
        const env = apbEnvironment(new ReplayTelemetrySource((index) => {
            if (index > 0) throw new Error('link down');
            return addends(5, 3);
        }));
        await env.reset();
        await expect(env.step([8])).rejects.toMatchObject({ code: ErrorCodes.INTERNAL_ERROR, message: 'link down' });
    });
});

// ==================== Runner ====================

describe('Runner', () => {
    it('should run an episode until the source terminates', async () => {
        const source = new ReplayTelemetrySource(() => addends(5, 3), 4);
        const logger = new MemoryLogger({ env: 'apb' });
        const runner = new Runner({
            env: 'apb',
            seed: 2,
            environment: apbEnvironment(source),
            decisionMaker: new SumPolicy(),
            loggers: [logger],
        });

        const result = await runner.run();
        expect(result.totalEpisodes).toBe(1);
        expect(result.totalSteps).toBe(3);
        expect(result.episodes[0].terminated).toBe(true);
        expect(result.episodes[0].totalReward).toBe(6);
        expect(result.avgEpisodeReward).toBe(6);
        expect(source.sent.map(commands => commands[0].value)).toEqual([[8], [8], [8]]);

        expect(logger.steps.map(s => s.action)).toEqual([[8], [8], [8]]);
        expect(logger.episodes[0]).toMatchObject({ episode: 0, totalSteps: 3, totalReward: 6, avgReward: 2 });
    });

    it('should reset each episode with seed + episode', async () => {
        const source = new ReplayTelemetrySource(() => addends(5, 3));
        const reset = vi.spyOn(source, 'reset');
        const runner = new Runner({
            env: 'apb',
            seed: 42,
            environment: apbEnvironment(source, 1),
            decisionMaker: new SumPolicy(),
            totalEpisodes: 2,
        });

        const result = await runner.run();
        expect(result.totalSteps).toBe(2);
        expect(reset).toHaveBeenNthCalledWith(1, 42);
        expect(reset).toHaveBeenNthCalledWith(2, 43);
    });

    it('should refuse to step before reset', async () => {
        const runner = new Runner({
            env: 'apb',
            seed: 1,
            environment: apbEnvironment(new ReplayTelemetrySource(() => addends(5, 3))),
            decisionMaker: new SumPolicy(),
        });
        await expect(runner.step()).rejects.toThrow(NotInitializedError);
    });

    it('should drive random spatial-reuse actions inside the action space', async () => {
        const batch = [
            record('Obss', 'Cpp2Py::RxPowerDbmMatrix', [-60], [37]),
            record('Obss', 'Cpp2Py::UplinkThptMbps', [80, 20], [0, 4]),
            record('Obss', 'Cpp2Py::AccessDelayMs', [2], [4]),
        ];
        const source = new ReplayTelemetrySource(() => batch);
        const adapter = new ObssAdapter(configFor('obss'), testOptions('obss'));

        const result = await runExperiment({
            env: 'obss',
            seed: 2,
            environment: new NetworkEnvironment(adapter, source, { stepsPerEpisode: 5 }),
            decisionMaker: new RandomPolicy(adapter.getActionSpace()),
        });

        expect(result.totalSteps).toBe(5);
        expect(result.episodes[0].terminated).toBe(false);
        for (const commands of source.sent) {
            expect(commands).toHaveLength(2);
            expect(contains(OBSS_ACT_SPACE, [commands[0].value[0], commands[1].value[0]])).toBe(true);
        }
        expect(adapter.history.size('reward')).toBe(5);
        await expect(source.reset()).rejects.toThrow('Telemetry source is closed');
    });

    it('should run Thompson sampling on rate control', async () => {
        const source = new ReplayTelemetrySource(() => counts(30, 10));
        const adapter = new TsAdapter(configFor('ts'), testOptions('ts'));

        const result = await runExperiment({
            env: 'ts',
            seed: 2,
            environment: new NetworkEnvironment(adapter, source, { stepsPerEpisode: 4 }),
            decisionMaker: new ThompsonMcsPolicy(),
        });

        expect(source.sent[0][0].value).toEqual([0]);
        expect(result.episodes[0].steps.map(s => s.reward)).toEqual([0.75, 0.75, 0.75, 0.75]);
        expect(adapter.history.recent('mcs', 4).every(m => m >= 0 && m < 12)).toBe(true);
    });
});
