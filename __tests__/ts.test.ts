/**
 * Rate Control Variant Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
    TsAdapter,
    TS_ACT_SPACE,
    NUM_MCS,
    buildTsObservation,
    extractCounts,
    successRatio,
    encodeTsPolicy,
    makeLinkPanel,
} from '../src/envs/ts';
import { record, type TelemetryBatch } from '../src/telemetry';
import { contains, DivisionByZeroError, Tensor, ValidationError } from '../src/core';
import { configFor, testOptions } from './test-utils';

function counts(succ: number, fail: number): TelemetryBatch {
    return [
        record('TsRateControl', 'meas::succ', [succ]),
        record('TsRateControl', 'meas::fail', [fail]),
    ];
}

describe('ts building blocks', () => {
    it('should extract both counts', () => {
        expect(extractCounts(counts(30, 10))).toEqual({ succ: 30, fail: 10 });
        expect(extractCounts([])).toEqual({ succ: -1, fail: -1 });
    });

    it('should build a [2, 1] uint32 observation', () => {
        const obs = buildTsObservation(counts(30, 10));
        expect(obs.dtype).toBe('uint32');
        expect(obs.toArray()).toEqual([[30], [10]]);
    });

    it('should compute succ / (succ + fail)', () => {
        expect(successRatio({ succ: 30, fail: 10 })).toEqual({ reward: 0.75, breakdown: { succ: 30, fail: 10 } });
        expect(successRatio({ succ: 3, fail: 1 }).reward).toBe(0.75);
        expect(successRatio({ succ: 0, fail: 4 }).reward).toBe(0);
    });

    it('should reject an empty interval', () => {
        expect(() => successRatio({ succ: 0, fail: 0 })).toThrow(DivisionByZeroError);
        expect(() => successRatio({ succ: 0, fail: 0 })).toThrow('Success ratio undefined: succ=0, fail=0');
    });

    it('should accept MCS 0..11', () => {
        expect(NUM_MCS).toBe(12);
        expect(contains(TS_ACT_SPACE, [0])).toBe(true);
        expect(contains(TS_ACT_SPACE, [11])).toBe(true);
        expect(contains(TS_ACT_SPACE, [12])).toBe(false);
    });

    it('should encode one mcsNew command', () => {
        const template = record('TsRateControl', 'meas::succ', [30], [0], { type: 'uint32' });
        expect(encodeTsPolicy([5], template)).toEqual([
            { type: 'uint32', source: 'TsRateControl', name: 'mcsNew', id: [0], value: [5] },
        ]);
    });

    it('should describe the link', () => {
        const obs = new Tensor([2, 1], 'uint32', [30, 10]);
        expect(makeLinkPanel(obs, undefined).lines).toEqual(['Obs: Succ=30', 'Obs: Fail=10']);
        const panel = makeLinkPanel(obs, 5);
        expect(panel.title).toBe('Network graph');
        expect(panel.nodes).toEqual([
            { label: 'STA', x: 0, y: 0 },
            { label: 'AP', x: 0, y: 1 },
        ]);
        expect(panel.lines).toEqual(['Action: MCS=5', 'Obs: Succ=30', 'Obs: Fail=10']);
    });
});

describe('TsAdapter', () => {
    let options: ReturnType<typeof testOptions>;
    let adapter: TsAdapter;

    beforeEach(() => {
        options = testOptions('ts');
        adapter = new TsAdapter(configFor('ts'), options);
    });

    it('should run one control step', () => {
        const batch = counts(30, 10);
        adapter.buildObservation(batch);
        expect(adapter.encodePolicy([5])).toEqual([
            { source: 'TsRateControl', name: 'mcsNew', id: [0], value: [5] },
        ]);
        expect(adapter.evaluateReward(batch)).toBe(0.75);
        expect(adapter.lastMcs).toBe(5);
        expect(adapter.history.latest('mcs')).toBe(5);
    });

    it('should propagate DivisionByZeroError without recording the step', () => {
        expect(() => adapter.evaluateReward(counts(0, 0))).toThrow(DivisionByZeroError);
        expect(adapter.history.size('reward')).toBe(0);
        expect(adapter.snapshot.step).toBe(0);
    });

    it('should keep history metrics aligned when a step fails', () => {
        adapter.buildObservation(counts(0, 0));
        adapter.encodePolicy([3]);
        expect(() => adapter.evaluateReward(counts(0, 0))).toThrow(DivisionByZeroError);
        expect(adapter.history.size('mcs')).toBe(0);

        adapter.encodePolicy([5]);
        adapter.evaluateReward(counts(30, 10));
        expect(['step', 'reward', 'mcs'].map(m => adapter.history.size(m))).toEqual([1, 1, 1]);
        expect(adapter.history.recent('mcs', 2)).toEqual([5, Number.NaN]);
    });

    it('should score missing counts from their sentinels', () => {
        adapter.buildObservation([]);
        expect(adapter.snapshot.violation).toBe('element 0 (-1) outside [0, 10000]');
        expect(adapter.evaluateReward([])).toBe(0.5);
    });

    it('should reject MCS 12', () => {
        adapter.buildObservation(counts(1, 1));
        const attempt = () => adapter.encodePolicy([12]);
        expect(attempt).toThrow(ValidationError);
        expect(attempt).toThrow('Action outside the ts action space: element 0 (12) outside [0, 11]');
    });

    it('should build the link panel from the last observation', () => {
        expect(adapter.makePanel()).toBeUndefined();
        adapter.buildObservation(counts(30, 10));
        expect(adapter.makePanel()?.lines).toEqual(['Obs: Succ=30', 'Obs: Fail=10']);
        adapter.encodePolicy([5]);
        expect(adapter.makePanel()?.lines[0]).toBe('Action: MCS=5');
    });
});
