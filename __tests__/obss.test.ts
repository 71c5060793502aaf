/**
 * Multi-BSS Spatial Reuse Variant Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
    ObssAdapter,
    OBSS_ACT_SPACE,
    OBSS_OBS_SPACE,
    DEFAULT_OBJECTIVE_WEIGHTS,
    buildObssObservation,
    buildUplinkThroughput,
    buildAccessDelay,
    objectiveInput,
    weightedObjective,
    encodeObssPolicy,
    makeHistoryTable,
    makeScenarioPlot,
    nodeRole,
    formatFixed,
    toTuple,
} from '../src/envs/obss';
import { HistoryLedger } from '../src/history';
import { record, type TelemetryBatch } from '../src/telemetry';
import { contains, getDimension, ContractViolationError, Tensor } from '../src/core';
import { configFor, testOptions } from './test-utils';

function obssBatch(): TelemetryBatch {
    return [
        record('Obss', 'Cpp2Py::RxPowerDbmMatrix', [-60, -75], [37, 255], { type: 'double' }),
        record('Obss', 'Cpp2Py::McsIndex', [7, 11], [0, 1]),
        record('Obss', 'Cpp2Py::UplinkThptMbps', [80, 20], [0, 4]),
        record('Obss', 'Cpp2Py::AccessDelayMs', [2], [4]),
        record('Obss', 'Cpp2Py::NodeX', [10, 40], [0, 4]),
        record('Obss', 'Cpp2Py::NodeY', [10, 12.5], [0, 4]),
    ];
}

// ==================== Observation ====================

describe('buildObssObservation', () => {
    it('should scatter every record into its tensor', () => {
        const obs = buildObssObservation(obssBatch());

        expect(obs.rxPowerDbm.shape).toEqual([8, 32]);
        expect(obs.rxPowerDbm.get(1, 5)).toBe(-60);
        expect(obs.rxPowerDbm.get(7, 31)).toBe(-75);
        expect(obs.rxPowerDbm.get(0, 0)).toBe(0);
        expect(obs.mcsIndex.toFlat()).toEqual([7, 11, 0, 0, 0, 0, 0, 0]);
        expect(obs.uplinkThpt.get(4)).toBe(20);
        expect(obs.vrDelay.toFlat()).toEqual([2]);
        expect(obs.nodeLoc.get(4, 0)).toBe(40);
        expect(obs.nodeLoc.get(4, 1)).toBe(12.5);
    });

    it('should scatter a matrix split over several records', () => {
        const batch = [
            record('Obss', 'Cpp2Py::RxPowerDbmMatrix', [-60], [37]),
            record('Obss', 'Cpp2Py::RxPowerDbmMatrix', [-75], [255]),
        ];
        const obs = buildObssObservation(batch);
        expect(obs.rxPowerDbm.get(1, 5)).toBe(-60);
        expect(obs.rxPowerDbm.get(7, 31)).toBe(-75);
    });

    it('should resolve a cell written twice by the duplicate policy', () => {
        const batch = [
            record('Obss', 'Cpp2Py::RxPowerDbmMatrix', [-60, -70], [37, 38]),
            record('Obss', 'Cpp2Py::RxPowerDbmMatrix', [-50], [37]),
        ];
        const last = buildObssObservation(batch).rxPowerDbm;
        expect([last.get(1, 5), last.get(1, 6)]).toEqual([-50, -70]);

        const first = buildObssObservation(batch, 'first').rxPowerDbm;
        expect([first.get(1, 5), first.get(1, 6)]).toEqual([-60, -70]);

        expect(() => buildObssObservation(batch, 'error')).toThrow(ContractViolationError);
    });

    it('should gather per-node values from every record', () => {
        const batch = [
            record('Obss', 'Cpp2Py::NodeX', [10], [0]),
            record('Obss', 'Cpp2Py::NodeX', [40], [4]),
            record('Obss', 'Cpp2Py::McsIndex', [7], [0]),
            record('Obss', 'Cpp2Py::McsIndex', [11], [1]),
            record('Obss', 'Cpp2Py::UplinkThptMbps', [80], [0]),
            record('Obss', 'Cpp2Py::UplinkThptMbps', [20], [4]),
        ];
        const obs = buildObssObservation(batch);
        expect(obs.nodeLoc.get(0, 0)).toBe(10);
        expect(obs.nodeLoc.get(4, 0)).toBe(40);
        expect(obs.mcsIndex.toFlat()).toEqual([7, 11, 0, 0, 0, 0, 0, 0]);
        expect(obs.uplinkThpt.sum()).toBe(100);
    });

    it('should fit the observation space', () => {
        const tuple = toTuple(buildObssObservation(obssBatch()));
        expect(contains(OBSS_OBS_SPACE, tuple)).toBe(true);
        expect(getDimension(OBSS_OBS_SPACE)).toBe(256 + 8 + 32 + 1 + 64);
    });

    it('should leave every tensor at zero for an empty batch', () => {
        const obs = buildObssObservation([]);
        expect(toTuple(obs).every(t => t.sum() === 0)).toBe(true);
    });

    it('should reject packed ids past the matrix', () => {
        const batch = [record('Obss', 'Cpp2Py::RxPowerDbmMatrix', [-60], [256])];
        expect(() => buildObssObservation(batch)).toThrow(ContractViolationError);
    });

    it('should reject node ids past the node count', () => {
        const batch = [record('Obss', 'Cpp2Py::UplinkThptMbps', [1], [32])];
        expect(() => buildUplinkThroughput(batch)).toThrow(ContractViolationError);
    });

    it('should take the access delay from the first value', () => {
        expect(buildAccessDelay([record('Obss', 'Cpp2Py::AccessDelayMs', [3.5], [4])]).get(0)).toBe(3.5);
        expect(buildAccessDelay([]).get(0)).toBe(0);
    });
});

// ==================== Reward ====================

describe('weightedObjective', () => {
    it('should use alpha = 1, beta = 5, eta = 1', () => {
        expect(DEFAULT_OBJECTIVE_WEIGHTS).toEqual({
            alpha: 1, beta: 5, eta: 1, delayBudgetMs: 5, thptConstraintMbps: 14.7,
        });
    });

    it('should combine throughput, delay and VR terms', () => {
        const { reward, breakdown } = weightedObjective({ totalThpt: 100, vrDelay: 2, vrThpt: 20 });
        expect(reward).toBeCloseTo(120.3, 9);
        expect(breakdown.throughputTerm).toBe(100);
        expect(breakdown.delayTerm).toBe(15);
        expect(breakdown.vrTerm).toBeCloseTo(5.3, 9);
    });

    it('should go negative past the delay budget', () => {
        expect(weightedObjective({ totalThpt: 0, vrDelay: 10, vrThpt: 0 }).reward).toBeCloseTo(-39.7, 9);
    });

    it('should accept custom weights', () => {
        const weights = { ...DEFAULT_OBJECTIVE_WEIGHTS, alpha: 0, beta: 0 };
        expect(weightedObjective({ totalThpt: 100, vrDelay: 2, vrThpt: 20 }, weights).reward).toBeCloseTo(5.3, 9);
    });

    it('should read the VR station throughput at node 4', () => {
        const thpt = new Tensor([32], 'float32', Array.from({ length: 32 }, (_, i) => (i === 4 ? 20 : i === 0 ? 80 : 0)));
        const delay = new Tensor([1], 'float32', [2]);
        expect(objectiveInput(thpt, delay)).toEqual({ totalThpt: 100, vrDelay: 2, vrThpt: 20 });
    });
});

// ==================== Policy ====================

describe('encodeObssPolicy', () => {
    it('should emit one command per action element, addressed to node 0', () => {
        const template = record('Obss', 'Cpp2Py::RxPowerDbmMatrix', [-60], [37], { type: 'double' });
        expect(encodeObssPolicy([-70, 18], template)).toEqual([
            { type: 'double', source: 'Obss', name: 'Py2Cpp::ObssPdNew', id: [0], value: [-70] },
            { type: 'double', source: 'Obss', name: 'Py2Cpp::TxPowerNew', id: [0], value: [18] },
        ]);
    });

    it('should bound OBSS-PD to -82..-62 and TX power to 16..20', () => {
        expect(contains(OBSS_ACT_SPACE, [-82, 16])).toBe(true);
        expect(contains(OBSS_ACT_SPACE, [-62, 20])).toBe(true);
        expect(contains(OBSS_ACT_SPACE, [-61, 20])).toBe(false);
        expect(contains(OBSS_ACT_SPACE, [-70, 15])).toBe(false);
    });
});

// ==================== Report ====================

describe('obss report', () => {
    it('should format NaN as nan', () => {
        expect(formatFixed(Number.NaN, 2)).toBe('nan');
        expect(formatFixed(2.345, 1)).toBe('2.3');
    });

    it('should classify nodes', () => {
        expect(nodeRole(0)).toBe('ap');
        expect(nodeRole(3)).toBe('ap');
        expect(nodeRole(4)).toBe('vr-station');
        expect(nodeRole(5)).toBe('station');
    });

    it('should lay out the table newest first', () => {
        const history = new HistoryLedger(10);
        history.record({ step: 1, reward: 1.5, obssPd: -80 });
        history.record({ step: 2, reward: 2.25, obssPd: -70 });

        const table = makeHistoryTable(history, 3);
        expect(table.title).toBe('Step history (showing 3 records)');
        expect(table.columns).toEqual([
            '# timestep',
            'total thpt (Mbps)',
            'VR thpt (Mbps)',
            'VR delay (ms)',
            'reward',
            'new OBSS_PD (dBm)',
            'new TX Power (dBm)',
        ]);
        expect(table.rows[0]).toEqual(['2', 'nan', 'nan', 'nan', '2.25', '-70', 'nan']);
        expect(table.rows[1]).toEqual(['1', 'nan', 'nan', 'nan', '1.50', '-80', 'nan']);
        expect(table.rows[2].every(cell => cell === 'nan')).toBe(true);
    });

    it('should plot the 20 deployed nodes', () => {
        const plot = makeScenarioPlot(buildObssObservation(obssBatch()).nodeLoc);
        expect(plot.points).toHaveLength(20);
        expect(plot.points[4]).toEqual({ node: 4, role: 'vr-station', x: 40, y: 12.5 });
        expect(plot.points[0]).toEqual({ node: 0, role: 'ap', x: 10, y: 10 });
        expect(plot.xlim).toEqual([0, 50]);
        expect(plot.lines).toEqual([
            { x: [0, 50], y: [25, 25] },
            { x: [25, 25], y: [0, 50] },
        ]);
    });
});

// ==================== Adapter ====================

describe('ObssAdapter', () => {
    let options: ReturnType<typeof testOptions>;
    let adapter: ObssAdapter;

    beforeEach(() => {
        options = testOptions('obss');
        adapter = new ObssAdapter(configFor('obss'), options);
    });

    it('should run one control step', () => {
        const batch = obssBatch();
        const obs = adapter.buildObservation(batch);
        expect(Array.isArray(obs)).toBe(true);
        expect(adapter.snapshot.violation).toBeUndefined();

        const commands = adapter.encodePolicy([-70, 18]);
        expect(commands.map(c => [c.name, c.value[0]])).toEqual([
            ['Py2Cpp::ObssPdNew', -70],
            ['Py2Cpp::TxPowerNew', 18],
        ]);
        expect(commands[0].source).toBe('Obss');
        expect(commands[0].type).toBe('double');

        expect(adapter.evaluateReward(batch)).toBeCloseTo(120.3, 5);
    });

    it('should score a batch without records', () => {
        expect(adapter.evaluateReward([])).toBeCloseTo(10.3, 9);
    });

    it('should fill the step table', () => {
        const batch = obssBatch();
        adapter.buildObservation(batch);
        adapter.encodePolicy([-70, 18]);
        adapter.evaluateReward(batch);

        const table = adapter.makeTable(2);
        expect(table.rows[0]).toEqual(['1', '100.00', '20.00', '2.00', '120.30', '-70', '18']);
        expect(table.rows[1].every(cell => cell === 'nan')).toBe(true);
    });

    it('should plot the last observation', () => {
        expect(adapter.makePlot()).toBeUndefined();
        adapter.buildObservation(obssBatch());
        expect(adapter.makePlot()?.points[4]).toMatchObject({ x: 40, y: 12.5 });
    });

    it('should warn about throughput outside its bounds', () => {
        adapter.buildObservation([record('Obss', 'Cpp2Py::UplinkThptMbps', [2000], [0])]);
        expect(adapter.snapshot.violation).toBe('[2] element 0 (2000) outside [0, 1000]');
        expect(options.logger.events[0].level).toBe('warn');
    });

    it('should retain the RX power record as template', () => {
        adapter.buildObservation(obssBatch());
        expect(adapter.template?.name).toBe('Cpp2Py::RxPowerDbmMatrix');
    });

    it('should keep the previous template when a batch is rejected', () => {
        adapter.buildObservation(obssBatch());
        const retained = adapter.template;

        const rejected = [
            record('Obss', 'Cpp2Py::RxPowerDbmMatrix', [-90], [0]),
            record('Obss', 'Cpp2Py::McsIndex', [3], [40]),
        ];
        expect(() => adapter.buildObservation(rejected)).toThrow(ContractViolationError);
        expect(adapter.template).toBe(retained);
        expect(adapter.template?.value).toEqual([-60, -75]);
    });

    it('should reward throughput reported over several records', () => {
        const batch = [
            record('Obss', 'Cpp2Py::UplinkThptMbps', [80], [0]),
            record('Obss', 'Cpp2Py::UplinkThptMbps', [20], [4]),
            record('Obss', 'Cpp2Py::AccessDelayMs', [2], [4]),
        ];
        expect(adapter.evaluateReward(batch)).toBeCloseTo(120.3, 5);
    });
});
