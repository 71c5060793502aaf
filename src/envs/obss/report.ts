/**
 * @module envs/obss/report
 * @description Data behind the step-history table and the scenario plot
 *
 * Rendering is left to the caller; these functions only shape the numbers.
 */

import type { Tensor } from '../../core/tensor';
import type { HistoryLedger } from '../../history/ledger';
import { VR_STATION_INDEX } from './schema';

// ==================== Step History Table ====================

export interface HistoryTable {
    title: string;
    columns: string[];
    /** Newest step first */
    rows: string[][];
}

/** History metric and decimal places of each table column */
const TABLE_COLUMNS: readonly { header: string; metric: string; digits: number }[] = [
    { header: '# timestep', metric: 'step', digits: 0 },
    { header: 'total thpt (Mbps)', metric: 'totalThpt', digits: 2 },
    { header: 'VR thpt (Mbps)', metric: 'vrThpt', digits: 2 },
    { header: 'VR delay (ms)', metric: 'vrDelay', digits: 2 },
    { header: 'reward', metric: 'reward', digits: 2 },
    { header: 'new OBSS_PD (dBm)', metric: 'obssPd', digits: 0 },
    { header: 'new TX Power (dBm)', metric: 'txPower', digits: 0 },
];

/**
 * Fixed-point text, `nan` for a slot without data
 */
export function formatFixed(value: number, digits: number): string {
    return Number.isNaN(value) ? 'nan' : value.toFixed(digits);
}

/**
 * The `n` most recent steps, one row each
 */
export function makeHistoryTable(history: HistoryLedger, n = 20): HistoryTable {
    const series = TABLE_COLUMNS.map(column => history.recent(column.metric, n));
    const rows: string[][] = [];
    for (let i = 0; i < n; i++) {
        rows.push(TABLE_COLUMNS.map((column, c) => formatFixed(series[c][i], column.digits)));
    }
    return {
        title: `Step history (showing ${n} records)`,
        columns: TABLE_COLUMNS.map(column => column.header),
        rows,
    };
}

// ==================== Scenario Plot ====================

export type NodeRole = 'ap' | 'vr-station' | 'station';

export interface ScenarioPoint {
    node: number;
    role: NodeRole;
    x: number;
    y: number;
}

export interface ScenarioPlot {
    title: string;
    xlim: [number, number];
    ylim: [number, number];
    /** Lines separating the four BSS quadrants */
    lines: { x: [number, number]; y: [number, number] }[];
    points: ScenarioPoint[];
}

/** Access points in the deployment */
export const NUM_APS = 4;
/** Stations per access point */
export const STATIONS_PER_AP = 4;
/** Side of the square deployment area (m) */
export const AREA_SIZE = 50;

export function nodeRole(node: number): NodeRole {
    if (node < NUM_APS) return 'ap';
    return node === VR_STATION_INDEX ? 'vr-station' : 'station';
}

/**
 * AP and station positions from the node location tensor (`32 × 2`)
 */
export function makeScenarioPlot(nodeLoc: Tensor): ScenarioPlot {
    const half = AREA_SIZE / 2;
    const points: ScenarioPoint[] = [];
    for (let node = 0; node < NUM_APS * (STATIONS_PER_AP + 1); node++) {
        points.push({ node, role: nodeRole(node), x: nodeLoc.get(node, 0), y: nodeLoc.get(node, 1) });
    }
    return {
        title: 'Scenario (AP, normal STA, VR STA)',
        xlim: [0, AREA_SIZE],
        ylim: [0, AREA_SIZE],
        lines: [
            { x: [0, AREA_SIZE], y: [half, half] },
            { x: [half, half], y: [0, AREA_SIZE] },
        ],
        points,
    };
}
