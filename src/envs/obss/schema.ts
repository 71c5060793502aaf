/**
 * @module envs/obss/schema
 * @description Spaces, record names and reward constants for multi-BSS
 * spatial reuse (OBSS-PD and TX power control)
 *
 * Observation tuple:
 * - [0] RX power (dBm), BSS-0 receivers × all transmitters, `8 × 32`
 * - [1] MCS index per BSS-0 node, `8`
 * - [2] uplink throughput (Mbps) per node, `32`
 * - [3] VR station access delay (ms), `1`
 * - [4] node location `(x, y)` per node, `32 × 2`
 */

import { box, computeSchemaHash, multiDiscrete, tuple } from '../../core/space';
import type { Selector } from '../../telemetry/record';

export const OBSS_ENV = 'obss';

// ==================== Dimensions ====================

/** Nodes in BSS 0 (rows of the RX power matrix) */
export const MAX_NUM_NODES_BSS0 = 2 ** 3;
/** Nodes across all BSSs */
export const MAX_NUM_NODES = 2 ** 5;

// ==================== Records ====================

const SOURCE = 'Obss';

export const RX_POWER: Selector = { source: SOURCE, name: 'Cpp2Py::RxPowerDbmMatrix' };
export const NODE_X: Selector = { source: SOURCE, name: 'Cpp2Py::NodeX' };
export const NODE_Y: Selector = { source: SOURCE, name: 'Cpp2Py::NodeY' };
export const MCS_INDEX: Selector = { source: SOURCE, name: 'Cpp2Py::McsIndex' };
export const UPLINK_THROUGHPUT: Selector = { source: SOURCE, name: 'Cpp2Py::UplinkThptMbps' };
export const ACCESS_DELAY: Selector = { source: SOURCE, name: 'Cpp2Py::AccessDelayMs' };

export const OBSS_PD_COMMAND = 'Py2Cpp::ObssPdNew';
export const TX_POWER_COMMAND = 'Py2Cpp::TxPowerNew';

// ==================== Reward Constants ====================

export const REWARD_ALPHA = 1;
export const REWARD_BETA = 5;
export const REWARD_ETA = 1;
/** Delay budget of the VR station (ms) */
export const VR_DELAY_CONSTRAINT_MS = 5;
/** Throughput the VR station must reach (Mbps) */
export const VR_THPT_CONSTRAINT_MBPS = 14.7;
/** Node index of the VR station */
export const VR_STATION_INDEX = 4;

// ==================== Space Definitions ====================

export const OBSS_OBS_SPACE = tuple([
    box([MAX_NUM_NODES_BSS0, MAX_NUM_NODES], -100, 100, 'float32'),
    box([MAX_NUM_NODES_BSS0], 0, 11, 'uint32'),
    box([MAX_NUM_NODES], 0, 1000, 'float32'),
    box([1], 0, 10000, 'float32'),
    box([MAX_NUM_NODES, 2], -100, 100, 'float32'),
]);

/**
 * Action: `[obssPd, txPower]`
 * - OBSS-PD threshold -82..-62 dBm
 * - TX power 16..20 dBm
 */
export const OBSS_ACT_SPACE = multiDiscrete([21, 5], { start: [-82, 16], dtype: 'int32' });

export const OBSS_SCHEMA_HASH = computeSchemaHash(OBSS_OBS_SPACE, OBSS_ACT_SPACE);
