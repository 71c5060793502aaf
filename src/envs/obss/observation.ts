/**
 * @module envs/obss/observation
 * @description Dense observation tensors from sparse per-node telemetry
 *
 * Every tensor starts at zero; cells without a record stay zero for the step.
 * A tensor may arrive split over several records: all of them are scattered,
 * and where two address the same cell the duplicate policy's winner holds.
 */

import { Tensor } from '../../core/tensor';
import { findInWriteOrder, findRecord, type DuplicatePolicy } from '../../telemetry/extract';
import { PackedIndexCodec } from '../../telemetry/packed';
import type { TelemetryBatch, TelemetryRecord } from '../../telemetry/record';
import { scatterColumn, scatterPacked, scatterVector } from '../../telemetry/scatter';
import {
    ACCESS_DELAY,
    MAX_NUM_NODES,
    MAX_NUM_NODES_BSS0,
    MCS_INDEX,
    NODE_X,
    NODE_Y,
    RX_POWER,
    UPLINK_THROUGHPUT,
} from './schema';

export const RX_POWER_CODEC = new PackedIndexCodec(MAX_NUM_NODES_BSS0, MAX_NUM_NODES);

export interface ObssObservation {
    rxPowerDbm: Tensor;
    mcsIndex: Tensor;
    uplinkThpt: Tensor;
    vrDelay: Tensor;
    nodeLoc: Tensor;
}

function ids(found: TelemetryRecord): readonly number[] {
    return found.id ?? [];
}

/**
 * Per-node uplink throughput (Mbps)
 */
export function buildUplinkThroughput(batch: TelemetryBatch, policy: DuplicatePolicy = 'last'): Tensor {
    const out = Tensor.zeros([MAX_NUM_NODES], 'float32');
    for (const found of findInWriteOrder(batch, UPLINK_THROUGHPUT, policy)) {
        scatterVector(out, ids(found), found.value);
    }
    return out;
}

/**
 * VR station access delay (ms); the record's id is ignored
 */
export function buildAccessDelay(batch: TelemetryBatch, policy: DuplicatePolicy = 'last'): Tensor {
    const out = Tensor.zeros([1], 'float32');
    const found = findRecord(batch, ACCESS_DELAY, policy);
    if (found && found.value.length > 0) out.set([0], found.value[0]);
    return out;
}

export function buildObssObservation(batch: TelemetryBatch, policy: DuplicatePolicy = 'last'): ObssObservation {
    const rxPowerDbm = Tensor.zeros([MAX_NUM_NODES_BSS0, MAX_NUM_NODES], 'float32');
    for (const rx of findInWriteOrder(batch, RX_POWER, policy)) {
        scatterPacked(rxPowerDbm, RX_POWER_CODEC, ids(rx), rx.value);
    }

    const mcsIndex = Tensor.zeros([MAX_NUM_NODES_BSS0], 'uint32');
    for (const mcs of findInWriteOrder(batch, MCS_INDEX, policy)) {
        scatterVector(mcsIndex, ids(mcs), mcs.value);
    }

    const nodeLoc = Tensor.zeros([MAX_NUM_NODES, 2], 'float32');
    for (const x of findInWriteOrder(batch, NODE_X, policy)) {
        scatterColumn(nodeLoc, 0, ids(x), x.value);
    }
    for (const y of findInWriteOrder(batch, NODE_Y, policy)) {
        scatterColumn(nodeLoc, 1, ids(y), y.value);
    }

    return {
        rxPowerDbm,
        mcsIndex,
        uplinkThpt: buildUplinkThroughput(batch, policy),
        vrDelay: buildAccessDelay(batch, policy),
        nodeLoc,
    };
}

/**
 * Tuple order of the observation space
 */
export function toTuple(obs: ObssObservation): readonly Tensor[] {
    return [obs.rxPowerDbm, obs.mcsIndex, obs.uplinkThpt, obs.vrDelay, obs.nodeLoc];
}
