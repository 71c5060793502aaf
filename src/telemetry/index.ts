/**
 * @module telemetry
 * @description Telemetry records, lookup, packed indices and scatter
 */

export type { FieldValue, TelemetryRecord, TelemetryBatch, PolicyCommand, Selector, CommandSlot, CommandPayload } from './record';
export {
    MISSING_VALUE,
    parseTelemetryRecord,
    parseTelemetryBatch,
    record,
    deriveCommand,
    commandPayload,
    commandList,
} from './record';

export type { DuplicatePolicy } from './extract';
export { DUPLICATE_POLICIES, matchesSelector, findAll, findRecord, findInWriteOrder, extractScalar } from './extract';

export type { Cell } from './packed';
export { PackedIndexCodec } from './packed';

export { scatterVector, scatterColumn, scatterPacked } from './scatter';
