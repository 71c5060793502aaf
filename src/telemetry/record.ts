/**
 * @module telemetry/record
 * @description Telemetry records, batches and outbound policy commands
 *
 * A record is one tagged measurement from the simulator. Besides `source`,
 * `name`, `id` and `value` it may carry passthrough fields the simulator
 * expects to see again on commands derived from it; those are kept verbatim.
 */

import { ValidationError, ErrorCodes } from '../core/errors';

// ==================== Types ====================

/**
 * Value of a passthrough field
 */
export type FieldValue = string | number | boolean | null | readonly FieldValue[] | { readonly [key: string]: FieldValue };

/**
 * One tagged measurement
 */
export interface TelemetryRecord {
    /** Emitting subsystem */
    readonly source: string;
    /** Measurement identity */
    readonly name: string;
    /** Entity indices (or packed indices), parallel to `value` */
    readonly id?: readonly number[];
    readonly value: readonly number[];
    /** Passthrough fields */
    readonly [field: string]: FieldValue | undefined;
}

/**
 * Records delivered for one control step, in arrival order
 */
export type TelemetryBatch = readonly TelemetryRecord[];

/**
 * Command sent back to the simulator, derived from a template record
 */
export interface PolicyCommand {
    readonly name: string;
    readonly id: readonly number[];
    readonly value: readonly number[];
    readonly [field: string]: FieldValue | undefined;
}

/**
 * `(source, name)` pair used to look a record up
 */
export interface Selector {
    readonly source: string;
    readonly name: string;
}

/**
 * Scalar extracted when no record matches a selector
 */
export const MISSING_VALUE = -1;

// ==================== Parsing ====================

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isFieldValue(value: unknown): value is FieldValue {
    if (value === null) return true;
    switch (typeof value) {
        case 'string':
        case 'number':
        case 'boolean':
            return true;
        case 'object':
            if (Array.isArray(value)) return value.every(isFieldValue);
            return isPlainObject(value) && Object.values(value).every(isFieldValue);
        default:
            return false;
    }
}

function numberList(raw: unknown, field: string, index: number): number[] {
    if (!Array.isArray(raw)) {
        throw new ValidationError(
            `Record ${index}: '${field}' must be an array of numbers`,
            { index, field },
            ErrorCodes.INVALID_RECORD
        );
    }
    const out: number[] = [];
    for (const item of raw) {
        if (typeof item !== 'number') {
            throw new ValidationError(
                `Record ${index}: '${field}' contains a non-number`,
                { index, field, item },
                ErrorCodes.INVALID_RECORD
            );
        }
        out.push(item);
    }
    return out;
}

/**
 * Validate one raw inbound record
 */
export function parseTelemetryRecord(raw: unknown, index = 0): TelemetryRecord {
    if (!isPlainObject(raw)) {
        throw new ValidationError(`Record ${index} is not an object`, { index }, ErrorCodes.INVALID_RECORD);
    }

    const { source, name, id, value, ...rest } = raw;
    if (typeof source !== 'string' || typeof name !== 'string') {
        throw new ValidationError(
            `Record ${index}: 'source' and 'name' must be strings`,
            { index },
            ErrorCodes.INVALID_RECORD
        );
    }

    const values = numberList(value, 'value', index);
    let ids: number[] | undefined;
    if (id !== undefined) {
        ids = numberList(id, 'id', index);
        if (ids.some(i => !Number.isInteger(i) || i < 0)) {
            throw new ValidationError(
                `Record ${index}: 'id' must hold non-negative integers`,
                { index, id: ids },
                ErrorCodes.INVALID_RECORD
            );
        }
        if (ids.length !== values.length) {
            throw new ValidationError(
                `Record ${index}: 'id' has ${ids.length} entries, 'value' has ${values.length}`,
                { index },
                ErrorCodes.INVALID_RECORD
            );
        }
    }

    const passthrough: Record<string, FieldValue> = {};
    for (const [key, field] of Object.entries(rest)) {
        if (!isFieldValue(field)) {
            throw new ValidationError(
                `Record ${index}: field '${key}' is not JSON data`,
                { index, field: key },
                ErrorCodes.INVALID_RECORD
            );
        }
        passthrough[key] = field;
    }

    const parsed: TelemetryRecord = ids === undefined
        ? { ...passthrough, source, name, value: values }
        : { ...passthrough, source, name, id: ids, value: values };
    return Object.freeze(parsed);
}

/**
 * Validate a raw inbound batch (an array of records)
 */
export function parseTelemetryBatch(raw: unknown): TelemetryBatch {
    if (!Array.isArray(raw)) {
        throw new ValidationError('Telemetry batch must be an array of records', {}, ErrorCodes.INVALID_RECORD);
    }
    return Object.freeze(raw.map((item, index) => parseTelemetryRecord(item, index)));
}

/**
 * Shorthand for building records in code and tests
 */
export function record(
    source: string,
    name: string,
    value: readonly number[],
    id?: readonly number[],
    passthrough: Record<string, FieldValue> = {}
): TelemetryRecord {
    return parseTelemetryRecord({ ...passthrough, source, name, value, id });
}

// ==================== Commands ====================

/**
 * One command slot filled from an action
 */
export interface CommandSlot {
    name: string;
    /** Defaults to the template's id, then `[0]` */
    id?: readonly number[];
    value: readonly number[];
}

/**
 * Copy a template record into a command, overriding name, id and value
 */
export function deriveCommand(template: TelemetryRecord, slot: CommandSlot): PolicyCommand {
    const command: PolicyCommand = {
        ...template,
        name: slot.name,
        id: [...(slot.id ?? template.id ?? [0])],
        value: [...slot.value],
    };
    return Object.freeze(command);
}

/**
 * Outbound form of one step's commands: a single command, or an ordered list
 */
export type CommandPayload = PolicyCommand | readonly PolicyCommand[];

/**
 * Wire form of a command list: a single command is sent bare
 */
export function commandPayload(commands: readonly PolicyCommand[]): CommandPayload {
    return commands.length === 1 ? commands[0] : commands;
}

/**
 * Command list of a payload in either form
 */
export function commandList(payload: CommandPayload): readonly PolicyCommand[] {
    return isCommandArray(payload) ? payload : [payload];
}

function isCommandArray(payload: CommandPayload): payload is readonly PolicyCommand[] {
    return Array.isArray(payload);
}
