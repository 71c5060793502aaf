/**
 * @module telemetry/extract
 * @description Record lookup by selector
 *
 * Batches are unordered and may hold several records with the same
 * `(source, name)`. Every lookup scans the whole batch and resolves
 * duplicates with a `DuplicatePolicy`.
 */

import { ContractViolationError } from '../core/errors';
import { MISSING_VALUE, type Selector, type TelemetryBatch, type TelemetryRecord } from './record';

/**
 * Which of several matching records wins
 * - `last`: the last one in arrival order
 * - `first`: the first one in arrival order
 * - `error`: more than one match is a contract violation
 */
export type DuplicatePolicy = 'last' | 'first' | 'error';

export const DUPLICATE_POLICIES: readonly DuplicatePolicy[] = ['last', 'first', 'error'];

export function matchesSelector(record: TelemetryRecord, selector: Selector): boolean {
    return record.source === selector.source && record.name === selector.name;
}

/**
 * All records matching a selector, in arrival order
 */
export function findAll(batch: TelemetryBatch, selector: Selector): TelemetryRecord[] {
    return batch.filter(r => matchesSelector(r, selector));
}

/**
 * The winning record for a selector, or `undefined` when none matches
 */
export function findRecord(
    batch: TelemetryBatch,
    selector: Selector,
    policy: DuplicatePolicy = 'last'
): TelemetryRecord | undefined {
    const matches = findAll(batch, selector);
    if (matches.length === 0) return undefined;

    switch (policy) {
        case 'first':
            return matches[0];
        case 'last':
            return matches[matches.length - 1];
        case 'error':
            if (matches.length > 1) {
                throw new ContractViolationError(
                    `${matches.length} records match ${selector.source}/${selector.name}`,
                    { selector, count: matches.length }
                );
            }
            return matches[0];
    }
}

/**
 * Matching records in the order to write them into a dense tensor, so that
 * the winner under `policy` lands last. Cells addressed by only one record
 * keep that record's value.
 */
export function findInWriteOrder(
    batch: TelemetryBatch,
    selector: Selector,
    policy: DuplicatePolicy = 'last'
): TelemetryRecord[] {
    switch (policy) {
        case 'last':
            return findAll(batch, selector);
        case 'first':
            return findAll(batch, selector).reverse();
        case 'error': {
            const found = findRecord(batch, selector, policy);
            return found === undefined ? [] : [found];
        }
    }
}

/**
 * First value of the winning record, or `MISSING_VALUE` when none matches
 */
export function extractScalar(
    batch: TelemetryBatch,
    selector: Selector,
    policy: DuplicatePolicy = 'last'
): number {
    const found = findRecord(batch, selector, policy);
    if (found === undefined) return MISSING_VALUE;
    if (found.value.length === 0) {
        throw new ContractViolationError(
            `Record ${selector.source}/${selector.name} has an empty value`,
            { selector }
        );
    }
    return found.value[0];
}
