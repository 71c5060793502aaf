/**
 * @module history
 */

export { RingBuffer } from './ring';
export { HistoryLedger, NO_DATA, DEFAULT_HISTORY_CAPACITY } from './ledger';
