/**
 * @packageDocumentation
 * @module netgym-adapter/browser
 *
 * Browser-compatible entry point.
 *
 * Excludes the modules that need Node.js file access: the configuration file
 * loader (`loadConfigFile`) and the JSONL file logger (`JsonlLogger`).
 *
 * ## Available Modules
 * - `core` - Tensors, spaces, runner, logging, seeded RNG, errors
 * - `telemetry` - Records, selectors, packed indices, scatter
 * - `history` - Ring buffers and the history ledger
 * - `adapter` - Adapter interface, configuration, variant registry
 * - `envs` - The `apb`, `obss` and `ts` variants
 * - `agents` - Baseline decision makers
 * - `env` - Telemetry sources and the step environment
 *
 * @license MIT
 */

export * as core from './src/core';
export * as telemetry from './src/telemetry';
export * as history from './src/history';
export * as adapter from './src/adapter';
export * as envs from './src/envs';
export * as agents from './src/agents';
export * as env from './src/env';

// ==================== Version ====================
export const VERSION = '0.1.0';
