/**
 * @packageDocumentation
 * @module netgym-adapter
 *
 * Adapter layer between network-simulator telemetry and a reinforcement
 * learning control loop.
 *
 * Per control step the simulator sends a batch of tagged measurement records.
 * An adapter turns the batch into fixed-shape observation tensors and a
 * scalar reward, and turns the agent's action vector back into simulator
 * commands.
 *
 * ## Usage Example
 * ```typescript
 * import { createAdapter, loadConfigFile, NetworkEnvironment, createPolicy, Runner } from 'netgym-adapter';
 *
 * const config = loadConfigFile('ts');
 * const adapter = createAdapter(config);
 * const environment = new NetworkEnvironment(adapter, source);
 * const runner = new Runner({
 *     env: config.env,
 *     seed: config.seed,
 *     environment,
 *     decisionMaker: createPolicy(config.agent, adapter),
 *     totalEpisodes: config.episodesPerSession,
 * });
 * const result = await runner.run();
 * ```
 *
 * @license MIT
 */

// ==================== Namespaces ====================
export * as core from './src/core';
export * as telemetry from './src/telemetry';
export * as history from './src/history';
export * as envs from './src/envs';

// ==================== Core ====================
export type { DType, Space, SpaceValue, Environment, DecisionMaker, Logger, LogLevel, ErrorCode } from './src/core';
export {
    Tensor,
    Runner,
    runExperiment,
    ConsoleLogger,
    MemoryLogger,
    MultiLogger,
    createLogger,
    SeededRandom,
    createRng,
    ErrorCodes,
    AdapterError,
    ValidationError,
    ContractViolationError,
    DivisionByZeroError,
    EnvironmentMismatchError,
    AdapterNotFoundError,
    NotInitializedError,
    ConfigError,
} from './src/core';
export { JsonlLogger, type JsonlLoggerConfig } from './src/core/logging-node';

// ==================== Telemetry ====================
export type { TelemetryRecord, TelemetryBatch, PolicyCommand, Selector, DuplicatePolicy } from './src/telemetry';
export { MISSING_VALUE, parseTelemetryBatch, PackedIndexCodec } from './src/telemetry';

// ==================== History ====================
export { HistoryLedger, RingBuffer, NO_DATA } from './src/history';

// ==================== Adapter ====================
export * from './src/adapter';
export { loadConfigFile, configFilePath, DEFAULT_CONFIG_DIR } from './src/adapter/config-file';

// ==================== Variants ====================
export { ApbAdapter, ObssAdapter, TsAdapter } from './src/envs';

// ==================== Agents & Environment ====================
export * from './src/agents';
export * from './src/env';

// ==================== Version ====================
export const VERSION = '0.1.0';
