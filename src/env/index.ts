/**
 * @module env
 * @description Telemetry sources and the step environment
 */

export type { Exchange, TelemetrySource, BatchGenerator } from './source';
export { ReplayTelemetrySource } from './source';

export type { NetworkStepInfo, NetworkEnvironmentOptions } from './environment';
export { NetworkEnvironment } from './environment';
