/**
 * @module adapter/config
 * @description Adapter configuration
 *
 * Configuration arrives in the simulator's JSON layout:
 *
 * ```json
 * {
 *   "env_config": { "env": "obss", "steps_per_episode": 10, "episodes_per_session": 1, "random_seed": 2 },
 *   "rl_config": { "agent": "random" },
 *   "adapter": { "history_capacity": 100, "duplicate_policy": "last", "log_level": "info" }
 * }
 * ```
 *
 * Only `env_config.env` is required; everything else falls back to
 * `DEFAULT_ADAPTER_CONFIG`.
 */

import { ConfigError } from '../core/errors';
import type { LogLevel } from '../core/logging';
import { DUPLICATE_POLICIES, type DuplicatePolicy } from '../telemetry/extract';
import { DEFAULT_HISTORY_CAPACITY } from '../history/ledger';

// ==================== Configuration ====================

export interface AdapterConfig {
    /** Environment variant the adapter must match */
    env: string;
    /** Decision maker name */
    agent: string;
    /** Random seed for reproducibility */
    seed: number;
    /** Samples kept per history metric */
    historyCapacity: number;
    /** How duplicate records in one batch are resolved */
    duplicatePolicy: DuplicatePolicy;
    logLevel: LogLevel;
    /** Steps before an episode is truncated */
    stepsPerEpisode: number;
    /** Episodes per simulator session */
    episodesPerSession: number;
}

export const DEFAULT_ADAPTER_CONFIG: AdapterConfig = {
    env: 'apb',
    agent: 'random',
    seed: 42,
    historyCapacity: DEFAULT_HISTORY_CAPACITY,
    duplicatePolicy: 'last',
    logLevel: 'info',
    stepsPerEpisode: 10,
    episodesPerSession: 1,
};

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * Fill a partial configuration with defaults
 */
export function createAdapterConfig(overrides: Partial<AdapterConfig> = {}): AdapterConfig {
    return { ...DEFAULT_ADAPTER_CONFIG, ...overrides };
}

/**
 * Validate configuration parameters
 */
export function validateAdapterConfig(config: AdapterConfig): { valid: boolean; errors: string[]; warnings: string[] } {
    const errors: string[] = [];
    const warnings: string[] = [];

    if (config.env.length === 0) {
        errors.push('env must be a non-empty string');
    }
    if (!Number.isInteger(config.seed)) {
        errors.push('seed must be an integer');
    }
    if (!Number.isInteger(config.historyCapacity) || config.historyCapacity <= 0) {
        errors.push('historyCapacity must be a positive integer');
    }
    if (!DUPLICATE_POLICIES.includes(config.duplicatePolicy)) {
        errors.push(`duplicatePolicy must be one of ${DUPLICATE_POLICIES.join(', ')}`);
    }
    if (!LOG_LEVELS.includes(config.logLevel)) {
        errors.push(`logLevel must be one of ${LOG_LEVELS.join(', ')}`);
    }
    if (!Number.isInteger(config.stepsPerEpisode) || config.stepsPerEpisode <= 0) {
        errors.push('stepsPerEpisode must be a positive integer');
    }
    if (!Number.isInteger(config.episodesPerSession) || config.episodesPerSession <= 0) {
        errors.push('episodesPerSession must be a positive integer');
    }

    if (config.historyCapacity > 10000) {
        warnings.push(`historyCapacity ${config.historyCapacity} keeps a large amount of data per metric`);
    }
    if (config.duplicatePolicy === 'error') {
        warnings.push("duplicatePolicy 'error' rejects batches that repeat a measurement");
    }

    return { valid: errors.length === 0, errors, warnings };
}

// ==================== JSON Layout ====================

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
    const value = raw[key];
    if (value === undefined) return {};
    if (!isRecord(value)) {
        throw new ConfigError(`'${key}' must be an object`, { key });
    }
    return value;
}

function optionalNumber(block: Record<string, unknown>, key: string, path: string): number | undefined {
    const value = block[key];
    if (value === undefined) return undefined;
    if (typeof value !== 'number') {
        throw new ConfigError(`'${path}' must be a number`, { path, value });
    }
    return value;
}

function optionalString(block: Record<string, unknown>, key: string, path: string): string | undefined {
    const value = block[key];
    if (value === undefined) return undefined;
    if (typeof value !== 'string') {
        throw new ConfigError(`'${path}' must be a string`, { path, value });
    }
    return value;
}

function isDuplicatePolicy(value: string): value is DuplicatePolicy {
    return DUPLICATE_POLICIES.some(p => p === value);
}

function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some(l => l === value);
}

/**
 * Parse and validate a configuration in the simulator's JSON layout
 */
export function parseConfigJson(raw: unknown): AdapterConfig {
    if (!isRecord(raw)) {
        throw new ConfigError('Configuration must be a JSON object');
    }

    const envConfig = section(raw, 'env_config');
    const rlConfig = section(raw, 'rl_config');
    const adapter = section(raw, 'adapter');

    const env = optionalString(envConfig, 'env', 'env_config.env');
    if (env === undefined) {
        throw new ConfigError("'env_config.env' is required");
    }

    const duplicatePolicy = optionalString(adapter, 'duplicate_policy', 'adapter.duplicate_policy');
    if (duplicatePolicy !== undefined && !isDuplicatePolicy(duplicatePolicy)) {
        throw new ConfigError(
            `'adapter.duplicate_policy' must be one of ${DUPLICATE_POLICIES.join(', ')}`,
            { value: duplicatePolicy }
        );
    }
    const logLevel = optionalString(adapter, 'log_level', 'adapter.log_level');
    if (logLevel !== undefined && !isLogLevel(logLevel)) {
        throw new ConfigError(`'adapter.log_level' must be one of ${LOG_LEVELS.join(', ')}`, { value: logLevel });
    }

    const config: AdapterConfig = {
        env,
        agent: optionalString(rlConfig, 'agent', 'rl_config.agent') ?? DEFAULT_ADAPTER_CONFIG.agent,
        seed: optionalNumber(envConfig, 'random_seed', 'env_config.random_seed') ?? DEFAULT_ADAPTER_CONFIG.seed,
        historyCapacity: optionalNumber(adapter, 'history_capacity', 'adapter.history_capacity')
            ?? DEFAULT_ADAPTER_CONFIG.historyCapacity,
        duplicatePolicy: duplicatePolicy ?? DEFAULT_ADAPTER_CONFIG.duplicatePolicy,
        logLevel: logLevel ?? DEFAULT_ADAPTER_CONFIG.logLevel,
        stepsPerEpisode: optionalNumber(envConfig, 'steps_per_episode', 'env_config.steps_per_episode')
            ?? DEFAULT_ADAPTER_CONFIG.stepsPerEpisode,
        episodesPerSession: optionalNumber(envConfig, 'episodes_per_session', 'env_config.episodes_per_session')
            ?? DEFAULT_ADAPTER_CONFIG.episodesPerSession,
    };

    const { valid, errors } = validateAdapterConfig(config);
    if (!valid) {
        throw new ConfigError(`Invalid configuration: ${errors.join('; ')}`, { errors });
    }
    return config;
}
