/**
 * @module core
 * @description Shared building blocks of the adapter layer
 *
 * ## Modules
 * - `tensor`: Dense row-major tensors with dtype coercion
 * - `space`: Observation/action space contracts
 * - `runner`: Environment/decision-maker interfaces and the episode runner
 * - `logging`: Console and in-memory structured logging
 * - `repro`: Seeded RNG
 * - `errors`: Unified error types and codes
 *
 * The Node-only JSONL logger is exported from `core/logging-node`.
 */

// ==================== Tensor ====================

export type { DType, NestedNumbers } from './tensor';
export { Tensor, isIntegerDType, coerce, shapeSize } from './tensor';

// ==================== Space ====================

export type {
    DiscreteSpace,
    BoxSpace,
    MultiDiscreteSpace,
    MultiDiscreteOptions,
    TupleSpace,
    LeafSpace,
    Space,
    SpaceValue,
} from './space';

export {
    discrete,
    box,
    multiDiscrete,
    tuple,
    shapeOf,
    dtypeOf,
    boundsAt,
    valueNumbers,
    checkContains,
    contains,
    sample,
    getDimension,
    serialize,
    computeSchemaHash,
} from './space';

// ==================== Runner ====================

export type {
    Transition,
    Environment,
    DecisionMaker,
    RunnerConfig,
    StepResult,
    EpisodeResult,
    RunResult,
} from './runner';

export { Runner, runExperiment } from './runner';

// ==================== Logging ====================

export type {
    LogLevel,
    BaseLogEntry,
    EventLogEntry,
    StepLogEntry,
    EpisodeLogEntry,
    LogEntry,
    EventInput,
    StepInput,
    EpisodeInput,
    Logger,
    LoggerConfig,
} from './logging';

export {
    DEFAULT_SCHEMA_VERSION,
    isLevelEnabled,
    ConsoleLogger,
    MemoryLogger,
    MultiLogger,
    createLogger,
} from './logging';

// ==================== Repro ====================

export { SeededRandom, createRng } from './repro';

// ==================== Errors ====================

export type { ErrorCode } from './errors';

export {
    ErrorCodes,
    AdapterError,
    ValidationError,
    ContractViolationError,
    DivisionByZeroError,
    EnvironmentMismatchError,
    AdapterNotFoundError,
    NotInitializedError,
    ConfigError,
    isAdapterError,
    hasErrorCode,
    wrapError,
} from './errors';
