/**
 * @module core/errors
 * @description Unified error types and error codes for the adapter layer
 *
 * Every failure raised by the adapter carries a stable code so callers can
 * tell a fatal misconfiguration apart from a bad telemetry batch.
 */

// ==================== Error Codes ====================

/**
 * Standard error codes for the adapter layer
 */
export const ErrorCodes = {
    // Validation Errors
    /** Generic validation failure */
    VALIDATION_ERROR: 'VALIDATION_ERROR',
    /** Action outside the declared action space */
    INVALID_ACTION: 'INVALID_ACTION',
    /** Malformed telemetry record or batch */
    INVALID_RECORD: 'INVALID_RECORD',
    /** Configuration validation failed */
    INVALID_CONFIG: 'INVALID_CONFIG',

    // Contract & Numeric Errors
    /** Telemetry addressed a cell outside the observation contract */
    CONTRACT_VIOLATION: 'CONTRACT_VIOLATION',
    /** Ratio formula with a zero denominator */
    DIVISION_BY_ZERO: 'DIVISION_BY_ZERO',

    // Lifecycle Errors
    /** Configured environment does not match the adapter variant */
    ENVIRONMENT_MISMATCH: 'ENVIRONMENT_MISMATCH',
    /** No adapter registered under the configured name */
    ADAPTER_NOT_FOUND: 'ADAPTER_NOT_FOUND',
    /** Operation needs state that has not been produced yet */
    NOT_INITIALIZED: 'NOT_INITIALIZED',

    /** Internal error */
    INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// ==================== Error Classes ====================

/**
 * Base error class for the adapter layer
 */
export class AdapterError extends Error {
    readonly code: ErrorCode;
    readonly details?: unknown;
    readonly timestamp: number;

    constructor(code: ErrorCode, message: string, details?: unknown) {
        super(message);
        this.name = 'AdapterError';
        this.code = code;
        this.details = details;
        this.timestamp = Date.now();

        // Maintain proper stack trace in V8
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, AdapterError);
        }
    }

    /**
     * Convert to JSON-serializable object
     */
    toJSON(): {
        name: string;
        code: ErrorCode;
        message: string;
        details: unknown;
        timestamp: number;
    } {
        return {
            name: this.name,
            code: this.code,
            message: this.message,
            details: this.details,
            timestamp: this.timestamp,
        };
    }
}

/**
 * Validation error (invalid action, record, or config)
 */
export class ValidationError extends AdapterError {
    constructor(message: string, details?: unknown, code: ErrorCode = ErrorCodes.VALIDATION_ERROR) {
        super(code, message, details);
        this.name = 'ValidationError';
    }
}

/**
 * Telemetry does not fit the declared observation contract
 */
export class ContractViolationError extends AdapterError {
    constructor(message: string, details?: unknown) {
        super(ErrorCodes.CONTRACT_VIOLATION, message, details);
        this.name = 'ContractViolationError';
    }
}

/**
 * Ratio reward evaluated with a zero denominator
 */
export class DivisionByZeroError extends AdapterError {
    constructor(message: string, details?: unknown) {
        super(ErrorCodes.DIVISION_BY_ZERO, message, details);
        this.name = 'DivisionByZeroError';
    }
}

/**
 * Configured environment differs from the adapter's own variant
 */
export class EnvironmentMismatchError extends AdapterError {
    readonly configured: string;
    readonly launched: string;

    constructor(configured: string, launched: string) {
        super(
            ErrorCodes.ENVIRONMENT_MISMATCH,
            `wrong environment Adapter. Configured environment: ${configured} != Launched environment: ${launched}`,
            { configured, launched }
        );
        this.name = 'EnvironmentMismatchError';
        this.configured = configured;
        this.launched = launched;
    }
}

/**
 * No adapter variant registered under a name
 */
export class AdapterNotFoundError extends AdapterError {
    constructor(env: string, available: readonly string[]) {
        super(
            ErrorCodes.ADAPTER_NOT_FOUND,
            `No adapter registered for environment '${env}' (available: ${available.join(', ')})`,
            { env, available }
        );
        this.name = 'AdapterNotFoundError';
    }
}

/**
 * Not initialized error (e.g. encoding a policy before any template record)
 */
export class NotInitializedError extends AdapterError {
    constructor(message = 'Adapter not initialized. Build an observation first.') {
        super(ErrorCodes.NOT_INITIALIZED, message);
        this.name = 'NotInitializedError';
    }
}

/**
 * Configuration could not be loaded or parsed
 */
export class ConfigError extends AdapterError {
    constructor(message: string, details?: unknown) {
        super(ErrorCodes.INVALID_CONFIG, message, details);
        this.name = 'ConfigError';
    }
}

// ==================== Error Utilities ====================

/**
 * Check if an error is an AdapterError
 */
export function isAdapterError(error: unknown): error is AdapterError {
    return error instanceof AdapterError;
}

/**
 * Check if an error has a specific error code
 */
export function hasErrorCode(error: unknown, code: ErrorCode): boolean {
    return isAdapterError(error) && error.code === code;
}

/**
 * Wrap any error into an AdapterError
 */
export function wrapError(error: unknown, defaultCode: ErrorCode = ErrorCodes.INTERNAL_ERROR): AdapterError {
    if (isAdapterError(error)) {
        return error;
    }

    if (error instanceof Error) {
        return new AdapterError(defaultCode, error.message, {
            originalName: error.name,
            originalStack: error.stack,
        });
    }

    return new AdapterError(defaultCode, String(error));
}
