/**
 * @module core/errors
 * @description Unified error types and error codes for optimizer runs
 *
 * Every failure aborts the whole run; none of these are recovered locally.
 */

// ==================== Error Codes ====================

/**
 * Standard error codes
 */
export const ErrorCodes = {
    // Validation Errors
    /** Generic validation failure (malformed input data) */
    VALIDATION_ERROR: 'VALIDATION_ERROR',
    /** Configuration validation failed (empty start point, bad iteration counts) */
    INVALID_CONFIG: 'INVALID_CONFIG',

    // Optimization Errors
    /** A score could not be ordered against the others (NaN) */
    NON_COMPARABLE_SCORE: 'NON_COMPARABLE_SCORE',
    /** The objective threw or returned something other than a number */
    OBJECTIVE_FAILED: 'OBJECTIVE_FAILED',

    // Runtime Errors
    /** Run aborted through an AbortSignal */
    CANCELLED: 'CANCELLED',
    /** Run exceeded its deadline */
    TIMEOUT: 'TIMEOUT',
    /** Internal error */
    INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// ==================== Error Classes ====================

/**
 * Base error class for the optimizer
 */
export class OptimizerError extends Error {
    readonly code: ErrorCode;
    readonly details?: unknown;
    readonly timestamp: number;

    constructor(code: ErrorCode, message: string, details?: unknown, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'OptimizerError';
        this.code = code;
        this.details = details;
        this.timestamp = Date.now();

        // Maintain proper stack trace in V8
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, OptimizerError);
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
 * Validation error (malformed config document)
 */
export class ValidationError extends OptimizerError {
    constructor(message: string, details?: unknown) {
        super(ErrorCodes.VALIDATION_ERROR, message, details);
        this.name = 'ValidationError';
    }
}

/**
 * Invalid run configuration, raised before any evaluation happens
 */
export class InvalidConfigError extends OptimizerError {
    constructor(message: string, details?: unknown) {
        super(ErrorCodes.INVALID_CONFIG, message, details);
        this.name = 'InvalidConfigError';
    }
}

/**
 * A vertex score broke the total order needed to sort the simplex
 */
export class NonComparableScoreError extends OptimizerError {
    readonly vertexIndex: number;
    readonly position: number[];
    readonly score: number;

    constructor(vertexIndex: number, position: number[], score: number) {
        super(
            ErrorCodes.NON_COMPARABLE_SCORE,
            `Vertex ${vertexIndex} has a non-comparable score (${score}) at [${position.join(', ')}]`,
            { vertexIndex, position, score }
        );
        this.name = 'NonComparableScoreError';
        this.vertexIndex = vertexIndex;
        this.position = position;
        this.score = score;
    }
}

/**
 * The objective failed while evaluating a position
 */
export class ObjectiveEvaluationError extends OptimizerError {
    readonly position: number[];

    constructor(message: string, position: number[], cause?: unknown) {
        super(ErrorCodes.OBJECTIVE_FAILED, message, { position }, { cause });
        this.name = 'ObjectiveEvaluationError';
        this.position = position;
    }
}

/**
 * Run aborted by the caller
 */
export class CancelledError extends OptimizerError {
    constructor(message = 'Optimization cancelled', reason?: unknown) {
        super(ErrorCodes.CANCELLED, message, { reason });
        this.name = 'CancelledError';
    }
}

/**
 * Run exceeded its deadline
 */
export class TimeoutError extends OptimizerError {
    constructor(message = 'Operation timed out', details?: unknown) {
        super(ErrorCodes.TIMEOUT, message, details);
        this.name = 'TimeoutError';
    }
}

// ==================== Error Utilities ====================

/**
 * Check if an error is an OptimizerError
 */
export function isOptimizerError(error: unknown): error is OptimizerError {
    return error instanceof OptimizerError;
}

/**
 * Check if an error has a specific error code
 */
export function hasErrorCode(error: unknown, code: ErrorCode): boolean {
    return isOptimizerError(error) && error.code === code;
}

/**
 * Wrap any error into an OptimizerError
 */
export function wrapError(error: unknown, defaultCode: ErrorCode = ErrorCodes.INTERNAL_ERROR): OptimizerError {
    if (isOptimizerError(error)) {
        return error;
    }

    if (error instanceof Error) {
        return new OptimizerError(defaultCode, error.message, {
            originalName: error.name,
            originalStack: error.stack,
        }, { cause: error });
    }

    return new OptimizerError(defaultCode, String(error));
}
