/**
 * @module core
 * @description Core framework shared by the optimizers
 *
 * ## Modules
 * - `objective`: Objective capability, evaluator adapter and registry
 * - `logging`: Console/memory structured logging
 * - `repro`: Canonical config serialization and hashing
 * - `errors`: Unified error types and codes
 */

// ==================== Objective ====================

export type {
    ObjectiveFunction,
    Objective,
    ObjectiveLike,
    Evaluator,
    KnownMinimum,
    ObjectiveMetadata,
    ObjectiveSpec,
} from './objective';

export {
    asObjective,
    createEvaluator,
    ObjectiveRegistry,
    createObjectiveRegistry,
} from './objective';

// ==================== Logging ====================

export type {
    LogLevel,
    BaseLogEntry,
    IterationLogEntry,
    RunLogEntry,
    LogEntry,
    Logger,
    LoggerConfig,
} from './logging';

export {
    MultiLogger,
    ConsoleLogger,
    MemoryLogger,
    createLogger,
} from './logging';

// ==================== Repro ====================

export type {
    RunMetadata,
} from './repro';

export {
    CORE_VERSION,
    serializeConfig,
    computeConfigHash,
    createRunMetadata,
} from './repro';

// ==================== Errors ====================

export {
    ErrorCodes,
    OptimizerError,
    ValidationError,
    InvalidConfigError,
    NonComparableScoreError,
    ObjectiveEvaluationError,
    CancelledError,
    TimeoutError,
    isOptimizerError,
    hasErrorCode,
    wrapError,
} from './errors';

export type {
    ErrorCode,
} from './errors';
