/**
 * @packageDocumentation
 * @module nelder-mead-optimizer
 *
 * Derivative-free local minimization with the Nelder-Mead simplex method.
 *
 * ## Modules
 * - `core` - Objective adapter, logging, config hashing, errors
 * - `numeric` - Vector math, the Nelder-Mead optimizer, benchmark functions
 *
 * ## Usage Example
 * ```typescript
 * import { nelderMead, minimize } from 'nelder-mead-optimizer';
 *
 * const result = nelderMead(
 *     (x) => 0.5 * x.reduce((s, v) => s + v ** 4 - 16 * v ** 2 + 5 * v, 0),
 *     [0, 0],
 *     { step: 0.1, noImproveThreshold: 1e-5, noImproveBreak: 10, maxIterations: 100,
 *       alpha: 1, gamma: 2, rho: -0.5, sigma: 0.5 }
 * );
 *
 * // Defaults for everything not given
 * const quick = minimize((x) => x[0] ** 2 + x[1] ** 2, [3, 4], { maxIterations: 500 });
 * ```
 *
 * @license MIT
 */

// ==================== Namespaces ====================
export * as core from './src/core';
export * as numeric from './src/models/numeric';

// ==================== Direct Exports ====================
export {
    nelderMead,
    minimize,
    toResultPair,
    terminationMessage,
    createNelderMeadConfig,
    validateNelderMeadConfig,
    parseNelderMeadConfig,
    DEFAULT_NELDER_MEAD_CONFIG,
} from './src/models/numeric/optimization';

export type {
    NelderMeadConfig,
    NelderMeadOptions,
    NelderMeadResult,
    IterationProgress,
    ProgressCallback,
    SimplexOperation,
    TerminationReason,
    Vertex,
} from './src/models/numeric/optimization';

export {
    ErrorCodes,
    OptimizerError,
    InvalidConfigError,
    NonComparableScoreError,
    ObjectiveEvaluationError,
    CancelledError,
    TimeoutError,
} from './src/core';

export type { ObjectiveLike, Objective, ObjectiveFunction } from './src/core';

// ==================== Version ====================
export const VERSION = '1.0.0';
