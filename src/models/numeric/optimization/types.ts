/**
 * @module optimization/types
 * @description Type definitions for the Nelder-Mead simplex optimizer
 */

import type { Logger } from '../../../core/logging';

/**
 * Nelder-Mead hyperparameters, fixed for the lifetime of one run.
 * Coefficients are used exactly as given, including out-of-range or negative values.
 */
export interface NelderMeadConfig {
    /** Initial simplex radius: offset added to one axis per perturbed vertex */
    step: number;
    /** Best score must drop by more than this to count as an improvement */
    noImproveThreshold: number;
    /** Stop after this many consecutive iterations without improvement */
    noImproveBreak: number;
    /** Always stop after this many iterations */
    maxIterations: number;
    /** Reflection coefficient (usually 1.0) */
    alpha: number;
    /** Expansion coefficient (usually 2.0) */
    gamma: number;
    /** Contraction coefficient (usually 0.5) */
    rho: number;
    /** Shrink coefficient (usually 0.5) */
    sigma: number;
}

/**
 * The four classical simplex coefficients
 */
export type SimplexCoefficients = Pick<NelderMeadConfig, 'alpha' | 'gamma' | 'rho' | 'sigma'>;

/**
 * A simplex vertex. The score is always the objective value at `position`.
 */
export interface Vertex {
    readonly position: readonly number[];
    readonly score: number;
}

/**
 * n+1 vertices; ascending by score after every sort
 */
export type Simplex = Vertex[];

/**
 * Operator applied in one iteration
 */
export type SimplexOperation = 'reflection' | 'expansion' | 'contraction' | 'shrink';

/**
 * Why a run stopped
 */
export type TerminationReason = 'max-iterations' | 'no-improvement';

/**
 * Per-iteration progress observation
 */
export interface IterationProgress {
    /** 1-based iteration counter */
    iteration: number;
    /** Score of the best vertex after sorting */
    bestScore: number;
    /** Position of the best vertex */
    bestPosition: number[];
    /** Copy of the sorted simplex; changing it does not affect the run */
    simplex: readonly Vertex[];
}

export type ProgressCallback = (progress: IterationProgress) => void;

/**
 * Run options that do not affect the search itself
 */
export interface NelderMeadOptions {
    /** Called once per counted iteration, before the no-improvement check */
    onProgress?: ProgressCallback;
    /** Receive one entry per applied operator and a run summary */
    loggers?: Logger[];
    /** Label written to log entries (default: 'nelder-mead') */
    runName?: string;
    /** Checked at the top of every iteration */
    signal?: AbortSignal;
    /** Wall-clock budget in milliseconds, checked at the top of every iteration */
    timeoutMs?: number;
}

/**
 * Optimization result
 */
export interface NelderMeadResult {
    /** Best position found */
    position: number[];
    /** Objective value at `position` */
    score: number;
    /** Number of counted iterations */
    iterations: number;
    /** Number of objective evaluations */
    evaluations: number;
    /** Which limit ended the run */
    termination: TerminationReason;
}
