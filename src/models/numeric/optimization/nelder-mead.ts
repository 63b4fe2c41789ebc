/**
 * @module optimization/nelder-mead
 * @description Nelder-Mead simplex method: derivative-free local minimization.
 *
 * Keeps a simplex of n+1 scored points and, each iteration, replaces the worst
 * one by reflecting, expanding or contracting it through the centroid of the
 * others, or shrinks the whole simplex toward the best point.
 *
 * Reference: J. A. Nelder and R. Mead, "A Simplex Method for Function
 * Minimization", The Computer Journal, Vol. 7, No. 4, pp. 308-313, 1965.
 */

import { copyVector } from '../math/linear-algebra';
import { createEvaluator, type ObjectiveLike } from '../../../core/objective';
import { CancelledError, TimeoutError } from '../../../core/errors';
import { computeConfigHash } from '../../../core/repro';
import { assertRunnable, createNelderMeadConfig } from './config';
import { applySimplexStep, createInitialSimplex, sortSimplex } from './simplex';
import type {
    NelderMeadConfig,
    NelderMeadOptions,
    NelderMeadResult,
    TerminationReason,
} from './types';

const DEFAULT_RUN_NAME = 'nelder-mead';

/**
 * Find a local minimum of `objective` starting from `start`.
 *
 * The run ends normally when `maxIterations` iterations have been counted or
 * when the best score has failed to improve by more than `noImproveThreshold`
 * for `noImproveBreak` consecutive iterations. Any error aborts the run.
 *
 * @example
 * ```typescript
 * const result = nelderMead(
 *     (x) => Math.sin(x[0]) * Math.cos(x[1]) * (1 / (Math.abs(x[2]) + 1)),
 *     [0, 0, 0],
 *     { step: 0.1, noImproveThreshold: 1e-5, noImproveBreak: 10, maxIterations: 100,
 *       alpha: 1, gamma: 2, rho: -0.5, sigma: 0.5 }
 * );
 * // result.score === -0.9999447346002792
 * ```
 *
 * @throws InvalidConfigError before any evaluation if `start` is empty or the iteration counts are not non-negative integers
 * @throws NonComparableScoreError if a vertex in the simplex scores NaN
 * @throws ObjectiveEvaluationError if the objective throws or returns a non-number
 * @throws CancelledError / TimeoutError when `options.signal` or `options.timeoutMs` stop the run
 */
export function nelderMead(
    objective: ObjectiveLike,
    start: number[],
    config: NelderMeadConfig,
    options: NelderMeadOptions = {}
): NelderMeadResult {
    assertRunnable(start, config);

    const loggers = options.loggers ?? [];
    const run = options.runName ?? DEFAULT_RUN_NAME;
    const deadline = options.timeoutMs !== undefined ? Date.now() + options.timeoutMs : undefined;
    const evaluator = createEvaluator(objective);
    const evaluate = (position: number[]): number => evaluator.evaluate(position);

    const simplex = createInitialSimplex(start, config.step, evaluate);
    let previousBest = simplex[0].score;
    let noImprove = 0;
    let iterations = 0;

    const finish = (termination: TerminationReason): NelderMeadResult => {
        const best = simplex[0];
        const result: NelderMeadResult = {
            position: copyVector(best.position),
            score: best.score,
            iterations,
            evaluations: evaluator.count,
            termination,
        };

        for (const logger of loggers) {
            logger.logRun({
                run,
                iterations: result.iterations,
                evaluations: result.evaluations,
                termination: result.termination,
                bestScore: result.score,
                bestPosition: result.position,
                configHash: computeConfigHash(config),
                config: { ...config },
            });
            logger.flush();
        }

        return result;
    };

    while (true) {
        if (options.signal?.aborted) {
            throw new CancelledError(`Optimization cancelled after ${iterations} iterations`, options.signal.reason);
        }
        if (deadline !== undefined && Date.now() >= deadline) {
            throw new TimeoutError(`Optimization exceeded ${options.timeoutMs}ms after ${iterations} iterations`, {
                timeoutMs: options.timeoutMs,
                iterations,
            });
        }

        sortSimplex(simplex);
        const bestScore = simplex[0].score;

        if (iterations >= config.maxIterations) {
            return finish('max-iterations');
        }
        iterations++;

        options.onProgress?.({
            iteration: iterations,
            bestScore,
            bestPosition: copyVector(simplex[0].position),
            simplex: simplex.map(vertex => ({ position: copyVector(vertex.position), score: vertex.score })),
        });

        if (bestScore < previousBest - config.noImproveThreshold) {
            noImprove = 0;
            previousBest = bestScore;
        } else {
            noImprove++;
        }

        if (noImprove >= config.noImproveBreak) {
            return finish('no-improvement');
        }

        const operation = applySimplexStep(simplex, config, evaluate);

        for (const logger of loggers) {
            logger.logIteration({
                run,
                iteration: iterations,
                bestScore,
                operation,
                evaluations: evaluator.count,
            });
        }
    }
}

/**
 * Nelder-Mead with conventional defaults for any setting not given.
 */
export function minimize(
    objective: ObjectiveLike,
    start: number[],
    config?: Partial<NelderMeadConfig>,
    options?: NelderMeadOptions
): NelderMeadResult {
    return nelderMead(objective, start, createNelderMeadConfig(config), options);
}

/**
 * The result as a `[position, score]` pair
 */
export function toResultPair(result: NelderMeadResult): [number[], number] {
    return [result.position, result.score];
}

/**
 * Get human-readable description of a termination reason
 */
export function terminationMessage(reason: TerminationReason): string {
    switch (reason) {
        case 'max-iterations':
            return 'Stopped: reached the maximum number of iterations.';
        case 'no-improvement':
            return 'Stopped: best score stopped improving.';
    }
}
