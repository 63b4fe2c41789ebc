/**
 * @module optimization/simplex
 * @description Simplex construction, ordering and the four Nelder-Mead operators.
 *
 * Operators are stateless transformations over a sorted simplex. Each one
 * builds new vertices; existing Vertex objects and their positions are never
 * modified.
 */

import { axpy, copyVector, subtract, zeros } from '../math/linear-algebra';
import { NonComparableScoreError } from '../../../core/errors';
import type { Simplex, SimplexCoefficients, SimplexOperation, Vertex } from './types';

/**
 * Score a position
 */
export type EvaluateFunction = (position: number[]) => number;

// ==================== Construction ====================

/**
 * Build the starting simplex: the seed, then one vertex per axis with that
 * coordinate increased by `step`. Vertices are evaluated in that order and
 * returned unsorted.
 */
export function createInitialSimplex(
    start: readonly number[],
    step: number,
    evaluate: EvaluateFunction
): Simplex {
    const seed = copyVector(start);
    const simplex: Simplex = [{ position: seed, score: evaluate(seed) }];

    for (let i = 0; i < start.length; i++) {
        const position = copyVector(seed);
        position[i] += step;
        simplex.push({ position, score: evaluate(position) });
    }

    return simplex;
}

// ==================== Ordering ====================

/**
 * Sort the simplex in place, best first.
 *
 * @throws NonComparableScoreError if any vertex scored NaN
 */
export function sortSimplex(simplex: Simplex): void {
    for (let i = 0; i < simplex.length; i++) {
        if (Number.isNaN(simplex[i].score)) {
            throw new NonComparableScoreError(i, copyVector(simplex[i].position), simplex[i].score);
        }
    }
    simplex.sort(compareVertices);
}

function compareVertices(a: Vertex, b: Vertex): number {
    if (a.score < b.score) return -1;
    if (a.score > b.score) return 1;
    return 0;
}

// ==================== Geometry ====================

/**
 * Coordinate-wise mean of every vertex except the last (worst) one
 */
export function computeCentroid(simplex: Simplex): number[] {
    const count = simplex.length - 1;
    const centroid = zeros(simplex[0].position.length);

    // Divide before summing; changing the order changes the low bits
    for (let k = 0; k < count; k++) {
        const position = simplex[k].position;
        for (let i = 0; i < position.length; i++) {
            centroid[i] += position[i] / count;
        }
    }

    return centroid;
}

/**
 * Point along the line from the worst vertex through the centroid:
 * centroid + coefficient * (centroid - worst).
 *
 * Reflection, expansion and contraction differ only in the coefficient.
 */
export function projectFromCentroid(
    centroid: readonly number[],
    worst: readonly number[],
    coefficient: number
): number[] {
    return axpy(centroid, coefficient, subtract(centroid, worst));
}

/**
 * Move every vertex toward the best one: best + sigma * (x - best).
 * The best vertex is re-evaluated too, so n+1 evaluations are made.
 */
export function shrinkSimplex(
    simplex: Simplex,
    sigma: number,
    evaluate: EvaluateFunction
): Simplex {
    const best = simplex[0].position;
    return simplex.map(vertex => {
        const position = axpy(best, sigma, subtract(vertex.position, best));
        return { position, score: evaluate(position) };
    });
}

// ==================== Iteration Step ====================

/**
 * Apply exactly one of reflection, expansion, contraction or shrink to a
 * sorted simplex, in place, and report which one it was.
 */
export function applySimplexStep(
    simplex: Simplex,
    coefficients: SimplexCoefficients,
    evaluate: EvaluateFunction
): SimplexOperation {
    const last = simplex.length - 1;
    const best = simplex[0];
    const secondWorst = simplex[last - 1];
    const worst = simplex[last];
    const centroid = computeCentroid(simplex);

    // Reflection
    const reflected = projectFromCentroid(centroid, worst.position, coefficients.alpha);
    const reflectedScore = evaluate(reflected);
    if (best.score <= reflectedScore && reflectedScore < secondWorst.score) {
        simplex[last] = { position: reflected, score: reflectedScore };
        return 'reflection';
    }

    // Expansion
    if (reflectedScore < best.score) {
        const expanded = projectFromCentroid(centroid, worst.position, coefficients.gamma);
        const expandedScore = evaluate(expanded);
        if (expandedScore < reflectedScore) {
            simplex[last] = { position: expanded, score: expandedScore };
            return 'expansion';
        }
        simplex[last] = { position: reflected, score: reflectedScore };
        return 'reflection';
    }

    // Contraction
    const contracted = projectFromCentroid(centroid, worst.position, coefficients.rho);
    const contractedScore = evaluate(contracted);
    if (contractedScore < worst.score) {
        simplex[last] = { position: contracted, score: contractedScore };
        return 'contraction';
    }

    // Shrink
    const shrunk = shrinkSimplex(simplex, coefficients.sigma, evaluate);
    for (let i = 0; i < shrunk.length; i++) {
        simplex[i] = shrunk[i];
    }
    return 'shrink';
}
