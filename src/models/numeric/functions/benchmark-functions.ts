/**
 * @module functions/benchmark-functions
 * @description Classic test objectives for local optimizers, plus a registry
 * keyed by id so runs can be described in JSON.
 */

import { createObjectiveRegistry, type ObjectiveRegistry } from '../../../core/objective';
import { squaredNorm } from '../math/linear-algebra';

/** Root of 4x^3 - 32x + 5 closest to -2.9 */
const STYBLINSKI_TANG_ARGMIN = -2.903534027771177;
const STYBLINSKI_TANG_MIN_PER_DIM = -39.16616570377141;

// ==================== Objectives ====================

/**
 * Sphere: sum of squares. Minimum 0 at the origin.
 */
export function sphere(x: number[]): number {
    return squaredNorm(x);
}

/**
 * Rosenbrock valley. Minimum 0 at (1, ..., 1); needs n >= 2.
 */
export function rosenbrock(x: number[]): number {
    let sum = 0;
    for (let i = 0; i < x.length - 1; i++) {
        const a = x[i + 1] - x[i] * x[i];
        const b = 1 - x[i];
        sum += 100 * a * a + b * b;
    }
    return sum;
}

/**
 * Styblinski-Tang: 0.5 * sum(x^4 - 16x^2 + 5x). Multimodal; the global minimum
 * is near -2.9035 on every axis.
 */
export function styblinskiTang(x: number[]): number {
    let sum = 0;
    for (const xi of x) {
        sum += xi ** 4 - 16 * xi ** 2 + 5 * xi;
    }
    return 0.5 * sum;
}

/**
 * sin(x0) * cos(x1) / (|x2| + 1), three-dimensional. Minimum -1 at (-pi/2, 0, 0).
 */
export function sinCosDecay(x: number[]): number {
    return Math.sin(x[0]) * Math.cos(x[1]) * (1.0 / (Math.abs(x[2]) + 1.0));
}

// ==================== Registry ====================

/**
 * Registry with every benchmark objective above
 */
export function createBenchmarkRegistry(): ObjectiveRegistry {
    return createObjectiveRegistry()
        .register({
            metadata: {
                id: 'sphere',
                description: 'Sum of squares',
                knownMinimum: (n) => ({ position: new Array(n).fill(0), score: 0 }),
            },
            evaluate: sphere,
        })
        .register({
            metadata: {
                id: 'rosenbrock',
                description: 'Rosenbrock banana valley',
                knownMinimum: (n) => ({ position: new Array(n).fill(1), score: 0 }),
            },
            evaluate: rosenbrock,
        })
        .register({
            metadata: {
                id: 'styblinski-tang',
                description: 'Styblinski-Tang multimodal function',
                knownMinimum: (n) => ({
                    position: new Array(n).fill(STYBLINSKI_TANG_ARGMIN),
                    score: STYBLINSKI_TANG_MIN_PER_DIM * n,
                }),
            },
            evaluate: styblinskiTang,
        })
        .register({
            metadata: {
                id: 'sin-cos-decay',
                description: 'sin(x0) * cos(x1) / (|x2| + 1)',
                dimension: 3,
                knownMinimum: () => ({ position: [-Math.PI / 2, 0, 0], score: -1 }),
            },
            evaluate: sinCosDecay,
        });
}
