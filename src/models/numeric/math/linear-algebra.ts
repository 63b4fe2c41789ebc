/**
 * @module math/linear-algebra
 * @description Lightweight dense vector utilities for the simplex operators.
 * All functions return new arrays and leave their inputs untouched.
 */

// ==================== Vector Operations ====================

/**
 * Compute the dot product of two vectors
 */
export function dot(a: readonly number[], b: readonly number[]): number {
    let sum = 0;
    for (let i = 0; i < a.length; i++) {
        sum += a[i] * b[i];
    }
    return sum;
}

/**
 * Compute the Euclidean norm (L2 norm) of a vector
 */
export function norm(v: readonly number[]): number {
    return Math.sqrt(squaredNorm(v));
}

/**
 * Compute the squared Euclidean norm of a vector
 */
export function squaredNorm(v: readonly number[]): number {
    let sum = 0;
    for (let i = 0; i < v.length; i++) {
        sum += v[i] * v[i];
    }
    return sum;
}

/**
 * Euclidean distance between two points
 */
export function distance(a: readonly number[], b: readonly number[]): number {
    return norm(subtract(a, b));
}

/**
 * Add two vectors: a + b
 */
export function add(a: readonly number[], b: readonly number[]): number[] {
    const result: number[] = new Array(a.length);
    for (let i = 0; i < a.length; i++) {
        result[i] = a[i] + b[i];
    }
    return result;
}

/**
 * Subtract two vectors: a - b
 */
export function subtract(a: readonly number[], b: readonly number[]): number[] {
    const result: number[] = new Array(a.length);
    for (let i = 0; i < a.length; i++) {
        result[i] = a[i] - b[i];
    }
    return result;
}

/**
 * Scale a vector by a scalar: s * v
 */
export function scale(v: readonly number[], s: number): number[] {
    const result: number[] = new Array(v.length);
    for (let i = 0; i < v.length; i++) {
        result[i] = v[i] * s;
    }
    return result;
}

/**
 * Create a copy of a vector
 */
export function copyVector(v: readonly number[]): number[] {
    return [...v];
}

/**
 * Create a zero vector of given size
 */
export function zeros(n: number): number[] {
    return new Array(n).fill(0);
}

/**
 * Linear combination: a + s * b
 */
export function axpy(a: readonly number[], s: number, b: readonly number[]): number[] {
    const result: number[] = new Array(a.length);
    for (let i = 0; i < a.length; i++) {
        result[i] = a[i] + s * b[i];
    }
    return result;
}
