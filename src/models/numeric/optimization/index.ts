/**
 * @module optimization
 * @description Numerical optimization algorithms
 *
 * Provides:
 * - Nelder-Mead: derivative-free simplex minimization
 */

export * from './types';
export * from './config';
export * from './simplex';
export * from './nelder-mead';
