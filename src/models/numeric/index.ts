/**
 * @module src/models/numeric
 * @description Numerical Methods and Optimization
 *
 * Contains:
 * - Linear algebra: dense vector operations
 * - Optimization: Nelder-Mead simplex
 * - Functions: standard benchmark objectives
 */

import * as math from './math';
import * as optimization from './optimization';
import * as functions from './functions';

// Re-export as namespaces
export { math, optimization, functions };

// Direct exports for common functions
export * from './optimization';
