/**
 * @module math
 * @description Vector math used by the optimizers
 */

export * from './linear-algebra';
