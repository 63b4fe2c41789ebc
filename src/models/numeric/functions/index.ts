/**
 * @module functions
 * @description Standard objectives for exercising optimizers
 */

export * from './benchmark-functions';
