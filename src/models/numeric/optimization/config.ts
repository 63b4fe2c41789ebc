/**
 * @module optimization/config
 * @description Nelder-Mead hyperparameter defaults, validation and parsing
 */

import { InvalidConfigError, ValidationError } from '../../../core/errors';
import type { NelderMeadConfig } from './types';

// ==================== Defaults ====================

/**
 * Conventional Nelder-Mead settings
 */
export const DEFAULT_NELDER_MEAD_CONFIG: Readonly<NelderMeadConfig> = {
    step: 0.1,
    noImproveThreshold: 1e-5,
    noImproveBreak: 10,
    maxIterations: 1000,
    alpha: 1.0,
    gamma: 2.0,
    rho: 0.5,
    sigma: 0.5,
};

const CONFIG_KEYS: readonly (keyof NelderMeadConfig)[] = [
    'step',
    'noImproveThreshold',
    'noImproveBreak',
    'maxIterations',
    'alpha',
    'gamma',
    'rho',
    'sigma',
];

/**
 * Create a complete config from partial overrides
 */
export function createNelderMeadConfig(overrides?: Partial<NelderMeadConfig>): NelderMeadConfig {
    return { ...DEFAULT_NELDER_MEAD_CONFIG, ...overrides };
}

// ==================== Validation ====================

/**
 * Validation result for a config
 */
export interface ConfigValidationResult {
    valid: boolean;
    errors: string[];
    warnings: string[];
}

/**
 * Check a config. Structural problems are errors; coefficients outside their
 * conventional ranges are only warnings, since the optimizer uses them as given.
 */
export function validateNelderMeadConfig(config: NelderMeadConfig): ConfigValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    for (const key of CONFIG_KEYS) {
        if (typeof config[key] !== 'number' || Number.isNaN(config[key])) {
            errors.push(`${key} must be a number`);
        }
    }

    if (!isCount(config.maxIterations)) {
        errors.push('maxIterations must be a non-negative integer');
    }
    if (!isCount(config.noImproveBreak)) {
        errors.push('noImproveBreak must be a non-negative integer');
    }
    if (config.noImproveThreshold < 0) {
        warnings.push(`noImproveThreshold is negative (${config.noImproveThreshold})`);
    }
    if (!(config.step > 0)) {
        warnings.push(`step is usually > 0 (got ${config.step})`);
    }
    if (!(config.alpha > 0)) {
        warnings.push(`alpha is usually > 0 (got ${config.alpha})`);
    }
    if (!(config.gamma > 1)) {
        warnings.push(`gamma is usually > 1 (got ${config.gamma})`);
    }
    if (!(config.rho > 0 && config.rho < 1)) {
        warnings.push(`rho is usually in (0, 1) (got ${config.rho})`);
    }
    if (!(config.sigma > 0 && config.sigma < 1)) {
        warnings.push(`sigma is usually in (0, 1) (got ${config.sigma})`);
    }

    return {
        valid: errors.length === 0,
        errors,
        warnings,
    };
}

/**
 * Throw InvalidConfigError unless the start point and iteration counts are usable.
 * Runs before any objective evaluation.
 */
export function assertRunnable(start: readonly unknown[], config: NelderMeadConfig): void {
    if (start.length === 0) {
        throw new InvalidConfigError('Start position must have at least one coordinate', { dimension: 0 });
    }
    start.forEach((value, index) => {
        if (typeof value !== 'number') {
            throw new InvalidConfigError(`Start coordinate ${index} is not a number`, { index, value });
        }
    });
    if (!isCount(config.maxIterations)) {
        throw new InvalidConfigError(
            `maxIterations must be a non-negative integer (got ${config.maxIterations})`,
            { maxIterations: config.maxIterations }
        );
    }
    if (!isCount(config.noImproveBreak)) {
        throw new InvalidConfigError(
            `noImproveBreak must be a non-negative integer (got ${config.noImproveBreak})`,
            { noImproveBreak: config.noImproveBreak }
        );
    }
}

// ==================== Parsing ====================

/**
 * Parse a JSON document into a config. Missing keys take their defaults.
 *
 * @throws ValidationError on malformed JSON, unknown keys, or non-numeric values
 */
export function parseNelderMeadConfig(json: string): NelderMeadConfig {
    let parsed: unknown;
    try {
        parsed = JSON.parse(json);
    } catch (error) {
        throw new ValidationError(
            `Invalid config JSON: ${error instanceof Error ? error.message : String(error)}`
        );
    }
    return nelderMeadConfigFrom(parsed);
}

/**
 * Build a config from an already-parsed value
 */
export function nelderMeadConfigFrom(value: unknown): NelderMeadConfig {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
        throw new ValidationError('Invalid config: must be an object');
    }

    const overrides: Partial<NelderMeadConfig> = {};
    for (const [key, field] of Object.entries(value)) {
        if (!isConfigKey(key)) {
            throw new ValidationError(`Invalid config: unknown key "${key}"`, { key });
        }
        if (typeof field !== 'number') {
            throw new ValidationError(`Invalid config: ${key} must be a number`, { key, value: field });
        }
        overrides[key] = field;
    }

    const config = createNelderMeadConfig(overrides);
    const result = validateNelderMeadConfig(config);
    if (!result.valid) {
        throw new ValidationError(`Invalid config: ${result.errors.join('; ')}`, result);
    }
    return config;
}

// ==================== Utility Functions ====================

function isCount(value: number): boolean {
    return Number.isInteger(value) && value >= 0;
}

function isConfigKey(key: string): key is keyof NelderMeadConfig {
    return CONFIG_KEYS.some(k => k === key);
}
