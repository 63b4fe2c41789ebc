/**
 * @module core/repro
 * @description Reproducibility helpers for optimizer runs
 *
 * Canonical config serialization and config hashing, so that two runs can be
 * compared by the settings they were started with.
 */

// Core version - should match package.json
export const CORE_VERSION = '1.0.0';

// ==================== Hash ====================

/**
 * djb2 string hash
 */
function simpleHash(str: string): string {
    let hash = 5381;
    for (let i = 0; i < str.length; i++) {
        hash = ((hash << 5) + hash) ^ str.charCodeAt(i);
    }
    // Convert to hex string
    return (hash >>> 0).toString(16).padStart(8, '0');
}

/**
 * Create a 32-character hash from a string
 */
function createHash(data: string): string {
    // Use multiple rounds for better distribution
    const h1 = simpleHash(data);
    const h2 = simpleHash(data + h1);
    const h3 = simpleHash(h1 + data);
    const h4 = simpleHash(h2 + h3);
    return h1 + h2 + h3 + h4;
}

// ==================== Serialization ====================

/**
 * Serialize a config object to canonical JSON (sorted keys, 2-space indent)
 */
export function serializeConfig(config: object): string {
    return JSON.stringify(sortObjectKeys(config), null, 2);
}

/**
 * Compute a hash of a config object for quick comparison.
 * Key order does not affect the hash.
 */
export function computeConfigHash(config: object): string {
    return createHash(JSON.stringify(sortObjectKeys(config)));
}

// ==================== Run Metadata ====================

/**
 * Metadata stamped on run reports
 */
export interface RunMetadata {
    run: string;
    configHash: string;
    libraryVersion: string;
    startedAt: number;
    platform?: string;
    nodeVersion?: string;
}

/**
 * Create run metadata
 */
export function createRunMetadata(run: string, config: object): RunMetadata {
    return {
        run,
        configHash: computeConfigHash(config),
        libraryVersion: CORE_VERSION,
        startedAt: Date.now(),
        platform: typeof process !== 'undefined' ? process.platform : undefined,
        nodeVersion: typeof process !== 'undefined' ? process.version : undefined,
    };
}

// ==================== Utility Functions ====================

/**
 * Sort object keys recursively for deterministic serialization
 */
function sortObjectKeys(obj: unknown): unknown {
    if (obj === null || typeof obj !== 'object') {
        return obj;
    }

    if (Array.isArray(obj)) {
        return obj.map(sortObjectKeys);
    }

    const sorted: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
        sorted[key] = sortObjectKeys(value);
    }
    return sorted;
}
