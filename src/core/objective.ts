/**
 * @module core/objective
 * @description Objective capability, evaluation adapter and objective registry
 *
 * The optimizer never sees the caller's objective directly: every call goes
 * through an {@link Evaluator}, which copies the position, counts calls and
 * converts failures into typed errors.
 */

import { ObjectiveEvaluationError, ValidationError } from './errors';

// ==================== Types ====================

/**
 * Objective as a plain function: position in, score out (lower is better)
 */
export type ObjectiveFunction = (position: number[]) => number;

/**
 * Objective as an object with a single evaluation method
 */
export interface Objective {
    evaluate(position: number[]): number;
}

/**
 * Anything the optimizer accepts as an objective
 */
export type ObjectiveLike = ObjectiveFunction | Objective;

/**
 * Adapter the optimizer calls for every new vertex
 */
export interface Evaluator {
    /** Evaluate a position; throws ObjectiveEvaluationError on failure */
    evaluate(position: number[]): number;
    /** Number of calls made so far */
    readonly count: number;
}

/**
 * Known minimum of an objective, if any
 */
export interface KnownMinimum {
    position: number[];
    score: number;
}

/**
 * Metadata for a registered objective
 */
export interface ObjectiveMetadata {
    /** Unique identifier */
    id: string;
    /** Human-readable description */
    description: string;
    /** Fixed dimensionality, if the objective is not defined for any n */
    dimension?: number;
    /** Global minimum for a given dimension, if known */
    knownMinimum?: (dimension: number) => KnownMinimum;
}

/**
 * ObjectiveSpec: objective function with metadata
 */
export interface ObjectiveSpec {
    metadata: ObjectiveMetadata;
    evaluate: ObjectiveFunction;
}

// ==================== Adapter ====================

/**
 * Normalize either objective shape to an {@link Objective}
 */
export function asObjective(objective: ObjectiveLike): Objective {
    if (typeof objective === 'function') {
        return { evaluate: objective };
    }
    return objective;
}

/**
 * Wrap an objective into a counting, error-converting evaluator
 */
export function createEvaluator(objective: ObjectiveLike): Evaluator {
    const target = asObjective(objective);
    let count = 0;

    return {
        evaluate(position: number[]): number {
            count++;
            let score: unknown;
            try {
                score = target.evaluate([...position]);
            } catch (error) {
                const reason = error instanceof Error ? error.message : String(error);
                throw new ObjectiveEvaluationError(
                    `Objective threw at [${position.join(', ')}]: ${reason}`,
                    [...position],
                    error
                );
            }
            if (typeof score !== 'number') {
                throw new ObjectiveEvaluationError(
                    `Objective returned ${typeof score} instead of a number at [${position.join(', ')}]`,
                    [...position]
                );
            }
            return score;
        },
        get count(): number {
            return count;
        },
    };
}

// ==================== Objective Registry ====================

/**
 * Registry for managing and looking up objectives by id
 */
export class ObjectiveRegistry {
    private objectives: Map<string, ObjectiveSpec> = new Map();

    /**
     * Register an objective
     */
    register(spec: ObjectiveSpec): this {
        this.objectives.set(spec.metadata.id, spec);
        return this;
    }

    /**
     * Get an objective by ID
     */
    get(id: string): ObjectiveSpec | undefined {
        return this.objectives.get(id);
    }

    /**
     * Get an objective by ID, throwing if it is missing
     */
    require(id: string): ObjectiveSpec {
        const spec = this.get(id);
        if (!spec) {
            throw new ValidationError(`Objective not found: ${id}`, { id, available: this.list() });
        }
        return spec;
    }

    has(id: string): boolean {
        return this.objectives.has(id);
    }

    /**
     * List all registered objective IDs
     */
    list(): string[] {
        return Array.from(this.objectives.keys());
    }
}

/**
 * Create a new objective registry
 */
export function createObjectiveRegistry(): ObjectiveRegistry {
    return new ObjectiveRegistry();
}
