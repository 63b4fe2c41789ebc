/**
 * Nelder-Mead Optimizer Tests
 * Scenarios, run invariants, termination paths, error paths and observers
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
    nelderMead,
    minimize,
    toResultPair,
    terminationMessage,
    createNelderMeadConfig,
    type NelderMeadConfig,
    type IterationProgress,
    type Vertex,
} from '../src/models/numeric/optimization';
import {
    sphere,
    rosenbrock,
    styblinskiTang,
    sinCosDecay,
} from '../src/models/numeric/functions';
import {
    ErrorCodes,
    InvalidConfigError,
    NonComparableScoreError,
    ObjectiveEvaluationError,
    CancelledError,
    TimeoutError,
} from '../src/core/errors';
import { MemoryLogger, ConsoleLogger } from '../src/core/logging';
import { computeConfigHash } from '../src/core/repro';

// ==================== Test Configs ====================

/** f(x) = x0^2 from [10] */
const PARABOLA_CONFIG: NelderMeadConfig = {
    step: 1.0,
    noImproveThreshold: 1e-8,
    noImproveBreak: 10,
    maxIterations: 200,
    alpha: 1.0,
    gamma: 2.0,
    rho: 0.5,
    sigma: 0.5,
};

/** The configuration used with sinCosDecay and Styblinski-Tang */
const NEGATIVE_RHO_CONFIG: NelderMeadConfig = {
    step: 0.1,
    noImproveThreshold: 1e-5,
    noImproveBreak: 10,
    maxIterations: 100,
    alpha: 1.0,
    gamma: 2.0,
    rho: -0.5,
    sigma: 0.5,
};

const parabola = (x: number[]): number => x[0] * x[0];

function recordProgress(): { onProgress: (p: IterationProgress) => void; records: IterationProgress[] } {
    const records: IterationProgress[] = [];
    return {
        onProgress: (p) => {
            records.push({ ...p, simplex: p.simplex.map(v => ({ position: [...v.position], score: v.score })) });
        },
        records,
    };
}

afterEach(() => {
    vi.restoreAllMocks();
});

// ==================== Scenarios ====================

describe('nelderMead scenarios', () => {
    it('should converge on x^2 from 10', () => {
        const result = nelderMead(parabola, [10.0], PARABOLA_CONFIG);

        expect(Math.abs(result.score)).toBeLessThan(1e-6);
        expect(Math.abs(result.position[0])).toBeLessThan(1e-3);
        expect(result.termination).toBe('no-improvement');
    });

    it('should take the exact path expand, expand, reflect onto 0 for x^2', () => {
        const { onProgress, records } = recordProgress();
        const result = nelderMead(parabola, [10.0], PARABOLA_CONFIG, { onProgress });

        expect(records.slice(0, 5).map(r => r.bestScore)).toEqual([100, 64, 16, 0, 0]);
        expect(result.position).toEqual([0]);
        expect(result.score).toBe(0);
        expect(result.iterations).toBe(14);
        expect(result.evaluations).toBe(28);
    });

    it('should reproduce the reference score for sin(x0)cos(x1)/(|x2|+1) with negative rho', () => {
        const result = nelderMead(sinCosDecay, [0.0, 0.0, 0.0], NEGATIVE_RHO_CONFIG);

        expect(result.score).toBeCloseTo(-0.9999447346002792, 12);
        expect(result.position[0]).toBeCloseTo(-1.5808971014312196, 6);
        expect(result.position[1]).toBeCloseTo(-0.0023902031669889284, 6);
        expect(result.position[2]).toBeCloseTo(1.3966979884429597e-06, 6);
        expect(result.termination).toBe('no-improvement');
    });

    it('should find the Styblinski-Tang local minimum reached from the origin', () => {
        const result = nelderMead(styblinskiTang, [0, 0], NEGATIVE_RHO_CONFIG);

        expect(result.score).toBeCloseTo(-64.19336078827004, 8);
        expect(result.position[0]).toBeCloseTo(2.734735107421878, 6);
        expect(result.position[1]).toBeCloseTo(-2.906274414062506, 6);
    });

    it('should walk the Rosenbrock valley to (1, 1)', () => {
        const result = nelderMead(rosenbrock, [-1.2, 1.0], {
            ...PARABOLA_CONFIG,
            step: 0.1,
            noImproveThreshold: 1e-10,
            noImproveBreak: 50,
            maxIterations: 5000,
        });

        expect(result.position[0]).toBeCloseTo(1, 6);
        expect(result.position[1]).toBeCloseTo(1, 6);
        expect(result.score).toBeLessThan(1e-12);
    });

    it('should stop after one counted iteration on a constant objective', () => {
        const { onProgress, records } = recordProgress();
        const result = nelderMead(() => 5, [1, 2], {
            ...PARABOLA_CONFIG,
            step: 0.5,
            noImproveThreshold: 0.0,
            noImproveBreak: 1,
        }, { onProgress });

        expect(result.iterations).toBe(1);
        expect(records).toHaveLength(1);
        expect(result.score).toBe(5);
        expect(result.position).toEqual([1, 2]);
        expect(result.evaluations).toBe(3);
        expect(result.termination).toBe('no-improvement');
    });
});

// ==================== Termination ====================

describe('nelderMead termination', () => {
    it('should return the best initial vertex when maxIterations is 0', () => {
        const objective = vi.fn((x: number[]) => (x[0] - 20) ** 2);
        const onProgress = vi.fn();
        const logger = new MemoryLogger();

        const result = nelderMead(objective, [10], { ...PARABOLA_CONFIG, maxIterations: 0 }, {
            onProgress,
            loggers: [logger],
        });

        expect(result.position).toEqual([11]);
        expect(result.score).toBe(81);
        expect(result.iterations).toBe(0);
        expect(result.evaluations).toBe(2);
        expect(result.termination).toBe('max-iterations');
        expect(objective).toHaveBeenCalledTimes(2);
        expect(onProgress).not.toHaveBeenCalled();
        expect(logger.iterations).toHaveLength(0);
        expect(logger.runs).toHaveLength(1);
    });

    it('should stop exactly at maxIterations', () => {
        const result = nelderMead(parabola, [10], { ...PARABOLA_CONFIG, maxIterations: 3 });

        expect(result.iterations).toBe(3);
        expect(result.evaluations).toBe(8);
        expect(result.termination).toBe('max-iterations');
        expect(result.position).toEqual([0]);
    });

    it('should stop in the first iteration when noImproveBreak is 0', () => {
        const result = nelderMead(parabola, [10], { ...PARABOLA_CONFIG, noImproveBreak: 0 });

        expect(result.iterations).toBe(1);
        expect(result.evaluations).toBe(2);
        expect(result.score).toBe(100);
        expect(result.termination).toBe('no-improvement');
    });
});

// ==================== Run Invariants ====================

describe('nelderMead invariants', () => {
    it('should keep n+1 vertices in every iteration for n = 1..4', () => {
        for (let n = 1; n <= 4; n++) {
            const { onProgress, records } = recordProgress();
            const start = Array.from({ length: n }, (_, i) => i + 1);
            nelderMead(sphere, start, { ...PARABOLA_CONFIG, maxIterations: 60 }, { onProgress });

            expect(records.length).toBeGreaterThan(0);
            for (const record of records) {
                expect(record.simplex).toHaveLength(n + 1);
            }
        }
    });

    it('should report a non-increasing best score', () => {
        const { onProgress, records } = recordProgress();
        nelderMead(rosenbrock, [-1.2, 1.0], { ...PARABOLA_CONFIG, step: 0.1, maxIterations: 300 }, { onProgress });

        for (let i = 1; i < records.length; i++) {
            expect(records[i].bestScore).toBeLessThanOrEqual(records[i - 1].bestScore);
        }
    });

    it('should report a sorted simplex whose first vertex is the best position', () => {
        const { onProgress, records } = recordProgress();
        nelderMead(styblinskiTang, [0, 0], NEGATIVE_RHO_CONFIG, { onProgress });

        for (const record of records) {
            const scores = record.simplex.map(v => v.score);
            expect(scores).toEqual([...scores].sort((a, b) => a - b));
            expect(record.bestPosition).toEqual(record.simplex[0].position);
            expect(record.bestScore).toBe(record.simplex[0].score);
        }
    });

    it('should produce identical simplex sequences for identical inputs', () => {
        const first = recordProgress();
        const second = recordProgress();

        const a = nelderMead(sinCosDecay, [0, 0, 0], NEGATIVE_RHO_CONFIG, { onProgress: first.onProgress });
        const b = nelderMead(sinCosDecay, [0, 0, 0], NEGATIVE_RHO_CONFIG, { onProgress: second.onProgress });

        expect(second.records).toEqual(first.records);
        expect(b).toEqual(a);
    });

    it('should count exactly one evaluation per objective call', () => {
        const objective = vi.fn(sphere);
        const result = nelderMead(objective, [1, -2, 3], { ...PARABOLA_CONFIG, step: 0.5 });

        expect(result.evaluations).toBe(objective.mock.calls.length);
    });

    it('should not let the objective alter simplex positions', () => {
        const clean = nelderMead(sphere, [1, 1], PARABOLA_CONFIG);
        const mutating = nelderMead((x) => {
            const score = sphere(x);
            x.fill(1000);
            return score;
        }, [1, 1], PARABOLA_CONFIG);

        expect(mutating).toEqual(clean);
    });

    it('should not modify the start array', () => {
        const start = [3, 4];
        nelderMead(sphere, start, PARABOLA_CONFIG);
        expect(start).toEqual([3, 4]);
    });

    it('should accept an object with an evaluate method', () => {
        const objective = { evaluate: parabola };
        const result = nelderMead(objective, [10], PARABOLA_CONFIG);
        expect(result.score).toBe(0);
    });
});

// ==================== Errors ====================

describe('nelderMead errors', () => {
    it('should reject an empty start position before evaluating anything', () => {
        const objective = vi.fn(sphere);

        expect(() => nelderMead(objective, [], PARABOLA_CONFIG)).toThrow(InvalidConfigError);
        expect(() => nelderMead(objective, [], PARABOLA_CONFIG)).toThrow('Start position must have at least one coordinate');
        expect(objective).not.toHaveBeenCalled();
    });

    it('should reject iteration counts that are not non-negative integers', () => {
        expect(() => nelderMead(sphere, [1], { ...PARABOLA_CONFIG, maxIterations: -1 })).toThrow(InvalidConfigError);
        expect(() => nelderMead(sphere, [1], { ...PARABOLA_CONFIG, maxIterations: 2.5 })).toThrow(
            'maxIterations must be a non-negative integer (got 2.5)'
        );
        expect(() => nelderMead(sphere, [1], { ...PARABOLA_CONFIG, noImproveBreak: NaN })).toThrow(
            'noImproveBreak must be a non-negative integer (got NaN)'
        );
    });

    it('should raise NonComparableScoreError when a vertex scores NaN', () => {
        const objective = (x: number[]): number => (x[1] > 0 ? NaN : x[0] + x[1]);

        let caught: unknown;
        try {
            nelderMead(objective, [0, 0], PARABOLA_CONFIG);
        } catch (error) {
            caught = error;
        }

        expect(caught).toBeInstanceOf(NonComparableScoreError);
        if (caught instanceof NonComparableScoreError) {
            expect(caught.vertexIndex).toBe(2);
            expect(caught.position).toEqual([0, 1]);
        }
    });

    it('should abort with ObjectiveEvaluationError when the objective throws', () => {
        const cause = new Error('solver diverged');
        let calls = 0;
        const objective = (x: number[]): number => {
            calls++;
            if (calls === 3) throw cause;
            return parabola(x);
        };

        let caught: unknown;
        try {
            nelderMead(objective, [10], PARABOLA_CONFIG);
        } catch (error) {
            caught = error;
        }

        expect(caught).toBeInstanceOf(ObjectiveEvaluationError);
        if (caught instanceof ObjectiveEvaluationError) {
            expect(caught.code).toBe(ErrorCodes.OBJECTIVE_FAILED);
            expect(caught.cause).toBe(cause);
            // third call is the first reflection: 10 + (10 - 11)
            expect(caught.position).toEqual([9]);
            expect(caught.message).toBe('Objective threw at [9]: solver diverged');
        }
    });

    it('should abort when the objective returns a non-number', () => {
        const objective = (): number => JSON.parse('"not a number"');
        expect(() => nelderMead(objective, [1], PARABOLA_CONFIG)).toThrow(ObjectiveEvaluationError);
        expect(() => nelderMead(objective, [1], PARABOLA_CONFIG)).toThrow(
            'Objective returned string instead of a number at [1]'
        );
    });

    it('should stop with CancelledError once the signal is aborted', () => {
        const controller = new AbortController();
        const onProgress = vi.fn((p: IterationProgress) => {
            if (p.iteration === 2) controller.abort('user');
        });

        expect(() => nelderMead(parabola, [10], PARABOLA_CONFIG, {
            signal: controller.signal,
            onProgress,
        })).toThrow(CancelledError);
        expect(onProgress).toHaveBeenCalledTimes(2);
    });

    it('should carry the abort reason', () => {
        const controller = new AbortController();
        controller.abort('shutdown');

        let caught: unknown;
        try {
            nelderMead(parabola, [10], PARABOLA_CONFIG, { signal: controller.signal });
        } catch (error) {
            caught = error;
        }

        expect(caught).toBeInstanceOf(CancelledError);
        if (caught instanceof CancelledError) {
            expect(caught.code).toBe(ErrorCodes.CANCELLED);
            expect(caught.details).toEqual({ reason: 'shutdown' });
            expect(caught.message).toBe('Optimization cancelled after 0 iterations');
        }
    });

    it('should stop with TimeoutError once the deadline has passed', () => {
        expect(() => nelderMead(parabola, [10], PARABOLA_CONFIG, { timeoutMs: 0 })).toThrow(TimeoutError);
    });

    it('should time out mid-run when the clock passes the deadline', () => {
        let now = 1_000;
        vi.spyOn(Date, 'now').mockImplementation(() => now);
        const onProgress = vi.fn((p: IterationProgress) => {
            if (p.iteration === 4) now += 60_000;
        });

        expect(() => nelderMead(parabola, [10], PARABOLA_CONFIG, { timeoutMs: 50_000, onProgress })).toThrow(
            'Optimization exceeded 50000ms after 4 iterations'
        );
        expect(onProgress).toHaveBeenCalledTimes(4);
    });
});

// ==================== Observers & Logging ====================

describe('nelderMead observers', () => {
    it('should call onProgress once per counted iteration with 1-based indices', () => {
        const onProgress = vi.fn();
        const result = nelderMead(parabola, [10], PARABOLA_CONFIG, { onProgress });

        expect(onProgress).toHaveBeenCalledTimes(result.iterations);
        expect(onProgress.mock.calls.map(([p]) => p.iteration)).toEqual(
            Array.from({ length: result.iterations }, (_, i) => i + 1)
        );
    });

    it('should not let an observer alter the search through the reported simplex', () => {
        const config = { ...PARABOLA_CONFIG, maxIterations: 1 };
        const clean = nelderMead(parabola, [10], config);

        const tampered = nelderMead(parabola, [10], config, {
            onProgress: (p) => {
                // positions are readonly to the compiler; write through at runtime anyway
                Object.assign(p.simplex[0].position, [500]);
                Object.assign(p.bestPosition, [500]);
            },
        });

        expect(clean.position).toEqual([8]);
        expect(clean.score).toBe(64);
        expect(tampered).toEqual(clean);
    });

    it('should report a fresh copy of the simplex on every call', () => {
        const seen: (readonly Vertex[])[] = [];
        nelderMead(parabola, [10], { ...PARABOLA_CONFIG, maxIterations: 2 }, {
            onProgress: (p) => seen.push(p.simplex),
        });

        expect(seen).toHaveLength(2);
        expect(seen[1]).not.toBe(seen[0]);
        expect(seen[0].map(v => v.position)).toEqual([[10], [11]]);
        expect(seen[1].map(v => v.position)).toEqual([[8], [10]]);
    });

    it('should log each applied operator and a run summary', () => {
        const logger = new MemoryLogger();
        const config = { ...PARABOLA_CONFIG, maxIterations: 3 };
        nelderMead(parabola, [10], config, { loggers: [logger], runName: 'parabola' });

        expect(logger.iterations.map(e => e.operation)).toEqual(['expansion', 'expansion', 'reflection']);
        expect(logger.iterations.map(e => e.evaluations)).toEqual([4, 6, 8]);
        expect(logger.iterations.map(e => e.bestScore)).toEqual([100, 64, 16]);
        expect(logger.iterations.every(e => e.run === 'parabola')).toBe(true);

        expect(logger.runs).toHaveLength(1);
        const [run] = logger.runs;
        expect(run.run).toBe('parabola');
        expect(run.termination).toBe('max-iterations');
        expect(run.iterations).toBe(3);
        expect(run.evaluations).toBe(8);
        expect(run.bestScore).toBe(0);
        expect(run.bestPosition).toEqual([0]);
        expect(run.configHash).toBe(computeConfigHash(config));
        expect(run.config).toEqual(config);
    });

    it('should label runs "nelder-mead" by default', () => {
        const logger = new MemoryLogger();
        nelderMead(parabola, [10], { ...PARABOLA_CONFIG, maxIterations: 1 }, { loggers: [logger] });
        expect(logger.runs[0].run).toBe('nelder-mead');
    });

    it('should print iteration lines through a debug console logger', () => {
        const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

        nelderMead(parabola, [10], { ...PARABOLA_CONFIG, maxIterations: 1 }, {
            loggers: [new ConsoleLogger('debug')],
        });

        expect(log.mock.calls).toEqual([
            ['Iter 1, best so far: 100'],
            ['[RUN] nelder-mead: iterations=1, evaluations=4, termination=max-iterations, best=64'],
        ]);
    });

    it('should be silent without observers', () => {
        const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
        nelderMead(parabola, [10], PARABOLA_CONFIG);
        expect(log).not.toHaveBeenCalled();
    });
});

// ==================== Convenience API ====================

describe('minimize', () => {
    it('should fill in default settings', () => {
        const result = minimize(sphere, [1, 1]);

        expect(result.score).toBeLessThan(1e-6);
        expect(result.iterations).toBeLessThan(createNelderMeadConfig().maxIterations);
        expect(result.termination).toBe('no-improvement');
    });

    it('should apply overrides', () => {
        const result = minimize(sphere, [1, 1], { maxIterations: 0 });
        expect(result.iterations).toBe(0);
        expect(result.termination).toBe('max-iterations');
    });
});

describe('toResultPair', () => {
    it('should return [position, score]', () => {
        const result = nelderMead(parabola, [10], { ...PARABOLA_CONFIG, maxIterations: 1 });
        expect(toResultPair(result)).toEqual([[8], 64]);
    });
});

describe('terminationMessage', () => {
    it('should describe each termination reason', () => {
        expect(terminationMessage('max-iterations')).toBe('Stopped: reached the maximum number of iterations.');
        expect(terminationMessage('no-improvement')).toBe('Stopped: best score stopped improving.');
    });
});
