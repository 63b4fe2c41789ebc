#!/usr/bin/env npx tsx
/**
 * @module benchmarks/nelder-mead/simple-example
 * @description Minimize the 2-D Styblinski-Tang function from the origin
 *
 * Usage:
 *   npx tsx benchmarks/nelder-mead/simple-example.ts
 */

import {
    nelderMead,
    toResultPair,
    terminationMessage,
    type NelderMeadConfig,
} from '../../src/models/numeric/optimization';
import { styblinskiTang } from '../../src/models/numeric/functions';
import { ConsoleLogger, MemoryLogger } from '../../src/core/logging';

// ==========================================
// Configuration
// ==========================================

const CONFIG: NelderMeadConfig = {
    step: 0.1,
    noImproveThreshold: 1e-5,
    noImproveBreak: 10,
    maxIterations: 100,
    alpha: 1.0,
    gamma: 2.0,
    rho: -0.5,
    sigma: 0.5,
};

// ==========================================
// Main
// ==========================================

function main(): void {
    const memory = new MemoryLogger();

    const result = nelderMead(styblinskiTang, [0, 0], CONFIG, {
        runName: 'styblinski-tang-2d',
        loggers: [new ConsoleLogger('info'), memory],
    });

    console.log(toResultPair(result));
    console.log(terminationMessage(result.termination));

    // Operator mix over the run
    const counts: Record<string, number> = {};
    for (const entry of memory.iterations) {
        counts[entry.operation] = (counts[entry.operation] ?? 0) + 1;
    }
    console.table(counts);
}

main();
