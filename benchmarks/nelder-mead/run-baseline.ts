#!/usr/bin/env npx tsx
/**
 * @module benchmarks/nelder-mead/run-baseline
 * @description Run Nelder-Mead on the problems listed in a suite config
 *
 * Usage:
 *   npx tsx benchmarks/nelder-mead/run-baseline.ts --config=baseline.json
 *   npx tsx benchmarks/nelder-mead/run-baseline.ts --config=multimodal.json --verbose
 */

import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';

import { core, numeric } from '../../index';

const {
    ConsoleLogger,
    MemoryLogger,
    ValidationError,
    createRunMetadata,
    wrapError,
} = core;

const { nelderMead, nelderMeadConfigFrom, terminationMessage } = numeric.optimization;
const { createBenchmarkRegistry } = numeric.functions;
const { distance } = numeric.math;

const BENCHMARK_DIR = path.dirname(fileURLToPath(import.meta.url));

// ==================== CLI Parsing ====================

interface CliArgs {
    config: string;
    output: string;
    verbose: boolean;
}

function parseArgs(): CliArgs {
    const args = process.argv.slice(2);
    const result: CliArgs = {
        config: 'baseline.json',
        output: path.join(BENCHMARK_DIR, 'results'),
        verbose: false,
    };

    for (const arg of args) {
        if (arg.startsWith('--config=')) {
            result.config = arg.split('=')[1];
        } else if (arg.startsWith('--output=')) {
            result.output = arg.split('=')[1];
        } else if (arg === '--verbose') {
            result.verbose = true;
        }
    }

    return result;
}

// ==================== Suite Config ====================

interface ProblemConfig {
    objective: string;
    start: number[];
    optimizer: unknown;
}

interface SuiteConfig {
    name: string;
    problems: ProblemConfig[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNumberArray(value: unknown): value is number[] {
    return Array.isArray(value) && value.every(v => typeof v === 'number');
}

function parseProblem(problem: unknown, index: number, file: string): ProblemConfig {
    if (!isRecord(problem)) {
        throw new ValidationError(`${file}: problem ${index} must be an object`, { index });
    }
    const { objective, start, optimizer } = problem;
    if (typeof objective !== 'string' || !isNumberArray(start)) {
        throw new ValidationError(`${file}: problem ${index} needs an objective id and a numeric start`, { index });
    }
    return { objective, start, optimizer: optimizer ?? {} };
}

function parseSuite(value: unknown, file: string): SuiteConfig {
    if (!isRecord(value)) {
        throw new ValidationError(`${file}: expected { name, problems[] }`);
    }
    const { name, problems } = value;
    if (typeof name !== 'string' || !Array.isArray(problems)) {
        throw new ValidationError(`${file}: expected { name, problems[] }`);
    }

    return {
        name,
        problems: problems.map((problem: unknown, index: number) => parseProblem(problem, index, file)),
    };
}

// ==================== Benchmark Runner ====================

interface ProblemSummary {
    objective: string;
    dimension: number;
    configHash: string;
    position: number[];
    score: number;
    iterations: number;
    evaluations: number;
    termination: string;
    scoreGap?: number;
    distanceToKnownMinimum?: number;
}

function runProblem(problem: ProblemConfig, verbose: boolean): ProblemSummary {
    const registry = createBenchmarkRegistry();
    const spec = registry.require(problem.objective);
    const dimension = problem.start.length;

    if (spec.metadata.dimension !== undefined && spec.metadata.dimension !== dimension) {
        throw new ValidationError(
            `${problem.objective} is ${spec.metadata.dimension}-dimensional, start has ${dimension} coordinates`
        );
    }

    const config = nelderMeadConfigFrom(problem.optimizer);
    const run = `${problem.objective}-${dimension}d`;
    const metadata = createRunMetadata(run, config);
    const memory = new MemoryLogger();

    const result = nelderMead(spec.evaluate, problem.start, config, {
        runName: run,
        loggers: verbose ? [memory, new ConsoleLogger('debug')] : [memory],
    });

    const summary: ProblemSummary = {
        objective: problem.objective,
        dimension,
        configHash: metadata.configHash,
        position: result.position,
        score: result.score,
        iterations: result.iterations,
        evaluations: result.evaluations,
        termination: result.termination,
    };

    const known = spec.metadata.knownMinimum?.(dimension);
    if (known) {
        summary.scoreGap = result.score - known.score;
        summary.distanceToKnownMinimum = distance(result.position, known.position);
    }

    console.log(`  ${run}: score=${result.score.toExponential(4)}, iterations=${result.iterations}, evaluations=${result.evaluations}`);
    console.log(`    ${terminationMessage(result.termination)}`);
    if (summary.scoreGap !== undefined) {
        console.log(`    gap to known minimum: ${summary.scoreGap.toExponential(3)}`);
    }

    return summary;
}

// ==================== Main ====================

function main(): void {
    const args = parseArgs();

    console.log('╔════════════════════════════════════════════════╗');
    console.log('║       Nelder-Mead Baseline Benchmark Runner    ║');
    console.log('╚════════════════════════════════════════════════╝');

    const configFile = path.join(BENCHMARK_DIR, 'configs', args.config);
    let parsed: unknown;
    try {
        parsed = JSON.parse(fs.readFileSync(configFile, 'utf-8'));
    } catch (error) {
        throw new ValidationError(`Cannot read suite config ${configFile}`, { cause: String(error) });
    }
    const suite = parseSuite(parsed, args.config);

    console.log(`\n Running suite "${suite.name}" (${suite.problems.length} problems)...`);
    const summaries = suite.problems.map(problem => runProblem(problem, args.verbose));

    if (!fs.existsSync(args.output)) {
        fs.mkdirSync(args.output, { recursive: true });
    }
    const resultPath = path.join(args.output, `${args.config.replace('.json', '')}_${Date.now()}.json`);
    fs.writeFileSync(resultPath, JSON.stringify({ suite: suite.name, summaries }, null, 2));

    console.log(`\n Results saved to ${resultPath}`);
}

try {
    main();
} catch (error) {
    const wrapped = wrapError(error);
    console.error(`[${wrapped.code}] ${wrapped.message}`);
    process.exitCode = 1;
}
