/**
 * @module core/logging
 * @description Structured logging for optimizer runs
 *
 * Provides console, in-memory and fan-out loggers with fixed field schemas
 * (versioned, append-only). Supports iteration-level and run-level export.
 */

// ==================== Types ====================

/**
 * Log level for console output
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Base log entry structure (all logs must include these fields)
 */
export interface BaseLogEntry {
    /** Schema version for compatibility */
    schemaVersion: string;
    /** Run label */
    run: string;
    /** Timestamp in milliseconds */
    timestamp: number;
}

/**
 * Iteration-level log entry, written after the iteration's operator was applied
 */
export interface IterationLogEntry extends BaseLogEntry {
    logType: 'iteration';
    iteration: number;
    /** Best score at the start of the iteration */
    bestScore: number;
    /** Operator that mutated the simplex */
    operation: string;
    /** Objective evaluations so far */
    evaluations: number;
}

/**
 * Run-level log entry (final summary)
 */
export interface RunLogEntry extends BaseLogEntry {
    logType: 'run';
    iterations: number;
    evaluations: number;
    termination: string;
    bestScore: number;
    bestPosition: number[];
    configHash: string;
    config: Record<string, unknown>;
}

/**
 * Union of all log entry types
 */
export type LogEntry = IterationLogEntry | RunLogEntry;

/**
 * Logger interface
 */
export interface Logger {
    /** Log one iteration */
    logIteration(entry: Omit<IterationLogEntry, 'logType' | 'schemaVersion' | 'timestamp'>): void;
    /** Log run summary */
    logRun(entry: Omit<RunLogEntry, 'logType' | 'schemaVersion' | 'timestamp'>): void;
    /** Flush pending writes */
    flush(): void;
    /** Close the logger */
    close(): void;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
    /** Schema version (memory logger only) */
    schemaVersion?: string;
    /** Console level (console logger only) */
    level?: LogLevel;
}

// ==================== Constants ====================

const DEFAULT_SCHEMA_VERSION = '1.0.0';

// ==================== Console Logger ====================

/**
 * Console Logger: Print to console
 *
 * `debug` prints every iteration, `info` only the run summary.
 */
export class ConsoleLogger implements Logger {
    private level: LogLevel;

    constructor(levelOrConfig: LogLevel | LoggerConfig = 'info') {
        if (typeof levelOrConfig === 'string') {
            this.level = levelOrConfig;
        } else {
            this.level = levelOrConfig.level ?? 'info';
        }
    }

    logIteration(entry: Omit<IterationLogEntry, 'logType' | 'schemaVersion' | 'timestamp'>): void {
        if (this.level === 'debug') {
            console.log(`Iter ${entry.iteration}, best so far: ${entry.bestScore}`);
        }
    }

    logRun(entry: Omit<RunLogEntry, 'logType' | 'schemaVersion' | 'timestamp'>): void {
        if (this.level === 'debug' || this.level === 'info') {
            console.log(
                `[RUN] ${entry.run}: iterations=${entry.iterations}, ` +
                `evaluations=${entry.evaluations}, termination=${entry.termination}, ` +
                `best=${entry.bestScore}`
            );
        }
    }

    flush(): void { /* no-op */ }
    close(): void { /* no-op */ }
}

// ==================== Memory Logger ====================

/**
 * Memory Logger: Store logs in memory
 * Useful for testing and for exporting a run afterwards.
 */
export class MemoryLogger implements Logger {
    private schemaVersion: string;
    public iterations: IterationLogEntry[] = [];
    public runs: RunLogEntry[] = [];

    constructor(config: LoggerConfig = {}) {
        this.schemaVersion = config.schemaVersion ?? DEFAULT_SCHEMA_VERSION;
    }

    private createBaseEntry(): Pick<BaseLogEntry, 'schemaVersion' | 'timestamp'> {
        return {
            schemaVersion: this.schemaVersion,
            timestamp: Date.now(),
        };
    }

    logIteration(entry: Omit<IterationLogEntry, 'logType' | 'schemaVersion' | 'timestamp'>): void {
        this.iterations.push({
            ...this.createBaseEntry(),
            logType: 'iteration',
            ...entry,
        });
    }

    logRun(entry: Omit<RunLogEntry, 'logType' | 'schemaVersion' | 'timestamp'>): void {
        this.runs.push({
            ...this.createBaseEntry(),
            logType: 'run',
            ...entry,
        });
    }

    /** Get all logs */
    getAllLogs(): LogEntry[] {
        return [...this.iterations, ...this.runs];
    }

    /** Export to JSON string */
    toJSON(): string {
        return JSON.stringify({
            iterations: this.iterations,
            runs: this.runs,
        }, null, 2);
    }

    /** Export to JSONL string */
    toJSONL(): string {
        return this.getAllLogs().map(entry => JSON.stringify(entry)).join('\n');
    }

    clear(): void {
        this.iterations = [];
        this.runs = [];
    }

    flush(): void { /* no-op for memory logger */ }
    close(): void { /* no-op for memory logger */ }
}

// ==================== Multi-Logger ====================

/**
 * Multi-Logger: Write to multiple loggers simultaneously
 */
export class MultiLogger implements Logger {
    private loggers: Logger[];

    constructor(loggers: Logger[]) {
        this.loggers = loggers;
    }

    logIteration(entry: Omit<IterationLogEntry, 'logType' | 'schemaVersion' | 'timestamp'>): void {
        for (const logger of this.loggers) {
            logger.logIteration(entry);
        }
    }

    logRun(entry: Omit<RunLogEntry, 'logType' | 'schemaVersion' | 'timestamp'>): void {
        for (const logger of this.loggers) {
            logger.logRun(entry);
        }
    }

    flush(): void {
        for (const logger of this.loggers) {
            logger.flush();
        }
    }

    close(): void {
        for (const logger of this.loggers) {
            logger.close();
        }
    }
}

// ==================== Factory Functions ====================

/**
 * Create a logger based on format
 */
export function createLogger(
    format: 'console' | 'memory',
    config: LoggerConfig = {}
): Logger {
    switch (format) {
        case 'console':
            return new ConsoleLogger(config);
        case 'memory':
            return new MemoryLogger(config);
    }
}
