export type PipelineStage = 'sync' | 'test' | 'line_count' | 'build' | 'metrics' | 'render' | 'unknown';

/**
 * Base class for every error the run's failure boundary turns into fallback badges
 */
export class PipelineError extends Error {
    constructor(
        message: string,
        public readonly stage: PipelineStage,
        public readonly cause?: unknown
    ) {
        super(message);
        this.name = 'PipelineError';
    }
}

/** Clone, checkout or pull of the working copy failed */
export class SyncError extends PipelineError {
    constructor(message: string, cause?: unknown) {
        super(message, 'sync', cause);
        this.name = 'SyncError';
    }
}

/** The coverage-enabled test run exited non-zero */
export class TestError extends PipelineError {
    constructor(message: string, public readonly exitCode?: number, cause?: unknown) {
        super(message, 'test', cause);
        this.name = 'TestError';
    }
}

/** The line counter exited non-zero */
export class LineCountError extends PipelineError {
    constructor(message: string, public readonly exitCode?: number, cause?: unknown) {
        super(message, 'line_count', cause);
        this.name = 'LineCountError';
    }
}

/** The release build failed */
export class BuildError extends PipelineError {
    constructor(message: string) {
        super(message, 'build');
        this.name = 'BuildError';
    }
}

/** A metrics report is missing, malformed, or has no coverable lines */
export class MetricsParseError extends PipelineError {
    constructor(message: string, public readonly filePath?: string, cause?: unknown) {
        super(message, 'metrics', cause);
        this.name = 'MetricsParseError';
    }
}

/**
 * A command could not be started or did not finish in time.
 * Stage code wraps it in its own error.
 */
export class CommandError extends Error {
    constructor(
        message: string,
        public readonly command: string,
        public readonly timedOut: boolean = false
    ) {
        super(message);
        this.name = 'CommandError';
    }
}

/** Invalid configuration value */
export class ConfigError extends Error {
    constructor(message: string, public readonly field?: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

/**
 * Format an unknown thrown value for logs
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
