import path from 'path';
import { CommandRunner, CommandResult, formatCommand, saveStdout } from '../executor/CommandRunner';
import { CommandSpec, METRICS_DIR_PLACEHOLDER } from '../config/schema';
import { LineCountError, TestError, errorMessage } from '../models/PipelineErrors';
import { ensureDir } from '../utils/fileUtils';
import logger from '../utils/logger';

export interface VerificationOptions {
    metricsDir: string; // Relative to the working copy
    lineCountReport: string;
    testCommand: CommandSpec;
    lineCountCommand: CommandSpec;
    buildCommand: CommandSpec;
    timeout?: number;
}

/**
 * Runs the test, line-count and release-build tools against a working copy
 */
export class VerificationPipeline {
    constructor(
        private runner: CommandRunner,
        private options: VerificationOptions
    ) {}

    /**
     * Absolute metrics directory for a working copy
     */
    getMetricsDir(workDir: string): string {
        return path.resolve(workDir, this.options.metricsDir);
    }

    /**
     * Run the tests with coverage; the tool writes its JSON report into the metrics directory
     */
    async runTests(workDir: string): Promise<void> {
        const metricsDir = this.getMetricsDir(workDir);
        await ensureDir(metricsDir);

        const spec = this.resolve(this.options.testCommand, metricsDir);
        let result: CommandResult;
        try {
            result = await this.runner.run(spec.command, spec.args, { cwd: workDir, timeout: this.options.timeout });
        } catch (error) {
            throw new TestError(`Tests could not run: ${errorMessage(error)}`, undefined, error);
        }

        if (result.exitCode !== 0) {
            logger.error(`Tests failed (exit ${result.exitCode}): ${formatCommand(spec.command, spec.args)}`);
            throw new TestError('Tests failed.', result.exitCode);
        }
        logger.info('Tests passed');
    }

    /**
     * Count lines of code and store the tool's JSON output in the metrics directory
     */
    async countLines(workDir: string): Promise<void> {
        const metricsDir = this.getMetricsDir(workDir);
        await ensureDir(metricsDir);

        const spec = this.resolve(this.options.lineCountCommand, metricsDir);
        let result: CommandResult;
        try {
            result = await this.runner.run(spec.command, spec.args, { cwd: workDir, timeout: this.options.timeout });
        } catch (error) {
            throw new LineCountError(`Line counter could not run: ${errorMessage(error)}`, undefined, error);
        }

        if (result.exitCode !== 0) {
            throw new LineCountError('Failed to count lines of code.', result.exitCode);
        }

        const reportPath = path.join(metricsDir, this.options.lineCountReport);
        await saveStdout(reportPath, result);
        logger.info(`Line count report written to ${reportPath}`);
    }

    /**
     * Build the release artifact. Reports success instead of throwing.
     */
    async buildRelease(workDir: string): Promise<boolean> {
        const spec = this.options.buildCommand;
        try {
            const result = await this.runner.run(spec.command, spec.args, { cwd: workDir, timeout: this.options.timeout });
            if (result.exitCode !== 0) {
                logger.warn(`Release build failed with exit code ${result.exitCode}`);
                return false;
            }
            logger.info('Release build succeeded');
            return true;
        } catch (error) {
            logger.warn(`Release build could not run: ${errorMessage(error)}`);
            return false;
        }
    }

    private resolve(spec: CommandSpec, metricsDir: string): CommandSpec {
        return {
            command: spec.command,
            args: spec.args.map(arg => arg.split(METRICS_DIR_PLACEHOLDER).join(metricsDir)),
        };
    }
}
