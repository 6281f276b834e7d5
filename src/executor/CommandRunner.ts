import { spawn } from 'child_process';
import logger from '../utils/logger';
import { writeFile } from '../utils/fileUtils';
import { CommandError } from '../models/PipelineErrors';

export interface CommandResult {
    exitCode: number;
    stdout: string;
    stderr: string;
    duration: number;
}

export interface CommandOptions {
    cwd: string;
    /** Milliseconds; 0 or undefined waits forever */
    timeout?: number;
}

/**
 * Runs one external program to completion
 */
export interface CommandRunner {
    run(command: string, args: string[], options: CommandOptions): Promise<CommandResult>;
}

/**
 * Render a command line for logs
 */
export function formatCommand(command: string, args: string[]): string {
    return [command, ...args].join(' ');
}

/**
 * Executes commands as child processes and captures output
 */
export class ProcessCommandRunner implements CommandRunner {
    constructor(private defaultTimeout: number = 0) {}

    /**
     * Execute a command without a shell
     */
    async run(command: string, args: string[], options: CommandOptions): Promise<CommandResult> {
        const startTime = Date.now();
        const commandLine = formatCommand(command, args);
        const timeout = options.timeout ?? this.defaultTimeout;

        logger.info(`Executing command: ${commandLine} in ${options.cwd}`);

        return new Promise((resolve, reject) => {
            const child = spawn(command, args, {
                cwd: options.cwd,
                env: { ...process.env, FORCE_COLOR: '0' },
            });

            let stdout = '';
            let stderr = '';

            // Decode as a stream so a character split across chunks stays whole
            child.stdout?.setEncoding('utf8');
            child.stderr?.setEncoding('utf8');

            child.stdout?.on('data', (data: string) => {
                stdout += data;
            });

            child.stderr?.on('data', (data: string) => {
                stderr += data;
            });

            const timeoutId = timeout > 0
                ? setTimeout(() => {
                    child.kill();
                    reject(new CommandError(`Command timed out after ${timeout}ms: ${commandLine}`, commandLine, true));
                }, timeout)
                : undefined;

            child.on('close', (code, signal) => {
                clearTimeout(timeoutId);
                const duration = Date.now() - startTime;

                // A signal kill has no exit code; count it as a failure
                const exitCode = code ?? (signal ? 1 : 0);

                logger.info(`Command completed with exit code ${exitCode} in ${duration}ms`);
                resolve({ exitCode, stdout, stderr, duration });
            });

            child.on('error', (error) => {
                clearTimeout(timeoutId);
                logger.error(`Command execution error: ${error}`);
                reject(new CommandError(`Failed to start ${command}: ${error.message}`, commandLine));
            });
        });
    }
}

/**
 * Save command output to a file, used when a tool reports on stdout
 */
export async function saveStdout(filePath: string, result: CommandResult): Promise<void> {
    await writeFile(filePath, result.stdout);
}
