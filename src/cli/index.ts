#!/usr/bin/env node

import * as dotenv from 'dotenv';
import { Command } from 'commander';
import { ConfigLoader } from '../config/ConfigLoader';
import { BadgeJobOrchestrator } from '../orchestrator/BadgeJobOrchestrator';
import { BadgeCiConfig } from '../config/schema';
import { RunResult } from '../models/RunResult';
import { errorMessage } from '../models/PipelineErrors';
import logger from '../utils/logger';

// Load .env from the current directory if present
dotenv.config();

export interface RunCommandOptions {
    config?: string;
    deploy?: boolean;
    failOnBuild?: boolean;
    alwaysZero?: boolean;
}

const program = new Command();

program
    .name('badge-ci')
    .description('Build a branch, measure it, and publish status badges')
    .version('1.0.0');

program
    .command('run')
    .description('Sync, test, count, build, render and publish badges for a branch')
    .argument('[branch]', 'Branch to build (defaults to repository.default_branch)')
    .option('-c, --config <path>', 'Custom config file')
    .option('--no-deploy', 'Render badges without copying them to the deploy host')
    .option('--fail-on-build', 'Render failure badges when the release build fails')
    .option('--always-zero', 'Exit with status 0 even when the run failed')
    .action(async (branch: string | undefined, options: RunCommandOptions) => {
        process.exitCode = await runAction(branch, options);
    });

/**
 * Run the pipeline and return the process exit status
 */
async function runAction(branch: string | undefined, options: RunCommandOptions): Promise<number> {
    let config: BadgeCiConfig;
    try {
        const configLoader = new ConfigLoader();
        config = applyCliOptions(await configLoader.load(options.config), options);
    } catch (error) {
        logger.error(`Invalid configuration: ${errorMessage(error)}`);
        console.error(`\nError: ${errorMessage(error)}`);
        return 1;
    }

    const targetBranch = branch || config.repository.default_branch;
    const orchestrator = new BadgeJobOrchestrator(config);
    const result = await orchestrator.execute(targetBranch);

    printSummary(result);

    if (result.status === 'failed' && !config.execution.always_zero_exit) {
        return 1;
    }
    return 0;
}

/**
 * Apply CLI options to config
 */
function applyCliOptions(config: BadgeCiConfig, options: RunCommandOptions): BadgeCiConfig {
    if (options.deploy === false) {
        config.deploy.enabled = false;
    }
    if (options.failOnBuild) {
        config.pipeline.fail_on_build_error = true;
    }
    if (options.alwaysZero) {
        config.execution.always_zero_exit = true;
    }
    return config;
}

function printSummary(result: RunResult): void {
    console.log('\n=== badge-ci ===');

    const statusColor = result.status === 'success' ? '\x1b[32m' : '\x1b[31m';
    const resetColor = '\x1b[0m';
    console.log(`Branch: ${result.branch}`);
    console.log(`Status: ${statusColor}${result.status.toUpperCase()}${resetColor}`);

    if (result.stats) {
        console.log(`Coverage: ${result.stats.coverage}%`);
        console.log(`Code/Comments: ${result.stats.code}/${result.stats.comments}`);
    }
    if (result.failure) {
        console.log(`Failed stage: ${result.failure.stage} (${result.failure.name}: ${result.failure.message})`);
    }
    console.log(`Published: ${result.published ? 'yes' : 'no'}`);
    console.log(`Duration: ${(result.duration / 1000).toFixed(2)}s`);
}

// Only parse arguments if this module is run directly
if (require.main === module) {
    program.parseAsync().catch((error: unknown) => {
        logger.error(`badge-ci failed: ${errorMessage(error)}`);
        process.exitCode = 1;
    });
}

export { program, applyCliOptions, runAction };
