import { v4 as uuidv4 } from 'uuid';
import { BadgeCiConfig } from '../config/schema';
import { CommandRunner, ProcessCommandRunner } from '../executor/CommandRunner';
import { SourceSync } from '../repo/SourceSync';
import { VerificationPipeline } from '../pipeline/VerificationPipeline';
import { StatsExtractor } from '../metrics/StatsExtractor';
import { BadgeRenderer } from '../badges/BadgeRenderer';
import { BadgePublisher } from '../publisher/BadgePublisher';
import { BranchStats } from '../models/BranchStats';
import { BuildError, PipelineError, PipelineStage } from '../models/PipelineErrors';
import { RunFailure, RunResult, RunState } from '../models/RunResult';
import logger from '../utils/logger';

/**
 * Collaborators of a run; any of them can be replaced
 */
export interface OrchestratorDeps {
    runner?: CommandRunner;
    sourceSync?: SourceSync;
    pipeline?: VerificationPipeline;
    statsExtractor?: StatsExtractor;
    renderer?: BadgeRenderer;
    publisher?: BadgePublisher;
}

const STAGE_BY_STATE: Partial<Record<RunState, PipelineStage>> = {
    SYNCING: 'sync',
    VERIFYING: 'test',
    EXTRACTING_STATS: 'metrics',
    RENDERING: 'render',
};

/**
 * Runs sync, verification, stats extraction and badge rendering inside one
 * failure boundary, then always publishes the badges
 */
export class BadgeJobOrchestrator {
    private state: RunState = 'IDLE';
    private sourceSync: SourceSync;
    private pipeline: VerificationPipeline;
    private statsExtractor: StatsExtractor;
    private renderer: BadgeRenderer;
    private publisher: BadgePublisher;

    constructor(private config: BadgeCiConfig, deps: OrchestratorDeps = {}) {
        const runner = deps.runner ?? new ProcessCommandRunner(config.execution.timeout);
        const timeout = config.execution.timeout;

        this.sourceSync = deps.sourceSync ?? new SourceSync(config.repository.url, config.repository.workspace_root);
        this.pipeline = deps.pipeline ?? new VerificationPipeline(runner, {
            metricsDir: config.pipeline.metrics_dir,
            lineCountReport: config.pipeline.line_count_report,
            testCommand: config.pipeline.test_command,
            lineCountCommand: config.pipeline.line_count_command,
            buildCommand: config.pipeline.build_command,
            timeout,
        });
        this.statsExtractor = deps.statsExtractor ?? new StatsExtractor({
            lineCountReport: config.pipeline.line_count_report,
            coverageReport: config.pipeline.coverage_report,
        });
        this.renderer = deps.renderer ?? new BadgeRenderer({
            dir: config.badges.dir,
            coverageColors: config.badges.coverage_colors,
            defaultColor: config.badges.default_color,
        });
        this.publisher = deps.publisher ?? new BadgePublisher(runner, {
            badgeDir: config.badges.dir,
            target: config.deploy.target,
            enabled: config.deploy.enabled,
            timeout,
        });
    }

    getState(): RunState {
        return this.state;
    }

    /**
     * Execute one run for a branch
     */
    async execute(branch: string): Promise<RunResult> {
        const runId = uuidv4();
        const startTime = new Date().toISOString();
        const startTimestamp = Date.now();

        let stats: BranchStats | undefined;
        let failure: RunFailure | undefined;

        logger.info(`Starting run ${runId} for branch ${branch}`);

        try {
            stats = await this.buildAndRender(branch);
        } catch (error) {
            failure = this.describeFailure(error);
            logger.error(`${failure.stage} failed: ${failure.message}`);

            this.setState('FAILURE_RENDERING');
            try {
                await this.renderer.renderFailureBadges();
            } catch (renderError) {
                logger.error(`Failed to render failure badges: ${renderError}`);
            }
        }

        this.setState('PUBLISHING');
        const published = await this.publisher.publish();

        this.setState('COMPLETE');
        const duration = Date.now() - startTimestamp;
        logger.info(`Run ${runId} finished in ${duration}ms: ${failure ? 'failed' : 'success'}`);

        return {
            runId,
            branch,
            status: failure ? 'failed' : 'success',
            state: this.state,
            stats: failure ? undefined : stats,
            failure,
            published,
            startTime,
            endTime: new Date().toISOString(),
            duration,
        };
    }

    private async buildAndRender(branch: string): Promise<BranchStats> {
        this.setState('SYNCING');
        const workDir = await this.sourceSync.sync(branch);

        this.setState('VERIFYING');
        await this.pipeline.runTests(workDir);
        await this.pipeline.countLines(workDir);
        const built = await this.pipeline.buildRelease(workDir);
        if (!built) {
            if (this.config.pipeline.fail_on_build_error) {
                throw new BuildError('Release build failed.');
            }
            logger.warn('Release build failed; build badge is unaffected unless fail_on_build_error is set');
        }

        this.setState('EXTRACTING_STATS');
        const stats = await this.statsExtractor.extractStats(branch, this.pipeline.getMetricsDir(workDir));

        this.setState('RENDERING');
        await this.renderer.renderBadges(stats);

        return stats;
    }

    private describeFailure(error: unknown): RunFailure {
        if (error instanceof PipelineError) {
            return { stage: error.stage, name: error.name, message: error.message };
        }
        const stage = STAGE_BY_STATE[this.state] ?? 'unknown';
        if (error instanceof Error) {
            return { stage, name: error.name, message: error.message };
        }
        return { stage, name: 'Error', message: String(error) };
    }

    private setState(state: RunState): void {
        logger.debug(`State: ${this.state} -> ${state}`);
        this.state = state;
    }
}
