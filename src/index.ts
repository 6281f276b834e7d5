import { ConfigLoader } from './config/ConfigLoader';
import { BadgeJobOrchestrator, OrchestratorDeps } from './orchestrator/BadgeJobOrchestrator';
import { RunResult } from './models/RunResult';
import logger from './utils/logger';

/**
 * Main entry point for programmatic usage
 */
export async function runBadgeCi(branch?: string, configPath?: string, deps?: OrchestratorDeps): Promise<RunResult> {
    const configLoader = new ConfigLoader();
    const config = await configLoader.load(configPath);

    const orchestrator = new BadgeJobOrchestrator(config, deps);
    const result = await orchestrator.execute(branch || config.repository.default_branch);

    logger.info(`badge-ci finished with status ${result.status}`);
    return result;
}

// Export main components for library usage
export { ConfigLoader } from './config/ConfigLoader';
export { BadgeJobOrchestrator } from './orchestrator/BadgeJobOrchestrator';
export type { OrchestratorDeps } from './orchestrator/BadgeJobOrchestrator';
export { SourceSync } from './repo/SourceSync';
export { VerificationPipeline } from './pipeline/VerificationPipeline';
export { StatsExtractor, computeCoverage } from './metrics/StatsExtractor';
export { BadgeRenderer, buildSuccessBadges, buildFailureBadges } from './badges/BadgeRenderer';
export { selectCoverageColor, COVERAGE_COLOR_RULES } from './badges/coverageColors';
export { BadgePublisher } from './publisher/BadgePublisher';
export { ProcessCommandRunner } from './executor/CommandRunner';
export type { CommandRunner, CommandResult, CommandOptions } from './executor/CommandRunner';
export * from './models/BranchStats';
export * from './models/Badge';
export * from './models/RunResult';
export * from './models/PipelineErrors';
export * from './config/schema';
