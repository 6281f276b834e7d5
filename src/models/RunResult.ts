import { BranchStats } from './BranchStats';
import { PipelineStage } from './PipelineErrors';

/**
 * Run state
 */
export type RunState =
    | 'IDLE'
    | 'SYNCING'
    | 'VERIFYING'
    | 'EXTRACTING_STATS'
    | 'RENDERING'
    | 'FAILURE_RENDERING'
    | 'PUBLISHING'
    | 'COMPLETE';

/**
 * Failure recorded when the fallback badges were rendered
 */
export interface RunFailure {
    stage: PipelineStage;
    name: string;
    message: string;
}

/**
 * Final result of one pipeline run
 */
export interface RunResult {
    runId: string;
    branch: string;
    status: 'success' | 'failed';
    state: RunState;
    stats?: BranchStats;
    failure?: RunFailure;
    published: boolean;
    startTime: string;
    endTime: string;
    duration: number;
}
