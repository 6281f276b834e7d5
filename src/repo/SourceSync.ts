import simpleGit from 'simple-git';
import path from 'path';
import logger from '../utils/logger';
import { dirExists, ensureDir } from '../utils/fileUtils';
import { SyncError, errorMessage } from '../models/PipelineErrors';

/**
 * Keeps one working copy per branch up to date
 */
export class SourceSync {
    private workspaceRoot: string;

    constructor(private repoUrl: string, workspaceRoot: string = process.cwd()) {
        this.workspaceRoot = path.resolve(workspaceRoot);
    }

    /**
     * Clone the branch if its working copy is missing, then bring it up to date.
     * Returns the absolute path of the working copy.
     */
    async sync(branch: string): Promise<string> {
        const repoPath = this.getWorkingCopyPath(branch);

        if (!(await dirExists(repoPath))) {
            await this.cloneBranch(branch, repoPath);
        }

        try {
            const git = simpleGit(repoPath);
            await git.checkout(branch);
            await git.pull();
            logger.info(`Working copy for ${branch} is up to date: ${repoPath}`);
        } catch (error) {
            logger.error(`Failed to pull source code: ${error}`);
            throw new SyncError(`Failed to pull source code: ${errorMessage(error)}`, error);
        }

        return repoPath;
    }

    /**
     * Working copy location for a branch; it must lie inside the workspace root
     */
    getWorkingCopyPath(branch: string): string {
        const repoPath = path.resolve(this.workspaceRoot, branch);
        if (!repoPath.startsWith(this.workspaceRoot + path.sep)) {
            throw new SyncError(`Branch "${branch}" does not name a directory inside ${this.workspaceRoot}`);
        }
        return repoPath;
    }

    /**
     * Single-branch clone of the repository
     */
    private async cloneBranch(branch: string, repoPath: string): Promise<void> {
        try {
            logger.info(`Cloning ${this.repoUrl} (${branch}) into ${repoPath}`);
            await ensureDir(path.dirname(repoPath));

            await simpleGit().clone(this.repoUrl, repoPath, ['--single-branch', '--branch', branch]);

            logger.info(`Repository cloned to: ${repoPath}`);
        } catch (error) {
            logger.error(`Failed checkout of source code: ${error}`);
            throw new SyncError(`Failed checkout of source code: ${errorMessage(error)}`, error);
        }
    }
}
