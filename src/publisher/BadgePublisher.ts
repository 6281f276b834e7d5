import path from 'path';
import { CommandRunner } from '../executor/CommandRunner';
import { dirExists, findFiles } from '../utils/fileUtils';
import { errorMessage } from '../models/PipelineErrors';
import logger from '../utils/logger';

export interface BadgePublisherOptions {
    badgeDir: string;
    target: string;
    enabled?: boolean;
    timeout?: number;
}

/**
 * Copies the contents of the badge directory to the deploy host with scp
 */
export class BadgePublisher {
    constructor(
        private runner: CommandRunner,
        private options: BadgePublisherOptions
    ) {}

    /**
     * Never throws: a failed transfer is logged and reported as false
     */
    async publish(): Promise<boolean> {
        if (this.options.enabled === false) {
            logger.info('Badge deploy disabled, skipping publish');
            return false;
        }

        const badgeDir = path.resolve(this.options.badgeDir);
        try {
            if (!(await dirExists(badgeDir))) {
                logger.warn(`Badge directory ${badgeDir} does not exist, nothing to publish`);
                return false;
            }

            // Top-level entries only; scp -r carries any subdirectory along
            const entries = await findFiles(badgeDir, '*', { absolute: true, onlyFiles: false });
            if (entries.length === 0) {
                logger.warn(`Badge directory ${badgeDir} is empty, nothing to publish`);
                return false;
            }

            const destination = `${this.options.target.replace(/\/+$/, '')}/`;
            const result = await this.runner.run('scp', ['-r', ...entries, destination], {
                cwd: badgeDir,
                timeout: this.options.timeout,
            });

            if (result.exitCode !== 0) {
                logger.warn(`Badge deploy to ${destination} failed with exit code ${result.exitCode}: ${result.stderr.trim()}`);
                return false;
            }

            logger.info(`Published ${entries.length} badge entries to ${destination}`);
            return true;
        } catch (error) {
            logger.warn(`Badge deploy failed: ${errorMessage(error)}`);
            return false;
        }
    }
}
