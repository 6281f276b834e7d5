import path from 'path';
import { BranchStats, CoverageJsonReport, FileCoverageEntry, LineCountReport } from '../models/BranchStats';
import { MetricsParseError, errorMessage } from '../models/PipelineErrors';
import { readFile } from '../utils/fileUtils';
import logger from '../utils/logger';

export interface StatsExtractorOptions {
    lineCountReport: string;
    coverageReport: string;
}

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isCount(value: unknown): value is number {
    return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

/**
 * Reduces the line-count and coverage reports to one BranchStats record
 */
export class StatsExtractor {
    constructor(private options: StatsExtractorOptions) {}

    async extractStats(branch: string, metricsDir: string): Promise<BranchStats> {
        const lineCountPath = path.join(metricsDir, this.options.lineCountReport);
        const coveragePath = path.join(metricsDir, this.options.coverageReport);

        const lines = this.parseLineCount(await this.readJson(lineCountPath), lineCountPath);
        const coverage = this.parseCoverage(await this.readJson(coveragePath), coveragePath);

        const stats: BranchStats = Object.freeze({
            branch,
            coverage: computeCoverage(coverage.files, coveragePath),
            code: lines.Total.code,
            comments: lines.Total.comments,
        });

        logger.info(`Stats for ${branch}: coverage ${stats.coverage}%, code ${stats.code}, comments ${stats.comments}`);
        return stats;
    }

    private async readJson(filePath: string): Promise<unknown> {
        let content: string;
        try {
            content = await readFile(filePath);
        } catch (error) {
            throw new MetricsParseError(`Cannot read metrics report ${filePath}: ${errorMessage(error)}`, filePath, error);
        }

        try {
            return JSON.parse(content);
        } catch (error) {
            throw new MetricsParseError(`Malformed JSON in ${filePath}: ${errorMessage(error)}`, filePath, error);
        }
    }

    private parseLineCount(data: unknown, filePath: string): LineCountReport {
        const total = isObject(data) ? data.Total : undefined;
        if (!isObject(total)) {
            throw new MetricsParseError(`Missing "Total" section in ${filePath}`, filePath);
        }
        const { code, comments } = total;
        if (!isCount(code) || !isCount(comments)) {
            throw new MetricsParseError(`"Total.code" and "Total.comments" must be non-negative integers in ${filePath}`, filePath);
        }
        return { Total: { code, comments } };
    }

    private parseCoverage(data: unknown, filePath: string): CoverageJsonReport {
        const entries = isObject(data) ? data.files : undefined;
        if (!Array.isArray(entries)) {
            throw new MetricsParseError(`Missing "files" list in ${filePath}`, filePath);
        }

        const files: FileCoverageEntry[] = entries.map((file: unknown, index: number) => {
            const covered = isObject(file) ? file.covered : undefined;
            const coverable = isObject(file) ? file.coverable : undefined;
            if (!isCount(covered) || !isCount(coverable)) {
                throw new MetricsParseError(`files[${index}] needs integer "covered" and "coverable" in ${filePath}`, filePath);
            }
            if (covered > coverable) {
                throw new MetricsParseError(`files[${index}] covers ${covered} of ${coverable} coverable lines in ${filePath}`, filePath);
            }
            return { covered, coverable };
        });

        return { files };
    }
}

/**
 * Percentage of coverable units covered across all files, rounded to an integer
 */
export function computeCoverage(files: FileCoverageEntry[], source: string = 'coverage report'): number {
    let covered = 0;
    let coverable = 0;
    for (const file of files) {
        covered += file.covered;
        coverable += file.coverable;
    }

    if (coverable === 0) {
        throw new MetricsParseError(`No coverable lines in ${source}`, source);
    }
    if (covered > coverable) {
        throw new MetricsParseError(`Covered lines (${covered}) exceed coverable lines (${coverable}) in ${source}`, source);
    }

    return Math.round((covered / coverable) * 100);
}
