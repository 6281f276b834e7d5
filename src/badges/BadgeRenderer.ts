import path from 'path';
import { makeBadge } from 'badge-maker';
import { Badge, BADGE_FILES, CoverageColorRule } from '../models/Badge';
import { BranchStats } from '../models/BranchStats';
import { emptyDir, ensureDir, writeFile } from '../utils/fileUtils';
import { COVERAGE_COLOR_RULES, DEFAULT_COVERAGE_COLOR, selectCoverageColor } from './coverageColors';
import logger from '../utils/logger';

export const FAILURE_COLOR = '#dddddd';

/**
 * Turns a badge record into SVG markup
 */
export type SvgRenderer = (badge: Badge) => string;

export const renderSvg: SvgRenderer = (badge) =>
    makeBadge({ label: badge.label, message: badge.value, color: badge.color, style: 'flat' });

export interface BadgeRendererOptions {
    dir: string;
    coverageColors?: readonly CoverageColorRule[];
    defaultColor?: string;
    svgRenderer?: SvgRenderer;
}

/**
 * The four badges for a successful run
 */
export function buildSuccessBadges(
    stats: BranchStats,
    rules: readonly CoverageColorRule[] = COVERAGE_COLOR_RULES,
    defaultColor: string = DEFAULT_COVERAGE_COLOR
): Badge[] {
    return [
        {
            filename: BADGE_FILES.coverage,
            label: 'coverage',
            value: `${stats.coverage}%`,
            color: selectCoverageColor(stats.coverage, rules, defaultColor),
        },
        { filename: BADGE_FILES.code, label: 'code/comments', value: `${stats.code}/${stats.comments}`, color: 'green' },
        { filename: BADGE_FILES.build, label: 'build', value: 'success', color: 'green' },
        { filename: BADGE_FILES.awesomeness, label: 'awesomeness', value: '100%', color: 'blue' },
    ];
}

/**
 * The four placeholder badges written when a run fails
 */
export function buildFailureBadges(): Badge[] {
    return [
        { filename: BADGE_FILES.coverage, label: 'coverage', value: '-', color: FAILURE_COLOR },
        { filename: BADGE_FILES.code, label: 'code/comments', value: '-', color: FAILURE_COLOR },
        { filename: BADGE_FILES.build, label: 'build', value: 'fail', color: 'red' },
        { filename: BADGE_FILES.awesomeness, label: 'awesomeness', value: '100%', color: 'blue' },
    ];
}

/**
 * Writes badge SVGs into the badge directory
 */
export class BadgeRenderer {
    private dir: string;
    private coverageColors: readonly CoverageColorRule[];
    private defaultColor: string;
    private svgRenderer: SvgRenderer;

    constructor(options: BadgeRendererOptions) {
        this.dir = path.resolve(options.dir);
        this.coverageColors = options.coverageColors ?? COVERAGE_COLOR_RULES;
        this.defaultColor = options.defaultColor ?? DEFAULT_COVERAGE_COLOR;
        this.svgRenderer = options.svgRenderer ?? renderSvg;
    }

    /**
     * Replace the badge directory contents with badges for the given stats
     */
    async renderBadges(stats: BranchStats): Promise<void> {
        await emptyDir(this.dir);
        await this.writeBadges(buildSuccessBadges(stats, this.coverageColors, this.defaultColor));
        logger.info(`Rendered badges for ${stats.branch} into ${this.dir}`);
    }

    /**
     * Overwrite the four badges with failure placeholders
     */
    async renderFailureBadges(): Promise<void> {
        await ensureDir(this.dir);
        await this.writeBadges(buildFailureBadges());
        logger.info(`Rendered failure badges into ${this.dir}`);
    }

    private async writeBadges(badges: Badge[]): Promise<void> {
        for (const badge of badges) {
            const svg = this.svgRenderer(badge);
            await writeFile(path.join(this.dir, badge.filename), svg);
            logger.debug(`Badge ${badge.filename}: ${badge.label} ${badge.value} (${badge.color})`);
        }
    }
}
