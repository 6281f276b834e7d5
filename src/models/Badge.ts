/**
 * A single status badge to be rendered as an SVG file
 */
export interface Badge {
    filename: string;
    label: string;
    value: string;
    color: string;
}

/**
 * Coverage color threshold. Rules are evaluated highest threshold first.
 */
export interface CoverageColorRule {
    threshold: number;
    color: string;
}

/**
 * Fixed badge file names, one per badge identity
 */
export const BADGE_FILES = {
    coverage: 'coverage.svg',
    code: 'code.svg',
    build: 'build.svg',
    awesomeness: 'awesome.svg',
} as const;
