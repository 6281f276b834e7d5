import { CoverageColorRule } from '../models/Badge';

export const COVERAGE_COLOR_RULES: readonly CoverageColorRule[] = [
    { threshold: 90, color: 'green' },
    { threshold: 80, color: 'yellow' },
    { threshold: 70, color: 'orange' },
    { threshold: 60, color: 'red' },
];

export const DEFAULT_COVERAGE_COLOR = 'blue';

/**
 * First rule whose threshold the coverage reaches wins; rules must be ordered
 * highest threshold first.
 */
export function selectCoverageColor(
    coverage: number,
    rules: readonly CoverageColorRule[] = COVERAGE_COLOR_RULES,
    fallback: string = DEFAULT_COVERAGE_COLOR
): string {
    for (const rule of rules) {
        if (coverage >= rule.threshold) {
            return rule.color;
        }
    }
    return fallback;
}
