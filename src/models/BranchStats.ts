/**
 * Coverage and code statistics for one branch, computed once per run
 */
export interface BranchStats {
    readonly branch: string;
    /** Integer percentage, 0-100 */
    readonly coverage: number;
    readonly code: number;
    readonly comments: number;
}

/**
 * Shape of the line-count report (`tokei --output json`), reduced to what is read
 */
export interface LineCountReport {
    Total: {
        code: number;
        comments: number;
    };
}

/**
 * Per-file entry of the coverage report
 */
export interface FileCoverageEntry {
    covered: number;
    coverable: number;
}

/**
 * Shape of the coverage report (`tarpaulin-report.json`), reduced to what is read
 */
export interface CoverageJsonReport {
    files: FileCoverageEntry[];
}
