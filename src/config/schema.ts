import { CoverageColorRule } from '../models/Badge';

/**
 * An external program and its arguments
 */
export interface CommandSpec {
    command: string;
    args: string[];
}

/**
 * Configuration schema for badge-ci
 */
export interface BadgeCiConfig {
    repository: {
        url: string;
        default_branch: string;
        workspace_root: string; // Working copies land in <workspace_root>/<branch>
    };
    pipeline: {
        metrics_dir: string; // Relative to the working copy
        coverage_report: string;
        line_count_report: string;
        test_command: CommandSpec;
        line_count_command: CommandSpec;
        build_command: CommandSpec;
        fail_on_build_error: boolean;
    };
    badges: {
        dir: string;
        coverage_colors: CoverageColorRule[];
        default_color: string;
    };
    deploy: {
        enabled: boolean;
        target: string; // scp destination, user@host:path
    };
    execution: {
        timeout: number; // Per command, ms; 0 = no timeout
        always_zero_exit: boolean;
    };
}

/**
 * `{metrics_dir}` in a command argument is replaced with the metrics directory
 */
export const METRICS_DIR_PLACEHOLDER = '{metrics_dir}';

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: BadgeCiConfig = {
    repository: {
        url: 'git@github.com:example/project.git',
        default_branch: 'develop',
        workspace_root: '.',
    },
    pipeline: {
        metrics_dir: '.metrics',
        coverage_report: 'tarpaulin-report.json',
        line_count_report: 'tokei.json',
        test_command: {
            command: 'cargo',
            args: [
                'tarpaulin',
                '--skip-clean',
                '--target-dir', './target_cov',
                '--output-dir', METRICS_DIR_PLACEHOLDER,
                '--out', 'Json',
                '--',
                '--test-threads=1',
            ],
        },
        line_count_command: {
            command: 'tokei',
            args: ['--output', 'json'],
        },
        build_command: {
            command: 'cargo',
            args: ['build', '--release'],
        },
        fail_on_build_error: false,
    },
    badges: {
        dir: './badges',
        coverage_colors: [
            { threshold: 90, color: 'green' },
            { threshold: 80, color: 'yellow' },
            { threshold: 70, color: 'orange' },
            { threshold: 60, color: 'red' },
        ],
        default_color: 'blue',
    },
    deploy: {
        enabled: true,
        target: 'deploy@www.example.com:cicd/badges',
    },
    execution: {
        timeout: 0,
        always_zero_exit: false,
    },
};
