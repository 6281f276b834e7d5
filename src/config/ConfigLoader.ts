import fs from 'fs/promises';
import path from 'path';
import yaml from 'js-yaml';
import { BadgeCiConfig, CommandSpec, DEFAULT_CONFIG } from './schema';
import { CoverageColorRule } from '../models/Badge';
import { ConfigError, errorMessage } from '../models/PipelineErrors';
import { fileExists } from '../utils/fileUtils';
import logger from '../utils/logger';

export const DEFAULT_CONFIG_FILE = '.badge-ci.yml';

type RawSection = Record<string, unknown>;

function isRecord(value: unknown): value is RawSection {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load and validate configuration
 */
export class ConfigLoader {
    private configSource: string = 'defaults';

    /**
     * Load configuration from file or use defaults
     */
    async load(configPath?: string): Promise<BadgeCiConfig> {
        let raw: RawSection = {};

        if (configPath) {
            if (!(await fileExists(configPath))) {
                throw new ConfigError(`Config file not found: ${configPath}`);
            }
            raw = await this.loadFromFile(configPath, true);
            this.configSource = configPath;
        } else {
            // Try to find .badge-ci.yml in current directory
            const defaultPath = path.join(process.cwd(), DEFAULT_CONFIG_FILE);
            if (await fileExists(defaultPath)) {
                raw = await this.loadFromFile(defaultPath, false);
                this.configSource = defaultPath;
            }
        }

        const config = this.mergeWithDefaults(raw);

        this.applyEnvironmentOverrides(config);

        this.validate(config);

        logger.info(`Configuration loaded successfully from: ${this.configSource}`);
        return config;
    }

    /**
     * Where the last loaded configuration came from
     */
    getConfigSource(): string {
        return this.configSource;
    }

    /**
     * Load config from file. An explicitly requested file must parse.
     */
    private async loadFromFile(filePath: string, required: boolean): Promise<RawSection> {
        try {
            const content = await fs.readFile(filePath, 'utf-8');
            const parsed: unknown = yaml.load(content);
            logger.info(`Loaded config from: ${filePath}`);
            if (parsed === undefined || parsed === null) {
                return {};
            }
            if (!isRecord(parsed)) {
                throw new ConfigError(`Config file ${filePath} must contain a mapping`);
            }
            return parsed;
        } catch (error) {
            if (required) {
                throw error instanceof ConfigError
                    ? error
                    : new ConfigError(`Failed to load config from ${filePath}: ${errorMessage(error)}`);
            }
            logger.warn(`Failed to load config from ${filePath}: ${errorMessage(error)}`);
            return {};
        }
    }

    /**
     * Merge with default configuration, section by section
     */
    private mergeWithDefaults(raw: RawSection): BadgeCiConfig {
        const repository = this.section(raw, 'repository');
        const pipeline = this.section(raw, 'pipeline');
        const badges = this.section(raw, 'badges');
        const deploy = this.section(raw, 'deploy');
        const execution = this.section(raw, 'execution');
        const d = DEFAULT_CONFIG;

        return {
            repository: {
                url: this.str(repository, 'repository.url', d.repository.url),
                default_branch: this.str(repository, 'repository.default_branch', d.repository.default_branch),
                workspace_root: this.str(repository, 'repository.workspace_root', d.repository.workspace_root),
            },
            pipeline: {
                metrics_dir: this.str(pipeline, 'pipeline.metrics_dir', d.pipeline.metrics_dir),
                coverage_report: this.str(pipeline, 'pipeline.coverage_report', d.pipeline.coverage_report),
                line_count_report: this.str(pipeline, 'pipeline.line_count_report', d.pipeline.line_count_report),
                test_command: this.command(pipeline, 'pipeline.test_command', d.pipeline.test_command),
                line_count_command: this.command(pipeline, 'pipeline.line_count_command', d.pipeline.line_count_command),
                build_command: this.command(pipeline, 'pipeline.build_command', d.pipeline.build_command),
                fail_on_build_error: this.bool(pipeline, 'pipeline.fail_on_build_error', d.pipeline.fail_on_build_error),
            },
            badges: {
                dir: this.str(badges, 'badges.dir', d.badges.dir),
                coverage_colors: this.colorRules(badges, 'badges.coverage_colors', d.badges.coverage_colors),
                default_color: this.str(badges, 'badges.default_color', d.badges.default_color),
            },
            deploy: {
                enabled: this.bool(deploy, 'deploy.enabled', d.deploy.enabled),
                target: this.str(deploy, 'deploy.target', d.deploy.target),
            },
            execution: {
                timeout: this.num(execution, 'execution.timeout', d.execution.timeout),
                always_zero_exit: this.bool(execution, 'execution.always_zero_exit', d.execution.always_zero_exit),
            },
        };
    }

    /**
     * Apply environment variable overrides
     */
    private applyEnvironmentOverrides(config: BadgeCiConfig): void {
        if (process.env.BADGE_CI_REPO) {
            config.repository.url = process.env.BADGE_CI_REPO;
        }
        if (process.env.BADGE_CI_WORKSPACE) {
            config.repository.workspace_root = process.env.BADGE_CI_WORKSPACE;
        }
        if (process.env.BADGE_CI_BADGE_DIR) {
            config.badges.dir = process.env.BADGE_CI_BADGE_DIR;
        }
        if (process.env.BADGE_CI_DEPLOY_TARGET) {
            config.deploy.target = process.env.BADGE_CI_DEPLOY_TARGET;
        }
    }

    /**
     * Reject values the pipeline cannot work with
     */
    private validate(config: BadgeCiConfig): void {
        const rules = config.badges.coverage_colors;
        for (let i = 1; i < rules.length; i++) {
            if (rules[i].threshold >= rules[i - 1].threshold) {
                throw new ConfigError(
                    `Coverage color thresholds must be strictly decreasing (${rules[i - 1].threshold} then ${rules[i].threshold})`,
                    'badges.coverage_colors'
                );
            }
        }
        if (config.execution.timeout < 0) {
            throw new ConfigError('execution.timeout must not be negative', 'execution.timeout');
        }
        if (!config.repository.default_branch) {
            throw new ConfigError('repository.default_branch must not be empty', 'repository.default_branch');
        }
        if (config.deploy.enabled && !config.deploy.target) {
            throw new ConfigError('deploy.target is required when deploy is enabled', 'deploy.target');
        }
    }

    private section(raw: RawSection, key: string): RawSection {
        const value = raw[key];
        if (value === undefined || value === null) {
            return {};
        }
        if (!isRecord(value)) {
            throw new ConfigError(`${key} must be a mapping`, key);
        }
        return value;
    }

    private field(field: string): string {
        return field.slice(field.indexOf('.') + 1);
    }

    private str(section: RawSection, field: string, fallback: string): string {
        const value = section[this.field(field)];
        if (value === undefined) return fallback;
        if (typeof value !== 'string') {
            throw new ConfigError(`${field} must be a string`, field);
        }
        return value;
    }

    private bool(section: RawSection, field: string, fallback: boolean): boolean {
        const value = section[this.field(field)];
        if (value === undefined) return fallback;
        if (typeof value !== 'boolean') {
            throw new ConfigError(`${field} must be true or false`, field);
        }
        return value;
    }

    private num(section: RawSection, field: string, fallback: number): number {
        const value = section[this.field(field)];
        if (value === undefined) return fallback;
        if (typeof value !== 'number' || !Number.isFinite(value)) {
            throw new ConfigError(`${field} must be a number`, field);
        }
        return value;
    }

    private command(section: RawSection, field: string, fallback: CommandSpec): CommandSpec {
        const value = section[this.field(field)];
        if (value === undefined) return { command: fallback.command, args: [...fallback.args] };
        if (!isRecord(value)) {
            throw new ConfigError(`${field} must be a mapping`, field);
        }
        const command = value.command;
        if (typeof command !== 'string' || !command) {
            throw new ConfigError(`${field}.command must be a non-empty string`, field);
        }
        const args: unknown = value.args ?? [];
        if (!Array.isArray(args) || !args.every((arg): arg is string => typeof arg === 'string')) {
            throw new ConfigError(`${field}.args must be a list of strings`, field);
        }
        return { command, args };
    }

    private colorRules(section: RawSection, field: string, fallback: CoverageColorRule[]): CoverageColorRule[] {
        const value = section[this.field(field)];
        if (value === undefined) return fallback.map(rule => ({ ...rule }));
        if (!Array.isArray(value)) {
            throw new ConfigError(`${field} must be a list`, field);
        }
        return value.map((rule: unknown, index: number) => {
            const threshold = isRecord(rule) ? rule.threshold : undefined;
            const color = isRecord(rule) ? rule.color : undefined;
            if (typeof threshold !== 'number' || typeof color !== 'string') {
                throw new ConfigError(`${field}[${index}] needs a numeric threshold and a color`, field);
            }
            return { threshold, color };
        });
    }
}
