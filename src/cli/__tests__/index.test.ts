import { ConfigLoader } from '../../config/ConfigLoader';
import { BadgeJobOrchestrator } from '../../orchestrator/BadgeJobOrchestrator';
import { BadgeCiConfig, DEFAULT_CONFIG } from '../../config/schema';
import { ConfigError } from '../../models/PipelineErrors';
import { RunResult } from '../../models/RunResult';
import { applyCliOptions, program, runAction } from '../index';

jest.mock('../../config/ConfigLoader', () => ({ ConfigLoader: jest.fn() }));
jest.mock('../../orchestrator/BadgeJobOrchestrator', () => ({ BadgeJobOrchestrator: jest.fn() }));
jest.mock('../../utils/logger', () => ({
    __esModule: true,
    default: {
        info: jest.fn(),
        warn: jest.fn(),
        error: jest.fn(),
        debug: jest.fn(),
    },
}));

const cloneDefaults = (): BadgeCiConfig => JSON.parse(JSON.stringify(DEFAULT_CONFIG));

const runResult = (overrides: Partial<RunResult> = {}): RunResult => ({
    runId: 'run-1',
    branch: 'develop',
    status: 'success',
    state: 'COMPLETE',
    stats: { branch: 'develop', coverage: 86, code: 500, comments: 50 },
    published: true,
    startTime: '2026-01-01T00:00:00.000Z',
    endTime: '2026-01-01T00:00:01.000Z',
    duration: 1000,
    ...overrides,
});

describe('CLI', () => {
    let load: jest.Mock;
    let execute: jest.Mock;
    let config: BadgeCiConfig;

    beforeEach(() => {
        jest.clearAllMocks();
        jest.spyOn(console, 'log').mockImplementation(() => { });
        jest.spyOn(console, 'error').mockImplementation(() => { });

        config = cloneDefaults();
        load = jest.fn().mockResolvedValue(config);
        execute = jest.fn().mockResolvedValue(runResult());
        (ConfigLoader as unknown as jest.Mock).mockImplementation(() => ({ load }));
        (BadgeJobOrchestrator as unknown as jest.Mock).mockImplementation(() => ({ execute }));
    });

    afterEach(() => {
        jest.restoreAllMocks();
        process.exitCode = undefined;
    });

    describe('applyCliOptions', () => {
        it('leaves the config alone without flags', () => {
            expect(applyCliOptions(cloneDefaults(), {})).toEqual(DEFAULT_CONFIG);
        });

        it('maps the negated and boolean flags', () => {
            const updated = applyCliOptions(cloneDefaults(), { deploy: false, failOnBuild: true, alwaysZero: true });

            expect(updated.deploy.enabled).toBe(false);
            expect(updated.pipeline.fail_on_build_error).toBe(true);
            expect(updated.execution.always_zero_exit).toBe(true);
        });
    });

    describe('runAction', () => {
        it('builds the default branch when none is given and exits 0 on success', async () => {
            const code = await runAction(undefined, {});

            expect(code).toBe(0);
            expect(execute).toHaveBeenCalledWith('develop');
        });

        it('passes the config path to the loader', async () => {
            await runAction('main', { config: 'ci.yml' });

            expect(load).toHaveBeenCalledWith('ci.yml');
            expect(execute).toHaveBeenCalledWith('main');
        });

        it('exits 1 when the failure badges were rendered', async () => {
            execute.mockResolvedValue(runResult({
                status: 'failed',
                stats: undefined,
                failure: { stage: 'test', name: 'TestError', message: 'Tests failed.' },
            }));

            await expect(runAction('develop', {})).resolves.toBe(1);
        });

        it('exits 0 on failure with --always-zero', async () => {
            execute.mockResolvedValue(runResult({ status: 'failed', stats: undefined }));

            await expect(runAction('develop', { alwaysZero: true })).resolves.toBe(0);
        });

        it('exits 0 when only the publish failed', async () => {
            execute.mockResolvedValue(runResult({ published: false }));

            await expect(runAction('develop', {})).resolves.toBe(0);
        });

        it('exits 1 without running when the config is invalid', async () => {
            load.mockRejectedValue(new ConfigError('deploy.enabled must be true or false', 'deploy.enabled'));

            await expect(runAction('develop', {})).resolves.toBe(1);
            expect(BadgeJobOrchestrator).not.toHaveBeenCalled();
        });
    });

    describe('run command', () => {
        it('parses the branch and flags and sets the exit code', async () => {
            await program.parseAsync(['node', 'badge-ci', 'run', 'feature/x', '--no-deploy']);

            expect(execute).toHaveBeenCalledWith('feature/x');
            const orchestratorConfig: BadgeCiConfig = (BadgeJobOrchestrator as unknown as jest.Mock).mock.calls[0][0];
            expect(orchestratorConfig.deploy.enabled).toBe(false);
            expect(orchestratorConfig.pipeline.fail_on_build_error).toBe(false);
            expect(process.exitCode).toBe(0);
        });

        it('opts into failing on a broken release build', async () => {
            await program.parseAsync(['node', 'badge-ci', 'run', 'develop', '--fail-on-build']);

            const orchestratorConfig: BadgeCiConfig = (BadgeJobOrchestrator as unknown as jest.Mock).mock.calls[0][0];
            expect(orchestratorConfig.pipeline.fail_on_build_error).toBe(true);
        });
    });
});
