import fs from 'fs';
import os from 'os';
import path from 'path';
import simpleGit from 'simple-git';
import { SourceSync } from '../SourceSync';
import { SyncError } from '../../models/PipelineErrors';

jest.mock('simple-git', () => ({
    __esModule: true,
    default: jest.fn(),
}));

jest.mock('../../utils/logger', () => ({
    __esModule: true,
    default: {
        info: jest.fn(),
        warn: jest.fn(),
        error: jest.fn(),
        debug: jest.fn(),
    },
}));

const REPO = 'git@example.com:team/project.git';

describe('SourceSync', () => {
    let workspaceRoot: string;
    const git = {
        clone: jest.fn(),
        checkout: jest.fn(),
        pull: jest.fn(),
    };
    const mockedSimpleGit = simpleGit as unknown as jest.Mock;

    beforeEach(() => {
        jest.clearAllMocks();
        workspaceRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'source-sync-'));
        git.clone.mockResolvedValue(undefined);
        git.checkout.mockResolvedValue(undefined);
        git.pull.mockResolvedValue({});
        mockedSimpleGit.mockReturnValue(git);
    });

    afterEach(() => {
        fs.rmSync(workspaceRoot, { recursive: true, force: true });
    });

    it('clones a single branch when no working copy exists, then pulls', async () => {
        const sync = new SourceSync(REPO, workspaceRoot);

        const repoPath = await sync.sync('develop');

        expect(repoPath).toBe(path.join(workspaceRoot, 'develop'));
        expect(git.clone).toHaveBeenCalledWith(REPO, repoPath, ['--single-branch', '--branch', 'develop']);
        expect(mockedSimpleGit).toHaveBeenCalledWith(repoPath);
        expect(git.checkout).toHaveBeenCalledWith('develop');
        expect(git.pull).toHaveBeenCalledTimes(1);
    });

    it('only pulls when the working copy already exists', async () => {
        fs.mkdirSync(path.join(workspaceRoot, 'release'));
        const sync = new SourceSync(REPO, workspaceRoot);

        await sync.sync('release');

        expect(git.clone).not.toHaveBeenCalled();
        expect(git.pull).toHaveBeenCalledTimes(1);
    });

    it('does not change the process working directory', async () => {
        const cwd = process.cwd();

        await new SourceSync(REPO, workspaceRoot).sync('develop');

        expect(process.cwd()).toBe(cwd);
    });

    it('throws SyncError when the clone fails', async () => {
        git.clone.mockRejectedValue(new Error('Repository not found'));

        const error = await new SourceSync(REPO, workspaceRoot).sync('develop').catch((e: unknown) => e);

        expect(error).toBeInstanceOf(SyncError);
        expect(error instanceof SyncError && error.message).toBe('Failed checkout of source code: Repository not found');
        expect(git.pull).not.toHaveBeenCalled();
    });

    it('throws SyncError when the pull fails', async () => {
        fs.mkdirSync(path.join(workspaceRoot, 'develop'));
        git.pull.mockRejectedValue(new Error('Could not resolve host'));

        await expect(new SourceSync(REPO, workspaceRoot).sync('develop'))
            .rejects.toThrow('Failed to pull source code: Could not resolve host');
    });

    it('rejects a branch that resolves outside the workspace root', async () => {
        const error = await new SourceSync(REPO, workspaceRoot).sync('../../x').catch((e: unknown) => e);

        expect(error).toBeInstanceOf(SyncError);
        expect(error instanceof SyncError && error.message)
            .toBe(`Branch "../../x" does not name a directory inside ${path.resolve(workspaceRoot)}`);
        expect(git.clone).not.toHaveBeenCalled();
        expect(git.pull).not.toHaveBeenCalled();
    });

    it('keeps branches with a slash under the workspace root', () => {
        const sync = new SourceSync(REPO, workspaceRoot);

        expect(sync.getWorkingCopyPath('feature/badges')).toBe(path.join(path.resolve(workspaceRoot), 'feature', 'badges'));
    });
});
