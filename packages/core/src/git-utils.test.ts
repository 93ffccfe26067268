/**
 * Tests for git utilities
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

const { mockExecAsync } = vi.hoisted(() => ({ mockExecAsync: vi.fn() }));

// Mock child_process.exec and util.promisify at module level
vi.mock('child_process', () => ({
    exec: vi.fn(),
}));

vi.mock('util', () => ({
    promisify: () => mockExecAsync,
}));

// Import after mocks are set up
const {
    listRemotes,
    remoteHasBranch,
    fetchRef,
    branchExists,
    remoteTrackingBranchExists,
    checkoutBranch,
    checkoutTrackingBranch,
    createBranch,
    cloneRepository,
    isGitRepository,
    createGitRefOperations,
    GitError,
} = await import('./git-utils.js');

function execFailure(code: number | string, stderr = ''): Error {
    return Object.assign(new Error(`Command failed with ${code}`), { code, stderr, stdout: '' });
}

describe('git utilities', () => {
    beforeEach(() => {
        vi.clearAllMocks();
        mockExecAsync.mockResolvedValue({ stdout: '', stderr: '' });
    });

    describe('listRemotes', () => {
        it('returns remotes in listing order', async () => {
            mockExecAsync.mockResolvedValueOnce({ stdout: 'upstream\norigin\n\n', stderr: '' });

            await expect(listRemotes({ cwd: '/repo' })).resolves.toEqual(['upstream', 'origin']);
            expect(mockExecAsync).toHaveBeenCalledWith('git remote', { cwd: '/repo', signal: undefined });
        });

        it('returns an empty list when nothing is configured', async () => {
            await expect(listRemotes({ cwd: '/repo' })).resolves.toEqual([]);
        });
    });

    describe('remoteHasBranch', () => {
        it('is true when ls-remote prints a head', async () => {
            mockExecAsync.mockResolvedValueOnce({
                stdout: 'a1b2c3\trefs/heads/feature/login-fix\n',
                stderr: '',
            });

            await expect(remoteHasBranch('origin', 'feature/login-fix', { cwd: '/repo' })).resolves.toBe(true);
            expect(mockExecAsync).toHaveBeenCalledWith(
                "git ls-remote --heads 'origin' 'refs/heads/feature/login-fix'",
                { cwd: '/repo', signal: undefined }
            );
        });

        it('is false when ls-remote prints nothing', async () => {
            await expect(remoteHasBranch('origin', 'missing', { cwd: '/repo' })).resolves.toBe(false);
        });

        it('throws GitError on transport failures', async () => {
            mockExecAsync.mockRejectedValueOnce(execFailure(128, 'fatal: unable to access'));

            const error = await remoteHasBranch('origin', 'x', { cwd: '/repo' }).catch((e: unknown) => e);

            expect(error).toBeInstanceOf(GitError);
            expect(error).toMatchObject({
                command: "git ls-remote --heads 'origin' 'refs/heads/x'",
                stderr: 'fatal: unable to access',
                exitCode: 128,
                cwd: '/repo',
            });
        });
    });

    describe('fetchRef', () => {
        it('fetches the escaped remote and branch', async () => {
            await fetchRef('origin', "it's", { cwd: '/repo' });

            expect(mockExecAsync).toHaveBeenCalledWith("git fetch 'origin' 'it'\\''s'", {
                cwd: '/repo',
                signal: undefined,
            });
        });

        it('passes the abort signal through', async () => {
            const controller = new AbortController();

            await fetchRef('origin', 'main', { cwd: '/repo', signal: controller.signal });

            expect(mockExecAsync).toHaveBeenCalledWith("git fetch 'origin' 'main'", {
                cwd: '/repo',
                signal: controller.signal,
            });
        });

        it('reports a null exit code when the process was aborted', async () => {
            mockExecAsync.mockRejectedValueOnce(execFailure('ABORT_ERR'));

            const error = await fetchRef('origin', 'main', { cwd: '/repo' }).catch((e: unknown) => e);

            expect(error).toBeInstanceOf(GitError);
            expect(error).toMatchObject({ exitCode: null });
        });
    });

    describe('branchExists', () => {
        it('checks refs/heads with show-ref', async () => {
            await expect(branchExists('feature/x', { cwd: '/repo' })).resolves.toBe(true);
            expect(mockExecAsync).toHaveBeenCalledWith(
                "git show-ref --verify --quiet 'refs/heads/feature/x'",
                { cwd: '/repo', signal: undefined }
            );
        });

        it('returns false on exit code 1', async () => {
            mockExecAsync.mockRejectedValueOnce(execFailure(1));

            await expect(branchExists('missing', { cwd: '/repo' })).resolves.toBe(false);
        });

        it('propagates other failures', async () => {
            mockExecAsync.mockRejectedValueOnce(execFailure(128, 'fatal: not a git repository'));

            await expect(branchExists('main', { cwd: '/tmp' })).rejects.toBeInstanceOf(GitError);
        });
    });

    describe('remoteTrackingBranchExists', () => {
        it('checks refs/remotes/<remote>/<branch>', async () => {
            mockExecAsync.mockRejectedValueOnce(execFailure(1));

            await expect(remoteTrackingBranchExists('upstream', 'feature/x', { cwd: '/repo' })).resolves.toBe(false);
            expect(mockExecAsync).toHaveBeenCalledWith(
                "git show-ref --verify --quiet 'refs/remotes/upstream/feature/x'",
                { cwd: '/repo', signal: undefined }
            );
        });
    });

    describe('checkout commands', () => {
        it('checks out an existing branch', async () => {
            await checkoutBranch('main', { cwd: '/repo' });
            expect(mockExecAsync).toHaveBeenCalledWith("git checkout 'main'", { cwd: '/repo', signal: undefined });
        });

        it('creates a branch from HEAD', async () => {
            await createBranch('jane/42-login', { cwd: '/repo' });
            expect(mockExecAsync).toHaveBeenCalledWith("git checkout -b 'jane/42-login'", {
                cwd: '/repo',
                signal: undefined,
            });
        });

        it('creates a tracking branch from a remote ref', async () => {
            await checkoutTrackingBranch('feature/x', 'origin/feature/x', { cwd: '/repo' });
            expect(mockExecAsync).toHaveBeenCalledWith(
                "git checkout --track -b 'feature/x' 'origin/feature/x'",
                { cwd: '/repo', signal: undefined }
            );
        });
    });

    describe('cloneRepository', () => {
        it('clones into the target directory', async () => {
            await cloneRepository('https://github.com/acme/widgets', '/home/dev/gh/acme/widgets', { cwd: '/home/dev' });
            expect(mockExecAsync).toHaveBeenCalledWith(
                "git clone 'https://github.com/acme/widgets' '/home/dev/gh/acme/widgets'",
                { cwd: '/home/dev', signal: undefined }
            );
        });
    });

    describe('isGitRepository', () => {
        it('is true inside a work tree', async () => {
            mockExecAsync.mockResolvedValueOnce({ stdout: 'true\n', stderr: '' });
            await expect(isGitRepository({ cwd: '/repo' })).resolves.toBe(true);
        });

        it('is false inside a bare repository or .git directory', async () => {
            mockExecAsync.mockResolvedValueOnce({ stdout: 'false\n', stderr: '' });
            await expect(isGitRepository({ cwd: '/repo/.git' })).resolves.toBe(false);
        });

        it('is false outside a repository', async () => {
            mockExecAsync.mockRejectedValueOnce(execFailure(128, 'fatal: not a git repository'));
            await expect(isGitRepository({ cwd: '/tmp' })).resolves.toBe(false);
        });
    });

    describe('createGitRefOperations', () => {
        it('binds every operation to the given options', async () => {
            const git = createGitRefOperations({ cwd: '/work' });
            mockExecAsync.mockResolvedValueOnce({ stdout: 'origin\n', stderr: '' });

            await expect(git.listRemotes()).resolves.toEqual(['origin']);
            await git.fetchRef('origin', 'main');
            await git.checkoutNewTracking('main', 'origin/main');

            expect(mockExecAsync.mock.calls.map(call => call[1])).toEqual([
                { cwd: '/work', signal: undefined },
                { cwd: '/work', signal: undefined },
                { cwd: '/work', signal: undefined },
            ]);
        });
    });
});
