/**
 * Git utility functions for working with local repositories.
 *
 * All functions accept an optional `options` parameter carrying the working
 * directory and an abort signal. Operands are shell-escaped before they reach
 * the shell.
 */

import { exec } from 'child_process';
import { promisify } from 'util';
import type { GitOptions, GitRefOperations } from './types.js';
import { GitError } from './types.js';
import { buildCommand } from './shell-utils.js';

export { GitError };

const execAsync = promisify(exec);

/**
 * Error type from child_process.exec with additional properties
 */
interface ExecError extends Error {
    code?: number | string;
    stderr?: string;
    stdout?: string;
}

/**
 * Execute a git command in the specified directory.
 * Throws GitError with full context on failure.
 */
async function execGit(
    command: string,
    options: GitOptions = {}
): Promise<{ stdout: string; stderr: string }> {
    const cwd = options.cwd || process.cwd();
    try {
        return await execAsync(command, { cwd, signal: options.signal });
    } catch (error) {
        const execError: ExecError = error instanceof Error ? error : new Error(String(error));
        throw new GitError({
            message: execError.message || 'Git command failed',
            command,
            stderr: execError.stderr || '',
            exitCode: typeof execError.code === 'number' ? execError.code : null,
            cwd,
        });
    }
}

/**
 * Run `git show-ref --verify --quiet` for a fully qualified ref.
 * Exit code 1 means the ref does not exist; other failures propagate.
 */
async function refExists(fullRef: string, options: GitOptions): Promise<boolean> {
    try {
        await execGit(buildCommand('git show-ref --verify --quiet', [fullRef]), options);
        return true;
    } catch (error) {
        if (error instanceof GitError && error.exitCode === 1) {
            return false;
        }
        throw error;
    }
}

// =============================================================================
// Repository
// =============================================================================

/**
 * Check if working directory is inside a git work tree.
 * Returns false if not a git repo; throws on other git errors.
 * @throws {GitError} If the git command fails for reasons other than not being a repo
 */
export async function isGitRepository(options: GitOptions = {}): Promise<boolean> {
    try {
        const { stdout } = await execGit('git rev-parse --is-inside-work-tree', options);
        return stdout.trim() === 'true';
    } catch (error) {
        // Exit code 128 means not a git repository (expected)
        if (error instanceof GitError && error.exitCode === 128) {
            return false;
        }
        throw error;
    }
}

/**
 * Clone a repository into the given directory.
 * @throws {GitError} If the clone fails (e.g., repository not found, auth, network)
 */
export async function cloneRepository(
    cloneUrl: string,
    targetDir: string,
    options: GitOptions = {}
): Promise<void> {
    await execGit(buildCommand('git clone', [cloneUrl, targetDir]), options);
}

// =============================================================================
// Remotes
// =============================================================================

/**
 * List configured remotes in the order `git remote` prints them.
 * @throws {GitError} If the git command fails (e.g., not a git repo)
 */
export async function listRemotes(options: GitOptions = {}): Promise<string[]> {
    const { stdout } = await execGit('git remote', options);
    return stdout
        .split('\n')
        .map(r => r.trim())
        .filter(r => r.length > 0);
}

/**
 * Ask the remote whether it has a branch head with this name.
 * One network round trip.
 * @throws {GitError} On transport or auth failures
 */
export async function remoteHasBranch(
    remote: string,
    branch: string,
    options: GitOptions = {}
): Promise<boolean> {
    // A bare name would also match refs/heads/<anything>/<branch>
    const { stdout } = await execGit(
        buildCommand('git ls-remote --heads', [remote, `refs/heads/${branch}`]),
        options
    );
    return stdout.trim().length > 0;
}

/**
 * Fetch a single branch from a remote.
 * @throws {GitError} If the fetch fails (e.g., unknown ref, network issues)
 */
export async function fetchRef(
    remote: string,
    branch: string,
    options: GitOptions = {}
): Promise<void> {
    await execGit(buildCommand('git fetch', [remote, branch]), options);
}

// =============================================================================
// Branches
// =============================================================================

/**
 * Check if a branch exists locally.
 * Returns false if branch doesn't exist; throws on other git errors.
 * @throws {GitError} If the git command fails for reasons other than branch not existing
 */
export async function branchExists(
    branchName: string,
    options: GitOptions = {}
): Promise<boolean> {
    return refExists(`refs/heads/${branchName}`, options);
}

/**
 * Check if the remote-tracking ref `<remote>/<branch>` exists.
 * @throws {GitError} If the git command fails for reasons other than the ref not existing
 */
export async function remoteTrackingBranchExists(
    remote: string,
    branch: string,
    options: GitOptions = {}
): Promise<boolean> {
    return refExists(`refs/remotes/${remote}/${branch}`, options);
}

/**
 * Create and checkout a new branch from the current HEAD.
 * @throws {GitError} If the branch cannot be created (e.g., already exists, invalid name)
 */
export async function createBranch(
    branchName: string,
    options: GitOptions = {}
): Promise<void> {
    await execGit(buildCommand('git checkout -b', [branchName]), options);
}

/**
 * Checkout an existing branch.
 * @throws {GitError} If the branch cannot be checked out (e.g., doesn't exist, uncommitted changes)
 */
export async function checkoutBranch(
    branchName: string,
    options: GitOptions = {}
): Promise<void> {
    await execGit(buildCommand('git checkout', [branchName]), options);
}

/**
 * Create a local branch tracking a remote-tracking ref and check it out.
 * @throws {GitError} If the branch cannot be created
 */
export async function checkoutTrackingBranch(
    branchName: string,
    remoteRef: string,
    options: GitOptions = {}
): Promise<void> {
    await execGit(`git checkout --track ${buildCommand('-b', [branchName, remoteRef])}`, options);
}

// =============================================================================
// Resolver collaborators
// =============================================================================

/**
 * Bind the git utilities to one working directory and signal, in the shape
 * the ref resolver consumes.
 */
export function createGitRefOperations(options: GitOptions = {}): GitRefOperations {
    return {
        listRemotes: () => listRemotes(options),
        remoteHasBranch: (remote, branch) => remoteHasBranch(remote, branch, options),
        fetchRef: (remote, branch) => fetchRef(remote, branch, options),
        localBranchExists: name => branchExists(name, options),
        remoteTrackingBranchExists: (remote, branch) =>
            remoteTrackingBranchExists(remote, branch, options),
        checkout: name => checkoutBranch(name, options),
        checkoutNewTracking: (name, remoteRef) => checkoutTrackingBranch(name, remoteRef, options),
    };
}
