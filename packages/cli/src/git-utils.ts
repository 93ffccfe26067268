/**
 * Git utilities re-exported from the core library.
 *
 * Command handlers import git operations from here so tests can replace them
 * with a single module mock. Everything runs in process.cwd() unless a cwd
 * is passed.
 */

export {
    isGitRepository,
    cloneRepository,
    branchExists,
    createBranch,
    checkoutBranch,
    createGitRefOperations,
} from '@flow-cli/core';

export type { GitOptions, GitRefOperations } from '@flow-cli/core';
