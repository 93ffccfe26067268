/**
 * Error reporting for command handlers.
 *
 * Failures print as `Error: <message>` on stderr, followed by dimmed detail
 * lines: the underlying git message, a hint for the failure kind, and the
 * full git context when FLOW_DEBUG is set.
 */

import chalk from 'chalk';
import { GitError, RefResolutionError, type RefErrorKind } from '@flow-cli/core';
import { exit, ExitPendingError } from './exit.js';

type HintBuilder = (error: RefResolutionError) => string;

const HINTS: Partial<Record<RefErrorKind, HintBuilder>> = {
    NoRemotesConfigured: () => 'Add a remote with: git remote add origin <url>',
    RemoteNotFound: () => 'List configured remotes with: git remote -v',
    RemoteConflict: () => 'Pass --remote or a remote prefix in the ref, not both',
    UnsupportedPath: () => 'Expected https://github.com/<owner>/<repo>/tree/<branch>',
    ProbeFailed: () => 'Check your network connection and access to the remote',
    FetchFailed: () => 'Check your network connection and access to the remote',
    BranchNotFound: error => `List remote branches with: git ls-remote --heads ${error.remote ?? '<remote>'}`,
};

export interface ErrorDescription {
    message: string;
    details: string[];
}

export function isDebugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
    const value = env.FLOW_DEBUG;
    return value !== undefined && value !== '' && value !== '0';
}

/**
 * Walk the cause chain for the git failure behind an error.
 */
export function findGitError(error: unknown): GitError | undefined {
    let current = error;
    while (current instanceof Error) {
        if (current instanceof GitError) return current;
        current = current.cause;
    }
    return undefined;
}

function summarizeCause(cause: unknown): string {
    if (cause instanceof GitError) {
        return cause.stderr.trim() || cause.message;
    }
    return cause instanceof Error ? cause.message : String(cause);
}

export function describeError(error: unknown, debug = isDebugEnabled()): ErrorDescription {
    const message = error instanceof Error ? error.message : String(error);
    const details: string[] = [];

    if (error instanceof RefResolutionError) {
        if (error.cause !== undefined && !debug) {
            details.push(summarizeCause(error.cause));
        }
        const hint = HINTS[error.kind];
        if (hint) {
            details.push(hint(error));
        }
    }

    if (debug) {
        const gitError = findGitError(error);
        if (gitError) {
            details.push(gitError.toDetailedString());
        }
    }

    return { message, details };
}

export function reportError(error: unknown, debug = isDebugEnabled()): void {
    const { message, details } = describeError(error, debug);
    console.error(chalk.red('Error:'), message);
    for (const line of details) {
        console.error(chalk.dim(line));
    }
}

/**
 * Report an error and exit with status 1.
 */
export function fail(error: unknown): never {
    reportError(error);
    exit(1);
}

/**
 * Last-resort handler for errors escaping a command action.
 * An ExitPendingError means exit() is already running cleanup.
 */
export function handleCommandError(error: unknown): void {
    if (error instanceof ExitPendingError) return;
    reportError(error);
    process.exitCode = 1;
}
