/**
 * Shared types for the flow core library.
 */

// =============================================================================
// Git
// =============================================================================

/**
 * Options accepted by every git utility.
 */
export interface GitOptions {
    /** Working directory for the git command (default: process.cwd()) */
    cwd?: string;
    /** Aborts the running git process when signalled */
    signal?: AbortSignal;
}

/**
 * Error thrown when a git command fails.
 * Carries everything needed to log the failure without re-running it.
 */
export class GitError extends Error {
    readonly command: string;
    readonly stderr: string;
    /** Process exit code, or null when the process was killed */
    readonly exitCode: number | null;
    readonly cwd: string;

    constructor(details: {
        message: string;
        command: string;
        stderr: string;
        exitCode: number | null;
        cwd: string;
    }) {
        super(details.message);
        this.name = 'GitError';
        this.command = details.command;
        this.stderr = details.stderr;
        this.exitCode = details.exitCode;
        this.cwd = details.cwd;
    }

    toDetailedString(): string {
        const lines = [
            `GitError: ${this.message}`,
            `  Command: ${this.command}`,
            `  CWD: ${this.cwd}`,
            `  Exit code: ${this.exitCode ?? 'killed'}`,
        ];
        const stderr = this.stderr.trim();
        if (stderr) {
            lines.push(`  Stderr: ${stderr}`);
        }
        return lines.join('\n');
    }
}

// =============================================================================
// Repositories
// =============================================================================

/**
 * A GitHub repository and the URL to clone it from.
 */
export interface CloneTarget {
    owner: string;
    repo: string;
    cloneUrl: string;
}

/**
 * Owner/repo of a tree URL plus the branch names it may refer to.
 */
export interface TreeUrlInfo {
    owner: string;
    repo: string;
    /** Ordered, duplicate-free, most authoritative first */
    candidates: string[];
}

// =============================================================================
// Ref resolution
// =============================================================================

/**
 * Where the branch candidates came from.
 * - url: a GitHub tree URL (candidates are probed)
 * - direct: a branch name or remote/branch shorthand (single candidate)
 */
export type RefSpecSource = 'url' | 'direct';

export interface ParsedRefSpec {
    source: RefSpecSource;
    candidates: string[];
    /** Remote named by a remote/branch shorthand */
    pinnedRemote?: string;
}

export type CheckoutMode = 'switch-existing-local' | 'create-from-remote';

/**
 * Final checkout decision produced by the resolver.
 */
export interface ResolvedCheckout {
    remote: string;
    branch: string;
    mode: CheckoutMode;
    /** `<remote>/<branch>` */
    remoteRef: string;
    source: RefSpecSource;
}

/**
 * The git capabilities the resolver depends on.
 * Every call is a blocking round trip; the resolver awaits them one at a time.
 */
export interface GitRefOperations {
    /** Configured remotes in `git remote` listing order */
    listRemotes(): Promise<string[]>;
    remoteHasBranch(remote: string, branch: string): Promise<boolean>;
    fetchRef(remote: string, branch: string): Promise<void>;
    localBranchExists(name: string): Promise<boolean>;
    remoteTrackingBranchExists(remote: string, branch: string): Promise<boolean>;
    checkout(name: string): Promise<void>;
    checkoutNewTracking(name: string, remoteRef: string): Promise<void>;
}
