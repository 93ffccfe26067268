/**
 * Ref Resolver
 *
 * Turns a branch name, a `remote/branch` shorthand or a GitHub tree URL into
 * a concrete checkout decision. Every git interaction goes through the
 * GitRefOperations passed in, one call at a time, so probing order is the
 * candidate order and at most one query is in flight.
 */

import { RefResolutionError } from './ref-error.js';
import { isHttpUrl, parseGitHubTreeUrl } from './url-parser.js';
import type { GitRefOperations, ParsedRefSpec, ResolvedCheckout } from './types.js';

export const DEFAULT_REMOTE = 'origin';

export interface ResolveCheckoutOptions {
    /** Remote the user asked for explicitly; must be configured */
    remote?: string;
    /** Remote preferred when nothing pins one (default: origin) */
    defaultRemote?: string;
}

// =============================================================================
// Pure steps
// =============================================================================

/**
 * Classify a ref spec and extract its branch candidates.
 *
 * A `prefix/rest` spec pins `prefix` as the remote only when `prefix` is a
 * configured remote and `rest` is non-empty; otherwise the whole string is
 * the branch name (branch names may contain slashes).
 *
 * @throws {RefResolutionError} EmptyBranchName, or any tree URL parse error
 */
export function parseRefSpec(input: string, remotes: readonly string[]): ParsedRefSpec {
    const spec = input.trim();
    if (!spec) {
        throw new RefResolutionError('EmptyBranchName', 'Branch name cannot be empty', { input });
    }

    if (isHttpUrl(spec)) {
        const { candidates } = parseGitHubTreeUrl(spec);
        return { source: 'url', candidates };
    }

    const slash = spec.indexOf('/');
    if (slash > 0) {
        const prefix = spec.slice(0, slash);
        const remainder = spec.slice(slash + 1);
        if (remainder && remotes.includes(prefix)) {
            return { source: 'direct', candidates: [remainder], pinnedRemote: prefix };
        }
    }

    return { source: 'direct', candidates: [spec] };
}

/**
 * Choose the remote to fetch from.
 *
 * A requested or pinned remote must exist; nothing is substituted for it.
 * Otherwise the default remote wins when configured, then the first remote
 * in listing order.
 *
 * @throws {RefResolutionError} NoRemotesConfigured, RemoteNotFound or RemoteConflict
 */
export function selectRemote(
    remotes: readonly string[],
    pinned?: string,
    options: ResolveCheckoutOptions = {}
): string {
    if (remotes.length === 0) {
        throw new RefResolutionError('NoRemotesConfigured', 'No git remotes configured');
    }

    const requested = options.remote;
    if (requested !== undefined && pinned !== undefined && requested !== pinned) {
        throw new RefResolutionError(
            'RemoteConflict',
            `Remote "${requested}" conflicts with "${pinned}" named in the branch`,
            { remote: requested }
        );
    }

    const explicit = requested ?? pinned;
    if (explicit !== undefined) {
        if (!remotes.includes(explicit)) {
            throw new RefResolutionError('RemoteNotFound', `Git remote "${explicit}" not found`, {
                remote: explicit,
            });
        }
        return explicit;
    }

    const preferred = options.defaultRemote ?? DEFAULT_REMOTE;
    return remotes.includes(preferred) ? preferred : remotes[0];
}

// =============================================================================
// Steps with git round trips
// =============================================================================

/**
 * Return the first candidate the remote has, probing in order.
 * When none exists, the first candidate is returned so the fetch reports
 * the real error.
 *
 * @throws {RefResolutionError} NoBranchCandidates, or ProbeFailed when a probe errors
 */
export async function pickBranchCandidate(
    git: Pick<GitRefOperations, 'remoteHasBranch'>,
    remote: string,
    candidates: readonly string[]
): Promise<string> {
    if (candidates.length === 0) {
        throw new RefResolutionError('NoBranchCandidates', 'No branch candidates supplied', { remote });
    }

    for (const candidate of candidates) {
        let exists: boolean;
        try {
            exists = await git.remoteHasBranch(remote, candidate);
        } catch (error) {
            throw new RefResolutionError(
                'ProbeFailed',
                `Could not check ${remote} for branch ${candidate}`,
                { remote, branch: candidate, cause: error }
            );
        }
        if (exists) {
            return candidate;
        }
    }

    return candidates[0];
}

/**
 * Resolve a ref spec into a checkout decision.
 *
 * Fetches the chosen branch, then prefers an existing local branch over
 * creating one from the remote-tracking ref. Does not touch the working tree.
 *
 * @example
 * ```typescript
 * const decision = await resolveCheckout(
 *   'https://github.com/acme/widgets/tree/feature/login-fix',
 *   createGitRefOperations()
 * );
 * // => { remote: 'origin', branch: 'feature/login-fix', mode: 'create-from-remote', ... }
 * ```
 *
 * @throws {RefResolutionError} For every failure; git errors are kept as `cause`
 */
export async function resolveCheckout(
    input: string,
    git: GitRefOperations,
    options: ResolveCheckoutOptions = {}
): Promise<ResolvedCheckout> {
    if (!input.trim()) {
        throw new RefResolutionError('EmptyBranchName', 'Branch name cannot be empty', { input });
    }

    const remotes = await git.listRemotes();
    const parsed = parseRefSpec(input, remotes);
    const remote = selectRemote(remotes, parsed.pinnedRemote, options);

    const branch =
        parsed.source === 'url'
            ? await pickBranchCandidate(git, remote, parsed.candidates)
            : parsed.candidates[0];

    try {
        await git.fetchRef(remote, branch);
    } catch (error) {
        throw new RefResolutionError('FetchFailed', `git fetch ${remote} ${branch} failed`, {
            input,
            remote,
            branch,
            cause: error,
        });
    }

    const remoteRef = `${remote}/${branch}`;

    if (await git.localBranchExists(branch)) {
        return { remote, branch, mode: 'switch-existing-local', remoteRef, source: parsed.source };
    }

    if (await git.remoteTrackingBranchExists(remote, branch)) {
        return { remote, branch, mode: 'create-from-remote', remoteRef, source: parsed.source };
    }

    throw new RefResolutionError('BranchNotFound', `Remote branch ${remoteRef} not found`, {
        input,
        remote,
        branch,
    });
}

/**
 * Carry out a checkout decision against the working tree.
 * @throws {GitError} If git refuses the checkout (e.g., uncommitted changes)
 */
export async function applyCheckout(
    git: Pick<GitRefOperations, 'checkout' | 'checkoutNewTracking'>,
    decision: ResolvedCheckout
): Promise<void> {
    if (decision.mode === 'switch-existing-local') {
        await git.checkout(decision.branch);
        return;
    }
    await git.checkoutNewTracking(decision.branch, decision.remoteRef);
}
