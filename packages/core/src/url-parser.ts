/**
 * URL parsing utilities for GitHub tree links and clone targets.
 */

import { RefResolutionError } from './ref-error.js';
import type { CloneTarget, TreeUrlInfo } from './types.js';

const TREE_URL_HOSTS = new Set(['github.com', 'www.github.com']);
const CLONE_URL_HOSTS = new Set(['github.com']);

/**
 * True when the input should be treated as a web URL rather than a ref name.
 */
export function isHttpUrl(input: string): boolean {
    return input.startsWith('http://') || input.startsWith('https://');
}

function parseUrl(raw: string): URL {
    try {
        return new URL(raw);
    } catch (error) {
        throw new RefResolutionError('InvalidURL', `Invalid URL: ${raw}`, { input: raw, cause: error });
    }
}

function assertGitHubHost(url: URL, raw: string, hosts: ReadonlySet<string>): void {
    if (!hosts.has(url.host.toLowerCase())) {
        throw new RefResolutionError(
            'UnsupportedHost',
            `Expected github.com host, got ${url.host}`,
            { input: raw }
        );
    }
}

function trimSlashes(path: string): string {
    return path.replace(/^\/+|\/+$/g, '');
}

/**
 * Percent-decode a path fragment, or null when it is not valid percent-encoding.
 */
function tryDecode(value: string): string | null {
    try {
        return decodeURIComponent(value);
    } catch {
        return null;
    }
}

/**
 * Parse a GitHub tree URL into the branch names it may point at.
 *
 * GitHub does not delimit where the branch name ends and the file path begins,
 * so every prefix of the path after `tree/` is a candidate, shortest first.
 * A `ref` query parameter is the most authoritative hint and goes first.
 *
 * @example
 * parseGitHubTreeUrl('https://github.com/acme/widgets/tree/feature/login-fix')
 * // => { owner: 'acme', repo: 'widgets', candidates: ['feature', 'feature/login-fix'] }
 *
 * @example
 * parseGitHubTreeUrl('https://github.com/acme/widgets/tree/main?ref=release/9.0')
 * // => { owner: 'acme', repo: 'widgets', candidates: ['release/9.0', 'main'] }
 *
 * @throws {RefResolutionError} InvalidURL, UnsupportedHost, UnsupportedPath or NoBranchCandidates
 */
export function parseGitHubTreeUrl(raw: string): TreeUrlInfo {
    const url = parseUrl(raw);
    assertGitHubHost(url, raw, TREE_URL_HOSTS);

    // pathname is still percent-encoded, so an encoded %2F stays inside its segment
    const parts = trimSlashes(url.pathname).split('/');
    if (parts.length < 4 || parts[2].toLowerCase() !== 'tree') {
        throw new RefResolutionError(
            'UnsupportedPath',
            `Unsupported GitHub tree URL path: ${url.pathname}`,
            { input: raw }
        );
    }

    const [owner, repo] = parts;
    const branchParts = parts.slice(3);

    const candidates: string[] = [];
    const seen = new Set<string>();
    const addCandidate = (candidate: string): void => {
        if (!candidate || seen.has(candidate)) return;
        seen.add(candidate);
        candidates.push(candidate);
    };

    // Percent-decoded again after searchParams; a failed decode drops the ref
    const ref = url.searchParams.get('ref');
    if (ref) {
        const decoded = tryDecode(ref);
        if (decoded !== null) {
            addCandidate(decoded);
        }
    }

    for (let i = 1; i <= branchParts.length; i++) {
        const decoded = tryDecode(branchParts.slice(0, i).join('/'));
        if (decoded !== null) {
            addCandidate(decoded);
        }
    }

    if (candidates.length === 0) {
        throw new RefResolutionError(
            'NoBranchCandidates',
            'Could not determine a branch name from the GitHub tree URL',
            { input: raw }
        );
    }

    return {
        owner: tryDecode(owner) ?? owner,
        repo: tryDecode(repo) ?? repo,
        candidates,
    };
}

function splitOwnerRepo(path: string, raw: string): { owner: string; repo: string } {
    const trimmed = trimSlashes(path);
    const parts = trimmed ? trimmed.split('/') : [];
    if (parts.length < 2) {
        throw new RefResolutionError('UnsupportedPath', `Invalid GitHub repository path: "${path}"`, {
            input: raw,
        });
    }
    if (parts.length > 2) {
        throw new RefResolutionError('UnsupportedPath', `Unexpected extra path components in "${path}"`, {
            input: raw,
        });
    }

    const owner = parts[0];
    const repo = parts[1].replace(/\.git$/, '');
    if (!owner || !repo) {
        throw new RefResolutionError('UnsupportedPath', `Invalid GitHub repository path: "${path}"`, {
            input: raw,
        });
    }
    return { owner, repo };
}

/**
 * Parse anything that names a GitHub repository into a clone target.
 * Supports SSH, HTTPS and `owner/repo` shorthand.
 *
 * @example
 * parseGitHubCloneTarget('git@github.com:acme/widgets.git')
 * // => { owner: 'acme', repo: 'widgets', cloneUrl: 'git@github.com:acme/widgets.git' }
 *
 * @example
 * parseGitHubCloneTarget('acme/widgets')
 * // => { owner: 'acme', repo: 'widgets', cloneUrl: 'https://github.com/acme/widgets' }
 */
export function parseGitHubCloneTarget(input: string): CloneTarget {
    if (input.startsWith('git@')) {
        const sshPrefix = 'git@github.com:';
        if (!input.startsWith(sshPrefix)) {
            throw new RefResolutionError('UnsupportedHost', `Unsupported git host in "${input}"`, {
                input,
            });
        }
        const { owner, repo } = splitOwnerRepo(input.slice(sshPrefix.length), input);
        return { owner, repo, cloneUrl: input };
    }

    if (isHttpUrl(input)) {
        const url = parseUrl(input);
        assertGitHubHost(url, input, CLONE_URL_HOSTS);
        const { owner, repo } = splitOwnerRepo(url.pathname, input);
        return { owner, repo, cloneUrl: `https://github.com/${owner}/${repo}` };
    }

    const { owner, repo } = splitOwnerRepo(input, input);
    return { owner, repo, cloneUrl: `https://github.com/${owner}/${repo}` };
}
