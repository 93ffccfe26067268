/**
 * @flow-cli/core
 *
 * Git ref resolution and repository helpers behind the flow CLI.
 *
 * @example Basic usage:
 * ```typescript
 * import { checkoutRefWorkflow, createGitRefOperations } from '@flow-cli/core';
 *
 * const result = await checkoutRefWorkflow({
 *   ref: 'https://github.com/acme/widgets/tree/feature/login-fix',
 *   git: createGitRefOperations(),
 * });
 * ```
 */

// =============================================================================
// Types & Errors
// =============================================================================

export { GitError } from './types.js';
export type {
    GitOptions,
    GitRefOperations,
    CloneTarget,
    TreeUrlInfo,
    RefSpecSource,
    ParsedRefSpec,
    CheckoutMode,
    ResolvedCheckout,
} from './types.js';

export { RefResolutionError, isRefResolutionError, REF_ERROR_KINDS } from './ref-error.js';
export type { RefErrorKind, RefErrorContext } from './ref-error.js';

// =============================================================================
// Ref Resolution
// =============================================================================

export {
    DEFAULT_REMOTE,
    parseRefSpec,
    selectRemote,
    pickBranchCandidate,
    resolveCheckout,
    applyCheckout,
} from './ref-resolver.js';
export type { ResolveCheckoutOptions } from './ref-resolver.js';

// =============================================================================
// Git Utilities
// =============================================================================

export {
    isGitRepository,
    cloneRepository,
    listRemotes,
    remoteHasBranch,
    fetchRef,
    branchExists,
    remoteTrackingBranchExists,
    createBranch,
    checkoutBranch,
    checkoutTrackingBranch,
    createGitRefOperations,
} from './git-utils.js';

// =============================================================================
// URL & Name Utilities
// =============================================================================

export { isHttpUrl, parseGitHubTreeUrl, parseGitHubCloneTarget } from './url-parser.js';

export {
    extractBranchName,
    validateClipboardBranch,
    CLIPBOARD_BRANCH_MESSAGES,
} from './branch-name.js';
export type { ClipboardBranchProblem } from './branch-name.js';

export { shellEscape, buildCommand } from './shell-utils.js';

// =============================================================================
// Workflows
// =============================================================================

export { checkoutRefWorkflow } from './workflows/index.js';
export type { WorkflowResult, CheckoutRefOptions, CheckoutRefResult } from './workflows/index.js';
