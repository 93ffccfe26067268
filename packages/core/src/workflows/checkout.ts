/**
 * Checkout Ref Workflow
 *
 * Resolve a ref spec and apply the decision to the working tree.
 */

import { RefResolutionError } from '../ref-error.js';
import { applyCheckout, resolveCheckout } from '../ref-resolver.js';
import type { ResolvedCheckout } from '../types.js';
import type { CheckoutRefOptions, CheckoutRefResult } from './types.js';

/**
 * @example
 * ```typescript
 * const result = await checkoutRefWorkflow({
 *   ref: 'origin/feature/login-fix',
 *   git: createGitRefOperations(),
 * });
 *
 * if (result.success) {
 *   console.log(`On ${result.checkout?.branch}`);
 * }
 * ```
 */
export async function checkoutRefWorkflow(options: CheckoutRefOptions): Promise<CheckoutRefResult> {
    const { ref, git, remote, defaultRemote } = options;

    let decision: ResolvedCheckout;
    try {
        decision = await resolveCheckout(ref, git, { remote, defaultRemote });
    } catch (error) {
        if (error instanceof RefResolutionError) {
            return {
                success: false,
                error: error.message,
                errorKind: error.kind,
                cause: error,
            };
        }
        return {
            success: false,
            error: error instanceof Error ? error.message : String(error),
            cause: error,
        };
    }

    try {
        await applyCheckout(git, decision);
    } catch (error) {
        const target = decision.mode === 'switch-existing-local' ? decision.branch : decision.remoteRef;
        return {
            success: false,
            error: `git checkout ${target} failed: ${error instanceof Error ? error.message : String(error)}`,
            checkout: decision,
            cause: error,
        };
    }

    return { success: true, checkout: decision };
}
