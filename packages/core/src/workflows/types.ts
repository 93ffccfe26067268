/**
 * Workflow Types
 *
 * Workflows wrap core operations and report outcomes as result objects
 * instead of throwing, so every front end renders failures the same way.
 */

import type { RefErrorKind } from '../ref-error.js';
import type { GitRefOperations, ResolvedCheckout } from '../types.js';

/**
 * Base result for all workflows
 */
export interface WorkflowResult {
    /** Whether the workflow completed successfully */
    success: boolean;
    /** Error message if success is false */
    error?: string;
    /** The underlying error, for detailed reporting */
    cause?: unknown;
}

// =============================================================================
// Checkout Ref Workflow
// =============================================================================

export interface CheckoutRefOptions {
    /** Branch name, remote/branch shorthand or GitHub tree URL */
    ref: string;
    /** Git capabilities (bound to a working directory) */
    git: GitRefOperations;
    /** Remote the user asked for explicitly */
    remote?: string;
    /** Remote preferred when nothing pins one */
    defaultRemote?: string;
}

export interface CheckoutRefResult extends WorkflowResult {
    /** Resolution failure kind; absent when git failed during the checkout itself */
    errorKind?: RefErrorKind;
    /** The decision, present once resolution succeeded */
    checkout?: ResolvedCheckout;
}
