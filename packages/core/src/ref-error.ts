/**
 * Error kinds raised while resolving a ref spec into a checkout.
 */

export const REF_ERROR_KINDS = [
    'InvalidURL',
    'UnsupportedHost',
    'UnsupportedPath',
    'NoBranchCandidates',
    'RemoteNotFound',
    'RemoteConflict',
    'NoRemotesConfigured',
    'EmptyBranchName',
    'ProbeFailed',
    'FetchFailed',
    'BranchNotFound',
] as const;

export type RefErrorKind = typeof REF_ERROR_KINDS[number];

export interface RefErrorContext {
    /** The raw input that was being resolved */
    input?: string;
    remote?: string;
    branch?: string;
    cause?: unknown;
}

export class RefResolutionError extends Error {
    readonly kind: RefErrorKind;
    readonly input?: string;
    readonly remote?: string;
    readonly branch?: string;

    constructor(kind: RefErrorKind, message: string, context: RefErrorContext = {}) {
        super(message, context.cause === undefined ? undefined : { cause: context.cause });
        this.name = 'RefResolutionError';
        this.kind = kind;
        this.input = context.input;
        this.remote = context.remote;
        this.branch = context.branch;
    }
}

/**
 * Type guard, optionally narrowed to a single kind.
 */
export function isRefResolutionError(
    error: unknown,
    kind?: RefErrorKind
): error is RefResolutionError {
    return error instanceof RefResolutionError && (kind === undefined || error.kind === kind);
}
