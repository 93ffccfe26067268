/**
 * Process exit with cleanup.
 *
 * Commands register cleanup handlers for resources that outlive a failed
 * step (timers, abort controllers of running git commands). `exit()` runs
 * them last-registered first, then exits.
 */

import chalk from 'chalk';

type CleanupHandler = () => void | Promise<void>;

/** Exit codes used by the CLI (0 = success, 1 = error) */
export type ExitCode = 0 | 1;

const CLEANUP_TIMEOUT_MS = 5000;

const cleanupHandlers: CleanupHandler[] = [];
let isExiting = false;

/**
 * Register a cleanup handler to run before process exit.
 * @returns A function that unregisters the handler
 * @throws Error if the process is already exiting
 */
export function registerCleanupHandler(handler: CleanupHandler): () => void {
    if (isExiting) {
        throw new Error('Cannot register cleanup handler: process is exiting');
    }

    cleanupHandlers.push(handler);
    return () => {
        const index = cleanupHandlers.indexOf(handler);
        if (index !== -1) {
            cleanupHandlers.splice(index, 1);
        }
    };
}

function warn(message: string, error: unknown): void {
    console.error(chalk.yellow('Warning:'), message, error instanceof Error ? error.message : String(error));
}

async function runCleanupHandlers(timeoutMs: number): Promise<boolean> {
    const handlers = [...cleanupHandlers].reverse();
    if (handlers.length === 0) return true;

    let timeoutId: NodeJS.Timeout | undefined;
    const timedOut = new Promise<false>(resolve => {
        timeoutId = setTimeout(() => resolve(false), timeoutMs);
    });

    const finished = (async (): Promise<true> => {
        for (const handler of handlers) {
            try {
                await handler();
            } catch (error) {
                warn(`Cleanup handler '${handler.name || 'anonymous'}' failed:`, error);
            }
        }
        return true;
    })();

    const completed = await Promise.race([finished, timedOut]);
    clearTimeout(timeoutId);
    return completed;
}

/**
 * Error thrown by exit() to stop execution at the call site.
 */
export class ExitPendingError extends Error {
    public readonly exitCode: ExitCode;

    constructor(code: ExitCode) {
        super('Process exit pending');
        this.name = 'ExitPendingError';
        this.exitCode = code;
    }
}

/**
 * Exit the process once registered cleanup handlers have run.
 *
 * Throws ExitPendingError so nothing after the call site runs while cleanup
 * is in flight.
 */
export function exit(code: ExitCode): never {
    if (isExiting) {
        console.error(
            chalk.yellow('Warning:'),
            'Recursive exit() call detected - exiting immediately',
            chalk.dim(`(requested code: ${code})`)
        );
        process.exit(code);
    }
    isExiting = true;

    runCleanupHandlers(CLEANUP_TIMEOUT_MS)
        .then(completed => {
            if (!completed) {
                console.error(chalk.yellow('Warning:'), `Cleanup timed out after ${CLEANUP_TIMEOUT_MS / 1000}s`);
            }
        })
        .catch(error => warn('Cleanup failed:', error))
        .finally(() => {
            process.exit(code);
        });

    throw new ExitPendingError(code);
}

export function isProcessExiting(): boolean {
    return isExiting;
}

/**
 * Reset exit state (for testing only).
 * @internal
 */
export function _resetForTesting(): void {
    isExiting = false;
    cleanupHandlers.length = 0;
}
