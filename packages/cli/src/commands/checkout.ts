import chalk from 'chalk';
import { checkoutRefWorkflow, type CheckoutRefResult } from '@flow-cli/core';
import { isGitRepository, createGitRefOperations } from '../git-utils.js';
import { getConfig, MAX_TIMEOUT_SECONDS } from '../config.js';
import { validatePositiveNumber } from '../validation.js';
import { exit, registerCleanupHandler } from '../exit.js';
import { fail } from '../errors.js';

interface CheckoutOptions {
    /** Remote to resolve against, overriding the configured default */
    remote?: string;
    /** Seconds before running git commands are aborted */
    timeout?: string;
}

export async function checkoutCommand(ref: string, options: CheckoutOptions = {}): Promise<void> {
    const timeoutSeconds =
        validatePositiveNumber(options.timeout, '--timeout', 1, MAX_TIMEOUT_SECONDS) ??
        getConfig('checkoutTimeoutSeconds');

    if (!(await isGitRepository())) {
        console.error(chalk.red('Error:'), 'Not inside a git work tree');
        exit(1);
    }

    const controller = new AbortController();
    const unregister = registerCleanupHandler(() => controller.abort());
    const timer =
        timeoutSeconds === undefined ? undefined : setTimeout(() => controller.abort(), timeoutSeconds * 1000);

    let result: CheckoutRefResult;
    try {
        result = await checkoutRefWorkflow({
            ref,
            git: createGitRefOperations({ signal: controller.signal }),
            remote: options.remote,
            defaultRemote: getConfig('defaultRemote'),
        });
    } finally {
        clearTimeout(timer);
        unregister();
    }

    if (!result.success || !result.checkout) {
        if (controller.signal.aborted) {
            console.error(chalk.yellow('Warning:'), `git was stopped after ${timeoutSeconds}s`);
        }
        // Resolution failures carry the RefResolutionError itself as the cause
        fail(result.errorKind ? result.cause : new Error(result.error ?? 'Checkout failed', { cause: result.cause }));
    }

    const { branch, mode, remoteRef, source } = result.checkout;
    if (mode === 'switch-existing-local') {
        console.log(chalk.green('✓'), `Switched to branch ${chalk.cyan(branch)}`);
    } else {
        console.log(chalk.green('✓'), `Created branch ${chalk.cyan(branch)} tracking ${chalk.cyan(remoteRef)}`);
    }
    if (source === 'url') {
        console.log(chalk.dim(`Resolved from GitHub URL against ${result.checkout.remote}`));
    }
}
