import chalk from 'chalk';
import { extractBranchName, validateClipboardBranch, CLIPBOARD_BRANCH_MESSAGES } from '@flow-cli/core';
import { isGitRepository, branchExists, checkoutBranch, createBranch } from '../git-utils.js';
import { readClipboard } from '../clipboard.js';
import { exit } from '../exit.js';
import { fail } from '../errors.js';

/**
 * Switch to the branch named on the clipboard, creating it from HEAD when it
 * does not exist locally.
 */
export async function branchFromClipboardCommand(): Promise<void> {
    if (!(await isGitRepository())) {
        console.error(chalk.red('Error:'), 'Not inside a git work tree');
        exit(1);
    }

    let clipboard: string;
    try {
        clipboard = await readClipboard();
    } catch (error) {
        fail(new Error(`Could not read clipboard: ${error instanceof Error ? error.message : String(error)}`, {
            cause: error,
        }));
    }

    const branchName = extractBranchName(clipboard);
    const problem = validateClipboardBranch(branchName);
    if (problem) {
        console.error(chalk.red('Error:'), CLIPBOARD_BRANCH_MESSAGES[problem]);
        if (branchName) {
            console.log(chalk.dim('Clipboard:'), branchName);
        }
        exit(1);
    }

    if (await branchExists(branchName)) {
        await checkoutBranch(branchName);
        console.log(chalk.green('✓'), `Switched to ${chalk.cyan(branchName)}`);
    } else {
        await createBranch(branchName);
        console.log(chalk.green('✓'), `Created and switched to ${chalk.cyan(branchName)}`);
    }
}
