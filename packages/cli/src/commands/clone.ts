import { existsSync, mkdirSync, statSync } from 'fs';
import { dirname, join } from 'path';
import chalk from 'chalk';
import { GitError, parseGitHubCloneTarget, type CloneTarget } from '@flow-cli/core';
import { cloneRepository } from '../git-utils.js';
import { expandHome, getConfig } from '../config.js';
import { exit } from '../exit.js';
import { fail } from '../errors.js';

/**
 * Clone a GitHub repository into <cloneRoot>/<owner>/<repo>.
 * Accepts an HTTPS URL, an SSH address or owner/repo shorthand.
 */
export async function cloneCommand(repository: string): Promise<void> {
    const input = repository.trim();
    if (!input) {
        console.error(chalk.red('Error:'), 'Repository is required');
        console.log(chalk.dim('Usage:'), 'flow clone <github-url | owner/repo>');
        exit(1);
    }

    let target: CloneTarget;
    try {
        target = parseGitHubCloneTarget(input);
    } catch (error) {
        fail(error);
    }

    const targetDir = join(expandHome(getConfig('cloneRoot')), target.owner, target.repo);
    if (existsSync(targetDir)) {
        const problem = statSync(targetDir).isDirectory() ? 'already exists' : 'exists and is not a directory';
        console.error(chalk.red('Error:'), `Destination ${targetDir} ${problem}`);
        exit(1);
    }
    mkdirSync(dirname(targetDir), { recursive: true });

    console.log(chalk.dim(`Cloning ${target.cloneUrl}...`));
    try {
        await cloneRepository(target.cloneUrl, targetDir);
    } catch (error) {
        const stderr = error instanceof GitError ? error.stderr.trim() : '';
        if (stderr) {
            console.error(stderr);
        }
        fail(new Error('git clone failed', { cause: error }));
    }

    console.log(chalk.green('✓'), `Cloned to ${chalk.cyan(targetDir)}`);
}
