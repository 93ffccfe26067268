#!/usr/bin/env node

import { Command } from 'commander';
import { createRequire } from 'module';
import { z } from 'zod';
import { checkoutCommand } from './commands/checkout.js';
import { branchFromClipboardCommand } from './commands/branch-from-clipboard.js';
import { cloneCommand } from './commands/clone.js';
import { configCommand } from './commands/config.js';
import { handleCommandError } from './errors.js';

const require = createRequire(import.meta.url);
const pkg = z.object({ version: z.string() }).parse(require('../package.json'));

const program = new Command();

program
    .name('flow')
    .description('Everyday git helpers: check out GitHub refs, branch from the clipboard, clone repositories')
    .version(pkg.version);

// Checkout
program
    .command('checkout <ref>')
    .alias('gitCheckout')
    .description('Check out a branch name, remote/branch or GitHub tree URL')
    .option('-r, --remote <remote>', 'Remote to resolve against (must be configured)')
    .option('-t, --timeout <seconds>', 'Stop running git commands after this many seconds')
    .action(checkoutCommand);

program
    .command('branch-from-clipboard')
    .alias('branchFromClipboard')
    .description('Switch to (or create) the branch named on the clipboard')
    .action(branchFromClipboardCommand);

// Repositories
program
    .command('clone <repo>')
    .description('Clone a GitHub repository into <cloneRoot>/<owner>/<repo>')
    .action(cloneCommand);

// Configuration
program
    .command('config')
    .description('Show, read or write configuration')
    .argument('[key]', 'Config key (cloneRoot, defaultRemote, checkoutTimeoutSeconds)')
    .argument('[value]', 'Value to set')
    .option('-w, --workspace', 'Write to the workspace config (.flow/config.json)')
    .action(configCommand);

program.parseAsync().catch(handleCommandError);
