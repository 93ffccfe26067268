import chalk from 'chalk';
import {
    CONFIG_KEYS,
    getConfig,
    getUserConfigPath,
    getWorkspaceConfigPath,
    listConfigWithSources,
    parseConfigValue,
    saveConfig,
    type ConfigScope,
    type ConfigSource,
} from '../config.js';
import { validateEnum } from '../validation.js';
import { exit } from '../exit.js';

const SOURCE_LABELS: Record<ConfigSource, string> = {
    'default': chalk.dim('(default)'),
    'workspace': chalk.cyan('(workspace)'),
    'user': chalk.green('(user)'),
};

interface ConfigOptions {
    /** Write to the workspace config instead of the user config */
    workspace?: boolean;
}

/**
 * `flow config`            show every setting with where it came from
 * `flow config <key>`      print one setting
 * `flow config <key> <v>`  write a setting (user scope unless --workspace)
 */
export async function configCommand(key?: string, value?: string, options: ConfigOptions = {}): Promise<void> {
    if (key === undefined) {
        showConfig();
        return;
    }

    if (!validateEnum(key, CONFIG_KEYS, 'config key')) return;

    if (value === undefined) {
        const current = getConfig(key);
        if (current === undefined) {
            console.log(`Config key "${key}" is not set`);
        } else {
            console.log(String(current));
        }
        return;
    }

    const scope: ConfigScope = options.workspace ? 'workspace' : 'user';
    try {
        saveConfig(parseConfigValue(key, value), scope);
    } catch (error) {
        console.error(chalk.red('Error:'), error instanceof Error ? error.message : String(error));
        exit(1);
    }
    console.log(chalk.green('✓'), `Set ${key} = ${chalk.cyan(value)} (in ${scope} config)`);
}

function showConfig(): void {
    console.log('\n' + chalk.bold('Settings:'));
    console.log('─'.repeat(60));
    for (const [name, { value, source }] of Object.entries(listConfigWithSources())) {
        console.log(`  ${name}: ${value ?? chalk.dim('(not set)')} ${SOURCE_LABELS[source]}`);
    }

    console.log('\n' + chalk.bold('Config files:'));
    console.log('─'.repeat(60));
    console.log(`  User:      ${getUserConfigPath()}`);
    console.log(`  Workspace: ${getWorkspaceConfigPath() ?? '(not in a git repository)'}`);
}
