import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'fs';
import { homedir } from 'os';
import { dirname, join } from 'path';
import { execSync } from 'child_process';
import chalk from 'chalk';
import { z } from 'zod';

// User config location
const USER_CONFIG_DIR = join(homedir(), '.config', 'flow');
const USER_CONFIG_FILE = join(USER_CONFIG_DIR, 'config.json');

// Workspace config location (relative to repo root)
const WORKSPACE_CONFIG_DIR = '.flow';
const WORKSPACE_CONFIG_FILE = 'config.json';

/** Longest delay a Node.js timer accepts, in whole seconds */
export const MAX_TIMEOUT_SECONDS = 2147483;

export const ConfigSchema = z.object({
    /** Directory that `flow clone` clones into, as <cloneRoot>/<owner>/<repo> */
    cloneRoot: z.string().min(1),
    /** Remote preferred when a ref does not name one */
    defaultRemote: z.string().min(1),
    /** Abort git commands of `flow checkout` after this many seconds */
    checkoutTimeoutSeconds: z.number().int().positive().max(MAX_TIMEOUT_SECONDS).optional(),
});

export type Config = z.infer<typeof ConfigSchema>;

const PartialConfigSchema = ConfigSchema.partial();

// Values typed on the command line arrive as strings
const ConfigInputSchema = z
    .object({
        cloneRoot: z.string().min(1),
        defaultRemote: z.string().min(1),
        checkoutTimeoutSeconds: z.coerce.number().int().positive().max(MAX_TIMEOUT_SECONDS),
    })
    .partial();

export const CONFIG_KEYS = ['cloneRoot', 'defaultRemote', 'checkoutTimeoutSeconds'] as const;
export type ConfigKey = typeof CONFIG_KEYS[number];

export type ConfigScope = 'user' | 'workspace';
export type ConfigSource = 'default' | 'workspace' | 'user';

export interface ConfigValueWithSource {
    value: Config[ConfigKey];
    source: ConfigSource;
}

export const DEFAULT_CONFIG: Config = {
    cloneRoot: '~/gh',
    defaultRemote: 'origin',
};

/**
 * Get the git repository root directory
 */
function getRepoRoot(): string | null {
    try {
        return execSync('git rev-parse --show-toplevel', {
            encoding: 'utf-8',
            stdio: ['ignore', 'pipe', 'ignore'],
        }).trim();
    } catch {
        return null;
    }
}

/**
 * Get the workspace config file path (in repo root)
 */
export function getWorkspaceConfigPath(): string | null {
    const repoRoot = getRepoRoot();
    if (!repoRoot) return null;
    return join(repoRoot, WORKSPACE_CONFIG_DIR, WORKSPACE_CONFIG_FILE);
}

export function getUserConfigPath(): string {
    return USER_CONFIG_FILE;
}

function formatIssues(error: z.ZodError): string {
    return error.issues
        .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
        .join('; ');
}

/**
 * Parse the contents of a config file.
 * Invalid JSON or values are reported as a warning and the file is ignored.
 */
export function parseConfigFile(data: string, source: string): Partial<Config> {
    let raw: unknown;
    try {
        raw = JSON.parse(data);
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.warn(chalk.yellow('Warning:'), `Ignoring unreadable config ${source}: ${message}`);
        return {};
    }

    const result = PartialConfigSchema.safeParse(raw);
    if (!result.success) {
        console.warn(chalk.yellow('Warning:'), `Ignoring invalid config ${source}: ${formatIssues(result.error)}`);
        return {};
    }
    return result.data;
}

/**
 * Read one config layer from disk. A missing file is an empty layer.
 */
export function readConfigFile(configPath: string): Partial<Config> {
    if (!existsSync(configPath)) return {};

    let data: string;
    try {
        data = readFileSync(configPath, 'utf-8');
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.warn(chalk.yellow('Warning:'), `Ignoring unreadable config ${configPath}: ${message}`);
        return {};
    }
    return parseConfigFile(data, configPath);
}

function loadWorkspaceConfig(): Partial<Config> {
    const configPath = getWorkspaceConfigPath();
    if (!configPath) return {};
    return readConfigFile(configPath);
}

function loadUserConfig(): Partial<Config> {
    return readConfigFile(USER_CONFIG_FILE);
}

/**
 * Apply config layers over a base, later layers winning.
 */
export function mergeConfig(base: Config, ...layers: Partial<Config>[]): Config {
    return layers.reduce<Config>(
        (merged, layer) => ({
            cloneRoot: layer.cloneRoot ?? merged.cloneRoot,
            defaultRemote: layer.defaultRemote ?? merged.defaultRemote,
            checkoutTimeoutSeconds: layer.checkoutTimeoutSeconds ?? merged.checkoutTimeoutSeconds,
        }),
        base
    );
}

/**
 * Load merged config: defaults → workspace → user
 * User settings override workspace, workspace overrides defaults
 */
export function loadConfig(): Config {
    return mergeConfig(DEFAULT_CONFIG, loadWorkspaceConfig(), loadUserConfig());
}

export function getConfig<K extends ConfigKey>(key: K): Config[K] {
    return loadConfig()[key];
}

/**
 * Validate a value typed on the command line for a config key.
 * @throws Error naming the key when the value is not acceptable
 */
export function parseConfigValue(key: ConfigKey, value: string): Partial<Config> {
    const result = ConfigInputSchema.safeParse({ [key]: value });
    if (!result.success) {
        throw new Error(`Invalid value for ${key}: ${formatIssues(result.error)}`);
    }
    return result.data;
}

/**
 * Save config to the specified scope
 * @param config The config values to save
 * @param scope 'user' (default) or 'workspace'
 */
export function saveConfig(config: Partial<Config>, scope: ConfigScope = 'user'): void {
    let configPath = USER_CONFIG_FILE;
    if (scope === 'workspace') {
        const workspacePath = getWorkspaceConfigPath();
        if (!workspacePath) {
            throw new Error('Not in a git repository');
        }
        configPath = workspacePath;
    }

    const merged = { ...readConfigFile(configPath), ...config };
    const configDir = dirname(configPath);
    if (!existsSync(configDir)) {
        mkdirSync(configDir, { recursive: true });
    }
    writeFileSync(configPath, JSON.stringify(merged, null, 2) + '\n');
}

/**
 * Resolve every known key to its effective value and the layer it came from.
 */
export function resolveConfigSources(
    workspace: Partial<Config>,
    user: Partial<Config>
): Record<ConfigKey, ConfigValueWithSource> {
    const entry = (key: ConfigKey): ConfigValueWithSource => {
        if (user[key] !== undefined) return { value: user[key], source: 'user' };
        if (workspace[key] !== undefined) return { value: workspace[key], source: 'workspace' };
        return { value: DEFAULT_CONFIG[key], source: 'default' };
    };

    return {
        cloneRoot: entry('cloneRoot'),
        defaultRemote: entry('defaultRemote'),
        checkoutTimeoutSeconds: entry('checkoutTimeoutSeconds'),
    };
}

export function listConfigWithSources(): Record<ConfigKey, ConfigValueWithSource> {
    return resolveConfigSources(loadWorkspaceConfig(), loadUserConfig());
}

/**
 * Expand a leading ~ to the home directory
 */
export function expandHome(path: string, home: string = homedir()): string {
    if (path === '~') return home;
    if (path.startsWith('~/')) return join(home, path.slice(2));
    return path;
}
