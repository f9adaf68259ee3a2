/**
 * Configuration file path utilities
 *
 * Lookup order for the route configuration:
 * 1. --config option
 * 2. MCP_ROUTER_CONFIG environment variable
 * 3. config.json in the current directory
 * 4. config.json in the platform config directory
 */

import envPaths from 'env-paths';
import { makeDirectory } from 'make-dir';
import { access, constants } from 'node:fs/promises';
import { join, resolve } from 'node:path';

// suffix: '' removes the default '-nodejs' suffix
const paths = envPaths('mcp-path-router', { suffix: '' });

export const CONFIG_ENV_VAR = 'MCP_ROUTER_CONFIG';
export const CONFIG_FILE_NAME = 'config.json';

export type ConfigPathSource = 'option' | 'env' | 'cwd' | 'default';

export interface ResolvedConfigPath {
    path:   string
    source: ConfigPathSource
}

export interface ConfigPathOptions {
    explicit?: string
    env?:      NodeJS.ProcessEnv
    cwd?:      string
}

/**
 * Platform config directory (e.g. ~/.config/mcp-path-router on Linux)
 */
export function getConfigDir(): string {
    return paths.config;
}

export function getDefaultConfigPath(): string {
    return join(paths.config, CONFIG_FILE_NAME);
}

async function fileExists(path: string): Promise<boolean> {
    try {
        await access(path, constants.F_OK);
        return true;
    } catch{
        return false;
    }
}

/**
 * Resolve which configuration file to use
 */
export async function resolveConfigPath(options: ConfigPathOptions = {}): Promise<ResolvedConfigPath> {
    const cwd = options.cwd ?? process.cwd();
    const env = options.env ?? process.env;

    if(options.explicit) {
        return { path: resolve(cwd, options.explicit), source: 'option' };
    }

    const fromEnv = env[CONFIG_ENV_VAR];
    if(fromEnv) {
        return { path: resolve(cwd, fromEnv), source: 'env' };
    }

    const local = join(cwd, CONFIG_FILE_NAME);
    if(await fileExists(local)) {
        return { path: local, source: 'cwd' };
    }

    return { path: getDefaultConfigPath(), source: 'default' };
}

/**
 * Ensure a directory exists, creating parents as needed
 */
export async function ensureDir(dir: string): Promise<string> {
    return makeDirectory(dir);
}
