/**
 * Working-directory hint
 *
 * The router is usually launched by an MCP client whose own working directory
 * is not the project the user is in, so the hint the client passes wins over
 * process.cwd(). Precedence:
 *   1. explicit value (the --workdir option)
 *   2. MCP_ROUTER_WORKDIR
 *   3. PWD
 *   4. process.cwd()
 */

import { isAbsolute, resolve } from 'node:path';

export const WORKDIR_ENV_VAR = 'MCP_ROUTER_WORKDIR';

export type WorkingDirectorySource = 'option' | 'env:MCP_ROUTER_WORKDIR' | 'env:PWD' | 'process';

export interface WorkingDirectory {
    path:   string
    source: WorkingDirectorySource
}

export interface WorkingDirectoryOptions {
    explicit?: string
    env?:      NodeJS.ProcessEnv
    cwd?:      () => string
}

export function resolveWorkingDirectory(options: WorkingDirectoryOptions = {}): WorkingDirectory {
    const env = options.env ?? process.env;
    const cwd = options.cwd ?? (() => process.cwd());

    const candidates: [WorkingDirectorySource, string | undefined][] = [
        ['option', options.explicit],
        ['env:MCP_ROUTER_WORKDIR', env[WORKDIR_ENV_VAR]],
        ['env:PWD', env.PWD],
    ];

    for(const [source, value] of candidates) {
        if(value) {
            return { path: isAbsolute(value) ? resolve(value) : resolve(cwd(), value), source };
        }
    }

    return { path: cwd(), source: 'process' };
}
