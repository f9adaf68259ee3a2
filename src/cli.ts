#!/usr/bin/env node
/**
 * MCP Path Router CLI Entry Point
 *
 * Modes:
 * - serve: Route this stdio session to the backend for the caller's directory (default)
 * - which: Show which backend a path would be routed to, without starting it
 * - list: List route patterns in priority order
 * - add / remove: Edit route patterns
 * - set-default: Set the backend used when no pattern matches
 * - validate: Validate the configuration file
 * - config-path: Show the configuration file path
 * - probe: Start the resolved backend and perform an MCP handshake
 */

import { Command, InvalidArgumentError } from 'commander';
import { readFile } from 'node:fs/promises';
import _ from 'lodash';
import { ConfigurationError, errorMessage } from './errors.js';
import { ExitCodes } from './session/session.js';
import { configureLogger } from './utils/logger.js';

interface PackageJson {
    version:     string
    description: string
}

interface GlobalOptions {
    config?:   string
    logLevel?: string
}

async function readPackageJson(): Promise<PackageJson> {
    // dist/src/cli.js when installed, src/cli.ts when run from source
    for(const candidate of ['../../package.json', '../package.json']) {
        try {
            return JSON.parse(await readFile(new URL(candidate, import.meta.url), 'utf-8')) as PackageJson;
        } catch{
            // try the next location
        }
    }
    return { version: '0.0.0', description: '' };
}

function parseInteger(value: string): number {
    const parsed = Number.parseInt(value, 10);
    if(Number.isNaN(parsed) || parsed < 0) {
        throw new InvalidArgumentError('Expected a non-negative integer.');
    }
    return parsed;
}

function collect(value: string, previous: string[]): string[] {
    return [...previous, value];
}

const packageJson = await readPackageJson();

const program = new Command();

program
    .name('mcp-router')
    .description(packageJson.description)
    .version(packageJson.version)
    .option('-c, --config <path>', 'Route configuration file')
    .option('--log-level <level>', 'Log level written to stderr (debug, info, warn, error, silent)')
    .hook('preAction', (thisCommand) => {
        const { logLevel } = thisCommand.opts<GlobalOptions>();
        if(logLevel) {
            configureLogger(logLevel);
        }
    });

function globalOptions(): GlobalOptions {
    return program.opts<GlobalOptions>();
}

async function configPath(): Promise<string> {
    const { resolveConfigPath } = await import('./utils/config-paths.js');
    return (await resolveConfigPath({ explicit: globalOptions().config })).path;
}

// Serve command - proxy this stdio session
program
    .command('serve', { isDefault: true })
    .description('Route this stdio session to the backend for the caller\'s working directory')
    .option('-w, --workdir <dir>', 'Working directory to route on (overrides MCP_ROUTER_WORKDIR and PWD)')
    .action(async (options: { workdir?: string }) => {
        const { serve } = await import('./frontend/serve.js');
        const exitCode = await serve({ config: globalOptions().config, workdir: options.workdir });
        // A caller that never closes stdin must not keep the router alive
        // eslint-disable-next-line n/no-process-exit -- session is over, exit with its status
        process.exit(exitCode);
    });

// Which command - dry-run resolution
program
    .command('which')
    .description('Show which backend a path would be routed to')
    .option('-p, --path <dir>', 'Path to resolve (defaults to the working-directory hint)')
    .action(async (options: { path?: string }) => {
        const { loadRouterConfig, toRouteTable } = await import('./config/route-config.js');
        const { explain } = await import('./router/pattern-router.js');
        const { resolveWorkingDirectory } = await import('./session/working-directory.js');
        const { formatResolution } = await import('./commands/format.js');

        const config = await loadRouterConfig(await configPath());
        const workingDirectory = resolveWorkingDirectory({ explicit: options.path });
        const resolution = explain(workingDirectory.path, toRouteTable(config));

        // eslint-disable-next-line no-console -- CLI output to stdout is appropriate
        console.log(formatResolution(resolution).join('\n'));
    });

// List command
program
    .command('list')
    .description('List route patterns in priority order')
    .action(async () => {
        const { loadRawRouterConfig } = await import('./config/route-config.js');
        const { formatRouteList } = await import('./commands/format.js');

        const config = await loadRawRouterConfig(await configPath());
        // eslint-disable-next-line no-console -- CLI output to stdout is appropriate
        console.log(formatRouteList(config).join('\n'));
    });

// Add command
program
    .command('add')
    .description('Add a route pattern (put "--" before backend arguments that start with "-")')
    .argument('<pattern>', 'Path glob (*, ?, [seq], [!seq])')
    .argument('<name>', 'Backend server name')
    .argument('<command>', 'Command that starts the backend')
    .argument('[args...]', 'Arguments for the backend command')
    .option('-d, --description <text>', 'Description of the backend')
    .option('-e, --env <KEY=VALUE>', 'Environment override for the backend (repeatable)', collect, [])
    .option('--position <n>', 'Insert at this 1-based position instead of appending', parseInteger)
    .action(async (pattern: string, name: string, command: string, args: string[], options: { description?: string, env: string[], position?: number }) => {
        const { loadRawRouterConfig, saveRouterConfig, addRoute } = await import('./config/route-config.js');
        const { parseEnvAssignments } = await import('./commands/format.js');

        const path = await configPath();
        const env = parseEnvAssignments(options.env);
        const config = addRoute(await loadRawRouterConfig(path), {
            pattern,
            server: {
                name,
                command,
                args,
                ...(_.isEmpty(env) ? {} : { env }),
                ...(options.description ? { description: options.description } : {}),
            },
        }, options.position === undefined ? undefined : Math.max(options.position - 1, 0));
        await saveRouterConfig(path, config);

        // eslint-disable-next-line no-console -- CLI output to stdout is appropriate
        console.log(`Added mapping: ${pattern} -> ${name}`);
    });

// Remove command
program
    .command('remove')
    .description('Remove every route with exactly this pattern')
    .argument('<pattern>', 'Pattern to remove')
    .action(async (pattern: string) => {
        const { loadRawRouterConfig, saveRouterConfig, removeRoute } = await import('./config/route-config.js');

        const path = await configPath();
        const { config, removed } = removeRoute(await loadRawRouterConfig(path), pattern);
        if(removed === 0) {
            // eslint-disable-next-line no-console -- CLI output to stdout is appropriate
            console.log(`No mapping found for pattern: ${pattern}`);
            return;
        }
        await saveRouterConfig(path, config);
        // eslint-disable-next-line no-console -- CLI output to stdout is appropriate
        console.log(`Removed mapping for pattern: ${pattern}`);
    });

// Set-default command - also creates the configuration file when missing
program
    .command('set-default')
    .description('Set the backend used when no pattern matches')
    .argument('<name>', 'Backend server name')
    .argument('<command>', 'Command that starts the backend')
    .argument('[args...]', 'Arguments for the backend command')
    .option('-d, --description <text>', 'Description of the backend')
    .action(async (name: string, command: string, args: string[], options: { description?: string }) => {
        const { access, constants } = await import('node:fs/promises');
        const { loadRawRouterConfig, saveRouterConfig } = await import('./config/route-config.js');

        const path = await configPath();
        const defaultServer = { name, command, args, ...(options.description ? { description: options.description } : {}) };

        let exists = true;
        try {
            await access(path, constants.F_OK);
        } catch{
            exists = false;
        }

        if(exists) {
            await saveRouterConfig(path, { ...await loadRawRouterConfig(path), defaultServer });
        } else {
            await saveRouterConfig(path, { routes: [], defaultServer });
        }
        // eslint-disable-next-line no-console -- CLI output to stdout is appropriate
        console.log(`Default server: ${name} (${path})`);
    });

// Validate command
program
    .command('validate')
    .description('Validate the configuration file')
    .action(async () => {
        const { loadRawRouterConfig } = await import('./config/route-config.js');
        const { validationWarnings } = await import('./commands/format.js');

        const path = await configPath();
        // eslint-disable-next-line no-console -- CLI output to stdout is appropriate
        console.log(`Validating ${path}...`);

        const config = await loadRawRouterConfig(path);
        for(const warning of validationWarnings(config)) {
            // eslint-disable-next-line no-console -- CLI warning to stderr is appropriate
            console.error(`⚠ ${warning}`);
        }
        // eslint-disable-next-line no-console -- CLI output to stdout is appropriate
        console.log(`✓ Configuration is valid (${config.routes.length} route patterns)`);
    });

// Config-path command
program
    .command('config-path')
    .description('Show the configuration file path')
    .option('-v, --verbose', 'Show where the path came from and the platform directory')
    .action(async (options: { verbose?: boolean }) => {
        const { resolveConfigPath, getConfigDir } = await import('./utils/config-paths.js');
        const resolved = await resolveConfigPath({ explicit: globalOptions().config });

        if(options.verbose) {
            // eslint-disable-next-line no-console -- CLI output to stdout is appropriate
            console.log(`\nConfig file:      ${resolved.path}\nSelected by:      ${resolved.source}\nPlatform folder:  ${getConfigDir()}\n`);
        } else {
            // Just output the path for easy scripting
            // eslint-disable-next-line no-console -- CLI output to stdout is appropriate
            console.log(resolved.path);
        }
    });

// Probe command
program
    .command('probe')
    .description('Start the backend a path resolves to and perform an MCP handshake')
    .option('-p, --path <dir>', 'Path to resolve (defaults to the working-directory hint)')
    .option('-t, --timeout <ms>', 'Handshake timeout in milliseconds', parseInteger, 10000)
    .action(async (options: { path?: string, timeout: number }) => {
        const { loadRouterConfig, toRouteTable } = await import('./config/route-config.js');
        const { explain } = await import('./router/pattern-router.js');
        const { resolveWorkingDirectory } = await import('./session/working-directory.js');
        const { probeServer } = await import('./backend/probe.js');
        const { formatProbeReport } = await import('./commands/format.js');

        const config = await loadRouterConfig(await configPath());
        const workingDirectory = resolveWorkingDirectory({ explicit: options.path });
        const { server } = explain(workingDirectory.path, toRouteTable(config));

        const report = await probeServer(server, workingDirectory.path, options.timeout);
        // eslint-disable-next-line no-console -- CLI output to stdout is appropriate
        console.log(formatProbeReport(server, report).join('\n'));
    });

try {
    await program.parseAsync();
} catch (error) {
    // eslint-disable-next-line no-console -- CLI error message to stderr is appropriate
    console.error(`Error: ${errorMessage(error)}`);
    process.exitCode = error instanceof ConfigurationError ? ExitCodes.CONFIGURATION : 1;
}
