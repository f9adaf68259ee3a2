/**
 * Serve mode
 *
 * Runs one routing session on this process's stdin/stdout:
 * - Loads and validates the route configuration
 * - Wires SIGINT/SIGTERM/SIGHUP to session cancellation
 * - Returns the exit code the process should end with
 */

import type { Readable, Writable } from 'node:stream';
import { ConfigurationError } from '../errors.js';
import { loadRouterConfig, toRouteTable } from '../config/route-config.js';
import { ProcessSupervisor } from '../backend/process-supervisor.js';
import { ExitCodes, Session, type SessionResult } from '../session/session.js';
import { resolveConfigPath } from '../utils/config-paths.js';
import { logger } from '../utils/logger.js';

export interface ServeOptions {
    config?:  string
    workdir?: string
    env?:     NodeJS.ProcessEnv
    input?:   Readable
    output?:  Writable
}

const SHUTDOWN_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGHUP'];

/**
 * Run a session to completion and return the process exit code
 */
export async function serve(options: ServeOptions = {}): Promise<number> {
    const env = options.env ?? process.env;

    let session: Session;
    try {
        const configPath = await resolveConfigPath({ explicit: options.config, env });
        logger.debug({ configPath: configPath.path, source: configPath.source }, 'Using route configuration');

        const config = await loadRouterConfig(configPath.path, env);
        const output = options.output ?? process.stdout;
        session = new Session({
            table:      toRouteTable(config),
            supervisor: new ProcessSupervisor({
                gracePeriodMs: config.shutdown.gracePeriodMs,
                killTimeoutMs: config.shutdown.killTimeoutMs,
            }),
            streams: {
                input:     options.input ?? process.stdin,
                output,
                endOutput: output !== process.stdout,
            },
            workingDirectory: options.workdir,
            env,
            drainTimeoutMs:   config.shutdown.gracePeriodMs,
            signal:           cancelOnSignals(),
        });
    } catch (error) {
        if(error instanceof ConfigurationError) {
            logger.error({ configPath: error.configPath, issues: error.issues }, error.message);
            return ExitCodes.CONFIGURATION;
        }
        throw error;
    }

    let result: SessionResult;
    try {
        result = await session.run();
    } finally {
        removeSignalHandlers();
    }
    return result.exitCode;
}

let signalHandler: ((signal: NodeJS.Signals) => void) | undefined;

function cancelOnSignals(): AbortSignal {
    removeSignalHandlers();
    const controller = new AbortController();
    signalHandler = (signal: NodeJS.Signals) => {
        logger.info({ signal }, 'Received shutdown signal');
        controller.abort(new Error(`received ${signal}`));
    };
    for(const signal of SHUTDOWN_SIGNALS) {
        process.on(signal, signalHandler);
    }
    return controller.signal;
}

function removeSignalHandlers(): void {
    if(!signalHandler) {
        return;
    }
    for(const signal of SHUTDOWN_SIGNALS) {
        process.off(signal, signalHandler);
    }
    signalHandler = undefined;
}
