/**
 * Backend Process Supervisor
 *
 * Launches the backend selected for a session as a stdio subprocess:
 * - Builds its environment (inherited + server overrides + working-directory hint)
 * - Reports launch failures as SpawnError
 * - Relays its stderr into the log
 * - Terminates it in stages: close stdin, SIGTERM, SIGKILL
 */

import { spawn as nodeSpawn, type ChildProcess, type SpawnOptions } from 'node:child_process';
import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import _ from 'lodash';
import { SpawnError } from '../errors.js';
import { logger } from '../utils/logger.js';
import { settleWithin } from '../utils/timeout.js';
import { WORKDIR_ENV_VAR } from '../session/working-directory.js';
import type { RouteTarget } from '../types/config.js';

export type SpawnFunction = (command: string, args: readonly string[], options: SpawnOptions) => ChildProcess;

export interface ExitStatus {
    code:   number | null
    signal: NodeJS.Signals | null
}

export interface SpawnRequest {
    inheritedEnv:     NodeJS.ProcessEnv
    workingDirectory: string
}

export interface SupervisorOptions {
    spawn?:         SpawnFunction
    /** Time allowed for a clean exit after stdin is closed */
    gracePeriodMs?: number
    /** Time allowed after SIGTERM before SIGKILL */
    killTimeoutMs?: number
}

/**
 * Handle to one running backend, owned by a single session
 */
export interface ChildHandle {
    readonly pid:        number | undefined
    readonly serverName: string
    readonly input:      Writable
    readonly output:     Readable
    /** null while the process is still running */
    readonly exitStatus: ExitStatus | null
    wait(): Promise<ExitStatus>
    /** Idempotent; resolves once the process has been reaped */
    terminate(): Promise<ExitStatus>
}

export const DEFAULT_GRACE_PERIOD_MS = 2000;
export const DEFAULT_KILL_TIMEOUT_MS = 2000;

/**
 * Environment for the child. Later sources win: inherited, server env, then the hint.
 */
export function buildChildEnv(spec: RouteTarget, request: SpawnRequest): Record<string, string> {
    return {
        ..._.pickBy(request.inheritedEnv, _.isString),
        ...(spec.env ?? {}),
        PWD:               request.workingDirectory,
        [WORKDIR_ENV_VAR]: request.workingDirectory,
    };
}

class SupervisedChild implements ChildHandle {
    readonly input:  Writable;
    readonly output: Readable;
    private status: ExitStatus | null = null;
    private readonly exited: Promise<ExitStatus>;
    private terminating: Promise<ExitStatus> | undefined;

    constructor(
        private readonly child: ChildProcess,
        readonly serverName: string,
        streams: { input: Writable, output: Readable },
        private readonly gracePeriodMs: number,
        private readonly killTimeoutMs: number
    ) {
        this.input = streams.input;
        this.output = streams.output;

        this.exited = new Promise<ExitStatus>((resolve) => {
            child.once('exit', (code: number | null, signal: NodeJS.Signals | null) => {
                this.status = { code, signal };
                logger.info({ serverName, pid: child.pid, code, signal }, 'Backend server exited');
                resolve(this.status);
            });
        });

        child.on('error', (error: Error) => {
            logger.debug({ serverName, error: error.message }, 'Backend process error');
        });

        // EPIPE and friends surface through the forwarder's write callbacks; without
        // a listener the 'error' event would crash the router
        this.input.on('error', (error: Error) => {
            logger.debug({ serverName, error: error.message }, 'Backend stdin error');
        });
        this.output.on('error', (error: Error) => {
            logger.debug({ serverName, error: error.message }, 'Backend stdout error');
        });

        if(child.stderr) {
            const lines = createInterface({ input: child.stderr, crlfDelay: Infinity });
            lines.on('line', (line: string) => {
                const trimmedLine = _.trim(line);
                if(trimmedLine) {
                    logger.info({ serverName, stream: 'stderr' }, trimmedLine);
                }
            });
        }
    }

    get pid(): number | undefined {
        return this.child.pid;
    }

    get exitStatus(): ExitStatus | null {
        return this.status;
    }

    wait(): Promise<ExitStatus> {
        return this.exited;
    }

    terminate(): Promise<ExitStatus> {
        this.terminating ??= this.shutdown();
        return this.terminating;
    }

    private async shutdown(): Promise<ExitStatus> {
        if(this.status) {
            return this.status;
        }

        logger.debug({ serverName: this.serverName, pid: this.pid }, 'Closing backend stdin');
        if(!this.input.writableEnded) {
            this.input.end();
        }

        const graceful = await settleWithin(this.exited, this.gracePeriodMs);
        if(graceful) {
            return graceful;
        }

        logger.warn({ serverName: this.serverName, pid: this.pid, gracePeriodMs: this.gracePeriodMs }, 'Backend did not exit after stdin closed, sending SIGTERM');
        this.child.kill('SIGTERM');

        const terminated = await settleWithin(this.exited, this.killTimeoutMs);
        if(terminated) {
            return terminated;
        }

        logger.warn({ serverName: this.serverName, pid: this.pid, killTimeoutMs: this.killTimeoutMs }, 'Backend ignored SIGTERM, killing');
        this.child.kill('SIGKILL');
        return this.exited;
    }
}

function waitForSpawn(child: ChildProcess, spec: RouteTarget): Promise<void> {
    return new Promise<void>((resolve, reject) => {
        const onSpawn = (): void => {
            child.off('error', onError);
            resolve();
        };
        const onError = (error: Error): void => {
            child.off('spawn', onSpawn);
            reject(new SpawnError(spec.command, spec.args, error));
        };
        child.once('spawn', onSpawn);
        child.once('error', onError);
    });
}

/**
 * Spawns backend servers for sessions
 */
export class ProcessSupervisor {
    private readonly spawnFn: SpawnFunction;
    private readonly gracePeriodMs: number;
    private readonly killTimeoutMs: number;

    constructor(options: SupervisorOptions = {}) {
        this.spawnFn = options.spawn ?? ((command, args, spawnOptions) => nodeSpawn(command, [...args], spawnOptions));
        this.gracePeriodMs = options.gracePeriodMs ?? DEFAULT_GRACE_PERIOD_MS;
        this.killTimeoutMs = options.killTimeoutMs ?? DEFAULT_KILL_TIMEOUT_MS;
    }

    /**
     * Start the backend and resolve once the OS has created the process
     *
     * @throws SpawnError when the command is missing, not executable, or creation is refused
     */
    async spawn(spec: RouteTarget, request: SpawnRequest): Promise<ChildHandle> {
        logger.info({
            serverName:       spec.name,
            command:          spec.command,
            args:             spec.args,
            workingDirectory: request.workingDirectory,
        }, 'Launching backend server');

        let child: ChildProcess;
        try {
            child = this.spawnFn(spec.command, spec.args, {
                env:   buildChildEnv(spec, request),
                stdio: ['pipe', 'pipe', 'pipe'],
                ...(spec.cwd !== undefined ? { cwd: spec.cwd } : {}),
            });
        } catch (error) {
            throw new SpawnError(spec.command, spec.args, error);
        }

        const { stdin, stdout } = child;
        if(!stdin || !stdout) {
            child.kill('SIGKILL');
            throw new SpawnError(spec.command, spec.args, new Error('child stdio is not piped'));
        }

        // Listeners go on before the first await so no exit event is missed
        const handle = new SupervisedChild(child, spec.name, { input: stdin, output: stdout }, this.gracePeriodMs, this.killTimeoutMs);
        await waitForSpawn(child, spec);

        logger.info({ serverName: spec.name, pid: child.pid }, 'Backend server launched');
        return handle;
    }
}
