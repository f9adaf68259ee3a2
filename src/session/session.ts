/**
 * Routing Session
 *
 * One end-to-end lifecycle for a single caller connection:
 *
 *   INIT -> ROUTING -> SPAWNING -> FORWARDING -> CLOSING_CLEAN | CLOSING_ERROR -> TERMINATED
 *
 * The session resolves its target once, spawns exactly one backend, relays
 * bytes until a terminal condition, and always reaps the backend before it
 * reports TERMINATED.
 */

import type { Readable, Writable } from 'node:stream';
import _ from 'lodash';
import { ChildExitError, RouterError, SpawnError, StreamError } from '../errors.js';
import { explain } from '../router/pattern-router.js';
import { ProcessSupervisor, type ChildHandle, type ExitStatus } from '../backend/process-supervisor.js';
import { forward, type Forwarding, type LoopResult } from '../proxy/stream-forwarder.js';
import { resolveWorkingDirectory, type WorkingDirectory } from './working-directory.js';
import { logger } from '../utils/logger.js';
import { settleWithin } from '../utils/timeout.js';
import type { RouteTable, RouteTarget } from '../types/config.js';

export enum SessionState {
    INIT = 'INIT',
    ROUTING = 'ROUTING',
    SPAWNING = 'SPAWNING',
    FORWARDING = 'FORWARDING',
    CLOSING_CLEAN = 'CLOSING_CLEAN',
    CLOSING_ERROR = 'CLOSING_ERROR',
    TERMINATED = 'TERMINATED'
}

const TRANSITIONS: Record<SessionState, readonly SessionState[]> = {
    [SessionState.INIT]:          [SessionState.ROUTING],
    [SessionState.ROUTING]:       [SessionState.SPAWNING],
    [SessionState.SPAWNING]:      [SessionState.FORWARDING, SessionState.CLOSING_ERROR],
    [SessionState.FORWARDING]:    [SessionState.CLOSING_CLEAN, SessionState.CLOSING_ERROR],
    [SessionState.CLOSING_CLEAN]: [SessionState.TERMINATED],
    [SessionState.CLOSING_ERROR]: [SessionState.TERMINATED],
    [SessionState.TERMINATED]:    [],
};

export type SessionEndReason
    = | 'child-exited'
      | 'caller-closed'
      | 'cancelled'
      | 'spawn-failed'
      | 'stream-failed'
      | 'child-failed';

/**
 * Process exit codes for the router itself, so a supervising host can tell
 * "backend not found" from "backend crashed" from "caller disconnected"
 */
export const ExitCodes = {
    CLEAN:         0,
    CHILD_FAILED:  70,
    SPAWN_FAILED:  69,
    STREAM_FAILED: 74,
    CONFIGURATION: 78,
} as const;

export interface SessionResult {
    outcome:          'clean' | 'error'
    reason:           SessionEndReason
    target:           RouteTarget
    workingDirectory: WorkingDirectory
    exitStatus?:      ExitStatus
    error?:           RouterError
    exitCode:         number
}

export interface SessionStreams {
    input:  Readable
    output: Writable
    /** Whether output may be ended when the backend's output ends */
    endOutput?: boolean
}

export interface SessionOptions {
    table:             RouteTable
    streams:           SessionStreams
    supervisor?:       ProcessSupervisor
    /** Explicit working-directory override (e.g. --workdir) */
    workingDirectory?: string
    env?:              NodeJS.ProcessEnv
    cwd?:              () => string
    /** Upper bound for draining backend output after a terminal condition */
    drainTimeoutMs?:   number
    /** Aborting ends the session and terminates the backend */
    signal?:           AbortSignal
}

interface Decision {
    reason:      SessionEndReason
    exitStatus?: ExitStatus
    error?:      RouterError
}

type ForwardingEvent
    = | { kind: 'exit', status: ExitStatus }
      | { kind: 'input', result: LoopResult }
      | { kind: 'output-failed', result: LoopResult }
      | { kind: 'cancelled' };

const DEFAULT_DRAIN_TIMEOUT_MS = 2000;

export function exitCodeFor(reason: SessionEndReason): number {
    switch(reason) {
        case 'child-exited':
        case 'caller-closed':
        case 'cancelled':
            return ExitCodes.CLEAN;
        case 'spawn-failed':
            return ExitCodes.SPAWN_FAILED;
        case 'stream-failed':
            return ExitCodes.STREAM_FAILED;
        case 'child-failed':
            return ExitCodes.CHILD_FAILED;
    }
}

export class Session {
    private currentState = SessionState.INIT;
    private target: RouteTarget | undefined;
    private child: ChildHandle | undefined;
    private readonly supervisor: ProcessSupervisor;
    private readonly drainTimeoutMs: number;

    constructor(private readonly options: SessionOptions) {
        this.supervisor = options.supervisor ?? new ProcessSupervisor();
        this.drainTimeoutMs = options.drainTimeoutMs ?? DEFAULT_DRAIN_TIMEOUT_MS;
    }

    get state(): SessionState {
        return this.currentState;
    }

    get resolvedTarget(): RouteTarget | undefined {
        return this.target;
    }

    private transition(next: SessionState): void {
        if(!_.includes(TRANSITIONS[this.currentState], next)) {
            throw new Error(`Invalid session transition ${this.currentState} -> ${next}`);
        }
        logger.debug({ from: this.currentState, to: next }, 'Session state change');
        this.currentState = next;
    }

    /**
     * Run the session to completion. Never rejects for routing, spawn, stream
     * or backend failures; those are reported in the result.
     */
    async run(): Promise<SessionResult> {
        if(this.currentState !== SessionState.INIT) {
            throw new Error('Session has already been started');
        }

        this.transition(SessionState.ROUTING);
        const workingDirectory = resolveWorkingDirectory({
            explicit: this.options.workingDirectory,
            env:      this.options.env,
            cwd:      this.options.cwd,
        });
        const resolution = explain(workingDirectory.path, this.options.table);
        const target = resolution.server;
        this.target = target;
        logger.info({
            workingDirectory: resolution.path,
            source:           workingDirectory.source,
            pattern:          resolution.pattern,
            serverName:       target.name,
        }, resolution.pattern === null ? 'No pattern matched, using default server' : 'Matched route pattern');

        this.transition(SessionState.SPAWNING);
        let child: ChildHandle;
        try {
            child = await this.supervisor.spawn(target, {
                inheritedEnv:     this.options.env ?? process.env,
                workingDirectory: workingDirectory.path,
            });
        } catch (error) {
            const spawnError = error instanceof SpawnError ? error : new SpawnError(target.command, target.args, error);
            this.transition(SessionState.CLOSING_ERROR);
            return this.finish({ reason: 'spawn-failed', error: spawnError }, workingDirectory);
        }
        this.child = child;

        this.transition(SessionState.FORWARDING);
        const { streams } = this.options;
        const forwarding = forward(streams.input, streams.output, child.input, child.output, {
            endCallerOutput: streams.endOutput ?? true,
        });

        let decision: Decision;
        try {
            decision = await this.forwardUntilDone(child, forwarding);
        } catch (error) {
            forwarding.stop();
            await child.terminate();
            throw error;
        }

        this.transition(decision.error ? SessionState.CLOSING_ERROR : SessionState.CLOSING_CLEAN);
        forwarding.stop();
        await child.terminate();
        return this.finish(decision, workingDirectory);
    }

    private async forwardUntilDone(child: ChildHandle, forwarding: Forwarding): Promise<Decision> {
        const { signal } = this.options;
        const never = new Promise<never>(_.noop);

        let resolveCancelled: (event: ForwardingEvent) => void = _.noop;
        const cancelled = new Promise<ForwardingEvent>((resolve) => {
            resolveCancelled = resolve;
        });
        const onAbort = (): void => resolveCancelled({ kind: 'cancelled' });
        if(signal?.aborted) {
            onAbort();
        } else {
            signal?.addEventListener('abort', onAbort, { once: true });
        }

        let event: ForwardingEvent;
        try {
            event = await Promise.race<ForwardingEvent>([
                child.wait().then((status): ForwardingEvent => ({ kind: 'exit', status })),
                forwarding.callerToChild.then((result): ForwardingEvent => ({ kind: 'input', result })),
                // A clean end of backend output is not terminal; the exit status decides
                forwarding.childToCaller.then((result): ForwardingEvent | Promise<never> => (result.status === 'failed' ? { kind: 'output-failed', result } : never)),
                cancelled,
            ]);
        } finally {
            signal?.removeEventListener('abort', onAbort);
        }

        switch(event.kind) {
            case 'exit':
                // Deliver whatever the backend wrote before exiting
                await settleWithin(forwarding.childToCaller, this.drainTimeoutMs);
                return this.decideByExit(child.serverName, event.status);

            case 'input':
                return this.afterInputLoop(child, forwarding, event.result);

            case 'output-failed':
                return { reason: 'stream-failed', error: failureOf(event.result) };

            case 'cancelled':
                logger.info({ serverName: child.serverName }, 'Session cancelled, terminating backend');
                return { reason: 'cancelled' };
        }
    }

    private async afterInputLoop(child: ChildHandle, forwarding: Forwarding, result: LoopResult): Promise<Decision> {
        if(result.status === 'ended') {
            logger.info({ serverName: child.serverName, bytes: result.bytes }, 'Caller closed input, shutting down backend');
            const status = await child.terminate();
            await settleWithin(forwarding.childToCaller, this.drainTimeoutMs);
            return { reason: 'caller-closed', exitStatus: status };
        }

        const error = failureOf(result);
        if(error.side === 'destination') {
            // The backend closed its stdin; its exit status is the better signal
            const status = await settleWithin(child.wait(), this.drainTimeoutMs);
            if(status) {
                await settleWithin(forwarding.childToCaller, this.drainTimeoutMs);
                return this.decideByExit(child.serverName, status);
            }
        }
        return { reason: 'stream-failed', error };
    }

    private decideByExit(serverName: string, status: ExitStatus): Decision {
        if(status.code === 0 && status.signal === null) {
            return { reason: 'child-exited', exitStatus: status };
        }
        return {
            reason:     'child-failed',
            exitStatus: status,
            error:      new ChildExitError(serverName, status.code, status.signal),
        };
    }

    private finish(decision: Decision, workingDirectory: WorkingDirectory): SessionResult {
        const target = this.target;
        if(!target) {
            throw new Error('Session finished before routing');
        }

        this.transition(SessionState.TERMINATED);
        const exitStatus = decision.exitStatus ?? this.child?.exitStatus ?? undefined;
        const result: SessionResult = {
            outcome:  decision.error ? 'error' : 'clean',
            reason:   decision.reason,
            target,
            workingDirectory,
            exitCode: exitCodeFor(decision.reason),
            ...(exitStatus ? { exitStatus } : {}),
            ...(decision.error ? { error: decision.error } : {}),
        };

        if(decision.error) {
            logger.error({ serverName: target.name, reason: decision.reason, error: decision.error.message, exitStatus }, 'Session ended with error');
        } else {
            logger.info({ serverName: target.name, reason: decision.reason, exitStatus }, 'Session ended');
        }
        return result;
    }
}

function failureOf(result: LoopResult): StreamError {
    if(result.status === 'failed') {
        return result.error;
    }
    return new StreamError(result.direction, 'source', new Error(`loop ${result.status}`));
}
