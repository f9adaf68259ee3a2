/**
 * Error taxonomy for routing sessions
 *
 * Nothing here is retried: a missing backend or a broken pipe is persistent
 * for the lifetime of the session.
 */

import _ from 'lodash';

export type RouterErrorCode = 'CONFIGURATION' | 'SPAWN' | 'STREAM' | 'CHILD_EXIT';

export abstract class RouterError extends Error {
    abstract readonly code: RouterErrorCode;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * Route configuration is absent or malformed
 */
export class ConfigurationError extends RouterError {
    readonly code = 'CONFIGURATION';
    readonly configPath: string | undefined;
    readonly issues: string[];

    constructor(message: string, details: { configPath?: string, issues?: string[], cause?: unknown } = {}) {
        super(message, { cause: details.cause });
        this.configPath = details.configPath;
        this.issues = details.issues ?? [];
    }
}

/**
 * Backend command could not be started
 */
export class SpawnError extends RouterError {
    readonly code = 'SPAWN';
    readonly command: string;
    readonly args: readonly string[];

    constructor(command: string, args: readonly string[], cause?: unknown) {
        const reason = _.isError(cause) ? cause.message : String(cause ?? 'unknown error');
        super(`Failed to start backend: ${_.trim(`${command} ${args.join(' ')}`)} (${reason})`, { cause });
        this.command = command;
        this.args = args;
    }
}

export type StreamDirection = 'caller-to-child' | 'child-to-caller';

/** Which end of a copy loop failed */
export type StreamSide = 'source' | 'destination';

/**
 * I/O failure while relaying bytes
 */
export class StreamError extends RouterError {
    readonly code = 'STREAM';
    readonly direction: StreamDirection;
    readonly side: StreamSide;

    constructor(direction: StreamDirection, side: StreamSide, cause?: unknown) {
        const reason = _.isError(cause) ? cause.message : String(cause ?? 'unknown error');
        super(`Stream ${side} failed while forwarding ${direction}: ${reason}`, { cause });
        this.direction = direction;
        this.side = side;
    }
}

/**
 * Backend exited with a nonzero status or was killed by a signal
 */
export class ChildExitError extends RouterError {
    readonly code = 'CHILD_EXIT';
    readonly exitCode: number | null;
    readonly signal: NodeJS.Signals | null;

    constructor(serverName: string, exitCode: number | null, signal: NodeJS.Signals | null) {
        const detail = signal ? `signal ${signal}` : `code ${String(exitCode)}`;
        super(`Backend ${serverName} exited with ${detail}`);
        this.exitCode = exitCode;
        this.signal = signal;
    }
}

export function errorMessage(error: unknown): string {
    return _.isError(error) ? error.message : String(error);
}
