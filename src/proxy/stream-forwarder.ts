/**
 * Stream Forwarder
 *
 * Two independent copy loops between the MCP client and the backend:
 *   caller-to-child: callerIn  -> childIn   (ends childIn at EOF)
 *   child-to-caller: childOut  -> callerOut (ends callerOut at EOF when allowed)
 *
 * Bytes are relayed untouched. Each chunk is fully written (write callback
 * observed) before the next read from the same source, so order within a
 * direction is preserved and partial writes never interleave. There is no
 * idle timeout.
 */

import { addAbortSignal, type Readable, type Writable } from 'node:stream';
import _ from 'lodash';
import { StreamError, type StreamDirection } from '../errors.js';
import { logger } from '../utils/logger.js';

export type LoopResult
    = | { direction: StreamDirection, status: 'ended', bytes: number }
      | { direction: StreamDirection, status: 'failed', bytes: number, error: StreamError }
      | { direction: StreamDirection, status: 'aborted', bytes: number };

export interface ForwardOptions {
    /** End callerOut when the backend's output ends (false for process.stdout) */
    endCallerOutput?: boolean
    /** Aborting stops both loops */
    signal?:          AbortSignal
}

export interface Forwarding {
    readonly callerToChild: Promise<LoopResult>
    readonly childToCaller: Promise<LoopResult>
    /** Stop both loops; already settled loops keep their result */
    stop(): void
}

class DestinationWriteError extends Error {
    constructor(readonly writeError: unknown) {
        super('write failed');
    }
}

function toBuffer(chunk: unknown): Buffer {
    if(Buffer.isBuffer(chunk)) {
        return chunk;
    }
    if(chunk instanceof Uint8Array) {
        return Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength);
    }
    return Buffer.from(String(chunk), 'utf-8');
}

/**
 * Resolve once destination has accepted the whole chunk
 */
function writeFully(destination: Writable, chunk: Buffer, signal: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
        if(signal.aborted) {
            reject(signal.reason);
            return;
        }
        const onAbort = (): void => {
            reject(signal.reason);
        };
        signal.addEventListener('abort', onAbort, { once: true });
        destination.write(chunk, (error) => {
            signal.removeEventListener('abort', onAbort);
            if(error) {
                reject(new DestinationWriteError(error));
            } else {
                resolve();
            }
        });
    });
}

function endDestination(destination: Writable): Promise<void> {
    return new Promise<void>((resolve) => {
        if(destination.writableEnded || destination.destroyed) {
            resolve();
            return;
        }
        // end() callbacks are not invoked when the stream errors instead
        const onError = (): void => resolve();
        destination.once('error', onError);
        destination.end(() => {
            destination.off('error', onError);
            resolve();
        });
    });
}

async function copyLoop(
    direction: StreamDirection,
    source: Readable,
    destination: Writable,
    endAtEof: boolean,
    signal: AbortSignal
): Promise<LoopResult> {
    let bytes = 0;

    try {
        for await (const chunk of source) {
            const buffer = toBuffer(chunk);
            await writeFully(destination, buffer, signal);
            bytes += buffer.length;
        }
    } catch (error) {
        if(signal.aborted) {
            logger.debug({ direction, bytes }, 'Forwarding loop stopped');
            return { direction, status: 'aborted', bytes };
        }
        const side = error instanceof DestinationWriteError ? 'destination' : 'source';
        const streamError = new StreamError(direction, side, error instanceof DestinationWriteError ? error.writeError : error);
        logger.warn({ direction, side, bytes, error: streamError.message }, 'Forwarding loop failed');
        return { direction, status: 'failed', bytes, error: streamError };
    }

    if(signal.aborted) {
        return { direction, status: 'aborted', bytes };
    }

    if(endAtEof) {
        await endDestination(destination);
    }
    logger.debug({ direction, bytes }, 'Forwarding loop reached end of stream');
    return { direction, status: 'ended', bytes };
}

/**
 * Start both copy loops. They run concurrently and settle independently.
 */
export function forward(
    callerIn: Readable,
    callerOut: Writable,
    childIn: Writable,
    childOut: Readable,
    options: ForwardOptions = {}
): Forwarding {
    const controller = new AbortController();
    const { signal } = options;
    const onAbort = (): void => controller.abort(signal?.reason);
    if(signal?.aborted) {
        onAbort();
    } else {
        signal?.addEventListener('abort', onAbort, { once: true });
    }
    // Detach from the caller's signal once both loops have settled
    const detach = _.after(2, () => signal?.removeEventListener('abort', onAbort));

    // Write failures are reported through write callbacks; the matching 'error'
    // event still needs a listener or it would be thrown
    for(const [direction, destination] of [['caller-to-child', childIn], ['child-to-caller', callerOut]] as const) {
        destination.on('error', (error: Error) => {
            logger.debug({ direction, error: error.message }, 'Destination stream error');
        });
    }

    // Aborting destroys the sources, which unblocks a pending read
    addAbortSignal(controller.signal, callerIn);
    addAbortSignal(controller.signal, childOut);

    return {
        callerToChild: copyLoop('caller-to-child', callerIn, childIn, true, controller.signal).finally(detach),
        childToCaller: copyLoop('child-to-caller', childOut, callerOut, options.endCallerOutput ?? true, controller.signal).finally(detach),
        stop:          () => controller.abort(),
    };
}
