/**
 * Timeout Utilities
 *
 * Race a promise against a timer and always clear the timer afterwards, so a
 * finished session never keeps the event loop alive.
 */

export class TimeoutError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'TimeoutError';
    }
}

/**
 * Resolve with the promise's value, or reject with TimeoutError after timeoutMs
 *
 * @example
 * const status = await withTimeout(child.wait(), 2000, 'Backend did not exit');
 */
export async function withTimeout<T>(
    promise: Promise<T>,
    timeoutMs: number,
    timeoutMessage: string
): Promise<T> {
    let timeoutHandle: NodeJS.Timeout | undefined;

    const timeoutPromise = new Promise<never>((_resolve, reject) => {
        timeoutHandle = setTimeout(() => {
            reject(new TimeoutError(timeoutMessage));
        }, timeoutMs);
    });

    try {
        return await Promise.race([promise, timeoutPromise]);
    } finally {
        if(timeoutHandle !== undefined) {
            clearTimeout(timeoutHandle);
        }
    }
}

/**
 * Like withTimeout, but resolves to undefined instead of rejecting when time runs out
 */
export async function settleWithin<T>(promise: Promise<T>, timeoutMs: number): Promise<T | undefined> {
    try {
        return await withTimeout(promise, timeoutMs, 'settle timeout');
    } catch (error) {
        if(error instanceof TimeoutError) {
            return undefined;
        }
        throw error;
    }
}
