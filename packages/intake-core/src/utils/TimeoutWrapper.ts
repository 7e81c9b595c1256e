/**
 * Timeout Wrapper Utility
 *
 * Bounds remote calls that have no timeout of their own. The call gets a signal
 * that is aborted when the timeout fires, so it can drop the request it started.
 */

export class TimeoutError extends Error {
    constructor(label: string, public readonly timeoutMs: number) {
        super(`${label} timed out after ${timeoutMs}ms`);
        this.name = 'TimeoutError';
    }
}

/**
 * Execute an async function with timeout
 * @param timeoutMs - Timeout in milliseconds
 * @param label - Label for error messages
 * @returns Promise that rejects with a TimeoutError if the timeout is exceeded
 */
export async function withTimeout<T>(
    fn: (signal: AbortSignal) => Promise<T>,
    timeoutMs: number,
    label: string = 'Operation'
): Promise<T> {
    let timeoutHandle: NodeJS.Timeout | undefined;
    const controller = new AbortController();

    const timeoutPromise = new Promise<never>((_, reject) => {
        timeoutHandle = setTimeout(() => {
            const error = new TimeoutError(label, timeoutMs);
            controller.abort(error);
            reject(error);
        }, timeoutMs);
    });

    try {
        return await Promise.race([fn(controller.signal), timeoutPromise]);
    } finally {
        clearTimeout(timeoutHandle);
    }
}
