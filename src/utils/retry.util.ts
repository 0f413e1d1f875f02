/**
 * Retry Utility
 *
 * Backoff arithmetic, an abortable sleep and transient-error
 * classification used by the judge orchestrator's retry loop.
 */
export class RetryUtil {
    /**
     * Delay before the retry that follows attempt number `attempt` (1-based):
     * baseDelay * multiplier^(attempt - 1), capped at maxDelay
     */
    static backoffDelay(
        baseDelay: number,
        attempt: number,
        options: { backoffMultiplier?: number; maxDelay?: number } = {}
    ): number {
        const { backoffMultiplier = 2, maxDelay = Number.POSITIVE_INFINITY } = options;
        return Math.min(baseDelay * Math.pow(backoffMultiplier, attempt - 1), maxDelay);
    }

    /**
     * Sleep for specified milliseconds. Resolves early when the signal aborts.
     */
    static sleep(ms: number, signal?: AbortSignal): Promise<void> {
        return new Promise(resolve => {
            if (signal?.aborted) {
                resolve();
                return;
            }

            const onAbort = () => {
                clearTimeout(timer);
                resolve();
            };
            const timer = setTimeout(() => {
                signal?.removeEventListener('abort', onAbort);
                resolve();
            }, ms);

            signal?.addEventListener('abort', onAbort, { once: true });
        });
    }

    /**
     * Check if error is retryable
     */
    static isRetryableError(error: unknown): boolean {
        if (typeof error !== 'object' || error === null) {
            return false;
        }

        const code = 'code' in error ? error.code : undefined;
        const status = 'status' in error ? error.status : undefined;
        const message = 'message' in error && typeof error.message === 'string'
            ? error.message.toLowerCase()
            : '';

        // Network errors
        if (code === 'ECONNRESET' || code === 'ENOTFOUND' || code === 'ECONNREFUSED') {
            return true;
        }

        // Timeout errors
        if (code === 'ETIMEDOUT' || message.includes('timeout') || message.includes('timed out')) {
            return true;
        }

        // Rate limiting and upstream failures
        if (status === 408 || status === 409 || status === 429 || (typeof status === 'number' && status >= 500)) {
            return true;
        }

        if (message.includes('rate limit') || message.includes('quota')) {
            return true;
        }

        if (message.includes('connection') || message.includes('network')) {
            return true;
        }

        return false;
    }
}

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;
