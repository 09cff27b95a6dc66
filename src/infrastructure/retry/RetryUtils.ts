/**
 * Retry Utilities
 *
 * Bounded retry with backoff for transient failures, and a fixed-cadence poller.
 * Shared by engine attachment, render polling and chunked uploads.
 */

export interface RetryOptions {
    /** Maximum number of attempts, including the first (default: 3) */
    maxAttempts?: number;
    /** Initial backoff delay in milliseconds (default: 1000) */
    initialBackoffMs?: number;
    /** Maximum backoff delay in milliseconds (default: 30000) */
    maxBackoffMs?: number;
    /** Backoff multiplier; 1 gives a fixed delay (default: 2) */
    backoffMultiplier?: number;
    /** Optional jitter to add randomness (0-1, default: 0.1) */
    jitter?: number;
    /** Function to determine if error is retryable (default: all errors) */
    isRetryable?: (error: unknown) => boolean;
    /** Callback for each retry attempt */
    onRetry?: (attempt: number, error: unknown, nextDelayMs: number) => void;
}

const DEFAULT_OPTIONS: Required<RetryOptions> = {
    maxAttempts: 3,
    initialBackoffMs: 1000,
    maxBackoffMs: 30000,
    backoffMultiplier: 2,
    jitter: 0.1,
    isRetryable: () => true,
    onRetry: () => { }
};

/**
 * Execute a function with backoff retry logic.
 *
 * @throws The last error if all attempts fail
 */
export async function withRetry<T>(
    fn: (attempt: number) => Promise<T>,
    options?: RetryOptions
): Promise<T> {
    const opts = { ...DEFAULT_OPTIONS, ...options };
    const maxAttempts = Math.max(1, Math.floor(opts.maxAttempts));
    let currentBackoff = opts.initialBackoffMs;

    for (let attempt = 1; ; attempt++) {
        try {
            return await fn(attempt);
        } catch (error) {
            if (attempt >= maxAttempts || !opts.isRetryable(error)) {
                throw error;
            }

            const jitterAmount = currentBackoff * opts.jitter * (Math.random() * 2 - 1);
            const delay = Math.max(0, Math.min(currentBackoff + jitterAmount, opts.maxBackoffMs));

            opts.onRetry(attempt, error, delay);

            await sleep(delay);

            currentBackoff = Math.min(currentBackoff * opts.backoffMultiplier, opts.maxBackoffMs);
        }
    }
}

/**
 * Check if an HTTP error is retryable based on status code.
 * Accepts axios errors (`error.response.status`) and plain `{ status }` objects.
 */
export function isRetryableHttpError(error: unknown): boolean {
    const status = extractStatus(error);

    // Network error (no response)
    if (status === undefined) {
        return true;
    }

    if (status === 429) {
        return true;
    }

    if (status >= 500 && status < 600) {
        return true;
    }

    // Client errors (4xx except 429) are not retryable
    return false;
}

function extractStatus(error: unknown): number | undefined {
    if (typeof error !== 'object' || error === null) {
        return undefined;
    }
    if ('response' in error && typeof error.response === 'object' && error.response !== null
        && 'status' in error.response && typeof error.response.status === 'number') {
        return error.response.status;
    }
    if ('status' in error && typeof error.status === 'number') {
        return error.status;
    }
    return undefined;
}

/**
 * Helper to sleep for a specified duration.
 */
export function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

export interface PollOptions {
    /** Delay between checks */
    intervalMs: number;
    /** Coarser cadence for `onHeartbeat`; independent of the check cadence */
    heartbeatIntervalMs?: number;
    onHeartbeat?: (elapsedMs: number) => void | Promise<void>;
    /** Gives up after this long. 0 or absent polls indefinitely. */
    timeoutMs?: number;
    now?: () => number;
}

export class PollTimeoutError extends Error {
    constructor(public readonly timeoutMs: number) {
        super(`Polling timed out after ${timeoutMs}ms`);
        this.name = 'PollTimeoutError';
    }
}

/**
 * Calls `check` every `intervalMs` until it returns true.
 *
 * @throws PollTimeoutError when `timeoutMs` elapses first
 */
export async function pollUntil(
    check: () => Promise<boolean>,
    options: PollOptions
): Promise<void> {
    const now = options.now ?? Date.now;
    const startedAt = now();
    let lastHeartbeat = startedAt;

    while (!(await check())) {
        const current = now();
        const elapsed = current - startedAt;

        if (options.timeoutMs && elapsed >= options.timeoutMs) {
            throw new PollTimeoutError(options.timeoutMs);
        }

        if (options.onHeartbeat && options.heartbeatIntervalMs !== undefined
            && current - lastHeartbeat >= options.heartbeatIntervalMs) {
            lastHeartbeat = current;
            await options.onHeartbeat(elapsed);
        }

        await sleep(options.intervalMs);
    }
}
