import { logInfo, logWarn } from './logger.js';

/** Configuration for the retry helper. */
export interface RetryOptions {
    /** Maximum number of attempts (including the first). @default 3 */
    maxAttempts?: number;
    /** Base delay in ms before the first retry. @default 1000 */
    baseDelayMs?: number;
    /** Multiplier applied to the delay after each failed attempt. @default 2 */
    backoffFactor?: number;
    /** Maximum delay cap in ms. @default 15000 */
    maxDelayMs?: number;
    /** Label used in log messages for traceability. */
    label?: string;
    /** Errors for which this returns false end the loop after the failing attempt. */
    isRetryable?: (error: unknown) => boolean;
    /** Once aborted, no further attempt starts and pending backoff ends early. */
    signal?: AbortSignal;
}

/** Result of a retried operation. */
export interface RetryResult<T> {
    ok: boolean;
    value?: T;
    error?: string;
    /** The error thrown by the last attempt. */
    cause?: unknown;
    /** True when the loop stopped because the error was not retryable. */
    permanent?: boolean;
    attempts: number;
    totalDurationMs: number;
}

const DEFAULTS: Required<Omit<RetryOptions, 'label' | 'isRetryable' | 'signal'>> = {
    maxAttempts: 3,
    baseDelayMs: 1000,
    backoffFactor: 2,
    maxDelayMs: 15_000,
};

/**
 * Execute an async function with bounded exponential backoff retry.
 *
 * - Retries up to `maxAttempts` times on failure.
 * - Delay grows by `backoffFactor` after each attempt (capped at `maxDelayMs`).
 * - A non-retryable error or an aborted signal ends the loop early.
 *
 * @example
 * ```ts
 * const result = await withRetry(
 *   () => store.put(key, body),
 *   { maxAttempts: 3, label: `upload:${key}`, isRetryable: isRetryableStoreError },
 * );
 * ```
 */
export async function withRetry<T>(
    fn: () => Promise<T>,
    options: RetryOptions = {},
): Promise<RetryResult<T>> {
    const maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULTS.maxAttempts);
    const baseDelayMs = options.baseDelayMs ?? DEFAULTS.baseDelayMs;
    const backoffFactor = options.backoffFactor ?? DEFAULTS.backoffFactor;
    const maxDelayMs = options.maxDelayMs ?? DEFAULTS.maxDelayMs;
    const label = options.label ?? 'unnamed';
    const isRetryable = options.isRetryable ?? (() => true);
    const signal = options.signal;

    const start = Date.now();
    let lastError = '';
    let lastCause: unknown;
    let attempts = 0;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        if (signal?.aborted) {
            break;
        }
        attempts = attempt;

        try {
            const value = await fn();
            const totalDurationMs = Date.now() - start;

            if (attempt > 1) {
                void logInfo(
                    `[Retry] ${label} succeeded on attempt ${attempt}/${maxAttempts} (${totalDurationMs}ms).`,
                );
            }

            return { ok: true, value, attempts: attempt, totalDurationMs };
        } catch (err) {
            lastCause = err;
            lastError = err instanceof Error ? err.message : String(err);

            if (!isRetryable(err)) {
                void logWarn(`[Retry] ${label} failed with a non-retryable error: ${lastError}.`);
                return {
                    ok: false,
                    error: lastError,
                    cause: err,
                    permanent: true,
                    attempts: attempt,
                    totalDurationMs: Date.now() - start,
                };
            }

            if (attempt < maxAttempts) {
                const delay = Math.min(baseDelayMs * backoffFactor ** (attempt - 1), maxDelayMs);
                void logWarn(
                    `[Retry] ${label} attempt ${attempt}/${maxAttempts} failed: ${lastError}. Retrying in ${delay}ms.`,
                );
                await sleep(delay, signal);
            } else {
                void logWarn(
                    `[Retry] ${label} exhausted all ${maxAttempts} attempts. Last error: ${lastError}.`,
                );
            }
        }
    }

    return {
        ok: false,
        error: lastError || (signal?.aborted ? 'aborted' : 'no attempt made'),
        cause: lastCause,
        attempts,
        totalDurationMs: Date.now() - start,
    };
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (ms <= 0) {
        return Promise.resolve();
    }
    return new Promise((resolve) => {
        const timer = setTimeout(done, ms);
        function done(): void {
            clearTimeout(timer);
            signal?.removeEventListener('abort', done);
            resolve();
        }
        signal?.addEventListener('abort', done, { once: true });
    });
}
