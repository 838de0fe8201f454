import { logger } from '../modules/observability';
import { errorMessage } from './errors';

export interface RetryOptions {
    attempts?: number;
    delay?: number;
    backoff?: 'fixed' | 'exponential';
    factor?: number;
    /** Total time allowed across all attempts and waits; no new attempt starts after it. */
    maxElapsedMs?: number;
    retryCondition?: (error: unknown) => boolean;
    signal?: AbortSignal;
    label?: string;
}

export const sleep = (ms: number, signal?: AbortSignal): Promise<void> =>
    new Promise<void>((resolve, reject) => {
        if (signal?.aborted) {
            reject(new Error('Aborted'));
            return;
        }

        const onAbort = () => {
            clearTimeout(timer);
            reject(new Error('Aborted'));
        };

        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);

        signal?.addEventListener('abort', onAbort, { once: true });
    });

/**
 * Runs `fn` until it resolves, the retry condition rejects the error, or the attempt /
 * elapsed-time limits are reached. The last error is rethrown.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
    const attempts = options.attempts ?? 3;
    const delay = options.delay ?? 1000;
    const backoff = options.backoff ?? 'exponential';
    const factor = options.factor ?? 2;
    const maxElapsedMs = options.maxElapsedMs ?? Number.POSITIVE_INFINITY;
    const label = options.label ?? 'operation';
    const startedAt = Date.now();

    let lastError: unknown;
    for (let i = 0; i < attempts; i++) {
        try {
            return await fn();
        } catch (error) {
            lastError = error;

            if (options.signal?.aborted) throw error;
            if (options.retryCondition && !options.retryCondition(error)) throw error;
            if (i === attempts - 1) break;

            const waitTime = backoff === 'exponential' ? delay * Math.pow(factor, i) : delay;
            if (Date.now() - startedAt + waitTime > maxElapsedMs) break;

            logger.warn(`[Retry] ${label} failed (attempt ${i + 1}/${attempts}). Retrying in ${waitTime}ms...`, {
                error: errorMessage(error),
            });
            await sleep(waitTime, options.signal);
        }
    }

    throw lastError;
}
