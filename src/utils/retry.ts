/**
 * Retry Policy — applied at the exchange call boundary
 *
 * RULES:
 * - Only `retryable` results are retried; `fatal` returns immediately
 * - Delay before retry n (0-based) is baseDelayMs × 2^n
 * - After the last attempt the final failure is returned, never thrown
 */

import logger from './logger';
import { CallResult, describeFailure } from './result';
import { sleep as realSleep } from './clock';

export interface RetryPolicy {
    attempts: number;
    baseDelayMs: number;
}

export async function withRetry<T>(
    operationName: string,
    call: () => Promise<CallResult<T>>,
    policy: RetryPolicy,
    sleep: (ms: number) => Promise<void> = realSleep
): Promise<CallResult<T>> {
    const attempts = Math.max(1, policy.attempts);
    let result = await call();

    for (let attempt = 0; attempt < attempts - 1 && result.kind === 'retryable'; attempt++) {
        const delay = policy.baseDelayMs * Math.pow(2, attempt);
        logger.warn(`[RETRY] ${operationName} attempt ${attempt + 1}/${attempts} failed (${describeFailure(result)}), retrying in ${delay}ms`);
        await sleep(delay);
        result = await call();
    }

    if (result.kind !== 'ok') {
        logger.error(`[RETRY] ${operationName} gave up: ${describeFailure(result)}`);
    }

    return result;
}
