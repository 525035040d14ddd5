/**
 * Rate-Limited Logger — Reduce Log Spam While Preserving Observability
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * The position monitor runs every 2 seconds. A symbol whose price fetch keeps
 * failing would otherwise print the same line 30 times a minute.
 *
 * USAGE:
 *   rateLimitedLog('monitor', 'BTC/USDT', 'price unavailable, skipping', 20000, 'warn');
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import logger from './logger';

export const RATE_LIMIT_CONFIG = {
    /** Default rate limit (ms) */
    DEFAULT_RATE_LIMIT_MS: 20 * 1000,

    /** Max tracked keys */
    MAX_TRACKED_KEYS: 500,
};

interface RateLimitEntry {
    lastLogTime: number;
    suppressedCount: number;
}

const rateLimitMap = new Map<string, RateLimitEntry>();

/**
 * Log with rate limiting. Returns true if logged, false if suppressed.
 */
export function rateLimitedLog(
    category: string,
    key: string,
    message: string,
    rateLimitMs: number = RATE_LIMIT_CONFIG.DEFAULT_RATE_LIMIT_MS,
    logLevel: 'info' | 'warn' | 'debug' = 'info',
    now: number = Date.now()
): boolean {
    const compositeKey = `${category}:${key}`;
    const existing = rateLimitMap.get(compositeKey);

    if (existing && (now - existing.lastLogTime) < rateLimitMs) {
        existing.suppressedCount++;
        return false;
    }

    let logMessage = `[${category.toUpperCase()}] ${message}`;
    if (existing && existing.suppressedCount > 0) {
        logMessage += ` (suppressed=${existing.suppressedCount})`;
    }

    switch (logLevel) {
        case 'warn':
            logger.warn(logMessage);
            break;
        case 'debug':
            logger.debug(logMessage);
            break;
        default:
            logger.info(logMessage);
    }

    if (!existing && rateLimitMap.size >= RATE_LIMIT_CONFIG.MAX_TRACKED_KEYS) {
        const oldest = rateLimitMap.keys().next();
        if (!oldest.done) {
            rateLimitMap.delete(oldest.value);
        }
    }
    rateLimitMap.set(compositeKey, { lastLogTime: now, suppressedCount: 0 });

    return true;
}

/**
 * Reset all tracking (for testing)
 */
export function resetRateLimitedLogger(): void {
    rateLimitMap.clear();
}
