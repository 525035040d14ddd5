/**
 * Exposure Sizer — order size from balance, stop distance and portfolio headroom
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * ORDER OF OPERATIONS:
 *   1. Target size from the sizing mode (fixed USD exposure or % of balance at risk)
 *   2. Shrink to the remaining total-exposure headroom; no headroom → reject
 *   3. Shrink to what the balance can margin (with commission buffer)
 *   4. Floor to the lot step, then grow to exchange minimums
 *      (min amount, min notional × safety buffer) and re-check 2 and 3
 *
 * NEVER throws. A rejection is size 0 with a reason, which callers read as
 * "no trade this cycle".
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { PositionRecord } from '../types';
import { SizingMode } from '../config/settings';
import { MarketLimits } from '../exchange/types';
import { ceilToStep, floorToStep } from '../utils/math';
import logger from '../utils/logger';

export interface SizingInput {
    symbol: string;
    entryPrice: number;
    stopPrice: number;
    balance: number;
    openPositions: readonly Pick<PositionRecord, 'size' | 'entry_price'>[];
    limits: MarketLimits;
    sizingMode: SizingMode;
    leverage: number;
    maxTotalExposureUsd: number;
    commissionBuffer: number;
    minNotionalBuffer: number;
}

export type SizingResult =
    | { size: number; notional: number; rejected: false }
    | { size: 0; notional: 0; rejected: true; reason: string };

// Float slack when comparing a stepped notional back against a USD limit.
const EPSILON = 1e-9;

export function currentExposure(positions: readonly Pick<PositionRecord, 'size' | 'entry_price'>[]): number {
    return positions.reduce((sum, p) => sum + p.size * p.entry_price, 0);
}

function reject(symbol: string, reason: string): SizingResult {
    logger.info(`[SIZER] ${symbol} rejected: ${reason}`);
    return { size: 0, notional: 0, rejected: true, reason };
}

export function calculatePositionSize(input: SizingInput): SizingResult {
    const { symbol, entryPrice, stopPrice, balance, limits, leverage } = input;

    if (!(entryPrice > 0) || !(balance > 0) || !(leverage > 0)) {
        return reject(symbol, `invalid inputs entry=${entryPrice} balance=${balance} leverage=${leverage}`);
    }

    // 1. Target
    let targetSize: number;
    if (input.sizingMode.kind === 'RISK_PERCENT') {
        const stopDistance = Math.abs(entryPrice - stopPrice);
        if (!(stopDistance > 0)) return reject(symbol, 'zero stop distance');
        targetSize = (balance * input.sizingMode.riskPct) / stopDistance;
    } else {
        targetSize = input.sizingMode.exposureUsd / entryPrice;
    }
    let exposure = targetSize * entryPrice;

    // 2. Headroom
    const headroom = input.maxTotalExposureUsd - currentExposure(input.openPositions);
    if (headroom <= 0) {
        return reject(symbol, `no exposure headroom (max=${input.maxTotalExposureUsd})`);
    }
    if (exposure > headroom) {
        logger.info(`[SIZER] ${symbol} shrinking exposure $${exposure.toFixed(2)} → headroom $${headroom.toFixed(2)}`);
        exposure = headroom;
    }

    // 3. Margin
    const maxByMargin = (balance * leverage) / input.commissionBuffer;
    if ((exposure * input.commissionBuffer) / leverage > balance) {
        logger.info(`[SIZER] ${symbol} shrinking exposure $${exposure.toFixed(2)} → margin cap $${maxByMargin.toFixed(2)}`);
        exposure = maxByMargin;
    }

    // 4. Lot step and minimums
    let size = floorToStep(exposure / entryPrice, limits.amountStep);

    if (size < limits.minAmount) {
        size = ceilToStep(limits.minAmount, limits.amountStep);
    }
    const minNotional = limits.minNotional * input.minNotionalBuffer;
    if (size * entryPrice < minNotional) {
        size = ceilToStep(minNotional / entryPrice, limits.amountStep);
    }
    if (!(size > 0)) return reject(symbol, 'size rounds to zero');

    const notional = size * entryPrice;
    if (notional > headroom + EPSILON) {
        return reject(symbol, `exchange minimum $${notional.toFixed(2)} exceeds headroom $${headroom.toFixed(2)}`);
    }
    if ((notional * input.commissionBuffer) / leverage > balance + EPSILON) {
        return reject(symbol, `exchange minimum $${notional.toFixed(2)} exceeds available margin`);
    }

    return { size, notional, rejected: false };
}
