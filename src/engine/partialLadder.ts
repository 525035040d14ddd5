/**
 * Partial Take-Profit Ladder
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * FIXED LADDER:
 *   Levels are walked in order; the first untriggered level whose threshold is
 *   met fires and nothing else fires that tick. Level 1 moves the stop to
 *   entry ± firstLevelStopBufferPct; level i > 1 moves it to level i-1's price.
 *
 * DYNAMIC LADDER (only once every fixed level has fired):
 *   Level n (1-based) targets startPct + n × incrementPct, closes closePct of the
 *   current size and moves the stop to startPct + (n-1) × incrementPct. It has
 *   no last level and never closes 100%.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { PositionRecord } from '../types';
import { DynamicLadderConfig, LadderLevel } from '../config/settings';
import { pnlPct, priceAtPct } from '../risk/stopCalculator';

export type LadderAction =
    | {
        kind: 'FIXED';
        levelName: string;
        levelIndex: number;
        thresholdPct: number;
        closeAmount: number;
        newStop: number;
    }
    | {
        kind: 'DYNAMIC';
        level: number;
        thresholdPct: number;
        closeAmount: number;
        newStop: number;
    };

export interface LadderSettings {
    fixedLadder: readonly LadderLevel[];
    dynamicLadder: DynamicLadderConfig;
    firstLevelStopBufferPct: number;
}

export function createPartialsMap(levels: readonly LadderLevel[]): Record<string, boolean> {
    const partials: Record<string, boolean> = {};
    for (const level of levels) partials[level.name] = false;
    return partials;
}

export function dynamicLevelTarget(config: DynamicLadderConfig, level: number): number {
    return config.startPct + level * config.incrementPct;
}

/**
 * The single ladder action this tick's price calls for, or null.
 */
export function evaluatePartialLadder(
    position: PositionRecord,
    price: number,
    settings: LadderSettings
): LadderAction | null {
    const { direction, entry_price: entry } = position;
    const pnl = pnlPct(direction, entry, price);
    const levels = settings.fixedLadder;

    for (let i = 0; i < levels.length; i++) {
        const level = levels[i];
        if (position.partials[level.name]) continue;
        if (pnl < level.pct) return null;

        const stopPct = i === 0 ? settings.firstLevelStopBufferPct : levels[i - 1].pct;
        return {
            kind: 'FIXED',
            levelName: level.name,
            levelIndex: i,
            thresholdPct: level.pct,
            closeAmount: position.size * level.closePct,
            newStop: priceAtPct(direction, entry, stopPct),
        };
    }

    const next = position.last_dynamic_level + 1;
    const target = dynamicLevelTarget(settings.dynamicLadder, next);
    if (pnl < target) return null;

    return {
        kind: 'DYNAMIC',
        level: next,
        thresholdPct: target,
        closeAmount: position.size * settings.dynamicLadder.closePct,
        newStop: priceAtPct(direction, entry, dynamicLevelTarget(settings.dynamicLadder, next - 1)),
    };
}

/**
 * Realised PnL of one partial: (fill − entry) × filled in the position's
 * favour, minus commission on both legs of the closed amount.
 */
export function partialRealisedPnl(
    position: Pick<PositionRecord, 'direction' | 'entry_price'>,
    fillPrice: number,
    filled: number,
    commissionRate: number
): number {
    const sign = position.direction === 'LONG' ? 1 : -1;
    const gross = sign * (fillPrice - position.entry_price) * filled;
    const commission = commissionRate * (position.entry_price + fillPrice) * filled;
    return gross - commission;
}
