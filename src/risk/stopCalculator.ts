/**
 * Stop Calculator — pure stop-price arithmetic
 *
 * INVARIANT: a stop only ever moves in the position's favour. Every stop
 * change in the engine goes through ratchetStop().
 */

import { Direction } from '../types';
import { StopSettings } from '../config/settings';

/** +1 for LONG, -1 for SHORT */
export function directionSign(direction: Direction): 1 | -1 {
    return direction === 'LONG' ? 1 : -1;
}

/**
 * Favourable move from entry as a fraction of entry (negative when losing).
 */
export function pnlPct(direction: Direction, entryPrice: number, price: number): number {
    return (directionSign(direction) * (price - entryPrice)) / entryPrice;
}

/**
 * Price `pct` away from entry on the favourable side (negative pct = loss side).
 */
export function priceAtPct(direction: Direction, entryPrice: number, pct: number): number {
    return entryPrice * (1 + directionSign(direction) * pct);
}

/**
 * ATR-based initial stop. The distance is clamped to [minStopPct, maxStopPct]
 * of entry so that a dead-quiet or wildly volatile ATR still yields a usable stop.
 */
export function calculateInitialStop(
    entryPrice: number,
    atr: number,
    direction: Direction,
    settings: Pick<StopSettings, 'initialAtrMult' | 'minStopPct' | 'maxStopPct'>
): number {
    const rawDistance = atr * settings.initialAtrMult;
    const minDistance = entryPrice * settings.minStopPct;
    const maxDistance = entryPrice * settings.maxStopPct;
    const distance = Math.min(Math.max(rawDistance, minDistance), maxDistance);
    return direction === 'LONG' ? entryPrice - distance : entryPrice + distance;
}

/**
 * Trailing stop candidate from the favourable extreme (p_max for LONG, p_min for SHORT).
 */
export function calculateTrailingStop(extreme: number, atr: number, direction: Direction, atrMult: number): number {
    return direction === 'LONG' ? extreme - atr * atrMult : extreme + atr * atrMult;
}

export function isStopImprovement(current: number, candidate: number, direction: Direction): boolean {
    if (!Number.isFinite(candidate)) return false;
    return direction === 'LONG' ? candidate > current : candidate < current;
}

/**
 * The tighter of the two stops in the position's favour.
 */
export function ratchetStop(current: number, candidate: number, direction: Direction): number {
    return isStopImprovement(current, candidate, direction) ? candidate : current;
}

/**
 * True while the stop still sits on the losing side of entry.
 */
export function isStopOnLossSide(stop: number, entryPrice: number, direction: Direction): boolean {
    return direction === 'LONG' ? stop < entryPrice : stop > entryPrice;
}
