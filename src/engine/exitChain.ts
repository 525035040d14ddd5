/**
 * Exit Priority Chain
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * STRICT ORDER — first exit wins, one exit per tick:
 *    1. EARLY_INVALIDATION  adverse move > earlyInvalidationAtrMult × atr_entry
 *    2. (breakeven ratchet, not an exit)
 *    3. ATR_EXTREME         closed ATR > atrExtremeMult × atr_entry
 *    4. STRUCTURE_BREAK     close beyond the latest opposite swing
 *    5. MOMENTUM_REVERSAL   MACD histogram against us and worsening
 *    6. HARD_CROSS          EMA20/EMA50 inverted against us
 *    7. STAGNATION          older than stagnationMinutes and losing
 *    8. TIME_LIMIT          older than timeLimitHours and |pnl| < noise
 *    9. SOFT_TREND          EMA20 flat/turning and close on the wrong side,
 *                           unless the MACD histogram is with us and growing
 *   10. (trailing ratchet, not an exit)
 *
 * 'realtime' mode (monitor tick, live price) runs 1–2.
 * 'candle' mode (strategy tick, closed candles) runs 1–10.
 *
 * Stop moves from 2 and 10 are merged through ratchetStop(), so the result
 * never loosens the current stop.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { ExitReason, IndicatorRow, PositionRecord } from '../types';
import { ExitSettings, StopSettings } from '../config/settings';
import {
    calculateTrailingStop,
    isStopImprovement,
    pnlPct,
    priceAtPct,
    ratchetStop,
} from '../risk/stopCalculator';
import { findSwingLevels } from '../risk/structureDetector';

export interface ExitSignal {
    reason: ExitReason;
    detail: string;
}

export interface ExitChainResult {
    exit: ExitSignal | null;
    /** improved stop price, or null when the stop stays where it is */
    newStop: number | null;
    breakevenTriggered: boolean;
    trailingMoved: boolean;
    pnlPct: number;
}

interface ExitChainBase {
    position: PositionRecord;
    nowSec: number;
    exits: ExitSettings;
    stops: StopSettings;
}

export type ExitChainInput =
    | (ExitChainBase & { mode: 'realtime'; price: number })
    | (ExitChainBase & { mode: 'candle'; candles: readonly IndicatorRow[] });

function hold(position: PositionRecord, pnl: number, stop: number, breakevenTriggered: boolean, trailingMoved: boolean): ExitChainResult {
    return {
        exit: null,
        newStop: stop !== position.sl_price ? stop : null,
        breakevenTriggered,
        trailingMoved,
        pnlPct: pnl,
    };
}

function exitWith(reason: ExitReason, detail: string, pnl: number): ExitChainResult {
    return { exit: { reason, detail }, newStop: null, breakevenTriggered: false, trailingMoved: false, pnlPct: pnl };
}

export function evaluateExitChain(input: ExitChainInput): ExitChainResult {
    const { position, exits, stops } = input;
    const { direction, entry_price: entry, atr_entry: atrEntry } = position;
    const isLong = direction === 'LONG';

    const candles = input.mode === 'candle' ? input.candles : [];
    const last = candles.length > 0 ? candles[candles.length - 1] : null;
    const prev = candles.length > 1 ? candles[candles.length - 2] : null;
    const price = input.mode === 'realtime' ? input.price : last ? last.close : NaN;

    if (!Number.isFinite(price)) {
        return hold(position, 0, position.sl_price, false, false);
    }

    const pnl = pnlPct(direction, entry, price);
    let stop = position.sl_price;

    // 1. Early invalidation
    const invalidationDistance = exits.earlyInvalidationAtrMult * atrEntry;
    const invalidated = isLong ? price < entry - invalidationDistance : price > entry + invalidationDistance;
    if (invalidated) {
        return exitWith('EARLY_INVALIDATION', `price=${price} beyond ${exits.earlyInvalidationAtrMult}×ATR(${atrEntry}) from entry ${entry}`, pnl);
    }

    // 2. Breakeven ratchet
    let breakevenTriggered = false;
    if (!position.breakeven_triggered && pnl >= exits.breakevenTriggerPct) {
        breakevenTriggered = true;
        stop = ratchetStop(stop, priceAtPct(direction, entry, exits.breakevenBufferPct), direction);
    }

    if (input.mode === 'realtime' || last === null) {
        return hold(position, pnl, stop, breakevenTriggered, false);
    }

    // 3. ATR extreme
    if (last.atr > exits.atrExtremeMult * atrEntry) {
        return exitWith('ATR_EXTREME', `atr=${last.atr.toFixed(4)} > ${exits.atrExtremeMult}×${atrEntry}`, pnl);
    }

    // 4. Structure break
    const swings = findSwingLevels(candles);
    if (isLong && swings.swingLow && last.close < swings.swingLow.price) {
        return exitWith('STRUCTURE_BREAK', `close=${last.close} < swing low ${swings.swingLow.price}`, pnl);
    }
    if (!isLong && swings.swingHigh && last.close > swings.swingHigh.price) {
        return exitWith('STRUCTURE_BREAK', `close=${last.close} > swing high ${swings.swingHigh.price}`, pnl);
    }

    // 5. Momentum reversal
    if (prev) {
        const reversing = isLong
            ? last.macdHist < 0 && last.macdHist < prev.macdHist
            : last.macdHist > 0 && last.macdHist > prev.macdHist;
        if (reversing) {
            return exitWith('MOMENTUM_REVERSAL', `macdHist ${prev.macdHist.toFixed(5)} → ${last.macdHist.toFixed(5)}`, pnl);
        }
    }

    // 6. Hard cross
    const crossed = isLong ? last.ema20 < last.ema50 : last.ema20 > last.ema50;
    if (crossed) {
        return exitWith('HARD_CROSS', `ema20=${last.ema20.toFixed(4)} ema50=${last.ema50.toFixed(4)}`, pnl);
    }

    // 7. Stagnation
    const ageSec = input.nowSec - position.entry_time;
    if (ageSec > exits.stagnationMinutes * 60 && pnl < 0) {
        return exitWith('STAGNATION', `age=${Math.round(ageSec / 60)}m pnl=${(pnl * 100).toFixed(3)}%`, pnl);
    }

    // 8. Time limit
    if (ageSec > exits.timeLimitHours * 3600 && Math.abs(pnl) < exits.timeLimitNoisePct) {
        return exitWith('TIME_LIMIT', `age=${(ageSec / 3600).toFixed(1)}h pnl=${(pnl * 100).toFixed(3)}%`, pnl);
    }

    // 9. Soft trend
    if (prev) {
        const slope = last.ema20 - prev.ema20;
        const weakening = isLong ? slope <= 0 && last.close < last.ema20 : slope >= 0 && last.close > last.ema20;
        const strongMomentum = isLong
            ? last.macdHist > 0 && last.macdHist > prev.macdHist
            : last.macdHist < 0 && last.macdHist < prev.macdHist;
        if (weakening && !strongMomentum) {
            return exitWith('SOFT_TREND', `ema20 slope=${slope.toFixed(5)} close=${last.close}`, pnl);
        }
    }

    // 10. Trailing ratchet
    const extreme = isLong ? position.p_max : position.p_min;
    const trailing = calculateTrailingStop(extreme, last.atr, direction, stops.trailingAtrMult);
    const trailingMoved = isStopImprovement(stop, trailing, direction);
    stop = ratchetStop(stop, trailing, direction);

    return hold(position, pnl, stop, breakevenTriggered, trailingMoved);
}
