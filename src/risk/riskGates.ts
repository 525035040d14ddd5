/**
 * Entry Risk Gates
 *
 * Account-level checks that decide whether the strategy cycle may open
 * anything at all, and whether a given symbol may be entered. All pure.
 */

export interface CandidateGateInput {
    nowSec: number;
    tradesLastHour: readonly number[];
    maxTradesPerHour: number;
    lastTradeTime: number | null;
    cooldownMinutes: number;
}

export type GateVerdict = { allowed: true } | { allowed: false; reason: string };

const ALLOWED: GateVerdict = { allowed: true };

/**
 * Minutes since UTC midnight inside [start, 24h) ∪ [0, end) — the window
 * around the daily candle close where funding and settlement distort price.
 */
export function isInDailyCloseWindow(nowMs: number, startMinute: number, endMinute: number): boolean {
    const date = new Date(nowMs);
    const minuteOfDay = date.getUTCHours() * 60 + date.getUTCMinutes();
    if (startMinute <= endMinute) {
        return minuteOfDay >= startMinute && minuteOfDay < endMinute;
    }
    return minuteOfDay >= startMinute || minuteOfDay < endMinute;
}

export function isDailyDrawdownBreached(dailyPnl: number, balance: number, limitPct: number): boolean {
    if (!(balance > 0)) return false;
    return dailyPnl / balance <= -limitPct;
}

export function isSymbolInCooldown(lastTradeTime: number | null, nowSec: number, cooldownMinutes: number): boolean {
    if (lastTradeTime === null) return false;
    return nowSec - lastTradeTime < cooldownMinutes * 60;
}

export function isBookFull(openSymbols: number, maxOpenSymbols: number): boolean {
    return openSymbols >= maxOpenSymbols;
}

/**
 * Trades-per-hour cap and cooldown. A symbol passing this may still wait for a
 * free slot, or take one through an opportunity switch.
 */
export function checkCandidateGate(input: CandidateGateInput): GateVerdict {
    const recent = input.tradesLastHour.filter(t => input.nowSec - t < 3600).length;
    if (recent >= input.maxTradesPerHour) {
        return { allowed: false, reason: `trade rate cap reached (${recent}/${input.maxTradesPerHour} in last hour)` };
    }
    if (isSymbolInCooldown(input.lastTradeTime, input.nowSec, input.cooldownMinutes)) {
        return { allowed: false, reason: `cooldown active (${input.cooldownMinutes}m)` };
    }
    return ALLOWED;
}
