/**
 * Opportunity Switch
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * When every slot is taken and a flat symbol fires a strong signal, the cycle
 * asks whether one of the open positions is stale enough to give way.
 *
 * HEALTH (0–100) of an open position:
 *   pnl trend     30 improving, 15 flat (first sample: 15 when in profit)
 *   stop moves    25 at 3+, 15 at 1+
 *   momentum      MACD with us 10, RSI in its band 8, EMA8 vs EMA20 with us 7
 *   time          20 under 15m, 10 under 30m, later 15 when pnl > 0.3%
 *
 * OPPORTUNITY (0–100) of a fresh signal, four components of 25:
 *   ADX strength, volume vs SMA20, RSI room, MACD histogram with us and growing
 *
 * KEEP when any holds: stop ever moved, pnl > keepProfitPct, younger than
 * minAgeToEvaluateMinutes, health >= keepHealth.
 * SWITCH only when all hold: age >= minAgeMinutes, health < maxHealth,
 * score >= minOpportunityScore, score > health + scoreMargin.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { Direction, IndicatorRow, PositionRecord } from '../types';
import { SwitchSettings } from '../config/settings';
import { pnlPct } from '../risk/stopCalculator';

export interface PositionHealth {
    score: number;
    pnlPct: number;
    ageMinutes: number;
    details: string[];
}

export interface HealthInput {
    position: PositionRecord;
    row: IndicatorRow;
    nowSec: number;
    /** recent pnl samples, oldest first, ending with the current one */
    pnlHistory: readonly number[];
}

export type SwitchDecision =
    | { action: 'KEEP'; reason: string }
    | { action: 'SWITCH'; reason: string };

const PNL_FLAT_BAND = 0.001;
const PROFIT_AFTER_30M = 0.003;

export function calculatePositionHealth(input: HealthInput): PositionHealth {
    const { position, row, nowSec, pnlHistory } = input;
    const isLong = position.direction === 'LONG';
    const pnl = pnlPct(position.direction, position.entry_price, row.close);
    const ageMinutes = (nowSec - position.entry_time) / 60;
    const details: string[] = [];
    let score = 0;

    if (pnlHistory.length >= 2) {
        const change = pnlHistory[pnlHistory.length - 1] - pnlHistory[pnlHistory.length - 2];
        if (change > 0) {
            score += 30;
            details.push('pnl improving');
        } else if (Math.abs(change) < PNL_FLAT_BAND) {
            score += 15;
            details.push('pnl flat');
        }
    } else if (pnl > 0) {
        score += 15;
        details.push('in profit');
    }

    if (position.sl_moved_count >= 3) {
        score += 25;
        details.push(`stop moved ${position.sl_moved_count}x`);
    } else if (position.sl_moved_count >= 1) {
        score += 15;
        details.push(`stop moved ${position.sl_moved_count}x`);
    }

    if (isLong ? row.macd > row.macdSignal : row.macd < row.macdSignal) {
        score += 10;
        details.push('macd with us');
    }
    const rsiInBand = isLong ? row.rsi > 45 && row.rsi < 70 : row.rsi > 30 && row.rsi < 55;
    if (rsiInBand) {
        score += 8;
        details.push('rsi in band');
    }
    if (isLong ? row.ema8 > row.ema20 : row.ema8 < row.ema20) {
        score += 7;
        details.push('ema8 with us');
    }

    if (ageMinutes < 15) {
        score += 20;
        details.push('fresh');
    } else if (ageMinutes < 30) {
        score += 10;
        details.push('young');
    } else if (pnl > PROFIT_AFTER_30M) {
        score += 15;
        details.push('mature and profitable');
    }

    return { score, pnlPct: pnl, ageMinutes, details };
}

/**
 * Quality of a fresh entry signal; `rows` must end with the signal candle.
 */
export function scoreOpportunity(direction: Direction, rows: readonly IndicatorRow[]): number {
    const last = rows[rows.length - 1];
    if (!last) return 0;
    const prev = rows.length >= 2 ? rows[rows.length - 2] : last;
    const isLong = direction === 'LONG';
    let score = 0;

    score += last.adx >= 30 ? 25 : last.adx >= 20 ? 15 : 5;

    const volumeRatio = last.volumeSma20 > 0 ? last.volume / last.volumeSma20 : 0;
    score += volumeRatio >= 1.5 ? 25 : volumeRatio >= 1.0 ? 15 : 5;

    const rsiRoom = isLong ? last.rsi >= 50 && last.rsi < 70 : last.rsi > 30 && last.rsi <= 50;
    score += rsiRoom ? 25 : 10;

    const histWithUs = isLong ? last.macdHist > 0 : last.macdHist < 0;
    const histGrowing = isLong ? last.macdHist > prev.macdHist : last.macdHist < prev.macdHist;
    score += histWithUs && histGrowing ? 25 : histWithUs ? 15 : 5;

    return score;
}

export function decideSwitch(
    health: PositionHealth,
    slMovedCount: number,
    opportunityScore: number,
    rules: SwitchSettings
): SwitchDecision {
    if (slMovedCount > 0) return { action: 'KEEP', reason: `stop moved ${slMovedCount}x` };
    if (health.pnlPct > rules.keepProfitPct) return { action: 'KEEP', reason: `in profit ${(health.pnlPct * 100).toFixed(2)}%` };
    if (health.ageMinutes < rules.minAgeToEvaluateMinutes) return { action: 'KEEP', reason: `too young (${health.ageMinutes.toFixed(0)}m)` };
    if (health.score >= rules.keepHealth) return { action: 'KEEP', reason: `healthy (${health.score})` };

    const canSwitch =
        health.ageMinutes >= rules.minAgeMinutes &&
        health.score < rules.maxHealth &&
        opportunityScore >= rules.minOpportunityScore &&
        opportunityScore > health.score + rules.scoreMargin;
    if (!canSwitch) {
        return { action: 'KEEP', reason: `health ${health.score} vs opportunity ${opportunityScore}` };
    }
    return { action: 'SWITCH', reason: `health ${health.score} vs opportunity ${opportunityScore}` };
}

/**
 * Appends `pnl` and keeps the newest `limit` samples.
 */
export function recordPnlSample(history: readonly number[], pnl: number, limit: number): number[] {
    return [...history, pnl].slice(-limit);
}
