/**
 * Adaptive Tuner — nudges risk and the ATR entry floor from recent results
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * After every closed trade (once at least `minTrades` exist):
 *   - Rolling Sharpe of ROI over the last `minTrades` trades
 *       > sharpeHigh → riskPct × riskStepUp   (capped at riskCeiling)
 *       < sharpeLow  → riskPct × riskStepDown (floored at riskFloor)
 *     Only in RISK_PERCENT mode; fixed exposure is never tuned.
 *   - Win rate over the same window
 *       < winRateLow  → atrMinPct × 1.1  (pickier entries, capped)
 *       > winRateHigh → atrMinPct × 0.95 (floored)
 *
 * Changes are published as a new settings snapshot via SettingsStore.update();
 * the tuner never edits a snapshot in place.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { TradeOutcome, TradeOutcomeSink } from '../types';
import { SettingsStore, TradingSettings } from '../config/settings';
import logger from '../utils/logger';

export const TUNER_CONFIG = {
    HISTORY_LIMIT: 100,
    MIN_TRADES: 20,
    SHARPE_HIGH: 2.0,
    SHARPE_LOW: 1.0,
    RISK_STEP_UP: 1.05,
    RISK_STEP_DOWN: 0.9,
    RISK_CEILING: 0.02,
    RISK_FLOOR: 0.005,
    WIN_RATE_LOW: 0.4,
    WIN_RATE_HIGH: 0.6,
    ATR_MIN_STEP_UP: 1.1,
    ATR_MIN_STEP_DOWN: 0.95,
    ATR_MIN_CEILING: 0.5,
    ATR_MIN_FLOOR: 0.1,
};

export interface TunerStats {
    trades: number;
    sharpe: number | null;
    winRate: number | null;
}

export function rollingSharpe(rois: readonly number[]): number | null {
    if (rois.length < 2) return null;
    const mean = rois.reduce((a, b) => a + b, 0) / rois.length;
    const variance = rois.reduce((sum, r) => sum + (r - mean) ** 2, 0) / (rois.length - 1);
    const std = Math.sqrt(variance);
    if (std === 0) return null;
    return mean / std;
}

export class AdaptiveTuner implements TradeOutcomeSink {
    private readonly settings: SettingsStore;
    private readonly history: TradeOutcome[] = [];

    constructor(settings: SettingsStore) {
        this.settings = settings;
    }

    record(outcome: TradeOutcome): void {
        this.history.push(outcome);
        if (this.history.length > TUNER_CONFIG.HISTORY_LIMIT) {
            this.history.splice(0, this.history.length - TUNER_CONFIG.HISTORY_LIMIT);
        }

        const stats = this.getStats();
        if (stats.trades < TUNER_CONFIG.MIN_TRADES) return;

        const current = this.settings.current();
        const next = this.tune(current, stats);
        if (next !== current) {
            this.settings.update(() => next, 'tuner');
        }
    }

    getStats(): TunerStats {
        const window = this.history.slice(-TUNER_CONFIG.MIN_TRADES);
        if (window.length === 0) return { trades: this.history.length, sharpe: null, winRate: null };
        const wins = window.filter(t => t.netPnl > 0).length;
        return {
            trades: this.history.length,
            sharpe: rollingSharpe(window.map(t => t.roi)),
            winRate: wins / window.length,
        };
    }

    private tune(current: TradingSettings, stats: TunerStats): TradingSettings {
        let sizingMode = current.sizingMode;
        if (sizingMode.kind === 'RISK_PERCENT' && stats.sharpe !== null) {
            let riskPct = sizingMode.riskPct;
            if (stats.sharpe > TUNER_CONFIG.SHARPE_HIGH) {
                riskPct = Math.min(riskPct * TUNER_CONFIG.RISK_STEP_UP, TUNER_CONFIG.RISK_CEILING);
            } else if (stats.sharpe < TUNER_CONFIG.SHARPE_LOW) {
                riskPct = Math.max(riskPct * TUNER_CONFIG.RISK_STEP_DOWN, TUNER_CONFIG.RISK_FLOOR);
            }
            if (riskPct !== sizingMode.riskPct) {
                logger.info(`[TUNER] sharpe=${stats.sharpe.toFixed(2)} risk ${sizingMode.riskPct.toFixed(4)} → ${riskPct.toFixed(4)}`);
                sizingMode = { kind: 'RISK_PERCENT', riskPct };
            }
        }

        let atrMinPct = current.filters.atrMinPct;
        if (stats.winRate !== null) {
            if (stats.winRate < TUNER_CONFIG.WIN_RATE_LOW) {
                atrMinPct = Math.min(atrMinPct * TUNER_CONFIG.ATR_MIN_STEP_UP, TUNER_CONFIG.ATR_MIN_CEILING);
            } else if (stats.winRate > TUNER_CONFIG.WIN_RATE_HIGH) {
                atrMinPct = Math.max(atrMinPct * TUNER_CONFIG.ATR_MIN_STEP_DOWN, TUNER_CONFIG.ATR_MIN_FLOOR);
            }
            if (atrMinPct !== current.filters.atrMinPct) {
                logger.info(`[TUNER] winRate=${(stats.winRate * 100).toFixed(0)}% atrMinPct ${current.filters.atrMinPct.toFixed(3)} → ${atrMinPct.toFixed(3)}`);
            }
        }

        if (sizingMode === current.sizingMode && atrMinPct === current.filters.atrMinPct) {
            return current;
        }
        return {
            ...current,
            sizingMode,
            filters: { ...current.filters, atrMinPct },
        };
    }
}
