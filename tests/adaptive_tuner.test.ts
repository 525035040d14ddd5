/**
 * Adaptive Tuner Tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Test Cases:
 *   1. Nothing changes before the minimum trade count
 *   2. Losing streak raises the ATR entry floor (fixed exposure untouched)
 *   3. Strong Sharpe raises risk in RISK_PERCENT mode, capped
 *   4. Changes arrive as a new snapshot, never in place
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { AdaptiveTuner, rollingSharpe, TUNER_CONFIG } from '../src/tuning/adaptiveTuner';
import { createSettings, SettingsStore } from '../src/config/settings';
import { TradeOutcome } from '../src/types';

function createOutcome(partial: Partial<TradeOutcome> = {}): TradeOutcome {
    return {
        symbol: 'BTC/USDT',
        direction: 'LONG',
        entryPrice: 100,
        exitPrice: 99,
        closedSize: 1,
        grossPnl: -1,
        commission: 0.1,
        partialPnl: 0,
        netPnl: -1.1,
        roi: -0.011,
        reason: 'HARD_CROSS',
        durationSec: 600,
        ...partial,
    };
}

describe('rollingSharpe', () => {
    it('is null without dispersion or history', () => {
        expect(rollingSharpe([0.01])).toBeNull();
        expect(rollingSharpe([0.01, 0.01])).toBeNull();
    });

    it('uses the sample standard deviation', () => {
        expect(rollingSharpe([1, 3])).toBeCloseTo(2 / Math.SQRT2, 10);
    });
});

describe('AdaptiveTuner', () => {
    it('waits for the minimum number of trades', () => {
        const store = new SettingsStore(createSettings());
        const tuner = new AdaptiveTuner(store);
        for (let i = 0; i < TUNER_CONFIG.MIN_TRADES - 1; i++) tuner.record(createOutcome({ roi: -0.01 - i * 0.001 }));
        expect(store.getVersion()).toBe(0);
        expect(tuner.getStats().trades).toBe(TUNER_CONFIG.MIN_TRADES - 1);
    });

    it('raises the ATR floor after a losing run and leaves fixed sizing alone', () => {
        const initial = createSettings();
        const store = new SettingsStore(initial);
        const tuner = new AdaptiveTuner(store);
        for (let i = 0; i < TUNER_CONFIG.MIN_TRADES; i++) tuner.record(createOutcome({ roi: -0.01 - i * 0.001 }));

        expect(store.getVersion()).toBe(1);
        expect(store.current().filters.atrMinPct).toBeCloseTo(0.22, 10);
        expect(store.current().sizingMode).toEqual(initial.sizingMode);
        expect(initial.filters.atrMinPct).toBe(0.2);
    });

    it('raises risk on a strong Sharpe in risk-percent mode', () => {
        const store = new SettingsStore(createSettings({ sizingMode: { kind: 'RISK_PERCENT', riskPct: 0.01 } }));
        const tuner = new AdaptiveTuner(store);
        for (let i = 0; i < TUNER_CONFIG.MIN_TRADES; i++) {
            tuner.record(createOutcome({ netPnl: 1, roi: i % 2 === 0 ? 0.01 : 0.012 }));
        }

        const mode = store.current().sizingMode;
        expect(mode.kind).toBe('RISK_PERCENT');
        if (mode.kind === 'RISK_PERCENT') expect(mode.riskPct).toBeCloseTo(0.0105, 10);
        expect(store.current().filters.atrMinPct).toBeCloseTo(0.19, 10);
    });

    it('never raises risk past the ceiling', () => {
        const store = new SettingsStore(createSettings({ sizingMode: { kind: 'RISK_PERCENT', riskPct: 0.0199 } }));
        const tuner = new AdaptiveTuner(store);
        for (let i = 0; i < TUNER_CONFIG.MIN_TRADES + 5; i++) {
            tuner.record(createOutcome({ netPnl: 1, roi: i % 2 === 0 ? 0.01 : 0.012 }));
        }
        const mode = store.current().sizingMode;
        if (mode.kind !== 'RISK_PERCENT') throw new Error('expected risk-percent sizing');
        expect(mode.riskPct).toBe(TUNER_CONFIG.RISK_CEILING);
    });
});
