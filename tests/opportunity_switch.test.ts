/**
 * Opportunity Switch Tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Test Cases:
 *   1. Health: fresh profitable LONG, stale losing SHORT, mature improving LONG
 *   2. Opportunity score: strong, weak and mixed setups
 *   3. Switch decision: every KEEP rule, then the SWITCH thresholds
 *   4. Pnl history keeps the newest samples
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import {
    calculatePositionHealth,
    decideSwitch,
    PositionHealth,
    recordPnlSample,
    scoreOpportunity,
} from '../src/engine/opportunitySwitch';
import { DEFAULT_SETTINGS } from '../src/config/settings';
import { createPosition, createRow } from './helpers/fixtures';

const ENTRY_TIME = 1_000_000;
const RULES = DEFAULT_SETTINGS.switching;

function health(score: number, pnlPct: number, ageMinutes: number): PositionHealth {
    return { score, pnlPct, ageMinutes, details: [] };
}

// ═══════════════════════════════════════════════════════════════════════════════
// HEALTH
// ═══════════════════════════════════════════════════════════════════════════════

describe('calculatePositionHealth', () => {
    it('scores a fresh profitable LONG with momentum', () => {
        const result = calculatePositionHealth({
            position: createPosition(),
            row: createRow({ close: 100.5, macd: 0.2, macdSignal: 0.1, rsi: 60, ema8: 101, ema20: 100 }),
            nowSec: ENTRY_TIME + 10 * 60,
            pnlHistory: [0.005],
        });

        expect(result.score).toBe(60);
        expect(result.ageMinutes).toBe(10);
        expect(result.details).toEqual(['in profit', 'macd with us', 'rsi in band', 'ema8 with us', 'fresh']);
    });

    it('scores a stale losing SHORT low', () => {
        const result = calculatePositionHealth({
            position: createPosition({ direction: 'SHORT', sl_price: 106 }),
            row: createRow({ close: 100.2 }),
            nowSec: ENTRY_TIME + 40 * 60,
            pnlHistory: [-0.0005, -0.002],
        });

        expect(result.score).toBe(8);
        expect(result.pnlPct).toBeCloseTo(-0.002, 10);
        expect(result.details).toEqual(['rsi in band']);
    });

    it('rewards an improving trend, stop moves and a mature profit', () => {
        const result = calculatePositionHealth({
            position: createPosition({ sl_moved_count: 3 }),
            row: createRow({ close: 100.4 }),
            nowSec: ENTRY_TIME + 60 * 60,
            pnlHistory: [0.001, 0.002],
        });

        expect(result.score).toBe(78);
        expect(result.details).toEqual(['pnl improving', 'stop moved 3x', 'rsi in band', 'mature and profitable']);
    });
});

// ═══════════════════════════════════════════════════════════════════════════════
// OPPORTUNITY
// ═══════════════════════════════════════════════════════════════════════════════

describe('scoreOpportunity', () => {
    it('gives a strong LONG setup full marks', () => {
        const rows = [createRow({ macdHist: 0.1 }), createRow({ adx: 32, volume: 1600, rsi: 60, macdHist: 0.2 })];
        expect(scoreOpportunity('LONG', rows)).toBe(100);
    });

    it('gives a weak SHORT setup the floor of each component', () => {
        const rows = [createRow({ macdHist: 0 }), createRow({ adx: 15, volume: 800, rsi: 25, macdHist: 0.1 })];
        expect(scoreOpportunity('SHORT', rows)).toBe(25);
    });

    it('scores a histogram that is with us but fading as partial', () => {
        const rows = [createRow({ macdHist: 0.2 }), createRow({ adx: 22, rsi: 75, macdHist: 0.1 })];
        expect(scoreOpportunity('LONG', rows)).toBe(55);
    });

    it('returns zero without rows', () => {
        expect(scoreOpportunity('LONG', [])).toBe(0);
    });
});

// ═══════════════════════════════════════════════════════════════════════════════
// DECISION
// ═══════════════════════════════════════════════════════════════════════════════

describe('decideSwitch', () => {
    it('keeps a position whose stop has moved', () => {
        expect(decideSwitch(health(0, -0.01, 120), 1, 100, RULES)).toEqual({ action: 'KEEP', reason: 'stop moved 1x' });
    });

    it('keeps a position in profit', () => {
        expect(decideSwitch(health(0, 0.004, 120), 0, 100, RULES)).toEqual({ action: 'KEEP', reason: 'in profit 0.40%' });
    });

    it('keeps a position too young to judge', () => {
        expect(decideSwitch(health(0, 0, 10), 0, 100, RULES)).toEqual({ action: 'KEEP', reason: 'too young (10m)' });
    });

    it('keeps a healthy position', () => {
        expect(decideSwitch(health(60, 0, 120), 0, 100, RULES)).toEqual({ action: 'KEEP', reason: 'healthy (60)' });
    });

    it('waits until the position is old enough to switch', () => {
        expect(decideSwitch(health(20, 0, 20), 0, 90, RULES)).toEqual({ action: 'KEEP', reason: 'health 20 vs opportunity 90' });
    });

    it('switches a stale weak position for a strong opportunity', () => {
        expect(decideSwitch(health(20, 0, 45), 0, 90, RULES)).toEqual({ action: 'SWITCH', reason: 'health 20 vs opportunity 90' });
        expect(decideSwitch(health(39, 0, 45), 0, 80, RULES).action).toBe('SWITCH');
    });

    it('keeps middling health or a middling opportunity', () => {
        expect(decideSwitch(health(40, 0, 45), 0, 100, RULES).action).toBe('KEEP');
        expect(decideSwitch(health(10, 0, 45), 0, 79, RULES).action).toBe('KEEP');
    });

    it('requires the opportunity to beat health by the margin', () => {
        const strict = { ...RULES, scoreMargin: 50 };
        expect(decideSwitch(health(35, 0, 45), 0, 80, strict).action).toBe('KEEP');
        expect(decideSwitch(health(25, 0, 45), 0, 80, strict).action).toBe('SWITCH');
    });
});

describe('recordPnlSample', () => {
    it('keeps the newest samples', () => {
        expect(recordPnlSample([1, 2, 3, 4, 5], 6, 5)).toEqual([2, 3, 4, 5, 6]);
        expect(recordPnlSample([], 0.1, 5)).toEqual([0.1]);
    });
});
