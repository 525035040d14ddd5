/**
 * Strategy Cycle Tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Test Cases:
 *   1. Daily drawdown blocks entries; open positions still get the exit chain
 *   2. Missing balance and the daily-close window block entries
 *   3. Flat market: filters pass, no signal
 *   4. Accelerating trend: one LONG entry, and only one per cycle
 *   5. One symbol's failure does not stop the others
 *   6. Full book: a stale position is switched out for a strong candidate
 *   7. Full book: a position whose stop has moved is kept
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { StrategyCycle } from '../src/runtime/strategyCycle';
import { PositionLifecycle } from '../src/engine/positionLifecycle';
import { OrderExecutor } from '../src/execution/orderExecutor';
import { createSettings, DEFAULT_SETTINGS, SettingsStore, TradingSettings } from '../src/config/settings';
import { StateManager } from '../src/storage/stateManager';
import { fatal } from '../src/utils/result';
import { Candle, TradeOutcome } from '../src/types';
import { FakeClock, FakeExchange, noSleep } from './helpers/fakeExchange';
import { createPosition, tempStatePath } from './helpers/fixtures';

const CANDLE_MS = 15 * 60 * 1000;
const MIDDAY = Date.UTC(2024, 0, 2, 12, 0);
const SYMBOLS = ['BTC/USDT', 'ETH/USDT'];

// ═══════════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

interface Harness {
    exchange: FakeExchange;
    state: StateManager;
    cycle: StrategyCycle;
    clock: FakeClock;
    outcomes: TradeOutcome[];
}

function createHarness(nowMs: number = MIDDAY + 10_000, overrides: Partial<TradingSettings> = {}): Harness {
    const exchange = new FakeExchange();
    const outcomes: TradeOutcome[] = [];
    const settings = new SettingsStore(createSettings({ symbols: SYMBOLS, ...overrides }));
    const state = new StateManager(tempStatePath());
    const clock = new FakeClock(nowMs);
    const lifecycle = new PositionLifecycle({
        executor: new OrderExecutor(exchange, settings, noSleep),
        state,
        settings,
        outcomes: { record: outcome => { outcomes.push(outcome); } },
        clock,
    });
    const cycle = new StrategyCycle({ exchange, state, lifecycle, settings, clock, sleep: noSleep });
    return { exchange, state, cycle, clock, outcomes };
}

/** Candles that all closed before `candleStartMs`, one per close value */
function candlesBefore(candleStartMs: number, closes: number[]): Candle[] {
    return closes.map((close, i) => ({
        timestamp: candleStartMs - (closes.length - i) * CANDLE_MS,
        open: close,
        high: close + 1,
        low: close - 1,
        close,
        volume: 1000,
    }));
}

const flat = (): number[] => Array.from({ length: 60 }, () => 100);
const accelerating = (): number[] => Array.from({ length: 60 }, (_, i) => 100 + 0.01 * i * i);

// ═══════════════════════════════════════════════════════════════════════════════
// ACCOUNT GATES
// ═══════════════════════════════════════════════════════════════════════════════

describe('account gates', () => {
    it('blocks entries on the daily drawdown but still evaluates exits', async () => {
        const { exchange, state, cycle, clock } = createHarness();
        const nowSec = Math.floor(clock.now() / 1000);
        state.resetDailyIfNewDay(nowSec);
        state.addDailyPnl(-50);
        state.setPosition('ETH/USDT', createPosition({ entry_time: nowSec - 60 }));
        exchange.setPosition('ETH/USDT', 'long', 1, 100);
        exchange.candles.set('ETH/USDT', candlesBefore(MIDDAY, flat()));
        exchange.candles.set('BTC/USDT', candlesBefore(MIDDAY, accelerating()));

        const report = await cycle.run(MIDDAY);

        expect(report.entriesAllowed).toBe(false);
        expect(report.blockedReason).toBe('daily drawdown limit hit (pnl=-50.00)');
        expect(report.evaluatedExits).toEqual(['ETH/USDT']);
        expect(report.entered).toBeNull();
        expect(exchange.countCalls('fetchOhlcv')).toBe(1);
    });

    it('blocks entries when the balance cannot be read', async () => {
        const { exchange, cycle } = createHarness();
        exchange.failNext('getBalance', fatal('down'));
        const report = await cycle.run(MIDDAY);
        expect(report.blockedReason).toBe('balance unavailable: fatal down');
        expect(exchange.countCalls('fetchOhlcv')).toBe(0);
    });

    it('blocks entries around the daily close', async () => {
        const lateEvening = Date.UTC(2024, 0, 2, 23, 45);
        const { cycle } = createHarness(lateEvening + 10_000);
        const report = await cycle.run(lateEvening);
        expect(report.entriesAllowed).toBe(false);
        expect(report.blockedReason).toBe('daily close window');
    });
});

// ═══════════════════════════════════════════════════════════════════════════════
// ENTRIES
// ═══════════════════════════════════════════════════════════════════════════════

describe('entries', () => {
    it('finds no signal in a flat market', async () => {
        const { exchange, state, cycle } = createHarness();
        for (const symbol of SYMBOLS) exchange.candles.set(symbol, candlesBefore(MIDDAY, flat()));

        const report = await cycle.run(MIDDAY);

        expect(report.entered).toBeNull();
        expect(report.skipped['BTC/USDT']).toMatch(/^no signal/);
        expect(report.skipped['ETH/USDT']).toMatch(/^no signal/);
        expect(state.getOpenSymbols()).toEqual([]);
    });

    it('opens one LONG on an accelerating trend and no second entry', async () => {
        const { exchange, state, cycle } = createHarness();
        const closes = accelerating();
        for (const symbol of SYMBOLS) {
            exchange.candles.set(symbol, candlesBefore(MIDDAY, closes));
            exchange.prices.set(symbol, closes[closes.length - 1]);
        }

        const report = await cycle.run(MIDDAY);

        expect(report.entered).toBe('BTC/USDT');
        expect(state.getOpenSymbols()).toEqual(['BTC/USDT']);
        expect(state.getPosition('BTC/USDT')?.direction).toBe('LONG');
        expect(report.skipped['ETH/USDT']).toMatch(/^another candidate entered \(score \d+\)$/);
        expect(exchange.countCalls('fetchOhlcv')).toBe(2);
    });

    it('drops the forming candle before deciding', async () => {
        const { exchange, cycle } = createHarness();
        // the last candle starts at MIDDAY, so it is still forming and only 59 remain
        const candles = candlesBefore(MIDDAY + CANDLE_MS, flat());
        exchange.candles.set('BTC/USDT', candles);
        exchange.candles.set('ETH/USDT', candles.slice(0, 40));

        const report = await cycle.run(MIDDAY);

        expect(report.skipped['BTC/USDT']).toMatch(/^no signal/);
        expect(report.skipped['ETH/USDT']).toBe('indicator series incomplete');
    });

    it('keeps going after one symbol fails', async () => {
        const { exchange, cycle } = createHarness();
        exchange.failNext('fetchOhlcv', fatal('boom'));
        exchange.candles.set('ETH/USDT', candlesBefore(MIDDAY, flat()));

        const report = await cycle.run(MIDDAY);

        expect(report.skipped['BTC/USDT']).toBe('candles unavailable: fatal boom');
        expect(report.skipped['ETH/USDT']).toMatch(/^no signal/);
    });
});

// ═══════════════════════════════════════════════════════════════════════════════
// OPPORTUNITY SWITCH
// ═══════════════════════════════════════════════════════════════════════════════

describe('opportunity switch', () => {
    const switchSettings: Partial<TradingSettings> = {
        maxOpenSymbols: 1,
        switching: { ...DEFAULT_SETTINGS.switching, minOpportunityScore: 40, scoreMargin: 20 },
    };

    /** ETH held flat for 45 minutes on a still-rising series, BTC signalling */
    function fullBook(slMovedCount: number): Harness {
        const harness = createHarness(MIDDAY + 10_000, switchSettings);
        const { exchange, state, clock } = harness;
        const closes = accelerating();
        const last = closes[closes.length - 1];
        const nowSec = Math.floor(clock.now() / 1000);

        for (const symbol of SYMBOLS) {
            exchange.candles.set(symbol, candlesBefore(MIDDAY, closes));
            exchange.prices.set(symbol, last);
        }
        state.setPosition('ETH/USDT', createPosition({
            entry_price: last,
            sl_price: last - 1,
            p_max: last,
            p_min: last,
            sl_moved_count: slMovedCount,
            entry_time: nowSec - 45 * 60,
        }));
        exchange.setPosition('ETH/USDT', 'long', 1, last);
        return harness;
    }

    it('closes a stale position and enters the stronger candidate', async () => {
        const { state, cycle, outcomes } = fullBook(0);

        const report = await cycle.run(MIDDAY);

        expect(report.evaluatedExits).toEqual(['ETH/USDT']);
        expect(report.switched).toBe('ETH/USDT');
        expect(report.entered).toBe('BTC/USDT');
        expect(outcomes.map(o => [o.symbol, o.reason])).toEqual([['ETH/USDT', 'OPPORTUNITY_SWITCH']]);
        expect(state.getOpenSymbols()).toEqual(['BTC/USDT']);
    });

    it('keeps a position whose stop has already moved', async () => {
        const { state, cycle, outcomes } = fullBook(1);

        const report = await cycle.run(MIDDAY);

        expect(report.switched).toBeNull();
        expect(report.entered).toBeNull();
        expect(report.skipped['BTC/USDT']).toBe('max open symbols reached (1/1), no position worth switching');
        expect(outcomes).toEqual([]);
        expect(state.getOpenSymbols()).toEqual(['ETH/USDT']);
    });
});
