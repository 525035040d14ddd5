/**
 * Strategy Tests — indicators, entry filters and signals
 *
 * Test Cases:
 *   1. Indicator primitives against hand-computed values
 *   2. Warm-up rows are incomplete; the forming candle is dropped
 *   3. ATR band, range and spread filters
 *   4. LONG / SHORT / no signal
 */

import { emaSeries, rsiSeries, smaSeries } from '../src/utils/math';
import { closedRows, computeIndicators, isRowComplete, latestAtr } from '../src/strategy/indicators';
import { checkRange, checkSpread, checkVolatilityBand } from '../src/strategy/filters';
import { evaluateEntrySignal } from '../src/strategy/entrySignals';
import { DEFAULT_SETTINGS } from '../src/config/settings';
import { Candle } from '../src/types';
import { createRow } from './helpers/fixtures';

const FILTERS = DEFAULT_SETTINGS.filters;

function flatCandles(count: number): Candle[] {
    return Array.from({ length: count }, (_, i) => ({
        timestamp: i * 900_000,
        open: 100,
        high: 101,
        low: 99,
        close: 100,
        volume: 1000,
    }));
}

describe('indicator primitives', () => {
    it('sma', () => {
        const out = smaSeries([1, 2, 3, 4, 5], 3);
        expect(out.slice(0, 2).every(Number.isNaN)).toBe(true);
        expect(out.slice(2)).toEqual([2, 3, 4]);
    });

    it('ema is seeded with the sma', () => {
        const out = emaSeries([1, 2, 3, 4], 2);
        expect(Number.isNaN(out[0])).toBe(true);
        expect(out[1]).toBeCloseTo(1.5, 10);
        expect(out[2]).toBeCloseTo(2.5, 10);
        expect(out[3]).toBeCloseTo(3.5, 10);
    });

    it('rsi is 100 on a strictly rising series', () => {
        const close = Array.from({ length: 20 }, (_, i) => 100 + i);
        const out = rsiSeries(close, 14);
        expect(Number.isNaN(out[13])).toBe(true);
        expect(out[14]).toBe(100);
        expect(out[19]).toBe(100);
    });

    it('atr of a constant 2-point range is 2', () => {
        expect(latestAtr(flatCandles(20))).toBeCloseTo(2, 10);
        expect(latestAtr(flatCandles(10))).toBeNull();
    });
});

describe('indicator frame', () => {
    it('marks warm-up rows incomplete', () => {
        const rows = computeIndicators(flatCandles(60));
        expect(rows).toHaveLength(60);
        expect(isRowComplete(rows[0])).toBe(false);
        expect(rows[59].ema50).toBeCloseTo(100, 10);
        expect(rows[59].atr).toBeCloseTo(2, 10);
    });

    it('accepts a fully populated row', () => {
        expect(isRowComplete(createRow())).toBe(true);
        expect(isRowComplete(createRow({ adx: NaN }))).toBe(false);
    });

    it('drops the forming candle', () => {
        const rows = [createRow({ timestamp: 0 }), createRow({ timestamp: 900_000 }), createRow({ timestamp: 1_800_000 })];
        expect(closedRows(rows, 1_800_000).map(r => r.timestamp)).toEqual([0, 900_000]);
    });
});

describe('entry filters', () => {
    it('volatility band', () => {
        expect(checkVolatilityBand(createRow({ atr: 2 }), FILTERS).passed).toBe(true);
        expect(checkVolatilityBand(createRow({ atr: 0.1 }), FILTERS).passed).toBe(false);
        expect(checkVolatilityBand(createRow({ atr: 3 }), FILTERS).passed).toBe(false);
    });

    it('range over the lookback', () => {
        const wide = Array.from({ length: 12 }, () => createRow());
        expect(checkRange(wide, FILTERS).passed).toBe(true);

        const tight = Array.from({ length: 12 }, () => createRow({ high: 100.5, low: 99.5 }));
        expect(checkRange(tight, FILTERS).passed).toBe(false);

        expect(checkRange(wide.slice(0, 5), FILTERS)).toEqual({ passed: false, name: 'RANGE', detail: 'only 5 candles' });
    });

    it('spread', () => {
        const book = (bid: number, ask: number) => ({ bids: [{ price: bid, amount: 1 }], asks: [{ price: ask, amount: 1 }] });
        expect(checkSpread(book(100, 100.02), FILTERS).passed).toBe(true);
        expect(checkSpread(book(100, 100.1), FILTERS).passed).toBe(false);
        expect(checkSpread({ bids: [], asks: [] }, FILTERS).detail).toBe('empty book');
    });
});

describe('evaluateEntrySignal', () => {
    it('LONG when every long check passes', () => {
        const row = createRow({ ema8: 101, ema21: 100, close: 101, ema50: 100, rsi: 60, macd: 0.5, macdSignal: 0.2 });
        expect(evaluateEntrySignal([row], FILTERS)).toEqual({ direction: 'LONG', failed: [] });
    });

    it('SHORT mirrors the checks', () => {
        const row = createRow({ ema8: 99, ema21: 100, close: 99, ema50: 100, rsi: 40, macd: -0.5, macdSignal: -0.2 });
        expect(evaluateEntrySignal([row], FILTERS).direction).toBe('SHORT');
    });

    it('reports the failed checks for both sides', () => {
        expect(evaluateEntrySignal([createRow()], FILTERS)).toEqual({
            direction: null,
            failed: ['long:trend+macd', 'short:trend+macd'],
        });
    });

    it('rejects thin volume', () => {
        const row = createRow({ ema8: 101, ema21: 100, close: 101, ema50: 100, rsi: 60, macd: 0.5, macdSignal: 0.2, volume: 700 });
        expect(evaluateEntrySignal([row], FILTERS).direction).toBeNull();
    });
});
