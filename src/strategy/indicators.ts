/**
 * Indicator Frame — candles → IndicatorRow[]
 *
 * Standard definitions: EMA (SMA-seeded), Wilder RSI/ATR/ADX (14),
 * MACD (12, 26, 9), volume SMA (20). Warm-up rows carry NaN and are rejected
 * by isRowComplete() before any decision reads them.
 */

import { Candle, IndicatorRow } from '../types';
import { adxSeries, atrSeries, emaSeries, macdSeries, rsiSeries, smaSeries } from '../utils/math';

export function computeIndicators(candles: readonly Candle[]): IndicatorRow[] {
    const close = candles.map(c => c.close);
    const high = candles.map(c => c.high);
    const low = candles.map(c => c.low);
    const volume = candles.map(c => c.volume);

    const ema8 = emaSeries(close, 8);
    const ema20 = emaSeries(close, 20);
    const ema21 = emaSeries(close, 21);
    const ema50 = emaSeries(close, 50);
    const rsi = rsiSeries(close, 14);
    const macd = macdSeries(close, 12, 26, 9);
    const atr = atrSeries(high, low, close, 14);
    const adx = adxSeries(high, low, close, 14);
    const volumeSma20 = smaSeries(volume, 20);

    return candles.map((candle, i) => ({
        ...candle,
        ema8: ema8[i],
        ema20: ema20[i],
        ema21: ema21[i],
        ema50: ema50[i],
        rsi: rsi[i],
        macd: macd.macd[i],
        macdSignal: macd.signal[i],
        macdHist: macd.hist[i],
        atr: atr[i],
        adx: adx[i],
        volumeSma20: volumeSma20[i],
    }));
}

export function isRowComplete(row: IndicatorRow): boolean {
    return Object.values(row).every(v => Number.isFinite(v));
}

/**
 * Drop the still-forming candle: keep only candles whose open time is before
 * `currentCandleStartMs`.
 */
export function closedRows(rows: readonly IndicatorRow[], currentCandleStartMs: number): IndicatorRow[] {
    return rows.filter(row => row.timestamp < currentCandleStartMs);
}

/**
 * Latest closed ATR from a raw candle series, or null when there is not
 * enough history.
 */
export function latestAtr(candles: readonly Candle[], period: number = 14): number | null {
    const series = atrSeries(candles.map(c => c.high), candles.map(c => c.low), candles.map(c => c.close), period);
    const last = series[series.length - 1];
    return last !== undefined && Number.isFinite(last) && last > 0 ? last : null;
}
