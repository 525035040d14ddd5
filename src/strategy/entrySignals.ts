/**
 * Entry Signals — directional checks on the last closed candle
 *
 * LONG requires all of:
 *   - trend: EMA8 > EMA21 and close > EMA50
 *   - strength: ADX >= adxMin
 *   - momentum: RSI > rsiLongMin and MACD line > signal
 *   - participation: volume >= volumeSmaMult × volume SMA20
 * SHORT mirrors each check (RSI < rsiShortMax).
 */

import { Direction, IndicatorRow } from '../types';
import { EntryFilterSettings } from '../config/settings';

export interface SignalResult {
    direction: Direction | null;
    failed: string[];
}

function evaluate(direction: Direction, row: IndicatorRow, settings: EntryFilterSettings): string[] {
    const failed: string[] = [];
    const isLong = direction === 'LONG';

    const trendOk = isLong
        ? row.ema8 > row.ema21 && row.close > row.ema50
        : row.ema8 < row.ema21 && row.close < row.ema50;
    if (!trendOk) failed.push('trend');

    if (row.adx < settings.adxMin) failed.push('adx');

    const rsiOk = isLong ? row.rsi > settings.rsiLongMin : row.rsi < settings.rsiShortMax;
    if (!rsiOk) failed.push('rsi');

    const macdOk = isLong ? row.macd > row.macdSignal : row.macd < row.macdSignal;
    if (!macdOk) failed.push('macd');

    if (row.volume < row.volumeSma20 * settings.volumeSmaMult) failed.push('volume');

    return failed;
}

export function evaluateEntrySignal(rows: readonly IndicatorRow[], settings: EntryFilterSettings): SignalResult {
    const last = rows[rows.length - 1];
    if (!last) return { direction: null, failed: ['no data'] };

    const longFailed = evaluate('LONG', last, settings);
    if (longFailed.length === 0) return { direction: 'LONG', failed: [] };

    const shortFailed = evaluate('SHORT', last, settings);
    if (shortFailed.length === 0) return { direction: 'SHORT', failed: [] };

    return {
        direction: null,
        failed: [`long:${longFailed.join('+')}`, `short:${shortFailed.join('+')}`],
    };
}
