/**
 * Entry Filters — market-condition checks run before any signal
 *
 * Each filter returns a verdict with the measured value so rejections are
 * explainable in the log.
 */

import { IndicatorRow } from '../types';
import { EntryFilterSettings } from '../config/settings';
import { OrderBook } from '../exchange/types';

export interface FilterVerdict {
    passed: boolean;
    name: 'ATR_BAND' | 'RANGE' | 'SPREAD';
    detail: string;
}

/**
 * ATR as a percentage of price must sit inside [atrMinPct, atrMaxPct].
 */
export function checkVolatilityBand(row: IndicatorRow, settings: EntryFilterSettings): FilterVerdict {
    const atrPct = (row.atr / row.close) * 100;
    const passed = atrPct >= settings.atrMinPct && atrPct <= settings.atrMaxPct;
    return {
        passed,
        name: 'ATR_BAND',
        detail: `atr%=${atrPct.toFixed(3)} band=[${settings.atrMinPct}, ${settings.atrMaxPct}]`,
    };
}

/**
 * The high-low range of the last `rangeLookback` closed candles must be at
 * least rangeAtrMult × ATR (rejects tight chop).
 */
export function checkRange(rows: readonly IndicatorRow[], settings: EntryFilterSettings): FilterVerdict {
    const window = rows.slice(-settings.rangeLookback);
    if (window.length < settings.rangeLookback) {
        return { passed: false, name: 'RANGE', detail: `only ${window.length} candles` };
    }
    const high = Math.max(...window.map(r => r.high));
    const low = Math.min(...window.map(r => r.low));
    const atr = window[window.length - 1].atr;
    const required = atr * settings.rangeAtrMult;
    return {
        passed: high - low >= required,
        name: 'RANGE',
        detail: `range=${(high - low).toFixed(4)} required=${required.toFixed(4)}`,
    };
}

/**
 * Best ask / best bid spread as a percentage of mid must not exceed maxSpreadPct.
 */
export function checkSpread(book: OrderBook, settings: EntryFilterSettings): FilterVerdict {
    const bid = book.bids[0];
    const ask = book.asks[0];
    if (!bid || !ask || !(bid.price > 0) || !(ask.price > 0)) {
        return { passed: false, name: 'SPREAD', detail: 'empty book' };
    }
    const mid = (bid.price + ask.price) / 2;
    const spreadPct = ((ask.price - bid.price) / mid) * 100;
    return {
        passed: spreadPct <= settings.maxSpreadPct,
        name: 'SPREAD',
        detail: `spread%=${spreadPct.toFixed(4)} max=${settings.maxSpreadPct}`,
    };
}
