/**
 * Structure Detector — most recent confirmed swing high / swing low
 *
 * A swing is a 5-candle fractal: the centre candle's high (low) is strictly
 * above (below) the two candles on each side. The last two candles of the
 * series can never be confirmed centres.
 */

export interface SwingPoint {
    price: number;
    index: number;
}

export interface SwingLevels {
    swingHigh: SwingPoint | null;
    swingLow: SwingPoint | null;
}

interface HighLow {
    high: number;
    low: number;
}

const WING = 2;

export function findSwingLevels(candles: readonly HighLow[]): SwingLevels {
    let swingHigh: SwingPoint | null = null;
    let swingLow: SwingPoint | null = null;

    for (let i = candles.length - 1 - WING; i >= WING && (swingHigh === null || swingLow === null); i--) {
        const centre = candles[i];
        let isHigh = true;
        let isLow = true;

        for (let offset = 1; offset <= WING; offset++) {
            const before = candles[i - offset];
            const after = candles[i + offset];
            if (!(centre.high > before.high && centre.high > after.high)) isHigh = false;
            if (!(centre.low < before.low && centre.low < after.low)) isLow = false;
        }

        if (swingHigh === null && isHigh) swingHigh = { price: centre.high, index: i };
        if (swingLow === null && isLow) swingLow = { price: centre.low, index: i };
    }

    return { swingHigh, swingLow };
}
