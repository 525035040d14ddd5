/**
 * Structure Detector Tests — 5-candle fractal swings
 */

import { findSwingLevels } from '../src/risk/structureDetector';

function bars(highs: number[], lows: number[]): Array<{ high: number; low: number }> {
    return highs.map((high, i) => ({ high, low: lows[i] }));
}

describe('findSwingLevels', () => {
    it('finds the most recent confirmed swing high and low', () => {
        const candles = bars(
            [100, 102, 105, 103, 101, 100, 99, 100, 101],
            [98, 99, 100, 99, 97, 96, 95, 96, 97]
        );
        const { swingHigh, swingLow } = findSwingLevels(candles);
        expect(swingHigh).toEqual({ price: 105, index: 2 });
        expect(swingLow).toEqual({ price: 95, index: 6 });
    });

    it('prefers the later of two swings', () => {
        const candles = bars(
            [100, 101, 104, 101, 100, 101, 103, 101, 100],
            [95, 95, 95, 95, 95, 95, 95, 95, 95]
        );
        expect(findSwingLevels(candles).swingHigh).toEqual({ price: 103, index: 6 });
    });

    it('does not confirm a centre among the last two candles', () => {
        const candles = bars([100, 101, 102, 103, 110, 104], [90, 90, 90, 90, 90, 90]);
        expect(findSwingLevels(candles).swingHigh).toBeNull();
    });

    it('requires a strict extreme (equal neighbours do not count)', () => {
        const candles = bars([100, 101, 105, 105, 101, 100], [90, 91, 92, 92, 91, 90]);
        const { swingHigh, swingLow } = findSwingLevels(candles);
        expect(swingHigh).toBeNull();
        expect(swingLow).toBeNull();
    });

    it('returns nulls for fewer than five candles', () => {
        expect(findSwingLevels(bars([1, 2, 3, 2], [1, 1, 1, 1]))).toEqual({ swingHigh: null, swingLow: null });
    });
});
