import BigNumber from 'bignumber.js';

export const toBigNumber = (value: string | number): BigNumber => {
    return new BigNumber(value);
};

// ═══════════════════════════════════════════════════════════════════════════════
// QUANTITY ROUNDING
// Exchange order quantities must be exact multiples of the lot step; doing the
// division in floating point turns 0.3 / 0.1 into 2.9999999999999996.
// ═══════════════════════════════════════════════════════════════════════════════

export const floorToStep = (value: number, step: number): number => {
    if (step <= 0) return value;
    return toBigNumber(value)
        .div(step)
        .integerValue(BigNumber.ROUND_FLOOR)
        .times(step)
        .toNumber();
};

export const ceilToStep = (value: number, step: number): number => {
    if (step <= 0) return value;
    return toBigNumber(value)
        .div(step)
        .integerValue(BigNumber.ROUND_CEIL)
        .times(step)
        .toNumber();
};

export const roundToStep = (value: number, step: number): number => {
    if (step <= 0) return value;
    return toBigNumber(value)
        .div(step)
        .integerValue(BigNumber.ROUND_HALF_UP)
        .times(step)
        .toNumber();
};

/**
 * Quantity / price as the decimal string the exchange expects (no exponent form).
 */
export const toDecimalString = (value: number): string => {
    return toBigNumber(value).toFixed();
};

// ═══════════════════════════════════════════════════════════════════════════════
// SERIES HELPERS
// Every series has the same length as its input; warm-up slots hold NaN.
// ═══════════════════════════════════════════════════════════════════════════════

export function smaSeries(values: number[], period: number): number[] {
    const out: number[] = new Array(values.length).fill(NaN);
    let sum = 0;
    for (let i = 0; i < values.length; i++) {
        sum += values[i];
        if (i >= period) sum -= values[i - period];
        if (i >= period - 1) out[i] = sum / period;
    }
    return out;
}

/**
 * EMA seeded with the SMA of the first `period` finite values. Leading NaNs in
 * the input (e.g. the MACD line during its own warm-up) are skipped.
 */
export function emaSeries(values: number[], period: number): number[] {
    const out: number[] = new Array(values.length).fill(NaN);
    const start = values.findIndex(v => Number.isFinite(v));
    if (start < 0 || values.length - start < period) return out;

    const k = 2 / (period + 1);
    let seed = 0;
    for (let i = start; i < start + period; i++) seed += values[i];
    let prev = seed / period;
    out[start + period - 1] = prev;

    for (let i = start + period; i < values.length; i++) {
        prev = values[i] * k + prev * (1 - k);
        out[i] = prev;
    }
    return out;
}

/**
 * Wilder smoothing: first value is the simple mean, then prev + (x - prev) / period.
 */
export function wilderSeries(values: number[], period: number, startIndex: number = 0): number[] {
    const out: number[] = new Array(values.length).fill(NaN);
    if (values.length - startIndex < period) return out;

    let seed = 0;
    for (let i = startIndex; i < startIndex + period; i++) seed += values[i];
    let prev = seed / period;
    out[startIndex + period - 1] = prev;

    for (let i = startIndex + period; i < values.length; i++) {
        prev = prev + (values[i] - prev) / period;
        out[i] = prev;
    }
    return out;
}

export function trueRangeSeries(high: number[], low: number[], close: number[]): number[] {
    return high.map((h, i) => {
        if (i === 0) return h - low[i];
        const prevClose = close[i - 1];
        return Math.max(h - low[i], Math.abs(h - prevClose), Math.abs(low[i] - prevClose));
    });
}

export function atrSeries(high: number[], low: number[], close: number[], period: number = 14): number[] {
    return wilderSeries(trueRangeSeries(high, low, close), period);
}

export function rsiSeries(close: number[], period: number = 14): number[] {
    const out: number[] = new Array(close.length).fill(NaN);
    if (close.length <= period) return out;

    const gains: number[] = [0];
    const losses: number[] = [0];
    for (let i = 1; i < close.length; i++) {
        const change = close[i] - close[i - 1];
        gains.push(Math.max(change, 0));
        losses.push(Math.max(-change, 0));
    }

    const avgGain = wilderSeries(gains, period, 1);
    const avgLoss = wilderSeries(losses, period, 1);

    for (let i = period; i < close.length; i++) {
        if (avgLoss[i] === 0) {
            out[i] = avgGain[i] === 0 ? 50 : 100;
        } else {
            out[i] = 100 - 100 / (1 + avgGain[i] / avgLoss[i]);
        }
    }
    return out;
}

export interface MacdSeries {
    macd: number[];
    signal: number[];
    hist: number[];
}

export function macdSeries(close: number[], fast: number = 12, slow: number = 26, signalPeriod: number = 9): MacdSeries {
    const fastEma = emaSeries(close, fast);
    const slowEma = emaSeries(close, slow);
    const macd = close.map((_, i) => fastEma[i] - slowEma[i]);
    const signal = emaSeries(macd, signalPeriod);
    const hist = macd.map((m, i) => m - signal[i]);
    return { macd, signal, hist };
}

export function adxSeries(high: number[], low: number[], close: number[], period: number = 14): number[] {
    const n = high.length;
    if (n <= period * 2) return new Array(n).fill(NaN);

    const plusDm: number[] = [0];
    const minusDm: number[] = [0];
    for (let i = 1; i < n; i++) {
        const up = high[i] - high[i - 1];
        const down = low[i - 1] - low[i];
        plusDm.push(up > down && up > 0 ? up : 0);
        minusDm.push(down > up && down > 0 ? down : 0);
    }

    const tr = trueRangeSeries(high, low, close);
    const smoothTr = wilderSeries(tr, period, 1);
    const smoothPlus = wilderSeries(plusDm, period, 1);
    const smoothMinus = wilderSeries(minusDm, period, 1);

    const dx: number[] = new Array(n).fill(NaN);
    for (let i = period; i < n; i++) {
        if (smoothTr[i] === 0) {
            dx[i] = 0;
            continue;
        }
        const plusDi = (100 * smoothPlus[i]) / smoothTr[i];
        const minusDi = (100 * smoothMinus[i]) / smoothTr[i];
        const diSum = plusDi + minusDi;
        dx[i] = diSum === 0 ? 0 : (100 * Math.abs(plusDi - minusDi)) / diSum;
    }

    return wilderSeries(dx, period, period);
}
