/**
 * Scheduler Timers
 *
 * Pure due-checks over an injected "now". Nothing here sleeps or reads the
 * wall clock, so ordering and jitter can be tested by feeding timestamps.
 */

/**
 * Fires when at least `periodMs` has passed since the last run. The first
 * check is always due.
 */
export class IntervalTimer {
    readonly name: string;
    readonly periodMs: number;
    private lastRunMs: number | null = null;

    constructor(name: string, periodMs: number) {
        this.name = name;
        this.periodMs = periodMs;
    }

    isDue(nowMs: number): boolean {
        return this.lastRunMs === null || nowMs - this.lastRunMs >= this.periodMs;
    }

    markRun(nowMs: number): void {
        this.lastRunMs = nowMs;
    }

    getLastRun(): number | null {
        return this.lastRunMs;
    }
}

export interface CandleCloseConfig {
    candleMs: number;
    /** earliest offset after the boundary at which the closed candle is trusted */
    windowStartMs: number;
    /** offset after the boundary past which this candle is skipped */
    windowEndMs: number;
}

export const DEFAULT_CANDLE_CLOSE_CONFIG: CandleCloseConfig = {
    candleMs: 15 * 60 * 1000,
    windowStartMs: 5 * 1000,
    windowEndMs: 60 * 1000,
};

/**
 * Fires once per candle, inside [boundary + windowStart, boundary + windowEnd).
 * The watermark holds the start time of the last candle processed, so the
 * same boundary can never fire twice.
 */
export class CandleCloseTimer {
    readonly config: CandleCloseConfig;
    private watermarkMs: number | null = null;

    constructor(config: CandleCloseConfig = DEFAULT_CANDLE_CLOSE_CONFIG) {
        this.config = config;
    }

    /** Start of the candle that is forming at `nowMs` */
    currentCandleStart(nowMs: number): number {
        return Math.floor(nowMs / this.config.candleMs) * this.config.candleMs;
    }

    /**
     * The boundary to process now, or null. The returned value is the start
     * time of the NEW (forming) candle; the candle before it has just closed.
     */
    dueBoundary(nowMs: number): number | null {
        const boundary = this.currentCandleStart(nowMs);
        const offset = nowMs - boundary;
        if (offset < this.config.windowStartMs || offset >= this.config.windowEndMs) return null;
        if (this.watermarkMs !== null && boundary <= this.watermarkMs) return null;
        return boundary;
    }

    markProcessed(boundaryMs: number): void {
        this.watermarkMs = boundaryMs;
    }

    getWatermark(): number | null {
        return this.watermarkMs;
    }

    msUntilNextClose(nowMs: number): number {
        return this.currentCandleStart(nowMs) + this.config.candleMs - nowMs;
    }
}
