// Type Definitions for the Perpetual Futures Execution Engine

// ═══════════════════════════════════════════════════════════════════════════════
// MARKET DATA
// ═══════════════════════════════════════════════════════════════════════════════

export type Direction = 'LONG' | 'SHORT';

export type OrderSide = 'buy' | 'sell';

/**
 * One OHLCV candle. `timestamp` is the candle open time in epoch milliseconds.
 */
export interface Candle {
    timestamp: number;
    open: number;
    high: number;
    low: number;
    close: number;
    volume: number;
}

/**
 * Candle enriched with the indicator values the lifecycle and entry checks consume.
 */
export interface IndicatorRow extends Candle {
    ema8: number;
    ema20: number;
    ema21: number;
    ema50: number;
    rsi: number;
    macd: number;
    macdSignal: number;
    macdHist: number;
    atr: number;
    adx: number;
    volumeSma20: number;
}

// ═══════════════════════════════════════════════════════════════════════════════
// PERSISTED STATE
// Field names are snake_case because they are written verbatim to the state file.
// ═══════════════════════════════════════════════════════════════════════════════

export interface PositionRecord {
    direction: Direction;
    entry_price: number;
    size: number;
    /** size at entry (or adoption); partials never change it */
    initial_size: number;
    sl_price: number;
    atr_entry: number;
    p_max: number;
    p_min: number;
    partials: Record<string, boolean>;
    last_dynamic_level: number;
    accumulated_pnl: number;
    breakeven_triggered: boolean;
    sl_moved_count: number;
    /** epoch seconds */
    entry_time: number;
    /** epoch seconds */
    last_sl_update: number;
}

export interface AccountState {
    positions: Record<string, PositionRecord>;
    daily_pnl: number;
    trades_last_hour: number[];
    last_trade_per_symbol: Record<string, number>;
    last_reset_time: number | null;
}

// ═══════════════════════════════════════════════════════════════════════════════
// EXITS & OUTCOMES
// ═══════════════════════════════════════════════════════════════════════════════

export type ExitReason =
    | 'EARLY_INVALIDATION'
    | 'ATR_EXTREME'
    | 'STRUCTURE_BREAK'
    | 'MOMENTUM_REVERSAL'
    | 'HARD_CROSS'
    | 'STAGNATION'
    | 'TIME_LIMIT'
    | 'SOFT_TREND'
    | 'DUST_ESCALATION'
    | 'LADDER_EXHAUSTED'
    | 'OPPORTUNITY_SWITCH';

/**
 * Realised result of a fully closed trade, reported to the tuning collaborator.
 * `netPnl` includes every partial realisation taken while the position was open.
 */
export interface TradeOutcome {
    symbol: string;
    direction: Direction;
    entryPrice: number;
    exitPrice: number;
    closedSize: number;
    grossPnl: number;
    commission: number;
    partialPnl: number;
    netPnl: number;
    roi: number;
    reason: ExitReason;
    durationSec: number;
}

export interface TradeOutcomeSink {
    record(outcome: TradeOutcome): void;
}
