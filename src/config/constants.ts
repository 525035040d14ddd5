// Configuration Constants for the Execution Engine
//
// Defaults only. Runtime values live in the TradingSettings snapshot built by
// loadSettings() (src/config/settings.ts); the tuner replaces that snapshot,
// it never touches these objects.

export const ENGINE_CONFIG = {
    // ═══════════════════════════════════════════════════════════════════════════
    // UNIVERSE & ACCOUNT
    // ═══════════════════════════════════════════════════════════════════════════
    SYMBOLS: ['BTC/USDT', 'ETH/USDT', 'SOL/USDT', 'BNB/USDT', 'XRP/USDT'],
    TIMEFRAME: '15m',
    CANDLE_LIMIT: 500,
    LEVERAGE: 5,
    MAX_OPEN_SYMBOLS: 3,

    // ═══════════════════════════════════════════════════════════════════════════
    // SIZING & EXPOSURE
    // ═══════════════════════════════════════════════════════════════════════════
    SIZING_MODE: 'FIXED_EXPOSURE',
    FIXED_EXPOSURE_USD: 100,
    RISK_PER_TRADE_PCT: 0.01,
    MAX_TOTAL_EXPOSURE_USD: 1000,
    COMMISSION_BUFFER: 1.001,     // margin check headroom for fees
    MIN_NOTIONAL_BUFFER: 1.05,    // grow 5% above the exchange's stated minimum
    COMMISSION_RATE: 0.0005,      // 0.05% per side (taker)
    DUST_NOTIONAL_USD: 5,

    // ═══════════════════════════════════════════════════════════════════════════
    // STOPS
    // ═══════════════════════════════════════════════════════════════════════════
    INITIAL_STOP_ATR_MULT: 3.0,
    MIN_STOP_PCT: 0.005,          // 0.5%
    MAX_STOP_PCT: 0.20,           // 20%
    TRAILING_ATR_MULT: 1.8,
    SAFETY_TAKE_PROFIT_PCT: 0.20,

    // ═══════════════════════════════════════════════════════════════════════════
    // PARTIAL LADDER
    // Fixed levels fire in order; each closes a share of the CURRENT size.
    // ═══════════════════════════════════════════════════════════════════════════
    FIXED_LADDER: [
        { name: 'P1', pct: 0.003, closePct: 0.05 },
        { name: 'P2', pct: 0.004, closePct: 0.05 },
        { name: 'P3', pct: 0.005, closePct: 0.05 },
        { name: 'P4', pct: 0.006, closePct: 0.05 },
        { name: 'P5', pct: 0.008, closePct: 0.05 },
        { name: 'P6', pct: 0.010, closePct: 0.05 },
    ],
    FIRST_LEVEL_STOP_BUFFER_PCT: 0.001,
    DYNAMIC_LADDER_START_PCT: 0.010,
    DYNAMIC_LADDER_INCREMENT_PCT: 0.001,
    DYNAMIC_LADDER_CLOSE_PCT: 0.05,

    // ═══════════════════════════════════════════════════════════════════════════
    // BREAKEVEN & EXIT CHAIN
    // ═══════════════════════════════════════════════════════════════════════════
    BREAKEVEN_TRIGGER_PCT: 0.008,
    BREAKEVEN_BUFFER_PCT: 0.002,
    EARLY_INVALIDATION_ATR_MULT: 1.5,
    ATR_EXTREME_MULT: 1.8,
    STAGNATION_MINUTES: 45,
    TIME_LIMIT_HOURS: 10,
    TIME_LIMIT_NOISE_PCT: 0.002,

    // ═══════════════════════════════════════════════════════════════════════════
    // ENTRY FILTERS & SIGNALS
    // ATR bounds are percentages of price (0.20 means 0.20%).
    // ═══════════════════════════════════════════════════════════════════════════
    ATR_MIN_PCT: 0.20,
    ATR_MAX_PCT: 2.5,
    RANGE_LOOKBACK: 12,
    RANGE_ATR_MULT: 0.6,
    MAX_SPREAD_PCT: 0.03,
    DAILY_CLOSE_BLOCK_START_MINUTE: 23 * 60 + 45,   // 23:45 UTC
    DAILY_CLOSE_BLOCK_END_MINUTE: 15,               // 00:15 UTC
    ADX_MIN: 10,
    RSI_LONG_MIN: 35,
    RSI_SHORT_MAX: 65,
    VOLUME_SMA_MULT: 0.8,

    // ═══════════════════════════════════════════════════════════════════════════
    // OPPORTUNITY SWITCH
    // With the book full, a stale position may give way to a much stronger setup.
    // ═══════════════════════════════════════════════════════════════════════════
    SWITCH_ENABLED: true,
    SWITCH_KEEP_PROFIT_PCT: 0.003,
    SWITCH_MIN_AGE_TO_EVALUATE_MINUTES: 15,
    SWITCH_KEEP_HEALTH: 60,
    SWITCH_MIN_AGE_MINUTES: 30,
    SWITCH_MAX_HEALTH: 40,
    SWITCH_MIN_OPPORTUNITY_SCORE: 80,
    SWITCH_SCORE_MARGIN: 30,
    SWITCH_PNL_HISTORY: 5,

    // ═══════════════════════════════════════════════════════════════════════════
    // THROTTLES
    // ═══════════════════════════════════════════════════════════════════════════
    SYMBOL_COOLDOWN_MINUTES: 30,
    MAX_TRADES_PER_HOUR: 4,
    DAILY_DRAWDOWN_LIMIT_PCT: 0.03,

    // ═══════════════════════════════════════════════════════════════════════════
    // HEALTH GATE & RETRY
    // ═══════════════════════════════════════════════════════════════════════════
    LATENCY_PAUSE_MS: 800,
    LATENCY_RESUME_MS: 500,
    MAX_RETRIES: 3,
    RETRY_DELAY_MS: 1000,

    // ═══════════════════════════════════════════════════════════════════════════
    // PERSISTENCE & EXCHANGE
    // ═══════════════════════════════════════════════════════════════════════════
    STATE_FILE: 'bot_state.json',
    BINANCE_BASE_URL: 'https://fapi.binance.com',
    HTTP_TIMEOUT_MS: 10000,
} as const;
