/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * TRADING SETTINGS — SINGLE SOURCE OF RUNTIME CONFIGURATION
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * Settings are an immutable snapshot:
 * - Built once at startup from ENGINE_CONFIG defaults + environment overrides
 * - Validated; an invalid configuration throws and the process does not start
 * - Held by a SettingsStore; readers take `current()` once per operation
 * - The adaptive tuner is the only runtime writer, via `update()`, which
 *   swaps in a new snapshot instead of editing fields in place
 *
 * Sizing mode is decided here, once, as a tagged union.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { ENGINE_CONFIG } from './constants';
import logger from '../utils/logger';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export type SizingMode =
    | { kind: 'FIXED_EXPOSURE'; exposureUsd: number }
    | { kind: 'RISK_PERCENT'; riskPct: number };

export interface LadderLevel {
    name: string;
    /** favourable move as a fraction of entry (0.003 = 0.3%) */
    pct: number;
    /** share of current size to close */
    closePct: number;
}

export interface DynamicLadderConfig {
    startPct: number;
    incrementPct: number;
    closePct: number;
}

export interface StopSettings {
    initialAtrMult: number;
    minStopPct: number;
    maxStopPct: number;
    trailingAtrMult: number;
    safetyTakeProfitPct: number;
}

export interface ExitSettings {
    breakevenTriggerPct: number;
    breakevenBufferPct: number;
    firstLevelStopBufferPct: number;
    earlyInvalidationAtrMult: number;
    atrExtremeMult: number;
    stagnationMinutes: number;
    timeLimitHours: number;
    timeLimitNoisePct: number;
}

export interface EntryFilterSettings {
    atrMinPct: number;
    atrMaxPct: number;
    rangeLookback: number;
    rangeAtrMult: number;
    maxSpreadPct: number;
    dailyCloseBlockStartMinute: number;
    dailyCloseBlockEndMinute: number;
    adxMin: number;
    rsiLongMin: number;
    rsiShortMax: number;
    volumeSmaMult: number;
}

export interface SwitchSettings {
    enabled: boolean;
    /** a position this far in profit is never switched out */
    keepProfitPct: number;
    minAgeToEvaluateMinutes: number;
    keepHealth: number;
    minAgeMinutes: number;
    maxHealth: number;
    minOpportunityScore: number;
    /** the candidate must beat the position's health by more than this */
    scoreMargin: number;
    pnlHistory: number;
}

export interface HealthSettings {
    pauseMs: number;
    resumeMs: number;
}

export interface RetrySettings {
    attempts: number;
    baseDelayMs: number;
}

export interface TradingSettings {
    symbols: string[];
    timeframe: string;
    candleLimit: number;
    leverage: number;
    maxOpenSymbols: number;

    sizingMode: SizingMode;
    maxTotalExposureUsd: number;
    commissionBuffer: number;
    minNotionalBuffer: number;
    commissionRate: number;
    dustNotionalUsd: number;

    stops: StopSettings;
    fixedLadder: LadderLevel[];
    dynamicLadder: DynamicLadderConfig;
    exits: ExitSettings;
    filters: EntryFilterSettings;
    switching: SwitchSettings;

    symbolCooldownMinutes: number;
    maxTradesPerHour: number;
    dailyDrawdownLimitPct: number;

    health: HealthSettings;
    retry: RetrySettings;

    stateFile: string;
    exchangeBaseUrl: string;
    httpTimeoutMs: number;
}

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

// ═══════════════════════════════════════════════════════════════════════════════
// DEFAULTS
// ═══════════════════════════════════════════════════════════════════════════════

export const DEFAULT_SETTINGS: TradingSettings = {
    symbols: [...ENGINE_CONFIG.SYMBOLS],
    timeframe: ENGINE_CONFIG.TIMEFRAME,
    candleLimit: ENGINE_CONFIG.CANDLE_LIMIT,
    leverage: ENGINE_CONFIG.LEVERAGE,
    maxOpenSymbols: ENGINE_CONFIG.MAX_OPEN_SYMBOLS,

    sizingMode: { kind: 'FIXED_EXPOSURE', exposureUsd: ENGINE_CONFIG.FIXED_EXPOSURE_USD },
    maxTotalExposureUsd: ENGINE_CONFIG.MAX_TOTAL_EXPOSURE_USD,
    commissionBuffer: ENGINE_CONFIG.COMMISSION_BUFFER,
    minNotionalBuffer: ENGINE_CONFIG.MIN_NOTIONAL_BUFFER,
    commissionRate: ENGINE_CONFIG.COMMISSION_RATE,
    dustNotionalUsd: ENGINE_CONFIG.DUST_NOTIONAL_USD,

    stops: {
        initialAtrMult: ENGINE_CONFIG.INITIAL_STOP_ATR_MULT,
        minStopPct: ENGINE_CONFIG.MIN_STOP_PCT,
        maxStopPct: ENGINE_CONFIG.MAX_STOP_PCT,
        trailingAtrMult: ENGINE_CONFIG.TRAILING_ATR_MULT,
        safetyTakeProfitPct: ENGINE_CONFIG.SAFETY_TAKE_PROFIT_PCT,
    },
    fixedLadder: ENGINE_CONFIG.FIXED_LADDER.map(level => ({ ...level })),
    dynamicLadder: {
        startPct: ENGINE_CONFIG.DYNAMIC_LADDER_START_PCT,
        incrementPct: ENGINE_CONFIG.DYNAMIC_LADDER_INCREMENT_PCT,
        closePct: ENGINE_CONFIG.DYNAMIC_LADDER_CLOSE_PCT,
    },
    exits: {
        breakevenTriggerPct: ENGINE_CONFIG.BREAKEVEN_TRIGGER_PCT,
        breakevenBufferPct: ENGINE_CONFIG.BREAKEVEN_BUFFER_PCT,
        firstLevelStopBufferPct: ENGINE_CONFIG.FIRST_LEVEL_STOP_BUFFER_PCT,
        earlyInvalidationAtrMult: ENGINE_CONFIG.EARLY_INVALIDATION_ATR_MULT,
        atrExtremeMult: ENGINE_CONFIG.ATR_EXTREME_MULT,
        stagnationMinutes: ENGINE_CONFIG.STAGNATION_MINUTES,
        timeLimitHours: ENGINE_CONFIG.TIME_LIMIT_HOURS,
        timeLimitNoisePct: ENGINE_CONFIG.TIME_LIMIT_NOISE_PCT,
    },
    filters: {
        atrMinPct: ENGINE_CONFIG.ATR_MIN_PCT,
        atrMaxPct: ENGINE_CONFIG.ATR_MAX_PCT,
        rangeLookback: ENGINE_CONFIG.RANGE_LOOKBACK,
        rangeAtrMult: ENGINE_CONFIG.RANGE_ATR_MULT,
        maxSpreadPct: ENGINE_CONFIG.MAX_SPREAD_PCT,
        dailyCloseBlockStartMinute: ENGINE_CONFIG.DAILY_CLOSE_BLOCK_START_MINUTE,
        dailyCloseBlockEndMinute: ENGINE_CONFIG.DAILY_CLOSE_BLOCK_END_MINUTE,
        adxMin: ENGINE_CONFIG.ADX_MIN,
        rsiLongMin: ENGINE_CONFIG.RSI_LONG_MIN,
        rsiShortMax: ENGINE_CONFIG.RSI_SHORT_MAX,
        volumeSmaMult: ENGINE_CONFIG.VOLUME_SMA_MULT,
    },
    switching: {
        enabled: ENGINE_CONFIG.SWITCH_ENABLED,
        keepProfitPct: ENGINE_CONFIG.SWITCH_KEEP_PROFIT_PCT,
        minAgeToEvaluateMinutes: ENGINE_CONFIG.SWITCH_MIN_AGE_TO_EVALUATE_MINUTES,
        keepHealth: ENGINE_CONFIG.SWITCH_KEEP_HEALTH,
        minAgeMinutes: ENGINE_CONFIG.SWITCH_MIN_AGE_MINUTES,
        maxHealth: ENGINE_CONFIG.SWITCH_MAX_HEALTH,
        minOpportunityScore: ENGINE_CONFIG.SWITCH_MIN_OPPORTUNITY_SCORE,
        scoreMargin: ENGINE_CONFIG.SWITCH_SCORE_MARGIN,
        pnlHistory: ENGINE_CONFIG.SWITCH_PNL_HISTORY,
    },

    symbolCooldownMinutes: ENGINE_CONFIG.SYMBOL_COOLDOWN_MINUTES,
    maxTradesPerHour: ENGINE_CONFIG.MAX_TRADES_PER_HOUR,
    dailyDrawdownLimitPct: ENGINE_CONFIG.DAILY_DRAWDOWN_LIMIT_PCT,

    health: {
        pauseMs: ENGINE_CONFIG.LATENCY_PAUSE_MS,
        resumeMs: ENGINE_CONFIG.LATENCY_RESUME_MS,
    },
    retry: {
        attempts: ENGINE_CONFIG.MAX_RETRIES,
        baseDelayMs: ENGINE_CONFIG.RETRY_DELAY_MS,
    },

    stateFile: ENGINE_CONFIG.STATE_FILE,
    exchangeBaseUrl: ENGINE_CONFIG.BINANCE_BASE_URL,
    httpTimeoutMs: ENGINE_CONFIG.HTTP_TIMEOUT_MS,
};

/**
 * Create a settings snapshot with overrides (nested groups merge field by field)
 */
export function createSettings(overrides: Partial<TradingSettings> = {}): TradingSettings {
    return {
        ...DEFAULT_SETTINGS,
        ...overrides,
        stops: { ...DEFAULT_SETTINGS.stops, ...(overrides.stops ?? {}) },
        dynamicLadder: { ...DEFAULT_SETTINGS.dynamicLadder, ...(overrides.dynamicLadder ?? {}) },
        exits: { ...DEFAULT_SETTINGS.exits, ...(overrides.exits ?? {}) },
        filters: { ...DEFAULT_SETTINGS.filters, ...(overrides.filters ?? {}) },
        switching: { ...DEFAULT_SETTINGS.switching, ...(overrides.switching ?? {}) },
        health: { ...DEFAULT_SETTINGS.health, ...(overrides.health ?? {}) },
        retry: { ...DEFAULT_SETTINGS.retry, ...(overrides.retry ?? {}) },
        fixedLadder: (overrides.fixedLadder ?? DEFAULT_SETTINGS.fixedLadder).map(level => ({ ...level })),
        symbols: [...(overrides.symbols ?? DEFAULT_SETTINGS.symbols)],
    };
}

// ═══════════════════════════════════════════════════════════════════════════════
// ENVIRONMENT LOADING
// ═══════════════════════════════════════════════════════════════════════════════

type Env = Record<string, string | undefined>;

function readString(env: Env, key: string): string | null {
    const raw = env[key];
    if (raw === undefined || raw.trim() === '') return null;
    return raw.trim();
}

function readNumber(env: Env, key: string, fallback: number): number {
    const raw = readString(env, key);
    if (raw === null) return fallback;
    const value = Number(raw);
    if (!Number.isFinite(value)) {
        throw new ConfigError(`${key} must be a number, got "${raw}"`);
    }
    return value;
}

function readSizingMode(env: Env): SizingMode {
    const mode = (readString(env, 'SIZING_MODE') ?? ENGINE_CONFIG.SIZING_MODE).toUpperCase();
    switch (mode) {
        case 'FIXED_EXPOSURE':
            return { kind: 'FIXED_EXPOSURE', exposureUsd: readNumber(env, 'FIXED_EXPOSURE_USD', ENGINE_CONFIG.FIXED_EXPOSURE_USD) };
        case 'RISK_PERCENT':
            return { kind: 'RISK_PERCENT', riskPct: readNumber(env, 'RISK_PER_TRADE_PCT', ENGINE_CONFIG.RISK_PER_TRADE_PCT) };
        default:
            throw new ConfigError(`SIZING_MODE must be FIXED_EXPOSURE or RISK_PERCENT, got "${mode}"`);
    }
}

/**
 * Build and validate settings from the environment.
 *
 * @throws ConfigError when a value is malformed or the result fails validation
 */
export function loadSettings(env: Env = process.env): TradingSettings {
    const symbolsRaw = readString(env, 'SYMBOLS');
    const symbols = symbolsRaw
        ? symbolsRaw.split(',').map(s => s.trim().toUpperCase()).filter(s => s.length > 0)
        : [...ENGINE_CONFIG.SYMBOLS];

    const settings = createSettings({
        symbols,
        leverage: readNumber(env, 'LEVERAGE', ENGINE_CONFIG.LEVERAGE),
        maxOpenSymbols: readNumber(env, 'MAX_OPEN_SYMBOLS', ENGINE_CONFIG.MAX_OPEN_SYMBOLS),
        sizingMode: readSizingMode(env),
        maxTotalExposureUsd: readNumber(env, 'MAX_TOTAL_EXPOSURE_USD', ENGINE_CONFIG.MAX_TOTAL_EXPOSURE_USD),
        symbolCooldownMinutes: readNumber(env, 'SYMBOL_COOLDOWN_MINUTES', ENGINE_CONFIG.SYMBOL_COOLDOWN_MINUTES),
        maxTradesPerHour: readNumber(env, 'MAX_TRADES_PER_HOUR', ENGINE_CONFIG.MAX_TRADES_PER_HOUR),
        switching: {
            ...DEFAULT_SETTINGS.switching,
            enabled: readString(env, 'OPPORTUNITY_SWITCH')?.toLowerCase() !== 'false',
        },
        health: {
            pauseMs: readNumber(env, 'LATENCY_PAUSE_MS', ENGINE_CONFIG.LATENCY_PAUSE_MS),
            resumeMs: readNumber(env, 'LATENCY_RESUME_MS', ENGINE_CONFIG.LATENCY_RESUME_MS),
        },
        retry: {
            attempts: readNumber(env, 'MAX_RETRIES', ENGINE_CONFIG.MAX_RETRIES),
            baseDelayMs: readNumber(env, 'RETRY_DELAY_MS', ENGINE_CONFIG.RETRY_DELAY_MS),
        },
        stateFile: readString(env, 'STATE_FILE') ?? ENGINE_CONFIG.STATE_FILE,
        exchangeBaseUrl: readString(env, 'BINANCE_BASE_URL') ?? ENGINE_CONFIG.BINANCE_BASE_URL,
    });

    const errors = validateSettings(settings);
    if (errors.length > 0) {
        throw new ConfigError(`Invalid configuration:\n  - ${errors.join('\n  - ')}`);
    }
    return settings;
}

/**
 * Returns every violated rule; empty means valid.
 */
export function validateSettings(settings: TradingSettings): string[] {
    const errors: string[] = [];

    if (settings.symbols.length === 0) errors.push('SYMBOLS must list at least one symbol');
    for (const symbol of settings.symbols) {
        if (!/^[A-Z0-9]+\/[A-Z0-9]+$/.test(symbol)) errors.push(`symbol "${symbol}" must look like BASE/QUOTE`);
    }
    if (!Number.isInteger(settings.leverage) || settings.leverage < 1) errors.push('LEVERAGE must be an integer >= 1');
    if (!Number.isInteger(settings.maxOpenSymbols) || settings.maxOpenSymbols < 1) errors.push('MAX_OPEN_SYMBOLS must be an integer >= 1');
    if (settings.maxTotalExposureUsd <= 0) errors.push('MAX_TOTAL_EXPOSURE_USD must be > 0');

    if (settings.sizingMode.kind === 'FIXED_EXPOSURE' && settings.sizingMode.exposureUsd <= 0) {
        errors.push('FIXED_EXPOSURE_USD must be > 0');
    }
    if (settings.sizingMode.kind === 'RISK_PERCENT' && (settings.sizingMode.riskPct <= 0 || settings.sizingMode.riskPct >= 1)) {
        errors.push('RISK_PER_TRADE_PCT must be between 0 and 1');
    }

    if (settings.stops.minStopPct <= 0 || settings.stops.minStopPct >= settings.stops.maxStopPct) {
        errors.push('stop clamp band must satisfy 0 < minStopPct < maxStopPct');
    }

    settings.fixedLadder.forEach((level, i) => {
        if (level.pct <= 0) errors.push(`ladder level ${level.name} threshold must be > 0`);
        if (level.closePct <= 0 || level.closePct >= 1) errors.push(`ladder level ${level.name} closePct must be in (0, 1)`);
        if (i > 0 && level.pct <= settings.fixedLadder[i - 1].pct) errors.push(`ladder level ${level.name} must be above ${settings.fixedLadder[i - 1].name}`);
    });
    if (settings.dynamicLadder.incrementPct <= 0) errors.push('dynamic ladder increment must be > 0');
    if (settings.dynamicLadder.closePct <= 0 || settings.dynamicLadder.closePct >= 1) errors.push('dynamic ladder closePct must be in (0, 1)');

    if (settings.health.resumeMs <= 0 || settings.health.resumeMs >= settings.health.pauseMs) {
        errors.push('LATENCY_RESUME_MS must be > 0 and below LATENCY_PAUSE_MS');
    }
    if (!Number.isInteger(settings.retry.attempts) || settings.retry.attempts < 1) errors.push('MAX_RETRIES must be an integer >= 1');
    if (settings.retry.baseDelayMs < 0) errors.push('RETRY_DELAY_MS must be >= 0');
    if (!Number.isInteger(settings.switching.pnlHistory) || settings.switching.pnlHistory < 2) errors.push('switch pnl history must keep at least 2 samples');
    if (settings.symbolCooldownMinutes < 0) errors.push('SYMBOL_COOLDOWN_MINUTES must be >= 0');
    if (settings.maxTradesPerHour < 1) errors.push('MAX_TRADES_PER_HOUR must be >= 1');

    return errors;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SETTINGS STORE
// ═══════════════════════════════════════════════════════════════════════════════

export class SettingsStore {
    private snapshot: TradingSettings;
    private version = 0;

    constructor(initial: TradingSettings) {
        this.snapshot = initial;
    }

    current(): TradingSettings {
        return this.snapshot;
    }

    getVersion(): number {
        return this.version;
    }

    /**
     * Replace the snapshot with `producer(current)`. A producer result that
     * fails validation is discarded and the current snapshot stays.
     */
    update(producer: (current: TradingSettings) => TradingSettings, source: string): boolean {
        const next = producer(this.snapshot);
        const errors = validateSettings(next);
        if (errors.length > 0) {
            logger.warn(`[SETTINGS] Rejected update from ${source}: ${errors.join('; ')}`);
            return false;
        }
        this.snapshot = next;
        this.version++;
        logger.info(`[SETTINGS] Snapshot v${this.version} installed by ${source}`);
        return true;
    }
}
