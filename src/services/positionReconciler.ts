/**
 * Position Reconciler - Crash-Safe Startup Reconciliation
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * EXCHANGE IS THE SOURCE OF TRUTH
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * Runs once at startup before the scheduler starts, and is safe to re-run.
 *
 * DESIGN PHILOSOPHY:
 * - Fail closed: if the exchange position list cannot be read, change NOTHING
 * - Never guess history: adopted positions start with an empty ladder
 * - Idempotent: a second pass with no exchange change mutates nothing
 *
 * ALGORITHM:
 * 1. Fetch all open exchange positions (failure → abort, no mutation)
 * 2. ORPHANS (exchange ∖ local) → adopt:
 *    - direction, entry, size from the exchange
 *    - atr_entry from a fresh candle fetch, fallback 1% of entry
 *    - sl_price from an existing STOP_MARKET order, fallback 1% from entry
 *    - entry_time = now, ladder reset
 * 3. GHOSTS (local ∖ exchange) → delete locally
 * 4. Direction mismatch on the same symbol → the local record is replaced
 * 5. A symbol reported with both a long and a short leg (hedge mode) is
 *    logged and left untouched on both sides
 *
 * POSTCONDITION: local symbols == exchange symbols, hedged symbols aside
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { PositionRecord } from '../types';
import { TradingSettings } from '../config/settings';
import { StateManager } from '../storage/stateManager';
import { ExchangeClient, ExchangePosition } from '../exchange/types';
import { RetryPolicy, withRetry } from '../utils/retry';
import { Clock, nowSeconds, sleep as realSleep } from '../utils/clock';
import { describeFailure } from '../utils/result';
import { latestAtr } from '../strategy/indicators';
import { createPartialsMap } from '../engine/partialLadder';
import logger from '../utils/logger';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export interface ReconcileDeps {
    exchange: ExchangeClient;
    state: StateManager;
    settings: TradingSettings;
    clock: Clock;
    sleep?: (ms: number) => Promise<void>;
}

export interface ReconcileResult {
    aborted: boolean;
    adopted: string[];
    removed: string[];
    /** symbols reported with both a long and a short leg; left untouched */
    skipped: string[];
    reason?: string;
}

/** Fallbacks when an orphan's history cannot be recovered */
export const RECONCILE_DEFAULTS = {
    ATR_FALLBACK_PCT: 0.01,
    STOP_FALLBACK_PCT: 0.01,
    ATR_CANDLES: 100,
};

// ═══════════════════════════════════════════════════════════════════════════════
// ORPHAN SYNTHESIS
// ═══════════════════════════════════════════════════════════════════════════════

async function recoverAtr(deps: ReconcileDeps, policy: RetryPolicy, symbol: string, entryPrice: number): Promise<number> {
    const candles = await withRetry(
        `reconcile ohlcv ${symbol}`,
        () => deps.exchange.fetchOhlcv(symbol, deps.settings.timeframe, RECONCILE_DEFAULTS.ATR_CANDLES),
        policy,
        deps.sleep ?? realSleep
    );
    if (candles.kind === 'ok') {
        const atr = latestAtr(candles.value);
        if (atr !== null) return atr;
    }
    const fallback = entryPrice * RECONCILE_DEFAULTS.ATR_FALLBACK_PCT;
    logger.warn(`[RECONCILE] ${symbol} ATR unavailable, using 1% of entry (${fallback})`);
    return fallback;
}

async function recoverStop(deps: ReconcileDeps, policy: RetryPolicy, exchangePosition: ExchangePosition, isLong: boolean): Promise<number> {
    const { symbol, entryPrice } = exchangePosition;
    const orders = await withRetry(
        `reconcile orders ${symbol}`,
        () => deps.exchange.getOpenOrders(symbol),
        policy,
        deps.sleep ?? realSleep
    );
    if (orders.kind === 'ok') {
        const stopOrder = orders.value.find(o => o.type.toUpperCase() === 'STOP_MARKET' && o.stopPrice !== null);
        if (stopOrder && stopOrder.stopPrice !== null) {
            logger.info(`[RECONCILE] ${symbol} recovered stop ${stopOrder.stopPrice} from order ${stopOrder.id}`);
            return stopOrder.stopPrice;
        }
    } else {
        logger.warn(`[RECONCILE] ${symbol} open orders unavailable: ${describeFailure(orders)}`);
    }
    const fallback = isLong
        ? entryPrice * (1 - RECONCILE_DEFAULTS.STOP_FALLBACK_PCT)
        : entryPrice * (1 + RECONCILE_DEFAULTS.STOP_FALLBACK_PCT);
    logger.warn(`[RECONCILE] ${symbol} no stop order found, defaulting to ${fallback}`);
    return fallback;
}

async function adoptOrphan(deps: ReconcileDeps, policy: RetryPolicy, exchangePosition: ExchangePosition): Promise<PositionRecord> {
    const isLong = exchangePosition.side === 'long';
    const entry = exchangePosition.entryPrice;
    const nowSec = nowSeconds(deps.clock);

    const atr = await recoverAtr(deps, policy, exchangePosition.symbol, entry);
    const stop = await recoverStop(deps, policy, exchangePosition, isLong);

    return {
        direction: isLong ? 'LONG' : 'SHORT',
        entry_price: entry,
        size: exchangePosition.contracts,
        initial_size: exchangePosition.contracts,
        sl_price: stop,
        atr_entry: atr,
        p_max: entry,
        p_min: entry,
        partials: createPartialsMap(deps.settings.fixedLadder),
        last_dynamic_level: 0,
        accumulated_pnl: 0,
        breakeven_triggered: false,
        sl_moved_count: 0,
        entry_time: nowSec,
        last_sl_update: nowSec,
    };
}

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN RECONCILIATION
// ═══════════════════════════════════════════════════════════════════════════════

export async function reconcilePositions(deps: ReconcileDeps): Promise<ReconcileResult> {
    const policy = deps.settings.retry;

    logger.info('[RECONCILE] ════════════════════════════════════════════════════');
    logger.info('[RECONCILE] Starting state/exchange reconciliation...');

    const fetched = await withRetry('reconcile positions', () => deps.exchange.getAllPositions(), policy, deps.sleep ?? realSleep);
    if (fetched.kind !== 'ok') {
        const reason = `position fetch failed: ${describeFailure(fetched)}`;
        logger.error(`[RECONCILE] ❌ ABORTED, local state untouched (${reason})`);
        return { aborted: true, adopted: [], removed: [], skipped: [], reason };
    }

    const legsBySymbol = new Map<string, ExchangePosition[]>();
    for (const live of fetched.value) {
        if (!(live.contracts > 0)) continue;
        legsBySymbol.set(live.symbol, [...(legsBySymbol.get(live.symbol) ?? []), live]);
    }

    // One-way mode holds one leg per symbol. Two legs means hedge mode, which
    // the engine does not manage.
    const skipped: string[] = [];
    const exchangeBySymbol = new Map<string, ExchangePosition>();
    for (const [symbol, legs] of legsBySymbol) {
        if (legs.length > 1) {
            skipped.push(symbol);
            logger.error(`[RECONCILE] ⚠️ ${symbol} has ${legs.length} legs (${legs.map(l => `${l.side} ${l.contracts}`).join(', ')}), hedge mode is not supported, skipping`);
            continue;
        }
        exchangeBySymbol.set(symbol, legs[0]);
    }
    const local = deps.state.getPositions();

    const adopted: string[] = [];
    const removed: string[] = [];

    // Ghosts and direction mismatches
    for (const [symbol, position] of Object.entries(local)) {
        if (skipped.includes(symbol)) continue;
        const live = exchangeBySymbol.get(symbol);
        if (!live) {
            deps.state.removePosition(symbol);
            removed.push(symbol);
            logger.warn(`[RECONCILE] 👻 ${symbol} ${position.direction} not on exchange, removed`);
            continue;
        }
        const liveDirection = live.side === 'long' ? 'LONG' : 'SHORT';
        if (liveDirection !== position.direction) {
            deps.state.removePosition(symbol);
            removed.push(symbol);
            logger.warn(`[RECONCILE] ${symbol} local ${position.direction} but exchange ${liveDirection}, replacing`);
        }
    }

    // Orphans
    for (const live of exchangeBySymbol.values()) {
        if (deps.state.hasPosition(live.symbol)) continue;
        const position = await adoptOrphan(deps, policy, live);
        deps.state.setPosition(live.symbol, position);
        adopted.push(live.symbol);
        logger.info(
            `[RECONCILE] 🧲 ${live.symbol} adopted ${position.direction} ${position.size} @ ${position.entry_price} ` +
            `sl=${position.sl_price} atr=${position.atr_entry}`
        );
    }

    logger.info(
        `[RECONCILE] ✅ Complete: adopted=${adopted.length} removed=${removed.length} skipped=${skipped.length} ` +
        `open=${deps.state.getOpenSymbols().length}`
    );
    logger.info('[RECONCILE] ════════════════════════════════════════════════════');

    return { aborted: false, adopted, removed, skipped };
}
