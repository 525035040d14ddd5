/**
 * Position Lifecycle — the per-symbol state machine
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * STATES:  (flat) ──entry──▶ OPEN ──partials / stop ratchets──▶ OPEN ──exit──▶ (flat)
 *
 * MONITOR TICK (every 2s, live price), per open position:
 *   1. Reconcile with the exchange's live position (gone → purge, size → sync)
 *   2. Early invalidation (exit chain, realtime mode)
 *   3. Partial ladder: at most one level per tick
 *   4. Breakeven ratchet
 *
 * CANDLE TICK (strategy cycle, closed candles):
 *   Update p_max / p_min, then the full exit chain (candle mode) incl. trailing.
 *
 * INVARIANTS:
 * - sl_price only moves in the position's favour (every move goes through applyStop)
 * - accumulated_pnl = Σ partial (fill − entry) × filled − commission
 * - A full close is complete only when the executor confirms it; a failed
 *   close leaves the position in place for the next tick
 * - One symbol's failure never stops the others from being processed
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { Direction, ExitReason, IndicatorRow, PositionRecord, TradeOutcome, TradeOutcomeSink } from '../types';
import { SettingsStore, TradingSettings } from '../config/settings';
import { StateManager } from '../storage/stateManager';
import { OrderExecutor } from '../execution/orderExecutor';
import { ExchangePosition } from '../exchange/types';
import { calculateInitialStop, directionSign, isStopImprovement, priceAtPct } from '../risk/stopCalculator';
import { calculatePositionSize } from '../risk/exposureSizer';
import { Clock, nowSeconds } from '../utils/clock';
import { describeFailure } from '../utils/result';
import { rateLimitedLog } from '../utils/rateLimitedLogger';
import logger from '../utils/logger';
import { LadderAction, createPartialsMap, evaluatePartialLadder, partialRealisedPnl } from './partialLadder';
import { ExitChainResult, evaluateExitChain } from './exitChain';

export interface LifecycleDeps {
    executor: OrderExecutor;
    state: StateManager;
    settings: SettingsStore;
    outcomes: TradeOutcomeSink;
    clock: Clock;
}

export type StopApplyResult = 'MOVED' | 'NOT_IMPROVED' | 'FAILED';

export interface EntryRequest {
    symbol: string;
    direction: Direction;
    /** last closed candle; its ATR becomes atr_entry */
    row: IndicatorRow;
    balance: number;
}

// Size difference (relative) above which the local record is synced to the exchange.
const SIZE_SYNC_TOLERANCE = 0.001;
const ORPHAN_ORDER_CLEANUP_MS = 30 * 1000;

export class PositionLifecycle {
    private readonly executor: OrderExecutor;
    private readonly state: StateManager;
    private readonly settings: SettingsStore;
    private readonly outcomes: TradeOutcomeSink;
    private readonly clock: Clock;

    private lastOrphanCleanupMs = 0;

    constructor(deps: LifecycleDeps) {
        this.executor = deps.executor;
        this.state = deps.state;
        this.settings = deps.settings;
        this.outcomes = deps.outcomes;
        this.clock = deps.clock;
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // MONITOR TICK
    // ═══════════════════════════════════════════════════════════════════════════

    async monitorPositions(): Promise<void> {
        const symbols = this.state.getOpenSymbols();
        if (symbols.length === 0) {
            await this.cleanupOrphanOrders();
            return;
        }

        const live = await this.executor.fetchPositions();
        if (live.kind !== 'ok') {
            rateLimitedLog('monitor', 'positions', `position fetch failed, skipping tick: ${describeFailure(live)}`, undefined, 'warn', this.clock.now());
            return;
        }

        for (const symbol of symbols) {
            try {
                await this.monitorSymbol(symbol, live.value);
            } catch (err: unknown) {
                const message = err instanceof Error ? err.message : String(err);
                logger.error(`[MONITOR] ${symbol} failed: ${message}`);
            }
        }
    }

    private async monitorSymbol(symbol: string, livePositions: readonly ExchangePosition[]): Promise<void> {
        let position = this.state.getPosition(symbol);
        if (!position) return;

        const isLong = position.direction === 'LONG';
        const live = livePositions.find(p => p.symbol === symbol && (p.side === 'long') === isLong);
        if (!live) {
            logger.warn(`[MONITOR] ${symbol} ${position.direction} no longer on exchange (stop hit or closed manually), removing`);
            await this.purge(symbol);
            return;
        }

        if (Math.abs(live.contracts - position.size) > position.size * SIZE_SYNC_TOLERANCE) {
            logger.info(`[MONITOR] ${symbol} size sync ${position.size} → ${live.contracts}`);
            position = this.state.updatePosition(symbol, { size: live.contracts }) ?? position;
        }

        const priceResult = await this.executor.fetchPrice(symbol);
        if (priceResult.kind !== 'ok') {
            rateLimitedLog('monitor', symbol, `${symbol} price unavailable, skipping: ${describeFailure(priceResult)}`, undefined, 'warn', this.clock.now());
            return;
        }
        const price = priceResult.value;
        const settings = this.settings.current();

        const chain = evaluateExitChain({
            mode: 'realtime',
            price,
            position,
            nowSec: nowSeconds(this.clock),
            exits: settings.exits,
            stops: settings.stops,
        });
        if (chain.exit) {
            logger.warn(`[EXIT] ${symbol} ${chain.exit.reason}: ${chain.exit.detail}`);
            await this.closeFull(symbol, position, chain.exit.reason, price);
            return;
        }

        const action = evaluatePartialLadder(position, price, {
            fixedLadder: settings.fixedLadder,
            dynamicLadder: settings.dynamicLadder,
            firstLevelStopBufferPct: settings.exits.firstLevelStopBufferPct,
        });
        if (action) {
            const stillOpen = await this.executePartial(symbol, position, action, price);
            if (!stillOpen) return;
        }

        await this.applyChainStop(symbol, chain, 'BREAKEVEN');
    }

    /**
     * Cancel leftover protective orders while flat.
     */
    private async cleanupOrphanOrders(): Promise<void> {
        const now = this.clock.now();
        if (now - this.lastOrphanCleanupMs < ORPHAN_ORDER_CLEANUP_MS) return;
        this.lastOrphanCleanupMs = now;

        for (const symbol of this.settings.current().symbols) {
            const result = await this.executor.cancelAllOrders(symbol);
            if (result.kind !== 'ok') {
                logger.debug(`[MONITOR] ${symbol} orphan order cleanup failed: ${describeFailure(result)}`);
            }
        }
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // CANDLE TICK
    // ═══════════════════════════════════════════════════════════════════════════

    /**
     * Run the full exit chain against closed candles. `rows` must end with the
     * last CLOSED candle.
     */
    async onCandleClose(symbol: string, rows: readonly IndicatorRow[]): Promise<void> {
        let position = this.state.getPosition(symbol);
        const last = rows[rows.length - 1];
        if (!position || !last) return;

        const pMax = Math.max(position.p_max, last.high);
        const pMin = Math.min(position.p_min, last.low);
        if (pMax !== position.p_max || pMin !== position.p_min) {
            position = this.state.updatePosition(symbol, { p_max: pMax, p_min: pMin }) ?? position;
        }

        const settings = this.settings.current();
        const chain = evaluateExitChain({
            mode: 'candle',
            candles: rows,
            position,
            nowSec: nowSeconds(this.clock),
            exits: settings.exits,
            stops: settings.stops,
        });

        if (chain.exit) {
            logger.warn(`[EXIT] ${symbol} ${chain.exit.reason}: ${chain.exit.detail}`);
            await this.closeFull(symbol, position, chain.exit.reason, last.close);
            return;
        }

        await this.applyChainStop(symbol, chain, chain.trailingMoved ? 'TRAILING' : 'BREAKEVEN');
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // ENTRY
    // ═══════════════════════════════════════════════════════════════════════════

    /**
     * Size, open and protect a new position. Returns true when a position was opened.
     */
    async openPosition(request: EntryRequest): Promise<boolean> {
        const { symbol, direction, row, balance } = request;
        const settings = this.settings.current();

        if (this.state.hasPosition(symbol)) {
            logger.warn(`[ENTRY] ${symbol} already has a position, skipping`);
            return false;
        }

        const limits = await this.executor.fetchLimits(symbol);
        if (limits.kind !== 'ok') {
            logger.warn(`[ENTRY] ${symbol} market limits unavailable: ${describeFailure(limits)}`);
            return false;
        }

        const priceResult = await this.executor.fetchPrice(symbol);
        const referencePrice = priceResult.kind === 'ok' ? priceResult.value : row.close;
        const plannedStop = calculateInitialStop(referencePrice, row.atr, direction, settings.stops);

        const sizing = calculatePositionSize({
            symbol,
            entryPrice: referencePrice,
            stopPrice: plannedStop,
            balance,
            openPositions: Object.values(this.state.getPositions()),
            limits: limits.value,
            sizingMode: settings.sizingMode,
            leverage: settings.leverage,
            maxTotalExposureUsd: settings.maxTotalExposureUsd,
            commissionBuffer: settings.commissionBuffer,
            minNotionalBuffer: settings.minNotionalBuffer,
        });
        if (sizing.rejected) return false;

        const leverage = await this.executor.setLeverage(symbol, settings.leverage);
        if (leverage.kind !== 'ok') {
            logger.warn(`[ENTRY] ${symbol} could not set leverage ${settings.leverage}x: ${describeFailure(leverage)}`);
            return false;
        }

        const fill = await this.executor.openPosition(symbol, direction, sizing.size, referencePrice);
        if (fill.kind !== 'ok') {
            logger.error(`[ENTRY] ${symbol} ${direction} order failed: ${describeFailure(fill)}`);
            return false;
        }

        const entryPrice = fill.value.price;
        const stop = calculateInitialStop(entryPrice, row.atr, direction, settings.stops);
        const nowSec = nowSeconds(this.clock);

        const position: PositionRecord = {
            direction,
            entry_price: entryPrice,
            size: fill.value.amount,
            initial_size: fill.value.amount,
            sl_price: stop,
            atr_entry: row.atr,
            p_max: entryPrice,
            p_min: entryPrice,
            partials: createPartialsMap(settings.fixedLadder),
            last_dynamic_level: 0,
            accumulated_pnl: 0,
            breakeven_triggered: false,
            sl_moved_count: 0,
            entry_time: nowSec,
            last_sl_update: nowSec,
        };
        this.state.setPosition(symbol, position);
        this.state.recordTrade(nowSec);

        logger.info(`[ENTRY] 🟢 ${symbol} ${direction} ${position.size} @ ${entryPrice} sl=${stop.toFixed(4)} atr=${row.atr.toFixed(4)}`);

        const stopResult = await this.executor.setStopLoss(symbol, direction, stop);
        if (stopResult.kind !== 'ok') {
            logger.error(`[ENTRY] ${symbol} 🚨 position is UNPROTECTED, stop placement failed: ${describeFailure(stopResult)}`);
        }

        const target = priceAtPct(direction, entryPrice, settings.stops.safetyTakeProfitPct);
        const tpResult = await this.executor.setTakeProfit(symbol, direction, target);
        if (tpResult.kind !== 'ok') {
            logger.warn(`[ENTRY] ${symbol} safety take-profit not placed: ${describeFailure(tpResult)}`);
        }

        return true;
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // PARTIALS
    // ═══════════════════════════════════════════════════════════════════════════

    /**
     * Returns true while the position is still open afterwards.
     */
    private async executePartial(symbol: string, position: PositionRecord, action: LadderAction, price: number): Promise<boolean> {
        const label = action.kind === 'FIXED' ? action.levelName : `D${action.level}`;
        const result = await this.executor.closePosition(symbol, position.direction, action.closeAmount, price);

        if (result.kind !== 'ok') {
            logger.error(`[PARTIAL] ${symbol} ${label} close failed (${describeFailure(result)}), resyncing from exchange`);
            return this.resyncSize(symbol, position);
        }

        const outcome = result.value;
        if (outcome.status === 'ALREADY_CLOSED') {
            logger.warn(`[PARTIAL] ${symbol} ${label}: exchange has no position, removing`);
            await this.purge(symbol);
            return false;
        }

        if (outcome.fullClose) {
            await this.completeClose(symbol, position, outcome.price, outcome.amount, 'DUST_ESCALATION');
            return false;
        }

        const settings = this.settings.current();
        const realised = partialRealisedPnl(position, outcome.price, outcome.amount, settings.commissionRate);
        const remaining = position.size - outcome.amount;

        const patch: Partial<PositionRecord> = {
            size: remaining,
            accumulated_pnl: position.accumulated_pnl + realised,
        };
        if (action.kind === 'FIXED') {
            patch.partials = { ...position.partials, [action.levelName]: true };
        } else {
            patch.last_dynamic_level = action.level;
        }
        this.state.updatePosition(symbol, patch);

        logger.info(
            `[PARTIAL] 💰 ${symbol} ${label} @ +${(action.thresholdPct * 100).toFixed(2)}% closed ${outcome.amount} @ ${outcome.price} ` +
            `pnl=${realised.toFixed(4)} accumulated=${(position.accumulated_pnl + realised).toFixed(4)} remaining=${remaining}`
        );

        if (!(remaining > 0)) {
            await this.completeClose(symbol, { ...position, accumulated_pnl: position.accumulated_pnl + realised }, outcome.price, 0, 'LADDER_EXHAUSTED');
            return false;
        }

        await this.applyStop(symbol, action.newStop, `LADDER ${label}`);
        return true;
    }

    /**
     * After a failed partial, trust the exchange's size. Returns true while
     * the position is still open.
     */
    private async resyncSize(symbol: string, position: PositionRecord): Promise<boolean> {
        const live = await this.executor.getLivePosition(symbol, position.direction);
        if (live.kind !== 'ok') {
            logger.warn(`[PARTIAL] ${symbol} resync deferred, position fetch failed: ${describeFailure(live)}`);
            return true;
        }
        if (live.value === null) {
            logger.warn(`[PARTIAL] ${symbol} exchange reports no position, purging locally`);
            await this.purge(symbol);
            return false;
        }
        this.state.updatePosition(symbol, { size: live.value.contracts });
        logger.info(`[PARTIAL] ${symbol} size resynced to ${live.value.contracts}`);
        return true;
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // STOPS
    // ═══════════════════════════════════════════════════════════════════════════

    private async applyChainStop(symbol: string, chain: ExitChainResult, source: string): Promise<void> {
        let result: StopApplyResult = 'NOT_IMPROVED';
        if (chain.newStop !== null) {
            result = await this.applyStop(symbol, chain.newStop, source);
        }
        if (chain.breakevenTriggered && result !== 'FAILED') {
            this.state.updatePosition(symbol, { breakeven_triggered: true });
            logger.info(`[STOP] ${symbol} breakeven latched at pnl=${(chain.pnlPct * 100).toFixed(3)}%`);
        }
    }

    /**
     * Move the stop to `candidate` if, and only if, that tightens it. The local
     * record changes only after the exchange accepted the new stop order.
     */
    async applyStop(symbol: string, candidate: number, source: string): Promise<StopApplyResult> {
        const position = this.state.getPosition(symbol);
        if (!position || !isStopImprovement(position.sl_price, candidate, position.direction)) {
            return 'NOT_IMPROVED';
        }

        const placed = await this.executor.setStopLoss(symbol, position.direction, candidate);
        if (placed.kind !== 'ok') {
            logger.warn(`[STOP] ${symbol} ${source} move to ${candidate} failed: ${describeFailure(placed)}`);
            return 'FAILED';
        }

        this.state.updatePosition(symbol, {
            sl_price: candidate,
            last_sl_update: nowSeconds(this.clock),
            sl_moved_count: position.sl_moved_count + 1,
        });
        logger.info(`[STOP] 🔒 ${symbol} ${source} ${position.sl_price.toFixed(4)} → ${candidate.toFixed(4)}`);
        return 'MOVED';
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // FULL CLOSE
    // ═══════════════════════════════════════════════════════════════════════════

    /**
     * Close everything. Returns false when the close order failed; the position
     * is kept and the exit is re-evaluated next tick.
     */
    async closeFull(symbol: string, position: PositionRecord, reason: ExitReason, referencePrice: number): Promise<boolean> {
        const result = await this.executor.closePosition(symbol, position.direction, null, referencePrice);
        if (result.kind !== 'ok') {
            logger.error(`[EXIT] ${symbol} ${reason} close failed, will retry next tick: ${describeFailure(result)}`);
            return false;
        }

        const outcome = result.value;
        if (outcome.status === 'ALREADY_CLOSED') {
            await this.completeClose(symbol, position, referencePrice, position.size, reason);
        } else {
            await this.completeClose(symbol, position, outcome.price, outcome.amount, reason);
        }
        return true;
    }

    /**
     * Shared tail of every full close: book the trade, then drop the symbol's
     * protective orders so a stale stop or take-profit cannot hit a later entry.
     */
    private async completeClose(
        symbol: string,
        position: PositionRecord,
        exitPrice: number,
        closedSize: number,
        reason: ExitReason
    ): Promise<void> {
        this.finalizeClose(symbol, position, exitPrice, closedSize, reason);
        await this.cancelLeftoverOrders(symbol);
    }

    private async cancelLeftoverOrders(symbol: string): Promise<void> {
        const cancelled = await this.executor.cancelAllOrders(symbol);
        if (cancelled.kind !== 'ok') {
            logger.warn(`[EXIT] ${symbol} leftover orders not cancelled: ${describeFailure(cancelled)}`);
        }
    }

    /**
     * Realise PnL, report the trade, update account counters, drop the position.
     */
    private finalizeClose(symbol: string, position: PositionRecord, exitPrice: number, closedSize: number, reason: ExitReason): TradeOutcome {
        const settings: TradingSettings = this.settings.current();
        const nowSec = nowSeconds(this.clock);
        const entry = position.entry_price;

        const grossPnl = directionSign(position.direction) * (exitPrice - entry) * closedSize;
        const commission = settings.commissionRate * (entry + exitPrice) * closedSize;
        const netPnl = grossPnl + position.accumulated_pnl - commission;
        // ROI against the margin the trade started with; netPnl spans every partial too
        const margin = (position.initial_size * entry) / settings.leverage;
        const roi = margin > 0 ? netPnl / margin : 0;

        const outcome: TradeOutcome = {
            symbol,
            direction: position.direction,
            entryPrice: entry,
            exitPrice,
            closedSize,
            grossPnl,
            commission,
            partialPnl: position.accumulated_pnl,
            netPnl,
            roi,
            reason,
            durationSec: nowSec - position.entry_time,
        };

        try {
            this.outcomes.record(outcome);
        } catch (err: unknown) {
            const message = err instanceof Error ? err.message : String(err);
            logger.error(`[EXIT] ${symbol} outcome reporting failed: ${message}`);
        }

        this.state.addDailyPnl(netPnl);
        this.state.recordSymbolClose(symbol, nowSec);
        this.state.removePosition(symbol);

        const icon = netPnl >= 0 ? '✅' : '❌';
        logger.info(
            `[EXIT] ${icon} ${symbol} ${position.direction} ${reason} entry=${entry} exit=${exitPrice} ` +
            `gross=${grossPnl.toFixed(4)} partials=${position.accumulated_pnl.toFixed(4)} fees=${commission.toFixed(4)} ` +
            `net=${netPnl.toFixed(4)} roi=${(roi * 100).toFixed(2)}%`
        );
        return outcome;
    }

    /**
     * Drop a position the exchange no longer holds. No PnL is guessed.
     */
    private async purge(symbol: string): Promise<void> {
        this.state.removePosition(symbol);
        this.state.recordSymbolClose(symbol, nowSeconds(this.clock));
        await this.cancelLeftoverOrders(symbol);
    }
}
