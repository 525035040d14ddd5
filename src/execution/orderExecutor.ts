/**
 * Order Executor — every order the engine sends goes through here
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * RULES:
 * - All exchange calls are wrapped in the configured retry policy
 * - Closes are reduce-only market orders
 * - DUST GUARD: a partial close worth less than dustNotionalUsd becomes a
 *   full close (the remainder would be unsellable)
 * - Partial amounts are floored to the lot step; one that floors below the
 *   minimum amount becomes a full close like dust
 * - A full close sizes itself from the exchange's live position, never from
 *   local arithmetic
 * - A reduce-only rejection with no live position means someone (a stop, a
 *   human) already closed it: reported as ALREADY_CLOSED, not as a failure
 * - One client order id per logical order, reused across retries, so a retry
 *   after a lost response cannot fill twice
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { v4 as uuidv4 } from 'uuid';
import { Direction, OrderSide } from '../types';
import { SettingsStore } from '../config/settings';
import { ExchangeClient, ExchangePosition, MarketLimits, Order, REDUCE_ONLY_REJECTED_CODE } from '../exchange/types';
import { CallResult, describeFailure, ok } from '../utils/result';
import { withRetry } from '../utils/retry';
import { floorToStep, roundToStep } from '../utils/math';
import { sleep as realSleep } from '../utils/clock';
import logger from '../utils/logger';

export interface Fill {
    orderId: string;
    price: number;
    amount: number;
}

export type CloseOutcome =
    | { status: 'FILLED'; orderId: string; price: number; amount: number; fullClose: boolean; escalated: boolean }
    | { status: 'ALREADY_CLOSED' };

export function entrySide(direction: Direction): OrderSide {
    return direction === 'LONG' ? 'buy' : 'sell';
}

export function exitSide(direction: Direction): OrderSide {
    return direction === 'LONG' ? 'sell' : 'buy';
}

function matchesDirection(position: ExchangePosition, direction: Direction): boolean {
    return (position.side === 'long') === (direction === 'LONG');
}

export class OrderExecutor {
    private readonly exchange: ExchangeClient;
    private readonly settings: SettingsStore;
    private readonly sleep: (ms: number) => Promise<void>;

    constructor(exchange: ExchangeClient, settings: SettingsStore, sleep: (ms: number) => Promise<void> = realSleep) {
        this.exchange = exchange;
        this.settings = settings;
        this.sleep = sleep;
    }

    private retry<T>(name: string, call: () => Promise<CallResult<T>>): Promise<CallResult<T>> {
        return withRetry(name, call, this.settings.current().retry, this.sleep);
    }

    private async roundPrice(symbol: string, price: number): Promise<number> {
        const limits = await this.fetchLimits(symbol);
        return limits.kind === 'ok' && limits.value.priceStep > 0 ? roundToStep(price, limits.value.priceStep) : price;
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // READS
    // ═══════════════════════════════════════════════════════════════════════════

    async fetchPositions(): Promise<CallResult<ExchangePosition[]>> {
        return this.retry('positions', () => this.exchange.getAllPositions());
    }

    async fetchPrice(symbol: string): Promise<CallResult<number>> {
        return this.retry(`price ${symbol}`, () => this.exchange.getMarketPrice(symbol));
    }

    async fetchLimits(symbol: string): Promise<CallResult<MarketLimits>> {
        return this.retry(`limits ${symbol}`, () => this.exchange.getMarketLimits(symbol));
    }

    /**
     * Live exchange position for symbol/direction; ok(null) when flat.
     */
    async getLivePosition(symbol: string, direction: Direction): Promise<CallResult<ExchangePosition | null>> {
        const positions = await this.fetchPositions();
        if (positions.kind !== 'ok') return positions;
        const live = positions.value.find(p => p.symbol === symbol && matchesDirection(p, direction) && p.contracts > 0);
        return ok(live ?? null);
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // ENTRIES
    // ═══════════════════════════════════════════════════════════════════════════

    /**
     * Market entry. The returned fill carries the executed price and amount,
     * which may differ from the request.
     */
    async openPosition(symbol: string, direction: Direction, amount: number, referencePrice: number): Promise<CallResult<Fill>> {
        const clientOrderId = uuidv4();
        const result = await this.retry(`open ${symbol}`, () =>
            this.exchange.createOrder({
                symbol,
                type: 'market',
                side: entrySide(direction),
                amount,
                params: { clientOrderId },
            })
        );
        if (result.kind !== 'ok') return result;

        const order = result.value;
        const fill: Fill = {
            orderId: order.id,
            price: order.average ?? referencePrice,
            amount: order.filled > 0 ? order.filled : amount,
        };
        logger.info(`[ORDER] ${symbol} ${direction} opened ${fill.amount} @ ${fill.price} (order ${fill.orderId})`);
        return ok(fill);
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // EXITS
    // ═══════════════════════════════════════════════════════════════════════════

    /**
     * Reduce-only market close. `amount` null means close everything.
     * `referencePrice` values the dust check and stands in for a missing fill price.
     */
    async closePosition(
        symbol: string,
        direction: Direction,
        amount: number | null,
        referencePrice: number
    ): Promise<CallResult<CloseOutcome>> {
        let closeAmount = amount;
        let escalated = false;
        const { dustNotionalUsd } = this.settings.current();

        if (closeAmount !== null && closeAmount * referencePrice < dustNotionalUsd) {
            logger.info(`[DUST] ${symbol} partial of ${closeAmount} ($${(closeAmount * referencePrice).toFixed(2)}) below $${dustNotionalUsd}, escalating to full close`);
            closeAmount = null;
            escalated = true;
        }

        if (closeAmount !== null) {
            const limits = await this.fetchLimits(symbol);
            if (limits.kind !== 'ok') return limits;
            const stepped = floorToStep(closeAmount, limits.value.amountStep);
            if (!(stepped > 0) || stepped < limits.value.minAmount) {
                logger.info(`[DUST] ${symbol} partial of ${closeAmount} floors to ${stepped} (step ${limits.value.amountStep}), escalating to full close`);
                closeAmount = null;
                escalated = true;
            } else {
                closeAmount = stepped;
            }
        }

        if (closeAmount === null) {
            const live = await this.getLivePosition(symbol, direction);
            if (live.kind !== 'ok') return live;
            if (live.value === null) {
                logger.info(`[ORDER] ${symbol} no live ${direction} position to close`);
                return ok<CloseOutcome>({ status: 'ALREADY_CLOSED' });
            }
            closeAmount = live.value.contracts;
        }

        const clientOrderId = uuidv4();
        const size = closeAmount;
        const result = await this.retry(`close ${symbol}`, () =>
            this.exchange.createOrder({
                symbol,
                type: 'market',
                side: exitSide(direction),
                amount: size,
                params: { reduceOnly: true, clientOrderId },
            })
        );

        if (result.kind === 'fatal' && result.error.code === REDUCE_ONLY_REJECTED_CODE) {
            const live = await this.getLivePosition(symbol, direction);
            if (live.kind === 'ok' && live.value === null) {
                logger.info(`[ORDER] ${symbol} reduce-only rejected and no live position: already closed`);
                return ok<CloseOutcome>({ status: 'ALREADY_CLOSED' });
            }
            logger.error(`[ORDER] ${symbol} reduce-only rejected while a position is still live`);
            return result;
        }
        if (result.kind !== 'ok') return result;

        const order: Order = result.value;
        const filled = order.filled > 0 ? order.filled : size;
        const price = order.average ?? referencePrice;
        const fullClose = amount === null || escalated;
        logger.info(`[ORDER] ${symbol} ${direction} closed ${filled} @ ${price}${fullClose ? ' (full)' : ''}`);
        return ok<CloseOutcome>({ status: 'FILLED', orderId: order.id, price, amount: filled, fullClose, escalated });
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // PROTECTIVE ORDERS
    // ═══════════════════════════════════════════════════════════════════════════

    /**
     * Replace the exchange-side stop: cancel every STOP_MARKET order on the
     * symbol (type compared case-insensitively), then place a new one that
     * closes the whole position.
     */
    async setStopLoss(symbol: string, direction: Direction, stopPrice: number): Promise<CallResult<Order>> {
        const open = await this.retry(`open orders ${symbol}`, () => this.exchange.getOpenOrders(symbol));
        if (open.kind === 'ok') {
            for (const order of open.value) {
                if (order.type.toUpperCase() !== 'STOP_MARKET') continue;
                const cancelled = await this.retry(`cancel ${order.id}`, () => this.exchange.cancelOrder(order.id, symbol));
                if (cancelled.kind !== 'ok') {
                    logger.warn(`[STOP] ${symbol} could not cancel stale stop ${order.id}: ${describeFailure(cancelled)}`);
                }
            }
        } else {
            logger.warn(`[STOP] ${symbol} could not list open orders: ${describeFailure(open)}`);
        }

        const price = await this.roundPrice(symbol, stopPrice);
        const result = await this.retry(`stop ${symbol}`, () =>
            this.exchange.createOrder({
                symbol,
                type: 'STOP_MARKET',
                side: exitSide(direction),
                amount: null,
                params: { stopPrice: price, closePosition: true },
            })
        );
        if (result.kind === 'ok') {
            logger.info(`[STOP] ${symbol} stop set @ ${price}`);
        }
        return result;
    }

    /**
     * Far take-profit that caps a runaway position if this process dies.
     */
    async setTakeProfit(symbol: string, direction: Direction, targetPrice: number): Promise<CallResult<Order>> {
        const price = await this.roundPrice(symbol, targetPrice);
        return this.retry(`take-profit ${symbol}`, () =>
            this.exchange.createOrder({
                symbol,
                type: 'TAKE_PROFIT_MARKET',
                side: exitSide(direction),
                amount: null,
                params: { stopPrice: price, closePosition: true },
            })
        );
    }

    async cancelAllOrders(symbol: string): Promise<CallResult<void>> {
        return this.retry(`cancel all ${symbol}`, () => this.exchange.cancelAllOrders(symbol));
    }

    async setLeverage(symbol: string, leverage: number): Promise<CallResult<void>> {
        return this.retry(`leverage ${symbol}`, () => this.exchange.setLeverage(symbol, leverage));
    }
}
