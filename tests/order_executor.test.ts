/**
 * Order Executor Tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Test Cases:
 *   1. Dust partials escalate to a full close sized from the live position;
 *      partial amounts are floored to the lot step
 *   2. Reduce-only rejection with no live position → ALREADY_CLOSED
 *   3. Stop replacement cancels every stop (any case) and leaves other orders
 *   4. One client order id across retries
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { OrderExecutor } from '../src/execution/orderExecutor';
import { createSettings, SettingsStore } from '../src/config/settings';
import { CreateOrderRequest, Order } from '../src/exchange/types';
import { CallResult, fatal, retryable } from '../src/utils/result';
import { FakeExchange, noSleep } from './helpers/fakeExchange';

const SYMBOL = 'BTC/USDT';

function createExecutor(exchange: FakeExchange): OrderExecutor {
    return new OrderExecutor(exchange, new SettingsStore(createSettings()), noSleep);
}

/** Records every createOrder request, including the ones that fail */
class RecordingExchange extends FakeExchange {
    readonly attempted: CreateOrderRequest[] = [];

    async createOrder(request: CreateOrderRequest): Promise<CallResult<Order>> {
        this.attempted.push(request);
        return super.createOrder(request);
    }
}

describe('closePosition', () => {
    it('closes a partial above the dust floor as requested', async () => {
        const exchange = new FakeExchange();
        exchange.prices.set(SYMBOL, 100);
        exchange.setPosition(SYMBOL, 'long', 1, 100);

        const result = await createExecutor(exchange).closePosition(SYMBOL, 'LONG', 0.1, 100);

        expect(result).toEqual({
            kind: 'ok',
            value: { status: 'FILLED', orderId: 'fake-1', price: 100, amount: 0.1, fullClose: false, escalated: false },
        });
        expect(exchange.positions.get(SYMBOL)?.contracts).toBeCloseTo(0.9, 12);
        expect(exchange.createdOrders[0]).toMatchObject({ side: 'sell', amount: 0.1, params: { reduceOnly: true } });
    });

    it('escalates a dust partial to a full close of the live size', async () => {
        const exchange = new FakeExchange();
        exchange.prices.set(SYMBOL, 100);
        exchange.setPosition(SYMBOL, 'long', 0.3, 100);

        const result = await createExecutor(exchange).closePosition(SYMBOL, 'LONG', 0.04, 100);

        expect(result.kind).toBe('ok');
        if (result.kind !== 'ok' || result.value.status !== 'FILLED') throw new Error('expected a fill');
        expect(result.value.amount).toBe(0.3);
        expect(result.value.fullClose).toBe(true);
        expect(result.value.escalated).toBe(true);
        expect(exchange.positions.has(SYMBOL)).toBe(false);
    });

    it('escalates a partial that floors below the minimum amount', async () => {
        const exchange = new FakeExchange();
        exchange.prices.set(SYMBOL, 1005);
        exchange.setPosition(SYMBOL, 'long', 0.123, 1000);
        exchange.limits.set(SYMBOL, { minAmount: 0.01, minNotional: 5, amountStep: 0.01, priceStep: 0.1 });

        const result = await createExecutor(exchange).closePosition(SYMBOL, 'LONG', 0.00615, 1005);

        expect(result).toEqual({
            kind: 'ok',
            value: { status: 'FILLED', orderId: 'fake-1', price: 1005, amount: 0.123, fullClose: true, escalated: true },
        });
        expect(exchange.positions.has(SYMBOL)).toBe(false);
    });

    it('fails the close when market limits cannot be read', async () => {
        const exchange = new FakeExchange();
        exchange.setPosition(SYMBOL, 'long', 1, 100);
        exchange.failNext('getMarketLimits', fatal('down'));
        const result = await createExecutor(exchange).closePosition(SYMBOL, 'LONG', 0.5, 100);
        expect(result.kind).toBe('fatal');
        expect(exchange.countCalls('createOrder')).toBe(0);
    });

    it('reports ALREADY_CLOSED when a full close finds nothing live', async () => {
        const exchange = new FakeExchange();
        const result = await createExecutor(exchange).closePosition(SYMBOL, 'SHORT', null, 100);
        expect(result).toEqual({ kind: 'ok', value: { status: 'ALREADY_CLOSED' } });
        expect(exchange.countCalls('createOrder')).toBe(0);
    });

    it('treats a reduce-only rejection with no live position as ALREADY_CLOSED', async () => {
        const exchange = new FakeExchange();
        exchange.prices.set(SYMBOL, 100);

        const result = await createExecutor(exchange).closePosition(SYMBOL, 'LONG', 0.5, 100);

        expect(result).toEqual({ kind: 'ok', value: { status: 'ALREADY_CLOSED' } });
        expect(exchange.countCalls('createOrder')).toBe(1);
    });

    it('ignores a live position on the other side', async () => {
        const exchange = new FakeExchange();
        exchange.setPosition(SYMBOL, 'short', 1, 100);
        const result = await createExecutor(exchange).closePosition(SYMBOL, 'LONG', null, 100);
        expect(result).toEqual({ kind: 'ok', value: { status: 'ALREADY_CLOSED' } });
    });

    it('reuses one client order id across retries', async () => {
        const exchange = new RecordingExchange();
        exchange.prices.set(SYMBOL, 100);
        exchange.setPosition(SYMBOL, 'long', 1, 100);
        exchange.failNext('createOrder', retryable('timeout'), 2);

        const result = await createExecutor(exchange).closePosition(SYMBOL, 'LONG', 0.5, 100);

        expect(result.kind).toBe('ok');
        expect(exchange.attempted).toHaveLength(3);
        const ids = new Set(exchange.attempted.map(r => r.params?.clientOrderId));
        expect(ids.size).toBe(1);
    });
});

describe('setStopLoss', () => {
    it('cancels every stop order regardless of case and places one rounded stop', async () => {
        const exchange = new FakeExchange();
        exchange.addOrder({ id: 'old-1', symbol: SYMBOL, type: 'stop_market', stopPrice: 94 });
        exchange.addOrder({ id: 'old-2', symbol: SYMBOL, type: 'STOP_MARKET', stopPrice: 95 });
        exchange.addOrder({ id: 'tp-1', symbol: SYMBOL, type: 'TAKE_PROFIT_MARKET', stopPrice: 120 });

        const result = await createExecutor(exchange).setStopLoss(SYMBOL, 'LONG', 97.004);

        expect(result.kind).toBe('ok');
        expect(exchange.cancelledOrderIds).toEqual(['old-1', 'old-2']);
        expect(exchange.createdOrders).toEqual([{
            symbol: SYMBOL,
            type: 'STOP_MARKET',
            side: 'sell',
            amount: null,
            params: { stopPrice: 97, closePosition: true },
        }]);
        expect(exchange.openOrders.map(o => o.id)).toEqual(['tp-1', 'fake-1']);
    });

    it('still places the stop when open orders cannot be listed', async () => {
        const exchange = new FakeExchange();
        exchange.failNext('getOpenOrders', retryable('timeout'), 3);
        const result = await createExecutor(exchange).setStopLoss(SYMBOL, 'SHORT', 105);
        expect(result.kind).toBe('ok');
        expect(exchange.createdOrders[0]).toMatchObject({ type: 'STOP_MARKET', side: 'buy' });
    });
});

describe('openPosition', () => {
    it('returns the executed fill', async () => {
        const exchange = new FakeExchange();
        exchange.fillPrice = 100.5;
        const result = await createExecutor(exchange).openPosition(SYMBOL, 'SHORT', 2, 100);
        expect(result).toEqual({ kind: 'ok', value: { orderId: 'fake-1', price: 100.5, amount: 2 } });
        expect(exchange.positions.get(SYMBOL)?.side).toBe('short');
    });
});
