/**
 * Exchange Collaborator Contract
 *
 * Everything the engine needs from the derivatives venue. Symbols are always
 * in unified BASE/QUOTE form ("BTC/USDT"); adapters translate to and from the
 * venue's own ids. Every call resolves to a CallResult and never rejects.
 */

import { Candle, OrderSide } from '../types';
import { CallResult } from '../utils/result';

export type OrderType = 'market' | 'limit' | 'STOP_MARKET' | 'TAKE_PROFIT_MARKET';

export interface OrderParams {
    reduceOnly?: boolean;
    stopPrice?: number;
    closePosition?: boolean;
    clientOrderId?: string;
}

export interface Order {
    id: string;
    symbol: string;
    /** venue-reported type; case is not guaranteed */
    type: string;
    side: OrderSide;
    amount: number;
    filled: number;
    /** average fill price, null until something fills */
    average: number | null;
    stopPrice: number | null;
    status: string;
}

export interface OrderBookLevel {
    price: number;
    amount: number;
}

export interface OrderBook {
    bids: OrderBookLevel[];
    asks: OrderBookLevel[];
}

export interface ExchangePosition {
    symbol: string;
    side: 'long' | 'short';
    /** absolute size in base units */
    contracts: number;
    entryPrice: number;
    markPrice: number | null;
}

export interface Balance {
    /** USDT available for new margin */
    free: number;
    total: number;
}

export interface MarketLimits {
    minAmount: number;
    minNotional: number;
    amountStep: number;
    priceStep: number;
}

export interface CreateOrderRequest {
    symbol: string;
    type: OrderType;
    side: OrderSide;
    amount: number | null;
    price?: number;
    params?: OrderParams;
}

export interface ExchangeClient {
    fetchOhlcv(symbol: string, timeframe: string, limit: number): Promise<CallResult<Candle[]>>;
    getMarketPrice(symbol: string): Promise<CallResult<number>>;
    getOrderBook(symbol: string): Promise<CallResult<OrderBook>>;
    createOrder(request: CreateOrderRequest): Promise<CallResult<Order>>;
    getOpenOrders(symbol: string): Promise<CallResult<Order[]>>;
    cancelOrder(id: string, symbol: string): Promise<CallResult<void>>;
    cancelAllOrders(symbol: string): Promise<CallResult<void>>;
    getAllPositions(): Promise<CallResult<ExchangePosition[]>>;
    getBalance(): Promise<CallResult<Balance>>;
    /** venue time in epoch milliseconds */
    getServerTime(): Promise<CallResult<number>>;
    setLeverage(symbol: string, leverage: number): Promise<CallResult<void>>;
    getMarketLimits(symbol: string): Promise<CallResult<MarketLimits>>;
}

/** Venue error code for a reduce-only order that would not reduce anything. */
export const REDUCE_ONLY_REJECTED_CODE = -2022;
