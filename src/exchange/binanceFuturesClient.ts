/**
 * Binance USDⓈ-M Futures REST Adapter
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Thin axios binding of the ExchangeClient contract.
 *
 * GUARANTEES:
 * - NEVER throws; every call resolves to ok / retryable / fatal
 * - Network errors, timeouts, HTTP 429/418/5xx and clock-skew (-1021) are retryable
 * - Auth failures (-2014, -2015, HTTP 401) and other 4xx are fatal for the call
 * - Retries are NOT done here; callers wrap calls with withRetry()
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import crypto from 'crypto';
import axios, { AxiosInstance, Method } from 'axios';
import { Candle } from '../types';
import logger from '../utils/logger';
import { AUTH_ERROR_CODES, CallFailure, CallResult, fatal, ok, retryable } from '../utils/result';
import { isRecord, toFiniteOrNull, toNumber, toStringValue } from '../utils/parse';
import { toDecimalString } from '../utils/math';
import {
    Balance,
    CreateOrderRequest,
    ExchangeClient,
    ExchangePosition,
    MarketLimits,
    Order,
    OrderBook,
    OrderBookLevel,
} from './types';

export interface BinanceCredentials {
    apiKey: string;
    apiSecret: string;
}

export interface BinanceClientOptions {
    baseUrl: string;
    timeoutMs: number;
    recvWindowMs?: number;
}

const KNOWN_QUOTES = ['USDT', 'USDC', 'BUSD'];
const RETRYABLE_CODES = new Set([-1001, -1003, -1021]);

type QueryValue = string | number | boolean;

// ═══════════════════════════════════════════════════════════════════════════════
// SYMBOL MAPPING
// ═══════════════════════════════════════════════════════════════════════════════

export function toVenueSymbol(symbol: string): string {
    return symbol.replace('/', '').toUpperCase();
}

export function fromVenueSymbol(venueSymbol: string): string {
    const upper = venueSymbol.toUpperCase();
    for (const quote of KNOWN_QUOTES) {
        if (upper.endsWith(quote) && upper.length > quote.length) {
            return `${upper.slice(0, -quote.length)}/${quote}`;
        }
    }
    return upper;
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR CLASSIFICATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Map an HTTP failure to a CallFailure. `status` is null when no response
 * arrived (DNS, reset, timeout).
 */
export function classifyFailure(status: number | null, body: unknown, message: string): CallFailure {
    const code = isRecord(body) ? toFiniteOrNull(body.code) : null;
    const venueMessage = isRecord(body) ? toStringValue(body.msg) : '';
    const text = venueMessage !== '' ? venueMessage : message;

    if (status === null) return retryable(`network: ${text}`, code, null);
    if (code !== null && AUTH_ERROR_CODES.has(code)) return fatal(`auth: ${text}`, code, status);
    if (status === 401) return fatal(`auth: ${text}`, code, status);
    if (code !== null && RETRYABLE_CODES.has(code)) return retryable(text, code, status);
    if (status === 429 || status === 418 || status >= 500) return retryable(text, code, status);
    return fatal(text, code, status);
}

// ═══════════════════════════════════════════════════════════════════════════════
// RESPONSE PARSERS
// ═══════════════════════════════════════════════════════════════════════════════

function parseOrder(raw: unknown, fallbackSymbol: string): Order | null {
    if (!isRecord(raw)) return null;
    const id = toStringValue(raw.orderId);
    if (id === '') return null;

    const avg = toFiniteOrNull(raw.avgPrice);
    const stop = toFiniteOrNull(raw.stopPrice);
    const venueSymbol = toStringValue(raw.symbol);

    return {
        id,
        symbol: venueSymbol !== '' ? fromVenueSymbol(venueSymbol) : fallbackSymbol,
        type: toStringValue(raw.type),
        side: toStringValue(raw.side).toUpperCase() === 'BUY' ? 'buy' : 'sell',
        amount: toNumber(raw.origQty),
        filled: toFiniteOrNull(raw.executedQty) ?? 0,
        average: avg !== null && avg > 0 ? avg : null,
        stopPrice: stop !== null && stop > 0 ? stop : null,
        status: toStringValue(raw.status),
    };
}

function parseBookSide(raw: unknown): OrderBookLevel[] {
    if (!Array.isArray(raw)) return [];
    const levels: OrderBookLevel[] = [];
    for (const entry of raw) {
        if (!Array.isArray(entry) || entry.length < 2) continue;
        const price = toNumber(entry[0]);
        const amount = toNumber(entry[1]);
        if (Number.isFinite(price) && Number.isFinite(amount)) levels.push({ price, amount });
    }
    return levels;
}

function parseCandle(raw: unknown): Candle | null {
    if (!Array.isArray(raw) || raw.length < 6) return null;
    const candle: Candle = {
        timestamp: toNumber(raw[0]),
        open: toNumber(raw[1]),
        high: toNumber(raw[2]),
        low: toNumber(raw[3]),
        close: toNumber(raw[4]),
        volume: toNumber(raw[5]),
    };
    return Object.values(candle).every(v => Number.isFinite(v)) ? candle : null;
}

// ═══════════════════════════════════════════════════════════════════════════════
// CLIENT
// ═══════════════════════════════════════════════════════════════════════════════

export class BinanceFuturesClient implements ExchangeClient {
    private readonly http: AxiosInstance;
    private readonly credentials: BinanceCredentials;
    private readonly recvWindowMs: number;
    private limitsCache: Map<string, MarketLimits> | null = null;

    constructor(credentials: BinanceCredentials, options: BinanceClientOptions) {
        this.credentials = credentials;
        this.recvWindowMs = options.recvWindowMs ?? 5000;
        this.http = axios.create({
            baseURL: options.baseUrl,
            timeout: options.timeoutMs,
            headers: { 'X-MBX-APIKEY': credentials.apiKey },
        });
    }

    // ───────────────────────────────────────────────────────────────────────────
    // Transport
    // ───────────────────────────────────────────────────────────────────────────

    private sign(query: string): string {
        return crypto.createHmac('sha256', this.credentials.apiSecret).update(query).digest('hex');
    }

    private async request(
        method: Method,
        path: string,
        params: Record<string, QueryValue | undefined> = {},
        signed: boolean = false
    ): Promise<CallResult<unknown>> {
        const search = new URLSearchParams();
        for (const [key, value] of Object.entries(params)) {
            if (value !== undefined) search.append(key, String(value));
        }
        if (signed) {
            search.append('recvWindow', String(this.recvWindowMs));
            search.append('timestamp', String(Date.now()));
            search.append('signature', this.sign(search.toString()));
        }
        const query = search.toString();
        const url = query ? `${path}?${query}` : path;

        try {
            const response = await this.http.request<unknown>({ method, url });
            return ok(response.data);
        } catch (error: unknown) {
            const failure = axios.isAxiosError(error)
                ? classifyFailure(error.response?.status ?? null, error.response?.data, error.message)
                : retryable(error instanceof Error ? error.message : String(error));
            logger.debug(`[EXCHANGE] ${method.toUpperCase()} ${path} failed: ${failure.kind} ${failure.error.message}`);
            return failure;
        }
    }

    // ───────────────────────────────────────────────────────────────────────────
    // Market data
    // ───────────────────────────────────────────────────────────────────────────

    async fetchOhlcv(symbol: string, timeframe: string, limit: number): Promise<CallResult<Candle[]>> {
        const result = await this.request('GET', '/fapi/v1/klines', {
            symbol: toVenueSymbol(symbol),
            interval: timeframe,
            limit,
        });
        if (result.kind !== 'ok') return result;
        if (!Array.isArray(result.value)) return retryable(`klines: unexpected body for ${symbol}`);

        const candles: Candle[] = [];
        for (const row of result.value) {
            const candle = parseCandle(row);
            if (candle) candles.push(candle);
        }
        return ok(candles);
    }

    async getMarketPrice(symbol: string): Promise<CallResult<number>> {
        const result = await this.request('GET', '/fapi/v1/ticker/price', { symbol: toVenueSymbol(symbol) });
        if (result.kind !== 'ok') return result;
        const price = isRecord(result.value) ? toNumber(result.value.price) : NaN;
        if (!Number.isFinite(price) || price <= 0) return retryable(`ticker: no price for ${symbol}`);
        return ok(price);
    }

    async getOrderBook(symbol: string): Promise<CallResult<OrderBook>> {
        const result = await this.request('GET', '/fapi/v1/depth', { symbol: toVenueSymbol(symbol), limit: 5 });
        if (result.kind !== 'ok') return result;
        if (!isRecord(result.value)) return retryable(`depth: unexpected body for ${symbol}`);
        return ok({
            bids: parseBookSide(result.value.bids),
            asks: parseBookSide(result.value.asks),
        });
    }

    async getServerTime(): Promise<CallResult<number>> {
        const result = await this.request('GET', '/fapi/v1/time');
        if (result.kind !== 'ok') return result;
        const serverTime = isRecord(result.value) ? toNumber(result.value.serverTime) : NaN;
        return Number.isFinite(serverTime) ? ok(serverTime) : retryable('time: unexpected body');
    }

    async getMarketLimits(symbol: string): Promise<CallResult<MarketLimits>> {
        if (!this.limitsCache) {
            const result = await this.request('GET', '/fapi/v1/exchangeInfo');
            if (result.kind !== 'ok') return result;
            if (!isRecord(result.value) || !Array.isArray(result.value.symbols)) {
                return retryable('exchangeInfo: unexpected body');
            }
            const cache = new Map<string, MarketLimits>();
            for (const entry of result.value.symbols) {
                if (!isRecord(entry) || !Array.isArray(entry.filters)) continue;
                const limits: MarketLimits = { minAmount: 0, minNotional: 0, amountStep: 0, priceStep: 0 };
                for (const filter of entry.filters) {
                    if (!isRecord(filter)) continue;
                    switch (toStringValue(filter.filterType)) {
                        case 'LOT_SIZE':
                            limits.minAmount = toNumber(filter.minQty);
                            limits.amountStep = toNumber(filter.stepSize);
                            break;
                        case 'MIN_NOTIONAL':
                            limits.minNotional = toNumber(filter.notional);
                            break;
                        case 'PRICE_FILTER':
                            limits.priceStep = toNumber(filter.tickSize);
                            break;
                    }
                }
                cache.set(toStringValue(entry.symbol), limits);
            }
            this.limitsCache = cache;
        }

        const limits = this.limitsCache.get(toVenueSymbol(symbol));
        return limits ? ok(limits) : fatal(`exchangeInfo: unknown symbol ${symbol}`);
    }

    // ───────────────────────────────────────────────────────────────────────────
    // Account
    // ───────────────────────────────────────────────────────────────────────────

    async getBalance(): Promise<CallResult<Balance>> {
        const result = await this.request('GET', '/fapi/v2/balance', {}, true);
        if (result.kind !== 'ok') return result;
        if (!Array.isArray(result.value)) return retryable('balance: unexpected body');

        for (const entry of result.value) {
            if (isRecord(entry) && toStringValue(entry.asset) === 'USDT') {
                return ok({
                    free: toNumber(entry.availableBalance),
                    total: toNumber(entry.balance),
                });
            }
        }
        return ok({ free: 0, total: 0 });
    }

    async getAllPositions(): Promise<CallResult<ExchangePosition[]>> {
        const result = await this.request('GET', '/fapi/v2/positionRisk', {}, true);
        if (result.kind !== 'ok') return result;
        if (!Array.isArray(result.value)) return retryable('positionRisk: unexpected body');

        const positions: ExchangePosition[] = [];
        for (const entry of result.value) {
            if (!isRecord(entry)) continue;
            const amount = toNumber(entry.positionAmt);
            if (!Number.isFinite(amount) || amount === 0) continue;
            positions.push({
                symbol: fromVenueSymbol(toStringValue(entry.symbol)),
                side: amount > 0 ? 'long' : 'short',
                contracts: Math.abs(amount),
                entryPrice: toNumber(entry.entryPrice),
                markPrice: toFiniteOrNull(entry.markPrice),
            });
        }
        return ok(positions);
    }

    async setLeverage(symbol: string, leverage: number): Promise<CallResult<void>> {
        const result = await this.request('POST', '/fapi/v1/leverage', { symbol: toVenueSymbol(symbol), leverage }, true);
        return result.kind === 'ok' ? ok(undefined) : result;
    }

    // ───────────────────────────────────────────────────────────────────────────
    // Orders
    // ───────────────────────────────────────────────────────────────────────────

    async createOrder(request: CreateOrderRequest): Promise<CallResult<Order>> {
        const params = request.params ?? {};
        const result = await this.request('POST', '/fapi/v1/order', {
            symbol: toVenueSymbol(request.symbol),
            side: request.side.toUpperCase(),
            type: request.type.toUpperCase(),
            quantity: request.amount !== null ? toDecimalString(request.amount) : undefined,
            price: request.price !== undefined ? toDecimalString(request.price) : undefined,
            timeInForce: request.type === 'limit' ? 'GTC' : undefined,
            stopPrice: params.stopPrice !== undefined ? toDecimalString(params.stopPrice) : undefined,
            closePosition: params.closePosition ? 'true' : undefined,
            reduceOnly: params.reduceOnly ? 'true' : undefined,
            newClientOrderId: params.clientOrderId,
            newOrderRespType: 'RESULT',
        }, true);
        if (result.kind !== 'ok') return result;

        const order = parseOrder(result.value, request.symbol);
        return order ? ok(order) : retryable(`order: unexpected body for ${request.symbol}`);
    }

    async getOpenOrders(symbol: string): Promise<CallResult<Order[]>> {
        const result = await this.request('GET', '/fapi/v1/openOrders', { symbol: toVenueSymbol(symbol) }, true);
        if (result.kind !== 'ok') return result;
        if (!Array.isArray(result.value)) return retryable('openOrders: unexpected body');

        const orders: Order[] = [];
        for (const entry of result.value) {
            const order = parseOrder(entry, symbol);
            if (order) orders.push(order);
        }
        return ok(orders);
    }

    async cancelOrder(id: string, symbol: string): Promise<CallResult<void>> {
        const result = await this.request('DELETE', '/fapi/v1/order', { symbol: toVenueSymbol(symbol), orderId: id }, true);
        return result.kind === 'ok' ? ok(undefined) : result;
    }

    async cancelAllOrders(symbol: string): Promise<CallResult<void>> {
        const result = await this.request('DELETE', '/fapi/v1/allOpenOrders', { symbol: toVenueSymbol(symbol) }, true);
        return result.kind === 'ok' ? ok(undefined) : result;
    }
}
