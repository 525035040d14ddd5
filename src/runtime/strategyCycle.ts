/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * STRATEGY CYCLE — runs once per 15m candle close
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * FLOW:
 * 1. Account gates: UTC-day rollover, balance, daily drawdown stop, daily-close window
 * 2. For every configured symbol ∪ open symbol:
 *    - fetch candles, compute indicators, drop the forming candle
 *    - reject the series if the last two closed rows are not fully finite
 *    - open symbol  → candle exit chain (PositionLifecycle.onCandleClose)
 *    - flat symbol  → candidate gate → filters → signal → scored candidate
 * 3. At most ONE new entry per cycle, the best-scored candidate:
 *    - a free slot  → open it
 *    - book full    → opportunity switch: close the weakest stale position
 *                     that qualifies, then open the candidate
 *
 * Exits are always evaluated, even when entries are blocked for the day.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { Direction, IndicatorRow, PositionRecord } from '../types';
import { SettingsStore, TradingSettings } from '../config/settings';
import { ExchangeClient } from '../exchange/types';
import { StateManager } from '../storage/stateManager';
import { PositionLifecycle } from '../engine/positionLifecycle';
import { checkCandidateGate, isBookFull, isDailyDrawdownBreached, isInDailyCloseWindow } from '../risk/riskGates';
import { pnlPct } from '../risk/stopCalculator';
import {
    calculatePositionHealth,
    decideSwitch,
    PositionHealth,
    recordPnlSample,
    scoreOpportunity,
} from '../engine/opportunitySwitch';
import { checkRange, checkSpread, checkVolatilityBand, FilterVerdict } from '../strategy/filters';
import { evaluateEntrySignal } from '../strategy/entrySignals';
import { closedRows, computeIndicators, isRowComplete } from '../strategy/indicators';
import { Clock, nowSeconds, sleep as realSleep } from '../utils/clock';
import { withRetry } from '../utils/retry';
import { describeFailure } from '../utils/result';
import logger from '../utils/logger';

export interface StrategyCycleDeps {
    exchange: ExchangeClient;
    state: StateManager;
    lifecycle: PositionLifecycle;
    settings: SettingsStore;
    clock: Clock;
    sleep?: (ms: number) => Promise<void>;
}

export interface CycleReport {
    entriesAllowed: boolean;
    blockedReason: string | null;
    evaluatedExits: string[];
    entered: string | null;
    /** symbol closed to make room for `entered` */
    switched: string | null;
    skipped: Record<string, string>;
}

interface EntryCandidate {
    symbol: string;
    direction: Direction;
    row: IndicatorRow;
    score: number;
}

interface SwitchTarget {
    symbol: string;
    position: PositionRecord;
    price: number;
    health: PositionHealth;
}

/** per-cycle scratch shared by processSymbol and the entry decision */
interface CycleScan {
    candidates: EntryCandidate[];
    /** closed rows of symbols still open after their exit chain */
    openRows: Map<string, IndicatorRow[]>;
}

export class StrategyCycle {
    private readonly exchange: ExchangeClient;
    private readonly state: StateManager;
    private readonly lifecycle: PositionLifecycle;
    private readonly settings: SettingsStore;
    private readonly clock: Clock;
    private readonly sleep: (ms: number) => Promise<void>;
    private readonly pnlHistory = new Map<string, number[]>();

    constructor(deps: StrategyCycleDeps) {
        this.exchange = deps.exchange;
        this.state = deps.state;
        this.lifecycle = deps.lifecycle;
        this.settings = deps.settings;
        this.clock = deps.clock;
        this.sleep = deps.sleep ?? realSleep;
    }

    /**
     * @param candleStartMs start of the candle that is forming now
     */
    async run(candleStartMs: number): Promise<CycleReport> {
        const settings = this.settings.current();
        const nowMs = this.clock.now();
        const nowSec = nowSeconds(this.clock);
        const report: CycleReport = { entriesAllowed: true, blockedReason: null, evaluatedExits: [], entered: null, switched: null, skipped: {} };

        logger.info(`[STRATEGY] ── Candle closed, cycle for ${new Date(candleStartMs).toISOString()} ──`);

        if (this.state.resetDailyIfNewDay(nowSec)) {
            logger.info('[STRATEGY] New UTC day, daily PnL reset');
        }

        let balance = 0;
        const balanceResult = await withRetry('balance', () => this.exchange.getBalance(), settings.retry, this.sleep);
        if (balanceResult.kind === 'ok') {
            balance = balanceResult.value.free;
            if (isDailyDrawdownBreached(this.state.getDailyPnl(), balanceResult.value.total, settings.dailyDrawdownLimitPct)) {
                this.blockEntries(report, `daily drawdown limit hit (pnl=${this.state.getDailyPnl().toFixed(2)})`);
            }
        } else {
            this.blockEntries(report, `balance unavailable: ${describeFailure(balanceResult)}`);
        }

        if (isInDailyCloseWindow(nowMs, settings.filters.dailyCloseBlockStartMinute, settings.filters.dailyCloseBlockEndMinute)) {
            this.blockEntries(report, 'daily close window');
        }

        const scan: CycleScan = { candidates: [], openRows: new Map<string, IndicatorRow[]>() };
        const symbols = [...new Set([...settings.symbols, ...this.state.getOpenSymbols()])];
        for (const symbol of symbols) {
            try {
                await this.processSymbol(symbol, candleStartMs, settings, report, scan);
            } catch (err: unknown) {
                const message = err instanceof Error ? err.message : String(err);
                logger.error(`[STRATEGY] ${symbol} failed: ${message}`);
                report.skipped[symbol] = `error: ${message}`;
            }
        }

        if (report.entriesAllowed && scan.candidates.length > 0) {
            try {
                await this.enterBest(scan, balance, settings, report);
            } catch (err: unknown) {
                const message = err instanceof Error ? err.message : String(err);
                logger.error(`[STRATEGY] entry decision failed: ${message}`);
            }
        }

        const open = new Set(this.state.getOpenSymbols());
        for (const symbol of [...this.pnlHistory.keys()]) {
            if (!open.has(symbol)) this.pnlHistory.delete(symbol);
        }

        logger.info(
            `[STRATEGY] ── Cycle done: exits checked=${report.evaluatedExits.length} ` +
            `entered=${report.entered ?? 'none'}${report.switched ? ` (replacing ${report.switched})` : ''} open=${this.state.getOpenSymbols().length} ──`
        );
        return report;
    }

    private blockEntries(report: CycleReport, reason: string): void {
        if (report.entriesAllowed) {
            logger.warn(`[STRATEGY] ⛔ Entries blocked: ${reason}`);
        }
        report.entriesAllowed = false;
        report.blockedReason = report.blockedReason ?? reason;
    }

    private async loadRows(symbol: string, candleStartMs: number, settings: TradingSettings): Promise<IndicatorRow[] | string> {
        const candles = await withRetry(
            `ohlcv ${symbol}`,
            () => this.exchange.fetchOhlcv(symbol, settings.timeframe, settings.candleLimit),
            settings.retry,
            this.sleep
        );
        if (candles.kind !== 'ok') return `candles unavailable: ${describeFailure(candles)}`;

        const rows = closedRows(computeIndicators(candles.value), candleStartMs);
        const tail = rows.slice(-2);
        if (tail.length < 2 || !tail.every(isRowComplete)) {
            return 'indicator series incomplete';
        }
        return rows;
    }

    private async processSymbol(
        symbol: string,
        candleStartMs: number,
        settings: TradingSettings,
        report: CycleReport,
        scan: CycleScan
    ): Promise<void> {
        const hasPosition = this.state.hasPosition(symbol);
        if (!hasPosition && !report.entriesAllowed) return;

        const rows = await this.loadRows(symbol, candleStartMs, settings);
        if (typeof rows === 'string') {
            report.skipped[symbol] = rows;
            logger.warn(`[STRATEGY] ${symbol} skipped: ${rows}`);
            return;
        }

        if (hasPosition) {
            report.evaluatedExits.push(symbol);
            await this.lifecycle.onCandleClose(symbol, rows);
            if (this.state.hasPosition(symbol)) scan.openRows.set(symbol, rows);
            return;
        }

        const reason = await this.rejectEntry(symbol, rows, settings);
        if (reason !== null) {
            report.skipped[symbol] = reason;
            logger.debug(`[STRATEGY] ${symbol} no entry: ${reason}`);
            return;
        }

        const last = rows[rows.length - 1];
        const signal = evaluateEntrySignal(rows, settings.filters);
        if (signal.direction === null) {
            report.skipped[symbol] = `no signal (${signal.failed.join(', ')})`;
            logger.debug(`[STRATEGY] ${symbol} no signal: ${signal.failed.join(', ')}`);
            return;
        }

        const score = scoreOpportunity(signal.direction, rows);
        logger.info(
            `[STRATEGY] 📈 ${symbol} ${signal.direction} signal score=${score} close=${last.close} ` +
            `atr=${last.atr.toFixed(4)} adx=${last.adx.toFixed(1)} rsi=${last.rsi.toFixed(1)}`
        );
        scan.candidates.push({ symbol, direction: signal.direction, row: last, score });
    }

    private async enterBest(scan: CycleScan, balance: number, settings: TradingSettings, report: CycleReport): Promise<void> {
        // stable: equal scores keep symbol order
        const ranked = [...scan.candidates].sort((a, b) => b.score - a.score);
        const openCount = this.state.getOpenSymbols().length;

        if (!isBookFull(openCount, settings.maxOpenSymbols)) {
            for (const candidate of ranked) {
                if (report.entered !== null) {
                    report.skipped[candidate.symbol] = `another candidate entered (score ${candidate.score})`;
                } else if (!(await this.enter(candidate, balance))) {
                    report.skipped[candidate.symbol] = 'entry not opened';
                } else {
                    report.entered = candidate.symbol;
                }
            }
            return;
        }

        const best = ranked[0];
        const full = `max open symbols reached (${openCount}/${settings.maxOpenSymbols})`;
        for (const candidate of ranked.slice(1)) report.skipped[candidate.symbol] = full;

        if (!settings.switching.enabled) {
            report.skipped[best.symbol] = full;
            return;
        }

        const target = this.pickSwitchTarget(best, scan.openRows, settings);
        if (target === null) {
            report.skipped[best.symbol] = `${full}, no position worth switching`;
            return;
        }

        logger.info(
            `[SWITCH] 🔄 ${target.symbol} (health ${target.health.score}: ${target.health.details.join(', ') || 'nothing'}) ` +
            `→ ${best.symbol} ${best.direction} (score ${best.score})`
        );
        const closed = await this.lifecycle.closeFull(target.symbol, target.position, 'OPPORTUNITY_SWITCH', target.price);
        if (!closed) {
            report.skipped[best.symbol] = `switch close of ${target.symbol} failed`;
            return;
        }
        report.switched = target.symbol;
        this.pnlHistory.delete(target.symbol);

        const refreshed = await withRetry('balance', () => this.exchange.getBalance(), settings.retry, this.sleep);
        const freeBalance = refreshed.kind === 'ok' ? refreshed.value.free : balance;
        if (await this.enter(best, freeBalance)) {
            report.entered = best.symbol;
        } else {
            report.skipped[best.symbol] = 'entry not opened';
        }
    }

    private async enter(candidate: EntryCandidate, balance: number): Promise<boolean> {
        return this.lifecycle.openPosition({ symbol: candidate.symbol, direction: candidate.direction, row: candidate.row, balance });
    }

    /**
     * Scores every open position against the candidate; returns the least
     * healthy one that should give way, or null.
     */
    private pickSwitchTarget(best: EntryCandidate, openRows: ReadonlyMap<string, IndicatorRow[]>, settings: TradingSettings): SwitchTarget | null {
        const nowSec = nowSeconds(this.clock);
        let target: SwitchTarget | null = null;

        for (const [symbol, rows] of openRows) {
            const position = this.state.getPosition(symbol);
            const row = rows[rows.length - 1];
            if (position === null || !row) continue;

            const pnl = pnlPct(position.direction, position.entry_price, row.close);
            const history = recordPnlSample(this.pnlHistory.get(symbol) ?? [], pnl, settings.switching.pnlHistory);
            this.pnlHistory.set(symbol, history);

            const health = calculatePositionHealth({ position, row, nowSec, pnlHistory: history });
            const decision = decideSwitch(health, position.sl_moved_count, best.score, settings.switching);
            logger.info(`[SWITCH] ${symbol} ${decision.action}: ${decision.reason}`);

            if (decision.action === 'SWITCH' && (target === null || health.score < target.health.score)) {
                target = { symbol, position, price: row.close, health };
            }
        }
        return target;
    }

    /**
     * Returns null when every gate and filter passes, otherwise the first reason.
     */
    private async rejectEntry(symbol: string, rows: readonly IndicatorRow[], settings: TradingSettings): Promise<string | null> {
        const gate = checkCandidateGate({
            nowSec: nowSeconds(this.clock),
            tradesLastHour: this.state.getTradesLastHour(),
            maxTradesPerHour: settings.maxTradesPerHour,
            lastTradeTime: this.state.getLastTradeTime(symbol),
            cooldownMinutes: settings.symbolCooldownMinutes,
        });
        if (!gate.allowed) return gate.reason;

        const last = rows[rows.length - 1];
        const verdicts: FilterVerdict[] = [checkVolatilityBand(last, settings.filters), checkRange(rows, settings.filters)];
        const failedLocal = verdicts.find(v => !v.passed);
        if (failedLocal) return `${failedLocal.name} ${failedLocal.detail}`;

        const book = await withRetry(`order book ${symbol}`, () => this.exchange.getOrderBook(symbol), settings.retry, this.sleep);
        if (book.kind !== 'ok') return `order book unavailable: ${describeFailure(book)}`;
        const spread = checkSpread(book.value, settings.filters);
        if (!spread.passed) return `${spread.name} ${spread.detail}`;

        return null;
    }
}
