/**
 * State Manager — durable AccountState
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * SINGLE WRITER, WRITE-THROUGH
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * RULES:
 * 1. This class is the only owner of AccountState; nothing else mutates it
 * 2. Every mutation rewrites the whole JSON file synchronously before returning
 * 3. A failed write is logged; the in-memory mutation is kept (memory is newer
 *    than disk and the next successful write catches the file up)
 * 4. Readers get copies, never live references
 *
 * A missing state file is a fresh start. An unreadable one is logged and
 * replaced by a fresh state; reconciliation then re-adopts whatever the
 * exchange still holds.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import * as fs from 'fs';
import * as path from 'path';
import { AccountState, Direction, PositionRecord } from '../types';
import logger from '../utils/logger';
import { isRecord, toFiniteOrNull } from '../utils/parse';

export function createEmptyState(): AccountState {
    return {
        positions: {},
        daily_pnl: 0,
        trades_last_hour: [],
        last_trade_per_symbol: {},
        last_reset_time: null,
    };
}

function clonePosition(position: PositionRecord): PositionRecord {
    return { ...position, partials: { ...position.partials } };
}

// ═══════════════════════════════════════════════════════════════════════════════
// PARSING
// ═══════════════════════════════════════════════════════════════════════════════

function parseDirection(value: unknown): Direction | null {
    return value === 'LONG' || value === 'SHORT' ? value : null;
}

function parsePosition(symbol: string, raw: unknown): PositionRecord | null {
    if (!isRecord(raw)) return null;

    const direction = parseDirection(raw.direction);
    const entryPrice = toFiniteOrNull(raw.entry_price);
    const size = toFiniteOrNull(raw.size);
    const slPrice = toFiniteOrNull(raw.sl_price);
    const atrEntry = toFiniteOrNull(raw.atr_entry);

    if (direction === null || entryPrice === null || size === null || slPrice === null || atrEntry === null) {
        logger.warn(`[STATE] Dropping malformed position record for ${symbol}`);
        return null;
    }

    const partials: Record<string, boolean> = {};
    if (isRecord(raw.partials)) {
        for (const [name, taken] of Object.entries(raw.partials)) {
            partials[name] = taken === true;
        }
    }

    const entryTime = toFiniteOrNull(raw.entry_time) ?? 0;

    return {
        direction,
        entry_price: entryPrice,
        size,
        initial_size: toFiniteOrNull(raw.initial_size) ?? size,
        sl_price: slPrice,
        atr_entry: atrEntry,
        p_max: toFiniteOrNull(raw.p_max) ?? entryPrice,
        p_min: toFiniteOrNull(raw.p_min) ?? entryPrice,
        partials,
        last_dynamic_level: toFiniteOrNull(raw.last_dynamic_level) ?? 0,
        accumulated_pnl: toFiniteOrNull(raw.accumulated_pnl) ?? 0,
        breakeven_triggered: raw.breakeven_triggered === true,
        sl_moved_count: toFiniteOrNull(raw.sl_moved_count) ?? 0,
        entry_time: entryTime,
        last_sl_update: toFiniteOrNull(raw.last_sl_update) ?? entryTime,
    };
}

export function parseAccountState(raw: unknown): AccountState {
    const state = createEmptyState();
    if (!isRecord(raw)) return state;

    if (isRecord(raw.positions)) {
        for (const [symbol, value] of Object.entries(raw.positions)) {
            const position = parsePosition(symbol, value);
            if (position) state.positions[symbol] = position;
        }
    }

    state.daily_pnl = toFiniteOrNull(raw.daily_pnl) ?? 0;

    if (Array.isArray(raw.trades_last_hour)) {
        for (const t of raw.trades_last_hour) {
            const ts = toFiniteOrNull(t);
            if (ts !== null) state.trades_last_hour.push(ts);
        }
    }

    if (isRecord(raw.last_trade_per_symbol)) {
        for (const [symbol, value] of Object.entries(raw.last_trade_per_symbol)) {
            const ts = toFiniteOrNull(value);
            if (ts !== null) state.last_trade_per_symbol[symbol] = ts;
        }
    }

    state.last_reset_time = toFiniteOrNull(raw.last_reset_time);
    return state;
}

// ═══════════════════════════════════════════════════════════════════════════════
// STATE MANAGER
// ═══════════════════════════════════════════════════════════════════════════════

export class StateManager {
    private readonly filePath: string;
    private state: AccountState;

    constructor(filePath: string) {
        this.filePath = path.resolve(filePath);
        this.state = this.load();
    }

    private load(): AccountState {
        if (!fs.existsSync(this.filePath)) {
            logger.info(`[STATE] No state file at ${this.filePath}, starting fresh`);
            return createEmptyState();
        }

        try {
            const raw: unknown = JSON.parse(fs.readFileSync(this.filePath, 'utf8'));
            const state = parseAccountState(raw);
            logger.info(`[STATE] Loaded ${Object.keys(state.positions).length} position(s) from ${this.filePath}`);
            return state;
        } catch (err: unknown) {
            const message = err instanceof Error ? err.message : String(err);
            logger.error(`[STATE] Could not read ${this.filePath} (${message}), starting fresh`);
            return createEmptyState();
        }
    }

    /**
     * Rewrite the whole file. Returns false (after logging) when the write fails.
     */
    save(): boolean {
        const tmpPath = `${this.filePath}.tmp`;
        try {
            fs.writeFileSync(tmpPath, JSON.stringify(this.state, null, 2), 'utf8');
            fs.renameSync(tmpPath, this.filePath);
            return true;
        } catch (err: unknown) {
            const message = err instanceof Error ? err.message : String(err);
            logger.error(`[STATE] Failed to persist state to ${this.filePath}: ${message}`);
            return false;
        }
    }

    getFilePath(): string {
        return this.filePath;
    }

    // ───────────────────────────────────────────────────────────────────────────
    // Positions
    // ───────────────────────────────────────────────────────────────────────────

    getPosition(symbol: string): PositionRecord | null {
        const position = this.state.positions[symbol];
        return position ? clonePosition(position) : null;
    }

    hasPosition(symbol: string): boolean {
        return symbol in this.state.positions;
    }

    getPositions(): Record<string, PositionRecord> {
        const copy: Record<string, PositionRecord> = {};
        for (const [symbol, position] of Object.entries(this.state.positions)) {
            copy[symbol] = clonePosition(position);
        }
        return copy;
    }

    getOpenSymbols(): string[] {
        return Object.keys(this.state.positions);
    }

    setPosition(symbol: string, position: PositionRecord): void {
        this.state.positions[symbol] = clonePosition(position);
        this.save();
    }

    /**
     * Merge fields into an existing position. Returns the updated copy, or null
     * when the symbol has no position.
     */
    updatePosition(symbol: string, patch: Partial<PositionRecord>): PositionRecord | null {
        const existing = this.state.positions[symbol];
        if (!existing) return null;
        const updated = clonePosition({ ...existing, ...patch });
        this.state.positions[symbol] = updated;
        this.save();
        return clonePosition(updated);
    }

    removePosition(symbol: string): boolean {
        if (!(symbol in this.state.positions)) return false;
        delete this.state.positions[symbol];
        this.save();
        return true;
    }

    // ───────────────────────────────────────────────────────────────────────────
    // Account counters
    // ───────────────────────────────────────────────────────────────────────────

    getDailyPnl(): number {
        return this.state.daily_pnl;
    }

    addDailyPnl(amount: number): void {
        this.state.daily_pnl += amount;
        this.save();
    }

    /**
     * Zero daily_pnl when `nowSec` falls on a later UTC day than the last reset.
     * Returns true when a reset happened.
     */
    resetDailyIfNewDay(nowSec: number): boolean {
        const today = Math.floor(nowSec / 86400);
        const last = this.state.last_reset_time;
        if (last !== null && Math.floor(last / 86400) >= today) return false;

        if (last !== null) {
            logger.info(`[STATE] UTC day rollover, daily PnL ${this.state.daily_pnl.toFixed(2)} → 0`);
        }
        this.state.daily_pnl = 0;
        this.state.last_reset_time = nowSec;
        this.save();
        return true;
    }

    getTradesLastHour(): number[] {
        return [...this.state.trades_last_hour];
    }

    recordTrade(nowSec: number): void {
        this.state.trades_last_hour.push(nowSec);
        this.save();
    }

    /**
     * Drop trade timestamps older than one hour. Writes only if something changed.
     */
    pruneTradesLastHour(nowSec: number): number {
        const before = this.state.trades_last_hour.length;
        this.state.trades_last_hour = this.state.trades_last_hour.filter(t => nowSec - t < 3600);
        const removed = before - this.state.trades_last_hour.length;
        if (removed > 0) this.save();
        return removed;
    }

    getLastTradeTime(symbol: string): number | null {
        return this.state.last_trade_per_symbol[symbol] ?? null;
    }

    recordSymbolClose(symbol: string, nowSec: number): void {
        this.state.last_trade_per_symbol[symbol] = nowSec;
        this.save();
    }

    snapshot(): AccountState {
        return {
            positions: this.getPositions(),
            daily_pnl: this.state.daily_pnl,
            trades_last_hour: [...this.state.trades_last_hour],
            last_trade_per_symbol: { ...this.state.last_trade_per_symbol },
            last_reset_time: this.state.last_reset_time,
        };
    }
}
