import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { IndicatorRow, PositionRecord } from '../../src/types';
import { DEFAULT_SETTINGS } from '../../src/config/settings';
import { createPartialsMap } from '../../src/engine/partialLadder';

export function createPosition(partial: Partial<PositionRecord> = {}): PositionRecord {
    const size = partial.size ?? 1;
    return {
        direction: 'LONG',
        entry_price: 100,
        size,
        initial_size: size,
        sl_price: 94,
        atr_entry: 2,
        p_max: 100,
        p_min: 100,
        partials: createPartialsMap(DEFAULT_SETTINGS.fixedLadder),
        last_dynamic_level: 0,
        accumulated_pnl: 0,
        breakeven_triggered: false,
        sl_moved_count: 0,
        entry_time: 1_000_000,
        last_sl_update: 1_000_000,
        ...partial,
    };
}

export function createRow(partial: Partial<IndicatorRow> = {}): IndicatorRow {
    return {
        timestamp: 0,
        open: 100,
        high: 101,
        low: 99,
        close: 100,
        volume: 1000,
        ema8: 100,
        ema20: 100,
        ema21: 100,
        ema50: 100,
        rsi: 50,
        macd: 0,
        macdSignal: 0,
        macdHist: 0,
        atr: 2,
        adx: 20,
        volumeSma20: 1000,
        ...partial,
    };
}

/**
 * Fresh directory under the OS temp dir; returns the state file path inside it.
 */
export function tempStatePath(): string {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'engine-state-'));
    return path.join(dir, 'bot_state.json');
}
