/**
 * Risk Gates Tests
 *
 * Test Cases:
 *   1. Daily-close window wraps midnight
 *   2. Daily drawdown breach
 *   3. Open-symbol cap
 *   4. Candidate gate: rate cap, then cooldown
 */

import {
    CandidateGateInput,
    checkCandidateGate,
    isBookFull,
    isDailyDrawdownBreached,
    isInDailyCloseWindow,
    isSymbolInCooldown,
} from '../src/risk/riskGates';

const START = 23 * 60 + 45;
const END = 15;

function at(hour: number, minute: number): number {
    return Date.UTC(2024, 0, 1, hour, minute);
}

function createGateInput(partial: Partial<CandidateGateInput> = {}): CandidateGateInput {
    return {
        nowSec: 100_000,
        tradesLastHour: [],
        maxTradesPerHour: 4,
        lastTradeTime: null,
        cooldownMinutes: 30,
        ...partial,
    };
}

describe('isInDailyCloseWindow', () => {
    it('covers 23:45 to 00:15 UTC across midnight', () => {
        expect(isInDailyCloseWindow(at(23, 44), START, END)).toBe(false);
        expect(isInDailyCloseWindow(at(23, 45), START, END)).toBe(true);
        expect(isInDailyCloseWindow(at(0, 10), START, END)).toBe(true);
        expect(isInDailyCloseWindow(at(0, 15), START, END)).toBe(false);
        expect(isInDailyCloseWindow(at(12, 0), START, END)).toBe(false);
    });

    it('handles a window that does not wrap', () => {
        expect(isInDailyCloseWindow(at(8, 30), 8 * 60, 9 * 60)).toBe(true);
        expect(isInDailyCloseWindow(at(9, 0), 8 * 60, 9 * 60)).toBe(false);
    });
});

describe('isDailyDrawdownBreached', () => {
    it('breaches at exactly the limit', () => {
        expect(isDailyDrawdownBreached(-30, 1000, 0.03)).toBe(true);
        expect(isDailyDrawdownBreached(-29, 1000, 0.03)).toBe(false);
        expect(isDailyDrawdownBreached(50, 1000, 0.03)).toBe(false);
    });

    it('never breaches on a non-positive balance', () => {
        expect(isDailyDrawdownBreached(-30, 0, 0.03)).toBe(false);
    });
});

describe('isBookFull', () => {
    it('is full at the cap', () => {
        expect(isBookFull(2, 3)).toBe(false);
        expect(isBookFull(3, 3)).toBe(true);
        expect(isBookFull(4, 3)).toBe(true);
    });
});

describe('checkCandidateGate', () => {
    it('allows a fresh symbol', () => {
        expect(checkCandidateGate(createGateInput())).toEqual({ allowed: true });
    });

    it('checks the rate cap before the cooldown', () => {
        const now = 100_000;
        const verdict = checkCandidateGate(createGateInput({ tradesLastHour: [now - 40, now - 30, now - 20, now - 10], lastTradeTime: now - 10 }));
        expect(verdict).toEqual({ allowed: false, reason: 'trade rate cap reached (4/4 in last hour)' });
    });

    it('counts only trades inside the last hour', () => {
        const now = 100_000;
        const trades = [now - 4000, now - 3000, now - 2000, now - 1000, now - 10];
        expect(checkCandidateGate(createGateInput({ tradesLastHour: trades }))).toEqual({
            allowed: false,
            reason: 'trade rate cap reached (4/4 in last hour)',
        });
        expect(checkCandidateGate(createGateInput({ tradesLastHour: trades.slice(0, 4) })).allowed).toBe(true);
    });

    it('blocks during the symbol cooldown', () => {
        expect(isSymbolInCooldown(100_000 - 1799, 100_000, 30)).toBe(true);
        expect(isSymbolInCooldown(100_000 - 1800, 100_000, 30)).toBe(false);
        expect(checkCandidateGate(createGateInput({ lastTradeTime: 99_000 }))).toEqual({
            allowed: false,
            reason: 'cooldown active (30m)',
        });
    });
});
