/**
 * Partial Ladder Tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Test Cases:
 *   1. One level per tick, in order
 *   2. Stop ratchet: P1 → entry + buffer, Pi → P(i-1) price
 *   3. Dynamic ladder after the fixed ladder is exhausted
 *   4. Realised PnL of a partial is net of both commission legs
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import {
    createPartialsMap,
    dynamicLevelTarget,
    evaluatePartialLadder,
    LadderSettings,
    partialRealisedPnl,
} from '../src/engine/partialLadder';
import { DEFAULT_SETTINGS } from '../src/config/settings';
import { createPosition } from './helpers/fixtures';

const LADDER: LadderSettings = {
    fixedLadder: DEFAULT_SETTINGS.fixedLadder,
    dynamicLadder: DEFAULT_SETTINGS.dynamicLadder,
    firstLevelStopBufferPct: DEFAULT_SETTINGS.exits.firstLevelStopBufferPct,
};

function allTaken(): Record<string, boolean> {
    const partials = createPartialsMap(DEFAULT_SETTINGS.fixedLadder);
    for (const name of Object.keys(partials)) partials[name] = true;
    return partials;
}

describe('fixed ladder', () => {
    it('does nothing below the first level', () => {
        expect(evaluatePartialLadder(createPosition(), 100.2, LADDER)).toBeNull();
    });

    it('fires only P1 on a tick that clears several levels', () => {
        const action = evaluatePartialLadder(createPosition(), 100.5, LADDER);
        expect(action).not.toBeNull();
        if (action?.kind !== 'FIXED') throw new Error('expected a fixed level');
        expect(action.levelName).toBe('P1');
        expect(action.closeAmount).toBeCloseTo(0.05, 12);
        expect(action.newStop).toBeCloseTo(100.1, 10);
    });

    it('P2 ratchets the stop to the P1 price, strictly above the pre-P2 stop', () => {
        const preP2Stop = 100.1;
        const position = createPosition({
            size: 0.95,
            sl_price: preP2Stop,
            partials: { ...createPartialsMap(DEFAULT_SETTINGS.fixedLadder), P1: true },
        });
        const action = evaluatePartialLadder(position, 100.4, LADDER);
        if (action?.kind !== 'FIXED') throw new Error('expected a fixed level');
        expect(action.levelName).toBe('P2');
        expect(action.newStop).toBeCloseTo(100.3, 10);
        expect(action.newStop).toBeGreaterThan(preP2Stop);
        expect(action.closeAmount).toBeCloseTo(0.0475, 12);
    });

    it('waits for P2 when P1 is taken and price is between levels', () => {
        const position = createPosition({ partials: { ...createPartialsMap(DEFAULT_SETTINGS.fixedLadder), P1: true } });
        expect(evaluatePartialLadder(position, 100.35, LADDER)).toBeNull();
    });

    it('mirrors for SHORT', () => {
        const position = createPosition({ direction: 'SHORT', sl_price: 106 });
        const action = evaluatePartialLadder(position, 99.6, LADDER);
        if (action?.kind !== 'FIXED') throw new Error('expected a fixed level');
        expect(action.levelName).toBe('P1');
        expect(action.newStop).toBeCloseTo(99.9, 10);
    });
});

describe('dynamic ladder', () => {
    it('targets start + n × increment', () => {
        expect(dynamicLevelTarget(DEFAULT_SETTINGS.dynamicLadder, 1)).toBeCloseTo(0.011, 12);
        expect(dynamicLevelTarget(DEFAULT_SETTINGS.dynamicLadder, 5)).toBeCloseTo(0.015, 12);
    });

    it('fires the next level once the fixed ladder is exhausted', () => {
        const position = createPosition({ partials: allTaken(), size: 0.7 });
        const action = evaluatePartialLadder(position, 101.2, LADDER);
        if (action?.kind !== 'DYNAMIC') throw new Error('expected a dynamic level');
        expect(action.level).toBe(1);
        expect(action.newStop).toBeCloseTo(101, 10);
        expect(action.closeAmount).toBeCloseTo(0.035, 12);
    });

    it('continues from last_dynamic_level', () => {
        const position = createPosition({ partials: allTaken(), last_dynamic_level: 3 });
        expect(evaluatePartialLadder(position, 101.3, LADDER)).toBeNull();
        const action = evaluatePartialLadder(position, 101.45, LADDER);
        if (action?.kind !== 'DYNAMIC') throw new Error('expected a dynamic level');
        expect(action.level).toBe(4);
        expect(action.newStop).toBeCloseTo(101.3, 10);
    });
});

describe('partialRealisedPnl', () => {
    it('subtracts commission on entry and exit legs', () => {
        // 0.3 × 0.05 − 0.0005 × (100 + 100.3) × 0.05
        const pnl = partialRealisedPnl({ direction: 'LONG', entry_price: 100 }, 100.3, 0.05, 0.0005);
        expect(pnl).toBeCloseTo(0.0099925, 10);
    });

    it('accumulates across partials as the sum of each', () => {
        const position = { direction: 'SHORT' as const, entry_price: 100 };
        const fills: Array<[number, number]> = [[99.7, 0.05], [99.6, 0.0475], [99.5, 0.045125]];
        let accumulated = 0;
        let expected = 0;
        for (const [price, amount] of fills) {
            accumulated += partialRealisedPnl(position, price, amount, 0.0005);
            expected += (100 - price) * amount - 0.0005 * (100 + price) * amount;
        }
        expect(accumulated).toBeCloseTo(expected, 12);
    });
});
