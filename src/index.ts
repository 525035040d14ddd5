/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * INDEX.TS — THIN ORCHESTRATION LAYER
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * RULES:
 * 1. NO runtime logic at import time
 * 2. The engine is passed in; this file never builds components
 * 3. All loop logic lives in src/runtime/scheduler.ts
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { Engine } from './bootstrap';
import logger from './utils/logger';

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN ENTRY — CALLED BY start.ts AFTER prepareEngine()
// ═══════════════════════════════════════════════════════════════════════════════

export function main(engine: Engine): void {
    const settings = engine.settings.current();
    logger.info('');
    logger.info('═══════════════════════════════════════════════════════════════════');
    logger.info('🚀 STARTING EXECUTION LOOP');
    logger.info('═══════════════════════════════════════════════════════════════════');
    logger.info(`   Run: ${engine.runId}`);
    logger.info(`   Symbols: ${settings.symbols.join(', ')} (${settings.timeframe})`);
    logger.info(`   Sizing: ${settings.sizingMode.kind === 'FIXED_EXPOSURE'
        ? `fixed $${settings.sizingMode.exposureUsd}`
        : `risk ${(settings.sizingMode.riskPct * 100).toFixed(2)}%`} @ ${settings.leverage}x`);
    logger.info(`   Open positions: ${engine.state.getOpenSymbols().length}`);

    engine.scheduler.start();
}
