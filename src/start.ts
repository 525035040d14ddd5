import 'dotenv/config';

import * as fs from 'fs';
import * as path from 'path';
import { createEngine, Engine, prepareEngine } from './bootstrap';
import { loadSettings } from './config/settings';
import { BinanceFuturesClient } from './exchange/binanceFuturesClient';
import { main } from './index';
import logger from './utils/logger';

// ═══════════════════════════════════════════════════════════════════════════════
// LOCKFILE PATH (prevents two engines trading the same account)
// ═══════════════════════════════════════════════════════════════════════════════
const LOCKFILE_PATH = path.join(process.cwd(), '.engine.lock');

// ═══════════════════════════════════════════════════════════════════════════════
// RUNTIME STATE
// ═══════════════════════════════════════════════════════════════════════════════

let engine: Engine | null = null;
let isShuttingDown = false;

// ═══════════════════════════════════════════════════════════════════════════════
// LOCKFILE MANAGEMENT (Cross-process singleton enforcement)
// ═══════════════════════════════════════════════════════════════════════════════

function isProcessRunning(pid: number): boolean {
    try {
        process.kill(pid, 0);
        return true;
    } catch {
        return false;
    }
}

function acquireProcessLock(): boolean {
    try {
        if (fs.existsSync(LOCKFILE_PATH)) {
            const existingPid = parseInt(fs.readFileSync(LOCKFILE_PATH, 'utf8').trim(), 10);
            if (!isNaN(existingPid) && isProcessRunning(existingPid)) {
                return false;
            }
            logger.warn(`[STARTUP] Removing stale lockfile (PID ${existingPid} not running)`);
            fs.unlinkSync(LOCKFILE_PATH);
        }
        fs.writeFileSync(LOCKFILE_PATH, process.pid.toString(), 'utf8');
        return true;
    } catch (err: unknown) {
        const message = err instanceof Error ? err.message : String(err);
        logger.error(`[STARTUP] Failed to acquire process lock: ${message}`);
        return false;
    }
}

function releaseProcessLock(): void {
    try {
        if (fs.existsSync(LOCKFILE_PATH)) {
            const storedPid = parseInt(fs.readFileSync(LOCKFILE_PATH, 'utf8').trim(), 10);
            // Only remove if it's our lock
            if (storedPid === process.pid) {
                fs.unlinkSync(LOCKFILE_PATH);
            }
        }
    } catch (err: unknown) {
        const message = err instanceof Error ? err.message : String(err);
        logger.warn(`[SHUTDOWN] Could not release lockfile: ${message}`);
    }
}

// ═══════════════════════════════════════════════════════════════════════════════
// GRACEFUL SHUTDOWN
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * 1. Stop the scheduler (waits for the current tick)
 * 2. Persist state one final time
 * 3. Release process lock
 *
 * Open positions are left on the exchange with their stop orders; the next
 * start reconciles them.
 */
async function gracefulShutdown(signal: string, exitCode: number = 0): Promise<void> {
    if (isShuttingDown) return;
    isShuttingDown = true;

    logger.info(`[SHUTDOWN] ${signal} received, shutting down...`);
    try {
        if (engine) {
            await engine.scheduler.stop();
            engine.state.save();
            logger.info(`[SHUTDOWN] ✅ State saved (${engine.state.getOpenSymbols().length} open positions left to their exchange stops)`);
        }
    } catch (err: unknown) {
        const message = err instanceof Error ? err.message : String(err);
        logger.error(`[SHUTDOWN] Error during shutdown: ${message}`);
        exitCode = 1;
    }
    releaseProcessLock();
    logger.info('[SHUTDOWN] ✅ Process lock released');
    process.exit(exitCode);
}

// ═══════════════════════════════════════════════════════════════════════════════
// PROCESS HANDLERS
// ═══════════════════════════════════════════════════════════════════════════════

function attachProcessHandlers(): void {
    process.on('SIGINT', () => {
        gracefulShutdown('SIGINT').catch(() => process.exit(1));
    });
    process.on('SIGTERM', () => {
        gracefulShutdown('SIGTERM').catch(() => process.exit(1));
    });

    process.on('uncaughtException', (error) => {
        logger.error(`🚨 [FATAL] Uncaught Exception: ${error.message}`, { stack: error.stack });
        gracefulShutdown('uncaughtException', 1).catch(() => {
            releaseProcessLock();
            process.exit(1);
        });
    });

    // Log but don't exit; the scheduler isolates task failures on its own
    process.on('unhandledRejection', (reason) => {
        logger.error(`🚨 [FATAL] Unhandled Rejection: ${String(reason)}`);
    });

    process.on('exit', () => {
        releaseProcessLock();
    });
}

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN ENTRYPOINT
// ═══════════════════════════════════════════════════════════════════════════════

async function run(): Promise<void> {
    logger.info('════════════════════════════════════════════════════════════════');
    logger.info(`🔧 PERP EXECUTION ENGINE — STARTING (PID ${process.pid})`);
    logger.info('════════════════════════════════════════════════════════════════');

    // STEP 0: configuration (throws ConfigError on invalid values)
    const settings = loadSettings();
    const apiKey = process.env.BINANCE_API_KEY;
    const apiSecret = process.env.BINANCE_API_SECRET;
    if (!apiKey || !apiSecret) {
        logger.error('[STARTUP] BINANCE_API_KEY and BINANCE_API_SECRET must be set');
        process.exit(1);
    }

    // STEP 1: process lock
    if (!acquireProcessLock()) {
        logger.error(`[STARTUP] 🚫 Another instance is already running. Remove ${LOCKFILE_PATH} if it is stale.`);
        process.exit(0);
    }
    attachProcessHandlers();

    // STEP 2: components
    const exchange = new BinanceFuturesClient(
        { apiKey, apiSecret },
        { baseUrl: settings.exchangeBaseUrl, timeoutMs: settings.httpTimeoutMs }
    );
    engine = createEngine({ settings, exchange });

    // STEP 3: connectivity, reconciliation, leverage
    await prepareEngine(engine);

    // STEP 4: loop
    main(engine);
    logger.info('🟢 ENGINE RUNTIME ACTIVE. Press Ctrl+C for graceful shutdown');
}

run().catch((err: unknown) => {
    const message = err instanceof Error ? err.message : String(err);
    logger.error(`[STARTUP] ❌ FATAL: ${message}`);
    releaseProcessLock();
    process.exit(1);
});
