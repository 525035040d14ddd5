/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * BOOTSTRAP — COMPONENT FACTORY + STARTUP SEQUENCE
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * This file wires components together. NO RUNTIME LOOPS in this file; the
 * Scheduler it returns is started by index.ts.
 *
 * STARTUP ORDER (prepareEngine):
 * 1. Connectivity check: server time + balance. An auth failure is FATAL.
 * 2. Reconcile local state against the exchange (exchange wins). An aborted
 *    reconciliation is FATAL: trading on unknown state is not allowed.
 * 3. Set leverage on every configured symbol.
 *
 * Each process run gets a fresh runId so log lines from different runs can be
 * told apart.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { v4 as uuidv4 } from 'uuid';
import { SettingsStore, TradingSettings } from './config/settings';
import { ExchangeClient } from './exchange/types';
import { StateManager } from './storage/stateManager';
import { OrderExecutor } from './execution/orderExecutor';
import { PositionLifecycle } from './engine/positionLifecycle';
import { AdaptiveTuner } from './tuning/adaptiveTuner';
import { HealthGate, createConfig as createHealthConfig } from './infrastructure/health_gate';
import { reconcilePositions, ReconcileResult } from './services/positionReconciler';
import { Scheduler, SchedulerConfig, SchedulerTasks } from './runtime/scheduler';
import { StrategyCycle } from './runtime/strategyCycle';
import { Clock, nowSeconds, sleep as realSleep, systemClock } from './utils/clock';
import { withRetry } from './utils/retry';
import { describeFailure, isAuthFailure } from './utils/result';
import logger from './utils/logger';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export interface EngineOptions {
    settings: TradingSettings;
    exchange: ExchangeClient;
    clock?: Clock;
    sleep?: (ms: number) => Promise<void>;
    scheduler?: Partial<SchedulerConfig>;
}

export interface Engine {
    runId: string;
    settings: SettingsStore;
    exchange: ExchangeClient;
    state: StateManager;
    executor: OrderExecutor;
    lifecycle: PositionLifecycle;
    tuner: AdaptiveTuner;
    gate: HealthGate;
    strategy: StrategyCycle;
    scheduler: Scheduler;
}

export class StartupError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'StartupError';
    }
}

// ═══════════════════════════════════════════════════════════════════════════════
// FACTORY
// ═══════════════════════════════════════════════════════════════════════════════

export function createEngine(options: EngineOptions): Engine {
    const clock = options.clock ?? systemClock;
    const sleep = options.sleep ?? realSleep;
    const runId = uuidv4();

    const settings = new SettingsStore(options.settings);
    const state = new StateManager(options.settings.stateFile);
    const executor = new OrderExecutor(options.exchange, settings, sleep);
    const tuner = new AdaptiveTuner(settings);
    const lifecycle = new PositionLifecycle({ executor, state, settings, outcomes: tuner, clock });
    const gate = new HealthGate(
        createHealthConfig({
            pauseThresholdMs: options.settings.health.pauseMs,
            resumeThresholdMs: options.settings.health.resumeMs,
        }),
        clock
    );
    const strategy = new StrategyCycle({ exchange: options.exchange, state, lifecycle, settings, clock, sleep });

    const tasks = createSchedulerTasks({ exchange: options.exchange, state, lifecycle, gate, strategy, clock });
    const scheduler = new Scheduler({ clock, gate, tasks, config: options.scheduler, sleep });

    logger.info(`[STARTUP] Engine created (run ${runId}, state ${state.getFilePath()}, open=${state.getOpenSymbols().length})`);

    return { runId, settings, exchange: options.exchange, state, executor, lifecycle, tuner, gate, strategy, scheduler };
}

interface TaskDeps {
    exchange: ExchangeClient;
    state: StateManager;
    lifecycle: PositionLifecycle;
    gate: HealthGate;
    strategy: StrategyCycle;
    clock: Clock;
}

function createSchedulerTasks(deps: TaskDeps): SchedulerTasks {
    return {
        housekeeping: () => {
            deps.state.pruneTradesLastHour(nowSeconds(deps.clock));
        },
        health: async () => {
            await deps.gate.probe(deps.exchange);
        },
        monitor: () => deps.lifecycle.monitorPositions(),
        strategy: async (boundaryMs: number) => {
            await deps.strategy.run(boundaryMs);
        },
        heartbeat: (_nowMs: number, msUntilNextCandle: number) => logHeartbeat(msUntilNextCandle, deps.state, deps.gate),
    };
}

function logHeartbeat(msUntilNextCandle: number, state: StateManager, gate: HealthGate): void {
    const minutes = Math.ceil(msUntilNextCandle / 60000);
    const status = gate.getStatus();
    const latency = status.lastLatencyMs === null ? 'n/a' : `${status.lastLatencyMs}ms`;
    logger.info(
        `[LOOP] 💓 next close in ${minutes}m | open=${state.getOpenSymbols().length} ` +
        `| health=${status.state} (${latency}) | dailyPnl=${state.getDailyPnl().toFixed(2)}`
    );
}

// ═══════════════════════════════════════════════════════════════════════════════
// STARTUP SEQUENCE
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Everything that must succeed before the scheduler may start.
 *
 * @throws StartupError on auth failure or aborted reconciliation
 */
export async function prepareEngine(engine: Engine, clock: Clock = systemClock, sleep: (ms: number) => Promise<void> = realSleep): Promise<ReconcileResult> {
    const settings = engine.settings.current();

    logger.info('[STARTUP] Step 1: Connectivity check...');
    const time = await withRetry('server time', () => engine.exchange.getServerTime(), settings.retry, sleep);
    if (time.kind !== 'ok') {
        throw new StartupError(`exchange unreachable: ${describeFailure(time)}`);
    }
    const balance = await withRetry('balance', () => engine.exchange.getBalance(), settings.retry, sleep);
    if (balance.kind !== 'ok') {
        throw new StartupError(`balance check failed (credentials?): ${describeFailure(balance)}`);
    }
    logger.info(`[STARTUP] ✅ Exchange reachable, balance free=${balance.value.free.toFixed(2)} total=${balance.value.total.toFixed(2)}`);

    logger.info('[STARTUP] Step 2: Reconciling positions...');
    const reconcile = await reconcilePositions({ exchange: engine.exchange, state: engine.state, settings, clock, sleep });
    if (reconcile.aborted) {
        throw new StartupError(`reconciliation aborted: ${reconcile.reason ?? 'unknown'}`);
    }

    logger.info('[STARTUP] Step 3: Setting leverage...');
    for (const symbol of settings.symbols) {
        const result = await engine.executor.setLeverage(symbol, settings.leverage);
        if (result.kind !== 'ok' && isAuthFailure(result)) {
            throw new StartupError(`leverage rejected for ${symbol}: ${describeFailure(result)}`);
        }
        if (result.kind !== 'ok') {
            logger.warn(`[STARTUP] ${symbol} leverage not set: ${describeFailure(result)}`);
        }
    }

    return reconcile;
}
