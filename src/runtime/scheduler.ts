/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * SCHEDULER — THE ONLY RUNTIME DRIVER
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * One cooperative loop, polled every 100ms. Each tick reads the clock once and
 * runs whatever is due, in this fixed order:
 *
 *   housekeeping → health (1s) → monitor (2s) → strategy (candle close) → heartbeat (60s)
 *
 * RULES:
 * 1. Tasks run sequentially; nothing overlaps
 * 2. Health gate PAUSED → strategy skipped (watermark not advanced); monitor
 *    still runs so existing risk keeps being managed
 * 3. A task that throws is logged and the tick continues with the next task
 * 4. Any error in a tick makes the loop back off (5s) before polling again
 * 5. Timers are marked before their task runs: a failing task is not retried
 *    until its next period
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { Clock, sleep as realSleep } from '../utils/clock';
import logger from '../utils/logger';
import { CandleCloseConfig, CandleCloseTimer, DEFAULT_CANDLE_CLOSE_CONFIG, IntervalTimer } from './timers';

export type TaskName = 'housekeeping' | 'health' | 'monitor' | 'strategy' | 'heartbeat';

export interface SchedulerTasks {
    housekeeping(nowMs: number): Promise<void> | void;
    health(): Promise<void>;
    monitor(): Promise<void>;
    /** `boundaryMs` is the start of the newly forming candle */
    strategy(boundaryMs: number): Promise<void>;
    heartbeat(nowMs: number, msUntilNextCandle: number): Promise<void> | void;
}

export interface SchedulerConfig {
    pollMs: number;
    errorBackoffMs: number;
    healthIntervalMs: number;
    monitorIntervalMs: number;
    heartbeatIntervalMs: number;
    candle: CandleCloseConfig;
}

export const DEFAULT_SCHEDULER_CONFIG: SchedulerConfig = {
    pollMs: 100,
    errorBackoffMs: 5000,
    healthIntervalMs: 1000,
    monitorIntervalMs: 2000,
    heartbeatIntervalMs: 60 * 1000,
    candle: DEFAULT_CANDLE_CLOSE_CONFIG,
};

export interface TickReport {
    nowMs: number;
    ran: TaskName[];
    failed: TaskName[];
    strategySkippedPaused: boolean;
}

export interface SchedulerDeps {
    clock: Clock;
    gate: { isPaused(): boolean };
    tasks: SchedulerTasks;
    config?: Partial<SchedulerConfig>;
    sleep?: (ms: number) => Promise<void>;
}

export class Scheduler {
    private readonly clock: Clock;
    private readonly gate: { isPaused(): boolean };
    private readonly tasks: SchedulerTasks;
    private readonly config: SchedulerConfig;
    private readonly sleep: (ms: number) => Promise<void>;

    private readonly healthTimer: IntervalTimer;
    private readonly monitorTimer: IntervalTimer;
    private readonly heartbeatTimer: IntervalTimer;
    private readonly candleTimer: CandleCloseTimer;

    private isRunning = false;
    private stopRequested = false;
    private loopPromise: Promise<void> | null = null;

    constructor(deps: SchedulerDeps) {
        this.clock = deps.clock;
        this.gate = deps.gate;
        this.tasks = deps.tasks;
        this.config = { ...DEFAULT_SCHEDULER_CONFIG, ...(deps.config ?? {}) };
        this.sleep = deps.sleep ?? realSleep;

        this.healthTimer = new IntervalTimer('health', this.config.healthIntervalMs);
        this.monitorTimer = new IntervalTimer('monitor', this.config.monitorIntervalMs);
        this.heartbeatTimer = new IntervalTimer('heartbeat', this.config.heartbeatIntervalMs);
        this.candleTimer = new CandleCloseTimer(this.config.candle);
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // TICK
    // ═══════════════════════════════════════════════════════════════════════════

    async tick(): Promise<TickReport> {
        const nowMs = this.clock.now();
        const report: TickReport = { nowMs, ran: [], failed: [], strategySkippedPaused: false };

        await this.runTask(report, 'housekeeping', () => this.tasks.housekeeping(nowMs));

        if (this.healthTimer.isDue(nowMs)) {
            this.healthTimer.markRun(nowMs);
            await this.runTask(report, 'health', () => this.tasks.health());
        }

        if (this.monitorTimer.isDue(nowMs)) {
            this.monitorTimer.markRun(nowMs);
            await this.runTask(report, 'monitor', () => this.tasks.monitor());
        }

        const boundary = this.candleTimer.dueBoundary(nowMs);
        if (boundary !== null) {
            if (this.gate.isPaused()) {
                report.strategySkippedPaused = true;
                logger.warn(`[LOOP] ⏸️ Strategy cycle skipped, health gate PAUSED (candle ${new Date(boundary).toISOString()})`);
            } else {
                this.candleTimer.markProcessed(boundary);
                await this.runTask(report, 'strategy', () => this.tasks.strategy(boundary));
            }
        }

        if (this.heartbeatTimer.isDue(nowMs)) {
            this.heartbeatTimer.markRun(nowMs);
            await this.runTask(report, 'heartbeat', () => this.tasks.heartbeat(nowMs, this.candleTimer.msUntilNextClose(nowMs)));
        }

        return report;
    }

    private async runTask(report: TickReport, name: TaskName, task: () => Promise<void> | void): Promise<void> {
        report.ran.push(name);
        try {
            await task();
        } catch (err: unknown) {
            report.failed.push(name);
            const message = err instanceof Error ? err.message : String(err);
            const stack = err instanceof Error ? err.stack : undefined;
            logger.error(`[LOOP] CRITICAL ${name} task failed: ${message}`, { stack });
        }
    }

    msUntilNextCandle(nowMs: number = this.clock.now()): number {
        return this.candleTimer.msUntilNextClose(nowMs);
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // LOOP
    // ═══════════════════════════════════════════════════════════════════════════

    /**
     * Start polling. Resolves immediately; the loop runs until stop().
     */
    start(): void {
        if (this.isRunning) {
            logger.warn('[LOOP] Already running, ignoring start()');
            return;
        }
        this.isRunning = true;
        this.stopRequested = false;
        logger.info(`[LOOP] 🚀 Scheduler started (poll=${this.config.pollMs}ms)`);
        this.loopPromise = this.loop();
    }

    private async loop(): Promise<void> {
        while (!this.stopRequested) {
            let delay = this.config.pollMs;
            try {
                const report = await this.tick();
                if (report.failed.length > 0) delay = this.config.errorBackoffMs;
            } catch (err: unknown) {
                const message = err instanceof Error ? err.message : String(err);
                logger.error(`[LOOP] CRITICAL iteration failed: ${message}`);
                delay = this.config.errorBackoffMs;
            }
            if (!this.stopRequested) {
                await this.sleep(delay);
            }
        }
        this.isRunning = false;
        logger.info('[LOOP] ✅ Stopped');
    }

    /**
     * Ask the loop to exit after the current iteration and wait for it.
     */
    async stop(): Promise<void> {
        if (!this.isRunning || !this.loopPromise) {
            logger.info('[LOOP] Not running, ignoring stop()');
            return;
        }
        logger.info('[LOOP] 🛑 Stop requested, waiting for current iteration...');
        this.stopRequested = true;
        await this.loopPromise;
        this.loopPromise = null;
    }

    isLoopRunning(): boolean {
        return this.isRunning;
    }
}
