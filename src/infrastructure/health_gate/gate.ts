/**
 * Health Gate - Latency State Machine
 */

import { ExchangeClient } from '../../exchange/types';
import { Clock, systemClock } from '../../utils/clock';
import logger from '../../utils/logger';
import { DEFAULT_CONFIG } from './config';
import { HealthGateConfig, HealthSample, HealthState, HealthStatus } from './types';

export class HealthGate {
    private readonly config: HealthGateConfig;
    private readonly clock: Clock;

    private state: HealthState = 'RUNNING';
    private goodStreak = 0;
    private lastLatencyMs: number | null = null;
    private pausedSince: number | null = null;
    private totalPauses = 0;

    constructor(config: HealthGateConfig = DEFAULT_CONFIG, clock: Clock = systemClock) {
        this.config = config;
        this.clock = clock;
    }

    /**
     * Feed one latency observation through the state machine.
     */
    recordLatency(latencyMs: number, failed: boolean = false): HealthSample {
        const now = this.clock.now();
        const previous = this.state;
        this.lastLatencyMs = latencyMs;

        if (this.state === 'RUNNING') {
            if (latencyMs > this.config.pauseThresholdMs) {
                this.state = 'PAUSED';
                this.goodStreak = 0;
                this.pausedSince = now;
                this.totalPauses++;
                logger.warn(`[HEALTH] ⏸️ PAUSED — latency ${latencyMs}ms > ${this.config.pauseThresholdMs}ms${failed ? ' (probe failed)' : ''}`);
            }
        } else if (latencyMs < this.config.resumeThresholdMs) {
            this.goodStreak++;
            if (this.goodStreak >= this.config.resumeSamples) {
                const pausedForSec = this.pausedSince !== null ? ((now - this.pausedSince) / 1000).toFixed(1) : '?';
                this.state = 'RUNNING';
                this.goodStreak = 0;
                this.pausedSince = null;
                logger.info(`[HEALTH] ▶️ RESUMED — ${this.config.resumeSamples} good samples, paused for ${pausedForSec}s`);
            }
        } else {
            this.goodStreak = 0;
        }

        return {
            latencyMs,
            failed,
            state: this.state,
            transitioned: previous !== this.state,
            timestamp: now,
        };
    }

    /**
     * Time one server-time round trip and record it. A failed call counts as
     * failureLatencyMs.
     */
    async probe(exchange: Pick<ExchangeClient, 'getServerTime'>): Promise<HealthSample> {
        const started = this.clock.now();
        const result = await exchange.getServerTime();
        if (result.kind !== 'ok') {
            return this.recordLatency(this.config.failureLatencyMs, true);
        }
        return this.recordLatency(Math.max(0, this.clock.now() - started));
    }

    isPaused(): boolean {
        return this.state === 'PAUSED';
    }

    getState(): HealthState {
        return this.state;
    }

    getStatus(): HealthStatus {
        return {
            state: this.state,
            lastLatencyMs: this.lastLatencyMs,
            goodStreak: this.goodStreak,
            pausedSince: this.pausedSince,
            totalPauses: this.totalPauses,
        };
    }
}
