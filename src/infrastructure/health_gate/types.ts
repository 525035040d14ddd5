/**
 * Health Gate - Type Definitions
 * 
 * ═══════════════════════════════════════════════════════════════════════════════
 * PURPOSE: Stop opening new risk while the exchange round trip is slow.
 * 
 * Latency is sampled once per second by timing a server-time request. A slow
 * venue means stale prices and late fills, so the strategy cycle is skipped
 * until latency has been healthy for several samples in a row. The position
 * monitor keeps running either way.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

export type HealthState = 'RUNNING' | 'PAUSED';

/**
 * Configuration for the latency gate
 */
export interface HealthGateConfig {
    /** Latency above this pauses the gate (ms) */
    pauseThresholdMs: number;

    /** Latency must be below this to count toward resuming (ms) */
    resumeThresholdMs: number;

    /** Consecutive good samples needed to resume */
    resumeSamples: number;

    /** Latency recorded for a failed probe (ms) */
    failureLatencyMs: number;
}

/**
 * One latency observation and the transition it caused
 */
export interface HealthSample {
    latencyMs: number;
    failed: boolean;
    state: HealthState;
    transitioned: boolean;
    timestamp: number;
}

export interface HealthStatus {
    state: HealthState;
    lastLatencyMs: number | null;
    goodStreak: number;
    pausedSince: number | null;
    totalPauses: number;
}
