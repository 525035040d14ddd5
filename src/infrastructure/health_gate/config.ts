/**
 * Health Gate - Configuration
 */

import { HealthGateConfig } from './types';

/**
 * Default latency thresholds
 * 
 * Behavior:
 * - latency > 800ms → PAUSED
 * - 3 consecutive samples < 500ms → RUNNING
 * - failed probe → counted as 9999ms
 */
export const DEFAULT_CONFIG: HealthGateConfig = {
    pauseThresholdMs: 800,
    resumeThresholdMs: 500,
    resumeSamples: 3,
    failureLatencyMs: 9999,
};

/**
 * Create a custom config with overrides
 */
export function createConfig(overrides: Partial<HealthGateConfig>): HealthGateConfig {
    return {
        ...DEFAULT_CONFIG,
        ...overrides,
    };
}
