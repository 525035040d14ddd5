/**
 * Health Gate Module
 * 
 * ═══════════════════════════════════════════════════════════════════════════════
 * PURPOSE: Hysteresis circuit breaker over exchange round-trip latency.
 * 
 * BEHAVIOR:
 * - RUNNING → PAUSED on a single sample above pauseThresholdMs
 * - PAUSED → RUNNING after resumeSamples consecutive samples below resumeThresholdMs
 * - Any other sample while PAUSED resets the streak
 * 
 * INTEGRATION:
 * if (gate.isPaused()) skip the strategy cycle; the monitor still runs
 * ═══════════════════════════════════════════════════════════════════════════════
 */

// Type exports
export type {
    HealthState,
    HealthGateConfig,
    HealthSample,
    HealthStatus,
} from './types';

// Config exports
export {
    DEFAULT_CONFIG,
    createConfig,
} from './config';

// Gate exports
export { HealthGate } from './gate';
