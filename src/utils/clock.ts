/**
 * Injected time source. Everything time-dependent in the engine reads from a
 * Clock so tests can drive it without wall-clock sleeps.
 */
export interface Clock {
    /** epoch milliseconds */
    now(): number;
}

export const systemClock: Clock = {
    now: () => Date.now(),
};

export function nowSeconds(clock: Clock): number {
    return Math.floor(clock.now() / 1000);
}

export function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}
