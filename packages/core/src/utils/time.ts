import { configurationError } from "../errors";

/**
 * Source of the current time in epoch milliseconds.
 */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

export function secondsToMs(seconds: number): number {
    return seconds * 1000;
}

/**
 * Epoch milliseconds before which a row counts as expired.
 */
export function expiryThresholdMs(clock: Clock, maxLifetimeSeconds: number): number {
    return clock() - secondsToMs(maxLifetimeSeconds);
}

export function normalizeLifetime(maxLifetimeSeconds: number): number {
    const lifetime = Math.floor(maxLifetimeSeconds);
    if (!Number.isFinite(lifetime) || lifetime < 0) {
        throw configurationError("maxLifetimeSeconds must be a non-negative integer.", { maxLifetimeSeconds });
    }
    return lifetime;
}
