import Bottleneck from "bottleneck";

const ONE_MINUTE_MS = 60_000;

/**
 * Limiter allowing `concurrency` jobs in flight and, when `perMinute` is set,
 * at most that much weight per rolling minute (requests or tokens).
 */
export function createRateLimiter(concurrency: number, perMinute?: number): Bottleneck {
    const maxConcurrent = Math.max(1, Math.floor(concurrency));

    if (perMinute === undefined || !Number.isFinite(perMinute)) {
        return new Bottleneck({ maxConcurrent });
    }

    const amount = Math.max(1, Math.floor(perMinute));
    return new Bottleneck({
        maxConcurrent,
        reservoir: amount,
        reservoirRefreshAmount: amount,
        reservoirRefreshInterval: ONE_MINUTE_MS,
    });
}
