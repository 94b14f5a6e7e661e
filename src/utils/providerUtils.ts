import type { ProviderRateLimits } from "../llm/base";
import type { ProviderLimitsConfig } from "../config/types";

export function resolveBaseUrl(url: string | undefined): string | undefined {
    if (!url) {
        return undefined;
    }
    return url.endsWith("/") ? url.slice(0, -1) : url;
}

const LIMIT_KEYS: ReadonlyArray<keyof ProviderLimitsConfig> = [
    "batchSize",
    "concurrency",
    "maxRequestsPerMinute",
    "maxTokensPerMinute",
    "retries",
];

/** Overrides provider defaults with the configured limits that are actually set. */
export function mergeLimits(defaults: ProviderRateLimits, override?: ProviderLimitsConfig): ProviderRateLimits {
    if (!override) {
        return defaults;
    }

    const merged: ProviderRateLimits = { ...defaults };
    for (const key of LIMIT_KEYS) {
        const value = override[key];
        if (value !== undefined) {
            merged[key] = value;
        }
    }
    return merged;
}
