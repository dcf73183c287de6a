import type { LiveMetricSample } from "../../validation/dto";

export type WearableVendor = "fitbit" | "oura";
export const WEARABLE_VENDORS: readonly WearableVendor[] = ["fitbit", "oura"];

/** OAuth lives outside the engine; providers only ask for a currently valid token. */
export interface AccessTokenSource {
    getAccessToken(userId: string): Promise<string>;
}

export type FetchLike = (url: string, init?: { headers?: Record<string, string> }) => Promise<Response>;

export interface LiveMetricProvider {
    readonly vendor: WearableVendor;
    /** Latest breath rate + HRV. Rejects with AuthError when the vendor refuses the token. */
    fetchLiveMetric(userId: string): Promise<LiveMetricSample>;
}

export interface ProviderDeps {
    tokens: AccessTokenSource;
    fetch?: FetchLike;
    baseUrl?: string;
    now?: () => Date;
}
