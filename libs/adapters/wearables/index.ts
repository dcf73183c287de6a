import { FitbitProvider } from "./fitbit";
import { OuraProvider } from "./oura";
import type { LiveMetricProvider, ProviderDeps, WearableVendor } from "./types";

export * from "./types";
export { FitbitProvider } from "./fitbit";
export { OuraProvider } from "./oura";

/** Closed set of vendors; a new vendor is a new class behind the same capability. */
export function createLiveMetricProvider(vendor: WearableVendor, deps: ProviderDeps): LiveMetricProvider {
    switch (vendor) {
        case "fitbit":
            return new FitbitProvider(deps);
        case "oura":
            return new OuraProvider(deps);
    }
}

export function isWearableVendor(v: unknown): v is WearableVendor {
    return v === "fitbit" || v === "oura";
}
